import { z } from "zod";

// ============================================
// Weblate REST Payload Schemas
// ============================================

/**
 * Page of a paginated listing.
 */
export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    count: z.number().int().nonnegative(),
    next: z.string().url().nullable(),
    previous: z.string().nullable().optional(),
    results: z.array(item),
  });
}

export const ProjectSchema = z.object({
  slug: z.string().min(1),
  name: z.string().optional(),
  web_url: z.string().optional(),
});

export const ComponentSchema = z.object({
  slug: z.string().min(1),
  name: z.string().optional(),
});

/**
 * Statistics object shared by the project, language and translation
 * statistics endpoints. Only the fields the views use are kept.
 */
export const StatisticsSchema = z.object({
  translated_percent: z.number().default(0),
  fuzzy_percent: z.number().default(0),
  total: z.number().int().nonnegative().optional(),
  translated: z.number().int().nonnegative().optional(),
});

export const ProjectPageSchema = pageSchema(ProjectSchema);
export const ComponentPageSchema = pageSchema(ComponentSchema);

export type ProjectPayload = z.infer<typeof ProjectSchema>;
export type ComponentPayload = z.infer<typeof ComponentSchema>;
export type StatisticsPayload = z.infer<typeof StatisticsSchema>;
