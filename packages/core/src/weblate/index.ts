export { toTranslationStatistics, WeblateClient, type WeblateClientOptions } from "./client.js";
export {
  ComponentPageSchema,
  ComponentSchema,
  pageSchema,
  ProjectPageSchema,
  ProjectSchema,
  StatisticsSchema,
} from "./schemas.js";
export {
  type FetchLike,
  type TransportRequest,
  WeblateTransport,
  type WeblateTransportOptions,
} from "./transport.js";
export type {
  ComponentStats,
  ComponentSummary,
  ListProjectsOptions,
  ProjectStats,
  ProjectStatsOptions,
  ProjectSummary,
  RequestOptions,
  TranslationStatistics,
} from "./types.js";
