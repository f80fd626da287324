/**
 * Weblate web page of a project or component.
 *
 * The web root is the API root without its trailing `/api`.
 *
 * @example
 * ```typescript
 * weblateWebUrl("https://translate.fedoraproject.org/api", "anaconda", "installer");
 * // "https://translate.fedoraproject.org/projects/anaconda/installer/"
 * ```
 */
export function weblateWebUrl(apiBaseUrl: string, project: string, component?: string): string {
  const root = apiBaseUrl.replace(/\/+$/, "").replace(/\/api$/, "");
  const parts = [project, component].filter((part): part is string => part !== undefined);
  return `${root}/projects/${parts.map(encodeURIComponent).join("/")}/`;
}
