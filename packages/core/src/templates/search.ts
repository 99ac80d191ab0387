/**
 * Search-as-you-type over template strings.
 */

export interface TemplateMatch {
  template: string;
  /** Whole query is a prefix of the template. */
  prefix: boolean;
}

function tokenize(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter((token) => token !== "");
}

/**
 * Templates containing every whitespace-separated token of `query`
 * (case-insensitive). Prefix matches rank first, then shorter templates,
 * then alphabetical order. An empty query returns the first `limit` templates.
 *
 * @example
 * searchTemplates(templates, "tuf 3050", 5)
 */
export function searchTemplates(
  templates: readonly string[],
  query: string,
  limit = 20
): string[] {
  const tokens = tokenize(query);
  if (tokens.length === 0) return templates.slice(0, limit);

  const normalized = tokens.join(" ");
  const matches: TemplateMatch[] = [];

  for (const template of templates) {
    const haystack = template.toLowerCase();
    if (tokens.every((token) => haystack.includes(token))) {
      matches.push({ template, prefix: haystack.startsWith(normalized) });
    }
  }

  return matches
    .sort(
      (a, b) =>
        Number(b.prefix) - Number(a.prefix) ||
        a.template.length - b.template.length ||
        a.template.localeCompare(b.template)
    )
    .slice(0, limit)
    .map((match) => match.template);
}
