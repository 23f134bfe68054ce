/** `{{ NAME }}` with optional whitespace inside the braces. */
export const PLACEHOLDER_PATTERN = /\{\{\s*([A-Z0-9_]+)\s*\}\}/g;

export type TemplateValues = Readonly<Record<string, string | number>>;

/**
 * Replace each known placeholder with its value. Placeholders whose name is
 * not in `values` are left exactly as written.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string) =>
    Object.hasOwn(values, name) ? String(values[name]) : match
  );
}

/** Distinct placeholder names in order of first appearance. */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
