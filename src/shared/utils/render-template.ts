/**
 * `{name}` placeholder rendering shared by mock templates and planner prompts.
 */

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Single pass; placeholders without a value stay as written
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) =>
    Object.hasOwn(values, name) ? values[name] : match
  );
}
