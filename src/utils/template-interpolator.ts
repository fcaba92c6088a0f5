// src/utils/template-interpolator.ts

/**
 * Replace {{variable}} placeholders in a template string.
 * Unknown variables are left as-is.
 */
export function interpolateTemplate(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = context[key];
    if (value === undefined || value === null) {
      return match; // Keep placeholder if no value
    }
    return String(value);
  });
}

/**
 * Quote a value the way messages show user input: double quotes, with
 * backslashes and embedded quotes escaped.
 */
export function quote(value: string): string {
  return JSON.stringify(value);
}
