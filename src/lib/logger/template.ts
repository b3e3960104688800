const PLACEHOLDER = /{{\s*([\w.]+)\s*}}/g;

/**
 * Replace `{{key}}` (or `{{nested.key}}`) placeholders with values from `params`
 *
 * Missing and null values render as `fallback`. Arrays are joined with ", ".
 */
export function renderTemplate(
  template: string,
  params: Record<string, unknown>,
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER, (_match, key: string) => {
    let value: unknown = params;

    for (const part of key.split('.')) {
      if (value !== null && typeof value === 'object' && part in value) {
        value = Reflect.get(value, part);
      } else {
        value = undefined;
        break;
      }
    }

    if (value === undefined || value === null) {
      return fallback;
    }

    if (Array.isArray(value)) {
      return value.map((item) => String(item)).join(', ');
    }

    return String(value);
  });
}
