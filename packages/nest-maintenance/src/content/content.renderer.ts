const PLACEHOLDER_PATTERN = /\[\[\s*\.?([a-zA-Z0-9_]+)\s*\]\]/g;

/**
 * Replaces `[[ name ]]` (or `[[ .name ]]`) placeholders with values from `variables`.
 * Unknown names render as an empty string.
 */
export function renderMaintenanceTemplate(template: string, variables: Readonly<Record<string, string>>): string {
  if (!template) {
    return '';
  }

  return template.replace(PLACEHOLDER_PATTERN, (_, token: string) => {
    const value = Object.prototype.hasOwnProperty.call(variables, token) ? variables[token] : undefined;
    return value ?? '';
  });
}

/** Returns the body to send: raw bytes when no variables are configured, rendered UTF-8 text otherwise. */
export function renderMaintenanceContent(
  content: Buffer,
  variables: Readonly<Record<string, string>> | undefined,
): Buffer {
  if (!variables) {
    return content;
  }

  return Buffer.from(renderMaintenanceTemplate(content.toString('utf-8'), variables), 'utf-8');
}
