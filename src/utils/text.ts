/**
 * Text helpers for log output
 */

const PLACEHOLDER = ' [...]';

/**
 * Collapses whitespace and truncates to `width` characters, ending the
 * truncated text with a placeholder.
 */
export function shorten(text: string, width = 1024): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= width) {
    return collapsed;
  }
  const keep = Math.max(0, width - PLACEHOLDER.length);
  return collapsed.slice(0, keep).trimEnd() + PLACEHOLDER;
}

/**
 * Serializes a value for logging and shortens it
 */
export function summarize(value: unknown, width = 1024): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return shorten(serialized, width);
}
