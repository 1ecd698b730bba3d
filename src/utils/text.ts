/**
 * Collapse every whitespace run to a single space and trim both ends.
 */
export function clean(s: string | null | undefined): string {
  if (s === null || s === undefined) return '';
  return s.replace(/\s+/g, ' ').trim();
}

/**
 * Turn a label like 'Amount:' or '  Date & Time : ' into a comparable key
 */
export function normalizeLabel(s: string | null | undefined): string {
  return clean(s).replace(/:+$/, '').trim().toLowerCase();
}
