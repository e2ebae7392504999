// Helpers for reading loosely shaped JSON records from the listing service.

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// Strings pass through, numbers are stringified, anything else reads as ''.
export function str(v: unknown): string {
  if (typeof v === 'string') return v;
  if (typeof v === 'number') return String(v);
  return '';
}
