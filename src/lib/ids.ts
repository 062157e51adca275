const DECIMAL_ID = /^[+-]?\d+(\.\d+)?$/;

function isDecimalId(id: string): boolean {
  return DECIMAL_ID.test(id);
}

/**
 * Canonical form of a region or group identifier.
 * Plain decimal ids lose padding and trailing zeros ("03" and "3.0" both
 * become "3"); anything else, "0x1F" and "1e3" included, is kept as written.
 */
export function canonicalId(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === '') return '';

  return isDecimalId(trimmed) ? String(Number(trimmed)) : trimmed;
}

/**
 * Ascending order for identifiers: decimal ids by value, before any text id;
 * text ids by code unit so the order never depends on locale.
 */
export function compareIds(a: string, b: string): number {
  const aNumeric = isDecimalId(a);
  const bNumeric = isDecimalId(b);

  if (aNumeric && bNumeric) return Number(a) - Number(b);
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortIds(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids)).sort(compareIds);
}
