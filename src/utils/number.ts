export function parseNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function parsePositiveInt(value: unknown): number | null {
  const n = parseNumber(value);
  return n !== null && Number.isInteger(n) && n > 0 ? n : null;
}
