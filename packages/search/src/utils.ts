/**
 * Shallow copy of a class instance, keeping its prototype, with some
 * own properties replaced. Used by the immutable query and field types.
 */
export function cloneWith<T extends object>(source: T, changes: object): T {
  const copy: T = Object.create(Object.getPrototypeOf(source));
  return Object.assign(copy, source, changes);
}

/** Render `key=value` pairs the way query `toString()` output shows them. */
export function formatParams(params: Record<string, unknown>): string {
  return Object.entries(params)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(', ');
}

export function formatValue(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return `'${value}'`;
  return String(value);
}
