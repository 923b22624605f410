/**
 * Check whether a value is a plain key/value object (not an array, not null)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validate if a string can be used as a single segment of a store key
 */
export function isValidKeyComponent(value: string): boolean {
  return value.trim().length > 0 && !value.includes('/');
}

/**
 * Join key segments with the store separator, dropping empty and surrounding slashes
 */
export function joinKey(...segments: string[]): string {
  return segments
    .map(segment => segment.replace(/^\/+|\/+$/g, ''))
    .filter(segment => segment.length > 0)
    .join('/');
}

/**
 * Parse a numeric stat that may arrive as a string; NaN when unparseable
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return Number(value);
  }
  return NaN;
}

/**
 * Deep freeze an object graph
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
