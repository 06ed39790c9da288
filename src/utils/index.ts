/**
 * Checks if an object (or a function, such as a class) has a property with an optional type check.
 *
 * @param obj - Object to check
 * @param prop - Property name (string or symbol)
 * @param type - Optional type to check (e.g., 'function', 'number', 'string')
 * @returns True if object has the property and (if type specified) it matches the type
 *
 * @example
 * ```typescript
 * has(geo, 'region', 'function') // checks if geo has a region method
 * has(res, 'statusCode', 'number') // checks if res has a numeric statusCode
 * ```
 */
/* eslint-disable no-redeclare -- TypeScript function overloads */
export function has(obj: unknown, prop: string | symbol): boolean;
export function has<T extends string>(
  obj: unknown,
  prop: string | symbol,
  type: T,
): obj is Record<string | symbol, unknown> & {
  [K in typeof prop]: T extends 'function'
    ? Function
    : T extends 'number'
      ? number
      : T extends 'string'
        ? string
        : T extends 'object'
          ? object
          : unknown;
};
export function has(obj: unknown, prop: string | symbol, type?: string): boolean {
  if (obj === null || obj === undefined || (typeof obj !== 'object' && typeof obj !== 'function')) {
    return false;
  }
  if (!(prop in obj)) {
    return false;
  }
  if (type === undefined) {
    return true;
  }
  const value = (obj as Record<string | symbol, unknown>)[prop];
  return typeof value === type;
}
/* eslint-enable no-redeclare */

/** Extracts a readable error message from an error object. */
export function extractMessage(error: unknown): string {
  if (!error) {
    return '';
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return String(error);
}
