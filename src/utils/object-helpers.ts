/**
 * Object Helpers
 */

/**
 * Shallow merge that skips `undefined` overrides, so an explicitly
 * undefined option never masks its default
 *
 * @example
 * ```typescript
 * mergeDefined({ a: 1, b: 2 }, { b: undefined })  // => { a: 1, b: 2 }
 * ```
 */
export function mergeDefined<T extends object>(defaults: T, overrides: Partial<T> = {}): T {
  const output = { ...defaults };

  for (const key of Object.keys(overrides) as Array<keyof T>) {
    const value = overrides[key];
    if (value !== undefined) {
      output[key] = value as T[keyof T];
    }
  }

  return output;
}

/**
 * Deep merge two plain objects; arrays and scalars from `source` replace
 * those in `target`, `undefined` values are skipped
 */
export function deepMerge<T>(target: T, source: Partial<T>): T {
  const output = { ...target };

  for (const key in source) {
    if (Object.prototype.hasOwnProperty.call(source, key)) {
      const sourceValue = source[key];
      const targetValue = output[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = deepMerge<Record<string, unknown>>(targetValue, sourceValue) as T[Extract<keyof T, string>];
      } else if (sourceValue !== undefined) {
        output[key] = sourceValue as T[Extract<keyof T, string>];
      }
    }
  }

  return output;
}

/**
 * True for non-null, non-array objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
