/**
 * Returns a shallow copy of the provided record without any `undefined` values
 * so optional fields disappear instead of being serialised as `undefined`
 * under `exactOptionalPropertyTypes`.
 */
export function omitUndefinedEntries<
  T extends Record<string, unknown | undefined>,
>(entries: T): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      (result as Record<keyof T, unknown>)[key] = value;
    }
  }
  return result;
}
