/**
 * Returns a shallow copy of the provided record without any `undefined`
 * values, so spreading a partial override never erases a default.
 */
export function omitUndefinedEntries<T extends Record<string, unknown>>(entries: T): Partial<T> {
  const result: Partial<T> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
