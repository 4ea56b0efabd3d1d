/**
 * Read a string field from an untyped JSON body
 */
export function readField(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Read an optional numeric field; null when present but not a number
 */
export function readNumber(body: unknown, key: string): number | undefined | null {
  if (typeof body !== "object" || body === null || !(key in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  if (value === undefined) return undefined;
  return typeof value === "number" ? value : null;
}
