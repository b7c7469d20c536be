const CANONICAL_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * True for a canonical lowercase UUID. Uppercase or brace-wrapped forms are
 * rejected, since the catalog never emits them.
 */
export function isValidUuid(value: string): boolean {
  return CANONICAL_UUID.test(value);
}
