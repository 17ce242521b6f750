import { canonicalize } from "json-canonicalize";

/**
 * RFC 8785 canonical JSON. Two requests with the same fields in a
 * different key order produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}
