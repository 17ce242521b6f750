import { sha256Hex } from "../crypto/hash.js";

export const SERVICE_AUTH_HEADER = "x-service-token";

export function normalizeServiceToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * When no token is configured every caller passes. Tokens are compared by
 * digest so the comparison length does not depend on the expected value.
 */
export function isServiceTokenAccepted(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeServiceToken(expectedToken);
  if (!expected) return true;

  const expectedDigest = sha256Hex(expected);
  const candidates = Array.isArray(providedHeader) ? providedHeader : [providedHeader];
  return candidates.some(
    (candidate) => typeof candidate === "string" && sha256Hex(candidate.trim()) === expectedDigest,
  );
}
