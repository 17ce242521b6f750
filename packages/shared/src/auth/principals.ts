export const PRINCIPAL_HEADER = "x-principal";

export type PrincipalSet = Set<string>;

function firstString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function parsePrincipalHeader(value: unknown): string | null {
  const raw = firstString(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Parses a comma separated principal list. `*` admits every principal,
 * an empty or missing value falls back to `fallback`.
 */
export function parsePrincipalSet(raw: string | undefined, fallback: string[]): PrincipalSet {
  const source = (raw || "").trim();
  if (!source) {
    return new Set(fallback);
  }

  if (source === "*") {
    return new Set(["*"]);
  }

  return new Set(
    source
      .split(",")
      .map((principal) => principal.trim())
      .filter((principal) => principal.length > 0),
  );
}

export function isPrincipalAllowed(principal: string | null, allowed: PrincipalSet): boolean {
  if (allowed.has("*")) return true;
  if (!principal) return false;
  return allowed.has(principal);
}
