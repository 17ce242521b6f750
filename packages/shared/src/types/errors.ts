export const AUTHORIZATION_ERRORS = ["Unauthorized", "AlreadySet"] as const;

export const VALIDATION_ERRORS = [
  "InvalidListingId",
  "InvalidItemHash",
  "InvalidSellerDid",
  "InsufficientReputation",
  "InvalidPrice",
  "InvalidCategory",
  "InvalidLocation",
  "InvalidCurrency",
  "DuplicateHash",
  "BlacklistedSeller",
  "AnomalyDetected",
  "InvalidRiskScore",
  "InvalidPolicyValue",
  "InvalidReputation",
  "InvalidEvidence",
] as const;

export const STATE_CONFLICT_ERRORS = [
  "ListingNotFound",
  "DisputeNotFound",
  "InvalidState",
  "DuplicateDispute",
  "AlreadyRuled",
] as const;

export const SETTLEMENT_ERRORS = ["EscrowMismatch", "NoOpenEscrow"] as const;

export type AuthorizationError = (typeof AUTHORIZATION_ERRORS)[number];
export type ValidationError = (typeof VALIDATION_ERRORS)[number];
export type StateConflictError = (typeof STATE_CONFLICT_ERRORS)[number];
export type SettlementError = (typeof SETTLEMENT_ERRORS)[number];

export type EngineErrorKind =
  | AuthorizationError
  | ValidationError
  | StateConflictError
  | SettlementError;

export type EngineErrorCategory = "authorization" | "validation" | "state_conflict" | "settlement";

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: EngineErrorKind };

export function ok<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: EngineErrorKind): EngineResult<T> {
  return { ok: false, error };
}

function includes<K extends string>(kinds: readonly K[], kind: string): kind is K {
  return kinds.some((candidate) => candidate === kind);
}

export function errorCategory(kind: EngineErrorKind): EngineErrorCategory {
  if (includes(AUTHORIZATION_ERRORS, kind)) return "authorization";
  if (includes(VALIDATION_ERRORS, kind)) return "validation";
  if (includes(STATE_CONFLICT_ERRORS, kind)) return "state_conflict";
  return "settlement";
}
