import { type EngineErrorKind, errorCategory } from "@p2p-trust/shared";

const ERROR_MESSAGES: Record<EngineErrorKind, string> = {
  Unauthorized: "Caller is not allowed to perform this operation",
  AlreadySet: "Authority has already been set",
  InvalidListingId: "Listing id must be a positive integer not used by another listing",
  InvalidItemHash: "Item hash must be 64 printable ASCII characters",
  InvalidSellerDid: "Seller must differ from the submitting principal",
  InsufficientReputation: "Seller reputation is below the admission minimum",
  InvalidPrice: "Price must be a positive integer",
  InvalidCategory: "Category must be 1 to 50 characters",
  InvalidLocation: "Location must be 1 to 100 characters",
  InvalidCurrency: "Currency must be one of STX, USD, BTC",
  DuplicateHash: "Item hash was already admitted",
  BlacklistedSeller: "Seller is blacklisted",
  AnomalyDetected: "Listing risk score exceeds the maximum allowed",
  InvalidRiskScore: "Risk score must not exceed the maximum allowed",
  InvalidPolicyValue: "Policy values must be non-negative integers",
  InvalidReputation: "Reputation must be a non-negative integer",
  InvalidEvidence: "Evidence references must be non-blank content hashes",
  ListingNotFound: "Listing not found",
  DisputeNotFound: "Dispute not found",
  InvalidState: "Operation is not allowed in the current state",
  DuplicateDispute: "A dispute is already open for this escrow",
  AlreadyRuled: "Dispute has already been ruled",
  EscrowMismatch: "Escrow amount and currency must match the listing",
  NoOpenEscrow: "No held escrow exists for this listing",
};

export function errorMessage(kind: EngineErrorKind): string {
  return ERROR_MESSAGES[kind];
}

export function httpStatusForError(kind: EngineErrorKind): number {
  switch (errorCategory(kind)) {
    case "authorization":
      return kind === "AlreadySet" ? 409 : 403;
    case "validation":
      return 400;
    case "state_conflict":
      return kind === "ListingNotFound" || kind === "DisputeNotFound" ? 404 : 409;
    case "settlement":
      return 409;
  }
}
