export type Currency = "STX" | "USD" | "BTC";

export const CURRENCIES: readonly Currency[] = ["STX", "USD", "BTC"];

export type ListingStatus = "ACTIVE" | "PAUSED" | "CLOSED";

export type FlagSource = "NONE" | "AUTHORITY";

export interface Listing {
  id: number;
  itemHash: string;         // 64-char item digest, unique across history
  sellerId: string;
  price: number;
  category: string;
  location: string;
  currency: Currency;
  status: ListingStatus;    // derived from the flags below
  flaggedBy: FlagSource;
  pausedBySeller: boolean;
  riskScore?: number;       // present only when admitted with anomaly detection on
  createdAt: string;        // ISO date
  updatedAt: string;
  closedAt?: string;
}

export interface FlaggedListing {
  listingId: number;
  reason: string;
  timestamp: string;
  riskScore: number;
}

export interface SubmitListingInput {
  id: number;
  itemHash: string;
  sellerId: string;
  sellerReputation: number;
  price: number;
  category: string;
  location: string;
  currency: string;
}

export type ListingAuditEventType =
  | "SUBMITTED"
  | "FLAGGED"
  | "UNFLAGGED"
  | "PRICE_UPDATED"
  | "PAUSED"
  | "RESUMED"
  | "ESCROW_OPENED"
  | "ESCROW_RELEASED"
  | "ESCROW_REFUNDED"
  | "DISPUTE_OPENED"
  | "EVIDENCE_SUBMITTED"
  | "DISPUTE_RULED";

export interface ListingAuditEvent {
  eventId: string;
  listingId: number;
  type: ListingAuditEventType;
  actor: string;
  occurredAt: string;
  details?: Record<string, unknown>;
}
