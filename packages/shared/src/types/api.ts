import type { Dispute, DisputeRuling, DisputeState } from "./dispute.js";
import type { EngineErrorKind } from "./errors.js";
import type { EscrowRecord } from "./escrow.js";
import type { FlaggedListing, Listing, ListingAuditEvent, ListingStatus } from "./listing.js";
import type { PolicyConfig } from "./policy.js";

export interface ErrorResponse {
  error: EngineErrorKind | string;
  message?: string;
}

export interface SetAuthorityRequest {
  principal: string;
}

export interface AuthorityResponse {
  authority: string | null;
}

export interface PolicyResponse {
  policy: PolicyConfig;
}

export interface SetPolicyValueRequest {
  value: number;
}

export interface PolicyValueResponse {
  value: number;
}

export interface ToggleAnomalyDetectionResponse {
  anomalyDetectionEnabled: boolean;
}

export interface BlacklistResponse {
  sellerId: string;
  blacklisted: boolean;
}

export interface SetReputationRequest {
  score: number;
}

export interface ReputationResponse {
  principal: string;
  score: number | null;
}

export interface SubmitListingRequest {
  id: number;
  itemHash: string;
  sellerId: string;
  sellerReputation: number;
  price: number;
  category: string;
  location: string;
  currency: string;
}

export interface ListingResponse {
  listing: Listing;
}

export interface ListListingsQuery {
  status?: ListingStatus;
}

export interface ListListingsResponse {
  listings: Listing[];
}

export interface ListingRiskResponse {
  listingId: number;
  riskScore: number | null;
}

export interface ListingByHashResponse {
  itemHash: string;
  listingId: number;
}

export interface GetListingAuditResponse {
  listingId: number;
  events: ListingAuditEvent[];
}

export interface FlagListingRequest {
  reason: string;
  riskScore: number;
}

export interface FlaggedListingResponse {
  flagged: FlaggedListing;
}

export interface UpdateListingPriceRequest {
  price: number;
}

export interface OpenEscrowRequest {
  listingId: number;
  buyerId: string;
  amount: number;
  currency: string;
}

export interface ConfirmReceiptRequest {
  listingId: number;
}

export interface EscrowResponse {
  escrow: EscrowRecord;
}

export interface OpenDisputeRequest {
  listingId: number;
  evidenceRefs: string[];
}

export interface SubmitEvidenceRequest {
  evidenceRef: string;
}

export interface RuleDisputeRequest {
  ruling: DisputeRuling;
}

export interface DisputeResponse {
  dispute: Dispute;
}

export interface RuleDisputeResponse {
  dispute: Dispute;
  escrow: EscrowRecord;
}

export interface ListDisputesQuery {
  state?: DisputeState;
}

export interface ListDisputesResponse {
  disputes: Dispute[];
}
