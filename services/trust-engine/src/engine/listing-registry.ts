import {
  type Currency,
  type EngineResult,
  type FlaggedListing,
  type Listing,
  type ListingAuditEvent,
  type ListingStatus,
  type PolicyConfig,
  type SubmitListingInput,
  fail,
  ok,
} from "@p2p-trust/shared";
import type { EngineStore, ListListingsFilter } from "../storage/engine-store.js";
import { requireAuthority, requireSeller } from "./access-control.js";
import { writeAuditEvent } from "./audit.js";
import type { AuthorityConfig } from "./authority.js";
import { assessListingRisk } from "./fraud-scoring.js";
import { isCurrency, isPositiveUint, isUint, nowIso } from "./values.js";

export const ITEM_HASH_LENGTH = 64;
export const MAX_CATEGORY_LENGTH = 50;
export const MAX_LOCATION_LENGTH = 100;

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

type StatusFlags = Pick<Listing, "flaggedBy" | "pausedBySeller" | "closedAt">;

/** Collapses the flag and pause markers into the externally observed status. */
export function deriveStatus(listing: StatusFlags): ListingStatus {
  if (listing.closedAt) return "CLOSED";
  if (listing.flaggedBy !== "NONE" || listing.pausedBySeller) return "PAUSED";
  return "ACTIVE";
}

export function withChanges(listing: Listing, changes: Partial<Listing>): Listing {
  const next: Listing = { ...listing, ...changes, updatedAt: nowIso() };
  return { ...next, status: deriveStatus(next) };
}

// Counts code points, so a character outside the BMP is one character.
function hasLengthBetween(value: string, min: number, max: number): boolean {
  const length = [...value].length;
  return length >= min && length <= max;
}

interface AdmissionTerms {
  currency: Currency;
  reputation: number;
}

/**
 * First failing check wins; the order is part of the contract. The seller's
 * reputation is the declared value capped by the ledger record, when one
 * exists, so settlement penalties bind later submissions.
 */
function validateSubmission(
  store: EngineStore,
  policy: PolicyConfig,
  caller: string,
  input: SubmitListingInput,
): EngineResult<AdmissionTerms> {
  if (!isPositiveUint(input.id)) return fail("InvalidListingId");
  if (input.itemHash.length !== ITEM_HASH_LENGTH || !PRINTABLE_ASCII.test(input.itemHash)) {
    return fail("InvalidItemHash");
  }
  if (input.sellerId === caller) return fail("InvalidSellerDid");
  if (!isUint(input.sellerReputation)) return fail("InsufficientReputation");
  const recorded = store.getReputation(input.sellerId);
  const reputation =
    recorded === null ? input.sellerReputation : Math.min(input.sellerReputation, recorded);
  if (reputation < policy.minReputation) return fail("InsufficientReputation");
  if (!isPositiveUint(input.price)) return fail("InvalidPrice");
  if (!hasLengthBetween(input.category, 1, MAX_CATEGORY_LENGTH)) return fail("InvalidCategory");
  if (!hasLengthBetween(input.location, 1, MAX_LOCATION_LENGTH)) return fail("InvalidLocation");
  if (!isCurrency(input.currency)) return fail("InvalidCurrency");
  if (store.getListingIdByHash(input.itemHash) !== null) return fail("DuplicateHash");
  if (store.isBlacklisted(input.sellerId)) return fail("BlacklistedSeller");
  if (store.getListing(input.id) !== null) return fail("InvalidListingId");
  return ok({ currency: input.currency, reputation });
}

export class ListingRegistry {
  constructor(
    private readonly store: EngineStore,
    private readonly config: AuthorityConfig,
  ) {}

  submitListing(caller: string, input: SubmitListingInput): EngineResult<Listing> {
    return this.store.atomic(() => {
      const policy = this.config.getPolicy();
      const validated = validateSubmission(this.store, policy, caller, input);
      if (!validated.ok) return fail(validated.error);

      const risk = assessListingRisk(
        { price: input.price, reputation: validated.value.reputation, category: input.category },
        policy,
      );
      if (risk.scored && risk.exceeds) return fail("AnomalyDetected");

      const now = nowIso();
      const listing: Listing = {
        id: input.id,
        itemHash: input.itemHash,
        sellerId: input.sellerId,
        price: input.price,
        category: input.category,
        location: input.location,
        currency: validated.value.currency,
        status: "ACTIVE",
        flaggedBy: "NONE",
        pausedBySeller: false,
        riskScore: risk.scored ? risk.riskScore : undefined,
        createdAt: now,
        updatedAt: now,
      };
      this.store.putListing(listing);
      this.store.appendHistory(listing.itemHash, listing.id);
      writeAuditEvent(this.store, listing.id, "SUBMITTED", caller, {
        sellerId: listing.sellerId,
        price: listing.price,
        currency: listing.currency,
        riskScore: listing.riskScore,
      });
      return ok(listing);
    });
  }

  flagListing(
    caller: string,
    listingId: number,
    reason: string,
    riskScore: number,
  ): EngineResult<FlaggedListing> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.config, caller);
      if (denied) return fail(denied);
      const listing = this.store.getListing(listingId);
      if (!listing) return fail("ListingNotFound");
      if (!isUint(riskScore) || riskScore > this.config.getPolicy().maxRiskScore) {
        return fail("InvalidRiskScore");
      }
      if (listing.closedAt) return fail("InvalidState");

      const flagged: FlaggedListing = { listingId, reason, timestamp: nowIso(), riskScore };
      this.store.putFlag(flagged);
      this.store.putListing(withChanges(listing, { flaggedBy: "AUTHORITY" }));
      writeAuditEvent(this.store, listingId, "FLAGGED", caller, { reason, riskScore });
      return ok(flagged);
    });
  }

  // Clears the seller pause as well, so an unflagged listing is always ACTIVE.
  unflagListing(caller: string, listingId: number): EngineResult<Listing> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.config, caller);
      if (denied) return fail(denied);
      const listing = this.store.getListing(listingId);
      if (!listing) return fail("ListingNotFound");
      if (!this.store.getFlag(listingId)) return fail("InvalidState");

      const updated = withChanges(listing, { flaggedBy: "NONE", pausedBySeller: false });
      this.store.deleteFlag(listingId);
      this.store.putListing(updated);
      writeAuditEvent(this.store, listingId, "UNFLAGGED", caller);
      return ok(updated);
    });
  }

  /** Mutates the price in place. The stored risk score is not recomputed. */
  updateListingPrice(caller: string, listingId: number, newPrice: number): EngineResult<Listing> {
    return this.store.atomic(() => {
      const listing = this.store.getListing(listingId);
      if (!listing) return fail("ListingNotFound");
      const denied = requireSeller(listing, caller);
      if (denied) return fail(denied);
      if (!isPositiveUint(newPrice)) return fail("InvalidPrice");
      if (listing.closedAt || this.store.getEscrow(listingId)?.state === "HELD") {
        return fail("InvalidState");
      }

      const updated = withChanges(listing, { price: newPrice });
      this.store.putListing(updated);
      writeAuditEvent(this.store, listingId, "PRICE_UPDATED", caller, {
        fromPrice: listing.price,
        toPrice: newPrice,
      });
      return ok(updated);
    });
  }

  pauseListing(caller: string, listingId: number): EngineResult<Listing> {
    return this.store.atomic(() => {
      const listing = this.store.getListing(listingId);
      if (!listing) return fail("ListingNotFound");
      const denied = requireSeller(listing, caller);
      if (denied) return fail(denied);
      if (listing.status !== "ACTIVE") return fail("InvalidState");

      const updated = withChanges(listing, { pausedBySeller: true });
      this.store.putListing(updated);
      writeAuditEvent(this.store, listingId, "PAUSED", caller);
      return ok(updated);
    });
  }

  resumeListing(caller: string, listingId: number): EngineResult<Listing> {
    return this.store.atomic(() => {
      const listing = this.store.getListing(listingId);
      if (!listing) return fail("ListingNotFound");
      const denied = requireSeller(listing, caller);
      if (denied) return fail(denied);
      if (listing.status !== "PAUSED") return fail("InvalidState");
      if (listing.flaggedBy !== "NONE" || this.store.getFlag(listingId)) return fail("InvalidState");

      const updated = withChanges(listing, { pausedBySeller: false });
      this.store.putListing(updated);
      writeAuditEvent(this.store, listingId, "RESUMED", caller);
      return ok(updated);
    });
  }

  getListing(listingId: number): Listing | null {
    return this.store.getListing(listingId);
  }

  getFlaggedListing(listingId: number): FlaggedListing | null {
    return this.store.getFlag(listingId);
  }

  getRiskScore(listingId: number): number | null {
    return this.store.getListing(listingId)?.riskScore ?? null;
  }

  getListingIdByHash(itemHash: string): number | null {
    return this.store.getListingIdByHash(itemHash);
  }

  listListings(filter: ListListingsFilter = {}): Listing[] {
    return this.store.listListings(filter);
  }

  getAuditEvents(listingId: number): ListingAuditEvent[] {
    return this.store.getAuditEvents(listingId);
  }
}
