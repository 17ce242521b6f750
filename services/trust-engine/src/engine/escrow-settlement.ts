import {
  type EngineResult,
  type EscrowRecord,
  type EscrowState,
  type OpenEscrowInput,
  fail,
  ok,
} from "@p2p-trust/shared";
import type { EngineStore } from "../storage/engine-store.js";
import { writeAuditEvent } from "./audit.js";
import { withChanges } from "./listing-registry.js";
import type { ReputationChange, ReputationLedger } from "./reputation-ledger.js";
import { nowIso } from "./values.js";

export type TerminalEscrowState = Exclude<EscrowState, "HELD">;

export interface SettlementResult {
  escrow: EscrowRecord;
  reputation: ReputationChange[];
}

/**
 * Per-listing escrow: no record, then HELD, then RELEASED or REFUNDED.
 * Terminal records are never reopened and close their listing.
 */
export class EscrowSettlement {
  constructor(
    private readonly store: EngineStore,
    private readonly reputation: ReputationLedger,
  ) {}

  openEscrow(caller: string, input: OpenEscrowInput): EngineResult<EscrowRecord> {
    return this.store.atomic(() => {
      if (caller !== input.buyerId) return fail("Unauthorized");
      const listing = this.store.getListing(input.listingId);
      if (!listing) return fail("ListingNotFound");
      if (listing.sellerId === input.buyerId) return fail("Unauthorized");
      if (listing.status !== "ACTIVE") return fail("InvalidState");
      if (this.store.getEscrow(listing.id)?.state === "HELD") return fail("InvalidState");
      if (input.amount !== listing.price || input.currency !== listing.currency) {
        return fail("EscrowMismatch");
      }

      const escrow: EscrowRecord = {
        listingId: listing.id,
        buyerId: input.buyerId,
        sellerId: listing.sellerId,
        amount: listing.price,
        currency: listing.currency,
        state: "HELD",
        openedAt: nowIso(),
      };
      this.store.putEscrow(escrow);
      writeAuditEvent(this.store, listing.id, "ESCROW_OPENED", caller, {
        amount: escrow.amount,
        currency: escrow.currency,
      });
      return ok(escrow);
    });
  }

  confirmReceipt(caller: string, listingId: number): EngineResult<SettlementResult> {
    return this.store.atomic(() => {
      const escrow = this.store.getEscrow(listingId);
      if (!escrow || escrow.state !== "HELD") return fail("NoOpenEscrow");
      if (escrow.buyerId !== caller) return fail("Unauthorized");
      // Funds stay held until an open dispute is ruled.
      if (this.store.findOpenDispute(listingId)) return fail("InvalidState");
      return ok(this.settle(escrow, "RELEASED", caller));
    });
  }

  getEscrow(listingId: number): EscrowRecord | null {
    return this.store.getEscrow(listingId);
  }

  /**
   * Moves a HELD record to its terminal state inside the caller's
   * transaction: pays the seller on release or the buyer on refund, closes
   * the listing and applies the reputation outcome.
   */
  settle(escrow: EscrowRecord, state: TerminalEscrowState, actor: string): SettlementResult {
    const settledAt = nowIso();
    const settled: EscrowRecord = {
      ...escrow,
      state,
      settledAt,
      payee: state === "RELEASED" ? escrow.sellerId : escrow.buyerId,
    };
    this.store.putEscrow(settled);

    const listing = this.store.getListing(escrow.listingId);
    if (listing) {
      this.store.putListing(withChanges(listing, { closedAt: settledAt }));
    }

    const reputation = this.reputation.applyOutcome(
      state === "RELEASED" ? "FULFILLED" : "FRAUD_SUSPECTED",
      { buyerId: escrow.buyerId, sellerId: escrow.sellerId },
    );
    writeAuditEvent(
      this.store,
      escrow.listingId,
      state === "RELEASED" ? "ESCROW_RELEASED" : "ESCROW_REFUNDED",
      actor,
      { payee: settled.payee, amount: settled.amount, currency: settled.currency },
    );
    return { escrow: settled, reputation };
  }
}
