import { type EngineResult, type ReputationOutcome, fail, ok } from "@p2p-trust/shared";
import type { EngineStore } from "../storage/engine-store.js";
import { requireAuthority } from "./access-control.js";
import { isUint } from "./values.js";

export const FULFILLED_SELLER_BOOST = 10;
export const FULFILLED_BUYER_BOOST = 5;
export const FRAUD_SELLER_PENALTY = 25;

export interface SettlementParties {
  buyerId: string;
  sellerId: string;
}

export interface ReputationChange {
  principal: string;
  before: number | null;
  after: number;
}

export class ReputationLedger {
  constructor(private readonly store: EngineStore) {}

  getReputation(principal: string): number | null {
    return this.store.getReputation(principal);
  }

  /**
   * External seeding of a participant's score; authority only. A recorded
   * score changes only through settlement outcomes.
   */
  setReputation(caller: string, principal: string, score: number): EngineResult<number> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.store, caller);
      if (denied) return fail(denied);
      if (!isUint(score)) return fail("InvalidReputation");
      if (this.store.getReputation(principal) !== null) return fail("InvalidState");
      this.store.putReputation(principal, score);
      return ok(score);
    });
  }

  /**
   * Runs inside the caller's transaction. Participants without a record
   * start from zero.
   */
  applyOutcome(outcome: ReputationOutcome, parties: SettlementParties): ReputationChange[] {
    if (outcome === "FULFILLED") {
      return [
        this.adjust(parties.sellerId, FULFILLED_SELLER_BOOST),
        this.adjust(parties.buyerId, FULFILLED_BUYER_BOOST),
      ];
    }
    return [this.adjust(parties.sellerId, -FRAUD_SELLER_PENALTY)];
  }

  private adjust(principal: string, delta: number): ReputationChange {
    const before = this.store.getReputation(principal);
    const after = Math.max(0, (before ?? 0) + delta);
    this.store.putReputation(principal, after);
    return { principal, before, after };
  }
}
