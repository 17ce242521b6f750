import {
  type Dispute,
  type DisputeRuling,
  type DisputeState,
  type EngineResult,
  fail,
  ok,
} from "@p2p-trust/shared";
import type { EngineStore } from "../storage/engine-store.js";
import { isEscrowParty, requireEscrowParty } from "./access-control.js";
import { writeAuditEvent } from "./audit.js";
import type { ArbitratorEligibility } from "./collaborators.js";
import type { EscrowSettlement, SettlementResult } from "./escrow-settlement.js";
import { nowIso, prefixedIdNow } from "./values.js";

export const MAX_EVIDENCE_REF_LENGTH = 256;

const EVIDENCE_REF_PATTERN = /^\S+$/;

// Refs are content hashes held by the off-chain store; only their shape is checked.
export function isEvidenceRef(value: string): boolean {
  return value.length <= MAX_EVIDENCE_REF_LENGTH && EVIDENCE_REF_PATTERN.test(value);
}

export interface RulingResult extends SettlementResult {
  dispute: Dispute;
}

export class DisputeArbitration {
  constructor(
    private readonly store: EngineStore,
    private readonly escrow: EscrowSettlement,
    private readonly arbitrators: ArbitratorEligibility,
  ) {}

  openDispute(caller: string, listingId: number, evidenceRefs: string[]): EngineResult<Dispute> {
    return this.store.atomic(() => {
      const escrow = this.store.getEscrow(listingId);
      if (!escrow || escrow.state !== "HELD") return fail("NoOpenEscrow");
      const denied = requireEscrowParty(escrow, caller);
      if (denied) return fail(denied);
      if (!evidenceRefs.every(isEvidenceRef)) return fail("InvalidEvidence");
      if (this.store.findOpenDispute(escrow.listingId)) return fail("DuplicateDispute");

      const dispute: Dispute = {
        disputeId: prefixedIdNow("DSP"),
        listingId,
        escrowListingId: escrow.listingId,
        openedBy: caller,
        evidenceRefs: [...evidenceRefs],
        state: "OPEN",
        openedAt: nowIso(),
      };
      this.store.putDispute(dispute);
      writeAuditEvent(this.store, listingId, "DISPUTE_OPENED", caller, {
        disputeId: dispute.disputeId,
        evidenceCount: dispute.evidenceRefs.length,
      });
      return ok(dispute);
    });
  }

  submitEvidence(caller: string, disputeId: string, evidenceRef: string): EngineResult<Dispute> {
    return this.store.atomic(() => {
      const dispute = this.store.getDispute(disputeId);
      if (!dispute) return fail("DisputeNotFound");
      const escrow = this.store.getEscrow(dispute.escrowListingId);
      if (!escrow || !isEscrowParty(escrow, caller)) return fail("Unauthorized");
      if (dispute.state !== "OPEN") return fail("AlreadyRuled");
      if (!isEvidenceRef(evidenceRef)) return fail("InvalidEvidence");

      const updated: Dispute = {
        ...dispute,
        evidenceRefs: [...dispute.evidenceRefs, evidenceRef],
      };
      this.store.putDispute(updated);
      writeAuditEvent(this.store, dispute.listingId, "EVIDENCE_SUBMITTED", caller, {
        disputeId,
        evidenceRef,
      });
      return ok(updated);
    });
  }

  /** Irreversible. The ruling settles the held escrow in the same transaction. */
  ruleDispute(caller: string, disputeId: string, ruling: DisputeRuling): EngineResult<RulingResult> {
    return this.store.atomic(() => {
      if (!this.arbitrators.isEligible(caller)) return fail("Unauthorized");
      const dispute = this.store.getDispute(disputeId);
      if (!dispute) return fail("DisputeNotFound");
      if (dispute.state !== "OPEN") return fail("AlreadyRuled");
      const escrow = this.store.getEscrow(dispute.escrowListingId);
      if (!escrow || escrow.state !== "HELD") return fail("NoOpenEscrow");
      if (isEscrowParty(escrow, caller)) return fail("Unauthorized");

      const ruled: Dispute = {
        ...dispute,
        state: "RULED",
        ruling,
        ruledBy: caller,
        ruledAt: nowIso(),
      };
      this.store.putDispute(ruled);
      writeAuditEvent(this.store, dispute.listingId, "DISPUTE_RULED", caller, {
        disputeId,
        ruling,
      });
      const settlement = this.escrow.settle(
        escrow,
        ruling === "RELEASE" ? "RELEASED" : "REFUNDED",
        caller,
      );
      return ok({ dispute: ruled, ...settlement });
    });
  }

  getDispute(disputeId: string): Dispute | null {
    return this.store.getDispute(disputeId);
  }

  listDisputes(state?: DisputeState): Dispute[] {
    return this.store.listDisputes(state);
  }
}
