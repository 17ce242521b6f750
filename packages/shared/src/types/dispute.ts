export type DisputeState = "OPEN" | "RULED";
export type DisputeRuling = "RELEASE" | "REFUND";

export interface Dispute {
  disputeId: string;
  listingId: number;
  escrowListingId: number;
  openedBy: string;
  evidenceRefs: string[];
  state: DisputeState;
  ruling?: DisputeRuling;
  ruledBy?: string;
  openedAt: string;
  ruledAt?: string;
}
