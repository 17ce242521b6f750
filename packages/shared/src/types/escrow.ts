import type { Currency } from "./listing.js";

export type EscrowState = "HELD" | "RELEASED" | "REFUNDED";

export interface EscrowRecord {
  listingId: number;
  buyerId: string;
  sellerId: string;
  amount: number;
  currency: Currency;
  state: EscrowState;
  openedAt: string;
  settledAt?: string;
  payee?: string;           // seller on release, buyer on refund
}

export interface OpenEscrowInput {
  listingId: number;
  buyerId: string;
  amount: number;
  currency: string;
}

export type ReputationOutcome = "FULFILLED" | "FRAUD_SUSPECTED";
