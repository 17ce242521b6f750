import type { EngineStore } from "../storage/engine-store.js";
import { AuthorityConfig } from "./authority.js";
import type { ArbitratorEligibility } from "./collaborators.js";
import { DisputeArbitration } from "./dispute-arbitration.js";
import { EscrowSettlement } from "./escrow-settlement.js";
import { ListingRegistry } from "./listing-registry.js";
import { ReputationLedger } from "./reputation-ledger.js";

export interface TrustEngineOptions {
  store: EngineStore;
  arbitrators: ArbitratorEligibility;
}

/** Wires the components around one store and one configuration handle. */
export class TrustEngine {
  readonly config: AuthorityConfig;
  readonly reputation: ReputationLedger;
  readonly listings: ListingRegistry;
  readonly escrow: EscrowSettlement;
  readonly disputes: DisputeArbitration;

  constructor(options: TrustEngineOptions) {
    this.config = new AuthorityConfig(options.store);
    this.reputation = new ReputationLedger(options.store);
    this.listings = new ListingRegistry(options.store, this.config);
    this.escrow = new EscrowSettlement(options.store, this.reputation);
    this.disputes = new DisputeArbitration(options.store, this.escrow, options.arbitrators);
  }
}
