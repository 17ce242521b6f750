import { isPrincipalAllowed, type PrincipalSet } from "@p2p-trust/shared";

/** Answers whether a principal is a registered identity. DID proofs are checked elsewhere. */
export interface IdentityProvider {
  isRegistered(principal: string): boolean;
}

/** Answers whether a principal may rule disputes. */
export interface ArbitratorEligibility {
  isEligible(principal: string): boolean;
}

export function principalSetIdentityProvider(registered: PrincipalSet): IdentityProvider {
  return {
    isRegistered: (principal) => isPrincipalAllowed(principal, registered),
  };
}

export function principalSetArbitrators(arbitrators: PrincipalSet): ArbitratorEligibility {
  return {
    isEligible: (principal) => isPrincipalAllowed(principal, arbitrators),
  };
}
