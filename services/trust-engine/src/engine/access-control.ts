import type { EngineErrorKind, EscrowRecord, Listing } from "@p2p-trust/shared";

export interface AuthoritySource {
  getAuthority(): string | null;
}

/** The single capability check behind every privileged operation. */
export function requireAuthority(source: AuthoritySource, caller: string): EngineErrorKind | null {
  const authority = source.getAuthority();
  if (authority === null || authority !== caller) return "Unauthorized";
  return null;
}

export function requireSeller(listing: Listing, caller: string): EngineErrorKind | null {
  return listing.sellerId === caller ? null : "Unauthorized";
}

export function isEscrowParty(escrow: EscrowRecord, principal: string): boolean {
  return escrow.buyerId === principal || escrow.sellerId === principal;
}

export function requireEscrowParty(escrow: EscrowRecord, caller: string): EngineErrorKind | null {
  return isEscrowParty(escrow, caller) ? null : "Unauthorized";
}
