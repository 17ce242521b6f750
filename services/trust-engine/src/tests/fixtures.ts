import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { SubmitListingInput } from "@p2p-trust/shared";
import { principalSetArbitrators } from "../engine/collaborators.js";
import { TrustEngine } from "../engine/trust-engine.js";
import { SqliteEngineStore } from "../storage/engine-store.js";

export const AUTHORITY = "ST2AUTHORITY";
export const SUBMITTER = "ST1SUBMITTER";
export const SELLER = "STSELLER";
export const BUYER = "STBUYER";
export const OTHER_BUYER = "STBUYER2";
export const ARBITRATOR = "STARBITER";
export const ITEM_HASH = "a".repeat(64);

export function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "trust-engine-"));
  return {
    dir,
    dbPath: join(dir, "engine.db"),
  };
}

export function createTestEngine(arbitrators: string[] = [ARBITRATOR]) {
  const temp = createTempDbPath();
  const store = new SqliteEngineStore(temp.dbPath);
  const engine = new TrustEngine({
    store,
    arbitrators: principalSetArbitrators(new Set(arbitrators)),
  });
  return {
    engine,
    store,
    cleanup() {
      store.close();
      rmSync(temp.dir, { recursive: true, force: true });
    },
  };
}

export function listingInput(overrides: Partial<SubmitListingInput> = {}): SubmitListingInput {
  return {
    id: 1,
    itemHash: ITEM_HASH,
    sellerId: SELLER,
    sellerReputation: 150,
    price: 1000,
    category: "general",
    location: "LocationX",
    currency: "STX",
    ...overrides,
  };
}
