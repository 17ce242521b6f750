import { type EngineResult, type PolicyConfig, fail, ok } from "@p2p-trust/shared";
import type { EngineStore } from "../storage/engine-store.js";
import { requireAuthority } from "./access-control.js";
import { isUint } from "./values.js";

type NumericPolicyKey = "fraudThreshold" | "minReputation" | "maxRiskScore";

/**
 * Administrator identity plus the mutable numeric policy. The authority moves
 * from unset to set exactly once; policy writes are visible to the next read.
 */
export class AuthorityConfig {
  constructor(private readonly store: EngineStore) {}

  getAuthority(): string | null {
    return this.store.getAuthority();
  }

  getPolicy(): PolicyConfig {
    return this.store.getPolicy();
  }

  isBlacklisted(sellerId: string): boolean {
    return this.store.isBlacklisted(sellerId);
  }

  setAuthority(principal: string): EngineResult<string> {
    return this.store.atomic(() => {
      if (this.store.getAuthority() !== null) return fail("AlreadySet");
      this.store.setAuthority(principal);
      return ok(principal);
    });
  }

  setFraudThreshold(caller: string, value: number): EngineResult<number> {
    return this.setNumeric(caller, "fraudThreshold", value);
  }

  setMinReputation(caller: string, value: number): EngineResult<number> {
    return this.setNumeric(caller, "minReputation", value);
  }

  setMaxRiskScore(caller: string, value: number): EngineResult<number> {
    return this.setNumeric(caller, "maxRiskScore", value);
  }

  toggleAnomalyDetection(caller: string): EngineResult<boolean> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.store, caller);
      if (denied) return fail(denied);
      const policy = this.store.getPolicy();
      const anomalyDetectionEnabled = !policy.anomalyDetectionEnabled;
      this.store.putPolicy({ ...policy, anomalyDetectionEnabled });
      return ok(anomalyDetectionEnabled);
    });
  }

  blacklistSeller(caller: string, sellerId: string): EngineResult<boolean> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.store, caller);
      if (denied) return fail(denied);
      this.store.addToBlacklist(sellerId);
      return ok(true);
    });
  }

  // Listings already admitted stay active; only future submissions are affected.
  unblacklistSeller(caller: string, sellerId: string): EngineResult<boolean> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.store, caller);
      if (denied) return fail(denied);
      this.store.removeFromBlacklist(sellerId);
      return ok(false);
    });
  }

  private setNumeric(caller: string, key: NumericPolicyKey, value: number): EngineResult<number> {
    return this.store.atomic(() => {
      const denied = requireAuthority(this.store, caller);
      if (denied) return fail(denied);
      if (!isUint(value)) return fail("InvalidPolicyValue");
      const policy: PolicyConfig = { ...this.store.getPolicy() };
      policy[key] = value;
      this.store.putPolicy(policy);
      return ok(value);
    });
  }
}
