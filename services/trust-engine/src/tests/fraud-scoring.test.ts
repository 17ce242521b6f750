import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_POLICY } from "@p2p-trust/shared";
import { assessListingRisk, score } from "../engine/fraud-scoring.js";

test("scores price, missing reputation and category surcharge", () => {
  assert.equal(score(10000, 50, "high-risk"), 170);
  assert.equal(score(1000, 150, "general"), 10);
  assert.equal(score(99, 100, "general"), 0);
  assert.equal(score(250, 90, "high-risk"), 32);
});

test("clamps the reputation term at zero above the ceiling", () => {
  assert.equal(score(500, 101, "general"), 5);
  assert.equal(score(500, 1_000_000, "general"), 5);
});

test("is deterministic for equal inputs", () => {
  const first = score(4321, 37, "electronics");
  const second = score(4321, 37, "electronics");
  assert.equal(first, second);
  assert.equal(first, 43 + 63);
});

test("assesses risk only when anomaly detection is enabled", () => {
  const input = { price: 10000, reputation: 50, category: "high-risk" };
  assert.deepEqual(assessListingRisk(input, DEFAULT_POLICY), {
    scored: true,
    riskScore: 170,
    exceeds: true,
  });
  assert.deepEqual(
    assessListingRisk(input, { ...DEFAULT_POLICY, anomalyDetectionEnabled: false }),
    { scored: false },
  );
  assert.deepEqual(assessListingRisk(input, { ...DEFAULT_POLICY, maxRiskScore: 170 }), {
    scored: true,
    riskScore: 170,
    exceeds: false,
  });
});
