import type { PolicyConfig } from "@p2p-trust/shared";

export const HIGH_RISK_CATEGORY = "high-risk";
export const HIGH_RISK_SURCHARGE = 20;
export const REPUTATION_CEILING = 100;

/**
 * floor(price / 100) + max(0, 100 - reputation) + 20 for "high-risk".
 * Reputation above the ceiling contributes nothing rather than going negative.
 */
export function score(price: number, reputation: number, category: string): number {
  const priceTerm = Math.floor(price / 100);
  const reputationTerm = Math.max(0, REPUTATION_CEILING - reputation);
  const categoryTerm = category === HIGH_RISK_CATEGORY ? HIGH_RISK_SURCHARGE : 0;
  return priceTerm + reputationTerm + categoryTerm;
}

export interface RiskInput {
  price: number;
  reputation: number;
  category: string;
}

export type RiskAssessment =
  | { scored: false }
  | { scored: true; riskScore: number; exceeds: boolean };

export function assessListingRisk(input: RiskInput, policy: PolicyConfig): RiskAssessment {
  if (!policy.anomalyDetectionEnabled) return { scored: false };
  const riskScore = score(input.price, input.reputation, input.category);
  return { scored: true, riskScore, exceeds: riskScore > policy.maxRiskScore };
}
