export interface PolicyConfig {
  fraudThreshold: number;
  minReputation: number;
  maxRiskScore: number;
  anomalyDetectionEnabled: boolean;
}

export const DEFAULT_POLICY: PolicyConfig = {
  fraudThreshold: 50,
  minReputation: 100,
  maxRiskScore: 80,
  anomalyDetectionEnabled: true,
};
