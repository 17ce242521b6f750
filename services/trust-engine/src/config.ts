import { DEFAULT_POLICY, type PolicyConfig } from "@p2p-trust/shared";

export const DEFAULT_PORT = 4110;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_DB_PATH = "data/trust-engine.db";

export interface EngineConfig {
  port: number;
  host: string;
  dbPath: string;
  serviceAuthToken?: string;
  registeredPrincipals?: string;
  arbitrators?: string;
  logLevel: string;
  initialPolicy: PolicyConfig;
}

type Env = Record<string, string | undefined>;

function parseUintEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  const normalized = (raw || "").trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return fallback;
}

/** Initial policy only seeds an empty store; later changes go through the authority. */
export function readInitialPolicy(env: Env = process.env): PolicyConfig {
  return {
    fraudThreshold: parseUintEnv(env.POLICY_FRAUD_THRESHOLD, DEFAULT_POLICY.fraudThreshold),
    minReputation: parseUintEnv(env.POLICY_MIN_REPUTATION, DEFAULT_POLICY.minReputation),
    maxRiskScore: parseUintEnv(env.POLICY_MAX_RISK_SCORE, DEFAULT_POLICY.maxRiskScore),
    anomalyDetectionEnabled: parseBooleanEnv(
      env.POLICY_ANOMALY_DETECTION,
      DEFAULT_POLICY.anomalyDetectionEnabled,
    ),
  };
}

export function readConfig(env: Env = process.env): EngineConfig {
  const port = parseUintEnv(env.PORT, DEFAULT_PORT);
  return {
    port: port > 0 ? port : DEFAULT_PORT,
    host: env.HOST || DEFAULT_HOST,
    dbPath: env.TRUST_ENGINE_DB_PATH || DEFAULT_DB_PATH,
    serviceAuthToken: env.SERVICE_AUTH_TOKEN,
    registeredPrincipals: env.REGISTERED_PRINCIPALS,
    arbitrators: env.ARBITRATORS,
    logLevel: env.LOG_LEVEL || "info",
    initialPolicy: readInitialPolicy(env),
  };
}
