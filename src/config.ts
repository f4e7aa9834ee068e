import "dotenv/config";
import { PublicKey } from "@solana/web3.js";
import { PUMP_PROGRAM_ID } from "./constants.js";

export type CommitmentLevel = "processed" | "confirmed" | "finalized";

const VALID_COMMITMENTS: readonly CommitmentLevel[] = ["processed", "confirmed", "finalized"];

const commitmentSetting = process.env.COMMITMENT || "processed";

function findCommitment(value: string): CommitmentLevel | undefined {
  return VALID_COMMITMENTS.find((candidate) => candidate === value);
}

export const config = {
  // Solana websocket endpoint (provider API keys ride along in the query string)
  wsUrl: process.env.WS_URL || "wss://api.mainnet-beta.solana.com",

  // Program whose logs are watched (pump.fun bonding curve by default)
  programId: process.env.PROGRAM_ID || PUMP_PROGRAM_ID,
  // Unknown levels are reported by validateConfig()
  commitment: findCommitment(commitmentSetting) ?? "processed",

  // Output
  csvFilePath: process.env.CSV_FILE_PATH || "token_logs.csv",

  // Metadata fetch
  metadataTimeoutMs: parseInt(process.env.METADATA_TIMEOUT_MS || "10000", 10),
  metadataMaxBytes: parseInt(process.env.METADATA_MAX_BYTES || "262144", 10), // 256KB

  // Reconnect policy: delay = min(cap, base^attempt + attempt % 2) seconds
  maxRetries: parseInt(process.env.MAX_RETRIES || "20", 10),
  backoffBase: parseInt(process.env.BACKOFF_BASE || "3", 10),
  backoffMaxDelaySeconds: parseInt(process.env.BACKOFF_MAX_DELAY_SECONDS || "30", 10),
  restartDelaySeconds: parseInt(process.env.RESTART_DELAY_SECONDS || "5", 10),

  // Websocket heartbeat
  wsPingIntervalMs: parseInt(process.env.WS_PING_INTERVAL_MS || "60000", 10),
  wsPingTimeoutMs: parseInt(process.env.WS_PING_TIMEOUT_MS || "30000", 10),

  // Logging
  logLevel: process.env.LOG_LEVEL || "info",
} as const;

const POSITIVE_SETTINGS = {
  METADATA_TIMEOUT_MS: config.metadataTimeoutMs,
  METADATA_MAX_BYTES: config.metadataMaxBytes,
  MAX_RETRIES: config.maxRetries,
  BACKOFF_MAX_DELAY_SECONDS: config.backoffMaxDelaySeconds,
  WS_PING_INTERVAL_MS: config.wsPingIntervalMs,
  WS_PING_TIMEOUT_MS: config.wsPingTimeoutMs,
};

export function validateConfig(): void {
  if (!findCommitment(commitmentSetting)) {
    throw new Error(`Invalid COMMITMENT '${commitmentSetting}'. Must be one of: ${VALID_COMMITMENTS.join(", ")}`);
  }

  if (!/^wss?:\/\//.test(config.wsUrl)) {
    throw new Error("WS_URL must start with ws:// or wss://");
  }

  try {
    new PublicKey(config.programId);
  } catch {
    throw new Error(`PROGRAM_ID '${config.programId}' is not a valid public key`);
  }

  for (const [name, value] of Object.entries(POSITIVE_SETTINGS)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`${name} must be a positive integer`);
    }
  }

  if (!Number.isInteger(config.backoffBase) || config.backoffBase < 2) {
    throw new Error("BACKOFF_BASE must be an integer of at least 2");
  }

  if (!Number.isInteger(config.restartDelaySeconds) || config.restartDelaySeconds < 0) {
    throw new Error("RESTART_DELAY_SECONDS must be zero or a positive integer");
  }

  if (!config.csvFilePath.trim()) {
    throw new Error("CSV_FILE_PATH must not be empty");
  }
}
