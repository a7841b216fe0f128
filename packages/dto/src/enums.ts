export enum ReasonCategory {
  CLIENT = "CLIENT",
  ENVELOPE = "ENVELOPE",
  LEDGER = "LEDGER",
  REVEAL = "REVEAL",
  NETWORK = "NETWORK",
  INTERNAL = "INTERNAL",
}

export enum SealTrigger {
  SIZE = "size",
  TIME = "time",
  FLUSH = "flush",
}

export enum SeedPolicy {
  /** seed = sha256(batch id). Reproducible by anyone who has seen the id. */
  BATCH_ID = "batch-id",
  /** independent random seed, disclosed with the nonce at reveal time */
  SECRET = "secret",
}

export type ReasonCode =
  | "CLIENT_BAD_REQUEST"
  | "CLIENT_NOT_FOUND"
  | "CLIENT_TOO_LARGE"
  | "ENVELOPE_INVALID"
  | "COMMITMENT_NOT_FOUND"
  | "COMMITMENT_MISMATCH"
  | "COMMITMENT_DUPLICATE"
  | "REVEAL_NOT_AVAILABLE"
  | "RELAY_UNAVAILABLE"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: Record<string, string | number | boolean>;
}

export interface ErrorEnvelope {
  corr_id: string;
  reason: ReasonDetail;
  ts: string; // RFC3339 UTC
}
