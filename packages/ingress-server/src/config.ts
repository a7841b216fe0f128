// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env.ingress
import * as dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { SeedPolicy } from '@mixgate/dto'

// Package root is one level above src/ (and above dist/ once built)
const packageRoot = path.resolve(__dirname, '..')

const candidateEnvPaths = [
  path.join(packageRoot, '.env.ingress'),
  path.join(process.cwd(), '.env.ingress')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const DEFAULT_RELAY_URLS = [
  'https://relay.flashbots.net',
  'https://builder-relay.ethereum.com',
  'https://relay.ultrasound.money'
]

const positiveInt = (def: number) => z.coerce.number().int().positive().default(def)

const ConfigSchema = z.object({
  PORT: positiveInt(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_BATCH_SIZE: positiveInt(10),
  BATCH_TIME_WINDOW_MS: positiveInt(10_000),
  POLL_INTERVAL_MS: positiveInt(1_000),
  MIN_ANONYMITY_SET: z.coerce.number().int().positive().optional(),
  SEED_POLICY: z.nativeEnum(SeedPolicy).default(SeedPolicy.BATCH_ID),
  RELAY_URLS: z.string().optional(),
  RELAY_TIMEOUT_MS: positiveInt(10_000),
  RELAY_SIGNING_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, 'must be a 32-byte hex private key').optional(),
  AUDIT_LOG_PATH: z.string().min(1).default(path.join('logs', 'audit.jsonl')),
  REVEAL_RETENTION: positiveInt(1_000),
  MAX_BODY_BYTES: z.coerce.number().int().positive().optional(),
})

export type RelayEndpoint = { name: string; url: string }

export type IngressConfig = {
  port: number
  logLevel: string
  maxBatchSize: number
  batchTimeWindowMs: number
  pollIntervalMs: number
  minAnonymitySet: number
  seedPolicy: SeedPolicy
  relays: RelayEndpoint[]
  relayTimeoutMs: number
  relaySigningKey?: string
  auditLogPath: string
  revealRetention: number
  maxBodyBytes: number
}

function relayName(url: string): string {
  try {
    return new URL(url).host
  } catch {
    return url
  }
}

export function parseRelayUrls(raw: string | undefined): RelayEndpoint[] {
  const urls = raw === undefined ? DEFAULT_RELAY_URLS : raw.split(',').map(u => u.trim()).filter(Boolean)
  return urls.map(url => ({ name: relayName(url), url }))
}

/**
 * Parse and validate ingress configuration. Empty strings are treated as unset so that
 * `FOO=` in an env file falls back to the default. Throws on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngressConfig {
  const cleaned: Record<string, string> = {}
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v !== '') cleaned[k] = v
  }
  const res = ConfigSchema.safeParse(cleaned)
  if (!res.success) {
    throw new Error(`invalid ingress configuration: ${res.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
  }
  const c = res.data
  const relaySigningKey = c.RELAY_SIGNING_KEY === undefined
    ? undefined
    : (c.RELAY_SIGNING_KEY.startsWith('0x') ? c.RELAY_SIGNING_KEY : '0x' + c.RELAY_SIGNING_KEY)
  return {
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    maxBatchSize: c.MAX_BATCH_SIZE,
    batchTimeWindowMs: c.BATCH_TIME_WINDOW_MS,
    pollIntervalMs: c.POLL_INTERVAL_MS,
    minAnonymitySet: c.MIN_ANONYMITY_SET ?? c.MAX_BATCH_SIZE,
    seedPolicy: c.SEED_POLICY,
    relays: parseRelayUrls(c.RELAY_URLS),
    relayTimeoutMs: c.RELAY_TIMEOUT_MS,
    relaySigningKey,
    auditLogPath: c.AUDIT_LOG_PATH,
    revealRetention: c.REVEAL_RETENTION,
    maxBodyBytes: c.MAX_BODY_BYTES ?? CONSTANTS.MAX_BODY_BYTES,
  }
}

export const CONSTANTS = {
  APP_NAME: 'mixgate ingress',
  NONCE_BYTES: 32,
  SEED_BYTES: 32,
  /** a 128 KiB transaction is 256 KiB as hex; verify bodies carry several */
  MAX_BODY_BYTES: 1024 * 1024,
}

let cached: IngressConfig | null = null

/** The configuration of the running process, parsed on first use. */
export function getEnv(): IngressConfig {
  if (!cached) cached = loadConfig()
  return cached
}
