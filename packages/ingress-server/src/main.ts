/*
 * Application entry point for the mixgate ingress server
 *
 * Responsibilities:
 *  1. Parse configuration and build the collaborators (accumulator, ledger, transport, metrics, audit)
 *  2. Start the HTTP API server (Express app)
 *  3. Start the periodic time-trigger poller
 *  4. Provide graceful shutdown on SIGINT/SIGTERM: flush pending, await in-flight forwards
 */

import http from 'http'
import pino from 'pino'
import { SeedPolicy } from '@mixgate/dto'
import { CONSTANTS, getEnv } from './config'
import { createApp } from './http'
import { BatchAccumulator } from './services/BatchAccumulator'
import { CommitRevealLedger } from './services/CommitRevealLedger'
import { IngressService } from './services/IngressService'
import { MetricsTracker } from './services/MetricsTracker'
import { RelayTransport } from './services/RelayTransport'
import { JsonlAuditSink } from './utils/auditLog'
import { getLogger, setLogger } from './utils/logger'

let server: http.Server | null = null
let service: IngressService | null = null
let shuttingDown = false

async function start(): Promise<void> {
  const cfg = getEnv()
  setLogger(pino({ level: cfg.logLevel }))
  const log = getLogger()
  log.info({ event: 'startup', app: CONSTANTS.APP_NAME, relays: cfg.relays.map(r => r.name), max_batch_size: cfg.maxBatchSize, batch_time_window_ms: cfg.batchTimeWindowMs, seed_policy: cfg.seedPolicy })

  if (cfg.seedPolicy === SeedPolicy.BATCH_ID) {
    log.warn({ event: 'seed_policy.predictable', seed_policy: cfg.seedPolicy, hint: 'forwarding order is derivable from the public batch id; set SEED_POLICY=secret' })
  }

  const metrics = new MetricsTracker({ collectDefaults: true })
  service = new IngressService({
    accumulator: new BatchAccumulator({
      maxBatchSize: cfg.maxBatchSize,
      batchTimeWindowMs: cfg.batchTimeWindowMs,
      seedPolicy: cfg.seedPolicy,
      minAnonymitySet: cfg.minAnonymitySet,
    }),
    ledger: new CommitRevealLedger(),
    transport: new RelayTransport({ relays: cfg.relays, timeoutMs: cfg.relayTimeoutMs, signingKey: cfg.relaySigningKey }),
    metrics,
    audit: new JsonlAuditSink(cfg.auditLogPath),
    revealRetention: cfg.revealRetention,
  })

  const app = createApp(service, metrics, { maxBodyBytes: cfg.maxBodyBytes })
  await new Promise<void>(resolve => {
    server = app.listen(cfg.port, () => {
      log.info({ event: 'http.listening', port: cfg.port })
      resolve()
    })
  })

  service.start(cfg.pollIntervalMs)

  process.once('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

async function shutdown(signal: string) {
  if (shuttingDown) return
  shuttingDown = true
  const log = getLogger()
  log.info({ event: 'shutdown', signal })

  const srv = server
  if (srv) {
    await new Promise<void>(resolve => {
      srv.close(err => {
        if (err) log.error({ event: 'http.close_failed', err: err.message })
        resolve()
      })
    })
  }

  // seal what is left and let the forwards finish
  await service?.close()
  log.info({ event: 'shutdown.complete', aggregate: service?.getAggregateMetrics() })
  process.exit(0)
}

if (require.main === module) {
  start().catch(err => {
    getLogger().fatal({ event: 'startup.failed', err: err instanceof Error ? err.message : String(err) })
    process.exit(1)
  })
}

export { start, shutdown }
