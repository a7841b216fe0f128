import pino from 'pino'
import { Batch, ReasonCode, SealTrigger } from '@mixgate/dto'

type SealPayload = {
  batch: Batch
  pendingAfter?: number
  minAnonymitySet?: number
}

type VerificationPayload = {
  batchId: string
  ok: boolean
  reason_code?: string
}

type ForwardPayload = {
  batchId: string
  size: number
  latency_ms: number
  relays: Array<{ relay: string; ok: boolean; status?: number; error?: string }>
}

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

// Payload bytes, nonces and shuffle seeds are never logged: they would undo the batching.
export function logSeal(payload: SealPayload): void {
  const { batch } = payload
  const base = {
    event: 'batch.sealed',
    batch_id: batch.id,
    size: batch.envelopes.length,
    trigger: batch.trigger,
    seed_policy: batch.seedPolicy,
    commitment: batch.commitment,
    sealed_at: new Date(batch.sealedAt).toISOString(),
    pending_after: payload.pendingAfter,
  }
  logger.info(base)

  const threshold = payload.minAnonymitySet
  if (threshold !== undefined && batch.trigger !== SealTrigger.SIZE && batch.envelopes.length < threshold) {
    logger.warn({
      event: 'batch.small_anonymity_set',
      batch_id: batch.id,
      size: batch.envelopes.length,
      min_anonymity_set: threshold,
      trigger: batch.trigger,
    })
  }
}

export function logVerification(payload: VerificationPayload): void {
  const base = {
    event: payload.ok ? 'reveal.verified' : 'reveal.rejected',
    batch_id: payload.batchId,
    reason_code: payload.reason_code,
  }
  if (payload.ok) logger.info(base)
  else logger.warn(base)
}

export function logForward(payload: ForwardPayload): void {
  const failed = payload.relays.filter(r => !r.ok).length
  const base = {
    event: 'batch.forwarded',
    batch_id: payload.batchId,
    size: payload.size,
    latency_ms: payload.latency_ms,
    relays: payload.relays,
  }
  if (failed > 0) {
    const reason_code: ReasonCode = 'RELAY_UNAVAILABLE'
    logger.warn({ ...base, reason_code, failed_relays: failed })
  } else {
    logger.info(base)
  }
}

export function logHttp(payload: HttpPayload): void {
  logger.info({
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms,
  })
}
