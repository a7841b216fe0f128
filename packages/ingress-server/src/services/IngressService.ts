import { Batch, CommitmentRecord, Envelope, SealTrigger } from '@mixgate/dto'
import { BatchAccumulator } from './BatchAccumulator'
import { CommitRevealLedger, RevealCheck } from './CommitRevealLedger'
import { AggregateMetrics, AggregatingMetricsSink } from './MetricsTracker'
import { ForwardResult, Transport } from './RelayTransport'
import { AuditSink } from '../utils/auditLog'
import { getLogger, logForward, logVerification } from '../utils/logger'

// Envelope payloads are shared with every other seal listener; the service verifies, forwards and
// reveals only bytes it owns.
function snapshot(batch: Batch): Batch {
  const envelopes = batch.envelopes.map(e => Object.freeze({ payload: Uint8Array.from(e.payload), arrivalSequence: e.arrivalSequence }))
  return Object.freeze({ ...batch, envelopes: Object.freeze(envelopes) })
}

export type IngressServiceDeps = {
  accumulator: BatchAccumulator
  ledger: CommitRevealLedger
  transport: Transport
  metrics: AggregatingMetricsSink
  audit: AuditSink
  /** forwarded batches kept for reveal; oldest are evicted first */
  revealRetention?: number
  clock?: () => number
}

/**
 * IngressService
 *
 * Sealed batch -> commitment recorded -> reveal verified against the ledger -> forwarded.
 * A batch whose reveal does not match its commitment is never forwarded; it is counted,
 * logged and reported to the audit sink instead.
 */
export class IngressService {
  private readonly accumulator: BatchAccumulator
  private readonly ledger: CommitRevealLedger
  private readonly transport: Transport
  private readonly metrics: AggregatingMetricsSink
  private readonly audit: AuditSink
  private readonly revealRetention: number
  private readonly clock: () => number

  private revealed: Map<string, Batch> = new Map()
  private inflight: Set<Promise<void>> = new Set()
  private timer: NodeJS.Timeout | null = null
  private unsubscribe: () => void

  constructor(deps: IngressServiceDeps) {
    this.accumulator = deps.accumulator
    this.ledger = deps.ledger
    this.transport = deps.transport
    this.metrics = deps.metrics
    this.audit = deps.audit
    this.revealRetention = deps.revealRetention ?? 1000
    this.clock = deps.clock ?? Date.now
    this.unsubscribe = this.accumulator.onSealed(batch => this.onSealed(batch))
  }

  get pendingCount(): number {
    return this.accumulator.pendingCount
  }

  get committedCount(): number {
    return this.ledger.size
  }

  get running(): boolean {
    return this.timer !== null
  }

  submitTransaction(payload: Uint8Array): Envelope {
    const envelope = this.accumulator.submit(payload)
    this.metrics.setPendingDepth(this.accumulator.pendingCount)
    return envelope
  }

  /** One poll of the time trigger. */
  processBatches(): Batch | null {
    const batch = this.accumulator.pollTimeTrigger()
    this.metrics.setPendingDepth(this.accumulator.pendingCount)
    return batch
  }

  start(pollIntervalMs: number): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      try {
        this.processBatches()
      } catch (e) {
        getLogger().error({ event: 'poll.failed', err: e instanceof Error ? e.message : String(e) })
      }
    }, pollIntervalMs)
    this.timer.unref()
  }

  /** Stops polling, seals whatever is pending and waits for every forward to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    this.accumulator.flush()
    await this.whenIdle()
  }

  /** Detaches from the accumulator; used when the service is discarded. */
  async close(): Promise<void> {
    await this.stop()
    this.unsubscribe()
  }

  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight])
    }
  }

  getCommitment(batchId: string): CommitmentRecord | null {
    return this.ledger.getCommitment(batchId)
  }

  /** Available only once the batch has been forwarded. Each call returns a fresh copy. */
  getReveal(batchId: string): Batch | null {
    const batch = this.revealed.get(batchId)
    return batch ? snapshot(batch) : null
  }

  /** Checks a third party's claimed contents for a batch against the recorded commitment. */
  verifyClaimedReveal(batchId: string, nonce: string, payloads: readonly Uint8Array[]): RevealCheck {
    const envelopes: Envelope[] = payloads.map((payload, arrivalSequence) => ({ payload, arrivalSequence }))
    const check = this.ledger.checkReveal({ id: batchId, envelopes, nonce })
    if (!check.ok) this.metrics.recordVerificationFailure(check.reason.code)
    logVerification({ batchId, ok: check.ok, reason_code: check.ok ? undefined : check.reason.code })
    return check
  }

  getAggregateMetrics(): AggregateMetrics {
    return this.metrics.getAggregateMetrics()
  }

  // Runs inside the accumulator's seal, before the batch leaves the process.
  private onSealed(sealed: Batch): void {
    const batch = snapshot(sealed)
    this.ledger.recordCommitment(batch.id, batch.commitment)
    this.metrics.observeBatchSize(batch.envelopes.length, batch.trigger)
    if (batch.trigger !== SealTrigger.SIZE && batch.envelopes.length < this.accumulator.minAnonymitySet) {
      this.metrics.recordSmallBatch()
    }
    this.track(this.audit.report({
      type: 'commitment.recorded',
      batch_id: batch.id,
      commitment: batch.commitment,
      size: batch.envelopes.length,
      trigger: batch.trigger,
    }))
    this.track(this.verifyAndForward(batch))
  }

  private async verifyAndForward(batch: Batch): Promise<void> {
    const check = this.ledger.checkReveal(batch)
    if (!check.ok) {
      this.metrics.recordVerificationFailure(check.reason.code)
      logVerification({ batchId: batch.id, ok: false, reason_code: check.reason.code })
      await this.audit.report({ type: 'reveal.rejected', batch_id: batch.id, reason_code: check.reason.code })
      return
    }
    logVerification({ batchId: batch.id, ok: true })
    await this.audit.report({ type: 'reveal.verified', batch_id: batch.id })

    const results = await this.transport.forward(batch)
    const latencyMs = Math.max(0, this.clock() - batch.sealedAt)
    this.recordForward(batch, results, latencyMs)
    await this.audit.report({
      type: 'batch.forwarded',
      batch_id: batch.id,
      size: batch.envelopes.length,
      relays: results.map(r => ({ relay: r.relay, ok: r.ok, status: r.status, error: r.error })),
    })
  }

  private recordForward(batch: Batch, results: ForwardResult[], latencyMs: number): void {
    for (const r of results) this.metrics.recordRelayOutcome(r.relay, r.ok)
    this.metrics.observeForwardLatency(latencyMs)
    logForward({
      batchId: batch.id,
      size: batch.envelopes.length,
      latency_ms: latencyMs,
      relays: results.map(r => ({ relay: r.relay, ok: r.ok, status: r.status, error: r.error })),
    })

    this.revealed.set(batch.id, batch)
    while (this.revealed.size > this.revealRetention) {
      const oldest = this.revealed.keys().next()
      if (oldest.done) break
      this.revealed.delete(oldest.value)
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((e: unknown) => {
        getLogger().error({ event: 'batch.dispatch_failed', reason_code: 'INTERNAL_ERROR', err: e instanceof Error ? e.message : String(e) })
      })
      .then(() => {
        this.inflight.delete(tracked)
      })
    this.inflight.add(tracked)
  }
}
