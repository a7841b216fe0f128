import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client'
import { SealTrigger } from '@mixgate/dto'

/** Fire-and-forget observations emitted by the ingress core. */
export interface MetricsSink {
  observeBatchSize(size: number, trigger: SealTrigger): void
  observeForwardLatency(ms: number): void
  setPendingDepth(n: number): void
  recordRelayOutcome(relay: string, ok: boolean): void
  recordVerificationFailure(reasonCode: string): void
  recordSmallBatch(): void
}

export interface AggregateMetrics {
  avgBatchSize: number
  avgLatencyMs: number
  batches: number
}

export interface AggregatingMetricsSink extends MetricsSink {
  getAggregateMetrics(): AggregateMetrics
}

export type MetricsTrackerOptions = {
  registry?: Registry
  collectDefaults?: boolean
}

export class MetricsTracker implements AggregatingMetricsSink {
  public readonly registry: Registry

  private batchCount = 0
  private envelopeCount = 0
  private latencyCount = 0
  private latencyTotalMs = 0

  public batchSize: Histogram<string>
  public forwardLatency: Histogram<string>
  public pendingEnvelopes: Gauge<string>
  public relayForwards: Counter<string>
  public verificationFailures: Counter<string>
  public smallBatches: Counter<string>

  constructor(opts: MetricsTrackerOptions = {}) {
    this.registry = opts.registry ?? new Registry()
    const registers = [this.registry]
    if (opts.collectDefaults) collectDefaultMetrics({ register: this.registry })

    // 1) Anonymity set per sealed batch
    this.batchSize = new Histogram({
      name: 'mixgate_batch_size',
      help: 'Envelopes per sealed batch',
      labelNames: ['trigger'],
      buckets: [1, 2, 3, 5, 10, 20, 50, 100],
      registers,
    })

    // 2) Seal-to-forwarded latency
    this.forwardLatency = new Histogram({
      name: 'mixgate_forward_latency_ms',
      help: 'Time from seal to all relays answering (ms)',
      buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
      registers,
    })

    this.pendingEnvelopes = new Gauge({ name: 'mixgate_pending_envelopes', help: 'Envelopes waiting for the next seal', registers })

    // 3) Outcomes
    this.relayForwards = new Counter({ name: 'mixgate_relay_forwards_total', help: 'Batch forwards by relay and outcome', labelNames: ['relay', 'outcome'], registers })
    this.verificationFailures = new Counter({ name: 'mixgate_verification_failures_total', help: 'Reveal verification failures by reason code', labelNames: ['reason_code'], registers })
    this.smallBatches = new Counter({ name: 'mixgate_small_batches_total', help: 'Batches sealed below the minimum anonymity set', registers })
  }

  observeBatchSize(size: number, trigger: SealTrigger) {
    if (size < 0) return
    this.batchCount += 1
    this.envelopeCount += size
    this.batchSize.labels(trigger).observe(size)
  }

  observeForwardLatency(ms: number) {
    if (!(ms >= 0) || !Number.isFinite(ms)) return
    this.latencyCount += 1
    this.latencyTotalMs += ms
    this.forwardLatency.observe(ms)
  }

  setPendingDepth(n: number) { this.pendingEnvelopes.set(n) }
  recordRelayOutcome(relay: string, ok: boolean) { this.relayForwards.inc({ relay, outcome: ok ? 'ok' : 'error' }) }
  recordVerificationFailure(reasonCode: string) { this.verificationFailures.inc({ reason_code: reasonCode }) }
  recordSmallBatch() { this.smallBatches.inc() }

  getAggregateMetrics(): AggregateMetrics {
    return {
      avgBatchSize: this.batchCount ? this.envelopeCount / this.batchCount : 0,
      avgLatencyMs: this.latencyCount ? this.latencyTotalMs / this.latencyCount : 0,
      batches: this.batchCount,
    }
  }

  getPromMetrics(): Promise<string> { return this.registry.metrics() }

  get contentType(): string { return this.registry.contentType }
}
