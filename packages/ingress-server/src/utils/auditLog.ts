import { promises as fs } from 'fs'
import path from 'path'
import { getLogger } from './logger'

export type RelayOutcome = { relay: string; ok: boolean; status?: number; error?: string }

export type AuditEvent =
  | { type: 'commitment.recorded'; batch_id: string; commitment: string; size: number; trigger: string }
  | { type: 'reveal.verified'; batch_id: string }
  | { type: 'reveal.rejected'; batch_id: string; reason_code: string }
  | { type: 'batch.forwarded'; batch_id: string; size: number; relays: RelayOutcome[] }

export interface AuditSink {
  report(event: AuditEvent): Promise<void>
}

/**
 * JsonlAuditSink
 * Appends one JSON line per audit event. Payload bytes never reach this file; events carry
 * only ids, commitments, sizes and outcomes.
 */
export class JsonlAuditSink implements AuditSink {
  private readonly file: string
  private dirReady: Promise<unknown> | null = null

  constructor(file: string) {
    this.file = path.resolve(file)
  }

  async report(event: AuditEvent): Promise<void> {
    const entry = { ts: new Date().toISOString(), ...event }
    try {
      if (!this.dirReady) this.dirReady = fs.mkdir(path.dirname(this.file), { recursive: true })
      await this.dirReady
      await fs.appendFile(this.file, JSON.stringify(entry) + '\n')
    } catch (e) {
      this.dirReady = null
      getLogger().error({ event: 'audit.write_failed', file: this.file, audit_type: event.type, err: e instanceof Error ? e.message : String(e) })
    }
  }
}

/** Keeps events in memory; used by tests and by callers that only want the logger. */
export class MemoryAuditSink implements AuditSink {
  public readonly events: AuditEvent[] = []

  async report(event: AuditEvent): Promise<void> {
    this.events.push(event)
  }
}
