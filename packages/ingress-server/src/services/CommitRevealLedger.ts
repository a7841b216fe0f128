/* The CommitRevealLedger is an in-memory store of batch commitments keyed by batch id.

   A commitment is recorded once, before the batch contents are disclosed, and later used to check
   that what is revealed (the batch envelopes plus its nonce) is what was committed to. */

import { Batch, CommitmentRecord, ReasonDetail } from '@mixgate/dto'
import { CommitmentMismatchError, CommitmentNotFoundError, reason } from '@mixgate/reasons'
import { CommitmentScheme, commitmentScheme } from './CommitmentScheme'
import { getLogger } from '../utils/logger'

export type RevealCheck = { ok: true } | { ok: false; reason: ReasonDetail }

export type RevealCandidate = Pick<Batch, 'id' | 'envelopes' | 'nonce'>

export class CommitRevealLedger {
  private byId: Map<string, CommitmentRecord> = new Map()

  constructor(
    private readonly scheme: CommitmentScheme = commitmentScheme,
    private readonly clock: () => number = Date.now,
  ) {}

  get size(): number {
    return this.byId.size
  }

  /** First write wins. Returns false (and keeps the original) when the id is already recorded. */
  recordCommitment(batchId: string, commitment: string): boolean {
    const existing = this.byId.get(batchId)
    if (existing) {
      getLogger().warn({
        event: 'commitment.duplicate',
        batch_id: batchId,
        reason_code: 'COMMITMENT_DUPLICATE',
        same_value: existing.commitment === commitment,
      })
      return false
    }
    this.byId.set(batchId, { batchId, commitment, recordedAt: this.clock() })
    return true
  }

  getCommitment(batchId: string): CommitmentRecord | null {
    return this.byId.get(batchId) ?? null
  }

  /** False both for a mismatch and for an id with no recorded commitment. */
  verifyReveal(batch: RevealCandidate): boolean {
    return this.checkReveal(batch).ok
  }

  checkReveal(batch: RevealCandidate): RevealCheck {
    const record = this.byId.get(batch.id)
    if (!record) {
      return { ok: false, reason: reason('COMMITMENT_NOT_FOUND', { context: { batch_id: batch.id } }) }
    }
    if (!this.scheme.verify(batch.envelopes, batch.nonce, record.commitment)) {
      return { ok: false, reason: reason('COMMITMENT_MISMATCH', { context: { batch_id: batch.id } }) }
    }
    return { ok: true }
  }

  assertReveal(batch: RevealCandidate): void {
    const record = this.byId.get(batch.id)
    if (!record) throw new CommitmentNotFoundError(batch.id)
    if (!this.scheme.verify(batch.envelopes, batch.nonce, record.commitment)) {
      throw new CommitmentMismatchError(batch.id)
    }
  }
}
