/**
 * IngressRejection
 * Wraps a ReasonDetail so every layer (accumulator, ledger, HTTP) fails with the same shape.
 * All subclasses are local, synchronous and recoverable by the caller.
 */
import { ReasonDetail } from '@mixgate/dto'
import { reason } from './factory'

export class IngressRejection extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail) {
    super(detail.message)
    this.name = 'IngressRejection'
    this.reason = detail
  }
}

/** Empty or malformed payload at submission. The caller must resubmit corrected input. */
export class InvalidEnvelopeError extends IngressRejection {
  constructor(context?: ReasonDetail['context']) {
    super(reason('ENVELOPE_INVALID', { context }))
    this.name = 'InvalidEnvelopeError'
  }
}

/** Reveal checked for a batch id that was never committed: disclosure before commitment upstream. */
export class CommitmentNotFoundError extends IngressRejection {
  public readonly batchId: string

  constructor(batchId: string) {
    super(reason('COMMITMENT_NOT_FOUND', { context: { batch_id: batchId } }))
    this.name = 'CommitmentNotFoundError'
    this.batchId = batchId
  }
}

/** Recomputed commitment differs from the recorded one. The batch must not be forwarded. */
export class CommitmentMismatchError extends IngressRejection {
  public readonly batchId: string

  constructor(batchId: string) {
    super(reason('COMMITMENT_MISMATCH', { context: { batch_id: batchId } }))
    this.name = 'CommitmentMismatchError'
    this.batchId = batchId
  }
}
