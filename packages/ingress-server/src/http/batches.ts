/**
 * Batch commit/reveal handlers
 *
 * GET  /batches/:id/commitment  recorded commitment, available from seal time
 * GET  /batches/:id/reveal      nonce, seed and ordered payloads, available once forwarded
 * POST /batches/verify          check claimed contents against the recorded commitment
 */
import { Request, Response } from 'express'
import { getBytes, hexlify } from 'ethers'
import { reason } from '@mixgate/reasons'
import { IngressService } from '../services/IngressService'
import { validateVerifyReveal } from '../validators/submitTxValidator'
import { sendError } from './errors'

export function getCommitment(service: IngressService) {
  return (req: Request, res: Response) => {
    const id = req.params.id
    const record = service.getCommitment(id)
    if (!record) return sendError(req, res, reason('COMMITMENT_NOT_FOUND', { context: { batch_id: id } }))
    return res.status(200).json({
      batch_id: record.batchId,
      commitment: record.commitment,
      recorded_at: new Date(record.recordedAt).toISOString(),
    })
  }
}

export function getReveal(service: IngressService) {
  return (req: Request, res: Response) => {
    const id = req.params.id
    const batch = service.getReveal(id)
    if (!batch) return sendError(req, res, reason('REVEAL_NOT_AVAILABLE', { context: { batch_id: id } }))
    return res.status(200).json({
      batch_id: batch.id,
      commitment: batch.commitment,
      nonce: batch.nonce,
      seed_policy: batch.seedPolicy,
      ...(batch.shuffleSeed !== undefined ? { shuffle_seed: batch.shuffleSeed } : {}),
      sealed_at: new Date(batch.sealedAt).toISOString(),
      trigger: batch.trigger,
      txs: batch.envelopes.map(e => hexlify(e.payload)),
    })
  }
}

export function postVerify(service: IngressService) {
  return (req: Request, res: Response) => {
    const parsed = validateVerifyReveal(req.body)
    if (!parsed.valid) {
      return sendError(req, res, reason('CLIENT_BAD_REQUEST', { message: parsed.error }))
    }
    const { batch_id, nonce, txs } = parsed.value
    const check = service.verifyClaimedReveal(batch_id, nonce, txs.map(tx => getBytes(tx)))
    if (check.ok) return res.status(200).json({ valid: true })
    return res.status(200).json({ valid: false, reason: check.reason })
  }
}
