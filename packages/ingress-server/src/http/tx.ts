/**
 * POST /tx handler
 *
 * Accepts one opaque transaction payload and hands it to the accumulator. The response never
 * says which batch the payload will land in; it only acknowledges intake.
 */
import { Request, Response } from 'express'
import { getBytes } from 'ethers'
import { reason } from '@mixgate/reasons'
import { IngressService } from '../services/IngressService'
import { validateSubmitTx } from '../validators/submitTxValidator'
import { sendError } from './errors'

export function postTx(service: IngressService) {
  return (req: Request, res: Response) => {
    const parsed = validateSubmitTx(req.body)
    if (!parsed.valid) {
      return sendError(req, res, reason('CLIENT_BAD_REQUEST', { message: parsed.error }))
    }
    // InvalidEnvelopeError propagates to errorHandler as a 400
    const envelope = service.submitTransaction(getBytes(parsed.value.tx))
    return res.status(202).json({ status: 'accepted', arrival_sequence: envelope.arrivalSequence, pending: service.pendingCount })
  }
}

export default postTx
