import { Request, Response, NextFunction } from 'express'
import { ErrorEnvelope, ReasonDetail } from '@mixgate/dto'
import { IngressRejection, reason } from '@mixgate/reasons'
import { ulid } from 'ulid'
import { getLogger } from '../utils/logger'

export function sendError(req: Request, res: Response, detail: ReasonDetail) {
  const envelope: ErrorEnvelope = { corr_id: req.corr_id ?? `corr_${ulid()}`, reason: detail, ts: new Date().toISOString() }
  return res.status(detail.http_status).json(envelope)
}

type BodyParserFailure = { status: number; type: string; limit?: number }

// body-parser rejects with an http-errors object: a 4xx `status` and a `type` such as entity.too.large
function bodyParserFailure(err: unknown): BodyParserFailure | null {
  if (typeof err !== 'object' || err === null) return null
  if (!('status' in err) || typeof err.status !== 'number' || err.status < 400 || err.status >= 500) return null
  return {
    status: err.status,
    type: 'type' in err && typeof err.type === 'string' ? err.type : '',
    ...('limit' in err && typeof err.limit === 'number' ? { limit: err.limit } : {}),
  }
}

/** Routes nothing else matched. */
export function notFound(req: Request, res: Response) {
  return sendError(req, res, reason('CLIENT_NOT_FOUND', { context: { method: req.method, path: req.path } }))
}

/** Last in the chain: rejections keep their own status, body-parser failures are client errors, anything else is a 500. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof IngressRejection) return sendError(req, res, err.reason)
  const parserFailure = bodyParserFailure(err)
  if (parserFailure) {
    if (parserFailure.type === 'entity.too.large') {
      const { limit } = parserFailure
      return sendError(req, res, reason('CLIENT_TOO_LARGE', limit === undefined ? undefined : { context: { limit_bytes: limit } }))
    }
    if (parserFailure.type === 'entity.parse.failed') return sendError(req, res, reason('CLIENT_BAD_REQUEST', { message: 'Malformed JSON body' }))
    return sendError(req, res, reason('CLIENT_BAD_REQUEST', { context: { status: parserFailure.status, type: parserFailure.type } }))
  }
  const log = req.log ?? getLogger()
  log.error({ event: 'http.unhandled', reason_code: 'INTERNAL_ERROR', path: req.path, err: err instanceof Error ? err.message : String(err) })
  return sendError(req, res, reason('INTERNAL_ERROR'))
}
