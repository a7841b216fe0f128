/**
 * corr middleware
 *
 * Enforces a stable correlation id for every request. If the incoming
 * request provides `x-corr-id` that value is used; otherwise a ULID-based
 * correlation id is generated. The id is attached as `req.corr_id`, echoed
 * back in the `x-corr-id` response header, and a request-scoped child logger
 * is attached as `req.log`.
 */
import { Request, Response, NextFunction } from 'express'
import type pino from 'pino'
import { ulid } from 'ulid'
import { getLogger } from '../../utils/logger'

declare global {
  namespace Express {
    interface Request {
      corr_id?: string
      log?: pino.Logger
    }
  }
}

export default function corr(req: Request, res: Response, next: NextFunction) {
  const header = req.header('x-corr-id') ?? ''
  const corr = header.length ? header : `corr_${ulid()}`
  req.corr_id = corr
  req.log = getLogger().child({ corr_id: corr })
  res.setHeader('x-corr-id', corr)
  next()
}
