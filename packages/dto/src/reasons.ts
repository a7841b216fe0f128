import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, http_status: 400, message: 'Bad request' },
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },
  CLIENT_TOO_LARGE: { code: 'CLIENT_TOO_LARGE', category: ReasonCategory.CLIENT, http_status: 413, message: 'Request body exceeds the configured limit' },

  // ENVELOPE
  ENVELOPE_INVALID: { code: 'ENVELOPE_INVALID', category: ReasonCategory.ENVELOPE, http_status: 400, message: 'Transaction payload must be non-empty' },

  // LEDGER
  COMMITMENT_NOT_FOUND: { code: 'COMMITMENT_NOT_FOUND', category: ReasonCategory.LEDGER, http_status: 404, message: 'No commitment recorded for batch' },
  COMMITMENT_MISMATCH: { code: 'COMMITMENT_MISMATCH', category: ReasonCategory.LEDGER, http_status: 409, message: 'Revealed batch does not match its commitment' },
  COMMITMENT_DUPLICATE: { code: 'COMMITMENT_DUPLICATE', category: ReasonCategory.LEDGER, http_status: 409, message: 'Commitment already recorded for batch' },

  // REVEAL
  REVEAL_NOT_AVAILABLE: { code: 'REVEAL_NOT_AVAILABLE', category: ReasonCategory.REVEAL, http_status: 404, message: 'Batch has not been revealed' },

  // NETWORK
  RELAY_UNAVAILABLE: { code: 'RELAY_UNAVAILABLE', category: ReasonCategory.NETWORK, http_status: 502, message: 'Relay did not accept the batch' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}
