/**
 * Reasons Registry
 * Centralizes all machine-parsable failure codes for the ingress layer.
 * Codes are stable once published; relays and auditors key on them.
 */
import { REASONS as DTO_REASONS, ReasonCode, ReasonDetail } from '@mixgate/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
