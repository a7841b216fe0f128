/* Request body schemas for the ingress HTTP API.
   Payloads travel as 0x-prefixed hex with whole bytes; "0x" parses and is rejected later as an empty envelope. */

import { z } from 'zod'

export const HexBytes = z.string().regex(/^0x(?:[0-9a-fA-F]{2})*$/, 'must be 0x-prefixed hex with whole bytes')

export const SubmitTxSchema = z.object({
  tx: HexBytes,
})

export const VerifyRevealSchema = z.object({
  batch_id: z.string().min(1),
  nonce: HexBytes,
  txs: z.array(HexBytes),
})

export type SubmitTx = z.infer<typeof SubmitTxSchema>
export type VerifyReveal = z.infer<typeof VerifyRevealSchema>

export type Validation<T> = { valid: true; value: T } | { valid: false; error: string }

function validate<T>(schema: z.ZodType<T>, body: unknown): Validation<T> {
  const res = schema.safeParse(body)
  if (!res.success) return { valid: false, error: res.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ') }
  return { valid: true, value: res.data }
}

export function validateSubmitTx(body: unknown): Validation<SubmitTx> {
  return validate(SubmitTxSchema, body)
}

export function validateVerifyReveal(body: unknown): Validation<VerifyReveal> {
  return validate(VerifyRevealSchema, body)
}
