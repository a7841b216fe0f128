import { Wallet, hexlify, id as keccakId } from 'ethers'
import axios from 'axios'
import { z } from 'zod'
import { Batch } from '@mixgate/dto'
import { RelayEndpoint } from '../config'

export interface ForwardResult {
  relay: string
  ok: boolean
  status?: number
  error?: string
  latencyMs: number
}

/** Delivers a sealed batch, in its forwarding order, to every configured destination. */
export interface Transport {
  forward(batch: Batch): Promise<ForwardResult[]>
}

export type RelayHttpResponse = { status: number; data: unknown }

/** The slice of an axios instance the transport uses; tests pass an in-process fake. */
export interface RelayHttpClient {
  post(url: string, body: unknown, config?: { headers?: Record<string, string> }): Promise<RelayHttpResponse>
}

export type RelayClientFactory = (relay: RelayEndpoint, timeoutMs: number) => RelayHttpClient

export const axiosClientFactory: RelayClientFactory = (relay, timeoutMs) => {
  const http = axios.create({ baseURL: relay.url.replace(/\/$/, ''), timeout: timeoutMs })
  return {
    async post(url, body, config) {
      const res = await http.post(url, body, config)
      return { status: res.status, data: res.data }
    },
  }
}

interface JsonRpcRequest {
  jsonrpc: '2.0'
  id: number
  method: 'eth_sendBundle'
  params: [{ txs: string[] }]
}

const JsonRpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.union([z.string(), z.object({ code: z.number().optional(), message: z.string().optional() })]).optional(),
})

export type RelayTransportOptions = {
  relays: RelayEndpoint[]
  timeoutMs?: number
  signingKey?: string
  clientFactory?: RelayClientFactory
  clock?: () => number
}

/**
 * RelayTransport
 *
 * Method: JSON-RPC `eth_sendBundle` with params `[{ txs }]`, txs being the batch payloads as 0x-hex
 * in forwarding order. Sent to all relays in parallel; the core never retries or load-balances.
 *
 * Auth (optional): Flashbots-style `X-Flashbots-Signature: <address>:<signMessage(id(body))>`.
 *
 * Only the ordered payloads leave the process. The nonce and the shuffle seed stay behind until
 * reveal.
 */
export class RelayTransport implements Transport {
  private readonly clients: Array<{ relay: RelayEndpoint; http: RelayHttpClient }>
  private readonly authWallet: Wallet | null
  private readonly clock: () => number
  private idCounter = 1

  constructor(opts: RelayTransportOptions) {
    const factory = opts.clientFactory ?? axiosClientFactory
    const timeoutMs = opts.timeoutMs ?? 10_000
    this.clients = opts.relays.map(relay => ({ relay, http: factory(relay, timeoutMs) }))
    this.authWallet = opts.signingKey ? new Wallet(opts.signingKey) : null
    this.clock = opts.clock ?? Date.now
  }

  get relayNames(): string[] {
    return this.clients.map(c => c.relay.name)
  }

  async forward(batch: Batch): Promise<ForwardResult[]> {
    const body: JsonRpcRequest = {
      jsonrpc: '2.0',
      id: this.idCounter++,
      method: 'eth_sendBundle',
      params: [{ txs: batch.envelopes.map(e => hexlify(e.payload)) }],
    }
    const headers = await this.buildHeaders(JSON.stringify(body))
    return Promise.all(this.clients.map(c => this.sendOne(c.relay, c.http, body, headers)))
  }

  private async buildHeaders(bodyString: string): Promise<Record<string, string>> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.authWallet) {
      const signature = await this.authWallet.signMessage(keccakId(bodyString))
      headers['X-Flashbots-Signature'] = `${this.authWallet.address}:${signature}`
    }
    return headers
  }

  // Never rejects: every failure becomes an ok=false result for that relay.
  private async sendOne(relay: RelayEndpoint, http: RelayHttpClient, body: JsonRpcRequest, headers: Record<string, string>): Promise<ForwardResult> {
    const started = this.clock()
    try {
      const res = await http.post('', body, { headers })
      const latencyMs = this.clock() - started
      if (res.status >= 400) {
        return { relay: relay.name, ok: false, status: res.status, error: `HTTP ${res.status}`, latencyMs }
      }
      const parsed = JsonRpcResponseSchema.safeParse(res.data)
      if (!parsed.success) {
        return { relay: relay.name, ok: false, status: res.status, error: 'malformed JSON-RPC response', latencyMs }
      }
      const err = parsed.data.error
      if (err !== undefined) {
        const message = typeof err === 'string' ? err : err.message ?? 'unknown relay error'
        return { relay: relay.name, ok: false, status: res.status, error: `relay error: ${message}`, latencyMs }
      }
      return { relay: relay.name, ok: true, status: res.status, latencyMs }
    } catch (e: unknown) {
      const latencyMs = this.clock() - started
      if (axios.isAxiosError(e)) {
        const status = e.response?.status
        const detail = JsonRpcResponseSchema.safeParse(e.response?.data)
        const rpcError = detail.success ? detail.data.error : undefined
        const message = rpcError === undefined ? e.message : typeof rpcError === 'string' ? rpcError : rpcError.message ?? e.message
        return { relay: relay.name, ok: false, ...(status !== undefined ? { status } : {}), error: message, latencyMs }
      }
      return { relay: relay.name, ok: false, error: e instanceof Error ? e.message : String(e), latencyMs }
    }
  }
}
