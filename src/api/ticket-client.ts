/**
 * Thin HTTP wrapper for the remote-auth ticket exchange.
 *
 * One unauthenticated POST turns the single-use ticket from `pending_login`
 * into a token encrypted against the session's public key. Never retries:
 * the ticket is consumed server-side on the first call.
 */

import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { collectFieldErrors, parseApiError, type ApiError, type FieldError } from './api-error.js'

/** Path of the ticket exchange endpoint relative to the API base URL */
export const TICKET_EXCHANGE_PATH = '/users/@me/remote-auth/login'

export interface TicketExchangeRequest {
  ticket: string
}

export const TicketExchangeResponseSchema = Type.Object({
  /** Standard base64 of the OAEP-encrypted token */
  encrypted_token: Type.String({ minLength: 1 }),
})
export type TicketExchangeResponse = Static<typeof TicketExchangeResponseSchema>

/** Typed error thrown when the ticket exchange fails for any reason. */
export class TicketExchangeError extends Error {
  /** HTTP status, or 0 when no response was received */
  readonly statusCode: number
  readonly apiError: ApiError | null
  readonly fieldErrors: FieldError[]

  constructor(message: string, statusCode: number, apiError: ApiError | null = null, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TicketExchangeError'
    this.statusCode = statusCode
    this.apiError = apiError
    this.fieldErrors = apiError ? collectFieldErrors(apiError.errors) : []
  }
}

/** Anything that can exchange a ticket; the session depends on this, not the HTTP client. */
export interface TicketExchanger {
  exchange(ticket: string, signal?: AbortSignal): Promise<TicketExchangeResponse>
}

export class TicketExchangeClient implements TicketExchanger {
  constructor(
    private readonly apiBaseUrl: string,
    private readonly origin?: string,
  ) {}

  /**
   * Exchange a ticket for an encrypted token.
   * POST /users/@me/remote-auth/login
   */
  async exchange(ticket: string, signal?: AbortSignal): Promise<TicketExchangeResponse> {
    const body: TicketExchangeRequest = { ticket }

    let res: Response
    try {
      res = await fetch(`${this.apiBaseUrl}${TICKET_EXCHANGE_PATH}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.origin ? { Origin: this.origin } : {}),
        },
        body: JSON.stringify(body),
        signal,
      })
    } catch (err) {
      throw new TicketExchangeError('ticket exchange request failed', 0, null, { cause: err })
    }

    const payload = await readJson(res)

    if (!res.ok) {
      const apiError = parseApiError(payload)
      const detail = apiError ? `${apiError.code} ${apiError.message}` : String(res.status)
      throw new TicketExchangeError(`ticket exchange failed: ${detail}`, res.status, apiError)
    }

    if (!Value.Check(TicketExchangeResponseSchema, payload)) {
      throw new TicketExchangeError('ticket exchange returned an unexpected body', res.status)
    }
    return payload
  }
}

async function readJson(res: Response): Promise<unknown> {
  let text: string
  try {
    text = await res.text()
  } catch (err) {
    throw new TicketExchangeError('ticket exchange response could not be read', res.status, null, { cause: err })
  }
  if (text.length === 0) return null
  try {
    return JSON.parse(text) as unknown
  } catch {
    return null
  }
}
