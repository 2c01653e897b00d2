export {
  TicketExchangeClient,
  TicketExchangeError,
  TicketExchangeResponseSchema,
  TICKET_EXCHANGE_PATH,
} from './ticket-client.js'
export type {
  TicketExchanger,
  TicketExchangeRequest,
  TicketExchangeResponse,
} from './ticket-client.js'

export { ApiErrorSchema, parseApiError, collectFieldErrors } from './api-error.js'
export type { ApiError, FieldError } from './api-error.js'
