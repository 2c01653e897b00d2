/**
 * Gateway transport: a JSON-framed, bidirectional socket owned by exactly one
 * connection attempt.
 *
 * WsTransport implements it on the `ws` library. Inbound text frames are
 * decoded into typed ServerMessages and queued until the session asks for
 * them; binary frames and undecodable text are queued as ProtocolViolations
 * so the session sees them in order.
 */

import WebSocket from 'ws'
import { ConnectError, ProtocolViolation } from './errors.js'
import {
  decodeServerMessage,
  encodeClientMessage,
  type ClientMessage,
  type ServerMessage,
} from './messages.js'

export interface Transport {
  /** Send one opcode. Throws ProtocolViolation('CONNECTION_CLOSED') if the socket is gone. */
  send(message: ClientMessage): void
  /** Next inbound opcode, or `null` once the connection is closed. */
  recv(): Promise<ServerMessage | null>
  /** Close the socket. Safe to call more than once. */
  close(): void
}

/** Opens a new Transport for each connection attempt */
export type TransportFactory = (signal?: AbortSignal) => Promise<Transport>

export interface WsTransportOptions {
  /** Sent as the Origin header on the upgrade request */
  origin?: string
  connectTimeoutMs: number
  signal?: AbortSignal
}

type Inbound = ServerMessage | ProtocolViolation

interface Waiter {
  resolve: (message: ServerMessage | null) => void
  reject: (err: ProtocolViolation) => void
}

export class WsTransport implements Transport {
  private readonly inbox: Inbound[] = []
  private waiter: Waiter | null = null
  private closed = false
  private lastError: Error | null = null

  private constructor(private readonly ws: WebSocket) {
    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.enqueue(new ProtocolViolation('INVALID_MESSAGE', 'Binary frames are not supported'))
        return
      }
      try {
        this.enqueue(decodeServerMessage(data.toString()))
      } catch (err) {
        this.enqueue(
          err instanceof ProtocolViolation
            ? err
            : new ProtocolViolation('INVALID_MESSAGE', 'Undecodable gateway frame', { cause: err }),
        )
      }
    })

    ws.on('error', (err: Error) => {
      this.lastError = err
    })

    ws.on('close', () => {
      this.closed = true
      this.flush()
    })
  }

  /**
   * Open a WebSocket to the gateway and resolve once the upgrade completes.
   *
   * @throws ConnectError on socket error, handshake timeout or abort
   */
  static connect(url: string, options: WsTransportOptions): Promise<WsTransport> {
    const { origin, connectTimeoutMs, signal } = options

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectError('Connect aborted'))
        return
      }

      let ws: WebSocket
      try {
        ws = new WebSocket(url, { origin, handshakeTimeout: connectTimeoutMs })
      } catch (err) {
        reject(new ConnectError(`Invalid gateway URL: ${url}`, { cause: err }))
        return
      }
      // Listeners are attached before open so an early `hello` is not lost.
      const transport = new WsTransport(ws)

      const onAbort = (): void => {
        ws.terminate()
        reject(new ConnectError('Connect aborted'))
      }
      const settle = (): void => {
        ws.off('open', onOpen)
        ws.off('error', onError)
        signal?.removeEventListener('abort', onAbort)
      }
      const onOpen = (): void => {
        settle()
        resolve(transport)
      }
      const onError = (err: Error): void => {
        settle()
        reject(new ConnectError(`Could not connect to ${url}: ${err.message}`, { cause: err }))
      }

      ws.once('open', onOpen)
      ws.once('error', onError)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  /** The last socket error observed, if any. */
  get error(): Error | null {
    return this.lastError
  }

  send(message: ClientMessage): void {
    if (this.closed || this.ws.readyState !== WebSocket.OPEN) {
      throw new ProtocolViolation('CONNECTION_CLOSED', `Cannot send ${message.op}: connection closed`)
    }
    this.ws.send(encodeClientMessage(message))
  }

  recv(): Promise<ServerMessage | null> {
    if (this.waiter) {
      return Promise.reject(new Error('recv() is already pending on this transport'))
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject }
      this.flush()
    })
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000)
    }
    this.closed = true
    this.flush()
  }

  private enqueue(item: Inbound): void {
    this.inbox.push(item)
    this.flush()
  }

  private flush(): void {
    const waiter = this.waiter
    if (!waiter) return

    const next = this.inbox.shift()
    if (next !== undefined) {
      this.waiter = null
      if (next instanceof ProtocolViolation) {
        waiter.reject(next)
      } else {
        waiter.resolve(next)
      }
      return
    }

    if (this.closed) {
      this.waiter = null
      waiter.resolve(null)
    }
  }
}
