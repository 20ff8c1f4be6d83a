/**
 * Mebo Session
 *
 * The only path by which commands reach the robot. One HTTP round trip per
 * command, issued strictly one after another.
 */

import type { ResolvedCommand } from './commands'
import { ResponseParser, type DeviceResponse } from './protocol-adapters'
import {
  DeviceError,
  MeboError,
  ProtocolError,
  TransportError,
  type DeviceAddress,
  type Logger,
  type MeboErrorContext,
  type SessionConfig,
  type SessionEventHandler,
  type SessionEvents,
} from './types'

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000

type HandlerSets = { [K in keyof SessionEvents]: Set<SessionEventHandler<K>> }

export class Session {
  readonly address: Readonly<DeviceAddress>
  readonly requestTimeoutMs: number
  private logger: Logger
  private parser = new ResponseParser()
  // Tail of the send chain; each send waits for the previous one to settle.
  private tail: Promise<unknown> = Promise.resolve()
  private eventHandlers: HandlerSets = { request: new Set(), response: new Set(), error: new Set() }

  constructor(config: SessionConfig) {
    this.address = Object.freeze({ host: config.address.host, port: config.address.port })
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.logger = config.logger ?? console
  }

  /** Base URL of the control API */
  get endpoint(): string {
    const { host, port } = this.address
    return port === 80 ? `http://${host}` : `http://${host}:${port}`
  }

  /** Full request URL for a resolved command */
  urlFor(command: ResolvedCommand): string {
    const url = new URL(command.path, this.endpoint)
    for (const [name, value] of Object.entries(command.query)) {
      url.searchParams.append(name, value)
    }
    return url.toString()
  }

  /**
   * Send a resolved command and return the parsed reply.
   *
   * Not retried: motion commands are not idempotent.
   */
  send(command: ResolvedCommand): Promise<DeviceResponse> {
    const result = this.tail.then(() => this.dispatch(command))
    this.tail = result.catch(() => undefined)
    return result
  }

  private async dispatch(command: ResolvedCommand): Promise<DeviceResponse> {
    const url = this.urlFor(command)
    const context: MeboErrorContext = {
      component: command.component,
      action: command.action,
      params: { ...command.params },
      url,
    }

    this.logger.debug(`Mebo ${command.component}.${command.action} -> ${url}`)
    this.emit('request', { command, url })

    try {
      const response = await this.request(command, url, context)
      this.emit('response', { command, response })
      return response
    } catch (err) {
      const error =
        err instanceof MeboError ? err : new TransportError(`Request to Mebo failed: ${String(err)}`, { cause: err, context })
      this.emit('error', error)
      throw error
    }
  }

  private async request(command: ResolvedCommand, url: string, context: MeboErrorContext): Promise<DeviceResponse> {
    let res: Response
    let body: string
    try {
      res = await fetch(url, {
        method: command.method,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      })
      body = await res.text()
    } catch (err) {
      const reason = isTimeout(err) ? `timed out after ${this.requestTimeoutMs}ms` : describeFailure(err)
      throw new TransportError(`Request to Mebo failed: ${reason}`, { cause: err, context })
    }

    if (!res.ok) {
      throw new DeviceError(res.status, body, { context })
    }

    const parsed = this.parser.parse(body)
    if (!parsed) {
      throw new ProtocolError(`Unexpected response body for ${command.component}.${command.action}`, body, {
        context: { ...context, status: res.status },
      })
    }
    if (parsed.data?.success === false) {
      throw new DeviceError(res.status, body, { context })
    }
    return parsed
  }

  // ===== Event Emitter =====

  /**
   * Register event handler
   */
  on<K extends keyof SessionEvents>(event: K, callback: SessionEventHandler<K>): void {
    this.eventHandlers[event].add(callback)
  }

  /**
   * Remove event handler
   */
  off<K extends keyof SessionEvents>(event: K, callback: SessionEventHandler<K>): void {
    this.eventHandlers[event].delete(callback)
  }

  private emit<K extends keyof SessionEvents>(event: K, payload: SessionEvents[K]): void {
    const handlers: Set<SessionEventHandler<K>> = this.eventHandlers[event]
    for (const handler of handlers) {
      try {
        handler(payload)
      } catch (err) {
        this.logger.error(`Error in event handler for ${event}:`, err)
      }
    }
  }
}

// AbortSignal.timeout rejects with a DOMException named TimeoutError
function isTimeout(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false
  return err.name === 'TimeoutError' || err.name === 'AbortError'
}

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    // undici hides the socket error behind a generic "fetch failed"
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message
  }
  return String(err)
}
