/**
 * Mebo Client Types
 */

import type { ResolvedCommand } from './commands'
import type { DeviceResponse } from './protocol-adapters'

/** Network endpoint of the robot's control API */
export interface DeviceAddress {
  /** IPv4 address of the robot */
  host: string
  /** HTTP port (default: 80) */
  port: number
}

/** Address as accepted from callers: "10.0.0.5", "10.0.0.5:8080" or an object */
export type AddressInput = string | { host: string; port?: number }

/** Minimal logging surface; `console` satisfies it */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

/** A single mDNS service announcement, as seen by a browser */
export interface ServiceAnnouncement {
  name: string
  host?: string
  port: number
  addresses?: string[]
  txt?: Record<string, unknown>
}

/**
 * Browses for mDNS service announcements.
 *
 * `start` opens the multicast socket; `destroy` must release it and is
 * called exactly once per discovery.
 */
export interface ServiceBrowser {
  start(
    serviceType: string,
    onService: (service: ServiceAnnouncement) => void,
    onError: (error: Error) => void
  ): void
  destroy(): void
}

export interface DiscoveryOptions {
  /** Give up after this many milliseconds (default: 3000) */
  timeoutMs?: number
  /** Browser to use instead of bonjour-service */
  browser?: ServiceBrowser
  logger?: Logger
}

/** Result of a successful discovery */
export interface DiscoveredDevice {
  address: DeviceAddress
  /** Full mDNS instance name, e.g. Camera-aabbccddeeff._camera._tcp.local. */
  name: string
  /** MAC address from the TXT record, colon separated */
  mac?: string
  /** Port carried in the announcement itself */
  servicePort: number
}

export interface SessionConfig {
  address: DeviceAddress
  /** Per-request timeout in milliseconds (default: 5000) */
  requestTimeoutMs?: number
  logger?: Logger
}

// Client configuration
export interface MeboClientConfig {
  /** Explicit robot address; skips discovery */
  address?: AddressInput
  /** Bounds automatic discovery in milliseconds (default: 3000) */
  discoveryTimeoutMs?: number
  /** Bounds each HTTP call in milliseconds (default: 5000) */
  requestTimeoutMs?: number
  /** Logger for debug output (default: console) */
  logger?: Logger
  /** mDNS browser used during discovery (default: bonjour-service) */
  browser?: ServiceBrowser
}

// Event types
export interface SessionEvents {
  request: { command: ResolvedCommand; url: string }
  response: { command: ResolvedCommand; response: DeviceResponse }
  error: MeboError
}

export type SessionEventHandler<K extends keyof SessionEvents> = (payload: SessionEvents[K]) => void

export type MeboErrorKind =
  | 'discovery'
  | 'transport'
  | 'device'
  | 'protocol'
  | 'command'
  | 'parameter'
  | 'config'

export interface MeboErrorContext {
  component?: string
  action?: string
  params?: Record<string, unknown>
  url?: string
  status?: number
}

export class MeboError extends Error {
  kind: MeboErrorKind
  context: MeboErrorContext

  constructor(
    kind: MeboErrorKind,
    message: string,
    options?: { cause?: unknown; context?: MeboErrorContext }
  ) {
    super(message, options)
    this.name = 'MeboError'
    this.kind = kind
    this.context = options?.context ?? {}
  }
}

/** No robot announced itself before the discovery timeout */
export class DiscoveryTimeoutError extends MeboError {
  readonly timeoutMs: number

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(
      'discovery',
      `Unable to locate Mebo on the network within ${timeoutMs}ms. ` +
        'Make sure it is powered on and connected to the LAN; it may be necessary to power cycle it.',
      options
    )
    this.name = 'DiscoveryTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** The request never got an HTTP response (connection refused, timeout, DNS) */
export class TransportError extends MeboError {
  constructor(message: string, options?: { cause?: unknown; context?: MeboErrorContext }) {
    super('transport', message, options)
    this.name = 'TransportError'
  }
}

/** The robot answered but reported failure */
export class DeviceError extends MeboError {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string, options?: { context?: MeboErrorContext }) {
    super('device', `Mebo rejected request with status ${status}`, {
      context: { ...options?.context, status },
    })
    this.name = 'DeviceError'
    this.status = status
    this.body = body
  }
}

/** The reply did not have a shape this client understands */
export class ProtocolError extends MeboError {
  readonly body: string

  constructor(message: string, body: string, options?: { cause?: unknown; context?: MeboErrorContext }) {
    super('protocol', message, options)
    this.name = 'ProtocolError'
    this.body = body
  }
}

export class UnsupportedCommandError extends MeboError {
  constructor(component: string, action: string) {
    super('command', `Unsupported command: ${component}.${action}`, {
      context: { component, action },
    })
    this.name = 'UnsupportedCommandError'
  }
}

export class InvalidParameterError extends MeboError {
  readonly parameter: string
  readonly value: unknown

  constructor(parameter: string, value: unknown, reason: string, context?: MeboErrorContext) {
    super('parameter', `Invalid parameter ${parameter}=${String(value)}: ${reason}`, { context })
    this.name = 'InvalidParameterError'
    this.parameter = parameter
    this.value = value
  }
}

export class ConfigurationError extends MeboError {
  constructor(message: string) {
    super('config', message)
    this.name = 'ConfigurationError'
  }
}
