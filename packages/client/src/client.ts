/**
 * Mebo Client
 *
 * Entry point: one robot, one Session, lazily built component facades.
 */

import { isIPv4 } from 'node:net'
import { Arm, Claw, Speaker, System, Wheels, Wrist, type MotionOptions, type TurnDirection } from './components'
import { DEFAULT_DISCOVERY_TIMEOUT_MS, discover } from './discovery'
import { DEFAULT_HTTP_PORT, type Direction } from './protocol'
import type { DeviceResponse } from './protocol-adapters'
import { DEFAULT_REQUEST_TIMEOUT_MS, Session } from './session'
import {
  ConfigurationError,
  DeviceError,
  TransportError,
  type AddressInput,
  type DeviceAddress,
  type DiscoveredDevice,
  type Logger,
  type MeboClientConfig,
  type SessionEventHandler,
  type SessionEvents,
} from './types'

interface ResolvedConfig {
  address: DeviceAddress
  requestTimeoutMs: number
  logger: Logger
}

/**
 * Normalize `"10.0.0.5"`, `"10.0.0.5:8080"` or `{ host, port }` into a
 * DeviceAddress. Only IPv4 hosts are accepted.
 */
export function parseAddress(input: AddressInput): DeviceAddress {
  let host: string
  let port: number = DEFAULT_HTTP_PORT

  if (typeof input === 'string') {
    const separator = input.lastIndexOf(':')
    host = separator >= 0 ? input.slice(0, separator) : input
    if (separator >= 0) {
      port = Number(input.slice(separator + 1))
    }
  } else {
    host = input.host
    port = input.port ?? DEFAULT_HTTP_PORT
  }

  if (!isIPv4(host)) {
    throw new ConfigurationError(`${String(host)} is not a valid IPv4 address`)
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${String(port)} is not a valid port`)
  }
  return { host, port }
}

export class MeboClient {
  private config: ResolvedConfig
  private session: Session
  private discovered: DiscoveredDevice | null

  private _wheels: Wheels | null = null
  private _arm: Arm | null = null
  private _wrist: Wrist | null = null
  private _claw: Claw | null = null
  private _speaker: Speaker | null = null
  private _system: System | null = null

  /**
   * Build a client for a known address. Use {@link MeboClient.connect} to
   * find the robot with mDNS instead.
   */
  constructor(config: MeboClientConfig & { address: AddressInput }, discovered: DiscoveredDevice | null = null) {
    this.config = {
      address: parseAddress(config.address),
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      logger: config.logger ?? console,
    }
    this.discovered = discovered
    this.session = new Session(this.config)
  }

  /**
   * Create a client, discovering the robot first when no address is given.
   *
   * @throws DiscoveryTimeoutError when discovery finds nothing in time; no
   * fallback address is tried
   */
  static async connect(config: MeboClientConfig = {}): Promise<MeboClient> {
    if (config.address !== undefined) {
      return new MeboClient({ ...config, address: config.address })
    }

    const device = await discover({
      timeoutMs: config.discoveryTimeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS,
      browser: config.browser,
      logger: config.logger,
    })
    return new MeboClient({ ...config, address: device.address }, device)
  }

  /** Address of the robot's control API */
  get address(): Readonly<DeviceAddress> {
    return this.session.address
  }

  /** HTTP endpoint serving the control API */
  get endpoint(): string {
    return this.session.endpoint
  }

  /** mDNS details when the robot was discovered, null when configured explicitly */
  get device(): DiscoveredDevice | null {
    return this.discovered
  }

  get wheels(): Wheels {
    if (!this._wheels) this._wheels = new Wheels(this.session)
    return this._wheels
  }

  /** The arm: `up`, `down`, `stop` */
  get arm(): Arm {
    if (!this._arm) this._arm = new Arm(this.session)
    return this._arm
  }

  /** The wrist: rotate `left`/`right`, `inchLeft`/`inchRight`, lift `up`/`down` */
  get wrist(): Wrist {
    if (!this._wrist) this._wrist = new Wrist(this.session)
    return this._wrist
  }

  /** The claw at the end of the arm: `open`, `close`, `stop` */
  get claw(): Claw {
    if (!this._claw) this._claw = new Claw(this.session)
    return this._claw
  }

  get speaker(): Speaker {
    if (!this._speaker) this._speaker = new Speaker(this.session)
    return this._speaker
  }

  get system(): System {
    if (!this._system) this._system = new System(this.session)
    return this._system
  }

  // ===== Motion shortcuts =====

  move(direction: Direction | string, options?: MotionOptions): Promise<DeviceResponse> {
    return this.wheels.move(direction, options)
  }

  turn(direction: TurnDirection | string): Promise<DeviceResponse> {
    return this.wheels.turn(direction)
  }

  stop(): Promise<DeviceResponse> {
    return this.wheels.stop()
  }

  /**
   * Probe the robot by asking for its firmware version.
   * Transport and device failures read as "not connected"; anything else
   * (a protocol mismatch, say) is rethrown.
   */
  async isConnected(): Promise<boolean> {
    this.config.logger.debug(`Connecting to Mebo at ${this.address.host}`)
    try {
      await this.system.version()
      return true
    } catch (err) {
      if (err instanceof TransportError || err instanceof DeviceError) {
        this.config.logger.debug(`Mebo at ${this.address.host} unreachable: ${err.message}`)
        return false
      }
      throw err
    }
  }

  // ===== Events =====

  on<K extends keyof SessionEvents>(event: K, callback: SessionEventHandler<K>): void {
    this.session.on(event, callback)
  }

  off<K extends keyof SessionEvents>(event: K, callback: SessionEventHandler<K>): void {
    this.session.off(event, callback)
  }
}
