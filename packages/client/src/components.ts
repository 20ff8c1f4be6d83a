/**
 * Component facades: one small class per physical subsystem.
 *
 * Every verb is a single table lookup plus a single Session.send. Facades
 * keep nothing but the Session they were built with and let every error
 * through untouched.
 */

import { resolveCommand, type CommandParams } from './commands'
import {
  COMMAND_SPECS,
  actionsOf,
  isDirection,
  type ActionName,
  type ComponentName,
  type Direction,
} from './protocol'
import type { DeviceResponse } from './protocol-adapters'
import type { Session } from './session'
import { InvalidParameterError, ProtocolError, UnsupportedCommandError } from './types'

export interface TimedOptions {
  /** Milliseconds; raised to the device minimum when shorter */
  duration?: number
  /** Compatibility spelling of `duration` */
  dur?: number
}

export interface MotionOptions extends TimedOptions {
  /** 0-255 (default: 255) */
  speed?: number
  /** Compatibility spelling of `speed` */
  velocity?: number
}

export type TurnDirection = 'left' | 'right' | 'l' | 'r'

export interface RouterOptions {
  auth: string
  ssid: string
  key: string
  /** Router slot (default: 1) */
  index?: number
}

export abstract class Component<C extends ComponentName> {
  readonly name: C
  protected readonly session: Session

  constructor(name: C, session: Session) {
    this.name = name
    this.session = session
  }

  /** Action names from the command table, in table order */
  get actions(): ActionName<C>[] {
    return actionsOf(this.name)
  }

  protected async send(action: ActionName<C>, params?: CommandParams): Promise<DeviceResponse> {
    return this.session.send(resolveCommand(this.name, action, params))
  }

  toString(): string {
    return `<${this.constructor.name} actions=${this.actions.join(',')}>`
  }
}

/** Drive base */
export class Wheels extends Component<'wheels'> {
  constructor(session: Session) {
    super('wheels', session)
  }

  /**
   * Drive in one of eight compass directions, from the robot's point of view.
   */
  async move(direction: Direction | string, options: MotionOptions = {}): Promise<DeviceResponse> {
    const normalized = direction.toLowerCase()
    if (!isDirection(normalized)) {
      throw new UnsupportedCommandError(this.name, direction)
    }
    return this.send(normalized, { ...options })
  }

  /** Turn a very small amount */
  async turn(direction: TurnDirection | string): Promise<DeviceResponse> {
    const side = direction.toLowerCase().charAt(0)
    if (side !== 'l' && side !== 'r') {
      throw new InvalidParameterError('direction', direction, 'must be "left", "right", "l" or "r"', {
        component: this.name,
        action: 'turn',
      })
    }
    return this.send(side === 'r' ? 'turnRight' : 'turnLeft')
  }

  stop(): Promise<DeviceResponse> {
    return this.send('stop')
  }
}

export class Arm extends Component<'arm'> {
  constructor(session: Session) {
    super('arm', session)
  }

  up(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('up', { ...options })
  }

  down(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('down', { ...options })
  }

  stop(): Promise<DeviceResponse> {
    return this.send('stop')
  }
}

export class Claw extends Component<'claw'> {
  constructor(session: Session) {
    super('claw', session)
  }

  open(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('open', { ...options })
  }

  close(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('close', { ...options })
  }

  stop(): Promise<DeviceResponse> {
    return this.send('stop')
  }
}

/**
 * Wrist: rotates left/right (counter-clockwise/clockwise from the robot's
 * point of view) and lifts up/down.
 */
export class Wrist extends Component<'wrist'> {
  constructor(session: Session) {
    super('wrist', session)
  }

  left(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('left', { ...options })
  }

  right(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('right', { ...options })
  }

  inchLeft(): Promise<DeviceResponse> {
    return this.send('inchLeft')
  }

  inchRight(): Promise<DeviceResponse> {
    return this.send('inchRight')
  }

  rotateStop(): Promise<DeviceResponse> {
    return this.send('rotateStop')
  }

  up(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('up', { ...options })
  }

  down(options: TimedOptions = {}): Promise<DeviceResponse> {
    return this.send('down', { ...options })
  }

  liftStop(): Promise<DeviceResponse> {
    return this.send('liftStop')
  }
}

export class Speaker extends Component<'speaker'> {
  constructor(session: Session) {
    super('speaker', session)
  }

  /** Volume in [0, 100] */
  setVolume(volume: number): Promise<DeviceResponse> {
    return this.send('setVolume', { volume })
  }

  // TODO: find the request parameter that selects which stored sound plays
  playSound(): Promise<DeviceResponse> {
    return this.send('playSound')
  }
}

type SystemQuery = 'version' | 'model' | 'wifiCert' | 'boundaryPosition'

/** Device-level queries and settings */
export class System extends Component<'system'> {
  constructor(session: Session) {
    super('system', session)
  }

  /** Firmware version, e.g. `03.02.37` */
  async version(): Promise<string> {
    return (await this.query('version')).value
  }

  /** Robot model; `001` on every unit seen so far */
  async model(): Promise<string> {
    return (await this.query('model')).value
  }

  async wifiCert(): Promise<string> {
    return (await this.query('wifiCert')).value
  }

  /**
   * Travel limits for the four axes: arm (s_up, s_down), claw (c_open,
   * c_close), wrist rotation (w_left, w_right) and wrist lift (h_up, h_down).
   */
  async boundaryPosition(): Promise<Record<string, number>> {
    const response = await this.query('boundaryPosition')
    const entries = Object.entries(response.fields)
    if (entries.length === 0) {
      throw this.unexpectedReply('boundaryPosition', response)
    }
    const positions: Record<string, number> = {}
    for (const [axis, raw] of entries) {
      if (!/^-?\d+$/.test(raw)) throw this.unexpectedReply('boundaryPosition', response)
      positions[axis] = Number.parseInt(raw, 10)
    }
    return positions
  }

  // Queries must echo their own request name followed by a payload.
  private async query(action: SystemQuery): Promise<DeviceResponse> {
    const response = await this.send(action)
    if (response.key !== COMMAND_SPECS.system[action].req || response.value === '') {
      throw this.unexpectedReply(action, response)
    }
    return response
  }

  private unexpectedReply(action: SystemQuery, response: DeviceResponse): ProtocolError {
    return new ProtocolError(`Unexpected response body for ${this.name}.${action}`, response.raw, {
      context: { component: this.name, action },
    })
  }

  restart(): Promise<DeviceResponse> {
    return this.send('restart')
  }

  setScanTimer(seconds?: number): Promise<DeviceResponse> {
    return this.send('setScanTimer', { seconds })
  }

  setTimerState(state?: number): Promise<DeviceResponse> {
    return this.send('setTimerState', { state })
  }

  /**
   * Save a wireless network to the robot's router list.
   * The credentials are sent in the clear as query parameters.
   */
  addRouter(options: RouterOptions): Promise<DeviceResponse> {
    return this.send('addRouter', { ...options })
  }
}
