/**
 * Mebo HTTP Control API
 *
 * Every command is a GET against the robot's root path. The endpoint is
 * selected by the `req` query parameter and arguments ride along as further
 * query parameters:
 *
 *   GET http://<ip>/?req=move_forward&dur=1000&value=255
 *
 * COMMAND_SPECS is this client's model of that contract. It has to track the
 * firmware: an action missing here cannot be sent.
 */

// Protocol constants
export const REQUEST_METHOD = 'GET'
export const REQUEST_PATH = '/'
export const DEFAULT_HTTP_PORT = 80

// mDNS: robots announce themselves as Camera-<mac>._camera._tcp.local.
export const MDNS_SERVICE_TYPE = 'camera'
export const MDNS_PROTOCOL = 'tcp'
export const MDNS_DOMAIN = '_camera._tcp.local.'

// Device limits
export const MIN_SPEED = 0
export const MAX_SPEED = 255
export const DEFAULT_SPEED = 255
/** Shorter durations are silently ignored by the firmware */
export const MIN_DURATION_MS = 1000
export const DEFAULT_MOVE_DURATION_MS = 1000
export const MAX_VOLUME = 100

export const DIRECTIONS = ['n', 'ne', 'e', 'se', 's', 'sw', 'w', 'nw'] as const

/** Compass direction from the robot's point of view; `n` is straight ahead */
export type Direction = (typeof DIRECTIONS)[number]

export function isDirection(value: string): value is Direction {
  return DIRECTIONS.some((direction) => direction === value)
}

/** Canonical parameter names accepted by the command mapper */
export type ParamName = 'speed' | 'duration' | 'volume' | 'seconds' | 'state' | 'index' | 'ssid' | 'key' | 'auth'

export interface ParamSpec {
  name: ParamName
  /** Query parameter name the firmware expects */
  wire: string
  required?: boolean
  default?: number | string
}

export interface ActionSpec {
  /** Value of the `req` query parameter */
  req: string
  params: readonly ParamSpec[]
}

export type CommandSpecTable = Readonly<Record<string, Readonly<Record<string, ActionSpec>>>>

const SPEED = { name: 'speed', wire: 'value', default: DEFAULT_SPEED } as const
const MOVE_DURATION = { name: 'duration', wire: 'dur', default: DEFAULT_MOVE_DURATION_MS } as const
const DURATION = { name: 'duration', wire: 'dur' } as const
const MOVE = [MOVE_DURATION, SPEED] as const
const TIMED = [DURATION] as const
const NONE = [] as const

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

export const COMMAND_SPECS = deepFreeze({
  wheels: {
    n: { req: 'move_forward', params: MOVE },
    ne: { req: 'move_forward_right', params: MOVE },
    e: { req: 'move_right', params: MOVE },
    se: { req: 'move_backward_right', params: MOVE },
    s: { req: 'move_backward', params: MOVE },
    sw: { req: 'move_backward_left', params: MOVE },
    w: { req: 'move_left', params: MOVE },
    nw: { req: 'move_forward_left', params: MOVE },
    turnLeft: { req: 'inch_left', params: NONE },
    turnRight: { req: 'inch_right', params: NONE },
    stop: { req: 'fb_stop', params: NONE },
  },
  arm: {
    up: { req: 's_up', params: TIMED },
    down: { req: 's_down', params: TIMED },
    stop: { req: 's_stop', params: NONE },
  },
  wrist: {
    left: { req: 'w_left', params: TIMED },
    right: { req: 'w_right', params: TIMED },
    inchLeft: { req: 'inch_w_left', params: NONE },
    inchRight: { req: 'inch_w_right', params: NONE },
    rotateStop: { req: 'w_stop', params: NONE },
    up: { req: 'h_up', params: TIMED },
    down: { req: 'h_down', params: TIMED },
    liftStop: { req: 'h_stop', params: NONE },
  },
  claw: {
    open: { req: 'c_open', params: TIMED },
    close: { req: 'c_close', params: TIMED },
    stop: { req: 'c_stop', params: NONE },
  },
  speaker: {
    setVolume: { req: 'set_spk_volume', params: [{ name: 'volume', wire: 'value', required: true }] },
    playSound: { req: 'audio_out0', params: NONE },
  },
  system: {
    version: { req: 'get_version', params: NONE },
    model: { req: 'get_model', params: NONE },
    wifiCert: { req: 'get_wifi_cert', params: NONE },
    boundaryPosition: { req: 'get_boundary_position', params: NONE },
    restart: { req: 'restart_system', params: NONE },
    setScanTimer: { req: 'set_scan_timer', params: [{ name: 'seconds', wire: 'value', default: 30 }] },
    setTimerState: { req: 'set_timer_state', params: [{ name: 'state', wire: 'value', default: 0 }] },
    // Credentials travel as plain query parameters; the firmware offers nothing else.
    addRouter: {
      req: 'setup_wireless_save',
      params: [
        { name: 'auth', wire: 'auth', required: true },
        { name: 'ssid', wire: 'ssid', required: true },
        { name: 'key', wire: 'key', required: true },
        { name: 'index', wire: 'index', default: 1 },
      ],
    },
  },
} as const satisfies CommandSpecTable)

export type ComponentName = keyof typeof COMMAND_SPECS
export type ActionName<C extends ComponentName> = keyof (typeof COMMAND_SPECS)[C] & string

/** Motion endpoint for each compass direction */
export const DIRECTION_ENDPOINTS: Readonly<Record<Direction, string>> = Object.freeze({
  n: COMMAND_SPECS.wheels.n.req,
  ne: COMMAND_SPECS.wheels.ne.req,
  e: COMMAND_SPECS.wheels.e.req,
  se: COMMAND_SPECS.wheels.se.req,
  s: COMMAND_SPECS.wheels.s.req,
  sw: COMMAND_SPECS.wheels.sw.req,
  w: COMMAND_SPECS.wheels.w.req,
  nw: COMMAND_SPECS.wheels.nw.req,
})

/** Actions available on a component, in table order */
export function actionsOf<C extends ComponentName>(component: C): ActionName<C>[] {
  return Object.keys(COMMAND_SPECS[component]).filter(
    (action): action is ActionName<C> => action in COMMAND_SPECS[component]
  )
}
