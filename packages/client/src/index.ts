/**
 * @mebokit/client
 *
 * TypeScript client for the Mebo robot's local-network control API.
 */

// Main client
export { MeboClient, parseAddress } from './client'

// Component facades
export { Component, Wheels, Arm, Claw, Wrist, Speaker, System } from './components'
export type { MotionOptions, TimedOptions, TurnDirection, RouterOptions } from './components'

// Command table and resolution
export {
  COMMAND_SPECS,
  DIRECTIONS,
  DIRECTION_ENDPOINTS,
  MDNS_DOMAIN,
  MIN_DURATION_MS,
  MIN_SPEED,
  MAX_SPEED,
  MAX_VOLUME,
  DEFAULT_HTTP_PORT,
  actionsOf,
  isDirection,
  type Direction,
  type ComponentName,
  type ActionName,
  type ActionSpec,
  type ParamSpec,
  type ParamName,
} from './protocol'
export {
  resolveCommand,
  resolve,
  isSupported,
  PARAM_ALIASES,
  type Command,
  type CommandParams,
  type ParamValue,
  type ResolvedCommand,
} from './commands'

// Transport
export { Session, DEFAULT_REQUEST_TIMEOUT_MS } from './session'
export { ResponseParser, parseFields, type DeviceResponse, type ResponseFormat } from './protocol-adapters'

// Discovery
export {
  discover,
  deviceFromAnnouncement,
  formatMac,
  BonjourServiceBrowser,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
} from './discovery'

// Errors
export {
  MeboError,
  DiscoveryTimeoutError,
  TransportError,
  DeviceError,
  ProtocolError,
  UnsupportedCommandError,
  InvalidParameterError,
  ConfigurationError,
} from './types'

// Type exports
export type {
  AddressInput,
  DeviceAddress,
  DiscoveredDevice,
  DiscoveryOptions,
  Logger,
  MeboClientConfig,
  MeboErrorContext,
  MeboErrorKind,
  ServiceAnnouncement,
  ServiceBrowser,
  SessionConfig,
  SessionEvents,
  SessionEventHandler,
} from './types'
