/**
 * Command resolution: component + action + params → concrete HTTP request.
 *
 * Pure and table driven. Everything a caller can get wrong is caught here,
 * before the Session ever touches the network.
 */

import {
  COMMAND_SPECS,
  MAX_SPEED,
  MAX_VOLUME,
  MIN_DURATION_MS,
  MIN_SPEED,
  REQUEST_METHOD,
  REQUEST_PATH,
  type ActionSpec,
  type CommandSpecTable,
  type ParamName,
} from './protocol'
import { InvalidParameterError, UnsupportedCommandError, type MeboErrorContext } from './types'

export type ParamValue = number | string
export type CommandParams = Readonly<Record<string, ParamValue | undefined>>

/** One request as described by a facade, before resolution */
export interface Command {
  component: string
  action: string
  params?: CommandParams
}

export interface ResolvedCommand {
  component: string
  action: string
  method: typeof REQUEST_METHOD
  path: typeof REQUEST_PATH
  /** Query parameters in send order, `req` first */
  query: Record<string, string>
  /** Normalized values under their canonical names */
  params: Partial<Record<ParamName, ParamValue>>
}

/**
 * Older firmware notes and scripts spell some parameters differently.
 * Accepted on input only; everything past resolution uses canonical names.
 */
export const PARAM_ALIASES: Readonly<Record<string, ParamName>> = Object.freeze({
  velocity: 'speed',
  dur: 'duration',
})

type Fail = (reason: string) => never
type ParamRule = (value: ParamValue, fail: Fail) => ParamValue

function finiteNumber(value: ParamValue, fail: Fail): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fail('must be a finite number')
  }
  return value
}

function integerInRange(min: number, max: number = Number.MAX_SAFE_INTEGER): ParamRule {
  return (value, fail) => {
    const n = finiteNumber(value, fail)
    if (!Number.isInteger(n)) return fail('must be an integer')
    if (n < min || n > max) {
      return fail(max === Number.MAX_SAFE_INTEGER ? `must be >= ${min}` : `must be in [${min}, ${max}]`)
    }
    return n
  }
}

function nonEmptyString(value: ParamValue, fail: Fail): string {
  if (typeof value !== 'string' || value.length === 0) {
    return fail('must be a non-empty string')
  }
  return value
}

const PARAM_RULES: Readonly<Record<ParamName, ParamRule>> = {
  // Fractions are rounded first; the range applies to the rounded value.
  speed: (value, fail) => {
    // + 0 turns a rounded -0 into 0
    const n = Math.round(finiteNumber(value, fail)) + 0
    if (n < MIN_SPEED || n > MAX_SPEED) return fail(`must be in [${MIN_SPEED}, ${MAX_SPEED}]`)
    return n
  },
  // Below the floor the firmware ignores the command, so short moves are lengthened.
  duration: (value, fail) => {
    const n = finiteNumber(value, fail)
    if (n < 0) return fail('must not be negative')
    const ms = Math.round(n)
    if (!Number.isSafeInteger(ms)) return fail(`must be at most ${Number.MAX_SAFE_INTEGER}`)
    return Math.max(ms, MIN_DURATION_MS)
  },
  volume: integerInRange(0, MAX_VOLUME),
  seconds: integerInRange(0),
  state: integerInRange(0, 1),
  index: integerInRange(1),
  ssid: nonEmptyString,
  key: nonEmptyString,
  auth: nonEmptyString,
}

function findSpec(component: string, action: string): ActionSpec | undefined {
  const table: CommandSpecTable = COMMAND_SPECS
  if (!Object.hasOwn(table, component)) return undefined
  const actions = table[component]
  if (!Object.hasOwn(actions, action)) return undefined
  return actions[action]
}

/** Whether (component, action) has an entry in the command table */
export function isSupported(component: string, action: string): boolean {
  return findSpec(component, action) !== undefined
}

function canonicalName(name: string): string {
  return Object.hasOwn(PARAM_ALIASES, name) ? PARAM_ALIASES[name] : name
}

function canonicalizeParams(params: CommandParams, context: MeboErrorContext): Map<string, ParamValue> {
  const canonical = new Map<string, ParamValue>()
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue
    const target = canonicalName(name)
    if (canonical.has(target)) {
      throw new InvalidParameterError(name, value, `${target} given more than once`, context)
    }
    canonical.set(target, value)
  }
  return canonical
}

/**
 * Resolve a command against the table.
 *
 * @throws UnsupportedCommandError when the pair has no table entry
 * @throws InvalidParameterError for unknown, missing or out-of-range parameters
 */
export function resolveCommand(component: string, action: string, params: CommandParams = {}): ResolvedCommand {
  const spec = findSpec(component, action)
  if (!spec) {
    throw new UnsupportedCommandError(component, action)
  }

  const context: MeboErrorContext = { component, action, params: { ...params } }
  const given = canonicalizeParams(params, context)

  const accepted = new Set<string>(spec.params.map((param) => param.name))
  for (const [name, value] of given) {
    if (!accepted.has(name)) {
      throw new InvalidParameterError(name, value, `not accepted by ${component}.${action}`, context)
    }
  }

  const query: Record<string, string> = { req: spec.req }
  const normalized: Partial<Record<ParamName, ParamValue>> = {}
  for (const param of spec.params) {
    const raw = given.get(param.name) ?? param.default
    if (raw === undefined) {
      if (param.required) {
        throw new InvalidParameterError(param.name, raw, 'is required', context)
      }
      continue
    }
    const fail: Fail = (reason) => {
      throw new InvalidParameterError(param.name, raw, reason, context)
    }
    const value = PARAM_RULES[param.name](raw, fail)
    normalized[param.name] = value
    query[param.wire] = String(value)
  }

  return {
    component,
    action,
    method: REQUEST_METHOD,
    path: REQUEST_PATH,
    query,
    params: normalized,
  }
}

/** Convenience overload taking a Command value */
export function resolve(command: Command): ResolvedCommand {
  return resolveCommand(command.component, command.action, command.params)
}
