/**
 * Response body adapters.
 *
 * Firmware builds disagree on how they answer: most reply with a single
 * `req:value` text line, some with nothing at all, newer ones with a JSON
 * object. Each adapter recognises one shape and returns null for the rest.
 */

export type ResponseFormat = 'empty' | 'json' | 'text'

export interface DeviceResponse {
  format: ResponseFormat
  /** Echoed command name (`get_version` in `get_version:03.02.37`), if any */
  key: string | null
  /** Payload after the key, trimmed */
  value: string
  /** `a=1&b=2` style payloads, or scalar JSON members, split into pairs */
  fields: Record<string, string>
  /** Decoded JSON body */
  data?: Record<string, unknown>
  raw: string
}

export interface ResponseAdapter {
  format: ResponseFormat
  parse(body: string): DeviceResponse | null
}

// ----- Empty body (plain acknowledgement) -----
class EmptyAdapter implements ResponseAdapter {
  format: ResponseFormat = 'empty'

  parse(body: string): DeviceResponse | null {
    if (body.trim() !== '') return null
    return { format: 'empty', key: null, value: '', fields: {}, raw: body }
  }
}

// ----- JSON object -----
class JsonAdapter implements ResponseAdapter {
  format: ResponseFormat = 'json'

  parse(body: string): DeviceResponse | null {
    const trimmed = body.trim()
    if (!trimmed.startsWith('{')) return null

    let decoded: unknown
    try {
      decoded = JSON.parse(trimmed)
    } catch {
      return null
    }
    if (!isRecord(decoded)) return null

    const fields: Record<string, string> = {}
    for (const [name, member] of Object.entries(decoded)) {
      if (typeof member === 'string' || typeof member === 'number' || typeof member === 'boolean') {
        fields[name] = String(member)
      }
    }
    return {
      format: 'json',
      key: typeof decoded.req === 'string' ? decoded.req : null,
      value: fields.value ?? '',
      fields,
      data: decoded,
      raw: body,
    }
  }
}

// ----- `key:value` text line -----
// Keys are firmware command names; the value may itself be `a=1&b=2`.
const TEXT_LINE = /^([A-Za-z0-9_.-]+)\s*(?::(.*))?$/

class TextAdapter implements ResponseAdapter {
  format: ResponseFormat = 'text'

  parse(body: string): DeviceResponse | null {
    const trimmed = body.trim()
    if (/[\r\n]/.test(trimmed)) return null

    const match = TEXT_LINE.exec(trimmed)
    if (!match) return null

    const value = (match[2] ?? '').trim()
    return {
      format: 'text',
      key: match[1],
      value,
      fields: parseFields(value),
      raw: body,
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Split `s_up=100&s_down=20` into pairs; anything without `=` yields {} */
export function parseFields(value: string): Record<string, string> {
  const fields: Record<string, string> = {}
  if (!value.includes('=')) return fields

  for (const pair of value.split('&')) {
    const separator = pair.indexOf('=')
    if (separator <= 0) continue
    fields[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim()
  }
  return fields
}

// ----- Manager -----
export class ResponseParser {
  private adapters: ResponseAdapter[]

  constructor(preference: ResponseFormat[] = DEFAULT_RESPONSE_ORDER) {
    const registry: Record<ResponseFormat, ResponseAdapter> = {
      empty: new EmptyAdapter(),
      json: new JsonAdapter(),
      text: new TextAdapter(),
    }
    // Remove duplicates while preserving order
    const seen = new Set<ResponseFormat>()
    this.adapters = preference
      .filter((format) => {
        if (seen.has(format)) return false
        seen.add(format)
        return true
      })
      .map((format) => registry[format])
  }

  get formats(): ResponseFormat[] {
    return this.adapters.map((adapter) => adapter.format)
  }

  /** First adapter that recognises the body wins; null if none does */
  parse(body: string): DeviceResponse | null {
    for (const adapter of this.adapters) {
      const parsed = adapter.parse(body)
      if (parsed) return parsed
    }
    return null
  }
}

export const DEFAULT_RESPONSE_ORDER: ResponseFormat[] = ['empty', 'json', 'text']
