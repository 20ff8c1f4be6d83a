/**
 * mDNS discovery of Mebo robots on the LAN.
 *
 * Best effort and time bounded: the first matching announcement wins and
 * the multicast socket is released before `discover` settles.
 */

import { isIPv4 } from 'node:net'
import { Bonjour } from 'bonjour-service'
import { DEFAULT_HTTP_PORT, MDNS_DOMAIN, MDNS_PROTOCOL, MDNS_SERVICE_TYPE } from './protocol'
import {
  DiscoveryTimeoutError,
  MeboError,
  type DiscoveredDevice,
  type DiscoveryOptions,
  type ServiceAnnouncement,
  type ServiceBrowser,
} from './types'

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 3000

/** ServiceBrowser backed by bonjour-service; one multicast socket per instance */
export class BonjourServiceBrowser implements ServiceBrowser {
  private bonjour: Bonjour | null = null

  start(
    serviceType: string,
    onService: (service: ServiceAnnouncement) => void,
    onError: (error: Error) => void
  ): void {
    this.bonjour = new Bonjour({}, onError)
    this.bonjour.find({ type: serviceType, protocol: MDNS_PROTOCOL }, (service) => {
      onService({
        name: service.name,
        host: service.host,
        port: service.port,
        addresses: service.addresses ?? [],
        txt: service.txt,
      })
    })
  }

  destroy(): void {
    this.bonjour?.destroy()
    this.bonjour = null
  }
}

/** `aabbccddeeff` → `aa:bb:cc:dd:ee:ff`; anything else is returned untouched */
export function formatMac(raw: string): string {
  const hex = raw.trim().toLowerCase()
  if (!/^[0-9a-f]{12}$/.test(hex)) return raw
  return hex.match(/../g)?.join(':') ?? raw
}

function txtString(txt: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = txt?.[key]
  if (typeof value === 'string') return value
  if (value instanceof Uint8Array) return Buffer.from(value).toString('ascii')
  return undefined
}

/**
 * Turn an announcement into a device, or null if it is not a Mebo.
 * The robot puts its IPv4 address in the TXT record; the announcement's own
 * address list is the fallback.
 */
export function deviceFromAnnouncement(service: ServiceAnnouncement): DiscoveredDevice | null {
  // bonjour-service reports the bare instance name; other browsers may give the full one
  const qualified = service.name.includes('._')
  if (qualified && !service.name.endsWith(MDNS_DOMAIN)) return null
  const fqdn = qualified ? service.name : `${service.name}.${MDNS_DOMAIN}`

  const txtIp = txtString(service.txt, 'ip')
  const host = txtIp && isIPv4(txtIp) ? txtIp : service.addresses?.find((address) => isIPv4(address))
  if (!host) return null

  const mac = txtString(service.txt, 'mac')
  return {
    address: { host, port: DEFAULT_HTTP_PORT },
    name: fqdn,
    mac: mac ? formatMac(mac) : undefined,
    servicePort: service.port,
  }
}

/**
 * Listen for a Mebo announcement.
 *
 * @throws DiscoveryTimeoutError when nothing matching is seen within `timeoutMs`
 */
export function discover(options: DiscoveryOptions = {}): Promise<DiscoveredDevice> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS
  const browser = options.browser ?? new BonjourServiceBrowser()
  const logger = options.logger ?? console

  return new Promise<DiscoveredDevice>((resolve, reject) => {
    let settled = false
    const finish = (outcome: () => void) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      browser.destroy()
      outcome()
    }

    const timer = setTimeout(() => {
      finish(() => reject(new DiscoveryTimeoutError(timeoutMs)))
    }, timeoutMs)

    logger.debug(`Starting search for Mebo (${MDNS_DOMAIN})...`)
    try {
      browser.start(
        MDNS_SERVICE_TYPE,
        (service) => {
          if (settled) return
          const device = deviceFromAnnouncement(service)
          if (!device) {
            logger.debug(`Ignoring service ${service.name}`)
            return
          }
          logger.debug(`Mebo(mac:${device.mac ?? 'unknown'}) is at (${device.name})->(${device.address.host})`)
          finish(() => resolve(device))
        },
        (error) => {
          finish(() => reject(new MeboError('discovery', `mDNS browse failed: ${error.message}`, { cause: error })))
        }
      )
    } catch (err) {
      finish(() => reject(new MeboError('discovery', 'Unable to start mDNS browser', { cause: err })))
    }
  })
}
