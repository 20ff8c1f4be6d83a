/**
 * Discovery Tests
 *
 * mDNS discovery against an in-process browser: first match wins, the
 * browser is always released, and the timeout always fires.
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { discover, deviceFromAnnouncement, formatMac } from '../discovery'
import {
  DiscoveryTimeoutError,
  MeboError,
  type Logger,
  type ServiceAnnouncement,
  type ServiceBrowser,
} from '../types'

class FakeBrowser implements ServiceBrowser {
  serviceType: string | null = null
  started = 0
  destroyed = 0
  private onService: ((service: ServiceAnnouncement) => void) | null = null
  private onError: ((error: Error) => void) | null = null

  start(
    serviceType: string,
    onService: (service: ServiceAnnouncement) => void,
    onError: (error: Error) => void
  ): void {
    this.started++
    this.serviceType = serviceType
    this.onService = onService
    this.onError = onError
  }

  destroy(): void {
    this.destroyed++
  }

  announce(service: ServiceAnnouncement): void {
    this.onService?.(service)
  }

  fail(error: Error): void {
    this.onError?.(error)
  }
}

const MEBO: ServiceAnnouncement = {
  name: 'Camera-a1b2c3d4e5f6',
  host: 'Camera-a1b2c3d4e5f6.local',
  port: 6667,
  addresses: ['192.168.1.50'],
  txt: { ip: '192.168.1.50', mac: 'A1B2C3D4E5F6' },
}

const silent: Logger = { debug: () => undefined, info: () => undefined, warn: () => undefined, error: () => undefined }

describe('discover', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should resolve the first Mebo announcement', async () => {
    const browser = new FakeBrowser()
    const found = discover({ browser, logger: silent, timeoutMs: 1000 })
    browser.announce(MEBO)

    await expect(found).resolves.toEqual({
      address: { host: '192.168.1.50', port: 80 },
      name: 'Camera-a1b2c3d4e5f6._camera._tcp.local.',
      mac: 'a1:b2:c3:d4:e5:f6',
      servicePort: 6667,
    })
    expect(browser.serviceType).toBe('camera')
    expect(browser.started).toBe(1)
    expect(browser.destroyed).toBe(1)
  })

  it('should ignore later announcements', async () => {
    const browser = new FakeBrowser()
    const found = discover({ browser, logger: silent })
    browser.announce(MEBO)
    browser.announce({ ...MEBO, name: 'Camera-000000000000', txt: { ip: '192.168.1.99' } })

    await expect(found).resolves.toMatchObject({ address: { host: '192.168.1.50' } })
    expect(browser.destroyed).toBe(1)
  })

  it('should skip announcements outside the camera domain', async () => {
    const browser = new FakeBrowser()
    const debug = vi.fn()
    const found = discover({ browser, logger: { ...silent, debug }, timeoutMs: 1000 })
    browser.announce({ name: 'Office Printer._ipp._tcp.local.', port: 631, addresses: ['192.168.1.7'] })
    browser.announce(MEBO)

    await expect(found).resolves.toMatchObject({ address: { host: '192.168.1.50' } })
    expect(debug).toHaveBeenCalledWith('Ignoring service Office Printer._ipp._tcp.local.')
  })

  it('should fail with DiscoveryTimeoutError when nothing answers', async () => {
    vi.useFakeTimers()
    const browser = new FakeBrowser()
    let settled = false
    const found = discover({ browser, logger: silent, timeoutMs: 500 })
    found.catch(() => undefined).finally(() => {
      settled = true
    })

    await vi.advanceTimersByTimeAsync(499)
    expect(settled).toBe(false)
    expect(browser.destroyed).toBe(0)

    await vi.advanceTimersByTimeAsync(1)
    await expect(found).rejects.toBeInstanceOf(DiscoveryTimeoutError)
    await expect(found).rejects.toMatchObject({ kind: 'discovery', timeoutMs: 500 })
    expect(browser.destroyed).toBe(1)
  })

  it('should return control within the timeout on a real clock', async () => {
    const started = Date.now()
    await expect(discover({ browser: new FakeBrowser(), logger: silent, timeoutMs: 50 })).rejects.toBeInstanceOf(
      DiscoveryTimeoutError
    )
    expect(Date.now() - started).toBeLessThan(50 + 500)
  })

  it('should release the browser when browsing fails', async () => {
    const browser = new FakeBrowser()
    const found = discover({ browser, logger: silent })
    browser.fail(new Error('EADDRINUSE'))

    await expect(found).rejects.toMatchObject({ kind: 'discovery', message: 'mDNS browse failed: EADDRINUSE' })
    expect(browser.destroyed).toBe(1)
  })

  it('should release the browser when it cannot start', async () => {
    const browser = new FakeBrowser()
    vi.spyOn(browser, 'start').mockImplementation(() => {
      throw new Error('no multicast interface')
    })

    const err = await discover({ browser, logger: silent }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(MeboError)
    expect(err).not.toBeInstanceOf(DiscoveryTimeoutError)
    expect(browser.destroyed).toBe(1)
  })
})

describe('deviceFromAnnouncement', () => {
  it('should fall back to the first IPv4 address', () => {
    const device = deviceFromAnnouncement({
      name: 'Camera-a1b2c3d4e5f6',
      port: 6667,
      addresses: ['fe80::1', '10.0.0.7'],
    })
    expect(device?.address).toEqual({ host: '10.0.0.7', port: 80 })
    expect(device?.mac).toBeUndefined()
  })

  it('should accept binary TXT values', () => {
    const device = deviceFromAnnouncement({
      ...MEBO,
      txt: { ip: Buffer.from('192.168.1.51'), mac: Buffer.from('a1b2c3d4e5f6') },
    })
    expect(device).toMatchObject({ address: { host: '192.168.1.51' }, mac: 'a1:b2:c3:d4:e5:f6' })
  })

  it('should keep fully qualified names as they are', () => {
    const device = deviceFromAnnouncement({ ...MEBO, name: 'Camera-a1b2c3d4e5f6._camera._tcp.local.' })
    expect(device?.name).toBe('Camera-a1b2c3d4e5f6._camera._tcp.local.')
  })

  it('should reject announcements without an IPv4 address', () => {
    expect(deviceFromAnnouncement({ name: 'Camera-x', port: 1, addresses: ['fe80::1'], txt: { ip: 'nope' } })).toBeNull()
  })
})

describe('formatMac', () => {
  it('should insert colons into a bare MAC', () => {
    expect(formatMac('A1B2C3D4E5F6')).toBe('a1:b2:c3:d4:e5:f6')
  })

  it('should leave anything else alone', () => {
    expect(formatMac('a1:b2:c3:d4:e5:f6')).toBe('a1:b2:c3:d4:e5:f6')
    expect(formatMac('xyz')).toBe('xyz')
  })
})
