/**
 * MeboClient Tests
 *
 * Construction modes, address handling, facade wiring and the connection
 * probe.
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { MeboClient, parseAddress } from '../client'
import {
  ConfigurationError,
  DiscoveryTimeoutError,
  ProtocolError,
  type Logger,
  type ServiceAnnouncement,
} from '../types'

const silent: Logger = { debug: () => undefined, info: () => undefined, warn: () => undefined, error: () => undefined }

type Reply = { status?: number; body?: string } | Error

function stubFetch(...replies: Reply[]) {
  const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
  for (const reply of replies) {
    if (reply instanceof Error) {
      fetchMock.mockRejectedValueOnce(reply)
    } else {
      fetchMock.mockResolvedValueOnce(new Response(reply.body ?? '', { status: reply.status ?? 200 }))
    }
  }
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

/** Browser that announces the given services as soon as it starts */
function announcingBrowser(...services: ServiceAnnouncement[]) {
  return {
    start: vi.fn((_type: string, onService: (service: ServiceAnnouncement) => void) => {
      for (const service of services) onService(service)
    }),
    destroy: vi.fn(),
  }
}

describe('parseAddress', () => {
  it.each([
    ['192.168.1.10', { host: '192.168.1.10', port: 80 }],
    ['192.168.1.10:8080', { host: '192.168.1.10', port: 8080 }],
  ])('should parse %s', (input, expected) => {
    expect(parseAddress(input)).toEqual(expected)
  })

  it('should accept address objects', () => {
    expect(parseAddress({ host: '10.0.0.2' })).toEqual({ host: '10.0.0.2', port: 80 })
    expect(parseAddress({ host: '10.0.0.2', port: 81 })).toEqual({ host: '10.0.0.2', port: 81 })
  })

  it.each(['', 'foobarbaz', '192.168.1.1/24', '256.100.100.100', '2001:0db8:85a3:0000:0000:8a2e:0370:7334', '10.0.0.1:'])(
    'should reject %j',
    (input) => {
      expect(() => parseAddress(input)).toThrow(ConfigurationError)
    }
  )

  it('should reject ports out of range', () => {
    expect(() => parseAddress({ host: '10.0.0.1', port: 70000 })).toThrow('70000 is not a valid port')
  })
})

describe('MeboClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
    vi.useRealTimers()
  })

  it('should use an explicit address', () => {
    const client = new MeboClient({ address: '192.168.1.10', logger: silent })
    expect(client.endpoint).toBe('http://192.168.1.10')
    expect(client.address).toEqual({ host: '192.168.1.10', port: 80 })
    expect(client.device).toBeNull()
  })

  it('should skip discovery when connecting with an address', async () => {
    const browser = announcingBrowser()
    const client = await MeboClient.connect({ address: { host: '10.0.0.9', port: 8080 }, browser, logger: silent })
    expect(client.endpoint).toBe('http://10.0.0.9:8080')
    expect(browser.start).not.toHaveBeenCalled()
  })

  it('should discover the robot when no address is given', async () => {
    const browser = announcingBrowser({
      name: 'Camera-a1b2c3d4e5f6',
      port: 6667,
      txt: { ip: '192.168.1.50', mac: 'a1b2c3d4e5f6' },
    })

    const client = await MeboClient.connect({ browser, logger: silent })

    expect(client.address).toEqual({ host: '192.168.1.50', port: 80 })
    expect(client.device?.mac).toBe('a1:b2:c3:d4:e5:f6')
    expect(browser.destroy).toHaveBeenCalledTimes(1)
  })

  it('should propagate DiscoveryTimeoutError after the configured timeout', async () => {
    vi.useFakeTimers()
    const fetchMock = stubFetch()
    const connecting = MeboClient.connect({ browser: announcingBrowser(), discoveryTimeoutMs: 750, logger: silent })
    const assertion = expect(connecting).rejects.toBeInstanceOf(DiscoveryTimeoutError)

    await vi.advanceTimersByTimeAsync(750)

    await assertion
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('should build each facade once, on first use', () => {
    const client = new MeboClient({ address: '192.168.1.10', logger: silent })
    expect(client.arm).toBe(client.arm)
    expect(client.claw).toBe(client.claw)
    expect(client.wrist).toBe(client.wrist)
    expect(client.wheels).toBe(client.wheels)
    expect(client.speaker).toBe(client.speaker)
    expect(client.system).toBe(client.system)
  })

  it('should route every facade through the same session', async () => {
    const fetchMock = stubFetch({ body: '' }, { body: '' }, { body: '' })
    const client = new MeboClient({ address: '192.168.1.10', logger: silent })
    const urls: string[] = []
    client.on('request', ({ url }) => urls.push(url))

    await client.arm.up()
    await client.claw.close({ duration: 400 })
    await client.move('w', { speed: 10 })

    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(urls).toEqual([
      'http://192.168.1.10/?req=s_up',
      'http://192.168.1.10/?req=c_close&dur=1000',
      'http://192.168.1.10/?req=move_left&dur=1000&value=10',
    ])
  })

  it('should offer turn and stop shortcuts', async () => {
    const fetchMock = stubFetch({ body: '' }, { body: '' })
    const client = new MeboClient({ address: '192.168.1.10', logger: silent })

    await client.turn('left')
    await client.stop()

    expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
      'http://192.168.1.10/?req=inch_left',
      'http://192.168.1.10/?req=fb_stop',
    ])
  })

  describe('isConnected', () => {
    it('should be true when the version query succeeds', async () => {
      stubFetch({ body: 'get_version:03.02.37' })
      await expect(new MeboClient({ address: '192.168.1.10', logger: silent }).isConnected()).resolves.toBe(true)
    })

    it('should be false when the robot is unreachable', async () => {
      stubFetch(new TypeError('fetch failed'))
      await expect(new MeboClient({ address: '192.168.1.10', logger: silent }).isConnected()).resolves.toBe(false)
    })

    it('should be false when the robot answers with an error status', async () => {
      stubFetch({ status: 404 })
      await expect(new MeboClient({ address: '192.168.1.10', logger: silent }).isConnected()).resolves.toBe(false)
    })

    it('should not mistake an empty 200 for the robot', async () => {
      stubFetch({ body: '' })
      await expect(new MeboClient({ address: '192.168.1.10', logger: silent }).isConnected()).rejects.toBeInstanceOf(
        ProtocolError
      )
    })

    it('should rethrow protocol mismatches', async () => {
      stubFetch({ body: '<html>\n</html>' })
      await expect(new MeboClient({ address: '192.168.1.10', logger: silent }).isConnected()).rejects.toBeInstanceOf(
        ProtocolError
      )
    })
  })

  it('should stop reporting events after off', async () => {
    stubFetch({ body: '' }, { body: '' })
    const client = new MeboClient({ address: '192.168.1.10', logger: silent })
    const onResponse = vi.fn()
    client.on('response', onResponse)
    await client.stop()
    client.off('response', onResponse)
    await client.stop()
    expect(onResponse).toHaveBeenCalledTimes(1)
  })
})
