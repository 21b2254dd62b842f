import http from 'node:http'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import request from 'supertest'

import { createApp } from '../../src/app.js'
import { createGateway, type Gateway } from '../../src/gateway.js'
import type { GatewayConfig } from '../../src/config/index.js'
import { keyIdentity } from '../../src/middleware/auth.js'
import { BackendClient } from '../../src/services/backendClient.js'
import { KeyRegistry } from '../../src/services/keyRegistry.js'
import { MetricsCollector } from '../../src/services/metrics.js'
import { RateLimiter } from '../../src/services/rateLimiter.js'
import { MemoryRateLimitStore } from '../../src/services/rateLimitStore.js'
import { createTestBackend, sendJson, urlOf, SAMPLE_STATUS, type TestBackend } from './testBackend.js'

const silentLogger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() }

const configFor = (backendUrl: string): GatewayConfig => ({
  env: 'test',
  host: '127.0.0.1',
  port: 0,
  backend: { url: backendUrl, timeoutMs: 2000 },
  rateLimit: { idleTtlMs: 60_000, sweepIntervalMs: 60_000 },
  apiKeyPrefix: 'gw',
  maxIssuedKeys: 1000,
  corsOrigin: '*',
  collectDefaultMetrics: false,
})

async function listen(server: http.Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  return urlOf(server)
}

describe('gateway against a live backend', () => {
  let backend: TestBackend
  let gateway: Gateway

  beforeEach(async () => {
    backend = await createTestBackend()
    gateway = createGateway(configFor(backend.url), silentLogger)
  })

  afterEach(async () => {
    await gateway.close()
    await backend.close()
  })

  it('relays the backend body byte for byte', async () => {
    const payload = '{"chains":{"bitcoin":{"status":"ok","peers":8,"message":"synced"}}}'
    backend.setHandler((_req, res) => {
      res.writeHead(200, { 'content-type': 'application/json' })
      res.end(payload)
    })

    const response = await request(gateway.app).get('/chains').set('Authorization', 'Bearer demo-key-pro')

    expect(response.status).toBe(200)
    expect(response.text).toBe(payload)
    expect(response.headers['content-type']).toBe('application/json')
  })

  it('keeps the caller credential away from the backend', async () => {
    await request(gateway.app)
      .post('/orders?limit=5')
      .set('Authorization', 'Bearer demo-key-pro')
      .set('Cookie', 'session=abc')
      .set('Content-Type', 'application/json')
      .send('{"amount":3}')

    expect(backend.requests).toHaveLength(1)
    const [seen] = backend.requests
    expect(seen.method).toBe('POST')
    expect(seen.url).toBe('/orders?limit=5')
    expect(seen.body).toBe('{"amount":3}')
    expect(seen.headers.authorization).toBeUndefined()
    expect(seen.headers.cookie).toBe('session=abc')
    expect(seen.headers['x-forwarded-for']).toMatch(/127\.0\.0\.1$/)
  })

  it('passes backend error statuses through', async () => {
    backend.setHandler((_req, res) => sendJson(res, 404, { detail: 'Not Found' }))

    const response = await request(gateway.app).get('/nowhere').set('Authorization', 'Bearer demo-key-free')

    expect(response.status).toBe(404)
    expect(response.body).toEqual({ detail: 'Not Found' })
  })

  it('enriches /status with gateway data', async () => {
    const response = await request(gateway.app).get('/status').set('Authorization', 'Bearer demo-key-enterprise')

    expect(response.status).toBe(200)
    expect(response.body.data.chains).toEqual(SAMPLE_STATUS.chains)
    expect(response.body.data.gateway_version).toBe('2.5.0')
    expect(response.body.tier).toBe('enterprise')
  })

  it('answers 503 at the deadline when the backend hangs', async () => {
    backend.setHandler((_req, res) => {
      const timer = setTimeout(() => sendJson(res, 200, { late: true }), 5000)
      res.on('close', () => clearTimeout(timer))
    })

    const started = Date.now()
    const response = await request(gateway.app).get('/slow').set('Authorization', 'Bearer demo-key-pro')
    const elapsed = Date.now() - started

    expect(response.status).toBe(503)
    expect(response.body.message).toBe('Backend did not respond within 2000ms')
    expect(elapsed).toBeGreaterThanOrEqual(1900)
    expect(elapsed).toBeLessThan(4000)
    expect(gateway.limiter.inFlightCount(keyIdentity('demo-key-pro'))).toBe(0)
  })

  it('answers 503 when the backend refuses connections', async () => {
    const offline = createGateway(configFor('http://127.0.0.1:1'), silentLogger)

    try {
      const response = await request(offline.app).get('/chains').set('Authorization', 'Bearer demo-key-pro')

      expect(response.status).toBe(503)
      expect(response.body.message).toMatch(/^Backend unavailable: /)
      expect(offline.limiter.inFlightCount(keyIdentity('demo-key-pro'))).toBe(0)
    } finally {
      await offline.close()
    }
  })

  it('frees the slot and records 499 when the caller disconnects', async () => {
    backend.setHandler((_req, res) => {
      const timer = setTimeout(() => sendJson(res, 200, { late: true }), 5000)
      res.on('close', () => clearTimeout(timer))
    })
    const server = http.createServer(gateway.app)
    const url = await listen(server)
    const identity = keyIdentity('demo-key-pro')

    try {
      const client = http.get(`${url}/slow`, { headers: { authorization: 'Bearer demo-key-pro' } })
      // the socket is destroyed on purpose below
      client.on('error', () => undefined)

      await vi.waitFor(() => expect(backend.requests).toHaveLength(1))
      expect(gateway.limiter.inFlightCount(identity)).toBe(1)
      client.destroy()

      await vi.waitFor(async () => {
        expect(await gateway.metrics.requestCount('GET', '/slow', 'pro', 499)).toBe(1)
      })
      expect(gateway.limiter.inFlightCount(identity)).toBe(0)
      expect(gateway.limiter.activeIdentities()).toBe(0)
    } finally {
      server.closeAllConnections()
      await new Promise<void>((resolve) => server.close(() => resolve()))
    }
  })
})

describe('free tier over ten seconds', () => {
  let backend: TestBackend
  let client: BackendClient

  beforeEach(async () => {
    backend = await createTestBackend()
    client = new BackendClient({ baseUrl: backend.url, timeoutMs: 2000 })
  })

  afterEach(async () => {
    client.close()
    await backend.close()
  })

  it('lets 20 of 25 requests through and rejects the rest with Retry-After', async () => {
    let now = 0
    const metrics = new MetricsCollector()
    const app = createApp({
      registry: new KeyRegistry(),
      limiter: new RateLimiter(new MemoryRateLimitStore(), { clock: () => now }),
      metrics,
      backend: client,
      logger: silentLogger,
    })

    const statuses: number[] = []
    const retryAfter: string[] = []
    for (let i = 0; i < 25; i++) {
      now = i * 400
      const response = await request(app).get('/data').set('Authorization', 'Bearer demo-key-free')
      statuses.push(response.status)
      if (response.status === 429) {
        retryAfter.push(response.headers['retry-after'])
      }
    }

    expect(statuses.slice(0, 20)).toEqual(Array(20).fill(200))
    expect(statuses.slice(20)).toEqual([429, 429, 429, 429, 429])
    expect(retryAfter.every((value) => Number(value) > 0)).toBe(true)
    expect(backend.requests).toHaveLength(20)
    expect(await metrics.rateLimitHitCount('free')).toBe(5)
  })
})
