import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from './app'
import { RateLimiter } from './domain/services/RateLimiter'
import { InMemoryCounterStore } from './infrastructure/counter-store/InMemoryCounterStore'
import { MINUTE, SECOND } from './domain/models/RateLimiterConfig'

const START = Date.parse('2025-01-01T00:00:00Z')

describe('createApp() [integration]', () => {
  let app: Express

  beforeEach(() => {
    // Only Date is faked so the HTTP stack keeps its real timers
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(START)

    const limiter = new RateLimiter(
      {
        '/': {},
        '/ping': { maxRequests: 5, timeWindow: 1 * MINUTE, slidingWindowInterval: 5 * SECOND },
      },
      new InMemoryCounterStore()
    )
    app = createApp(limiter)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  const ping = (client: string) => request(app).get('/ping').set('X-Forwarded-For', client)

  it('should answer /ping', async () => {
    const response = await ping('u1')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ message: 'pong' })
  })

  it('should reject the sixth /ping inside one bucket and recover after the window', async () => {
    for (let i = 0; i < 5; i++) {
      expect((await ping('u1')).status).toBe(200)
    }

    const rejected = await ping('u1')
    expect(rejected.status).toBe(429)
    expect(rejected.body).toEqual({ error: 'Rate limit exceeded' })

    vi.setSystemTime(START + 65 * SECOND)

    expect((await ping('u1')).status).toBe(200)
  })

  it('should keep quotas per client', async () => {
    for (let i = 0; i < 5; i++) {
      await ping('user-a')
    }

    expect((await ping('user-a')).status).toBe(429)
    expect((await ping('user-b')).status).toBe(200)
  })

  it('should count sub-paths against their first segment', async () => {
    for (let i = 0; i < 5; i++) {
      await request(app).get(`/ping?n=${i}`).set('X-Forwarded-For', 'u1')
    }

    const response = await request(app).get('/ping/extra').set('X-Forwarded-For', 'u1')

    expect(response.status).toBe(429)
  })

  it('should serve the root route under its own limit', async () => {
    for (let i = 0; i < 5; i++) {
      await ping('u1')
    }

    const response = await request(app).get('/').set('X-Forwarded-For', 'u1')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ message: 'Welcome to the rate limiter example!' })
  })
})
