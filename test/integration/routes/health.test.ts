import type { HealthCheckResponse } from '@schemas/health/health.schema.js'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('Health Endpoint', () => {
  it('should return 200 and healthy status', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/health',
    })

    expect(response.statusCode).toBe(200)

    const body = response.json<HealthCheckResponse>()
    expect(body.status).toBe('healthy')
    expect(body.uptimeSeconds).toBeGreaterThanOrEqual(0)
    expect(body.timestamp).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
    )
  })

  it('should not require a Spotify token', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/health',
    })

    expect(response.statusCode).toBe(200)
  })

  it('should be served at the root only', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/v1/playlists/health',
      headers: { authorization: 'Bearer test-token' },
    })

    expect(response.statusCode).toBe(404)
  })
})

describe('Unknown routes', () => {
  it('should answer with a 404 error payload', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/missing?token=abc',
    })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: 'Route GET /missing not found',
    })
  })
})
