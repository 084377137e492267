import { UPSTREAM_COLLECTIONS } from '@services/upstream-client.service.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'
import { gate } from '../../helpers/async.js'
import { recipeRow } from '../../helpers/fixtures.js'
import {
  createUpstreamAccount,
  type UpstreamAccount,
  UPSTREAM_BASE_URL,
  upstreamHandlers,
} from '../../mocks/upstream-handlers.js'
import { server } from '../../setup/msw-setup.js'

const everyCounterAt = (value: number) =>
  Object.fromEntries(
    Object.values(UPSTREAM_COLLECTIONS).map((collection) => [collection, value]),
  )

describe('Sync routes', () => {
  let account: UpstreamAccount

  beforeEach(() => {
    account = createUpstreamAccount({
      status: everyCounterAt(1),
      collections: {
        categories: [
          { uid: 'c1', name: 'Dinner', order_flag: 0, parent_uid: null },
        ],
      },
      recipes: [
        {
          ...recipeRow({ name: 'Soup', hash: 'h1' }),
          uid: 'r1',
          categories: ['c1'],
        },
      ],
    })
    server.use(...upstreamHandlers(account))
  })

  describe('POST /v1/sync', () => {
    it('should run a pass and return its report', async (t) => {
      const app = await build(t)

      const res = await app.inject({ method: 'POST', url: '/v1/sync', payload: {} })

      expect(res.statusCode).toBe(200)
      const body = res.json()
      expect(body.failures).toEqual([])
      expect(body.cancelled).toBe(false)
      expect(body.hadChanges).toBe(true)
      expect(body.totals.added).toBe(2)
      expect(body.entities).toHaveLength(13)
      expect(body.entities[0]).toEqual({
        entityType: 'recipe',
        status: 'applied',
        position: '1',
        counts: {
          added: 1,
          changed: 0,
          removed: 0,
          unchanged: 0,
          trashed: 0,
          restored: 0,
          reordered: 0,
        },
      })
      expect(account.hits['/sync/recipe/r1/']).toBe(1)
    })

    it('should run every type when the request has no body', async (t) => {
      const app = await build(t)

      const res = await app.inject({ method: 'POST', url: '/v1/sync' })

      expect(res.statusCode).toBe(200)
      expect(res.json().entities).toHaveLength(13)
      expect(res.json().totals.added).toBe(2)
    })

    it('should report nothing to do on a second pass', async (t) => {
      const app = await build(t)
      await app.inject({ method: 'POST', url: '/v1/sync' })

      const res = await app.inject({ method: 'POST', url: '/v1/sync' })

      expect(res.statusCode).toBe(200)
      expect(res.json().hadChanges).toBe(false)
      expect(account.hits['/sync/recipes/']).toBe(1)
    })

    it('should restrict the pass to the requested types', async (t) => {
      const app = await build(t)

      const res = await app.inject({
        method: 'POST',
        url: '/v1/sync',
        payload: { types: ['bookmark', 'aisle'] },
      })

      expect(res.statusCode).toBe(200)
      expect(
        res.json().entities.map((e: { entityType: string }) => e.entityType),
      ).toEqual(['aisle', 'bookmark'])
      expect(account.hits['/sync/recipes/']).toBeUndefined()
    })

    it('should reject an unknown entity type', async (t) => {
      const app = await build(t)

      const res = await app.inject({
        method: 'POST',
        url: '/v1/sync',
        payload: { types: ['recipes'] },
      })

      expect(res.statusCode).toBe(400)
    })

    it('should answer 409 while a pass is running', async (t) => {
      const release = gate()
      server.use(
        http.get(`${UPSTREAM_BASE_URL}/sync/status/`, async () => {
          await release.promise
          return HttpResponse.json({ result: everyCounterAt(1) })
        }),
      )
      const app = await build(t)

      const first = app.inject({
        method: 'POST',
        url: '/v1/sync',
        payload: { types: ['aisle'] },
      })
      await vi.waitFor(() => {
        expect(app.mirrorSync.isRunning).toBe(true)
      })

      const res = await app.inject({ method: 'POST', url: '/v1/sync' })
      expect(res.statusCode).toBe(409)
      expect(res.json()).toMatchObject({
        statusCode: 409,
        error: 'Conflict',
        message: 'A sync pass is already running',
      })

      release.open()
      expect((await first).statusCode).toBe(200)
    })
  })

  describe('GET /v1/sync/status', () => {
    it('should report an empty state before the first pass', async (t) => {
      const app = await build(t)

      const res = await app.inject({ method: 'GET', url: '/v1/sync/status' })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({
        running: false,
        positions: {},
        lastResult: null,
        schedule: null,
      })
    })

    it('should list stored positions and the last report', async (t) => {
      const app = await build(t)
      await app.inject({
        method: 'POST',
        url: '/v1/sync',
        payload: { types: ['category'] },
      })

      const body = (
        await app.inject({ method: 'GET', url: '/v1/sync/status' })
      ).json()

      expect(Object.keys(body.positions)).toEqual(['category'])
      expect(body.positions.category.position).toBe('1')
      expect(body.lastResult.totals.added).toBe(1)
    })
  })
})
