import { SyncCancelledError, UpstreamRequestError } from '@root/types/errors.js'
import {
  backoffDelay,
  fetchWithRetry,
} from '@services/mirror-sync/fetching/fetch-with-retry.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'

const RETRY = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 60000 }

describe('fetch-with-retry', () => {
  describe('backoffDelay', () => {
    it('should grow by a factor of 1.5 per attempt', () => {
      const middle = () => 0.5
      expect(backoffDelay(0, RETRY, middle)).toBe(1000)
      expect(backoffDelay(1, RETRY, middle)).toBe(1500)
      expect(backoffDelay(2, RETRY, middle)).toBe(2250)
    })

    it('should apply up to 10% jitter either way', () => {
      expect(backoffDelay(1, RETRY, () => 0)).toBe(1350)
      expect(backoffDelay(1, RETRY, () => 1)).toBe(1650)
    })

    it('should never exceed the maximum delay', () => {
      expect(backoffDelay(20, RETRY, () => 1)).toBe(60000)
      expect(backoffDelay(20, RETRY, () => 0)).toBe(54000)
    })
  })

  describe('fetchWithRetry', () => {
    const options = () => ({
      log: createMockLogger(),
      label: 'recipe',
      maxRetries: 2,
      baseDelayMs: 0,
      maxDelayMs: 5,
    })

    it('should return the first successful result', async () => {
      const operation = vi.fn().mockResolvedValue('ok')

      await expect(fetchWithRetry(operation, options())).resolves.toBe('ok')
      expect(operation).toHaveBeenCalledTimes(1)
    })

    it('should retry transient failures', async () => {
      const opts = options()
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new UpstreamRequestError('unavailable', 503))
        .mockResolvedValueOnce('ok')

      await expect(fetchWithRetry(operation, opts)).resolves.toBe('ok')
      expect(operation).toHaveBeenCalledTimes(2)
      expect(opts.log.warn).toHaveBeenCalledWith(
        { status: 503, attempt: 1, delay: 0 },
        'Transient upstream failure fetching recipe, retrying in 0ms',
      )
    })

    it('should cap a server-requested wait at the maximum delay', async () => {
      const opts = options()
      const operation = vi
        .fn()
        .mockRejectedValueOnce(
          new UpstreamRequestError('slow down', 429, { retryAfterMs: 120000 }),
        )
        .mockResolvedValueOnce('ok')

      await expect(fetchWithRetry(operation, opts)).resolves.toBe('ok')
      expect(opts.log.warn).toHaveBeenCalledWith(
        { status: 429, attempt: 1, delay: 5 },
        'Transient upstream failure fetching recipe, retrying in 5ms',
      )
    })

    it('should give up after maxRetries', async () => {
      const error = new UpstreamRequestError('unavailable', 502)
      const operation = vi.fn().mockRejectedValue(error)

      await expect(fetchWithRetry(operation, options())).rejects.toBe(error)
      expect(operation).toHaveBeenCalledTimes(3)
    })

    it('should not retry permanent failures', async () => {
      const notFound = new UpstreamRequestError('missing', 404)
      const operation = vi.fn().mockRejectedValue(notFound)

      await expect(fetchWithRetry(operation, options())).rejects.toBe(notFound)
      expect(operation).toHaveBeenCalledTimes(1)

      const bug = new TypeError('not a function')
      const failing = vi.fn().mockRejectedValue(bug)
      await expect(fetchWithRetry(failing, options())).rejects.toBe(bug)
      expect(failing).toHaveBeenCalledTimes(1)
    })

    it('should stop waiting when the signal aborts', async () => {
      const controller = new AbortController()
      controller.abort()
      const operation = vi
        .fn()
        .mockRejectedValue(new UpstreamRequestError('unavailable', 503))

      await expect(
        fetchWithRetry(operation, {
          ...options(),
          maxDelayMs: 10000,
          baseDelayMs: 10000,
          signal: controller.signal,
        }),
      ).rejects.toBeInstanceOf(SyncCancelledError)
      expect(operation).toHaveBeenCalledTimes(1)
    })
  })
})
