import { setTimeout as sleep } from 'node:timers/promises'
import { SyncCancelledError, UpstreamRequestError } from '@root/types/errors.js'
import type { RetryOptions } from '@root/types/mirror-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Exponential backoff (factor 1.5) with ±10% jitter, clamped to
 * `[0, maxDelayMs]`.
 *
 * @param attempt - Zero-based index of the retry about to happen
 */
export function backoffDelay(
  attempt: number,
  options: RetryOptions,
  random: () => number = Math.random,
): number {
  let delay = Math.min(options.baseDelayMs * 1.5 ** attempt, options.maxDelayMs)

  // Apply jitter (±10%) to avoid thundering herd
  const jitter = delay * 0.1
  delay += random() * jitter * 2 - jitter

  return Math.round(Math.min(Math.max(delay, 0), options.maxDelayMs))
}

export interface FetchWithRetryOptions extends RetryOptions {
  log: FastifyBaseLogger
  /** Shown in retry log lines, e.g. the entity type */
  label: string
  signal?: AbortSignal
}

/**
 * Runs `operation`, retrying transient upstream failures (network errors,
 * timeouts, 429 and 5xx) up to `maxRetries` times. Anything else is thrown
 * straight away.
 *
 * @throws SyncCancelledError when the signal aborts while waiting
 */
export async function fetchWithRetry<T>(
  operation: () => Promise<T>,
  options: FetchWithRetryOptions,
): Promise<T> {
  const { log, label, signal } = options

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation()
    } catch (error) {
      if (
        !(error instanceof UpstreamRequestError) ||
        !error.transient ||
        attempt >= options.maxRetries
      ) {
        throw error
      }

      const delay = Math.min(
        error.retryAfterMs ?? backoffDelay(attempt, options),
        options.maxDelayMs,
      )
      log.warn(
        { status: error.status, attempt: attempt + 1, delay },
        `Transient upstream failure fetching ${label}, retrying in ${delay}ms`,
      )

      try {
        await sleep(delay, undefined, { signal })
      } catch (sleepError) {
        if (signal?.aborted) throw new SyncCancelledError()
        throw sleepError
      }
    }
  }
}
