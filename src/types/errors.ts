import type { EntityType } from './entities.types.js'

/**
 * Base class for every error raised by the mirror. Keeps the prototype chain
 * intact after down-emit so `instanceof` checks hold.
 */
abstract class MirrorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * HTTP failure talking to the upstream account API.
 * `status` is 0 when no response was received.
 */
export class UpstreamRequestError extends MirrorError {
  readonly status: number
  readonly transient: boolean
  /** Server-requested wait from a Retry-After header */
  readonly retryAfterMs?: number

  constructor(
    message: string,
    status: number,
    options?: { cause?: unknown; transient?: boolean; retryAfterMs?: number },
  ) {
    super(message, options)
    this.status = status
    this.transient =
      options?.transient ?? UpstreamRequestError.isTransientStatus(status)
    this.retryAfterMs = options?.retryAfterMs
  }

  static isTransientStatus(status: number): boolean {
    return status === 0 || status === 408 || status === 429 || status >= 500
  }
}

export interface IntegrityViolation {
  entityType: string
  /** Uid of the referencing row, when it could be resolved */
  uid: string | null
  column: string
  referencedType: string
  referencedUid: string | null
}

/**
 * Raised inside a batch transaction when a reference does not resolve at
 * commit time. The transaction is rolled back.
 */
export class ReferentialIntegrityError extends MirrorError {
  readonly violations: readonly IntegrityViolation[]

  constructor(
    violations: readonly IntegrityViolation[],
    options?: { cause?: unknown },
  ) {
    const first = violations[0]
    const summary = first
      ? `${first.entityType}.${first.column} -> ${first.referencedType}(${first.referencedUid ?? '?'})`
      : 'unknown reference'
    super(
      `Referential integrity check failed with ${violations.length} violation(s), first: ${summary}`,
      options,
    )
    this.violations = violations
  }

  get entityTypes(): string[] {
    return [...new Set(this.violations.map((v) => v.entityType))]
  }
}

/**
 * Record in a fetched batch lacks its uid, its comparison key or its content.
 */
export class MalformedSnapshotError extends MirrorError {
  readonly entityType: EntityType
  readonly uid: string | null

  constructor(entityType: EntityType, uid: string | null, reason: string) {
    super(`Malformed ${entityType} record${uid ? ` ${uid}` : ''}: ${reason}`)
    this.entityType = entityType
    this.uid = uid
  }
}

/**
 * The local store could not be reached. Aborts the whole pass.
 */
export class StoreUnavailableError extends MirrorError {}

export class SyncCancelledError extends MirrorError {
  constructor(message = 'Sync pass cancelled') {
    super(message)
  }
}

export class SyncInProgressError extends MirrorError {
  constructor(message = 'A sync pass is already running') {
    super(message)
  }
}

const STORE_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'SQLITE_BUSY',
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  '57P01', // admin_shutdown
  '08006', // connection_failure
  '08001', // sqlclient_unable_to_establish_sqlconnection
])

/**
 * Classifies a raw driver error as a connectivity failure of the store.
 */
export function isStoreConnectivityError(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  if (error.name === 'KnexTimeoutError') return true
  const code = 'code' in error ? error.code : undefined
  return typeof code === 'string' && STORE_ERROR_CODES.has(code)
}
