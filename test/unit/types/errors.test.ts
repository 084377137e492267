import {
  isStoreConnectivityError,
  MalformedSnapshotError,
  ReferentialIntegrityError,
  SyncInProgressError,
  UpstreamRequestError,
} from '@root/types/errors.js'
import { describe, expect, it } from 'vitest'

describe('errors', () => {
  describe('UpstreamRequestError', () => {
    it('should treat network failures, 408, 429 and 5xx as transient', () => {
      for (const status of [0, 408, 429, 500, 503]) {
        expect(new UpstreamRequestError('x', status).transient).toBe(true)
      }
      for (const status of [400, 401, 404]) {
        expect(new UpstreamRequestError('x', status).transient).toBe(false)
      }
    })

    it('should let the caller override the classification', () => {
      const error = new UpstreamRequestError('bad body', 500, {
        transient: false,
      })

      expect(error.transient).toBe(false)
      expect(error).toBeInstanceOf(UpstreamRequestError)
      expect(error.name).toBe('UpstreamRequestError')
    })
  })

  describe('ReferentialIntegrityError', () => {
    it('should summarize the first violation', () => {
      const error = new ReferentialIntegrityError([
        {
          entityType: 'meal',
          uid: 'm1',
          column: 'type_uid',
          referencedType: 'meal_type',
          referencedUid: null,
        },
        {
          entityType: 'photo',
          uid: 'p1',
          column: 'recipe_uid',
          referencedType: 'recipe',
          referencedUid: 'r1',
        },
      ])

      expect(error.message).toBe(
        'Referential integrity check failed with 2 violation(s), first: meal.type_uid -> meal_type(?)',
      )
      expect(error.entityTypes).toEqual(['meal', 'photo'])
    })
  })

  it('should name the record in malformed snapshot errors', () => {
    expect(new MalformedSnapshotError('aisle', 'a1', 'missing uid').message).toBe(
      'Malformed aisle record a1: missing uid',
    )
    expect(new MalformedSnapshotError('aisle', null, 'missing uid').message).toBe(
      'Malformed aisle record: missing uid',
    )
  })

  it('should carry a default message for a concurrent pass', () => {
    expect(new SyncInProgressError().message).toBe(
      'A sync pass is already running',
    )
  })

  describe('isStoreConnectivityError', () => {
    it('should recognize driver connection codes', () => {
      const refused = Object.assign(new Error('connect failed'), {
        code: 'ECONNREFUSED',
      })
      const busy = Object.assign(new Error('database is locked'), {
        code: 'SQLITE_BUSY',
      })
      const timeout = new Error('pool exhausted')
      timeout.name = 'KnexTimeoutError'

      expect(isStoreConnectivityError(refused)).toBe(true)
      expect(isStoreConnectivityError(busy)).toBe(true)
      expect(isStoreConnectivityError(timeout)).toBe(true)
    })

    it('should ignore constraint and application errors', () => {
      const constraint = Object.assign(new Error('FOREIGN KEY constraint failed'), {
        code: 'SQLITE_CONSTRAINT_FOREIGNKEY',
      })

      expect(isStoreConnectivityError(constraint)).toBe(false)
      expect(isStoreConnectivityError(new Error('boom'))).toBe(false)
      expect(isStoreConnectivityError('ECONNREFUSED')).toBe(false)
    })
  })
})
