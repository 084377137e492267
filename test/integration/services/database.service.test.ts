import type {
  EntityType,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import { ReferentialIntegrityError } from '@root/types/errors.js'
import type { ApplyEntry } from '@root/types/mirror-sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { BatchApplier } from '@services/mirror-sync/apply/batch-applier.js'
import { CommitLock } from '@services/mirror-sync/apply/commit-lock.js'
import { getEntityDefinition } from '@services/mirror-sync/entities/registry.js'
import { ProgressTracker } from '@services/mirror-sync/progress/progress-tracker.js'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import {
  createTestDatabase,
  destroyTestDatabase,
  resetDatabase,
} from '../../helpers/database.js'
import {
  category,
  emptyReconciliation,
  meal,
  mealType,
  photo,
  recipe,
} from '../../helpers/fixtures.js'
import { createMockLogger } from '../../mocks/logger.js'

function insertEntry(
  type: EntityType,
  records: SnapshotRecord[],
  position: string | null = null,
): ApplyEntry {
  const definition = getEntityDefinition(type)
  return {
    definition,
    reconciliation: { ...emptyReconciliation(definition), toInsert: records },
    position,
  }
}

describe('DatabaseService', () => {
  let db: DatabaseService
  let applier: BatchApplier

  beforeAll(async () => {
    db = await createTestDatabase()
  })

  afterAll(async () => {
    await destroyTestDatabase(db)
  })

  beforeEach(async () => {
    await resetDatabase(db)
    applier = new BatchApplier({
      db,
      progress: new ProgressTracker(db),
      lock: new CommitLock(),
      logger: createMockLogger(),
    })
  })

  it('should answer a ping', async () => {
    expect(await db.ping()).toBe(true)
  })

  describe('sync positions', () => {
    it('should return null for a type never synced', async () => {
      expect(await db.getSyncPosition('recipe')).toBeNull()
      expect(await db.getSyncPositions()).toEqual({})
    })

    it('should store positions verbatim and overwrite them', async () => {
      await db.knex.transaction((trx) =>
        db.setSyncPosition(trx, 'recipe', '0042'),
      )
      await db.knex.transaction((trx) =>
        db.setSyncPosition(trx, 'bookmark', 'cursor:abc'),
      )
      await db.knex.transaction((trx) =>
        db.setSyncPosition(trx, 'bookmark', 'cursor:abd'),
      )

      expect(await db.getSyncPosition('recipe')).toBe('0042')
      const positions = await db.getSyncPositions()
      expect(Object.keys(positions)).toEqual(['bookmark', 'recipe'])
      expect(positions.bookmark?.position).toBe('cursor:abd')
      expect(positions.bookmark?.updatedAt).toMatch(
        /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
      )
    })

    it('should discard a position whose transaction rolls back', async () => {
      await expect(
        db.knex.transaction(async (trx) => {
          await db.setSyncPosition(trx, 'aisle', '7')
          throw new Error('boom')
        }),
      ).rejects.toThrow('boom')

      expect(await db.getSyncPosition('aisle')).toBeNull()
    })
  })

  describe('batch applier', () => {
    it('should write rows in any order when references resolve by commit', async () => {
      const result = await applier.apply([
        insertEntry('photo', [photo('p1', 'r1', 0)], '3'),
        insertEntry('recipe', [recipe('r1', 'h1', {}, ['c1'])], '9'),
        insertEntry('category', [category('c1', 0)]),
      ])

      expect(result).toEqual({
        entityTypes: ['photo', 'recipe', 'category'],
        inserted: 3,
        updated: 0,
        removed: 0,
        anomalies: [],
      })
      expect(await db.getSyncPosition('photo')).toBe('3')
      expect(await db.getSyncPosition('recipe')).toBe('9')
      expect(await db.getSyncPosition('category')).toBeNull()
    })

    it('should roll back everything when a reference dangles', async () => {
      const error = await applier
        .apply([
          insertEntry('recipe', [recipe('r1', 'h1')], '1'),
          insertEntry('photo', [photo('p1', 'r1', 0), photo('p2', 'r2', 1)], '2'),
        ])
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ReferentialIntegrityError)
      expect(error instanceof ReferentialIntegrityError && error.violations)
        .toEqual([
          {
            entityType: 'photo',
            uid: 'p2',
            column: 'recipe_uid',
            referencedType: 'recipe',
            referencedUid: 'r2',
          },
        ])
      expect(await db.knex('recipe').count({ n: '*' })).toEqual([{ n: 0 }])
      expect(await db.getSyncPositions()).toEqual({})
    })

    it('should remove rows together with their junction rows', async () => {
      await applier.apply([
        insertEntry('category', [category('c1', 0)]),
        insertEntry('recipe', [recipe('r1', 'h1', {}, ['c1'])]),
      ])

      const definition = getEntityDefinition('recipe')
      const result = await applier.apply([
        {
          definition,
          reconciliation: {
            ...emptyReconciliation(definition),
            toRemove: ['r1'],
          },
          position: '5',
        },
      ])

      expect(result.removed).toBe(1)
      expect(await db.knex('recipe_category').select('*')).toEqual([])
      expect(await db.getSyncPosition('recipe')).toBe('5')
    })

    it('should report parent cycles after the write', async () => {
      const result = await applier.apply([
        insertEntry('category', [
          category('x', 0, 'z'),
          category('y', 1, 'x'),
          category('z', 2, 'y'),
          category('root', 0),
        ]),
      ])

      expect(result.anomalies).toEqual([
        {
          kind: 'category-cycle',
          entityType: 'category',
          uids: ['x', 'z', 'y'],
        },
      ])
    })
  })

  describe('stored entries', () => {
    it('should expose comparison key, flag, scope and position', async () => {
      await applier.apply([
        insertEntry('recipe', [recipe('r1', 'h1', { in_trash: true })]),
        insertEntry('photo', [photo('p1', 'r1', 4)]),
      ])

      expect(await db.getStoredEntries(getEntityDefinition('recipe'))).toEqual([
        {
          id: 1,
          uid: 'r1',
          key: 'h1',
          trashed: true,
          scope: null,
          position: null,
        },
      ])

      const [entry] = await db.getStoredEntries(getEntityDefinition('photo'))
      expect(entry).toMatchObject({
        uid: 'p1',
        trashed: false,
        scope: '["r1"]',
        position: 4,
      })
      expect(entry?.key).toMatch(/^[0-9a-f]{64}$/)
    })
  })

  describe('listCollection', () => {
    it('should order members by position, then surrogate key', async () => {
      await applier.apply([
        insertEntry('category', [
          category('c1', 2),
          category('c2', 1),
          category('c3', 1),
          category('child', 0, 'c1'),
        ]),
      ])

      const roots = await db.listCollection(getEntityDefinition('category'), {
        parent_uid: null,
      })
      expect(roots.map((member) => [member.uid, member.position])).toEqual([
        ['c2', 1],
        ['c3', 1],
        ['c1', 2],
      ])

      const children = await db.listCollection(
        getEntityDefinition('category'),
        { parent_uid: 'c1' },
      )
      expect(children).toEqual([
        {
          id: 4,
          uid: 'child',
          position: 0,
          row: { name: 'Category child', order_flag: 0, parent_uid: 'c1' },
        },
      ])
    })

    it('should match timestamp scope values in any accepted form', async () => {
      await applier.apply([
        insertEntry('recipe', [recipe('r1', 'h1')]),
        insertEntry('meal_type', [mealType('t1', 0)]),
        insertEntry('meal', [
          meal('m1', 'r1', 't1', 1),
          meal('m2', 'r1', 't1', 0),
          meal('m3', 'r1', 't1', 0, '2024-02-02T00:00:00.000Z'),
        ]),
      ])

      const members = await db.listCollection(getEntityDefinition('meal'), {
        date: '2024-02-01 00:00:00',
        type_uid: 't1',
      })
      expect(members.map((member) => member.uid)).toEqual(['m2', 'm1'])
    })
  })
})
