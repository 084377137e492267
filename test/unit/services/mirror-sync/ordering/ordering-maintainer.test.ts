import type { StoredEntry } from '@root/types/entities.types.js'
import { getEntityDefinition } from '@services/mirror-sync/entities/registry.js'
import { inspectOrdering } from '@services/mirror-sync/ordering/ordering-maintainer.js'
import { describe, expect, it } from 'vitest'
import { emptyReconciliation, photo } from '../../../../helpers/fixtures.js'

const photos = getEntityDefinition('photo')

function storedPhoto(
  id: number,
  uid: string,
  recipeUid: string,
  position: number,
): StoredEntry {
  return {
    id,
    uid,
    key: `key-${uid}`,
    trashed: false,
    scope: JSON.stringify([recipeUid]),
    position,
  }
}

describe('ordering-maintainer', () => {
  describe('inspectOrdering', () => {
    it('should report an inserted row sharing a position', () => {
      const reconciliation = emptyReconciliation(photos)
      reconciliation.toInsert.push(photo('p3', 'r1', 1))

      const result = inspectOrdering(
        photos,
        [storedPhoto(1, 'p1', 'r1', 0), storedPhoto(2, 'p2', 'r1', 1)],
        reconciliation,
      )

      expect(result.reordered).toEqual([])
      expect(result.anomalies).toEqual([
        {
          kind: 'duplicate-position',
          entityType: 'photo',
          scope: '["r1"]',
          position: 1,
          uids: ['p2', 'p3'],
        },
      ])
    })

    it('should list tied members by surrogate key before new rows', () => {
      const reconciliation = emptyReconciliation(photos)
      reconciliation.toInsert.push(photo('pc', 'r1', 0))

      const result = inspectOrdering(
        photos,
        [storedPhoto(5, 'pa', 'r1', 0), storedPhoto(3, 'pb', 'r1', 0)],
        reconciliation,
      )

      expect(result.anomalies).toEqual([
        {
          kind: 'duplicate-position',
          entityType: 'photo',
          scope: '["r1"]',
          position: 0,
          uids: ['pb', 'pa', 'pc'],
        },
      ])
    })

    it('should report position and collection changes as reordered', () => {
      const reconciliation = emptyReconciliation(photos)
      reconciliation.toUpdate.push(photo('p1', 'r2', 0), photo('p2', 'r1', 5))
      reconciliation.toUpdate.push(photo('p3', 'r1', 2, 'new-hash'))

      const result = inspectOrdering(
        photos,
        [
          storedPhoto(1, 'p1', 'r1', 0),
          storedPhoto(2, 'p2', 'r1', 1),
          storedPhoto(3, 'p3', 'r1', 2),
        ],
        reconciliation,
      )

      expect(result.reordered).toEqual(['p1', 'p2'])
      expect(result.anomalies).toEqual([])
    })

    it('should free the position of a removed row', () => {
      const reconciliation = emptyReconciliation(photos)
      reconciliation.toRemove.push('p2')
      reconciliation.toInsert.push(photo('p3', 'r1', 1))

      const result = inspectOrdering(
        photos,
        [storedPhoto(1, 'p1', 'r1', 0), storedPhoto(2, 'p2', 'r1', 1)],
        reconciliation,
      )

      expect(result.anomalies).toEqual([])
    })

    it('should leave collections the batch does not touch alone', () => {
      const reconciliation = emptyReconciliation(photos)
      reconciliation.toInsert.push(photo('p3', 'r1', 0))

      const result = inspectOrdering(
        photos,
        [storedPhoto(1, 'px', 'r9', 0), storedPhoto(2, 'py', 'r9', 0)],
        reconciliation,
      )

      expect(result.anomalies).toEqual([])
    })

    it('should do nothing for unordered types', () => {
      const pantry = getEntityDefinition('pantry_item')

      expect(inspectOrdering(pantry, [], emptyReconciliation(pantry))).toEqual({
        reordered: [],
        anomalies: [],
      })
    })
  })
})
