import { groupByDependency } from '@services/mirror-sync/apply/dependency-groups.js'
import { describe, expect, it } from 'vitest'

describe('dependency-groups', () => {
  describe('groupByDependency', () => {
    it('should join types connected through references and links', () => {
      expect(
        groupByDependency(['recipe', 'category', 'meal', 'meal_type', 'bookmark']),
      ).toEqual([['recipe', 'category', 'meal', 'meal_type'], ['bookmark']])
    })

    it('should only follow edges between touched types', () => {
      expect(groupByDependency(['meal', 'bookmark'])).toEqual([
        ['meal'],
        ['bookmark'],
      ])
    })

    it('should group a referencing type with several targets', () => {
      expect(
        groupByDependency(['aisle', 'grocery_list', 'grocery_item']),
      ).toEqual([['aisle', 'grocery_list', 'grocery_item']])
    })

    it('should ignore self references and repeated types', () => {
      expect(groupByDependency(['category', 'category'])).toEqual([
        ['category'],
      ])
    })
  })
})
