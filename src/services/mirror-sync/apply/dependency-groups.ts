import type { EntityType } from '@root/types/entities.types.js'
import { getEntityDefinition, referencedTypes } from '../entities/registry.js'

/**
 * Partitions the touched types into connected components of the reference
 * graph, considering only edges between touched types. Types in one
 * component are committed in one transaction. Components keep the order of
 * their first member in `types`, and members keep their input order.
 */
export function groupByDependency(
  types: readonly EntityType[],
): EntityType[][] {
  const touched = [...new Set(types)]
  const parent = new Map<EntityType, EntityType>(
    touched.map((type) => [type, type]),
  )

  const find = (type: EntityType): EntityType => {
    let root = type
    let next = parent.get(root)
    while (next !== undefined && next !== root) {
      root = next
      next = parent.get(root)
    }
    // Path compression
    let current = type
    while (current !== root) {
      const up = parent.get(current) ?? root
      parent.set(current, root)
      current = up
    }
    return root
  }

  for (const type of touched) {
    for (const target of referencedTypes(getEntityDefinition(type))) {
      if (target !== type && parent.has(target)) {
        const a = find(type)
        const b = find(target)
        if (a !== b) parent.set(b, a)
      }
    }
  }

  const groups = new Map<EntityType, EntityType[]>()
  for (const type of touched) {
    const root = find(type)
    const group = groups.get(root)
    if (group) {
      group.push(type)
    } else {
      groups.set(root, [type])
    }
  }
  return [...groups.values()]
}
