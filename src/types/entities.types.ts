export const ENTITY_TYPES = [
  'recipe',
  'category',
  'aisle',
  'grocery_list',
  'grocery_ingredient',
  'meal_type',
  'menu',
  'bookmark',
  'pantry_item',
  'photo',
  'meal',
  'grocery_item',
  'menu_item',
] as const

export type EntityType = (typeof ENTITY_TYPES)[number]

export type ColumnKind = 'text' | 'integer' | 'boolean' | 'timestamp'

export interface ColumnSpec {
  name: string
  kind: ColumnKind
  nullable?: boolean
}

export type ColumnValue = string | number | boolean | null

/** Content columns of one entity, keyed by column name. Never contains `id`. */
export type EntityRow = Readonly<Record<string, ColumnValue>>

export interface ReferenceSpec {
  column: string
  target: EntityType
}

/**
 * Many-to-many association stored in its own junction table and rewritten
 * together with its owner row.
 */
export interface LinkSpec {
  /** Key in `SnapshotRecord.links` */
  name: string
  table: string
  ownerColumn: string
  targetColumn: string
  target: EntityType
}

export type DeletionPolicy =
  | { kind: 'implicit-omission' }
  | { kind: 'explicit-flag'; column: string }
  | { kind: 'both'; column: string }

export interface OrderingSpec {
  column: string
  /** Columns whose values identify one collection; empty for a single global collection */
  scope: readonly string[]
}

export interface EntityDefinition {
  type: EntityType
  table: string
  columns: readonly ColumnSpec[]
  /** Column holding the source-supplied fingerprint; absent means field-equality digest */
  fingerprintColumn?: string
  references: readonly ReferenceSpec[]
  links: readonly LinkSpec[]
  deletion: DeletionPolicy
  ordering?: OrderingSpec
  /** Self-reference forming a tree that must stay acyclic */
  parentColumn?: string
}

/**
 * One record as delivered by the source. Summary feeds carry only the uid and
 * fingerprint; `row` is filled in by hydration before anything is written.
 */
export interface SnapshotRecord {
  uid: string
  fingerprint?: string
  row?: EntityRow
  links?: Readonly<Record<string, readonly string[]>>
}

export interface SnapshotBatch {
  entityType: EntityType
  records: readonly SnapshotRecord[]
  /** Opaque position to store once this batch commits */
  position: string
  /** True when the records are the full current state of the type */
  isComplete: boolean
}

/** Stored state of one row as seen by the reconciler */
export interface StoredEntry {
  id: number
  uid: string
  key: string
  trashed: boolean
  /** Serialized ordering scope, null when the type is unordered */
  scope: string | null
  position: number | null
}

export interface CollectionMember {
  id: number
  uid: string
  position: number | null
  row: EntityRow
}
