import type {
  ColumnSpec,
  EntityDefinition,
  EntityType,
} from '@root/types/entities.types.js'

const text = (name: string, nullable = false): ColumnSpec => ({
  name,
  kind: 'text',
  nullable,
})
const integer = (name: string): ColumnSpec => ({ name, kind: 'integer' })
const boolean = (name: string): ColumnSpec => ({ name, kind: 'boolean' })
const timestamp = (name: string, nullable = false): ColumnSpec => ({
  name,
  kind: 'timestamp',
  nullable,
})

const IMPLICIT = { kind: 'implicit-omission' } as const

/**
 * Every mirrored entity type. Array order is the order in which a pass
 * visits the types and the order of tables in reports.
 */
export const ENTITY_DEFINITIONS: readonly EntityDefinition[] = [
  {
    type: 'recipe',
    table: 'recipe',
    columns: [
      text('name'),
      text('ingredients'),
      text('directions'),
      text('description', true),
      text('notes'),
      text('cook_time', true),
      text('prep_time', true),
      text('total_time', true),
      text('servings', true),
      text('scale', true),
      text('difficulty', true),
      integer('rating'),
      timestamp('created'),
      text('source', true),
      text('source_url', true),
      text('image_url', true),
      text('photo', true),
      text('photo_hash', true),
      text('photo_large', true),
      text('photo_url', true),
      boolean('is_pinned'),
      boolean('on_favorites'),
      boolean('on_grocery_list'),
      boolean('in_trash'),
      text('hash'),
    ],
    fingerprintColumn: 'hash',
    references: [],
    links: [
      {
        name: 'categories',
        table: 'recipe_category',
        ownerColumn: 'recipe_uid',
        targetColumn: 'category_uid',
        target: 'category',
      },
    ],
    deletion: { kind: 'both', column: 'in_trash' },
  },
  {
    type: 'category',
    table: 'category',
    columns: [text('name'), integer('order_flag'), text('parent_uid', true)],
    references: [{ column: 'parent_uid', target: 'category' }],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: ['parent_uid'] },
    parentColumn: 'parent_uid',
  },
  {
    type: 'aisle',
    table: 'aisle',
    columns: [text('name'), integer('order_flag')],
    references: [],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: [] },
  },
  {
    type: 'grocery_list',
    table: 'grocery_list',
    columns: [
      text('name'),
      integer('order_flag'),
      boolean('is_default'),
      text('reminders_list'),
    ],
    references: [],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: [] },
  },
  {
    type: 'grocery_ingredient',
    table: 'grocery_ingredient',
    columns: [text('name'), text('aisle_uid', true)],
    references: [{ column: 'aisle_uid', target: 'aisle' }],
    links: [],
    deletion: IMPLICIT,
  },
  {
    type: 'meal_type',
    table: 'meal_type',
    columns: [
      text('name'),
      integer('order_flag'),
      text('color'),
      boolean('export_all_day'),
      integer('export_time'),
      integer('original_type'),
    ],
    references: [],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: [] },
  },
  {
    type: 'menu',
    table: 'menu',
    columns: [text('name'), text('notes'), integer('order_flag'), integer('days')],
    references: [],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: [] },
  },
  {
    type: 'bookmark',
    table: 'bookmark',
    columns: [text('title'), text('url'), integer('order_flag')],
    references: [],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: [] },
  },
  {
    type: 'pantry_item',
    table: 'pantry_item',
    columns: [
      text('ingredient'),
      text('aisle'),
      text('aisle_uid'),
      text('quantity'),
      boolean('in_stock'),
      boolean('has_expiration'),
      timestamp('expiration_date', true),
      timestamp('purchase_date'),
    ],
    references: [{ column: 'aisle_uid', target: 'aisle' }],
    links: [],
    deletion: IMPLICIT,
  },
  {
    type: 'photo',
    table: 'photo',
    columns: [
      text('name'),
      text('filename'),
      text('recipe_uid'),
      integer('order_flag'),
      text('hash'),
    ],
    references: [{ column: 'recipe_uid', target: 'recipe' }],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: ['recipe_uid'] },
  },
  {
    type: 'meal',
    table: 'meal',
    columns: [
      text('name'),
      text('recipe_uid'),
      text('type_uid'),
      integer('meal_type'),
      timestamp('date'),
      integer('order_flag'),
    ],
    references: [
      { column: 'recipe_uid', target: 'recipe' },
      { column: 'type_uid', target: 'meal_type' },
    ],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: ['date', 'type_uid'] },
  },
  {
    type: 'grocery_item',
    table: 'grocery_item',
    columns: [
      text('name'),
      text('ingredient'),
      text('quantity'),
      text('instruction'),
      text('aisle'),
      text('aisle_uid'),
      text('list_uid'),
      text('recipe', true),
      text('recipe_uid', true),
      integer('order_flag'),
      boolean('purchased'),
      boolean('separate'),
    ],
    references: [
      { column: 'recipe_uid', target: 'recipe' },
      { column: 'aisle_uid', target: 'aisle' },
      { column: 'list_uid', target: 'grocery_list' },
    ],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: ['list_uid'] },
  },
  {
    type: 'menu_item',
    table: 'menu_item',
    columns: [
      text('name'),
      text('recipe_uid'),
      text('menu_uid'),
      text('type_uid'),
      integer('day'),
      integer('order_flag'),
    ],
    references: [
      { column: 'recipe_uid', target: 'recipe' },
      { column: 'menu_uid', target: 'menu' },
      { column: 'type_uid', target: 'meal_type' },
    ],
    links: [],
    deletion: IMPLICIT,
    ordering: { column: 'order_flag', scope: ['menu_uid'] },
  },
]

const BY_TYPE = new Map<EntityType, EntityDefinition>(
  ENTITY_DEFINITIONS.map((definition) => [definition.type, definition]),
)

export function getEntityDefinition(type: EntityType): EntityDefinition {
  const definition = BY_TYPE.get(type)
  if (!definition) {
    throw new Error(`No entity definition registered for ${type}`)
  }
  return definition
}

/**
 * Every type the given type points at, through plain references or links.
 * Includes the type itself when it references itself.
 */
export function referencedTypes(definition: EntityDefinition): EntityType[] {
  const targets = new Set<EntityType>()
  for (const reference of definition.references) targets.add(reference.target)
  for (const link of definition.links) targets.add(link.target)
  return [...targets]
}
