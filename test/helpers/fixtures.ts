import type {
  ColumnValue,
  EntityDefinition,
  EntityRow,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import type { Reconciliation } from '@root/types/mirror-sync.types.js'

type Overrides = Readonly<Record<string, ColumnValue>>

export const CREATED_AT = '2024-01-15T08:30:00.000Z'

export function recipeRow(overrides: Overrides = {}): EntityRow {
  return {
    name: 'Test recipe',
    ingredients: '1 cup flour',
    directions: 'Mix and bake',
    description: null,
    notes: '',
    cook_time: null,
    prep_time: null,
    total_time: null,
    servings: null,
    scale: null,
    difficulty: null,
    rating: 0,
    created: CREATED_AT,
    source: null,
    source_url: null,
    image_url: null,
    photo: null,
    photo_hash: null,
    photo_large: null,
    photo_url: null,
    is_pinned: false,
    on_favorites: false,
    on_grocery_list: false,
    in_trash: false,
    hash: 'hash-default',
    ...overrides,
  }
}

/**
 * Full recipe record; the fingerprint and the `hash` column agree.
 */
export function recipe(
  uid: string,
  hash: string,
  overrides: Overrides = {},
  categories: readonly string[] = [],
): SnapshotRecord {
  return {
    uid,
    fingerprint: hash,
    row: recipeRow({ ...overrides, hash }),
    links: { categories },
  }
}

/** Summary as listed by a fingerprint-only feed */
export function recipeSummary(uid: string, hash: string): SnapshotRecord {
  return { uid, fingerprint: hash }
}

export function category(
  uid: string,
  orderFlag: number,
  parentUid: string | null = null,
  name = `Category ${uid}`,
): SnapshotRecord {
  return {
    uid,
    row: { name, order_flag: orderFlag, parent_uid: parentUid },
  }
}

export function aisle(
  uid: string,
  orderFlag: number,
  name = `Aisle ${uid}`,
): SnapshotRecord {
  return { uid, row: { name, order_flag: orderFlag } }
}

export function groceryList(uid: string, orderFlag: number): SnapshotRecord {
  return {
    uid,
    row: {
      name: `List ${uid}`,
      order_flag: orderFlag,
      is_default: false,
      reminders_list: '',
    },
  }
}

export function groceryItem(
  uid: string,
  listUid: string,
  aisleUid: string,
  orderFlag: number,
  recipeUid: string | null = null,
): SnapshotRecord {
  return {
    uid,
    row: {
      name: `Item ${uid}`,
      ingredient: `Item ${uid}`,
      quantity: '1',
      instruction: '',
      aisle: `Aisle ${aisleUid}`,
      aisle_uid: aisleUid,
      list_uid: listUid,
      recipe: null,
      recipe_uid: recipeUid,
      order_flag: orderFlag,
      purchased: false,
      separate: false,
    },
  }
}

export function mealType(uid: string, orderFlag: number): SnapshotRecord {
  return {
    uid,
    row: {
      name: `Type ${uid}`,
      order_flag: orderFlag,
      color: '#E36C0C',
      export_all_day: false,
      export_time: 0,
      original_type: 0,
    },
  }
}

export function meal(
  uid: string,
  recipeUid: string,
  typeUid: string,
  orderFlag: number,
  date = '2024-02-01T00:00:00.000Z',
): SnapshotRecord {
  return {
    uid,
    row: {
      name: `Meal ${uid}`,
      recipe_uid: recipeUid,
      type_uid: typeUid,
      meal_type: 0,
      date,
      order_flag: orderFlag,
    },
  }
}

export function photo(
  uid: string,
  recipeUid: string,
  orderFlag: number,
  hash = `photo-hash-${uid}`,
): SnapshotRecord {
  return {
    uid,
    row: {
      name: `Photo ${uid}`,
      filename: `${uid}.jpg`,
      recipe_uid: recipeUid,
      order_flag: orderFlag,
      hash,
    },
  }
}

export function bookmark(uid: string, orderFlag: number): SnapshotRecord {
  return {
    uid,
    row: {
      title: `Bookmark ${uid}`,
      url: `https://example.com/${uid}`,
      order_flag: orderFlag,
    },
  }
}

/** Reconciliation with no writes; tests fill in the lists they need */
export function emptyReconciliation(
  definition: EntityDefinition,
): Reconciliation {
  return {
    entityType: definition.type,
    toInsert: [],
    toUpdate: [],
    unchanged: [],
    toRemove: [],
    trashed: [],
    restored: [],
    reordered: [],
    anomalies: [],
  }
}
