import type { Knex } from 'knex'
import { isPostgreSQL } from '../utils/clientDetection.js'

const FOREIGN_KEYS: ReadonlyArray<[table: string, constraint: string]> = [
  ['category', 'fk_category_parent_uid'],
  ['recipe_category', 'fk_recipe_category_recipe_uid'],
  ['recipe_category', 'fk_recipe_category_category_uid'],
  ['grocery_ingredient', 'fk_grocery_ingredient_aisle_uid'],
  ['pantry_item', 'fk_pantry_item_aisle_uid'],
  ['photo', 'fk_photo_recipe_uid'],
  ['meal', 'fk_meal_recipe_uid'],
  ['meal', 'fk_meal_type_uid'],
  ['grocery_item', 'fk_grocery_item_recipe_uid'],
  ['grocery_item', 'fk_grocery_item_aisle_uid'],
  ['grocery_item', 'fk_grocery_item_list_uid'],
  ['menu_item', 'fk_menu_item_recipe_uid'],
  ['menu_item', 'fk_menu_item_menu_uid'],
  ['menu_item', 'fk_menu_item_type_uid'],
]

/**
 * Makes every foreign key deferrable on PostgreSQL so a batch can switch to
 * commit-time checking with `SET CONSTRAINTS ALL DEFERRED`.
 *
 * SQLite has no per-constraint deferral; batches use
 * `PRAGMA defer_foreign_keys` there instead, so nothing to do.
 */
export async function up(knex: Knex): Promise<void> {
  if (!isPostgreSQL(knex)) {
    return
  }

  for (const [table, constraint] of FOREIGN_KEYS) {
    await knex.raw(
      'ALTER TABLE ?? ALTER CONSTRAINT ?? DEFERRABLE INITIALLY IMMEDIATE',
      [table, constraint],
    )
  }
}

export async function down(knex: Knex): Promise<void> {
  if (!isPostgreSQL(knex)) {
    return
  }

  for (const [table, constraint] of FOREIGN_KEYS) {
    await knex.raw('ALTER TABLE ?? ALTER CONSTRAINT ?? NOT DEFERRABLE', [
      table,
      constraint,
    ])
  }
}
