import type { Knex } from 'knex'

/**
 * Creates every mirrored entity table, the recipe/category junction and
 * the per-type sync position table.
 *
 * Cross-references are by uid, never by surrogate id. Foreign keys are
 * named `fk_<table>_<column>` so later migrations can address them.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('sync_status', (table) => {
    table.string('name', 64).primary()
    table.text('position').notNullable()
    table.timestamp('updated_at', { useTz: true }).notNullable()
  })

  await knex.schema.createTable('recipe', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.text('ingredients').notNullable()
    table.text('directions').notNullable()
    table.text('description')
    table.text('notes').notNullable()
    table.text('cook_time')
    table.text('prep_time')
    table.text('total_time')
    table.text('servings')
    table.text('scale')
    table.text('difficulty')
    table.integer('rating').notNullable()
    table.timestamp('created', { useTz: true }).notNullable()
    table.text('source')
    table.text('source_url')
    table.text('image_url')
    table.text('photo')
    table.text('photo_hash')
    table.text('photo_large')
    table.text('photo_url')
    table.boolean('is_pinned').notNullable()
    table.boolean('on_favorites').notNullable()
    table.boolean('on_grocery_list').notNullable()
    table.boolean('in_trash').notNullable()
    table.text('hash').notNullable()
  })

  await knex.schema.createTable('category', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.integer('order_flag').notNullable()
    table.string('parent_uid')
    table
      .foreign('parent_uid', 'fk_category_parent_uid')
      .references('uid')
      .inTable('category')
    table.index(['parent_uid', 'order_flag'])
  })

  await knex.schema.createTable('recipe_category', (table) => {
    table.increments('id')
    table.string('recipe_uid').notNullable()
    table.string('category_uid').notNullable()
    table
      .foreign('recipe_uid', 'fk_recipe_category_recipe_uid')
      .references('uid')
      .inTable('recipe')
    table
      .foreign('category_uid', 'fk_recipe_category_category_uid')
      .references('uid')
      .inTable('category')
    table.unique(['recipe_uid', 'category_uid'])
    table.index('category_uid')
  })

  await knex.schema.createTable('aisle', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.integer('order_flag').notNullable()
  })

  await knex.schema.createTable('grocery_list', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.integer('order_flag').notNullable()
    table.boolean('is_default').notNullable()
    table.text('reminders_list').notNullable()
  })

  await knex.schema.createTable('grocery_ingredient', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.string('aisle_uid')
    table
      .foreign('aisle_uid', 'fk_grocery_ingredient_aisle_uid')
      .references('uid')
      .inTable('aisle')
  })

  await knex.schema.createTable('meal_type', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.integer('order_flag').notNullable()
    table.text('color').notNullable()
    table.boolean('export_all_day').notNullable()
    table.integer('export_time').notNullable()
    table.integer('original_type').notNullable()
  })

  await knex.schema.createTable('menu', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.text('notes').notNullable()
    table.integer('order_flag').notNullable()
    table.integer('days').notNullable()
  })

  await knex.schema.createTable('bookmark', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('title').notNullable()
    table.text('url').notNullable()
    table.integer('order_flag').notNullable()
  })

  await knex.schema.createTable('pantry_item', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('ingredient').notNullable()
    table.text('aisle').notNullable()
    table.string('aisle_uid').notNullable()
    table.text('quantity').notNullable()
    table.boolean('in_stock').notNullable()
    table.boolean('has_expiration').notNullable()
    table.timestamp('expiration_date', { useTz: true })
    table.timestamp('purchase_date', { useTz: true }).notNullable()
    table
      .foreign('aisle_uid', 'fk_pantry_item_aisle_uid')
      .references('uid')
      .inTable('aisle')
  })

  await knex.schema.createTable('photo', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.text('filename').notNullable()
    table.string('recipe_uid').notNullable()
    table.integer('order_flag').notNullable()
    table.text('hash').notNullable()
    table
      .foreign('recipe_uid', 'fk_photo_recipe_uid')
      .references('uid')
      .inTable('recipe')
    table.index(['recipe_uid', 'order_flag'])
  })

  await knex.schema.createTable('meal', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.string('recipe_uid').notNullable()
    table.string('type_uid').notNullable()
    table.integer('meal_type').notNullable()
    table.timestamp('date', { useTz: true }).notNullable()
    table.integer('order_flag').notNullable()
    table
      .foreign('recipe_uid', 'fk_meal_recipe_uid')
      .references('uid')
      .inTable('recipe')
    table
      .foreign('type_uid', 'fk_meal_type_uid')
      .references('uid')
      .inTable('meal_type')
    table.index(['date', 'type_uid', 'order_flag'])
  })

  await knex.schema.createTable('grocery_item', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.text('ingredient').notNullable()
    table.text('quantity').notNullable()
    table.text('instruction').notNullable()
    table.text('aisle').notNullable()
    table.string('aisle_uid').notNullable()
    table.string('list_uid').notNullable()
    table.text('recipe')
    table.string('recipe_uid')
    table.integer('order_flag').notNullable()
    table.boolean('purchased').notNullable()
    table.boolean('separate').notNullable()
    table
      .foreign('recipe_uid', 'fk_grocery_item_recipe_uid')
      .references('uid')
      .inTable('recipe')
    table
      .foreign('aisle_uid', 'fk_grocery_item_aisle_uid')
      .references('uid')
      .inTable('aisle')
    table
      .foreign('list_uid', 'fk_grocery_item_list_uid')
      .references('uid')
      .inTable('grocery_list')
    table.index(['list_uid', 'order_flag'])
  })

  await knex.schema.createTable('menu_item', (table) => {
    table.increments('id')
    table.string('uid').notNullable().unique()
    table.text('name').notNullable()
    table.string('recipe_uid').notNullable()
    table.string('menu_uid').notNullable()
    table.string('type_uid').notNullable()
    table.integer('day').notNullable()
    table.integer('order_flag').notNullable()
    table
      .foreign('recipe_uid', 'fk_menu_item_recipe_uid')
      .references('uid')
      .inTable('recipe')
    table
      .foreign('menu_uid', 'fk_menu_item_menu_uid')
      .references('uid')
      .inTable('menu')
    table
      .foreign('type_uid', 'fk_menu_item_type_uid')
      .references('uid')
      .inTable('meal_type')
    table.index(['menu_uid', 'order_flag'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('menu_item')
  await knex.schema.dropTableIfExists('grocery_item')
  await knex.schema.dropTableIfExists('meal')
  await knex.schema.dropTableIfExists('photo')
  await knex.schema.dropTableIfExists('pantry_item')
  await knex.schema.dropTableIfExists('bookmark')
  await knex.schema.dropTableIfExists('menu')
  await knex.schema.dropTableIfExists('meal_type')
  await knex.schema.dropTableIfExists('grocery_ingredient')
  await knex.schema.dropTableIfExists('grocery_list')
  await knex.schema.dropTableIfExists('aisle')
  await knex.schema.dropTableIfExists('recipe_category')
  await knex.schema.dropTableIfExists('category')
  await knex.schema.dropTableIfExists('recipe')
  await knex.schema.dropTableIfExists('sync_status')
}
