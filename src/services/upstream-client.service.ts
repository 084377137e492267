/**
 * Upstream Client Service
 *
 * HTTP client for the upstream recipe account. Implements the source side of
 * a sync pass:
 * - `GET /sync/status/` gives one change counter per collection; a counter
 *   equal to the stored position means the type is up to date
 * - any other counter triggers a download of the whole collection, which is
 *   returned as a complete snapshot positioned at that counter
 * - recipes are listed as `{ uid, hash }` summaries and hydrated one by one
 *   from `GET /sync/recipe/{uid}/` only when they are about to be written
 *
 * Requests authenticate with a bearer token, either configured directly or
 * obtained once through `POST /account/login/`.
 */
import type {
  EntityDefinition,
  EntityType,
  SnapshotBatch,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import { UpstreamRequestError } from '@root/types/errors.js'
import type { SourceFetchClient } from '@root/types/mirror-sync.types.js'
import {
  UpstreamCollectionSchema,
  UpstreamLoginSchema,
  UpstreamRecipeSchema,
  UpstreamRecipeSummariesSchema,
  UpstreamScalarSchema,
  UpstreamStatusSchema,
  type UpstreamStatus,
} from '@schemas/upstream/upstream.schema.js'
import { getEntityDefinition } from '@services/mirror-sync/entities/registry.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import type { z } from 'zod'

export interface UpstreamClientConfig {
  /** API root, e.g. `https://recipes.example.com/api/v2` */
  baseUrl: string
  token?: string
  email?: string
  password?: string
  timeoutMs: number
  /** Recipe detail requests in flight at once */
  hydrateConcurrency: number
  /** How long one status response answers every type of a pass */
  statusTtlMs?: number
}

/** Collection name of each entity type in the upstream sync API */
export const UPSTREAM_COLLECTIONS: Readonly<Record<EntityType, string>> = {
  recipe: 'recipes',
  category: 'categories',
  aisle: 'groceryaisles',
  grocery_list: 'grocerylists',
  grocery_ingredient: 'groceryingredients',
  meal_type: 'mealtypes',
  menu: 'menus',
  bookmark: 'bookmarks',
  pantry_item: 'pantry',
  photo: 'photos',
  meal: 'meals',
  grocery_item: 'groceries',
  menu_item: 'menuitems',
}

// Column → upstream field, where the names differ
const FIELD_ALIASES: Partial<Record<EntityType, Readonly<Record<string, string>>>> =
  {
    meal: { meal_type: 'type' },
  }

const DEFAULT_STATUS_TTL_MS = 5000
const USER_AGENT = 'recipe-mirror'

export class UpstreamClientService implements SourceFetchClient {
  private readonly log: FastifyBaseLogger
  private readonly baseUrl: string
  private token: string | null
  private tokenRequest: Promise<string> | null = null
  private statusCache: {
    fetchedAt: number
    status: Promise<UpstreamStatus>
  } | null = null

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly config: UpstreamClientConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'UPSTREAM')
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.token = config.token ? config.token : null
  }

  async fetch(
    entityType: EntityType,
    sincePosition: string | null,
  ): Promise<SnapshotBatch> {
    const collection = UPSTREAM_COLLECTIONS[entityType]
    const status = await this.getStatus()
    const counter = status[collection]
    if (counter === undefined) {
      throw new UpstreamRequestError(
        `Upstream status has no counter for ${collection}`,
        200,
        { transient: false },
      )
    }

    const position = String(counter)
    if (sincePosition === position) {
      return { entityType, records: [], position, isComplete: false }
    }

    const records =
      entityType === 'recipe'
        ? await this.fetchRecipeSummaries()
        : await this.fetchCollection(entityType, collection)

    this.log.debug(
      { entityType, position, count: records.length },
      `Fetched ${collection} from upstream`,
    )
    return { entityType, records, position, isComplete: true }
  }

  /**
   * Loads full recipe records for summaries. Other types always arrive with
   * their content and are returned as they are.
   */
  async hydrate(
    entityType: EntityType,
    records: readonly SnapshotRecord[],
  ): Promise<SnapshotRecord[]> {
    if (entityType !== 'recipe') return [...records]

    const limit = pLimit(Math.max(1, this.config.hydrateConcurrency))
    return Promise.all(
      records.map((record) => limit(() => this.fetchRecipe(record.uid))),
    )
  }

  /**
   * Change counters, shared by every type for `statusTtlMs`. A failed request
   * is not cached.
   */
  async getStatus(): Promise<UpstreamStatus> {
    const ttl = this.config.statusTtlMs ?? DEFAULT_STATUS_TTL_MS
    const cached = this.statusCache
    if (cached && this.now() - cached.fetchedAt < ttl) {
      return cached.status
    }

    const status = this.request('/sync/status/', UpstreamStatusSchema).then(
      (body) => body.result,
    )
    const entry = { fetchedAt: this.now(), status }
    this.statusCache = entry
    try {
      return await status
    } catch (error) {
      if (this.statusCache === entry) this.statusCache = null
      throw error
    }
  }

  private async fetchRecipeSummaries(): Promise<SnapshotRecord[]> {
    const body = await this.request(
      '/sync/recipes/',
      UpstreamRecipeSummariesSchema,
    )
    return body.result.map((summary) => ({
      uid: summary.uid,
      fingerprint: summary.hash,
    }))
  }

  private async fetchRecipe(uid: string): Promise<SnapshotRecord> {
    const body = await this.request(
      `/sync/recipe/${encodeURIComponent(uid)}/`,
      UpstreamRecipeSchema,
    )
    const recipe = body.result
    return {
      uid: recipe.uid,
      fingerprint: recipe.hash,
      row: toRow(getEntityDefinition('recipe'), recipe),
      links: { categories: recipe.categories },
    }
  }

  private async fetchCollection(
    entityType: EntityType,
    collection: string,
  ): Promise<SnapshotRecord[]> {
    const definition = getEntityDefinition(entityType)
    const body = await this.request(
      `/sync/${collection}/`,
      UpstreamCollectionSchema,
    )
    return body.result.map((raw) => ({
      uid: raw.uid,
      row: toRow(definition, raw),
    }))
  }

  private async getToken(): Promise<string> {
    if (this.token) return this.token
    if (!this.tokenRequest) {
      this.tokenRequest = this.login().finally(() => {
        this.tokenRequest = null
      })
    }
    return this.tokenRequest
  }

  private async login(): Promise<string> {
    const { email, password } = this.config
    if (!email || !password) {
      throw new UpstreamRequestError(
        'No upstream token or email/password configured',
        401,
        { transient: false },
      )
    }

    this.log.debug('Logging in to upstream account')
    const response = await this.send('/account/login/', {
      method: 'POST',
      body: new URLSearchParams({ email, password }),
    })
    const body = await this.parse(response, '/account/login/', UpstreamLoginSchema)
    this.token = body.result.token
    this.log.info('Obtained upstream access token')
    return this.token
  }

  /**
   * Authenticated GET. A 401 with a token from login drops the token so the
   * next request logs in again.
   */
  private async request<T extends z.ZodType>(
    path: string,
    schema: T,
  ): Promise<z.output<T>> {
    const token = await this.getToken()
    const response = await this.send(path, {
      headers: { Authorization: `Bearer ${token}` },
    })
    if (response.status === 401 && !this.config.token) {
      this.token = null
    }
    return this.parse(response, path, schema)
  }

  private async send(
    path: string,
    init: {
      method?: string
      body?: URLSearchParams
      headers?: Record<string, string>
    },
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}`
    try {
      return await fetch(url, {
        ...init,
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/json',
          ...init.headers,
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.config.timeoutMs}ms`
          : 'network error'
      throw new UpstreamRequestError(
        `Upstream request ${path} failed: ${reason}`,
        0,
        { cause: error },
      )
    }
  }

  private async parse<T extends z.ZodType>(
    response: Response,
    path: string,
    schema: T,
  ): Promise<z.output<T>> {
    if (!response.ok) {
      throw new UpstreamRequestError(
        `Upstream API error on ${path}: ${response.status} ${response.statusText}`,
        response.status,
        { retryAfterMs: parseRetryAfter(response.headers.get('retry-after')) },
      )
    }

    let json: unknown
    try {
      json = await response.json()
    } catch (error) {
      throw new UpstreamRequestError(
        `Upstream response for ${path} is not valid JSON`,
        response.status,
        { cause: error, transient: false },
      )
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new UpstreamRequestError(
        `Upstream response for ${path} has an unexpected shape: ${parsed.error.message}`,
        response.status,
        { cause: parsed.error, transient: false },
      )
    }
    return parsed.data
  }
}

/**
 * Picks the scalar fields that map to columns of the definition. Anything
 * missing is left out and reported when the row is normalized.
 */
export function toRow(
  definition: EntityDefinition,
  raw: Readonly<Record<string, unknown>>,
): Record<string, z.infer<typeof UpstreamScalarSchema>> {
  const aliases = FIELD_ALIASES[definition.type] ?? {}
  const row: Record<string, z.infer<typeof UpstreamScalarSchema>> = {}
  for (const column of definition.columns) {
    const value = UpstreamScalarSchema.safeParse(
      raw[aliases[column.name] ?? column.name],
    )
    if (value.success) row[column.name] = value.data
  }
  return row
}

/**
 * Retry-After as milliseconds; accepts delta-seconds or an HTTP date.
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined
  const seconds = Number(header)
  if (Number.isFinite(seconds) && header.trim() !== '') {
    return Math.max(0, Math.round(seconds * 1000))
  }
  const date = Date.parse(header)
  return Number.isNaN(date) ? undefined : Math.max(0, date - now)
}
