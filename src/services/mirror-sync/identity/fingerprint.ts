import { createHash } from 'node:crypto'
import type {
  ColumnSpec,
  ColumnValue,
  EntityDefinition,
  EntityRow,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import { MalformedSnapshotError } from '@root/types/errors.js'

const SPACE_SEPARATED = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}(?::?\d{2})?)?$/

/**
 * Parses ISO-8601 strings as well as `YYYY-MM-DD HH:MM:SS[.fff][zone]`, the
 * form used by the source and by PostgreSQL's text output. A missing zone
 * means UTC.
 */
export function parseTimestamp(value: string | number | Date): Date | null {
  let date: Date
  if (value instanceof Date || typeof value === 'number') {
    date = new Date(value)
  } else {
    const match = SPACE_SEPARATED.exec(value.trim())
    if (match) {
      const [, day, time, zone] = match
      const offset = !zone
        ? 'Z'
        : /^[+-]\d{2}$/.test(zone)
          ? `${zone}:00`
          : zone
      date = new Date(`${day}T${time}${offset}`)
    } else {
      date = new Date(value)
    }
  }
  return Number.isNaN(date.getTime()) ? null : date
}

/**
 * Coerces a raw value (from the source or from either database driver) into
 * the canonical form for its column kind. Returns undefined when the value
 * cannot represent the kind.
 *
 * Canonical forms: text → string, integer → safe integer, boolean → boolean,
 * timestamp → ISO-8601 UTC string.
 */
export function normalizeValue(
  column: ColumnSpec,
  value: unknown,
): ColumnValue | undefined {
  if (value === null || value === undefined) {
    return column.nullable ? null : undefined
  }

  switch (column.kind) {
    case 'text':
      if (typeof value === 'string') return value
      if (typeof value === 'number') return String(value)
      return undefined
    case 'integer': {
      const n =
        typeof value === 'number'
          ? value
          : typeof value === 'boolean'
            ? Number(value)
            : typeof value === 'string' && value.trim() !== ''
              ? Number(value)
              : Number.NaN
      return Number.isSafeInteger(n) ? n : undefined
    }
    case 'boolean':
      if (typeof value === 'boolean') return value
      // SQLite stores booleans as 0/1
      if (value === 0 || value === 1) return value === 1
      return undefined
    case 'timestamp': {
      const date =
        value instanceof Date ||
        typeof value === 'string' ||
        typeof value === 'number'
          ? parseTimestamp(value)
          : null
      return date ? date.toISOString() : undefined
    }
  }
}

/**
 * Normalizes every content column of a row, dropping anything not declared
 * on the definition (such as `id`).
 *
 * @throws MalformedSnapshotError when a column is missing or has the wrong shape
 */
export function normalizeRow(
  definition: EntityDefinition,
  uid: string,
  raw: Readonly<Record<string, unknown>>,
): EntityRow {
  const row: Record<string, ColumnValue> = {}
  for (const column of definition.columns) {
    const value = normalizeValue(column, raw[column.name])
    if (value === undefined) {
      throw new MalformedSnapshotError(
        definition.type,
        uid,
        `column ${column.name} is missing or not a valid ${column.kind}`,
      )
    }
    row[column.name] = value
  }
  return row
}

/**
 * Field-equality digest: sha256 over the normalized column values in
 * definition order. Identical for a stored row and an incoming row with the
 * same content.
 */
export function contentDigest(
  definition: EntityDefinition,
  row: EntityRow,
): string {
  const values = definition.columns.map((column) => row[column.name] ?? null)
  return createHash('sha256').update(JSON.stringify(values)).digest('hex')
}

/**
 * Comparison key of an incoming record: the source fingerprint for
 * fingerprinted types, otherwise the content digest.
 *
 * @throws MalformedSnapshotError when neither is derivable
 */
export function comparisonKey(
  definition: EntityDefinition,
  record: SnapshotRecord,
): string {
  if (definition.fingerprintColumn) {
    const fingerprint =
      record.fingerprint ?? record.row?.[definition.fingerprintColumn]
    if (typeof fingerprint !== 'string' || fingerprint === '') {
      throw new MalformedSnapshotError(
        definition.type,
        record.uid,
        'missing fingerprint',
      )
    }
    return fingerprint
  }

  if (!record.row) {
    throw new MalformedSnapshotError(
      definition.type,
      record.uid,
      'record has no content to compare',
    )
  }
  return contentDigest(definition, normalizeRow(definition, record.uid, record.row))
}

/**
 * Comparison key of a stored database row, computed the same way as
 * {@link comparisonKey}.
 */
export function storedComparisonKey(
  definition: EntityDefinition,
  uid: string,
  raw: Readonly<Record<string, unknown>>,
): string {
  if (definition.fingerprintColumn) {
    const fingerprint = raw[definition.fingerprintColumn]
    return typeof fingerprint === 'string' ? fingerprint : ''
  }
  return contentDigest(definition, normalizeRow(definition, uid, raw))
}

/**
 * Serializes the ordering scope of a row into a stable string, or null when
 * the type has no ordering.
 */
export function scopeKey(
  definition: EntityDefinition,
  row: Readonly<Record<string, unknown>>,
): string | null {
  const ordering = definition.ordering
  if (!ordering) return null
  const values = ordering.scope.map((name) => {
    const column = definition.columns.find((c) => c.name === name)
    const value = column ? normalizeValue(column, row[name]) : row[name]
    return value ?? null
  })
  return JSON.stringify(values)
}
