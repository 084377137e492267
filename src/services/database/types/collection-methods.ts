import type {
  CollectionMember,
  EntityDefinition,
} from '@root/types/entities.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // COLLECTIONS
    /**
     * Members of one collection ordered by position, then surrogate key
     */
    listCollection(
      definition: EntityDefinition,
      scope?: Readonly<Record<string, string | null>>,
    ): Promise<CollectionMember[]>
  }
}
