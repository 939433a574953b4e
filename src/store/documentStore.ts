import type { StoreId } from '../utils/objectId'

export type StoredDocument = Record<string, unknown>
export type DocumentFilter = Record<string, unknown>

/**
 * What the handlers need from the database. Filters are plain equality matches on
 * top-level fields; patches replace the listed fields and leave the rest alone.
 */
export interface DocumentStore {
  readonly databaseName?: string
  find(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]>
  insertOne(collection: string, document: StoredDocument): Promise<StoreId>
  updateOne(collection: string, filter: DocumentFilter, patch: StoredDocument): Promise<number>
  deleteOne(collection: string, filter: DocumentFilter): Promise<number>
  listCollectionNames(): Promise<string[]>
}
