import mongoose, { Connection } from 'mongoose'
import type { DocumentFilter, DocumentStore, StoredDocument } from './documentStore'
import { newStoreId } from '../utils/objectId'

export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: Connection = mongoose.connection) {}

  get databaseName() {
    return this.connection.name || undefined
  }

  private collection(name: string) {
    if (this.connection.readyState !== 1) throw new Error('MongoDB is not connected')
    return this.connection.collection(name)
  }

  async find(collection: string, filter: DocumentFilter, limit: number) {
    const docs = await this.collection(collection).find(filter).limit(limit).toArray()
    return docs.map((d): StoredDocument => ({ ...d }))
  }

  async insertOne(collection: string, document: StoredDocument) {
    const _id = newStoreId()
    await this.collection(collection).insertOne({ ...document, _id })
    return _id
  }

  async updateOne(collection: string, filter: DocumentFilter, patch: StoredDocument) {
    const result = await this.collection(collection).updateOne(filter, { $set: patch })
    return result.matchedCount
  }

  async deleteOne(collection: string, filter: DocumentFilter) {
    const result = await this.collection(collection).deleteOne(filter)
    return result.deletedCount
  }

  async listCollectionNames() {
    const db = this.connection.db
    if (!db) throw new Error('MongoDB is not connected')
    const collections = await db.listCollections({}, { nameOnly: true }).toArray()
    return collections.map(c => c.name)
  }
}
