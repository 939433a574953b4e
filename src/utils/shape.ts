import type { StoredDocument } from '../store/documentStore'
import { encodeId, isStoreId } from './objectId'

export type PublicDocument = Record<string, unknown> & { id?: string }

export function shapeDocument(doc: StoredDocument): PublicDocument
export function shapeDocument(doc: null | undefined): null | undefined
export function shapeDocument(doc: StoredDocument | null | undefined): PublicDocument | null | undefined
export function shapeDocument(doc: StoredDocument | null | undefined) {
  if (!doc) return doc
  const { _id, tenant_id: _tenant, ...rest } = doc
  const out: PublicDocument = { ...rest }
  if (_id !== undefined) out.id = isStoreId(_id) ? encodeId(_id) : String(_id)
  return out
}

export const shapeDocuments = (docs: StoredDocument[]) => docs.map(d => shapeDocument(d))
