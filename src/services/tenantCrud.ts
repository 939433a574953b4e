import { z, ZodTypeAny } from 'zod'
import type { DocumentStore, StoredDocument } from '../store/documentStore'
import { AppError, NotFoundError, ValidationError, toStoreUnavailable } from '../utils/errors'
import { StoreId, encodeId } from '../utils/objectId'
import { PublicDocument, shapeDocuments } from '../utils/shape'

export const DEFAULT_LIST_LIMIT = 50
export const MAX_LIST_LIMIT = 500

/** Runs a store call; our own errors pass through, anything else becomes a 503. */
export async function guardStore<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof AppError) throw err
    throw toStoreUnavailable(err)
  }
}

export const parseLimit = (raw: unknown, fallback = DEFAULT_LIST_LIMIT) => {
  if (raw === undefined || raw === '') return fallback
  const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : NaN
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError('invalid_limit', 'limit must be a positive integer', 422)
  }
  return Math.min(value, MAX_LIST_LIMIT)
}

export const validatePayload = <S extends ZodTypeAny>(schema: S, body: unknown): z.output<S> => {
  const parsed = schema.safeParse(body ?? {})
  if (!parsed.success) throw ValidationError.fromZod(parsed.error)
  return parsed.data
}

const scopedFilter = (tenantId: string, id?: StoreId) => (id ? { _id: id, tenant_id: tenantId } : { tenant_id: tenantId })

const presentFields = (patch: object): StoredDocument =>
  Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined && v !== null))

export const listScoped = async (store: DocumentStore, collection: string, tenantId: string, limit: number): Promise<PublicDocument[]> => {
  const docs = await guardStore(() => store.find(collection, scopedFilter(tenantId), limit))
  return shapeDocuments(docs)
}

/** Any tenant_id in the payload is overwritten by the resolved tenant. */
export const createScoped = async (store: DocumentStore, collection: string, tenantId: string, payload: object): Promise<string> => {
  const document: StoredDocument = { ...presentFields(payload), tenant_id: tenantId }
  const id = await guardStore(() => store.insertOne(collection, document))
  return encodeId(id)
}

export const updateScoped = async (store: DocumentStore, collection: string, tenantId: string, id: StoreId, patch: object): Promise<void> => {
  const fields = presentFields(patch)
  delete fields.tenant_id
  delete fields._id
  const filter = scopedFilter(tenantId, id)

  const matched = await guardStore(async () => {
    if (Object.keys(fields).length === 0) {
      const existing = await store.find(collection, filter, 1)
      return existing.length
    }
    return store.updateOne(collection, filter, fields)
  })
  if (matched === 0) throw new NotFoundError(`No ${collection} ${encodeId(id)} for this tenant`)
}

export const deleteScoped = async (store: DocumentStore, collection: string, tenantId: string, id: StoreId): Promise<void> => {
  const deleted = await guardStore(() => store.deleteOne(collection, scopedFilter(tenantId, id)))
  if (deleted === 0) throw new NotFoundError(`No ${collection} ${encodeId(id)} for this tenant`)
}
