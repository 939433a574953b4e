import { Types } from 'mongoose'
import { ValidationError } from './errors'

export type StoreId = Types.ObjectId

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/

/**
 * Parse a client supplied id. Only the 24 hex character form is accepted, so a
 * malformed id never reaches the driver.
 */
export const decodeId = (raw: unknown): StoreId => {
  if (typeof raw !== 'string' || !OBJECT_ID_PATTERN.test(raw)) {
    throw new ValidationError('invalid_id', `Invalid identifier: ${String(raw).slice(0, 64)}`)
  }
  return new Types.ObjectId(raw)
}

export const encodeId = (id: StoreId) => id.toHexString()

export const isStoreId = (value: unknown): value is StoreId => value instanceof Types.ObjectId

export const newStoreId = (): StoreId => new Types.ObjectId()
