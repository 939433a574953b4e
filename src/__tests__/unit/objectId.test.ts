import { Types } from 'mongoose'
import { decodeId, encodeId } from '../../utils/objectId'
import { ValidationError } from '../../utils/errors'

describe('identifier codec', () => {
  it('decodes a 24 hex character id', () => {
    const id = decodeId('65a1b2c3d4e5f60718293a4b')
    expect(id).toBeInstanceOf(Types.ObjectId)
    expect(encodeId(id)).toBe('65a1b2c3d4e5f60718293a4b')
  })

  it('encodes to lowercase hex', () => {
    expect(encodeId(decodeId('65A1B2C3D4E5F60718293A4B'))).toBe('65a1b2c3d4e5f60718293a4b')
  })

  it.each([
    'not-an-id',
    '65a1b2c3d4e5f60718293a4',
    '65a1b2c3d4e5f60718293a4bc',
    '65a1b2c3d4e5f60718293a4z',
    'abcdefghijkl',
    '',
  ])('rejects %p', raw => {
    expect(() => decodeId(raw)).toThrow(ValidationError)
  })

  it('rejects non-string input', () => {
    expect(() => decodeId(undefined)).toThrow(ValidationError)
    expect(() => decodeId(42)).toThrow(ValidationError)
  })
})
