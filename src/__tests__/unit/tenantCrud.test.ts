import { MemoryDocumentStore } from '../../test/memoryStore'
import {
  MAX_LIST_LIMIT,
  createScoped,
  deleteScoped,
  guardStore,
  listScoped,
  parseLimit,
  updateScoped,
} from '../../services/tenantCrud'
import { NotFoundError, StoreUnavailableError, ValidationError } from '../../utils/errors'
import { decodeId } from '../../utils/objectId'

describe('parseLimit', () => {
  it('uses the fallback when absent', () => {
    expect(parseLimit(undefined)).toBe(50)
    expect(parseLimit(undefined, 20)).toBe(20)
    expect(parseLimit('')).toBe(50)
  })

  it('parses positive integers and caps them', () => {
    expect(parseLimit('5')).toBe(5)
    expect(parseLimit('100000')).toBe(MAX_LIST_LIMIT)
  })

  it.each(['0', '-1', '2.5', 'ten'])('rejects %p with a 422', raw => {
    expect(() => parseLimit(raw)).toThrow(ValidationError)
    expect(() => parseLimit(raw)).toThrow('limit must be a positive integer')
  })

  it('rejects repeated query values', () => {
    expect(() => parseLimit(['1', '2'])).toThrow(ValidationError)
  })
})

describe('guardStore', () => {
  it('maps foreign errors to StoreUnavailableError with a truncated message', async () => {
    const long = 'x'.repeat(500)
    const err = await guardStore(() => Promise.reject(new Error(long))).catch(e => e)
    expect(err).toBeInstanceOf(StoreUnavailableError)
    expect(err.status).toBe(503)
    expect(err.message).toBe(`Database unavailable: ${'x'.repeat(200)}`)
  })

  it('passes our own errors through', async () => {
    await expect(guardStore(() => Promise.reject(new NotFoundError()))).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('tenant scoped operations', () => {
  const store = new MemoryDocumentStore()

  beforeEach(() => {
    store.clear()
  })

  it('stamps the resolved tenant over any payload tenant_id', async () => {
    const id = await createScoped(store, 'student', 't1', { first_name: 'Ana', tenant_id: 't2' })
    expect(store.get('student', decodeId(id))).toMatchObject({ first_name: 'Ana', tenant_id: 't1' })
  })

  it('lists only the tenant documents, up to the limit', async () => {
    await createScoped(store, 'teacher', 't1', { first_name: 'A' })
    await createScoped(store, 'teacher', 't1', { first_name: 'B' })
    await createScoped(store, 'teacher', 't2', { first_name: 'C' })

    const all = await listScoped(store, 'teacher', 't1', 50)
    expect(all.map(t => t.first_name)).toEqual(['A', 'B'])
    expect(await listScoped(store, 'teacher', 't1', 1)).toHaveLength(1)
    expect(await listScoped(store, 'teacher', 't3', 50)).toEqual([])
  })

  it('updates only the fields that are present', async () => {
    const id = decodeId(await createScoped(store, 'class', 't1', { name: 'Algebra I', code: 'ALG1', grade_level: '9' }))
    await updateScoped(store, 'class', 't1', id, { name: 'Algebra II', code: undefined, grade_level: null })
    expect(store.get('class', id)).toMatchObject({ name: 'Algebra II', code: 'ALG1', grade_level: '9', tenant_id: 't1' })
  })

  it('never lets an update move a document to another tenant', async () => {
    const id = decodeId(await createScoped(store, 'class', 't1', { name: 'Art', code: 'ART' }))
    await updateScoped(store, 'class', 't1', id, { tenant_id: 't2', name: 'Art 2' })
    expect(store.get('class', id)).toMatchObject({ name: 'Art 2', tenant_id: 't1' })
  })

  it('reports missing documents on update and delete', async () => {
    const id = decodeId(await createScoped(store, 'student', 't1', { first_name: 'Ana' }))
    await expect(updateScoped(store, 'student', 't2', id, { grade: '4' })).rejects.toBeInstanceOf(NotFoundError)
    await expect(updateScoped(store, 'student', 't2', id, {})).rejects.toBeInstanceOf(NotFoundError)
    await expect(deleteScoped(store, 'student', 't2', id)).rejects.toBeInstanceOf(NotFoundError)
    expect(store.get('student', id)).toBeDefined()
  })

  it('accepts an empty patch for an existing document without writing', async () => {
    const id = decodeId(await createScoped(store, 'student', 't1', { first_name: 'Ana' }))
    store.calls.length = 0
    await updateScoped(store, 'student', 't1', id, {})
    expect(store.calls).toEqual(['find:student'])
  })

  it('deletes permanently', async () => {
    const id = decodeId(await createScoped(store, 'student', 't1', { first_name: 'Ana' }))
    await deleteScoped(store, 'student', 't1', id)
    expect(store.get('student', id)).toBeUndefined()
  })

  it('maps store failures to StoreUnavailableError', async () => {
    store.failWith(new Error('connection refused'))
    await expect(listScoped(store, 'student', 't1', 50)).rejects.toThrow('Database unavailable: connection refused')
  })
})
