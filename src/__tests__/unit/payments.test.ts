import { MemoryDocumentStore } from '../../test/memoryStore'
import { markInvoicePaid } from '../../services/payments'
import { INVOICE_COLLECTION } from '../../models/FeeInvoice'
import { encodeId } from '../../utils/objectId'

describe('markInvoicePaid', () => {
  const store = new MemoryDocumentStore()

  beforeEach(() => {
    store.clear()
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('marks the invoice paid by id alone', async () => {
    const id = await store.insertOne(INVOICE_COLLECTION, { tenant_id: 't2', student_id: 's1', amount: 500, status: 'open' })
    await expect(markInvoicePaid(store, encodeId(id))).resolves.toBe(true)
    expect(store.get(INVOICE_COLLECTION, id)).toMatchObject({ status: 'paid', amount: 500, tenant_id: 't2' })
  })

  it('swallows a malformed id', async () => {
    await expect(markInvoicePaid(store, 'not-an-id')).resolves.toBe(false)
    expect(store.calls).toEqual([])
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('swallows a missing invoice', async () => {
    await expect(markInvoicePaid(store, '65a1b2c3d4e5f60718293a4b')).resolves.toBe(false)
  })

  it('swallows store failures', async () => {
    store.failWith(new Error('socket closed'))
    await expect(markInvoicePaid(store, '65a1b2c3d4e5f60718293a4b')).resolves.toBe(false)
  })
})
