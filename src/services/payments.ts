import type { DocumentStore } from '../store/documentStore'
import { INVOICE_COLLECTION, InvoiceStatus } from '../models/FeeInvoice'
import { decodeId } from '../utils/objectId'

const PAID: InvoiceStatus = 'paid'

/**
 * Best-effort: flips the referenced invoice to paid, looked up by id only. Amounts are
 * not compared and the tenant is not checked. Every failure is logged and dropped; a
 * payment is recorded whatever happens to the invoice.
 */
export const markInvoicePaid = async (store: DocumentStore, invoiceId: string): Promise<boolean> => {
  try {
    const matched = await store.updateOne(INVOICE_COLLECTION, { _id: decodeId(invoiceId) }, { status: PAID })
    if (matched === 0) console.warn(`payment: invoice ${invoiceId} not found, status left unchanged`)
    return matched > 0
  } catch (err) {
    console.warn(`payment: could not mark invoice ${invoiceId} paid:`, err instanceof Error ? err.message : err)
    return false
  }
}
