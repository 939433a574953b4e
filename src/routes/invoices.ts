import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { FeeInvoiceSchema, INVOICE_COLLECTION } from '../models/FeeInvoice'
import { createHandler, listHandler } from './scoped'

export const createInvoicesRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, INVOICE_COLLECTION))
  router.post('/', createHandler(store, INVOICE_COLLECTION, FeeInvoiceSchema, 'Invoice created'))
  return router
}
