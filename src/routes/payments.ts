import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { PAYMENT_COLLECTION, PaymentSchema } from '../models/Payment'
import { createScoped, validatePayload } from '../services/tenantCrud'
import { markInvoicePaid } from '../services/payments'
import { sendError } from '../utils/errors'
import { tenantOf } from '../utils/tenant'

export const createPaymentsRouter = (store: DocumentStore) => {
  const router = Router()

  router.post('/', async (req, res) => {
    try {
      const tenantId = tenantOf(req)
      const payment = validatePayload(PaymentSchema, req.body)
      const id = await createScoped(store, PAYMENT_COLLECTION, tenantId, payment)
      // result intentionally ignored, see markInvoicePaid
      await markInvoicePaid(store, payment.invoice_id)
      res.json({ id, message: 'Payment recorded' })
    } catch (err) {
      sendError(res, err)
    }
  })

  return router
}
