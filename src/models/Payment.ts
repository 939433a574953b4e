import { z } from 'zod'
import { createSchemaOf } from './fields'

export const PAYMENT_COLLECTION = 'payment'

const PaymentFields = z.object({
  invoice_id: z.string().min(1),
  amount: z.number().positive('Amount must be > 0'),
  method: z.string().min(1).default('cash'),
  reference: z.string().optional(),
})

export const PaymentSchema = createSchemaOf(PaymentFields)
