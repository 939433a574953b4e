import { z } from 'zod'
import { createSchemaOf, isoDate } from './fields'

export const INVOICE_COLLECTION = 'feeinvoice'

export const INVOICE_STATUSES = ['draft', 'open', 'paid', 'void'] as const
export type InvoiceStatus = typeof INVOICE_STATUSES[number]

const FeeInvoiceFields = z.object({
  student_id: z.string().min(1),
  amount: z.number().min(0, 'Amount must be >= 0'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'Expected a 3 letter currency code').default('USD'),
  due_date: isoDate.optional(),
  status: z.enum(INVOICE_STATUSES).default('open'),
  memo: z.string().max(1000).optional(),
})

export const FeeInvoiceSchema = createSchemaOf(FeeInvoiceFields)
