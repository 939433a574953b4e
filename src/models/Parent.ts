import { z } from 'zod'
import { createSchemaOf, idList } from './fields'

export const PARENT_COLLECTION = 'parent'

const ParentFields = z.object({
  first_name: z.string().min(1),
  last_name: z.string().min(1),
  email: z.string().email(),
  phone: z.string().optional(),
  student_ids: idList.default([]),
})

export const ParentSchema = createSchemaOf(ParentFields)
