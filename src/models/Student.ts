import { z } from 'zod'
import { createSchemaOf, idList, isoDate, updateSchemaOf } from './fields'

export const STUDENT_COLLECTION = 'student'

const StudentFields = z.object({
  first_name: z.string().min(1),
  last_name: z.string().min(1),
  email: z.string().email().optional(),
  grade: z.string().optional(),
  dob: isoDate.optional(),
  parent_ids: idList.default([]),
  class_ids: idList.default([]),
  status: z.enum(['active', 'inactive']).default('active'),
})

export const StudentSchema = createSchemaOf(StudentFields)

export const StudentUpdateSchema = updateSchemaOf(StudentFields)
