import { z } from 'zod'
import { createSchemaOf, idList, updateSchemaOf } from './fields'

export const CLASS_COLLECTION = 'class'

const ClassFields = z.object({
  name: z.string().min(1), // e.g. Algebra I
  code: z.string().min(1),
  teacher_id: z.string().optional(),
  grade_level: z.string().optional(),
  student_ids: idList.default([]),
})

export const ClassSchema = createSchemaOf(ClassFields)

export const ClassUpdateSchema = updateSchemaOf(ClassFields)
