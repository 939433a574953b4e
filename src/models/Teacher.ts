import { z } from 'zod'
import { createSchemaOf, updateSchemaOf } from './fields'

export const TEACHER_COLLECTION = 'teacher'

const TeacherFields = z.object({
  first_name: z.string().min(1),
  last_name: z.string().min(1),
  email: z.string().email(),
  subject: z.string().optional(),
  is_admin: z.boolean().default(false),
})

export const TeacherSchema = createSchemaOf(TeacherFields)

export const TeacherUpdateSchema = updateSchemaOf(TeacherFields)
