import { z } from 'zod'
import { createSchemaOf } from './fields'

export const ENROLLMENT_COLLECTION = 'enrollment'

const EnrollmentFields = z.object({
  student_id: z.string().min(1),
  class_id: z.string().min(1),
  status: z.enum(['enrolled', 'completed', 'dropped']).default('enrolled'),
})

export const EnrollmentSchema = createSchemaOf(EnrollmentFields)
