import { z } from 'zod'
import { createSchemaOf } from './fields'

export const PROGRESS_COLLECTION = 'progress'

const ProgressFields = z.object({
  student_id: z.string().min(1),
  class_id: z.string().optional(),
  metric: z.enum(['assignment', 'quiz', 'exam', 'attendance', 'behavior', 'custom']).default('assignment'),
  title: z.string().optional(),
  score: z.number().min(0).max(100).optional(), // percentage
  notes: z.string().optional(),
})

export const ProgressSchema = createSchemaOf(ProgressFields)
