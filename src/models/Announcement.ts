import { z } from 'zod'
import { createSchemaOf } from './fields'

export const ANNOUNCEMENT_COLLECTION = 'announcement'

export const AUDIENCES = ['all', 'students', 'parents', 'teachers'] as const

const AnnouncementFields = z.object({
  title: z.string().min(1),
  body: z.string().min(1),
  audience: z.enum(AUDIENCES).default('all'),
})

export const AnnouncementSchema = createSchemaOf(AnnouncementFields)
