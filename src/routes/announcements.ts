import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { ANNOUNCEMENT_COLLECTION, AnnouncementSchema } from '../models/Announcement'
import { createHandler, listHandler } from './scoped'

export const ANNOUNCEMENT_LIST_LIMIT = 20

export const createAnnouncementsRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, ANNOUNCEMENT_COLLECTION, ANNOUNCEMENT_LIST_LIMIT))
  router.post('/', createHandler(store, ANNOUNCEMENT_COLLECTION, AnnouncementSchema, 'Announcement created'))
  return router
}
