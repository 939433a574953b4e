import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { CLASS_COLLECTION, ClassSchema, ClassUpdateSchema } from '../models/Class'
import { createHandler, listHandler, updateHandler } from './scoped'

export const createClassesRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, CLASS_COLLECTION))
  router.post('/', createHandler(store, CLASS_COLLECTION, ClassSchema, 'Class created'))
  router.put('/:id', updateHandler(store, CLASS_COLLECTION, ClassUpdateSchema))
  return router
}
