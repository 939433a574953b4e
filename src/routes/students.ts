import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { STUDENT_COLLECTION, StudentSchema, StudentUpdateSchema } from '../models/Student'
import { createHandler, deleteHandler, listHandler, updateHandler } from './scoped'

export const createStudentsRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, STUDENT_COLLECTION))
  router.post('/', createHandler(store, STUDENT_COLLECTION, StudentSchema, 'Student created'))
  router.put('/:id', updateHandler(store, STUDENT_COLLECTION, StudentUpdateSchema))
  router.delete('/:id', deleteHandler(store, STUDENT_COLLECTION))
  return router
}
