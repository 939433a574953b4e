import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { TEACHER_COLLECTION, TeacherSchema, TeacherUpdateSchema } from '../models/Teacher'
import { createHandler, listHandler, updateHandler } from './scoped'

export const createTeachersRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, TEACHER_COLLECTION))
  router.post('/', createHandler(store, TEACHER_COLLECTION, TeacherSchema, 'Teacher created'))
  router.put('/:id', updateHandler(store, TEACHER_COLLECTION, TeacherUpdateSchema))
  return router
}
