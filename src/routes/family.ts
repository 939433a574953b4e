import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { PARENT_COLLECTION, ParentSchema } from '../models/Parent'
import { ENROLLMENT_COLLECTION, EnrollmentSchema } from '../models/Enrollment'
import { PROGRESS_COLLECTION, ProgressSchema } from '../models/Progress'
import { createHandler, listHandler } from './scoped'

export const createParentsRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, PARENT_COLLECTION))
  router.post('/', createHandler(store, PARENT_COLLECTION, ParentSchema, 'Parent created'))
  return router
}

export const createEnrollmentsRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, ENROLLMENT_COLLECTION))
  router.post('/', createHandler(store, ENROLLMENT_COLLECTION, EnrollmentSchema, 'Enrollment created'))
  return router
}

export const createProgressRouter = (store: DocumentStore) => {
  const router = Router()
  router.get('/', listHandler(store, PROGRESS_COLLECTION))
  router.post('/', createHandler(store, PROGRESS_COLLECTION, ProgressSchema, 'Progress recorded'))
  return router
}
