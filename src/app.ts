import express, { ErrorRequestHandler } from 'express'
import cors from 'cors'
import bodyParser from 'body-parser'
import { AppConfig, loadConfig } from './config'
import type { DocumentStore } from './store/documentStore'
import { MongoDocumentStore } from './store/mongoStore'
import { createDiagnosticsRouter } from './routes/diagnostics'
import { createStudentsRouter } from './routes/students'
import { createTeachersRouter } from './routes/teachers'
import { createClassesRouter } from './routes/classes'
import { createAnnouncementsRouter } from './routes/announcements'
import { createInvoicesRouter } from './routes/invoices'
import { createPaymentsRouter } from './routes/payments'
import { createEnrollmentsRouter, createParentsRouter, createProgressRouter } from './routes/family'
import { sendError } from './utils/errors'

export type AppOptions = {
  store?: DocumentStore
  config?: AppConfig
}

const isBodyParserError = (err: unknown): err is { type: string; status: number; message: string } =>
  err instanceof Error && 'type' in err && typeof err.type === 'string' && 'status' in err && typeof err.status === 'number'

const BODY_ERRORS: Record<string, { error: string; detail: string }> = {
  'entity.parse.failed': { error: 'invalid_json', detail: 'Request body is not valid JSON' },
  'entity.too.large': { error: 'payload_too_large', detail: 'Request body is too large' },
}

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err)
    return
  }
  if (isBodyParserError(err)) {
    // body-parser rejections carry their own 4xx status
    const known = BODY_ERRORS[err.type]
    res.status(err.status).json(known ?? { error: err.type.replace(/\./g, '_'), detail: err.message })
    return
  }
  sendError(res, err)
}

export const createApp = ({ store = new MongoDocumentStore(), config = loadConfig() }: AppOptions = {}) => {
  const app = express()
  app.use(cors({
    origin: config.corsOrigin ?? true,
    credentials: true,
  }))
  app.use(bodyParser.json({ limit: config.jsonLimit }))

  app.use('/', createDiagnosticsRouter(store, config))
  app.use('/students', createStudentsRouter(store))
  app.use('/teachers', createTeachersRouter(store))
  app.use('/classes', createClassesRouter(store))
  app.use('/announcements', createAnnouncementsRouter(store))
  app.use('/invoices', createInvoicesRouter(store))
  app.use('/payments', createPaymentsRouter(store))
  app.use('/parents', createParentsRouter(store))
  app.use('/enrollments', createEnrollmentsRouter(store))
  app.use('/progress', createProgressRouter(store))

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found', detail: 'Route not found' })
  })
  app.use(errorHandler)
  return app
}
