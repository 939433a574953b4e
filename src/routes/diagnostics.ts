import { Router } from 'express'
import type { DocumentStore } from '../store/documentStore'
import { AppConfig } from '../config'

type Diagnostic = {
  backend: string
  database: string
  database_url: string
  database_name: string
  connection_status: string
  collections: string[]
}

const short = (err: unknown) => (err instanceof Error ? err.message : String(err)).slice(0, 50)

export const describeStore = async (store: DocumentStore, config: Pick<AppConfig, 'mongoUriConfigured' | 'mongoDbName'>): Promise<Diagnostic> => {
  const out: Diagnostic = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: config.mongoUriConfigured ? '✅ Set' : '❌ Not Set',
    database_name: config.mongoDbName ?? store.databaseName ?? '❌ Not Set',
    connection_status: 'Not Connected',
    collections: [],
  }

  try {
    const names = await store.listCollectionNames()
    out.collections = names.slice(0, 10)
    out.database = '✅ Connected & Working'
    out.connection_status = 'Connected'
  } catch (err) {
    out.database = `❌ Error: ${short(err)}`
  }
  return out
}

export const createDiagnosticsRouter = (store: DocumentStore, config: Pick<AppConfig, 'mongoUriConfigured' | 'mongoDbName'>) => {
  const router = Router()

  router.get('/', (_, res) => {
    res.json({ message: 'School management backend is running' })
  })
  router.get('/health', (_, res) => {
    res.json({ ok: true })
  })
  router.get('/test', async (_, res) => {
    res.json(await describeStore(store, config))
  })

  return router
}
