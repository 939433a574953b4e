import { createApp } from '../app'
import { AppConfig } from '../config'
import { MemoryDocumentStore } from './memoryStore'

export const testConfig: AppConfig = {
  port: 0,
  mongoUri: 'mongodb://localhost:27017/school-test',
  mongoUriConfigured: false,
  jsonLimit: '2mb',
}

export function createTestApp(store = new MemoryDocumentStore()) {
  return { store, app: createApp({ store, config: testConfig }) }
}
