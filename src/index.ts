import 'dotenv/config'

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error)
})

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason)
})

import http from 'http'
import { createApp } from './app'
import { loadConfig } from './config'
import { connectDb } from './db'

const config = loadConfig()
const app = createApp({ config })

connectDb(config).catch(e => console.error('mongo error', e))

const server = http.createServer(app)

server.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`)
})
