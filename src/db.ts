import mongoose from 'mongoose'
import { AppConfig } from './config'

let isConnecting = false
let listenersAttached = false

export const connectDb = async (config: Pick<AppConfig, 'mongoUri' | 'mongoDbName'>): Promise<void> => {
  if (mongoose.connection.readyState === 1) return
  if (isConnecting) return
  isConnecting = true

  try {
    await mongoose.connect(config.mongoUri, {
      dbName: config.mongoDbName,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    })
  } catch (error) {
    console.error('Initial MongoDB connection error:', error)
    isConnecting = false
    // Retry connection after 5 seconds
    setTimeout(() => { connectDb(config).catch(e => console.error('mongo error', e)) }, 5000)
    return
  }

  isConnecting = false
  console.log('mongo connected')
  if (listenersAttached) return
  listenersAttached = true

  mongoose.connection.on('error', (error) => {
    console.error('MongoDB connection error:', error)
  })

  mongoose.connection.on('disconnected', () => {
    console.warn('MongoDB disconnected. Attempting to reconnect...')
    if (!isConnecting) {
      setTimeout(() => { connectDb(config).catch(e => console.error('mongo error', e)) }, 5000)
    }
  })

  mongoose.connection.on('reconnected', () => {
    console.log('MongoDB reconnected')
  })
}
