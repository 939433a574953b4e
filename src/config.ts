export type AppConfig = {
  port: number
  mongoUri: string
  mongoUriConfigured: boolean
  mongoDbName?: string
  jsonLimit: string
  corsOrigin?: string
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const explicitUri = env.MONGO_URI || env.MONGODB_URI
  return {
    port: env.PORT ? Number(env.PORT) : 4000,
    mongoUri: explicitUri || 'mongodb://localhost:27017/school',
    mongoUriConfigured: Boolean(explicitUri),
    mongoDbName: env.MONGO_DB_NAME || undefined,
    jsonLimit: env.JSON_LIMIT || '2mb',
    corsOrigin: env.CORS_ORIGIN || undefined,
  }
}
