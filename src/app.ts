import express from 'express'
import cors from 'cors'
import { errorHandler } from './middleware/error.js'
import { createSdamGiaRouter } from './routes/sdamgia.js'
import type { SdamGiaClient } from './scraper/client.js'

export const createApp = (client: SdamGiaClient, corsOrigins: string[] = ['*']) => {
  const app = express()

  const allowedOrigins = new Set(corsOrigins)
  const allowAllOrigins = corsOrigins.includes('*')
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowAllOrigins || allowedOrigins.has(origin)) {
          callback(null, true)
          return
        }
        callback(new Error('Not allowed by CORS'))
      },
    }),
  )
  app.use(express.json({ limit: '100kb' }))

  app.get('/health', (_req, res) => {
    res.json({ ok: true })
  })

  app.use('/api', createSdamGiaRouter(client))

  app.use(errorHandler)

  return app
}
