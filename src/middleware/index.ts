/**
 * Express Middleware Setup
 */

import express, { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import rateLimit from 'express-rate-limit'
import type { Config } from '../config'
import { requestLogger } from './request-logger'

export { errorHandler, ApiError } from './error-handler'

/**
 * Middleware that runs before the routes. The error handler is mounted
 * separately, after every route.
 */
export function setupMiddleware(app: Express, config: Config) {
  // Security headers
  app.use(helmet())

  // CORS
  app.use(cors({
    origin: config.cors.origin,
    credentials: config.cors.credentials
  }))

  // Body parsing
  app.use(express.json({ limit: '100kb' }))

  // Request logging
  app.use(requestLogger)

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { detail: 'Too many requests, please try again later', code: 'rate_limited' }
  })
  app.use('/activities', limiter)
}
