/**
 * Request Logger Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { httpRequestDuration } from '../observability/metrics'
import { logger } from '../utils/logger'

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()

  res.on('finish', () => {
    const duration = Date.now() - start
    const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched'

    httpRequestDuration.observe(
      { method: req.method, route, status: String(res.statusCode) },
      duration / 1000
    )

    logger.info('HTTP Request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      duration
    })
  })

  next()
}
