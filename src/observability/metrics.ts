/**
 * Prometheus Metrics Setup
 */

import { createServer, Server } from 'http'
import { register, collectDefaultMetrics, Counter, Histogram } from 'prom-client'
import { logger } from '../utils/logger'

// Collect default metrics (CPU, memory, etc.)
collectDefaultMetrics({
  prefix: 'activities_api_'
})

export const httpRequestDuration = new Histogram({
  name: 'activities_api_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status']
})

export type RegistryOperation = 'signup' | 'unregister'

export const registryOperationsTotal = new Counter<'operation' | 'outcome'>({
  name: 'activities_api_registry_operations_total',
  help: 'Total number of roster mutations by outcome',
  labelNames: ['operation', 'outcome']
})

/**
 * Start Prometheus metrics server
 */
export function startMetricsServer(port: number): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.statusCode = 404
      res.end('Not Found')
      return
    }

    register.metrics().then(
      (body) => {
        res.setHeader('Content-Type', register.contentType)
        res.end(body)
      },
      (error: unknown) => {
        logger.error('Failed to collect metrics', { error })
        res.statusCode = 500
        res.end('Metrics unavailable')
      }
    )
  })

  server.listen(port, () => {
    logger.info(`Metrics server listening on http://localhost:${port}/metrics`)
  })

  return server
}
