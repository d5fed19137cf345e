/**
 * Mergington Activities API - Main Server
 */

import http from 'http'
import { config } from './config'
import { createApp } from './app'
import { logger } from './utils/logger'
import { startMetricsServer } from './observability/metrics'

const SHUTDOWN_TIMEOUT_MS = 10000

function startServer() {
  try {
    const { app, registryService } = createApp({ config })
    const server = http.createServer(app)

    const metricsServer = config.metrics.enabled
      ? startMetricsServer(config.metrics.port)
      : undefined

    server.listen(config.port, config.host, () => {
      logger.info('🚀 Activities API started', {
        port: config.port,
        host: config.host,
        env: config.env,
        activities: registryService.activityCount,
        metrics: metricsServer ? `http://localhost:${config.metrics.port}/metrics` : 'disabled',
        docs: `http://localhost:${config.port}/docs`,
        health: `http://localhost:${config.port}/health`
      })
    })

    // Graceful shutdown
    let shuttingDown = false
    const shutdown = (signal: string) => {
      if (shuttingDown) {
        return
      }
      shuttingDown = true
      logger.info(`${signal} received, shutting down gracefully...`)

      metricsServer?.close()
      server.close((error) => {
        if (error) {
          logger.error('Error closing HTTP server', { error: error.message })
          process.exit(1)
        }
        logger.info('HTTP server closed')
        process.exit(0)
      })

      // Force shutdown after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout')
        process.exit(1)
      }, SHUTDOWN_TIMEOUT_MS).unref()
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error)
    })
    process.exit(1)
  }
}

startServer()
