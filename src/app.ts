/**
 * Application assembly - wires config, registry and HTTP layers into an Express app
 */

import express, { Express } from 'express'
import 'express-async-errors'
import type { Config } from './config'
import { setupMiddleware, errorHandler } from './middleware'
import { setupRoutes } from './routes'
import { ActivityRegistry, loadActivityCatalog } from './registry'
import type { ActivityCatalog } from './registry'
import { RegistryService } from './services/registry-service'
import { InMemoryLockManager } from './storage/in-memory-lock-manager'

export interface AppOptions {
  config: Config
  /** Initial activities; read from `config.seedFile` when omitted */
  catalog?: ActivityCatalog
}

export interface AppContext {
  app: Express
  registryService: RegistryService
}

export function createApp(options: AppOptions): AppContext {
  const { config } = options
  const catalog = options.catalog ?? loadActivityCatalog(config.seedFile)

  const registryService = new RegistryService(
    new ActivityRegistry(catalog),
    new InMemoryLockManager()
  )

  const app = express()
  app.disable('x-powered-by')

  setupMiddleware(app, config)
  setupRoutes(app, registryService, config)

  // Error handler (must be last)
  app.use(errorHandler)

  return { app, registryService }
}
