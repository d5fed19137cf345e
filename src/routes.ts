/**
 * API Routes Setup
 */

import express, { Express } from 'express'
import type { Config } from './config'
import type { RegistryService } from './services/registry-service'
import { createActivitiesRouter } from './api/activities'

export const API_VERSION = '0.1.0'

export function setupRoutes(app: Express, registryService: RegistryService, config: Config) {
  // Front end lives under /static
  app.get('/', (req, res) => {
    res.redirect(307, '/static/index.html')
  })
  app.use('/static', express.static(config.staticDir))

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      env: config.env,
      activities: registryService.activityCount
    })
  })

  // API Documentation
  app.get('/docs', (req, res) => {
    res.json({
      message: 'Mergington High School Activities API',
      version: API_VERSION,
      endpoints: {
        listActivities: 'GET /activities',
        signup: 'POST /activities/{activityName}/signup?email={email}',
        unregister: 'DELETE /activities/{activityName}/unregister?email={email}',
        health: 'GET /health'
      }
    })
  })

  app.use('/activities', createActivitiesRouter(registryService))

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      detail: 'Not found',
      code: 'not_found',
      path: req.path
    })
  })
}
