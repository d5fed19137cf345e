/**
 * Error Handler Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { RegistryError } from '../registry'
import type { RegistryErrorCode } from '../registry'
import { logger } from '../utils/logger'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

const REGISTRY_ERROR_STATUS: Record<RegistryErrorCode, number> = {
  activity_not_found: 404,
  already_registered: 400,
  not_registered: 400
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  if (error instanceof RegistryError) {
    res.status(REGISTRY_ERROR_STATUS[error.code]).json({
      detail: error.message,
      code: error.code
    })
    return
  }

  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      detail: error.message,
      code: error.code
    })
    return
  }

  // Client errors raised by Express itself (e.g. a malformed JSON body)
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    res.status(error.status).json({
      detail: error.message,
      code: 'bad_request'
    })
    return
  }

  logger.error('Error handling request', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  })

  // Default to 500 for unexpected errors
  res.status(500).json({
    detail: 'Internal server error',
    code: 'internal_error'
  })
}
