/**
 * Seed loading - reads the initial activity catalog from disk
 */

import fs from 'fs'
import { z } from 'zod'
import { ConfigurationError } from '../config'
import type { ActivityCatalog } from './types'

const ActivityRecordSchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().positive(),
  participants: z.array(z.string()).refine(
    (participants) => new Set(participants).size === participants.length,
    { message: 'participants must be unique' }
  )
})

export const ActivityCatalogSchema = z.record(z.string().min(1), ActivityRecordSchema)

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function parseActivityCatalog(raw: unknown, source = 'seed'): ActivityCatalog {
  const result = ActivityCatalogSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid activity catalog in ${source} (${issues.join('; ')})`, {
      key: source,
      issues
    })
  }
  return result.data
}

export function loadActivityCatalog(filePath: string): ActivityCatalog {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`Cannot read activity catalog ${filePath}: ${describeError(error)}`, {
      key: filePath
    })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Activity catalog ${filePath} is not valid JSON: ${describeError(error)}`, {
      key: filePath
    })
  }

  return parseActivityCatalog(raw, filePath)
}
