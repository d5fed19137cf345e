/**
 * Activity - a named extracurricular offering and its roster
 */
export interface Activity {
  name: string
  description: string
  schedule: string
  /** Informational capacity, not enforced on signup */
  maxParticipants: number
  participants: string[]
}

/**
 * Wire shape of one activity, as served by GET /activities and stored in the seed file
 */
export interface ActivityRecord {
  description: string
  schedule: string
  max_participants: number
  participants: string[]
}

export type ActivityCatalog = Record<string, ActivityRecord>
