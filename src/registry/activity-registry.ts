import type { Activity, ActivityCatalog } from './types'
import { ActivityNotFoundError, AlreadyRegisteredError, NotRegisteredError } from './errors'

interface ActivityEntry {
  description: string
  schedule: string
  maxParticipants: number
  // Set keeps insertion order for display
  participants: Set<string>
}

/**
 * ActivityRegistry - in-memory store of activities keyed by exact name.
 *
 * Activities are fixed at construction; only rosters change afterwards.
 * Every mutation validates first and mutates last.
 */
export class ActivityRegistry {
  private activities = new Map<string, ActivityEntry>()

  constructor(catalog: ActivityCatalog) {
    for (const [name, record] of Object.entries(catalog)) {
      this.activities.set(name, {
        description: record.description,
        schedule: record.schedule,
        maxParticipants: record.max_participants,
        participants: new Set(record.participants)
      })
    }
  }

  get size(): number {
    return this.activities.size
  }

  has(name: string): boolean {
    return this.activities.has(name)
  }

  /**
   * Snapshot of every activity in seed order
   */
  list(): Activity[] {
    return Array.from(this.activities.entries(), ([name, entry]) => this.toActivity(name, entry))
  }

  get(name: string): Activity {
    return this.toActivity(name, this.require(name))
  }

  signup(name: string, email: string): string {
    const entry = this.require(name)

    if (entry.participants.has(email)) {
      throw new AlreadyRegisteredError(name, email)
    }

    entry.participants.add(email)
    return `Signed up ${email} for ${name}`
  }

  unregister(name: string, email: string): string {
    const entry = this.require(name)

    if (!entry.participants.has(email)) {
      throw new NotRegisteredError(name, email)
    }

    entry.participants.delete(email)
    return `Unregistered ${email} from ${name}`
  }

  /**
   * Wire-format view, keyed by activity name
   */
  toCatalog(): ActivityCatalog {
    const catalog: ActivityCatalog = {}
    for (const activity of this.list()) {
      catalog[activity.name] = {
        description: activity.description,
        schedule: activity.schedule,
        max_participants: activity.maxParticipants,
        participants: activity.participants
      }
    }
    return catalog
  }

  private require(name: string): ActivityEntry {
    const entry = this.activities.get(name)
    if (!entry) {
      throw new ActivityNotFoundError(name)
    }
    return entry
  }

  private toActivity(name: string, entry: ActivityEntry): Activity {
    return {
      name,
      description: entry.description,
      schedule: entry.schedule,
      maxParticipants: entry.maxParticipants,
      participants: [...entry.participants]
    }
  }
}
