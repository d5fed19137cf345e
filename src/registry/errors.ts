export type RegistryErrorCode = 'activity_not_found' | 'already_registered' | 'not_registered'

/**
 * Base class for rejected registry operations.
 * Thrown before any mutation, so a failed call leaves the roster untouched.
 */
export abstract class RegistryError extends Error {
  abstract readonly code: RegistryErrorCode

  constructor(
    message: string,
    public readonly activityName: string,
    public readonly email?: string
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ActivityNotFoundError extends RegistryError {
  readonly code = 'activity_not_found'

  constructor(activityName: string) {
    super('Activity not found', activityName)
  }
}

export class AlreadyRegisteredError extends RegistryError {
  readonly code = 'already_registered'

  constructor(activityName: string, email: string) {
    super('Student is already signed up', activityName, email)
  }
}

export class NotRegisteredError extends RegistryError {
  readonly code = 'not_registered'

  constructor(activityName: string, email: string) {
    super('Student is not signed up for this activity', activityName, email)
  }
}
