/**
 * Registry Service - serialized roster mutations over the activity registry
 */

import { ActivityRegistry, RegistryError } from '../registry'
import type { Activity, ActivityCatalog } from '../registry'
import type { LockManager } from '../storage/lock-manager'
import { withLock } from '../storage/lock-manager'
import { registryOperationsTotal } from '../observability/metrics'
import type { RegistryOperation } from '../observability/metrics'
import { logger } from '../utils/logger'

export class RegistryService {
  constructor(
    private registry: ActivityRegistry,
    private locks: LockManager
  ) {}

  get activityCount(): number {
    return this.registry.size
  }

  listActivities(): ActivityCatalog {
    return this.registry.toCatalog()
  }

  getActivity(name: string): Activity {
    return this.registry.get(name)
  }

  async signup(activityName: string, email: string): Promise<string> {
    return this.mutate('signup', activityName, email, () => this.registry.signup(activityName, email))
  }

  async unregister(activityName: string, email: string): Promise<string> {
    return this.mutate('unregister', activityName, email, () => this.registry.unregister(activityName, email))
  }

  private async mutate(
    operation: RegistryOperation,
    activityName: string,
    email: string,
    apply: () => string
  ): Promise<string> {
    return withLock(this.locks, `activity:${activityName}`, () => {
      try {
        const message = apply()
        registryOperationsTotal.inc({ operation, outcome: 'success' })
        logger.info(message, { operation, activity: activityName, email })
        return message
      } catch (error) {
        if (error instanceof RegistryError) {
          registryOperationsTotal.inc({ operation, outcome: error.code })
          logger.warn(`Rejected ${operation}`, {
            operation,
            activity: activityName,
            email,
            code: error.code
          })
        }
        throw error
      }
    })
  }
}
