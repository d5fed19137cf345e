export { ActivityRegistry } from './activity-registry'
export {
  RegistryError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  NotRegisteredError
} from './errors'
export type { RegistryErrorCode } from './errors'
export { loadActivityCatalog, parseActivityCatalog, ActivityCatalogSchema } from './seed'
export type { Activity, ActivityRecord, ActivityCatalog } from './types'
