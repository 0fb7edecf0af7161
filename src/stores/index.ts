/**
 * Store Exports
 */

export {
  createManagerStore,
  type ManagerActions,
  type ManagerState,
  type ManagerStats,
  type ManagerStore,
  type ManagerStoreApi,
} from './managerStore';
