export {
  StateStorageServiceTag,
  JsonStateStorageService,
  PersistenceError,
  StateFileSchema,
  parseStateFile,
  serializeState
} from "./StateStorageService";
export type { StateStorageService } from "./StateStorageService";
