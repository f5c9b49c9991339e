export {
  StateStoreTag,
  StateStoreLive,
  ConflictError,
  NotFoundError,
  AliasConflictError
} from "./StateStore";
export type { StateStore, StoreError, LookupError } from "./StateStore";
