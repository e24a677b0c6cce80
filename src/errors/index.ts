export {
  ConfigError,
  DeserializationError,
  InvalidEntityError,
  IOFailureError,
  isStoreError,
  NotFoundError,
  StoreError,
} from "./StoreError.js";
export type { StoreErrorOptions } from "./StoreError.js";
