export { getStoreConfig } from "./loaders.js";
export { StoreConfigSchema } from "./schemas.js";
export type { StoreConfig } from "./schemas.js";
