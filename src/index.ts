// Repositories
export {
  asReadOnly,
  asWriteOnly,
  collect,
  DEFAULT_DATA_ROOT,
  FileRepository,
  openFileRepository,
} from "./repository/index.js";
export type {
  FileRepositoryOptions,
  ReadOnlyRepository,
  Repository,
  WriteOnlyRepository,
} from "./repository/index.js";

// Entities
export * from "./entities/index.js";

// Codecs
export { getCodec, jsonCodec, yamlCodec } from "./codecs/index.js";
export type { Codec, CodecFormat } from "./codecs/index.js";

// Errors
export * from "./errors/index.js";

// Config
export { getStoreConfig, StoreConfigSchema } from "./config/index.js";
export type { StoreConfig } from "./config/index.js";

// Tracing
export * from "./tracer/index.js";
