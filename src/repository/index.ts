export { asReadOnly, asWriteOnly, collect } from "./capabilities.js";
export { DEFAULT_DATA_ROOT, FileRepository, openFileRepository } from "./FileRepository.js";
export type { FileRepositoryOptions } from "./FileRepository.js";
export type { ReadOnlyRepository, Repository, WriteOnlyRepository } from "./types.js";
