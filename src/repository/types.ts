import type { Entity } from "../entities/types.js";

/**
 * Write capability. Contravariant: a writer for a general type can stand in
 * for a writer of any of its subtypes.
 */
export interface WriteOnlyRepository<in T> {
  insert(item: T): Promise<void>;
}

/**
 * Read capability. Covariant: a reader of a specific type can stand in for a
 * reader of any of its supertypes.
 */
export interface ReadOnlyRepository<out T> {
  get(id: string): Promise<T>;
  /** Lazily reads every stored record. Each call lists the store again. */
  getAll(): AsyncIterable<T>;
}

/**
 * Read and write together. Invariant, so depend on one of the halves
 * whenever the element type differs from the store's own.
 */
export interface Repository<in out T extends Entity>
  extends ReadOnlyRepository<T>,
    WriteOnlyRepository<T> {}
