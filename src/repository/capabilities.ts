import type { ReadOnlyRepository, WriteOnlyRepository } from "./types.js";

/**
 * Wraps a repository so that only the read operations exist at run time.
 * The static type already hides `insert`; the wrapper keeps a cast from
 * getting it back.
 */
export function asReadOnly<T>(repository: ReadOnlyRepository<T>): ReadOnlyRepository<T> {
  return {
    get: (id) => repository.get(id),
    getAll: () => repository.getAll(),
  };
}

export function asWriteOnly<T>(repository: WriteOnlyRepository<T>): WriteOnlyRepository<T> {
  return {
    insert: (item) => repository.insert(item),
  };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
