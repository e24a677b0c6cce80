import type { z } from "zod";

/**
 * Anything that can be stored under its own key. The id doubles as the
 * file name of the record, so it has to be a single path segment.
 */
export interface Entity {
  readonly id: string;
}

/**
 * Runtime description of an element type. Types are erased at run time, so
 * the directory name and the decoding schema travel together as a value.
 */
export interface EntityType<T extends Entity> {
  name: string;
  schema: z.ZodType<T>;
}

const FORBIDDEN_ID_CHARACTERS = /[/\\\0]/;

export function isValidId(id: string): boolean {
  if (id.length === 0) return false;
  if (id === "." || id === "..") return false;
  return !FORBIDDEN_ID_CHARACTERS.test(id);
}
