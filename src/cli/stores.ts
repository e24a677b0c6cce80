import { InvalidArgumentError } from "@commander-js/extra-typings";
import {
  EmployeeType,
  type Person,
  PersonType,
  RemoteEmployeeType,
} from "../entities/people.js";
import { type FileRepositoryOptions, openFileRepository } from "../repository/FileRepository.js";
import type { ReadOnlyRepository } from "../repository/types.js";

export const ENTITY_KINDS = ["person", "employee", "remote-employee"] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export function parseEntityKind(value: string): EntityKind {
  const kind = ENTITY_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${ENTITY_KINDS.join(", ")}`);
  }
  return kind;
}

/**
 * Opens the store for `kind` for reading. Every element type is a Person,
 * so each store can be handed out as a reader of people.
 */
export async function openReader(
  kind: EntityKind,
  options: FileRepositoryOptions,
): Promise<ReadOnlyRepository<Person>> {
  switch (kind) {
    case "person":
      return openFileRepository(PersonType, options);
    case "employee":
      return openFileRepository(EmployeeType, options);
    case "remote-employee":
      return openFileRepository(RemoteEmployeeType, options);
  }
}
