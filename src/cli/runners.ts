import {
  type Employee,
  employee,
  EmployeeType,
  type Person,
  type RemoteEmployee,
  remoteEmployee,
} from "../entities/people.js";
import { type FileRepositoryOptions, openFileRepository } from "../repository/FileRepository.js";
import { asReadOnly, asWriteOnly } from "../repository/capabilities.js";
import type { ReadOnlyRepository, WriteOnlyRepository } from "../repository/types.js";
import type { TracingContext } from "../tracer/types.js";
import { type EntityKind, openReader } from "./stores.js";

export type Print = (line: string) => void;

export function formatRecord(record: Person): string {
  return JSON.stringify(record);
}

async function addEmployees(repository: WriteOnlyRepository<Employee>): Promise<void> {
  // Same id twice: the second insert replaces the first
  for (const item of [remoteEmployee("Karen", "Usa"), employee("Karen")]) {
    await repository.insert(item);
  }
}

async function addRemoteEmployees(repository: WriteOnlyRepository<RemoteEmployee>): Promise<void> {
  await repository.insert(remoteEmployee("Andrew", "Canada"));
  await repository.insert(remoteEmployee("Carol", "UK"));
}

async function printRepository(repository: ReadOnlyRepository<Person>, print: Print): Promise<number> {
  let count = 0;
  for await (const record of repository.getAll()) {
    print(formatRecord(record));
    count++;
  }
  return count;
}

/**
 * Fills an Employee store through write-only views typed for employees and
 * for remote employees, then lists it through a read-only view of people.
 */
export async function runDemo(
  options: FileRepositoryOptions,
  print: Print,
  parentSpan: TracingContext,
): Promise<void> {
  const span = parentSpan.startSpan("demo", { type: "command" });
  try {
    const repository = await openFileRepository(EmployeeType, { ...options, tracer: span });
    span.info("Opened store", { dir: repository.dir });

    await addEmployees(asWriteOnly<Employee>(repository));
    await addRemoteEmployees(asWriteOnly<RemoteEmployee>(repository));
    const count = await printRepository(asReadOnly<Person>(repository), print);

    span.info("Listed records", { count });
    span.end();
  } catch (e) {
    span.error(e instanceof Error ? e.message : String(e));
    span.end("error");
    throw e;
  }
}

export async function runList(
  kind: EntityKind,
  options: FileRepositoryOptions,
  print: Print,
  parentSpan: TracingContext,
): Promise<void> {
  const span = parentSpan.startSpan("list", { type: "command" });
  span.setAttribute("kind", kind);
  try {
    const repository = await openReader(kind, { ...options, tracer: span });
    const count = await printRepository(repository, print);
    span.info("Listed records", { count });
    span.end();
  } catch (e) {
    span.error(e instanceof Error ? e.message : String(e));
    span.end("error");
    throw e;
  }
}

export async function runGet(
  id: string,
  kind: EntityKind,
  options: FileRepositoryOptions,
  print: Print,
  parentSpan: TracingContext,
): Promise<void> {
  const span = parentSpan.startSpan("get", { type: "command" });
  span.setAttributes({ kind, id });
  try {
    const repository = await openReader(kind, { ...options, tracer: span });
    print(formatRecord(await repository.get(id)));
    span.end();
  } catch (e) {
    span.error(e instanceof Error ? e.message : String(e));
    span.end("error");
    throw e;
  }
}
