import type { Dirent } from "node:fs";
import node_fs from "node:fs/promises";
import node_path from "node:path";
import { jsonCodec } from "../codecs/index.js";
import type { Codec } from "../codecs/types.js";
import type { Entity, EntityType } from "../entities/types.js";
import { isValidId } from "../entities/types.js";
import {
  DeserializationError,
  InvalidEntityError,
  IOFailureError,
  NotFoundError,
} from "../errors/index.js";
import type { SpanParent, SpanStatus, TracingContext } from "../tracer/types.js";
import { formatZodError } from "../utils/zod.js";
import type { Repository } from "./types.js";

export const DEFAULT_DATA_ROOT = "data";

export interface FileRepositoryOptions {
  /** Directory under which every store keeps its records (default: "data") */
  root?: string;
  codec?: Codec;
  tracer?: SpanParent;
}

/**
 * Keeps one file per entity under `<root>/<RepositoryClass>/<ElementType>/<id>.<ext>`.
 *
 * The directory is created by `initialize()` and again by `insert` if it has
 * gone missing. Listing a missing directory is an IOFailureError.
 *
 * There is no locking and no atomic write: concurrent inserts of the same id
 * race and the last write wins.
 */
export class FileRepository<T extends Entity> implements Repository<T> {
  readonly dir: string;
  private readonly type: EntityType<T>;
  private readonly codec: Codec;
  private readonly tracer?: SpanParent;

  constructor(type: EntityType<T>, options: FileRepositoryOptions = {}) {
    if (!isValidId(type.name)) {
      throw new InvalidEntityError(`Invalid element type name "${type.name}"`);
    }
    this.type = type;
    this.codec = options.codec ?? jsonCodec;
    this.tracer = options.tracer;
    this.dir = node_path.join(options.root ?? DEFAULT_DATA_ROOT, new.target.name, type.name);
  }

  async initialize(): Promise<void> {
    try {
      await node_fs.mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw new IOFailureError(`Could not create store directory "${this.dir}"`, {
        details: { path: this.dir },
        cause: error,
      });
    }
  }

  async insert(item: T): Promise<void> {
    await this.traced("repository.insert", { id: item.id }, async (span) => {
      const filePath = this.pathFor(item.id);
      try {
        await node_fs.mkdir(this.dir, { recursive: true });
        await node_fs.writeFile(filePath, this.codec.encode(item), "utf-8");
      } catch (error) {
        throw new IOFailureError(`Could not write ${this.type.name} "${item.id}"`, {
          id: item.id,
          details: { path: filePath },
          cause: error,
        });
      }
      span?.debug("Wrote record", { path: filePath });
    });
  }

  async get(id: string): Promise<T> {
    return this.traced("repository.get", { id }, async () => {
      return this.readRecord(this.pathFor(id), id);
    });
  }

  async *getAll(): AsyncGenerator<T> {
    const span = this.tracer?.startSpan("repository.getAll", { type: "internal" });
    span?.setAttributes({ type: this.type.name });
    let status: SpanStatus = "ok";
    try {
      const files = await this.listRecordFiles();
      span?.debug("Listed records", { count: files.length });
      for (const filePath of files) {
        yield await this.readRecord(filePath, this.idFor(filePath));
      }
    } catch (error) {
      status = "error";
      span?.error(error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span?.end(status);
    }
  }

  private async listRecordFiles(): Promise<string[]> {
    const suffix = `.${this.codec.extension}`;
    let entries: Dirent[];
    try {
      entries = await node_fs.readdir(this.dir, { withFileTypes: true });
    } catch (error) {
      throw new IOFailureError(`Could not list store directory "${this.dir}"`, {
        details: { path: this.dir },
        cause: error,
      });
    }
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(suffix) && entry.name !== suffix)
      .map((entry) => node_path.join(this.dir, entry.name));
  }

  private pathFor(id: string): string {
    if (!isValidId(id)) {
      throw new InvalidEntityError(`Invalid id ${JSON.stringify(id)}: ids must be non-empty file names`, {
        id,
      });
    }
    return node_path.join(this.dir, `${id}.${this.codec.extension}`);
  }

  private idFor(filePath: string): string {
    return node_path.basename(filePath, `.${this.codec.extension}`);
  }

  private async readRecord(filePath: string, id: string): Promise<T> {
    let content: string;
    try {
      content = await node_fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new NotFoundError(`No ${this.type.name} stored under "${id}"`, {
          id,
          details: { path: filePath },
          cause: error,
        });
      }
      throw new IOFailureError(`Could not read ${this.type.name} "${id}"`, {
        id,
        details: { path: filePath },
        cause: error,
      });
    }
    return this.parse(content, filePath, id);
  }

  private parse(content: string, filePath: string, id: string): T {
    let decoded: unknown;
    try {
      decoded = this.codec.decode(content);
    } catch (error) {
      throw new DeserializationError(`Could not decode ${this.type.name} "${id}"`, {
        id,
        details: { path: filePath },
        cause: error,
      });
    }

    const parsed = this.type.schema.safeParse(decoded);
    if (!parsed.success) {
      throw new DeserializationError(
        `Stored record "${id}" is not a valid ${this.type.name}:\n${formatZodError(parsed.error)}`,
        { id, details: { path: filePath }, cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private async traced<R>(
    name: string,
    attributes: Record<string, unknown>,
    fn: (span?: TracingContext) => Promise<R>,
  ): Promise<R> {
    const span = this.tracer?.startSpan(name, { type: "internal" });
    span?.setAttributes({ type: this.type.name, ...attributes });
    try {
      const result = await fn(span);
      span?.end();
      return result;
    } catch (error) {
      span?.error(error instanceof Error ? error.message : String(error));
      span?.end("error");
      throw error;
    }
  }
}

export async function openFileRepository<T extends Entity>(
  type: EntityType<T>,
  options?: FileRepositoryOptions,
): Promise<FileRepository<T>> {
  const repository = new FileRepository(type, options);
  await repository.initialize();
  return repository;
}
