import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCliTracer, runSession } from "../../src/cli/session.js";
import { jsonCodec, yamlCodec } from "../../src/codecs/index.js";
import { NotFoundError } from "../../src/errors/index.js";
import type { FileRepositoryOptions } from "../../src/repository/FileRepository.js";
import { createTracerAndWriter } from "../helpers/recording-writer.js";

const TEST_DIR = join(process.cwd(), "test-temp", "session");
const CONFIG_PATH = join(TEST_DIR, "store.config.yaml");

beforeEach(async () => {
  await mkdir(TEST_DIR, { recursive: true });
  await writeFile(CONFIG_PATH, "dataDir: from-config\nformat: yaml\n", "utf-8");
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

function context() {
  const errors: string[] = [];
  const { writer, tracer } = createTracerAndWriter();
  return { errors, writer, tracer, errorOutput: (line: string) => errors.push(line) };
}

describe("runSession", () => {
  it("passes the configured store options to the command", async () => {
    const { tracer, errorOutput } = context();
    const received: FileRepositoryOptions[] = [];

    const code = await runSession(
      "session",
      { config: CONFIG_PATH },
      async (options) => {
        received.push(options);
      },
      { tracer, errorOutput },
    );

    expect(code).toBe(0);
    expect(received).toHaveLength(1);
    expect(received[0].root).toBe("from-config");
    expect(received[0].codec).toBe(yamlCodec);
  });

  it("lets flags override the config file", async () => {
    const { tracer, errorOutput } = context();
    const received: FileRepositoryOptions[] = [];

    await runSession(
      "session",
      { config: CONFIG_PATH, dataDir: "from-flag", format: "json" },
      async (options) => {
        received.push(options);
      },
      { tracer, errorOutput },
    );

    expect(received[0].root).toBe("from-flag");
    expect(received[0].codec).toBe(jsonCodec);
  });

  it("exits with code 1 and prints the message of a store error", async () => {
    const { tracer, writer, errors, errorOutput } = context();

    const code = await runSession(
      "session",
      { config: CONFIG_PATH },
      async () => {
        throw new NotFoundError('No Person stored under "Nobody"');
      },
      { tracer, errorOutput },
    );

    expect(code).toBe(1);
    expect(errors).toEqual(['error: No Person stored under "Nobody"']);
    expect(writer.ended("session")).toEqual(["error"]);
  });

  it("exits with code 1 when the config file is missing", async () => {
    const { tracer, errors, errorOutput } = context();
    const missing = join(TEST_DIR, "missing.yaml");

    const code = await runSession("session", { config: missing }, async () => {}, {
      tracer,
      errorOutput,
    });

    expect(code).toBe(1);
    expect(errors).toEqual([`error: Config file "${missing}" not found, see --help for details`]);
  });

  it("rethrows errors that are not store errors", async () => {
    const { tracer, errors, errorOutput } = context();
    const failure = new TypeError("unexpected");

    await expect(
      runSession(
        "session",
        { config: CONFIG_PATH },
        async () => {
          throw failure;
        },
        { tracer, errorOutput },
      ),
    ).rejects.toBe(failure);
    expect(errors).toEqual([]);
  });
});

describe("createCliTracer", () => {
  it("hides internal spans and debug events by default", () => {
    const lines: string[] = [];
    const tracer = createCliTracer({}, (line) => lines.push(line));

    const span = tracer.startSpan("repository.get", { type: "internal" });
    span.debug("Read record");
    span.end();

    expect(lines).toEqual([]);
  });

  it("shows them under debug", () => {
    const lines: string[] = [];
    const tracer = createCliTracer({ debug: true }, (line) => lines.push(line));

    const span = tracer.startSpan("repository.get", { type: "internal" });
    span.debug("Read record");
    span.end();

    expect(lines.slice(0, 2)).toEqual(["START [internal] repository.get", "  DEBUG Read record"]);
    expect(lines[2]).toMatch(/^END {3}\[internal\] repository\.get \(\d+ms\)$/);
  });
});
