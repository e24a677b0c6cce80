#!/usr/bin/env node
import { Command, InvalidArgumentError } from "@commander-js/extra-typings";
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { CodecFormat } from "./codecs/index.js";
import { runDemo, runGet, runList } from "./cli/runners.js";
import { createCliTracer, runSession, type SessionRun } from "./cli/session.js";
import { parseEntityKind } from "./cli/stores.js";

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

function parseFormat(value: string): CodecFormat {
  if (value !== "json" && value !== "yaml") {
    throw new InvalidArgumentError("Expected json or yaml");
  }
  return value;
}

const program = new Command()
  .name("variance-store")
  .description("Stores entities as one file per id and lists them back")
  .version(pkg.version)
  .option("-c, --config <path>", "Path to the config file")
  .option("--data-dir <path>", "Directory the stores are kept under")
  .option("--format <format>", "Record encoding, json or yaml", parseFormat)
  .option("-d, --debug", "Print additional debug information");

const print = (line: string) => console.log(line);

async function withSession(name: string, run: SessionRun): Promise<void> {
  const options = program.opts();
  process.exitCode = await runSession(name, options, run, { tracer: createCliTracer(options) });
}

program
  .command("demo", { isDefault: true })
  .description("Insert the sample employees and print the store")
  .action(async () => {
    await withSession("variance-store demo", (options, span) => runDemo(options, print, span));
  });

program
  .command("list")
  .description("Print every record of a store")
  .argument("[type]", "person, employee or remote-employee", parseEntityKind, "employee" as const)
  .action(async (kind) => {
    await withSession("variance-store list", (options, span) => runList(kind, options, print, span));
  });

program
  .command("get")
  .description("Print one record")
  .argument("<id>", "Record id")
  .argument("[type]", "person, employee or remote-employee", parseEntityKind, "employee" as const)
  .action(async (id, kind) => {
    await withSession("variance-store get", (options, span) =>
      runGet(id, kind, options, print, span),
    );
  });

await program.parseAsync(process.argv);
