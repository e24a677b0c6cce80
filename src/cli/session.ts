import { type CodecFormat, getCodec } from "../codecs/index.js";
import { getStoreConfig } from "../config/loaders.js";
import { isStoreError } from "../errors/index.js";
import type { FileRepositoryOptions } from "../repository/FileRepository.js";
import { Tracer } from "../tracer/tracer.js";
import type { TracingContext } from "../tracer/types.js";
import { SimpleWriter } from "../tracer/writers/simple.js";

export interface SessionOptions {
  config?: string;
  dataDir?: string;
  format?: CodecFormat;
  debug?: boolean;
}

export type SessionRun = (options: FileRepositoryOptions, span: TracingContext) => Promise<void>;

/**
 * Tracer for one CLI invocation. Log lines go to stderr so that stdout
 * carries only records.
 */
export function createCliTracer(
  options: Pick<SessionOptions, "debug">,
  output: (line: string) => void = console.error,
): Tracer {
  const debug = options.debug ?? false;
  const tracer = new Tracer({ minLevel: debug ? "debug" : "info" });
  tracer.addWriter(
    new SimpleWriter({
      minLevel: tracer.minLevel,
      showInternal: debug,
      showTimestamp: false,
      output,
    }),
  );
  return tracer;
}

/**
 * Resolves the store options from the config file and flags, then runs one
 * command inside a session span.
 *
 * @returns the process exit code: 0 on success, 1 when the command failed with a StoreError
 * @throws anything that is not a StoreError
 */
export async function runSession(
  name: string,
  options: SessionOptions,
  run: SessionRun,
  context: { tracer: Tracer; errorOutput?: (line: string) => void },
): Promise<number> {
  const { tracer, errorOutput = console.error } = context;
  const span = tracer.startSpan(name, { type: "session" });
  try {
    const config = await getStoreConfig(options.config ?? null, { tracer: span });
    const format = options.format ?? config.format;
    await run({ root: options.dataDir ?? config.dataDir, codec: getCodec(format) }, span);
    span.end();
    return 0;
  } catch (e) {
    span.end("error");
    if (isStoreError(e)) {
      errorOutput(`error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
