import YAML from "yaml";
import { ConfigError } from "../errors/index.js";
import type { TracingContext } from "../tracer/types.js";
import { searchAndLoadFile } from "../utils/file.js";
import { formatZodError } from "../utils/zod.js";
import { type StoreConfig, StoreConfigSchema } from "./schemas.js";

const DEFAULT_CONFIG_NAME = "store.config";
const DEFAULT_CONFIG_FORMATS = ["yaml", "yml", "json"];

/**
 * Reads the store configuration. Without an explicit path a missing
 * `store.config.*` is not an error: every field has a default.
 */
export async function getStoreConfig(
  configPath: string | null,
  context: {
    tracer?: TracingContext;
  } = {},
): Promise<StoreConfig> {
  const { tracer } = context;

  let loaded: Awaited<ReturnType<typeof searchAndLoadFile>>;
  try {
    loaded = await searchAndLoadFile(configPath, {
      defaults: {
        name: DEFAULT_CONFIG_NAME,
        formats: DEFAULT_CONFIG_FORMATS,
      },
    });
  } catch (error) {
    throw new ConfigError(`Config file "${configPath}" not found, see --help for details`, {
      details: { path: configPath },
      cause: error,
    });
  }

  if (loaded === null) {
    tracer?.debug("No config file found, using defaults");
    return StoreConfigSchema.parse({});
  }

  let result: unknown;
  try {
    if (loaded.format === "json") {
      result = JSON.parse(loaded.content);
    } else if (loaded.format === "yaml" || loaded.format === "yml") {
      result = YAML.parse(loaded.content);
    } else {
      throw new Error(`Unsupported config file format "${loaded.format}"`);
    }
  } catch (error) {
    throw new ConfigError(`Could not parse config file "${loaded.path}"`, {
      details: { path: loaded.path },
      cause: error,
    });
  }
  tracer?.debug("Loaded config file", { path: loaded.path, config: result });

  // An empty YAML document parses to null
  const parsed = StoreConfigSchema.safeParse(result ?? {});
  if (!parsed.success) {
    throw new ConfigError(`The config file is not valid:\n${formatZodError(parsed.error)}`, {
      details: { path: loaded.path },
    });
  }
  return parsed.data;
}
