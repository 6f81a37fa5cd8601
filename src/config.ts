import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./core/errors.js";
import { MAX_BATCH_SIZE } from "./events/ingestion_client.js";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const PositiveInt = z.coerce.number().int().positive();

export const AppConfig = z
  .object({
    home_dir: z.string().min(1),
    node_id: z.string().min(1),
    api_url: z.string().url().or(z.literal("")).default(""),
    auth_token: z.string().default(""),
    request_timeout_ms: PositiveInt.default(10_000),
    health_timeout_ms: PositiveInt.default(2_000),
    log_level: LogLevel.default("warn"),
    replay: z
      .object({
        max_batch_size: PositiveInt.max(MAX_BATCH_SIZE).default(MAX_BATCH_SIZE),
        max_retries: z.coerce.number().int().nonnegative().default(3),
        backoff_base_ms: z.coerce.number().int().nonnegative().default(1000)
      })
      .strict()
      .default({})
  })
  .strict();
export type AppConfig = z.infer<typeof AppConfig>;

// Keys a config file may set; home_dir only comes from the environment since
// it decides where the file is.
const FileConfig = AppConfig.omit({ home_dir: true }).partial().strict();

export type LoadConfigArgs = {
  env?: NodeJS.ProcessEnv;
  /** Overrides `<home_dir>/config.yaml`. */
  config_path?: string;
};

export function defaultHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.MC_HOME?.trim() || path.join(os.homedir(), ".mission-collab");
}

export function storagePaths(cfg: Pick<AppConfig, "home_dir">): {
  queue_dir: string;
  clock_file: string;
  config_file: string;
} {
  return {
    queue_dir: path.join(cfg.home_dir, "queues"),
    clock_file: path.join(cfg.home_dir, "events", "lamport_clock.json"),
    config_file: path.join(cfg.home_dir, "config.yaml")
  };
}

async function readConfigFile(filePath: string): Promise<z.infer<typeof FileConfig>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(e)}`);
  }
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Config file ${filePath} is not valid YAML: ${errorMessage(e)}`);
  }
  if (doc === null || doc === undefined) return {};
  const parsed = FileConfig.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid config file ${filePath}: ${issue?.path.join(".")}: ${issue?.message}`);
  }
  return parsed.data;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const set = (key: string, value: string | undefined) => {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  };
  set("node_id", env.MC_NODE_ID);
  set("api_url", env.MC_API_URL);
  set("auth_token", env.MC_AUTH_TOKEN);
  set("request_timeout_ms", env.MC_REQUEST_TIMEOUT_MS);
  set("log_level", env.MC_LOG_LEVEL);
  return out;
}

/** Defaults, then `<home>/config.yaml`, then MC_* environment variables. */
export async function loadConfig(args: LoadConfigArgs = {}): Promise<AppConfig> {
  const env = args.env ?? process.env;
  const homeDir = defaultHomeDir(env);
  const file = await readConfigFile(args.config_path ?? storagePaths({ home_dir: homeDir }).config_file);
  const merged = {
    node_id: `cli-${os.hostname()}`,
    ...file,
    ...fromEnv(env),
    home_dir: homeDir
  };
  const parsed = AppConfig.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue?.path.join(".")}: ${issue?.message}`);
  }
  return parsed.data;
}
