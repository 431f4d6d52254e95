import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError, errnoCode } from "../ingest/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { resolveStateDir } from "./paths.js";

const log = createSubsystemLogger("config");

export const CONFIG_FILENAME = "config.json";

const configSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),

  pool: z
    .object({
      maxCapacity: z.number().int().min(10).default(1000),
    })
    .default({}),

  reader: z
    .object({
      /** File name pattern for directory ingestion */
      pattern: z.string().min(1).default("*.log"),
    })
    .default({}),

  pipeline: z
    .object({
      progressInterval: z.number().int().positive().default(1000),
    })
    .default({}),

  tail: z
    .object({
      maxBytes: z.number().int().positive().default(1_000_000),
      debounceMs: z.number().int().nonnegative().default(500),
      stabilityThresholdMs: z.number().int().nonnegative().default(500),
    })
    .default({}),
});

export type LogsiftConfig = z.infer<typeof configSchema>;

export type ConfigPatch = {
  [K in keyof LogsiftConfig]?: LogsiftConfig[K] extends object
    ? Partial<LogsiftConfig[K]>
    : LogsiftConfig[K];
};

/**
 * Defaults for every setting.
 */
export function defaultConfig(): LogsiftConfig {
  return configSchema.parse({});
}

/**
 * Validates raw input (e.g. parsed JSON), filling in defaults.
 */
export function parseConfig(input: unknown): LogsiftConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export type ConfigServiceOptions = {
  /** Full path to the config file; defaults to <stateDir>/config.json */
  configPath?: string;
  stateDir?: string;
};

/**
 * Loads and saves the JSON configuration, caching the loaded value.
 * A missing file is created with defaults on first load.
 */
export class ConfigService {
  readonly configPath: string;
  private cached: LogsiftConfig | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.configPath =
      options.configPath ?? path.join(options.stateDir ?? resolveStateDir(), CONFIG_FILENAME);
  }

  async load(): Promise<LogsiftConfig> {
    if (this.cached) {
      return this.cached;
    }

    let text: string;
    try {
      text = await fs.readFile(this.configPath, "utf8");
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new ConfigError(`Cannot read ${this.configPath}: ${String(err)}`, { cause: err });
      }
      const defaults = defaultConfig();
      await this.save(defaults);
      log.info("Created default configuration", { configPath: this.configPath });
      return defaults;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`Malformed JSON in ${this.configPath}`, { cause: err });
    }

    const config = parseConfig(raw);
    this.cached = config;
    log.debug("Loaded configuration", { configPath: this.configPath });
    return config;
  }

  async save(config: LogsiftConfig): Promise<void> {
    const validated = parseConfig(config);
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, `${JSON.stringify(validated, null, 2)}\n`, "utf8");
    this.cached = validated;
    log.debug("Saved configuration", { configPath: this.configPath });
  }

  /**
   * Merges a patch section by section and saves the result.
   */
  async update(patch: ConfigPatch): Promise<LogsiftConfig> {
    const current = await this.load();
    const next = parseConfig({
      logLevel: patch.logLevel ?? current.logLevel,
      pool: { ...current.pool, ...patch.pool },
      reader: { ...current.reader, ...patch.reader },
      pipeline: { ...current.pipeline, ...patch.pipeline },
      tail: { ...current.tail, ...patch.tail },
    });
    await this.save(next);
    return next;
  }

  /**
   * Drops the cached value; the next load() reads the file again.
   */
  invalidate(): void {
    this.cached = null;
  }
}
