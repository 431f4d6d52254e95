export * from "./ingest/index.js";
export {
  CONFIG_FILENAME,
  ConfigService,
  defaultConfig,
  parseConfig,
  type ConfigPatch,
  type ConfigServiceOptions,
  type LogsiftConfig,
} from "./config/config.js";
export { STATE_DIR_ENV, resolveStateDir } from "./config/paths.js";
export {
  createSubsystemLogger,
  setLogLevel,
  type LogLevelName,
  type SubsystemLogger,
} from "./logging/subsystem.js";
