import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "LOGSIFT_STATE_DIR";

/**
 * Directory for logsift's own state (configuration). `LOGSIFT_STATE_DIR`
 * overrides the default `~/.logsift`; a leading `~` is expanded.
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override));
  }
  return path.join(os.homedir(), ".logsift");
}

function expandHome(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}
