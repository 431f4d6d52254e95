import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { matchesPattern } from "./file-discovery.js";

const log = createSubsystemLogger("ingest/watcher");

/**
 * Event emitted when a matching file changes.
 */
export type FileChangeEvent = {
  path: string;
  eventType: "add" | "change" | "unlink";
};

/**
 * Callback for file change events.
 */
export type FileChangeCallback = (event: FileChangeEvent) => void;

/**
 * Options for the file watcher.
 */
export type WatcherOptions = {
  /** Debounce threshold in ms before considering file write finished */
  stabilityThreshold?: number;
  /** Poll interval for awaitWriteFinish */
  pollInterval?: number;
  /** Whether to emit events for existing files on start */
  emitExisting?: boolean;
};

const DEFAULT_STABILITY_THRESHOLD = 500;
const DEFAULT_POLL_INTERVAL = 100;

/**
 * Watches a directory tree for log files whose names match the pattern.
 */
export function createWatcher(
  directory: string,
  pattern: string,
  onFileChange: FileChangeCallback,
  options: WatcherOptions = {},
): FSWatcher {
  const stabilityThreshold = options.stabilityThreshold ?? DEFAULT_STABILITY_THRESHOLD;
  const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;

  const watcher = chokidar.watch(directory, {
    ignoreInitial: !options.emitExisting,
    awaitWriteFinish: {
      stabilityThreshold,
      pollInterval,
    },
    followSymlinks: true,
    ignored: (filePath, stats) => {
      // Directories must stay visible so nested log files are found
      if (!stats?.isFile()) {
        return path.basename(filePath).startsWith(".") && filePath !== directory;
      }
      return !matchesPattern(filePath, pattern);
    },
  });

  const emitEvent = (eventType: FileChangeEvent["eventType"], filePath: string) => {
    if (!matchesPattern(filePath, pattern)) {
      log.debug(`Ignoring file change (pattern mismatch): ${filePath}`);
      return;
    }
    log.debug(`File ${eventType}: ${filePath}`);
    onFileChange({ path: filePath, eventType });
  };

  watcher.on("add", (filePath) => emitEvent("add", filePath));
  watcher.on("change", (filePath) => emitEvent("change", filePath));
  watcher.on("unlink", (filePath) => emitEvent("unlink", filePath));
  watcher.on("error", (error) => {
    log.error(`Watcher error: ${String(error)}`);
  });

  return watcher;
}
