import fs from "node:fs/promises";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { InvalidArgumentError, toFileError } from "./errors.js";

const log = createSubsystemLogger("ingest/file-discovery");

export const DEFAULT_FILE_PATTERN = "*.log";

const patternCache = new Map<string, RegExp>();

function patternToRegExp(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    const source = pattern
      .replace(/[.+^${}()|[\]\\]/g, "\\$&")
      .replace(/\*/g, ".*")
      .replace(/\?/g, ".");
    regex = new RegExp(`^${source}$`);
    patternCache.set(pattern, regex);
  }
  return regex;
}

/**
 * Checks a file's base name against a wildcard pattern (`*` and `?`).
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  return patternToRegExp(pattern).test(path.basename(filePath));
}

/**
 * Recursively lists files under a directory whose names match the pattern,
 * sorted by full path so repeated scans see the same order.
 */
export async function findMatchingFiles(
  directoryPath: string,
  pattern: string = DEFAULT_FILE_PATTERN,
): Promise<string[]> {
  if (!directoryPath) {
    throw InvalidArgumentError.emptyPath("directoryPath");
  }
  if (!pattern) {
    throw InvalidArgumentError.emptyPath("pattern");
  }

  const stat = await fs.stat(directoryPath).catch((err: unknown) => {
    throw toFileError(directoryPath, err);
  });
  if (!stat.isDirectory()) {
    throw new InvalidArgumentError(`Not a directory: ${directoryPath}`);
  }

  const files = await walkDirectory(directoryPath);
  const matching = files.filter((file) => matchesPattern(file, pattern)).sort();

  log.debug(`Found ${matching.length} files matching ${pattern}`, {
    directory: directoryPath,
    scanned: files.length,
  });
  return matching;
}

/**
 * Recursively walks a directory and returns all regular files.
 */
async function walkDirectory(dir: string): Promise<string[]> {
  const files: string[] = [];

  const entries = await fs.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    throw toFileError(dir, err);
  });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const subFiles = await walkDirectory(fullPath);
      files.push(...subFiles);
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}
