/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";

export * from "./logger.js";

// =============================================================================
// State Paths
// =============================================================================

export const STATE_DIR = ".graph-crawler";
export const CONFIG_FILE = "config.json";
export const CHECKPOINT_FILE = "checkpoint.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getStateDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, STATE_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getStateDir(projectRoot), CONFIG_FILE);
}

export function getCheckpointPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getStateDir(projectRoot), CHECKPOINT_FILE);
}

// =============================================================================
// File Operations
// =============================================================================

/**
 * Reads and parses a JSON file. Returns null when the file is missing;
 * a file that exists but does not parse is an error.
 */
export function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Writes `content` next to `filePath` first and renames it into place, so a
 * crash mid-write never leaves a truncated file behind.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  const handle = await fsp.open(tmpPath, "w");
  try {
    await handle.writeFile(content, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fsp.rename(tmpPath, filePath);
}
