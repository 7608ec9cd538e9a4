/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, readdir } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a directory exists and has at least one entry
 * A missing directory counts as empty
 */
export async function isNonEmptyDirectory(path: string): Promise<boolean> {
  if (!(await fileExists(path))) return false;
  const entries = await readdir(path);
  return entries.length > 0;
}
