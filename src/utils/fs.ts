/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir } from "fs/promises";
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
 * Create a directory (and missing parents) unless it already exists
 *
 * @returns True if the directory was created by this call
 */
export async function ensureDirectory(path: string): Promise<boolean> {
  if (await fileExists(path)) {
    return false;
  }
  await mkdir(path, { recursive: true });
  return true;
}
