import { access, constants, readdir, rm } from "node:fs/promises";
import { join } from "node:path";

/**
 * Check if a file or directory exists
 *
 * @param path The path to check
 */
export async function exists(path: string) {
  try {
    await access(path, constants.F_OK);
  } catch {
    return false;
  }

  return true;
}

/**
 * Sleep for the specified number of milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mapToObject<T>(
  map: ReadonlyMap<string, T>,
): Record<string, T> {
  const object: Record<string, T> = {};

  for (const [key, value] of map) {
    object[key] = value;
  }

  return object;
}

/**
 * Recursively collect all directories below a root directory that satisfy
 * the given predicate.
 *
 * Matching directories are not descended into, so the result never contains
 * a path nested inside another result. A missing root yields no matches.
 *
 * @param root      Directory to search
 * @param predicate Receives the directory's base name
 */
export async function findDirectories(
  root: string,
  predicate: (name: string) => boolean,
): Promise<string[]> {
  if (!(await exists(root))) {
    return [];
  }

  const matches: string[] = [];
  const entries = await readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }

    const path = join(root, entry.name);

    if (predicate(entry.name)) {
      matches.push(path);
    } else {
      matches.push(...(await findDirectories(path, predicate)));
    }
  }

  return matches;
}

/**
 * Remove paths recursively, ignoring paths that don't exist
 */
export async function removePaths(paths: readonly string[]) {
  for (const path of paths) {
    await rm(path, { recursive: true, force: true });
  }
}

/**
 * Remove everything inside a directory, keeping the directory itself
 */
export async function emptyDirectory(path: string) {
  if (!(await exists(path))) {
    return;
  }

  const entries = await readdir(path);

  await removePaths(entries.map((entry) => join(path, entry)));
}
