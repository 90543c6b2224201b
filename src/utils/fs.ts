import * as fs from 'fs';
import * as path from 'path';

/**
 * Check if a path exists
 */
export function exists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Read file as string
 */
export function readFileText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf8');
}

/**
 * Check if path is a regular file
 */
export function isFile(filePath: string): boolean {
  return exists(filePath) && fs.statSync(filePath).isFile();
}

/**
 * Find the nearest file with the given name, walking up from startDir.
 * Returns its absolute path, or null when no directory up to the root has it.
 */
export function findUp(name: string, startDir: string): string | null {
  let dir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(dir, name);
    if (isFile(candidate)) {
      return candidate;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}
