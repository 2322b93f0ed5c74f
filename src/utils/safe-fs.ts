/**
 * Path-checked file access for the configuration file and the notification
 * store.
 *
 * Every path is resolved to absolute form first; empty paths and paths with
 * null bytes are rejected before the disk is touched. Writes go to a
 * temporary sibling file that is renamed over the target, so readers see
 * either the old or the new contents.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when a path is unusable.
 */
export class PathValidationError extends Error {
  /** The rejected path. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The rejected path.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Resolves a path to absolute form.
 *
 * @param filePath - Path from configuration or a caller.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }
  return path.resolve(filePath);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a UTF-8 text file.
 *
 * @param filePath - File to read.
 */
export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Reads a UTF-8 text file, or returns null when it does not exist yet.
 * Every other failure is rethrown.
 *
 * @param filePath - File to read.
 */
export async function readTextFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await readTextFile(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Options for {@link writeTextFileAtomic}.
 */
export interface AtomicWriteOptions {
  /** Called when the temporary file could not be removed after a failed write. */
  readonly onCleanupError?: (tempPath: string, error: unknown) => void;
}

/**
 * Writes a UTF-8 text file through a temporary sibling and a rename,
 * creating the parent directory when needed.
 *
 * @param filePath - Target file.
 * @param data - New contents.
 * @param options - Cleanup callback.
 * @throws The write or rename error; the target keeps its previous contents.
 */
export async function writeTextFileAtomic(
  filePath: string,
  data: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const target = validatePath(filePath);
  const directory = path.dirname(target);
  const tempPath = path.join(directory, `.${path.basename(target)}-${randomUUID()}.tmp`);

  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(tempPath, data, 'utf-8');
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      options.onCleanupError?.(tempPath, cleanupError);
    });
    throw error;
  }
}
