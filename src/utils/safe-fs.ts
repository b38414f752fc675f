/**
 * File system helpers that validate every path before touching the disk.
 *
 * Paths are resolved to absolute form first, so configuration and source
 * locations are reported the same way whatever the working directory.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @param baseDir - Directory relative paths are resolved against.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string, baseDir?: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return baseDir === undefined ? path.resolve(filePath) : path.resolve(baseDir, filePath);
}

/**
 * Checks whether a validated path exists.
 *
 * @param filePath - The path to check.
 * @returns True if something exists at the path.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fs.existsSync(validatedPath);
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fs.readFileSync(validatedPath, 'utf8');
}
