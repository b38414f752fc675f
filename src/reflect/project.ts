/**
 * ts-morph project setup for reading class declarations.
 *
 * @module reflect/project
 */

import { Project, type ProjectOptions } from 'ts-morph';
import { safeExistsSync, validatePath } from '../utils/safe-fs.js';

/**
 * Error thrown when a tsconfig.json file cannot be found.
 */
export class TsConfigNotFoundError extends Error {
  constructor(tsConfigPath: string) {
    super(`tsconfig.json not found at path: ${tsConfigPath}`);
    this.name = 'TsConfigNotFoundError';
  }
}

/**
 * Creates a ts-morph Project for reading class declarations.
 *
 * Without a tsconfig the project is strict, because parameter nullability is
 * read from declared types and would be lost without strictNullChecks.
 *
 * @param tsConfigPath - Optional path to a tsconfig.json file.
 * @returns A ts-morph Project. Source files are added by the caller.
 * @throws {TsConfigNotFoundError} If tsConfigPath is provided but the file does not exist.
 *
 * @example
 * const project = createProject('./tsconfig.json');
 */
export function createProject(tsConfigPath?: string): Project {
  if (tsConfigPath !== undefined) {
    const resolvedPath = validatePath(tsConfigPath);

    if (!safeExistsSync(resolvedPath)) {
      throw new TsConfigNotFoundError(resolvedPath);
    }

    return new Project({
      tsConfigFilePath: resolvedPath,
      skipAddingFilesFromTsConfig: true,
    });
  }

  const defaultOptions: ProjectOptions = {
    compilerOptions: {
      strict: true,
      target: 99, // ScriptTarget.ESNext
      module: 199, // ModuleKind.NodeNext
      moduleResolution: 99, // ModuleResolutionKind.NodeNext
      esModuleInterop: true,
      skipLibCheck: true,
    },
  };

  return new Project(defaultOptions);
}
