/**
 * Reads constructor and method descriptors of runtime classes from their
 * TypeScript declarations.
 *
 * @module reflect/source-enumerator
 */

import {
  Node,
  Scope,
  type ClassDeclaration,
  type ConstructorDeclaration,
  type MethodDeclaration,
  type Project,
} from 'ts-morph';
import { DEFAULT_ENUMERATION } from '../config/defaults.js';
import type { EnumerationConfig } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { safeExistsSync, validatePath } from '../utils/safe-fs.js';
import { createProject } from './project.js';
import { describeParameters, hasTag, taggedNames } from './type-erasure.js';
import {
  OPTIONAL_MARKER,
  memberId,
  type ClassType,
  type ConstructorMember,
  type MemberEnumerator,
  type MethodMember,
  type Modifier,
  type ParameterDescriptor,
} from './types.js';

/**
 * Error thrown when a runtime class cannot be matched to exactly one declaration.
 */
export class ClassNotFoundError extends Error {
  /** Name of the runtime class. */
  public readonly className: string;
  /** Files declaring a class of that name, when more than one does. */
  public readonly candidates: readonly string[];

  constructor(className: string, candidates: readonly string[] = []) {
    const detail =
      candidates.length > 1
        ? `declared in more than one source file: ${candidates.join(', ')}`
        : 'no declaration found in the added source files';
    super(`Class '${className}' ${detail}`);
    this.name = 'ClassNotFoundError';
    this.className = className;
    this.candidates = candidates;
  }
}

/**
 * Error thrown when a requested constructor or method does not exist.
 */
export class MemberNotFoundError extends Error {
  constructor(className: string, memberName: string, index: number) {
    super(`No ${memberName} #${String(index)} declared by class '${className}'`);
    this.name = 'MemberNotFoundError';
  }
}

/**
 * Error thrown when a source file to add does not exist.
 */
export class SourceFileNotFoundError extends Error {
  constructor(filePath: string) {
    super(`Source file not found: ${filePath}`);
    this.name = 'SourceFileNotFoundError';
  }
}

/**
 * Options for {@link SourceEnumerator}.
 */
export interface SourceEnumeratorOptions {
  /** Existing project to read from. Created with {@link createProject} when absent. */
  project?: Project;
  /** tsconfig.json used when a project is created. */
  tsConfigPath?: string;
  /** Source files declaring the classes under test. */
  sourceFiles?: readonly string[];
  /** JSDoc tags recognised on members. */
  enumeration?: EnumerationConfig;
  logger?: Logger;
}

interface ClassMembers {
  readonly constructors: readonly ConstructorMember[];
  readonly methods: readonly MethodMember[];
}

/**
 * Lists the members of runtime classes by reading their declarations with ts-morph.
 *
 * A runtime class is matched to the declaration with the same name among the
 * added source files. Descriptors are cached per class.
 *
 * @example
 * ```typescript
 * const enumerator = new SourceEnumerator({ sourceFiles: ['src/widget.ts'] });
 * const [ctor] = enumerator.declaredConstructors(Widget);
 * ```
 */
export class SourceEnumerator implements MemberEnumerator {
  private readonly project: Project;
  private readonly enumeration: EnumerationConfig;
  private readonly logger: Logger;
  private readonly cache = new Map<ClassType, ClassMembers>();

  constructor(options: SourceEnumeratorOptions = {}) {
    this.project = options.project ?? createProject(options.tsConfigPath);
    this.enumeration = options.enumeration ?? DEFAULT_ENUMERATION;
    this.logger = (options.logger ?? defaultLogger).child('enumerator');

    for (const sourceFile of options.sourceFiles ?? []) {
      this.addSourceFile(sourceFile);
    }
  }

  /**
   * Adds a source file from disk.
   *
   * @throws {SourceFileNotFoundError} If the file does not exist.
   */
  addSourceFile(filePath: string): this {
    const resolved = validatePath(filePath);
    if (!safeExistsSync(resolved)) {
      throw new SourceFileNotFoundError(resolved);
    }
    this.project.addSourceFileAtPath(resolved);
    this.cache.clear();
    return this;
  }

  /**
   * Adds an in-memory source file, replacing any file of the same name.
   */
  addSourceText(fileName: string, code: string): this {
    this.project.createSourceFile(fileName, code, { overwrite: true });
    this.cache.clear();
    return this;
  }

  declaredConstructors(type: ClassType): readonly ConstructorMember[] {
    return this.membersOf(type).constructors;
  }

  declaredMethods(type: ClassType): readonly MethodMember[] {
    return this.membersOf(type).methods;
  }

  /**
   * Returns one constructor of `type`. Overload signatures come first, in
   * declaration order, followed by the implementation.
   *
   * @throws {MemberNotFoundError} If there is no constructor at `index`.
   */
  findConstructor(type: ClassType, index = 0): ConstructorMember {
    const found = this.declaredConstructors(type)[index];
    if (found === undefined) {
      throw new MemberNotFoundError(type.name, 'constructor', index);
    }
    return found;
  }

  /**
   * Returns one method named `name`, ordered as for {@link findConstructor}.
   *
   * @throws {MemberNotFoundError} If there is no such method at `index`.
   */
  findMethod(type: ClassType, name: string, index = 0): MethodMember {
    const found = this.declaredMethods(type).filter((method) => method.name === name)[index];
    if (found === undefined) {
      throw new MemberNotFoundError(type.name, `method '${name}'`, index);
    }
    return found;
  }

  private membersOf(type: ClassType): ClassMembers {
    const cached = this.cache.get(type);
    if (cached !== undefined) {
      return cached;
    }

    const declaration = this.resolveClass(type);
    const members: ClassMembers = {
      constructors: this.buildConstructors(declaration, type),
      methods: this.buildMethods(declaration, type),
    };
    this.cache.set(type, members);

    this.logger.debug('class_enumerated', {
      className: type.name,
      filePath: declaration.getSourceFile().getFilePath(),
      constructors: members.constructors.length,
      methods: members.methods.length,
    });

    return members;
  }

  private resolveClass(type: ClassType): ClassDeclaration {
    const name = type.name;
    if (name === '') {
      throw new ClassNotFoundError('<anonymous>');
    }

    const matches = this.project
      .getSourceFiles()
      .flatMap((sourceFile) => sourceFile.getClasses())
      .filter((declaration) => declaration.getName() === name);

    const [first, ...others] = matches;
    if (first === undefined) {
      throw new ClassNotFoundError(name);
    }
    if (others.length > 0) {
      throw new ClassNotFoundError(
        name,
        matches.map((declaration) => declaration.getSourceFile().getFilePath())
      );
    }
    return first;
  }

  /**
   * A class that declares no constructor gets the implicit one. In a derived
   * class it forwards its arguments to the nearest base class that declares
   * a constructor, so it takes that class's signatures. A base class with no
   * declaration in the project (a library or built-in class) contributes no
   * parameters. Implicit constructors are always marked synthetic.
   */
  private buildConstructors(declaration: ClassDeclaration, type: ClassType): ConstructorMember[] {
    const abstractClass = declaration.isAbstract();
    const declared = declaration.getConstructors();
    if (declared.length > 0) {
      return this.constructorMembers(declared, type, abstractClass, false);
    }

    for (let base = declaration.getBaseClass(); base !== undefined; base = base.getBaseClass()) {
      const inherited = base.getConstructors();
      if (inherited.length > 0) {
        return this.constructorMembers(inherited, type, abstractClass, true);
      }
    }

    const modifiers = new Set<Modifier>(['public']);
    if (abstractClass) {
      modifiers.add('abstract');
    }
    return [
      {
        kind: 'constructor',
        id: memberId('constructor', type.name, 'constructor', false, []),
        className: type.name,
        declaringType: type,
        modifiers,
        parameters: [],
        synthetic: true,
      },
    ];
  }

  private constructorMembers(
    implementations: readonly ConstructorDeclaration[],
    type: ClassType,
    abstractClass: boolean,
    implicit: boolean
  ): ConstructorMember[] {
    // Body-less declarations (ambient classes) are each listed on their own.
    return implementations.flatMap((implementation) =>
      withOverloads(
        implementation,
        implementation.isImplementation() ? implementation.getOverloads() : []
      ).map(({ node, synthetic }) => {
        const parameters = this.parametersOf(node);
        const modifiers = new Set<Modifier>([this.scopeOf(node)]);
        if (abstractClass) {
          modifiers.add('abstract');
        }
        const member: ConstructorMember = {
          kind: 'constructor',
          id: memberId('constructor', type.name, 'constructor', false, typeTexts(parameters)),
          className: type.name,
          declaringType: type,
          modifiers,
          parameters,
          synthetic: implicit || synthetic,
        };
        return member;
      })
    );
  }

  private buildMethods(declaration: ClassDeclaration, type: ClassType): MethodMember[] {
    return declaration.getMethods().flatMap((implementation) =>
      withOverloads(
        implementation,
        implementation.isImplementation() ? implementation.getOverloads() : []
      ).map(({ node, synthetic }) => {
        const name = node.getName();
        const parameters = this.parametersOf(node);
        const modifiers = new Set<Modifier>([this.scopeOf(node)]);
        if (node.isStatic()) {
          modifiers.add('static');
        }
        if (node.isAbstract()) {
          modifiers.add('abstract');
        }
        const member: MethodMember = {
          kind: 'method',
          id: memberId('method', type.name, name, node.isStatic(), typeTexts(parameters)),
          className: type.name,
          name,
          declaringType: type,
          modifiers,
          parameters,
          synthetic,
        };
        return member;
      })
    );
  }

  private parametersOf(node: ConstructorDeclaration | MethodDeclaration): ParameterDescriptor[] {
    return describeParameters(
      node.getParameters(),
      taggedNames(node, this.enumeration.nullable_tag)
    );
  }

  private scopeOf(node: ConstructorDeclaration | MethodDeclaration): Modifier {
    if (Node.isMethodDeclaration(node) && node.getName().startsWith('#')) {
      return 'private';
    }
    switch (node.getScope()) {
      case Scope.Private:
        return 'private';
      case Scope.Protected:
        return 'protected';
      case Scope.Public:
        return hasTag(node, this.enumeration.internal_tag) ? 'internal' : 'public';
    }
  }
}

/**
 * Lists the overload signatures of a member followed by its implementation,
 * which is synthetic when overloads exist.
 */
function withOverloads<T>(
  implementation: T,
  overloads: readonly T[]
): Array<{ node: T; synthetic: boolean }> {
  if (overloads.length === 0) {
    return [{ node: implementation, synthetic: false }];
  }
  return [
    ...overloads.map((node) => ({ node, synthetic: false })),
    { node: implementation, synthetic: true },
  ];
}

/**
 * Parameter list of a member id. Optional and rest parameters are marked so
 * that an implementation signature does not share the id of an overload.
 */
function typeTexts(parameters: readonly ParameterDescriptor[]): string[] {
  return parameters.map((parameter) => {
    if (parameter.rest) {
      return `...${parameter.typeText}`;
    }
    return parameter.markers.has(OPTIONAL_MARKER) ? `${parameter.typeText}?` : parameter.typeText;
  });
}
