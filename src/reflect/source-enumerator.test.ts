/**
 * Tests for the ts-morph member enumerator.
 *
 * @module reflect/source-enumerator.test
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { Project } from 'ts-morph';
import {
  ClassNotFoundError,
  MemberNotFoundError,
  SourceEnumerator,
  SourceFileNotFoundError,
} from './source-enumerator.js';

const SOURCE = `
export class Widget {
  constructor(name: string) {}
  rename(name: string, count: number): void {}
  static parse(text: string): Widget { return new Widget(text); }
  protected touch(widget: Widget): void {}
  private hide(widget: Widget): void {}
  /** @internal */
  reset(widget: Widget): void {}
  #secret(widget: Widget): void {}
  get label(): string { return ''; }
  handler = (value: string): void => {};
}

export class Implicit {
  run(): void {}
}

export abstract class Base {
  abstract describe(widget: Widget): string;
}

export class Overloaded {
  constructor(name: string);
  constructor(name: string, size: number);
  constructor(name: string, size?: number) {}

  pick(index: number): string;
  pick(key: string): string;
  pick(arg: number | string): string { return ''; }

  join(separator: string, ...parts: string[]): string { return ''; }
}

export class Derived extends Widget {}

export class Grandchild extends Derived {}

export abstract class Narrowed extends Overloaded {}

export class Tagged {
  /**
   * @maybe fallback
   * @hidden
   */
  lookup(key: string, fallback: Widget): void {}
}
`;

// Runtime counterparts, matched to the declarations above by name.
class Widget {}
class Implicit {}
abstract class Base {}
class Overloaded {}
class Tagged {}
class Unknown {}
class Derived {}
class Grandchild {}
abstract class Narrowed {}

function inMemoryProject(): Project {
  return new Project({
    useInMemoryFileSystem: true,
    compilerOptions: {
      strict: true,
      target: 99, // ESNext
      module: 199, // NodeNext
    },
  });
}

describe('SourceEnumerator', () => {
  let enumerator: SourceEnumerator;

  beforeAll(() => {
    enumerator = new SourceEnumerator({ project: inMemoryProject() }).addSourceText(
      'widget.ts',
      SOURCE
    );
  });

  describe('constructors', () => {
    it('describes a declared constructor', () => {
      const [ctor, ...others] = enumerator.declaredConstructors(Widget);

      expect(others).toHaveLength(0);
      expect(ctor?.id).toBe('new Widget(string)');
      expect(ctor?.className).toBe('Widget');
      expect(ctor?.declaringType).toBe(Widget);
      expect(ctor?.synthetic).toBe(false);
      expect([...(ctor?.modifiers ?? [])]).toEqual(['public']);
      expect(ctor?.parameters.map((p) => p.type)).toEqual(['string']);
    });

    it('synthesizes the implicit constructor', () => {
      const constructors = enumerator.declaredConstructors(Implicit);

      expect(constructors).toHaveLength(1);
      expect(constructors[0]?.id).toBe('new Implicit()');
      expect(constructors[0]?.synthetic).toBe(true);
      expect(constructors[0]?.parameters).toEqual([]);
    });

    it('takes the implicit constructor of a derived class from its base', () => {
      const [ctor, ...others] = enumerator.declaredConstructors(Derived);

      expect(others).toHaveLength(0);
      expect(ctor?.id).toBe('new Derived(string)');
      expect(ctor?.declaringType).toBe(Derived);
      expect(ctor?.synthetic).toBe(true);
      expect(ctor?.parameters.map((p) => p.name)).toEqual(['name']);
    });

    it('walks up to the nearest base that declares a constructor', () => {
      expect(enumerator.declaredConstructors(Grandchild).map((c) => c.id)).toEqual([
        'new Grandchild(string)',
      ]);
    });

    it('inherits every overload of the base constructor', () => {
      const constructors = enumerator.declaredConstructors(Narrowed);

      expect(constructors.map((c) => c.id)).toEqual([
        'new Narrowed(string)',
        'new Narrowed(string, number)',
        'new Narrowed(string, number?)',
      ]);
      expect(constructors.every((c) => c.synthetic && c.modifiers.has('abstract'))).toBe(true);
    });

    it('marks constructors of abstract classes abstract', () => {
      const [ctor] = enumerator.declaredConstructors(Base);

      expect(ctor?.modifiers.has('abstract')).toBe(true);
      expect(ctor?.modifiers.has('public')).toBe(true);
    });

    it('lists overloads before the synthetic implementation', () => {
      const constructors = enumerator.declaredConstructors(Overloaded);

      expect(constructors.map((c) => c.id)).toEqual([
        'new Overloaded(string)',
        'new Overloaded(string, number)',
        'new Overloaded(string, number?)',
      ]);
      expect(constructors.map((c) => c.synthetic)).toEqual([false, false, true]);
    });
  });

  describe('methods', () => {
    it('lists methods in declaration order, without accessors or properties', () => {
      const names = enumerator.declaredMethods(Widget).map((m) => m.name);

      expect(names).toEqual(['rename', 'parse', 'touch', 'hide', 'reset', '#secret']);
    });

    it.each([
      ['rename', 'Widget.rename(string, number)', ['public']],
      ['parse', 'static Widget.parse(string)', ['public', 'static']],
      ['touch', 'Widget.touch(Widget)', ['protected']],
      ['hide', 'Widget.hide(Widget)', ['private']],
      ['reset', 'Widget.reset(Widget)', ['internal']],
      ['#secret', 'Widget.#secret(Widget)', ['private']],
    ])('describes %s as %s', (name, id, modifiers) => {
      const method = enumerator.findMethod(Widget, name);

      expect(method.id).toBe(id);
      expect([...method.modifiers]).toEqual(modifiers);
    });

    it('marks abstract methods', () => {
      const method = enumerator.findMethod(Base, 'describe');

      expect(method.id).toBe('Base.describe(Widget)');
      expect([...method.modifiers]).toEqual(['public', 'abstract']);
    });

    it('lists method overloads and marks the implementation synthetic', () => {
      const picks = enumerator.declaredMethods(Overloaded).filter((m) => m.name === 'pick');

      expect(picks.map((m) => m.id)).toEqual([
        'Overloaded.pick(number)',
        'Overloaded.pick(string)',
        'Overloaded.pick(number | string)',
      ]);
      expect(picks.map((m) => m.synthetic)).toEqual([false, false, true]);
      expect(enumerator.findMethod(Overloaded, 'pick', 1).id).toBe('Overloaded.pick(string)');
    });

    it('renders rest parameters in the id', () => {
      expect(enumerator.findMethod(Overloaded, 'join').id).toBe(
        'Overloaded.join(string, ...string[])'
      );
    });
  });

  it('returns the same descriptors on every call', () => {
    expect(enumerator.declaredMethods(Widget)).toBe(enumerator.declaredMethods(Widget));
    expect(enumerator.findConstructor(Widget)).toBe(enumerator.findConstructor(Widget));
  });

  describe('configured tags', () => {
    it('reads the nullable and internal tag names from the enumeration config', () => {
      const tagged = new SourceEnumerator({
        project: inMemoryProject(),
        enumeration: { nullable_tag: 'maybe', internal_tag: 'hidden' },
      }).addSourceText('tagged.ts', SOURCE);

      const method = tagged.findMethod(Tagged, 'lookup');

      expect([...method.modifiers]).toEqual(['internal']);
      expect(method.parameters[1]?.markers.has('Nullable')).toBe(true);
      expect(method.parameters[0]?.markers.has('Nullable')).toBe(false);
    });

    it('ignores unknown tags under the default config', () => {
      const method = enumerator.findMethod(Tagged, 'lookup');

      expect([...method.modifiers]).toEqual(['public']);
      expect(method.parameters[1]?.markers.size).toBe(0);
    });
  });

  describe('errors', () => {
    it('raises ClassNotFoundError for a class with no declaration', () => {
      expect(() => enumerator.declaredConstructors(Unknown)).toThrow(ClassNotFoundError);
      expect(() => enumerator.declaredConstructors(Unknown)).toThrow(
        "Class 'Unknown' no declaration found in the added source files"
      );
    });

    it('raises ClassNotFoundError for anonymous classes', () => {
      const anonymous = (() => class {})();

      expect(() => enumerator.declaredMethods(anonymous)).toThrow(
        "Class '<anonymous>' no declaration found in the added source files"
      );
    });

    it('raises ClassNotFoundError naming every candidate when the name is ambiguous', () => {
      const ambiguous = new SourceEnumerator({ project: inMemoryProject() })
        .addSourceText('a.ts', 'export class Widget {}')
        .addSourceText('b.ts', 'export class Widget {}');

      let thrown: unknown;
      try {
        ambiguous.declaredConstructors(Widget);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ClassNotFoundError);
      if (thrown instanceof ClassNotFoundError) {
        expect(thrown.className).toBe('Widget');
        expect(thrown.candidates).toEqual(['/a.ts', '/b.ts']);
      }
    });

    it('raises MemberNotFoundError for missing members', () => {
      expect(() => enumerator.findMethod(Widget, 'missing')).toThrow(MemberNotFoundError);
      expect(() => enumerator.findConstructor(Widget, 1)).toThrow(
        "No constructor #1 declared by class 'Widget'"
      );
    });

    it('raises SourceFileNotFoundError for a file that does not exist', () => {
      expect(() =>
        new SourceEnumerator({ project: inMemoryProject() }).addSourceFile('/no/such/file.ts')
      ).toThrow(SourceFileNotFoundError);
    });
  });

  it('drops cached descriptors when sources change', () => {
    const local = new SourceEnumerator({ project: inMemoryProject() }).addSourceText(
      'implicit.ts',
      'export class Implicit { run(): void {} }'
    );
    const before = local.declaredMethods(Implicit);

    local.addSourceText('implicit.ts', 'export class Implicit { run(value: string): void {} }');
    const after = local.declaredMethods(Implicit);

    expect(before[0]?.id).toBe('Implicit.run()');
    expect(after[0]?.id).toBe('Implicit.run(string)');
  });
});
