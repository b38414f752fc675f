import { describe, it, expect } from 'vitest';
import { constructorOf, methodOf } from '../../test-fixtures/descriptors.js';
import { InvocationMarshalError, InvocationTargetError, NullArgumentError } from './errors.js';
import { ConstructorFunctor, MethodFunctor, functorFor } from './functor.js';
import { requireNonNull } from './preconditions.js';

class Greeter {
  readonly name: string;
  readonly volume = 1;

  constructor(name: string) {
    this.name = requireNonNull(name, 'name');
  }

  greet(who: string, punctuation: string): string {
    return `${this.name} greets ${who}${punctuation}`;
  }

  static shout(text: string): string {
    return text.toUpperCase();
  }

  fail(reason: string): never {
    throw new RangeError(reason);
  }

  throwText(): never {
    throw 'boom';
  }

  join(separator: string, ...parts: string[]): string {
    return parts.join(separator);
  }
}

class LoudGreeter extends Greeter {
  override greet(who: string): string {
    return `${who}!!!`;
  }
}

abstract class Shape {}

function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the action to throw');
}

describe('ConstructorFunctor', () => {
  const ctor = constructorOf(Greeter, [{ type: 'string', markers: ['Custom'] }]);

  it('exposes parameter types and annotations in order', () => {
    const functor = new ConstructorFunctor(ctor);

    expect(functor.parameterTypes).toEqual(['string']);
    expect(functor.parameterAnnotations.map((markers) => [...markers])).toEqual([['Custom']]);
    expect(functor.toString()).toBe('new Greeter(string)');
  });

  it('constructs an instance', () => {
    const created = new ConstructorFunctor(ctor).invoke(undefined, ['Ada']);

    expect(created).toBeInstanceOf(Greeter);
    expect(created instanceof Greeter && created.name).toBe('Ada');
  });

  it('wraps what the constructor throws', () => {
    const error = thrownBy(() => new ConstructorFunctor(ctor).invoke(undefined, [null]));

    expect(error).toBeInstanceOf(InvocationTargetError);
    if (error instanceof InvocationTargetError) {
      expect(error.targetError).toBeInstanceOf(NullArgumentError);
      expect(error.cause).toBe(error.targetError);
      expect(error.message).toBe('new Greeter(string) threw during invocation');
    }
  });

  it('refuses abstract classes', () => {
    const functor = new ConstructorFunctor(constructorOf(Shape, [], ['public', 'abstract']));

    expect(() => functor.invoke(undefined, [])).toThrow(InvocationMarshalError);
    expect(() => functor.invoke(undefined, [])).toThrow(
      'Cannot invoke new Shape(): abstract class cannot be instantiated'
    );
  });

  it('refuses an argument list of the wrong length', () => {
    expect(() => new ConstructorFunctor(ctor).invoke(undefined, [])).toThrow(
      'Cannot invoke new Greeter(string): expected 1 arguments, got 0'
    );
  });
});

describe('MethodFunctor', () => {
  const greet = methodOf(Greeter, 'greet', [{ type: 'string' }, { type: 'string' }]);

  it('calls an instance method on the receiver', () => {
    const result = new MethodFunctor(greet).invoke(new Greeter('Ada'), ['Bob', '.']);

    expect(result).toBe('Ada greets Bob.');
  });

  it('dispatches to an override on a subclass instance', () => {
    const result = new MethodFunctor(greet).invoke(new LoudGreeter('Ada'), ['Bob', '.']);

    expect(result).toBe('Bob!!!');
  });

  it('calls a static method on the class without a receiver', () => {
    const shout = methodOf(Greeter, 'shout', [{ type: 'string' }], ['public', 'static']);

    expect(new MethodFunctor(shout).invoke(undefined, ['hi'])).toBe('HI');
    expect(String(new MethodFunctor(shout))).toBe('static Greeter.shout(string)');
  });

  it('wraps errors and non-error values thrown by the method', () => {
    const fail = methodOf(Greeter, 'fail', [{ type: 'string' }]);
    const throwText = methodOf(Greeter, 'throwText', []);
    const receiver = new Greeter('Ada');

    const failure = thrownBy(() => new MethodFunctor(fail).invoke(receiver, ['no']));
    const text = thrownBy(() => new MethodFunctor(throwText).invoke(receiver, []));

    expect(failure instanceof InvocationTargetError && failure.targetError).toBeInstanceOf(RangeError);
    expect(text instanceof InvocationTargetError && text.targetError).toBe('boom');
  });

  it.each([
    [undefined, 'instance method needs a receiver'],
    [null, 'instance method needs a receiver'],
    ['Ada', 'instance method needs a receiver'],
    [{}, 'receiver is not an instance of Greeter'],
  ])('refuses receiver %s', (receiver, reason) => {
    expect(() => new MethodFunctor(greet).invoke(receiver, ['Bob', '.'])).toThrow(
      `Cannot invoke Greeter.greet(string, string): ${reason}`
    );
  });

  it('refuses private names', () => {
    const secret = methodOf(Greeter, '#secret', [], ['private']);

    expect(() => new MethodFunctor(secret).invoke(new Greeter('Ada'), [])).toThrow(
      'Cannot invoke Greeter.#secret(): private names cannot be reached from outside the class'
    );
  });

  it('refuses properties that are not functions', () => {
    const volume = methodOf(Greeter, 'volume', []);

    expect(() => new MethodFunctor(volume).invoke(new Greeter('Ada'), [])).toThrow(
      "Cannot invoke Greeter.volume(): property 'volume' is not a function"
    );
  });

  describe('rest parameters', () => {
    const join = methodOf(Greeter, 'join', [{ type: 'string' }, { type: 'Array', rest: true }]);

    it('spreads the rest array', () => {
      expect(new MethodFunctor(join).invoke(new Greeter('Ada'), ['-', ['a', 'b']])).toBe('a-b');
    });

    it('passes nothing for an absent rest argument', () => {
      expect(new MethodFunctor(join).invoke(new Greeter('Ada'), ['-', null])).toBe('');
    });

    it('refuses a rest argument that is not an array', () => {
      expect(() => new MethodFunctor(join).invoke(new Greeter('Ada'), ['-', 'a'])).toThrow(
        "Cannot invoke Greeter.join(string, Array): rest argument 'arg1' is not an array"
      );
    });
  });
});

describe('functorFor', () => {
  it('picks the functor matching the member kind', () => {
    expect(functorFor(constructorOf(Greeter, [{ type: 'string' }]))).toBeInstanceOf(ConstructorFunctor);
    expect(functorFor(methodOf(Greeter, 'greet', []))).toBeInstanceOf(MethodFunctor);
  });
});
