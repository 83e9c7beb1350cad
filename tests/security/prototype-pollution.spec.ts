// flowbind/tests/security/prototype-pollution.spec.ts
//
// Security-focused tests for prototype pollution and host-object access.
//
// Templates read workflow data that often comes straight from external
// JSON. Expressions must not be able to:
//  - reach JavaScript prototypes or built-in properties through paths,
//  - call host functions that were never registered,
//  - turn a "__proto__" key in the data into a prototype change.
// Normal property access keeps working.

import { describe, it, expect } from 'vitest';
import {
  Context,
  DataNotFoundError,
  FunctionError,
  ParseError,
  fromJson,
  parse,
  render,
  stringValue,
  toJson,
} from '../../src';

function catchError(fn: () => unknown): Error {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error('expected an error');
}

const hostile = '{"__proto__": {"polluted": "yes"}, "a": {"b": 1}, "tags": ["x"]}';

function hostileContext(): Context {
  return new Context().setInput(fromJson(JSON.parse(hostile)));
}

// -----------------------------------------------------------------------------
// Baseline
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: baseline', () => {
  it('keeps ordinary paths working', () => {
    expect(render('{{ $input.a.b }} {{ $input.tags.0 }}', hostileContext())).toBe('1 x');
  });
});

// -----------------------------------------------------------------------------
// Data keys
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: data keys', () => {
  it('treats a "__proto__" key as plain data', () => {
    expect(render('{{ $input.__proto__.polluted }}', hostileContext())).toBe('yes');
    expect('polluted' in {}).toBe(false);
  });

  it('keeps "__proto__" an own key when converting back', () => {
    const out = toJson(fromJson(JSON.parse(hostile)));

    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
    expect(Object.prototype.hasOwnProperty.call(out, '__proto__')).toBe(true);
    expect('polluted' in {}).toBe(false);
  });
});

// -----------------------------------------------------------------------------
// Built-in properties
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: built-in properties', () => {
  it.each([
    ['{{ $input.constructor }}', '$input.constructor'],
    ['{{ $input.a.toString }}', '$input.a.toString'],
    ['{{ $input.a.hasOwnProperty }}', '$input.a.hasOwnProperty'],
    ['{{ $input.tags.length }}', '$input.tags.length'],
    ['{{ $input.tags.map }}', '$input.tags.map'],
  ])('does not resolve %s', (source, path) => {
    const err = catchError(() => render(source, hostileContext()));
    expect(err).toBeInstanceOf(DataNotFoundError);
    if (err instanceof DataNotFoundError) {
      expect(err.path).toBe(path);
    }
  });

  it('does not resolve built-ins on metadata and environment stores', () => {
    const ctx = new Context().setExecutionData('id', stringValue('exec-1'));

    expect(catchError(() => render('{{ $execution.constructor }}', ctx))).toBeInstanceOf(
      DataNotFoundError,
    );
    expect(catchError(() => render('{{ $workflow.__proto__ }}', ctx))).toBeInstanceOf(
      DataNotFoundError,
    );
    expect(catchError(() => render('{{ $env.toString }}', ctx))).toBeInstanceOf(
      DataNotFoundError,
    );
  });

  it('does not resolve built-ins on $system', () => {
    expect(
      catchError(() => render('{{ $system.datetime.valueOf }}', new Context())),
    ).toBeInstanceOf(DataNotFoundError);
  });
});

// -----------------------------------------------------------------------------
// Functions
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: functions', () => {
  it.each(['constructor', 'toString', 'hasOwnProperty', '__proto__'])(
    'does not call unregistered %s()',
    (name) => {
      const err = catchError(() => render(`{{ ${name}() }}`, new Context()));
      expect(err).toBeInstanceOf(FunctionError);
      expect(err.message).toBe(`Function '${name}': Function not found`);
    },
  );

  it('does not parse calls on data references', () => {
    expect(() => parse('{{ $input.fn() }}')).toThrow(ParseError);
  });
});
