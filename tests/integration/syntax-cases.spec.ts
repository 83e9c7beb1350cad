// flowbind/tests/integration/syntax-cases.spec.ts
//
// Integration tests for template syntax coverage, through the public entry
// point.
//
// These tests focus on:
//  - End-to-end parsing + rendering for every supported syntax primitive.
//  - Operator precedence and the integer/float rules as seen in output.
//  - All six data sources.
//  - Calls and pipelines through a registry.
//  - Negative cases for invalid syntax and failing renders.
//

import { describe, it, expect } from 'vitest';
import {
  Context,
  DataNotFoundError,
  EvaluationError,
  MathError,
  ParseError,
  TemplateError,
  TypeConversionError,
  asString,
  createRegistry,
  fromJson,
  integerValue,
  lengthOf,
  parseWithFunctions,
  stringValue,
} from '../../src';

// -----------------------------------------------------------------------------
// Shared context & registry
// -----------------------------------------------------------------------------

const registry = createRegistry()
  .withFunction('upper', ([v]) => stringValue(asString(v).toUpperCase()))
  .withFunction('trim', ([v]) => stringValue(asString(v).trim()))
  .withFunction('len', ([v]) => integerValue(lengthOf(v)))
  .withFunction('concat', (args) => stringValue(args.map(asString).join('')));

function buildContext(): Context {
  return new Context({ clock: () => new Date('2024-05-01T12:30:45.123Z') })
    .setInput(
      fromJson({
        n: 10,
        m: 3,
        price: 2.5,
        flag: true,
        text: 'hello',
        padded: '  spaced  ',
        user: { name: 'Alice', age: 21, tags: ['a', 'b'] },
      }),
    )
    .addNodeOutput('http', fromJson({ status: 200, body: { ok: true } }))
    .setEnv('API_URL', 'https://api.example.test')
    .setExecutionData('id', stringValue('exec-1'))
    .setWorkflowData('name', stringValue('Onboarding'));
}

function renderTemplate(source: string, ctx: Context = buildContext()): string {
  return parseWithFunctions(source, registry).render(ctx);
}

function catchError(fn: () => unknown): Error {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error('expected an error');
}

// -----------------------------------------------------------------------------
// Literals & text
// -----------------------------------------------------------------------------

describe('Syntax – literals and text', () => {
  it.each([
    ['{{ 42 }}', '42'],
    ['{{ 3.14 }}', '3.14'],
    ['{{ "double" }}', 'double'],
    ["{{ 'single' }}", 'single'],
    ['{{ true }}', 'true'],
    ['{{ null }}', 'null'],
    ['{{ "tab\\there" }}', 'tab\there'],
  ])('renders %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });

  it('keeps surrounding text and whitespace', () => {
    expect(renderTemplate('  a {{1}} b\n{{ 2 }}  ')).toBe('  a 1 b\n2  ');
  });
});

// -----------------------------------------------------------------------------
// Operators
// -----------------------------------------------------------------------------

describe('Syntax – operators', () => {
  it.each([
    ['{{ $input.n + $input.m * 2 }}', '16'],
    ['{{ ($input.n + $input.m) * 2 }}', '26'],
    ['{{ $input.n - $input.m - 1 }}', '6'],
    ['{{ $input.n / 4 }}', '2.5'],
    ['{{ $input.price * 2 }}', '5'],
    ['{{ -$input.n }}', '-10'],
    ['{{ $input.text + " world" }}', 'hello world'],
    ['{{ "n=" + $input.n }}', 'n=10'],
  ])('evaluates arithmetic %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });

  it.each([
    ['{{ $input.n < 20 && $input.flag }}', 'true'],
    ['{{ $input.n == 10 }}', 'true'],
    ['{{ $input.n != 10 }}', 'false'],
    ['{{ !$input.flag || false }}', 'false'],
    ['{{ $input.m < 5 == true }}', 'true'],
  ])('evaluates comparison and logic %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });

  it.each([
    ['{{ $input.n < 5 ? "small" : "big" }}', 'big'],
    ['{{ if($input.flag, "on", "off") }}', 'on'],
    ['{{ if(false, "x") }}', 'null'],
    ['{{ $input.flag ? $input.m < 5 ? "a" : "b" : "c" }}', 'a'],
  ])('evaluates conditionals %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });
});

// -----------------------------------------------------------------------------
// Data sources
// -----------------------------------------------------------------------------

describe('Syntax – data sources', () => {
  it.each([
    ['{{ $input.user.name }}', 'Alice'],
    ['{{ $input.user.tags.1 }}', 'b'],
    ['{{ $node("http").json.status }}', '200'],
    ["{{ $node('http').body.ok }}", 'true'],
    ['{{ $env.API_URL }}', 'https://api.example.test'],
    ['{{ $execution.id }}', 'exec-1'],
    ['{{ $workflow.name }}', 'Onboarding'],
    ['{{ $system.datetime.date }}', '2024-05-01'],
    ['{{ $system.datetime.timestamp }}', '1714566645'],
  ])('reads %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });

  it('interpolates several sources in one template', () => {
    expect(
      renderTemplate('Dear {{ $input.user.name }}, run {{ $execution.id }} of {{ $workflow.name }}.'),
    ).toBe('Dear Alice, run exec-1 of Onboarding.');
  });
});

// -----------------------------------------------------------------------------
// Functions & pipelines
// -----------------------------------------------------------------------------

describe('Syntax – functions and pipelines', () => {
  it.each([
    ['{{ $input.user.name | upper }}', 'ALICE'],
    ['{{ $input.padded | trim | upper }}', 'SPACED'],
    ['{{ $input.user.tags | len }}', '2'],
    ['{{ concat($input.text, "-", $input.n) }}', 'hello-10'],
    ['{{ $input.text | concat("!", "?") }}', 'hello!?'],
    ['{{ upper(if($input.flag, "yes", "no")) }}', 'YES'],
    ['{{ $input.n + 1 | concat(" items") }}', '11 items'],
  ])('renders %s', (source, expected) => {
    expect(renderTemplate(source)).toBe(expected);
  });
});

// -----------------------------------------------------------------------------
// Negative cases
// -----------------------------------------------------------------------------

describe('Syntax – invalid templates', () => {
  it.each([
    '{{ $unknown }}',
    '{{ 1 + }}',
    '{{ }}',
    '{{ $input.n',
    '{{ $node(http) }}',
    '{{ $env }}',
    '{{ if(1) }}',
    '{{ name }}',
  ])('rejects %s at parse time', (source) => {
    expect(() => parseWithFunctions(source, registry)).toThrow(ParseError);
  });

  it('fails renders with typed errors', () => {
    expect(catchError(() => renderTemplate('{{ $input.missing }}'))).toBeInstanceOf(
      DataNotFoundError,
    );
    expect(catchError(() => renderTemplate('{{ $input.n / 0 }}'))).toBeInstanceOf(MathError);
    expect(catchError(() => renderTemplate('{{ $input.user }}'))).toBeInstanceOf(
      TypeConversionError,
    );
    expect(catchError(() => renderTemplate('{{ $input.n > 3 }}'))).toBeInstanceOf(
      EvaluationError,
    );
  });

  it('reports the missing path', () => {
    const err = catchError(() => renderTemplate('{{ $input.user.email }}'));
    expect(err).toBeInstanceOf(DataNotFoundError);
    if (err instanceof DataNotFoundError) {
      expect(err.path).toBe('$input.user.email');
      expect(err.available).toEqual(['$input']);
    }
  });

  it('derives every engine error from TemplateError', () => {
    expect(catchError(() => renderTemplate('{{ nope() }}'))).toBeInstanceOf(TemplateError);
    expect(catchError(() => parseWithFunctions('{{', registry))).toBeInstanceOf(TemplateError);
  });
});
