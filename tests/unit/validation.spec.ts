// flowbind/tests/unit/validation.spec.ts
//
// Unit tests for static template validation: registry and arity checks,
// function and data-source restrictions, size limits, operator warnings,
// issue ordering and parse-error capture.

import { describe, it, expect } from 'vitest';
import { validateSource, validateTemplate } from '../../src/utils/validation';
import { parse } from '../../src/core/template';
import { ParseError } from '../../src/core/errors';
import { createRegistry } from '../../src/core/registry';
import { asString, integerValue, stringValue } from '../../src/core/value';

const registry = createRegistry()
  .withFunction('upper', ([v]) => stringValue(asString(v).toUpperCase()))
  .withFunction('lower', ([v]) => stringValue(asString(v).toLowerCase()))
  .withFunction('pad', ([v]) => v, {
    parameters: [{ name: 'text' }, { name: 'width', default: integerValue(8) }],
  })
  .withFunction('concat', ([v]) => v, {
    parameters: [{ name: 'values' }],
    variadic: true,
  })
  .withFunction('now', () => stringValue('2024-01-01'), { parameters: [] });

// -----------------------------------------------------------------------------
// Functions
// -----------------------------------------------------------------------------

describe('Validation – functions', () => {
  it('reports functions missing from an absent registry', () => {
    const result = validateSource('{{ $input.a | upper }}');

    expect(result.ok).toBe(false);
    expect(result.issues).toEqual([
      {
        code: 'VAL_UNKNOWN_FUNCTION',
        rule: 'registry',
        severity: 'error',
        message: 'Function "upper" is not registered.',
        note: 'The template was parsed without a function registry.',
        location: { index: 14, length: 5, line: 1, column: 15 },
        meta: { function: 'upper' },
      },
    ]);
    expect(result.stats).toEqual({
      expressionCount: 1,
      nodeCount: 2,
      maxDepth: 2,
      totalFunctionCalls: 1,
      totalDataAccesses: 1,
    });
  });

  it('reports an unknown function once and without the registry note', () => {
    const result = validateSource('{{ nope() }}{{ nope() }}', { registry });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({ code: 'VAL_UNKNOWN_FUNCTION', note: undefined });
    expect(result.stats.totalFunctionCalls).toBe(2);
  });

  it('checks a parsed template against an explicit registry', () => {
    const template = parse('{{ "a" | upper }}');

    expect(validateTemplate(template).ok).toBe(false);
    expect(validateTemplate(template, { registry }).ok).toBe(true);
  });

  it('checks arity per call site, counting the piped value', () => {
    const result = validateSource('{{ pad() }} {{ "a" | pad(1, 2) }}', { registry });

    expect(result.issues.map((i) => [i.code, i.message, i.location?.index])).toEqual([
      ['VAL_ARITY', 'Function "pad" expects 1 to 2 argument(s), got 0.', 3],
      ['VAL_ARITY', 'Function "pad" expects 1 to 2 argument(s), got 3.', 21],
    ]);
  });

  it('describes exact and open-ended arities', () => {
    expect(validateSource('{{ now(1) }}', { registry }).issues[0].message).toBe(
      'Function "now" expects 0 argument(s), got 1.',
    );
    expect(validateSource('{{ concat() }}', { registry }).issues[0].message).toBe(
      'Function "concat" expects at least 1 argument(s), got 0.',
    );
    expect(validateSource('{{ concat(1, 2, 3) }}', { registry }).ok).toBe(true);
  });

  it('skips arity checks for functions without a signature', () => {
    expect(validateSource('{{ upper(1, 2, 3) }}', { registry }).issues).toEqual([]);
  });

  it('applies allowed and forbidden function lists on first use', () => {
    const source = '{{ upper("a") }}{{ lower("b") }}{{ upper("c") }}';

    const allowed = validateSource(source, { registry, allowedFunctions: ['lower'] });
    expect(allowed.issues.map((i) => [i.code, i.location?.index])).toEqual([
      ['VAL_FUNCTION_NOT_ALLOWED', 3],
    ]);
    expect(allowed.issues[0].message).toBe('Function "upper" is not allowed in this template.');

    const forbidden = validateSource(source, { registry, forbiddenFunctions: ['lower'] });
    expect(forbidden.issues.map((i) => [i.code, i.location?.index])).toEqual([
      ['VAL_FUNCTION_FORBIDDEN', 19],
    ]);
  });

  it('ignores empty restriction lists', () => {
    expect(
      validateSource('{{ upper("a") }}', { registry, allowedFunctions: [], allowedDataSources: [] })
        .ok,
    ).toBe(true);
  });
});

// -----------------------------------------------------------------------------
// Data sources
// -----------------------------------------------------------------------------

describe('Validation – data sources', () => {
  const source = '{{ $input.a }} {{ $env.KEY }}';

  it('flags sources outside the allowed list', () => {
    const result = validateSource(source, { allowedDataSources: ['input'] });

    expect(result.issues).toEqual([
      {
        code: 'VAL_DATA_SOURCE_NOT_ALLOWED',
        rule: 'allowedDataSources',
        severity: 'error',
        message: 'Data source "environment" is not allowed in this template.',
        location: { index: 18, length: 8, line: 1, column: 19 },
        meta: { dataSource: 'environment' },
      },
    ]);
  });

  it('flags forbidden sources', () => {
    const result = validateSource(source, { forbiddenDataSources: ['input'] });

    expect(result.issues.map((i) => [i.code, i.message, i.location?.index])).toEqual([
      ['VAL_DATA_SOURCE_FORBIDDEN', 'Data source "input" is forbidden in this template.', 3],
    ]);
  });
});

// -----------------------------------------------------------------------------
// Limits & operators
// -----------------------------------------------------------------------------

describe('Validation – limits and operators', () => {
  it('reports expressions deeper than maxAstDepth once', () => {
    const result = validateSource('{{ 1 + 2 * 3 }}', { maxAstDepth: 2 });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      code: 'VAL_MAX_DEPTH',
      message: 'Expression exceeds maximum allowed depth (limit: 2).',
      note: 'Split the logic across several expressions or nodes.',
      location: { index: 7, length: 1 },
      meta: { depth: 3, maxAstDepth: 2 },
    });
    expect(result.stats.maxDepth).toBe(3);
    expect(result.stats.nodeCount).toBe(5);
  });

  it('reports templates with too many nodes once', () => {
    const result = validateSource('{{ 1 + 2 }}{{ 3 }}', { maxNodeCount: 2 });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      code: 'VAL_MAX_NODE_COUNT',
      message: 'Template has more expression nodes than allowed (limit: 2).',
      location: { index: 7, length: 1 },
      meta: { nodeCount: 3, maxNodeCount: 2 },
    });
  });

  it('warns about operators that fail at render time', () => {
    const result = validateSource('{{ 2 > 1 }}');

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([
      {
        code: 'VAL_UNSUPPORTED_OPERATOR',
        rule: 'operators',
        severity: 'warning',
        message: "Operator GreaterThan ('>') is not implemented and fails at render time.",
        location: { index: 3, length: 5, line: 1, column: 4 },
        meta: { operator: '>' },
      },
    ]);
  });

  it('sorts errors before warnings', () => {
    const result = validateSource('{{ 2 > 1 }}{{ nope() }}');

    expect(result.issues.map((i) => [i.severity, i.code, i.location?.index])).toEqual([
      ['error', 'VAL_UNKNOWN_FUNCTION', 14],
      ['warning', 'VAL_UNSUPPORTED_OPERATOR', 3],
    ]);
  });
});

// -----------------------------------------------------------------------------
// Parse errors
// -----------------------------------------------------------------------------

describe('Validation – validateSource', () => {
  it('returns the parsed template on success', () => {
    const result = validateSource('Hi {{ $input.name }}', { registry });

    expect(result.ok).toBe(true);
    expect(result.template?.expressionCount()).toBe(1);
  });

  it('captures parse errors as a single issue', () => {
    const result = validateSource('{{ 1 + }}');

    expect(result.ok).toBe(false);
    expect(result.template).toBeUndefined();
    expect(result.issues).toEqual([
      {
        code: 'E_PARSE',
        rule: 'parse',
        severity: 'error',
        message: "Expected an expression, found '}}'",
        note: undefined,
        location: { index: 7, length: 1, line: 1, column: 8 },
      },
    ]);
    expect(result.stats.expressionCount).toBe(0);
  });

  it('captures limit errors from template options', () => {
    const result = validateSource('abcdef', { templateOptions: { maxTemplateLength: 3 } });

    expect(result.issues[0]).toMatchObject({
      code: 'E_LIMIT',
      message: 'Maximum template length exceeded',
      location: { index: 3, line: 1, column: 4 },
    });
  });

  it('rethrows when capture is disabled', () => {
    expect(() =>
      validateSource('{{ 1 + }}', { captureParseErrorsAsIssues: false }),
    ).toThrow(ParseError);
  });
});
