// flowbind/tests/security/dos-limits.spec.ts
//
// Security-focused tests for the resource limits:
//
//   - maxTemplateLength:  maximum template source length.
//   - maxAstDepth:        maximum nesting of a single expression.
//   - maxEvalOperations:  upper bound on AST nodes visited per render.
//
// The main goals:
//  - Large or deeply nested templates are rejected at parse time.
//  - Wide expressions and many small expressions are bounded at render time.
//  - Reasonable templates still succeed.

import { describe, it, expect } from 'vitest';
import {
  Context,
  LimitError,
  ParseError,
  parse,
  validateTemplate,
} from '../../src';

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

// "1 + 1 + ... + 1" (count terms)
function buildLongExpression(count: number): string {
  return Array.from({ length: count }, () => '1').join(' + ');
}

// "((((1 + 1) + 1) + 1) ... )" with `depth` parentheses
function buildDeepNestedExpression(depth: number): string {
  let expr = '1';
  for (let i = 0; i < depth; i++) {
    expr = `(${expr} + 1)`;
  }
  return expr;
}

// "true && true && ... && true" (count terms)
function buildWideLogicalChain(count: number): string {
  return Array.from({ length: count }, () => 'true').join(' && ');
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
// Template length
// -----------------------------------------------------------------------------

describe('Security – maxTemplateLength', () => {
  const source = `{{ ${buildLongExpression(200)} }}`;

  it('rejects templates over the limit before scanning them', () => {
    const err = catchError(() => parse(source, { maxTemplateLength: 500 }));
    expect(err).toBeInstanceOf(LimitError);
    expect(err.message).toBe('Maximum template length exceeded');
  });

  it('renders the same template without a limit', () => {
    expect(parse(source).render(new Context())).toBe('200');
  });

  it('fails fast on a huge unclosed expression', () => {
    const err = catchError(() => parse(`{{ ${'a'.repeat(10_000)}`));
    expect(err).toBeInstanceOf(ParseError);
    expect(err.message).toBe('Unclosed expression');
  });
});

// -----------------------------------------------------------------------------
// Nesting depth
// -----------------------------------------------------------------------------

describe('Security – maxAstDepth', () => {
  const source = `{{ ${buildDeepNestedExpression(40)} }}`;

  it('rejects deeply nested expressions', () => {
    const err = catchError(() => parse(source, { maxAstDepth: 10 }));
    expect(err).toBeInstanceOf(LimitError);
    expect(err.message).toBe('Maximum expression depth exceeded');
  });

  it('accepts them under a generous limit', () => {
    expect(parse(source, { maxAstDepth: 1_000 }).render(new Context())).toBe('41');
  });
});

// -----------------------------------------------------------------------------
// Evaluation budget
// -----------------------------------------------------------------------------

describe('Security – maxEvalOperations', () => {
  // 100 literals + 99 operators
  const wide = `{{ ${buildWideLogicalChain(100)} }}`;

  it('allows a render that fits the budget exactly', () => {
    expect(parse(wide, { maxEvalOperations: 199 }).render(new Context())).toBe('true');
  });

  it('stops a render one operation over the budget', () => {
    const err = catchError(() =>
      parse(wide, { maxEvalOperations: 198 }).render(new Context()),
    );
    expect(err).toBeInstanceOf(LimitError);
    expect(err.message).toBe('Maximum evaluation operations exceeded');
  });

  it('bounds many small expressions together', () => {
    const many = '{{ 1 }}'.repeat(50);
    expect(() => parse(many, { maxEvalOperations: 49 }).render(new Context())).toThrow(
      LimitError,
    );
    expect(parse(many, { maxEvalOperations: 50 }).render(new Context())).toBe('1'.repeat(50));
  });

  it('lets editors flag oversized templates statically', () => {
    const result = validateTemplate(parse(wide), { maxNodeCount: 100 });

    expect(result.ok).toBe(false);
    expect(result.stats.nodeCount).toBe(199);
    expect(result.issues.map((i) => i.code)).toEqual(['VAL_MAX_NODE_COUNT']);
  });
});
