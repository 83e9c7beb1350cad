// flowbind/tests/integration/workflow-templates.spec.ts
//
// Integration tests modelled on how a workflow runner uses templates:
//  - Rendering node parameters from upstream node outputs.
//  - Planning with dependencies() and checking a context up front.
//  - Reusing one parsed template for a batch of items.
//  - Editor-side validation and error display.
//

import { describe, it, expect } from 'vitest';
import {
  Context,
  DataNotFoundError,
  MathError,
  ParseError,
  asString,
  createPluginSet,
  createRegistry,
  formatTemplateError,
  fromJson,
  integerValue,
  lengthOf,
  parse,
  parseWithFunctions,
  stringValue,
  validateSource,
} from '../../src';
import type { Plugin } from '../../src';

// -----------------------------------------------------------------------------
// Shared setup
// -----------------------------------------------------------------------------

const textPlugin: Plugin = (registry) =>
  registry
    .withFunction('upper', ([v]) => stringValue(asString(v).toUpperCase()))
    .withFunction('len', ([v]) => integerValue(lengthOf(v)));

const registry = createPluginSet('text', textPlugin).attach(createRegistry());

const order = {
  id: 'A-1001',
  total: 59.9,
  items: [
    { sku: 'X-1', qty: 2 },
    { sku: 'Y-7', qty: 1 },
  ],
  customer: { name: 'Bea Lund', email: 'bea@example.test' },
};

const emailTemplate = [
  "Hi {{ $node('fetch_order').json.customer.name }},",
  "your order {{ $node('fetch_order').json.id }} totals {{ $node('fetch_order').json.total }} EUR.",
  "Items: {{ $node('fetch_order').json.items | len }}",
  'Reply to {{ $env.SUPPORT_EMAIL }}.',
].join('\n');

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
// Rendering node parameters
// -----------------------------------------------------------------------------

describe('Workflow – node parameters', () => {
  it('renders an email body from an upstream node', () => {
    const ctx = new Context()
      .addNodeOutput('fetch_order', fromJson(order))
      .setEnv('SUPPORT_EMAIL', 'support@example.test');

    expect(parseWithFunctions(emailTemplate, registry).render(ctx)).toBe(
      [
        'Hi Bea Lund,',
        'your order A-1001 totals 59.9 EUR.',
        'Items: 2',
        'Reply to support@example.test.',
      ].join('\n'),
    );
  });

  it('passes literal handlebars through for downstream systems', () => {
    const ctx = new Context().setInput(fromJson({ a: 1 }));
    expect(parse('Raw: \\{{ keep }} and {{ $input.a }}').render(ctx)).toBe(
      'Raw: {{ keep }} and 1',
    );
  });

  it('renders a batch of items with one parsed template', () => {
    const template = parseWithFunctions('{{ $input.sku | upper }} x{{ $input.qty }}', registry);

    const lines = order.items.map((item) => template.render(new Context().setInput(fromJson(item))));
    expect(lines).toEqual(['X-1 x2', 'Y-7 x1']);
  });
});

// -----------------------------------------------------------------------------
// Planning
// -----------------------------------------------------------------------------

describe('Workflow – planning with dependencies', () => {
  it('lists the nodes and variables a parameter needs', () => {
    const deps = parseWithFunctions(emailTemplate, registry).dependencies();

    expect([...deps.nodeIds]).toEqual(['fetch_order']);
    expect([...deps.envVars]).toEqual(['SUPPORT_EMAIL']);
    expect([...deps.functions]).toEqual(['len']);
    expect(deps.inputPaths.size).toBe(0);
  });

  it('rejects a context missing an upstream node before rendering', () => {
    const template = parseWithFunctions(emailTemplate, registry);
    const ctx = new Context()
      .addNodeOutput('other', fromJson({}))
      .setEnv('SUPPORT_EMAIL', 'support@example.test');

    const err = catchError(() => template.validateContext(ctx));
    expect(err).toBeInstanceOf(DataNotFoundError);
    if (err instanceof DataNotFoundError) {
      expect(err.path).toBe("$node('fetch_order')");
      expect(err.available).toEqual([
        "$node('other')",
        '$system',
        '$execution',
        '$workflow',
        '$env.SUPPORT_EMAIL',
      ]);
    }
  });
});

// -----------------------------------------------------------------------------
// Editor
// -----------------------------------------------------------------------------

describe('Workflow – editor feedback', () => {
  it('accepts a valid parameter and restricts sources', () => {
    expect(validateSource(emailTemplate, { registry }).ok).toBe(true);

    const restricted = validateSource(emailTemplate, {
      registry,
      allowedDataSources: ['node'],
    });
    expect(restricted.issues.map((i) => i.code)).toEqual(['VAL_DATA_SOURCE_NOT_ALLOWED']);
  });

  it('points parse errors at the right line', () => {
    const err = catchError(() => parse('Hello\n  {{ 1 + }}'));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.position).toBe(15);
      expect(err.line).toBe(2);
      expect(err.column).toBe(10);
    }
  });

  it('formats render failures for display', () => {
    const template = parse('{{ $input.total / $input.count }}');
    const ctx = new Context().setInput(fromJson({ total: 10, count: 0 }));

    const err = catchError(() => template.render(ctx));
    expect(err).toBeInstanceOf(MathError);

    const formatted = formatTemplateError(err);
    expect(formatted.summary).toBe('[E_MATH] Division by zero at line 1, col 19');
    expect(formatted.detail).toBe(
      '[E_MATH] Division by zero at line 1, col 19\n\n' +
        '{{ $input.total / $input.count }}\n' +
        `${' '.repeat(18)}${'^'.repeat(12)} --- Division by zero`,
    );
  });
});
