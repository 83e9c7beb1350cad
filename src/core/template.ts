/**
 * flowbind – Templates
 *
 * A `Template` is the parsed, immutable form of a template string: an
 * ordered list of text and expression elements, the registry bound at parse
 * time, and the statically extracted dependencies.
 *
 *   const template = parseWithFunctions(
 *     'Hello {{ $input.name | upper }}!',
 *     registry,
 *   );
 *
 *   const context = new Context().setInput(fromJson({ name: 'Ada' }));
 *   template.render(context); // "Hello ADA!"
 *
 * One Template may render against any number of Contexts; each render
 * should use its own Context.
 *
 * License: Apache-2.0
 */

import { isDataAccessNode, isLiteralNode } from './ast';
import type { ExpressionNode } from './ast';
import { DataSource } from './context';
import type { Context } from './context';
import { dependenciesOf } from './dependencies';
import type { Dependencies } from './dependencies';
import { createDataNotFoundError, isTemplateError } from './errors';
import { createEvalState, evaluate } from './evaluator';
import type { EvalState } from './evaluator';
import { normalizeOptions } from './options';
import type { NormalizedTemplateOptions, TemplateOptions } from './options';
import { parseTemplate } from './parser';
import { EMPTY_REGISTRY } from './registry';
import type { FunctionRegistry } from './registry';
import { asString } from './value';
import type { Value } from './value';
import { createServiceLogger } from '../logging/logger';

const logger = createServiceLogger('template');

/////////////////////
// Expression      //
/////////////////////

/**
 * One `{{ … }}` segment.
 */
export class Expression {
  /** Trimmed text between the braces. */
  public readonly source: string;
  public readonly ast: ExpressionNode;
  /** Offset of `{{` in the template. */
  public readonly start: number;
  /** Offset just past `}}` in the template. */
  public readonly end: number;

  private readonly template: string;
  private readonly deps: Dependencies;

  constructor(
    source: string,
    ast: ExpressionNode,
    span: { start: number; end: number; template: string },
  ) {
    this.source = source;
    this.ast = ast;
    this.start = span.start;
    this.end = span.end;
    this.template = span.template;
    this.deps = dependenciesOf([ast]);
  }

  /**
   * Evaluate this expression alone.
   */
  evaluate(
    context: Context,
    functions: FunctionRegistry = EMPTY_REGISTRY,
    options: { maxEvalOperations?: number; state?: EvalState } = {},
  ): Value {
    return evaluate(
      this.ast,
      context,
      {
        functions,
        maxEvalOperations: options.maxEvalOperations,
        source: this.template,
      },
      options.state,
    );
  }

  /**
   * A bare data-source reference such as `{{ $input.name }}`.
   */
  isSimpleAccess(): boolean {
    return isDataAccessNode(this.ast);
  }

  isLiteral(): boolean {
    return isLiteralNode(this.ast);
  }

  dependencies(): Dependencies {
    return this.deps;
  }

  toString(): string {
    return `{{ ${this.source} }}`;
  }
}

/////////////////////
// Template        //
/////////////////////

export type TemplateElement =
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'expression'; readonly expression: Expression };

export class Template {
  public readonly source: string;
  public readonly elements: readonly TemplateElement[];
  public readonly options: NormalizedTemplateOptions;
  public readonly functions: FunctionRegistry;

  private readonly deps: Dependencies;

  private constructor(
    source: string,
    elements: readonly TemplateElement[],
    functions: FunctionRegistry,
    options: NormalizedTemplateOptions,
  ) {
    this.source = source;
    this.elements = elements;
    this.functions = functions;
    this.options = options;
    this.deps = dependenciesOf(
      this.expressions().map((expression) => expression.ast),
    );
  }

  /**
   * Parse with no functions available. Calls still parse; they fail at
   * render time with "Function not found".
   */
  static parse(source: string, options?: TemplateOptions): Template {
    return Template.parseWithFunctions(source, EMPTY_REGISTRY, options);
  }

  /**
   * Parse and bind `functions` for every later render.
   *
   * Throws ParseError on malformed syntax and LimitError when a configured
   * size limit is exceeded.
   */
  static parseWithFunctions(
    source: string,
    functions: FunctionRegistry,
    options?: TemplateOptions,
  ): Template {
    const normalized = normalizeOptions(options);

    const elements = parseTemplate(source, {
      maxTemplateLength: normalized.maxTemplateLength,
      maxAstDepth: normalized.maxAstDepth,
    }).map((element): TemplateElement =>
      element.type === 'text'
        ? { type: 'text', value: element.value }
        : {
            type: 'expression',
            expression: new Expression(element.source, element.ast, {
              start: element.start,
              end: element.end,
              template: source,
            }),
          },
    );

    logger.debug('template parsed', {
      length: source.length,
      elements: elements.length,
    });

    return new Template(source, Object.freeze(elements), functions, normalized);
  }

  /**
   * Render against `context`. Expression results are converted with
   * `asString`; arrays and objects fail with a TypeConversionError.
   */
  render(context: Context): string {
    const state = createEvalState();
    let out = '';

    try {
      for (const element of this.elements) {
        if (element.type === 'text') {
          out += element.value;
          continue;
        }
        const value = element.expression.evaluate(context, this.functions, {
          maxEvalOperations: this.options.maxEvalOperations,
          state,
        });
        out += asString(value);
      }
    } catch (err) {
      logger.debug('render failed', {
        code: isTemplateError(err) ? err.code : 'unknown',
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    logger.debug('template rendered', { operations: state.ops });
    return out;
  }

  dependencies(): Dependencies {
    return this.deps;
  }

  /**
   * True when the template has no expressions (renders to its own text).
   */
  isStatic(): boolean {
    return this.expressionCount() === 0;
  }

  expressionCount(): number {
    return this.expressions().length;
  }

  expressions(): Expression[] {
    const out: Expression[] = [];
    for (const element of this.elements) {
      if (element.type === 'expression') out.push(element.expression);
    }
    return out;
  }

  usesFunction(name: string): boolean {
    return this.deps.functions.has(name);
  }

  /**
   * Check that every input, node and environment reference can resolve,
   * regardless of which branches a render would take. Throws
   * DataNotFoundError on the first gap.
   */
  validateContext(context: Context): void {
    if (this.deps.inputPaths.size > 0 && context.getInput() === undefined) {
      throw createDataNotFoundError({
        path: '$input',
        available: ['Input data required but not provided'],
      });
    }

    for (const id of this.deps.nodeIds) {
      if (!context.hasDataSource(DataSource.node(id))) {
        throw createDataNotFoundError({
          path: `$node('${id}')`,
          available: context.availableDataSources(),
        });
      }
    }

    for (const name of this.deps.envVars) {
      if (context.getEnv(name) === undefined) {
        throw createDataNotFoundError({
          path: `$env.${name}`,
          available: ['Environment variable not set'],
        });
      }
    }
  }

  toString(): string {
    return this.source;
  }
}

/////////////////////
// Entry points    //
/////////////////////

export function parse(source: string, options?: TemplateOptions): Template {
  return Template.parse(source, options);
}

export function parseWithFunctions(
  source: string,
  functions: FunctionRegistry,
  options?: TemplateOptions,
): Template {
  return Template.parseWithFunctions(source, functions, options);
}

/**
 * Parse and render in one step.
 */
export function render(
  source: string,
  context: Context,
  functions: FunctionRegistry = EMPTY_REGISTRY,
  options?: TemplateOptions,
): string {
  return Template.parseWithFunctions(source, functions, options).render(context);
}
