/**
 * flowbind – Template options
 *
 * Resource limits applied while parsing and rendering. Every limit is
 * optional; an omitted or negative limit means "unbounded".
 *
 * License: Apache-2.0
 */

import type { FunctionRegistry } from './registry';

export interface TemplateOptions {
  /**
   * Maximum template source length, in characters.
   */
  maxTemplateLength?: number;

  /**
   * Maximum nesting depth of a single expression (parentheses, ternaries,
   * calls, pipelines, …).
   */
  maxAstDepth?: number;

  /**
   * Maximum number of AST nodes visited during one `render`, across all
   * expressions of the template.
   */
  maxEvalOperations?: number;
}

/**
 * Options with defaults applied.
 */
export interface NormalizedTemplateOptions {
  maxTemplateLength?: number;
  maxAstDepth?: number;
  maxEvalOperations?: number;
}

const DEFAULT_OPTIONS: NormalizedTemplateOptions = {
  maxTemplateLength: undefined,
  maxAstDepth: undefined,
  maxEvalOperations: undefined,
};

export function normalizeOptions(
  opts?: TemplateOptions,
): NormalizedTemplateOptions {
  if (!opts) {
    return { ...DEFAULT_OPTIONS };
  }

  return {
    maxTemplateLength: limitOrDefault(
      opts.maxTemplateLength,
      DEFAULT_OPTIONS.maxTemplateLength,
    ),
    maxAstDepth: limitOrDefault(opts.maxAstDepth, DEFAULT_OPTIONS.maxAstDepth),
    maxEvalOperations: limitOrDefault(
      opts.maxEvalOperations,
      DEFAULT_OPTIONS.maxEvalOperations,
    ),
  };
}

function limitOrDefault(
  value: number | undefined,
  fallback: number | undefined,
): number | undefined {
  return typeof value === 'number' && value >= 0 && !Number.isNaN(value)
    ? value
    : fallback;
}

//////////////////////
// Parser/evaluator //
// option contracts //
//////////////////////

/**
 * Options passed to `parseTemplate`.
 */
export interface ParseOptions {
  maxTemplateLength?: number;
  maxAstDepth?: number;
}

/**
 * Options passed to `evaluate`.
 */
export interface EvalOptions {
  functions: FunctionRegistry;
  maxEvalOperations?: number;
  /**
   * Template source, used to attach line/column snippets to runtime errors.
   */
  source?: string;
}
