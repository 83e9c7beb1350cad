/**
 * flowbind – Utils / validation
 *
 * Static checks for parsed templates, beyond what the parser already
 * enforces. Intended for workflow editors that want to flag problems before
 * a template ever renders:
 *
 *  - calls to functions the registry does not provide,
 *  - calls whose argument count cannot match the registered signature,
 *  - functions or data sources a deployment wants to restrict,
 *  - overly deep expressions and operators that always fail at render time.
 *
 * Nothing here evaluates expressions or reads a Context.
 *
 * License: Apache-2.0
 */

import { BINARY_OPERATOR_NAMES, UNSUPPORTED_OPERATORS, traverse } from '../core/ast';
import type { ExpressionNode } from '../core/ast';
import type { DataSourceType } from '../core/context';
import { computeLineAndColumn, isTemplateError } from '../core/errors';
import type { TemplateOptions } from '../core/options';
import { EMPTY_REGISTRY, signatureArity } from '../core/registry';
import type { FunctionRegistry } from '../core/registry';
import { Template } from '../core/template';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning' | 'info';

/**
 * Offset range in the template source, plus 1-based line/column.
 */
export interface DiagnosticLocation {
  index: number;
  length: number;
  line?: number;
  column?: number;
}

export interface TemplateValidationIssue {
  /**
   * Machine-readable code such as "VAL_UNKNOWN_FUNCTION".
   */
  code: string;

  message: string;

  note?: string;

  /**
   * - error   → the template should not be saved / run
   * - warning → it runs, but some path will fail or misbehave
   * - info    → stylistic hints
   */
  severity: IssueSeverity;

  location?: DiagnosticLocation;

  /**
   * Option that produced the issue, e.g. "allowedFunctions".
   */
  rule?: string;

  meta?: Record<string, unknown>;
}

export interface TemplateValidationStats {
  expressionCount: number;

  /** AST nodes across all expressions. */
  nodeCount: number;

  /** Deepest expression AST (root = 1). */
  maxDepth: number;

  /** Direct calls plus pipeline stages. */
  totalFunctionCalls: number;

  totalDataAccesses: number;
}

export interface TemplateValidationResult {
  /**
   * `issues.every(i => i.severity !== 'error')`
   */
  ok: boolean;

  /**
   * Sorted: errors first, then by location.
   */
  issues: TemplateValidationIssue[];

  stats: TemplateValidationStats;
}

export interface TemplateValidationOptions {
  /**
   * Registry to check calls against. Defaults to the template's own
   * registry.
   */
  registry?: FunctionRegistry;

  /**
   * Maximum depth of a single expression AST (root = 1).
   */
  maxAstDepth?: number;

  /**
   * Maximum number of AST nodes across the whole template.
   */
  maxNodeCount?: number;

  /** Ignored when empty. */
  allowedFunctions?: string[];

  /** Ignored when empty. */
  forbiddenFunctions?: string[];

  /**
   * Data sources expressions may read, e.g. `['input', 'node']`.
   * Ignored when empty.
   */
  allowedDataSources?: DataSourceType[];

  /** Ignored when empty. */
  forbiddenDataSources?: DataSourceType[];
}

export interface ValidateSourceOptions extends TemplateValidationOptions {
  /**
   * Passed to the parser.
   */
  templateOptions?: TemplateOptions;

  /**
   * Report parse errors as issues instead of throwing. Default: true.
   */
  captureParseErrorsAsIssues?: boolean;
}

export interface SourceValidationResult extends TemplateValidationResult {
  /** Present when parsing succeeded. */
  template?: Template;
}

/////////////////////////////
// Template validation     //
/////////////////////////////

interface CallSite {
  name: string;
  /** Argument count as the function will see it. */
  argCount: number;
  index: number;
  length: number;
}

export function validateTemplate(
  template: Template,
  options: TemplateValidationOptions = {},
): TemplateValidationResult {
  const {
    registry = template.functions,
    maxAstDepth,
    maxNodeCount,
    allowedFunctions,
    forbiddenFunctions,
    allowedDataSources,
    forbiddenDataSources,
  } = options;

  const source = template.source;
  const issues: TemplateValidationIssue[] = [];

  const makeLocation = (index: number, length: number): DiagnosticLocation => {
    const { line, column } = computeLineAndColumn(source, index);
    return { index, length: Math.max(1, length), line, column };
  };

  const expressions = template.expressions();
  const calls: CallSite[] = [];
  const firstSourceUse = new Map<DataSourceType, { index: number; length: number }>();

  let nodeCount = 0;
  let maxDepthSeen = 0;
  let totalDataAccesses = 0;
  let nodeCountViolationRecorded = false;

  const onNode = (node: ExpressionNode, depth: number): void => {
    nodeCount++;
    if (depth > maxDepthSeen) maxDepthSeen = depth;

    if (
      typeof maxNodeCount === 'number' &&
      maxNodeCount >= 0 &&
      nodeCount > maxNodeCount &&
      !nodeCountViolationRecorded
    ) {
      nodeCountViolationRecorded = true;
      issues.push({
        code: 'VAL_MAX_NODE_COUNT',
        rule: 'maxNodeCount',
        severity: 'error',
        message: `Template has more expression nodes than allowed (limit: ${maxNodeCount}).`,
        location: makeLocation(node.start, node.end - node.start),
        meta: { nodeCount, maxNodeCount },
      });
    }

    switch (node.type) {
      case 'DataAccess': {
        totalDataAccesses++;
        if (!firstSourceUse.has(node.source.type)) {
          firstSourceUse.set(node.source.type, {
            index: node.start,
            length: node.end - node.start,
          });
        }
        return;
      }

      case 'FunctionCall':
        calls.push({
          name: node.name,
          argCount: node.args.length,
          index: node.start,
          length: node.end - node.start,
        });
        return;

      case 'Pipeline':
        for (const stage of node.stages) {
          calls.push({
            name: stage.name,
            // The piped value is the first argument.
            argCount: stage.args.length + 1,
            index: stage.start,
            length: stage.end - stage.start,
          });
        }
        return;

      case 'BinaryOp':
        if (UNSUPPORTED_OPERATORS.has(node.operator)) {
          issues.push({
            code: 'VAL_UNSUPPORTED_OPERATOR',
            rule: 'operators',
            severity: 'warning',
            message: `Operator ${BINARY_OPERATOR_NAMES[node.operator]} ('${node.operator}') is not implemented and fails at render time.`,
            location: makeLocation(node.start, node.end - node.start),
            meta: { operator: node.operator },
          });
        }
        return;

      default:
        return;
    }
  };

  for (const expression of expressions) {
    let depthViolationRecorded = false;

    traverse(expression.ast, {
      enter(node, _parent, depth) {
        onNode(node, depth);

        if (
          typeof maxAstDepth === 'number' &&
          maxAstDepth >= 0 &&
          depth > maxAstDepth &&
          !depthViolationRecorded
        ) {
          depthViolationRecorded = true;
          issues.push({
            code: 'VAL_MAX_DEPTH',
            rule: 'maxAstDepth',
            severity: 'error',
            message: `Expression exceeds maximum allowed depth (limit: ${maxAstDepth}).`,
            note: 'Split the logic across several expressions or nodes.',
            location: makeLocation(node.start, node.end - node.start),
            meta: { depth, maxAstDepth },
          });
        }
      },
    });
  }

  // Function checks

  const makeSet = <T>(values?: T[]): Set<T> | null =>
    values && values.length > 0 ? new Set(values) : null;

  const allowedFunctionsSet = makeSet(allowedFunctions);
  const forbiddenFunctionsSet = makeSet(forbiddenFunctions);
  const reported = new Set<string>();

  for (const call of calls) {
    const location = makeLocation(call.index, call.length);
    const firstUse = !reported.has(call.name);
    reported.add(call.name);

    if (firstUse && allowedFunctionsSet && !allowedFunctionsSet.has(call.name)) {
      issues.push({
        code: 'VAL_FUNCTION_NOT_ALLOWED',
        rule: 'allowedFunctions',
        severity: 'error',
        message: `Function "${call.name}" is not allowed in this template.`,
        location,
        meta: { function: call.name },
      });
    }

    if (firstUse && forbiddenFunctionsSet && forbiddenFunctionsSet.has(call.name)) {
      issues.push({
        code: 'VAL_FUNCTION_FORBIDDEN',
        rule: 'forbiddenFunctions',
        severity: 'error',
        message: `Function "${call.name}" is forbidden in this template.`,
        location,
        meta: { function: call.name },
      });
    }

    const entry = registry.lookup(call.name);
    if (!entry) {
      if (firstUse) {
        issues.push({
          code: 'VAL_UNKNOWN_FUNCTION',
          rule: 'registry',
          severity: 'error',
          message: `Function "${call.name}" is not registered.`,
          note: registry === EMPTY_REGISTRY
            ? 'The template was parsed without a function registry.'
            : undefined,
          location,
          meta: { function: call.name },
        });
      }
      continue;
    }

    if (!entry.signature) continue;

    const { min, max } = signatureArity(entry.signature);
    if (call.argCount < min || call.argCount > max) {
      const expected =
        max === Infinity ? `at least ${min}` : min === max ? `${min}` : `${min} to ${max}`;
      issues.push({
        code: 'VAL_ARITY',
        rule: 'registry',
        severity: 'error',
        message: `Function "${call.name}" expects ${expected} argument(s), got ${call.argCount}.`,
        location,
        meta: { function: call.name, argCount: call.argCount, min, max },
      });
    }
  }

  // Data-source checks

  const allowedSourcesSet = makeSet(allowedDataSources);
  const forbiddenSourcesSet = makeSet(forbiddenDataSources);

  for (const [type, info] of firstSourceUse) {
    if (allowedSourcesSet && !allowedSourcesSet.has(type)) {
      issues.push({
        code: 'VAL_DATA_SOURCE_NOT_ALLOWED',
        rule: 'allowedDataSources',
        severity: 'error',
        message: `Data source "${type}" is not allowed in this template.`,
        location: makeLocation(info.index, info.length),
        meta: { dataSource: type },
      });
    }
    if (forbiddenSourcesSet && forbiddenSourcesSet.has(type)) {
      issues.push({
        code: 'VAL_DATA_SOURCE_FORBIDDEN',
        rule: 'forbiddenDataSources',
        severity: 'error',
        message: `Data source "${type}" is forbidden in this template.`,
        location: makeLocation(info.index, info.length),
        meta: { dataSource: type },
      });
    }
  }

  sortIssues(issues);

  return {
    ok: issues.every((i) => i.severity !== 'error'),
    issues,
    stats: {
      expressionCount: expressions.length,
      nodeCount,
      maxDepth: maxDepthSeen,
      totalFunctionCalls: calls.length,
      totalDataAccesses,
    },
  };
}

/////////////////////////////
// Source validation       //
/////////////////////////////

/**
 * Parse `source` with `registry` bound and validate the result. Parse and
 * limit errors become a single issue carrying the engine's error code,
 * unless `captureParseErrorsAsIssues` is false.
 */
export function validateSource(
  source: string,
  options: ValidateSourceOptions = {},
): SourceValidationResult {
  const {
    templateOptions,
    captureParseErrorsAsIssues = true,
    ...templateValidation
  } = options;

  let template: Template;
  try {
    template = Template.parseWithFunctions(
      source,
      templateValidation.registry ?? EMPTY_REGISTRY,
      templateOptions,
    );
  } catch (err) {
    if (!captureParseErrorsAsIssues) throw err;

    const issue: TemplateValidationIssue = isTemplateError(err)
      ? {
          code: err.code,
          rule: 'parse',
          severity: 'error',
          message: err.message,
          note: err.note,
          location:
            err.index !== null
              ? {
                  index: err.index,
                  length: 1,
                  ...computeLineAndColumn(source, err.index),
                }
              : undefined,
        }
      : {
          code: 'PARSE_FAILED',
          rule: 'parse',
          severity: 'error',
          message: err instanceof Error ? err.message : String(err),
        };

    return {
      ok: false,
      issues: [issue],
      stats: {
        expressionCount: 0,
        nodeCount: 0,
        maxDepth: 0,
        totalFunctionCalls: 0,
        totalDataAccesses: 0,
      },
    };
  }

  return { ...validateTemplate(template, templateValidation), template };
}

/////////////////////////////
// Helpers                 //
/////////////////////////////

const SEVERITY_RANK: Record<IssueSeverity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

function sortIssues(issues: TemplateValidationIssue[]): void {
  issues.sort((a, b) => {
    const sa = SEVERITY_RANK[a.severity];
    const sb = SEVERITY_RANK[b.severity];
    if (sa !== sb) return sa - sb;

    const ia = a.location?.index ?? 0;
    const ib = b.location?.index ?? 0;
    if (ia !== ib) return ia - ib;

    return a.code.localeCompare(b.code);
  });
}
