/**
 * flowbind – Evaluator
 *
 * Evaluates an expression AST against a Context and a function registry.
 * Evaluation is a strict pre-order walk: operands, arguments and pipeline
 * stages run left to right, and both sides of `&&` / `||` are always
 * evaluated.
 *
 * Parsing lives in `parser.ts`; templates call `evaluate` once per
 * expression element with a shared `EvalState`.
 *
 * License: Apache-2.0
 */

import type {
  BinaryOpNode,
  ExpressionNode,
  FunctionCallNode,
  PipelineNode,
  UnaryOpNode,
} from './ast';
import { BINARY_OPERATOR_NAMES } from './ast';
import type { Context } from './context';
import {
  createEvaluationError,
  createFunctionError,
  createLimitError,
  createMathError,
  isTemplateError,
} from './errors';
import type { ErrorLocationOptions } from './errors';
import { createServiceLogger } from '../logging/logger';
import type { EvalOptions } from './options';
import { bindArguments } from './registry';
import type { RegisteredFunction } from './registry';
import {
  asFloat,
  asString,
  boolValue,
  floatValue,
  formatValue,
  isNumber,
  isTruthy,
  nullValue,
  stringValue,
  valueEquals,
} from './value';
import type { Value } from './value';

const logger = createServiceLogger('evaluator');

/////////////////////
// Public API      //
/////////////////////

/**
 * Per-render bookkeeping. Share one state across the expressions of a
 * render so `maxEvalOperations` bounds the whole render.
 */
export interface EvalState {
  ops: number;
}

export function createEvalState(): EvalState {
  return { ops: 0 };
}

export function evaluate(
  ast: ExpressionNode,
  context: Context,
  options: EvalOptions,
  state: EvalState = createEvalState(),
): Value {
  return evalNode(ast, context, options, state);
}

///////////////////////////
// Evaluation dispatcher //
///////////////////////////

function evalNode(
  node: ExpressionNode,
  context: Context,
  options: EvalOptions,
  state: EvalState,
): Value {
  bumpOps(node, options, state);

  switch (node.type) {
    case 'Literal':
      return node.value;

    case 'DataAccess':
      return context.resolveDataSource(node.source, node.path);

    case 'FunctionCall':
      return evalCall(node, context, options, state);

    case 'Pipeline':
      return evalPipeline(node, context, options, state);

    case 'BinaryOp':
      return evalBinary(node, context, options, state);

    case 'UnaryOp':
      return evalUnary(node, context, options, state);

    case 'Ternary':
      return isTruthy(evalNode(node.condition, context, options, state))
        ? evalNode(node.consequent, context, options, state)
        : evalNode(node.alternate, context, options, state);

    case 'IfFunction': {
      if (isTruthy(evalNode(node.condition, context, options, state))) {
        return evalNode(node.consequent, context, options, state);
      }
      return node.alternate
        ? evalNode(node.alternate, context, options, state)
        : nullValue();
    }

    default: {
      const exhaustive: never = node;
      throw createEvaluationError({
        message: `Unsupported expression node ${JSON.stringify(exhaustive)}`,
      });
    }
  }
}

///////////////////////
// Operation counter //
///////////////////////

function bumpOps(
  node: ExpressionNode,
  options: EvalOptions,
  state: EvalState,
): void {
  state.ops++;
  const limit = options.maxEvalOperations;
  if (typeof limit === 'number' && limit >= 0 && state.ops > limit) {
    throw createLimitError({
      message: 'Maximum evaluation operations exceeded',
      source: options.source,
      index: node.start,
    });
  }
}

///////////////////////
// Unary / Binary    //
///////////////////////

function evalUnary(
  node: UnaryOpNode,
  context: Context,
  options: EvalOptions,
  state: EvalState,
): Value {
  const operand = evalNode(node.operand, context, options, state);

  switch (node.operator) {
    case '!':
      return boolValue(!isTruthy(operand));
    case '-':
      return floatValue(-asFloat(operand));
  }
}

function evalBinary(
  node: BinaryOpNode,
  context: Context,
  options: EvalOptions,
  state: EvalState,
): Value {
  const left = evalNode(node.left, context, options, state);
  const right = evalNode(node.right, context, options, state);

  switch (node.operator) {
    case '+':
      if (isNumber(left) && isNumber(right)) {
        return floatValue(left.value + right.value);
      }
      return stringValue(asString(left) + asString(right));

    case '-':
      return floatValue(asFloat(left) - asFloat(right));

    case '*':
      return floatValue(asFloat(left) * asFloat(right));

    case '/': {
      const dividend = asFloat(left);
      const divisor = asFloat(right);
      if (divisor === 0) {
        throw createMathError({
          message: 'Division by zero',
          source: options.source,
          index: node.right.start,
          length: node.right.end - node.right.start,
        });
      }
      return floatValue(dividend / divisor);
    }

    case '==':
      return boolValue(valueEquals(left, right));

    case '!=':
      return boolValue(!valueEquals(left, right));

    case '<':
      return boolValue(asFloat(left) < asFloat(right));

    case '&&':
      return boolValue(isTruthy(left) && isTruthy(right));

    case '||':
      return boolValue(isTruthy(left) || isTruthy(right));

    case '%':
    case '<=':
    case '>':
    case '>=':
    case 'contains':
    case 'startsWith':
    case 'endsWith':
      throw createEvaluationError({
        message: `Operator ${BINARY_OPERATOR_NAMES[node.operator]} not implemented`,
        context: node.operator,
        source: options.source,
        index: node.start,
        length: node.end - node.start,
      });
  }
}

///////////////////////
// Calls & pipelines //
///////////////////////

function evalCall(
  node: FunctionCallNode,
  context: Context,
  options: EvalOptions,
  state: EvalState,
): Value {
  const location = callLocation(node.start, node.end, options);
  const entry = resolveFunction(node.name, location, options);
  const args = node.args.map((arg) => evalNode(arg, context, options, state));
  return invoke(entry, args, location);
}

function evalPipeline(
  node: PipelineNode,
  context: Context,
  options: EvalOptions,
  state: EvalState,
): Value {
  let current = evalNode(node.input, context, options, state);

  for (const stage of node.stages) {
    const location = callLocation(stage.start, stage.end, options);
    const entry = resolveFunction(stage.name, location, options);
    const extra = stage.args.map((arg) => evalNode(arg, context, options, state));
    current = invoke(entry, [current, ...extra], location);
  }

  return current;
}

function callLocation(start: number, end: number, options: EvalOptions): ErrorLocationOptions {
  return { source: options.source, index: start, length: end - start };
}

/**
 * Runs before any argument is evaluated, so a missing function is reported
 * ahead of argument failures.
 */
function resolveFunction(
  name: string,
  location: ErrorLocationOptions,
  options: EvalOptions,
): RegisteredFunction {
  const entry = options.functions.lookup(name);
  if (!entry) {
    throw createFunctionError({
      ...location,
      functionName: name,
      message: 'Function not found',
    });
  }
  return entry;
}

/**
 * Check the signature and call `entry`. Errors that are not TemplateErrors
 * are wrapped in a FunctionError carrying the original as `cause`.
 */
function invoke(
  entry: RegisteredFunction,
  args: readonly Value[],
  location: ErrorLocationOptions,
): Value {
  const name = entry.name;
  const bound = bindArguments(entry, args, location);

  try {
    return entry.fn(bound);
  } catch (err) {
    if (isTemplateError(err)) {
      throw err;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.warn('registry function failed', { function: name, error: message });

    throw createFunctionError({
      ...location,
      functionName: name,
      message,
      args: bound.map(formatValue),
      cause: err,
    });
  }
}
