/**
 * flowbind – Utils / inspect
 *
 * Helpers for debug output and editor tooling:
 *  - pretty-printing Values,
 *  - formatting engine errors with their snippet and hint,
 *  - summarizing expression ASTs and templates.
 *
 * Nothing here evaluates expressions.
 *
 * License: Apache-2.0
 */

import { traverse } from '../core/ast';
import type { ExpressionNode } from '../core/ast';
import { dataSourceLabel } from '../core/context';
import {
  buildSnippet,
  computeLineAndColumn,
  isTemplateError,
} from '../core/errors';
import type { Template } from '../core/template';
import type { Value } from '../core/value';

/////////////////////////////
// Value inspection        //
/////////////////////////////

export interface InspectValueOptions {
  /**
   * Levels of arrays/objects to expand. Default: 3
   */
  maxDepth?: number;

  /**
   * Array elements shown per level. Default: 10
   */
  maxArrayLength?: number;

  /**
   * Object keys shown per level. Default: 10
   */
  maxObjectKeys?: number;

  /**
   * Longer strings are cut and end with "…". Default: 80
   */
  maxStringLength?: number;

  /**
   * Default: two spaces
   */
  indent?: string;
}

/**
 * Multi-line rendering of a Value for logs and debug UIs. Large or deep
 * structures are truncated.
 *
 *   {
 *     "name": "Ada",
 *     "tags": [Array(3)]
 *   }
 */
export function inspectValue(
  value: Value,
  options: InspectValueOptions = {},
): string {
  const {
    maxDepth = 3,
    maxArrayLength = 10,
    maxObjectKeys = 10,
    maxStringLength = 80,
    indent = '  ',
  } = options;

  function format(val: Value, depth: number): string {
    switch (val.type) {
      case 'null':
        return 'null';
      case 'bool':
        return String(val.value);
      case 'integer':
        return String(val.value);
      case 'float':
        // Keep floats recognizable: 2 → 2.0
        return Number.isInteger(val.value) ? val.value.toFixed(1) : String(val.value);
      case 'string': {
        const s = val.value;
        const short =
          s.length > maxStringLength ? s.slice(0, maxStringLength) + '…' : s;
        return JSON.stringify(short);
      }
      case 'array': {
        const items = val.items;
        if (items.length === 0) return '[]';
        if (depth >= maxDepth) return `[Array(${items.length})]`;

        const lines: string[] = [];
        const len = Math.min(items.length, maxArrayLength);
        for (let i = 0; i < len; i++) {
          lines.push(indent.repeat(depth + 1) + format(items[i], depth + 1));
        }
        if (items.length > len) {
          lines.push(`${indent.repeat(depth + 1)}… ${items.length - len} more item(s)`);
        }
        return `[\n${lines.join(',\n')}\n${indent.repeat(depth)}]`;
      }
      case 'object': {
        const keys = [...val.entries.keys()];
        if (keys.length === 0) return '{}';
        if (depth >= maxDepth) return `{… ${keys.length} key(s)}`;

        const lines: string[] = [];
        const len = Math.min(keys.length, maxObjectKeys);
        for (let i = 0; i < len; i++) {
          const key = keys[i];
          const item = val.entries.get(key);
          if (item === undefined) continue;
          lines.push(
            `${indent.repeat(depth + 1)}${JSON.stringify(key)}: ${format(item, depth + 1)}`,
          );
        }
        if (keys.length > len) {
          lines.push(`${indent.repeat(depth + 1)}… ${keys.length - len} more key(s)`);
        }
        return `{\n${lines.join(',\n')}\n${indent.repeat(depth)}}`;
      }
    }
  }

  return format(value, 0);
}

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedTemplateError {
  /**
   * One line: `[E_PARSE] Unclosed expression at line 1, col 7`.
   */
  summary: string;

  /**
   * Summary, snippet and hint, separated by blank lines.
   */
  detail: string;

  error: unknown;
}

/**
 * Format an engine error (or any thrown value) for display. When the error
 * has an offset but no snippet, `source` is used to build one.
 */
export function formatTemplateError(
  err: unknown,
  source?: string,
): FormattedTemplateError {
  if (!isTemplateError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  let line = err.line;
  let column = err.column;
  let snippet = err.snippet;

  if (snippet.trim() === '' && source !== undefined && err.index !== null) {
    const built = buildSnippet(source, err.index, 1, err.message);
    line = built.line;
    column = built.column;
    snippet = built.snippet;
  }

  if ((line === null || column === null) && source !== undefined && err.index !== null) {
    const lc = computeLineAndColumn(source, err.index);
    line = lc.line;
    column = lc.column;
  }

  const locationParts: string[] = [];
  if (line !== null) locationParts.push(`line ${line}`);
  if (column !== null) locationParts.push(`col ${column}`);
  const at = locationParts.length > 0 ? ` at ${locationParts.join(', ')}` : '';

  const summary = `[${err.code}] ${err.message}${at}`;

  let detail = summary;
  if (snippet.trim() !== '') {
    detail += `\n\n${snippet}`;
  }
  if (err.note && err.note.trim() !== '') {
    detail += `\n\nHint: ${err.note}`;
  }

  return { summary, detail, error: err };
}

/////////////////////////////
// AST introspection       //
/////////////////////////////

export interface ExpressionAstInsight {
  /** Total number of AST nodes. */
  nodeCount: number;

  /** Maximum depth (root = 1). */
  maxDepth: number;

  /**
   * Distinct references in first-seen order, e.g. `$input.user.name`,
   * `$node('http').status`.
   */
  references: string[];

  /** Distinct function and pipeline-stage names, sorted. */
  functions: string[];

  /** Distinct binary and unary operators, sorted. */
  operators: string[];
}

export function analyzeAst(root: ExpressionNode): ExpressionAstInsight {
  let nodeCount = 0;
  let maxDepth = 0;
  const references = new Set<string>();
  const functions = new Set<string>();
  const operators = new Set<string>();

  traverse(root, {
    enter(node, _parent, depth) {
      nodeCount++;
      if (depth > maxDepth) maxDepth = depth;

      switch (node.type) {
        case 'DataAccess':
          references.add(referenceText(node.source.type === 'environment'
            ? '$env'
            : dataSourceLabel(node.source), node.path));
          break;
        case 'FunctionCall':
          functions.add(node.name);
          break;
        case 'Pipeline':
          for (const stage of node.stages) functions.add(stage.name);
          break;
        case 'BinaryOp':
        case 'UnaryOp':
          operators.add(node.operator);
          break;
        default:
          break;
      }
    },
  });

  return {
    nodeCount,
    maxDepth,
    references: [...references],
    functions: [...functions].sort(),
    operators: [...operators].sort(),
  };
}

function referenceText(label: string, path: string): string {
  return path === '' ? label : `${label}.${path}`;
}

/////////////////////////////
// Template summary        //
/////////////////////////////

/**
 * Human-readable outline of a template, one element per line:
 *
 *   text       "Hello "
 *   expression {{ $input.name | upper }}  refs: $input.name  fns: upper
 */
export function describeTemplate(template: Template): string {
  const lines = template.elements.map((element) => {
    if (element.type === 'text') {
      return `text       ${JSON.stringify(element.value)}`;
    }
    const insight = analyzeAst(element.expression.ast);
    let line = `expression ${element.expression.toString()}`;
    if (insight.references.length > 0) {
      line += `  refs: ${insight.references.join(', ')}`;
    }
    if (insight.functions.length > 0) {
      line += `  fns: ${insight.functions.join(', ')}`;
    }
    return line;
  });

  return lines.join('\n');
}
