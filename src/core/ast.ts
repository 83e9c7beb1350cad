/**
 * flowbind – Expression AST
 *
 * A closed union of node shapes, discriminated on `type`. Every node carries
 * `start`/`end` offsets into the template source. The tree owns its
 * children; there are no parent pointers and no sharing between nodes.
 *
 * License: Apache-2.0
 */

import type { DataSource } from './context';
import type { Value } from './value';

/////////////////////////
// Base node & helpers //
/////////////////////////

export type NodeType =
  | 'Literal'
  | 'DataAccess'
  | 'FunctionCall'
  | 'Pipeline'
  | 'BinaryOp'
  | 'UnaryOp'
  | 'Ternary'
  | 'IfFunction';

export interface BaseNode {
  type: NodeType;

  /** 0-based offset into the template, inclusive. */
  start: number;

  /** 0-based offset into the template, exclusive. */
  end: number;
}

/////////////////////////
// Operators           //
/////////////////////////

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '&&'
  | '||'
  | 'contains'
  | 'startsWith'
  | 'endsWith';

export type UnaryOperator = '!' | '-';

/**
 * Names used when an operator shows up in diagnostics.
 */
export const BINARY_OPERATOR_NAMES: Readonly<Record<BinaryOperator, string>> = {
  '+': 'Add',
  '-': 'Subtract',
  '*': 'Multiply',
  '/': 'Divide',
  '%': 'Modulo',
  '==': 'Equal',
  '!=': 'NotEqual',
  '<': 'LessThan',
  '<=': 'LessEqual',
  '>': 'GreaterThan',
  '>=': 'GreaterEqual',
  '&&': 'And',
  '||': 'Or',
  contains: 'Contains',
  startsWith: 'StartsWith',
  endsWith: 'EndsWith',
};

/**
 * Operators the parser accepts but the evaluator rejects at runtime.
 */
export const UNSUPPORTED_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>([
  '%',
  '>',
  '>=',
  '<=',
  'contains',
  'startsWith',
  'endsWith',
]);

/////////////////////////
// Expression node set //
/////////////////////////

export interface LiteralNode extends BaseNode {
  type: 'Literal';
  value: Value;
  /** Source text of the literal, quotes included. */
  raw: string;
}

/**
 * `$input.user.name` → `{ source: { type: 'input' }, path: 'user.name' }`.
 * `path` is empty for whole-source references.
 */
export interface DataAccessNode extends BaseNode {
  type: 'DataAccess';
  source: DataSource;
  path: string;
}

export interface FunctionCallNode extends BaseNode {
  type: 'FunctionCall';
  name: string;
  args: ExpressionNode[];
}

export interface PipelineStage {
  name: string;
  args: ExpressionNode[];
  start: number;
  end: number;
}

/**
 * `input | stage | stage(arg)`. Each stage receives the running value as
 * its first argument.
 */
export interface PipelineNode extends BaseNode {
  type: 'Pipeline';
  input: ExpressionNode;
  stages: PipelineStage[];
}

export interface BinaryOpNode extends BaseNode {
  type: 'BinaryOp';
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface UnaryOpNode extends BaseNode {
  type: 'UnaryOp';
  operator: UnaryOperator;
  operand: ExpressionNode;
}

export interface TernaryNode extends BaseNode {
  type: 'Ternary';
  condition: ExpressionNode;
  consequent: ExpressionNode;
  alternate: ExpressionNode;
}

/**
 * `if(cond, then)` or `if(cond, then, else)`. A missing else yields null.
 */
export interface IfFunctionNode extends BaseNode {
  type: 'IfFunction';
  condition: ExpressionNode;
  consequent: ExpressionNode;
  alternate: ExpressionNode | null;
}

export type ExpressionNode =
  | LiteralNode
  | DataAccessNode
  | FunctionCallNode
  | PipelineNode
  | BinaryOpNode
  | UnaryOpNode
  | TernaryNode
  | IfFunctionNode;

/////////////////////////
// Type guards         //
/////////////////////////

export function isLiteralNode(node: ExpressionNode): node is LiteralNode {
  return node.type === 'Literal';
}

export function isDataAccessNode(node: ExpressionNode): node is DataAccessNode {
  return node.type === 'DataAccess';
}

///////////////////////////////
// Traversal / visitor utils //
///////////////////////////////

/**
 * Direct children in evaluation order. Pipeline stage arguments follow the
 * pipeline input; both conditional branches are included.
 */
export function childrenOf(node: ExpressionNode): ExpressionNode[] {
  switch (node.type) {
    case 'Literal':
    case 'DataAccess':
      return [];
    case 'FunctionCall':
      return [...node.args];
    case 'Pipeline':
      return [node.input, ...node.stages.flatMap((stage) => stage.args)];
    case 'BinaryOp':
      return [node.left, node.right];
    case 'UnaryOp':
      return [node.operand];
    case 'Ternary':
      return [node.condition, node.consequent, node.alternate];
    case 'IfFunction':
      return node.alternate
        ? [node.condition, node.consequent, node.alternate]
        : [node.condition, node.consequent];
  }
}

/**
 * Returning `"skip"` from `enter` skips the node's children; `"break"`
 * aborts the traversal.
 */
export type VisitResult = void | 'skip' | 'break';

export interface Visitor {
  enter?(node: ExpressionNode, parent: ExpressionNode | null, depth: number): VisitResult;
  leave?(node: ExpressionNode, parent: ExpressionNode | null, depth: number): void;
}

/**
 * Depth-first pre-order traversal. The root has depth 1.
 */
export function traverse(root: ExpressionNode, visitor: Visitor): void {
  walk(root, null, 1, visitor);
}

function walk(
  node: ExpressionNode,
  parent: ExpressionNode | null,
  depth: number,
  visitor: Visitor,
): 'break' | void {
  const entered = visitor.enter?.(node, parent, depth);
  if (entered === 'break') return 'break';
  if (entered === 'skip') return;

  for (const child of childrenOf(node)) {
    if (walk(child, node, depth + 1, visitor) === 'break') return 'break';
  }

  visitor.leave?.(node, parent, depth);
}
