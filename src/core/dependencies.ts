/**
 * flowbind – Static dependency extraction
 *
 * Collects every data source and function an expression could touch,
 * without evaluating it. Both branches of conditionals count as used, so the
 * result over-approximates what any single render reads.
 *
 * License: Apache-2.0
 */

import { childrenOf } from './ast';
import type { ExpressionNode } from './ast';

export interface Dependencies {
  readonly inputPaths: ReadonlySet<string>;
  readonly nodeIds: ReadonlySet<string>;
  readonly envVars: ReadonlySet<string>;
  readonly functions: ReadonlySet<string>;
  readonly usesSystem: boolean;
  readonly usesExecution: boolean;
  readonly usesWorkflow: boolean;
}

/**
 * Mutable accumulator filled by `collectDependencies`.
 */
export interface DependencyCollector {
  inputPaths: Set<string>;
  nodeIds: Set<string>;
  envVars: Set<string>;
  functions: Set<string>;
  usesSystem: boolean;
  usesExecution: boolean;
  usesWorkflow: boolean;
}

export function createDependencyCollector(): DependencyCollector {
  return {
    inputPaths: new Set(),
    nodeIds: new Set(),
    envVars: new Set(),
    functions: new Set(),
    usesSystem: false,
    usesExecution: false,
    usesWorkflow: false,
  };
}

/**
 * Record everything `node` references into `deps`. Idempotent: collecting the
 * same tree twice leaves `deps` unchanged.
 *
 * `$input` without a path records the empty path.
 */
export function collectDependencies(
  node: ExpressionNode,
  deps: DependencyCollector,
): void {
  switch (node.type) {
    case 'DataAccess':
      switch (node.source.type) {
        case 'input':
          deps.inputPaths.add(node.path);
          break;
        case 'node':
          deps.nodeIds.add(node.source.id);
          break;
        case 'environment':
          deps.envVars.add(node.path);
          break;
        case 'system':
          deps.usesSystem = true;
          break;
        case 'execution':
          deps.usesExecution = true;
          break;
        case 'workflow':
          deps.usesWorkflow = true;
          break;
      }
      break;

    case 'FunctionCall':
      deps.functions.add(node.name);
      break;

    case 'Pipeline':
      for (const stage of node.stages) {
        deps.functions.add(stage.name);
      }
      break;

    default:
      break;
  }

  for (const child of childrenOf(node)) {
    collectDependencies(child, deps);
  }
}

/**
 * Immutable snapshot of a collector.
 */
export function freezeDependencies(deps: DependencyCollector): Dependencies {
  return Object.freeze({
    inputPaths: new Set(deps.inputPaths),
    nodeIds: new Set(deps.nodeIds),
    envVars: new Set(deps.envVars),
    functions: new Set(deps.functions),
    usesSystem: deps.usesSystem,
    usesExecution: deps.usesExecution,
    usesWorkflow: deps.usesWorkflow,
  });
}

export function dependenciesOf(nodes: Iterable<ExpressionNode>): Dependencies {
  const deps = createDependencyCollector();
  for (const node of nodes) {
    collectDependencies(node, deps);
  }
  return freezeDependencies(deps);
}
