/**
 * flowbind – Evaluation context & data sources
 *
 * A `Context` holds the data one render reads from, split into six named
 * channels (data sources):
 *
 *   $input          the current node's input
 *   $node('id')     output of an upstream node
 *   $system         engine-provided data (seeded with `datetime`)
 *   $execution      execution metadata
 *   $workflow       workflow metadata
 *   $env.NAME       environment variables (strings)
 *
 * Contexts are filled through the chaining setters and then only read while
 * a template renders. Build a fresh one per render.
 *
 * License: Apache-2.0
 */

import { createDataNotFoundError } from './errors';
import {
  integerValue,
  navigate,
  objectFromEntries,
  objectValue,
  stringValue,
} from './value';
import type { ObjectValue, Value } from './value';

/////////////////////
// Data sources    //
/////////////////////

export type DataSource =
  | { readonly type: 'input' }
  | { readonly type: 'node'; readonly id: string }
  | { readonly type: 'system' }
  | { readonly type: 'execution' }
  | { readonly type: 'environment' }
  | { readonly type: 'workflow' };

export type DataSourceType = DataSource['type'];

/**
 * Constructors for the six data-source selectors.
 */
export const DataSource = {
  input: (): DataSource => ({ type: 'input' }),
  node: (id: string): DataSource => ({ type: 'node', id }),
  system: (): DataSource => ({ type: 'system' }),
  execution: (): DataSource => ({ type: 'execution' }),
  environment: (): DataSource => ({ type: 'environment' }),
  workflow: (): DataSource => ({ type: 'workflow' }),
} as const;

/**
 * Reference syntax of a source: `$input`, `$node('id')`, `$env`, …
 */
export function dataSourceLabel(source: DataSource): string {
  switch (source.type) {
    case 'input':
      return '$input';
    case 'node':
      return nodeLabel(source.id);
    case 'system':
      return '$system';
    case 'execution':
      return '$execution';
    case 'environment':
      return '$env';
    case 'workflow':
      return '$workflow';
  }
}

function nodeLabel(id: string): string {
  return `$node('${id}')`;
}

/////////////////////
// Context         //
/////////////////////

export interface ContextOptions {
  /**
   * Time source for `$system.datetime`. Read once, at construction.
   * Defaults to the wall clock.
   */
  clock?: () => Date;
}

export class Context {
  private input: Value | undefined;
  private readonly nodes = new Map<string, Value>();
  private readonly env = new Map<string, string>();
  private readonly execution = new Map<string, Value>();
  private readonly workflow = new Map<string, Value>();
  private system: ObjectValue;

  constructor(options: ContextOptions = {}) {
    const clock = options.clock ?? (() => new Date());
    this.system = objectValue({ datetime: buildDatetime(clock()) });
  }

  setInput(value: Value): this {
    this.input = value;
    return this;
  }

  getInput(): Value | undefined {
    return this.input;
  }

  addNodeOutput(id: string, value: Value): this {
    this.nodes.set(id, value);
    return this;
  }

  getNodeOutput(id: string): Value | undefined {
    return this.nodes.get(id);
  }

  setEnv(key: string, value: string): this {
    this.env.set(key, value);
    return this;
  }

  getEnv(key: string): string | undefined {
    return this.env.get(key);
  }

  setExecutionData(key: string, value: Value): this {
    this.execution.set(key, value);
    return this;
  }

  getExecutionData(key: string): Value | undefined {
    return this.execution.get(key);
  }

  setWorkflowData(key: string, value: Value): this {
    this.workflow.set(key, value);
    return this;
  }

  getWorkflowData(key: string): Value | undefined {
    return this.workflow.get(key);
  }

  getSystemData(): ObjectValue {
    return this.system;
  }

  /**
   * Add or replace a top-level `$system` entry. `datetime` may be replaced
   * like any other key.
   */
  setSystemData(key: string, value: Value): this {
    const entries = new Map(this.system.entries);
    entries.set(key, value);
    this.system = objectFromEntries(entries);
    return this;
  }

  /**
   * Resolve `path` (dotted, possibly empty) under `source`.
   *
   * Input, node and system paths are navigated through nested values.
   * Execution, workflow and environment paths are exact top-level keys.
   *
   * Throws DataNotFoundError with suggested alternatives on a miss.
   */
  resolveDataSource(source: DataSource, path: string): Value {
    switch (source.type) {
      case 'input': {
        if (this.input === undefined) {
          throw createDataNotFoundError({
            path: '$input',
            available: ['No input data available'],
          });
        }
        return requirePath(this.input, path, '$input', ['$input']);
      }

      case 'node': {
        const label = nodeLabel(source.id);
        const output = this.nodes.get(source.id);
        if (output === undefined) {
          throw createDataNotFoundError({
            path: label,
            available: [...this.nodes.keys()].map(nodeLabel),
          });
        }
        return requirePath(output, path, label, [label]);
      }

      case 'system':
        return requirePath(this.system, path, '$system', ['$system.datetime']);

      case 'execution':
        return lookupMetadata(this.execution, path, '$execution');

      case 'workflow':
        return lookupMetadata(this.workflow, path, '$workflow');

      case 'environment': {
        const value = this.env.get(path);
        if (value === undefined) {
          throw createDataNotFoundError({
            path: `$env.${path}`,
            available: [...this.env.keys()].map((key) => `$env.${key}`),
          });
        }
        return stringValue(value);
      }
    }
  }

  /**
   * Every reference that currently resolves, for diagnostics and UIs.
   */
  availableDataSources(): string[] {
    const sources: string[] = [];

    if (this.input !== undefined) {
      sources.push('$input');
    }
    for (const id of this.nodes.keys()) {
      sources.push(nodeLabel(id));
    }
    sources.push('$system', '$execution', '$workflow');
    for (const key of this.env.keys()) {
      sources.push(`$env.${key}`);
    }

    return sources;
  }

  /**
   * System, execution, environment and workflow always exist; input and
   * node sources only once data was provided.
   */
  hasDataSource(source: DataSource): boolean {
    switch (source.type) {
      case 'input':
        return this.input !== undefined;
      case 'node':
        return this.nodes.has(source.id);
      default:
        return true;
    }
  }
}

/////////////////////
// Helpers         //
/////////////////////

function requirePath(
  root: Value,
  path: string,
  label: string,
  available: readonly string[],
): Value {
  const found = navigate(root, path);
  if (found === undefined) {
    throw createDataNotFoundError({ path: `${label}.${path}`, available });
  }
  return found;
}

function lookupMetadata(
  store: ReadonlyMap<string, Value>,
  path: string,
  label: string,
): Value {
  if (path === '') {
    return objectFromEntries(store);
  }
  const value = store.get(path);
  if (value === undefined) {
    throw createDataNotFoundError({
      path: `${label}.${path}`,
      available: [...store.keys()].map((key) => `${label}.${key}`),
    });
  }
  return value;
}

/**
 * `$system.datetime`, all in UTC:
 *
 *   now        2024-05-01T12:30:45.123Z
 *   timestamp  1714566645
 *   iso        2024-05-01T12:30:45Z
 *   date       2024-05-01
 *   time       12:30:45
 */
function buildDatetime(now: Date): ObjectValue {
  const iso = now.toISOString();
  return objectValue({
    now: stringValue(iso),
    timestamp: integerValue(Math.floor(now.getTime() / 1000)),
    iso: stringValue(`${iso.slice(0, 19)}Z`),
    date: stringValue(iso.slice(0, 10)),
    time: stringValue(iso.slice(11, 19)),
  });
}
