/**
 * flowbind – Function registry
 *
 * Templates never define functions; they call functions supplied by the
 * host through a registry bound at parse time:
 *
 *   const registry = createRegistry()
 *     .withFunction('upper', ([s]) => stringValue(asString(s)))
 *     .withFunction('default', ([v, fallback]) => (isNull(v) ? fallback : v), {
 *       parameters: [
 *         { name: 'value' },
 *         { name: 'fallback', required: false, default: stringValue('') },
 *       ],
 *     });
 *
 *   parseWithFunctions('{{ $input.name | upper }}', registry);
 *
 * Registries are immutable: `withFunction` returns a new registry and
 * leaves the receiver untouched, so templates parsed against different
 * registries can render side by side.
 *
 * License: Apache-2.0
 */

import { createSignatureError } from './errors';
import type { ErrorLocationOptions } from './errors';
import { isNumber, typeName } from './value';
import type { Value, ValueTypeName } from './value';

//////////////////////
// Public interfaces //
//////////////////////

/**
 * Host function callable from expressions. Throw a `TemplateError` (for
 * example `CustomError`) to report a failure as-is; any other thrown value is
 * wrapped in a `FunctionError`.
 */
export type TemplateFunction = (args: readonly Value[]) => Value;

/**
 * `number` accepts integers and floats; `any` (or no type) accepts anything.
 */
export type ParameterType = ValueTypeName | 'number' | 'any';

export interface ParameterSpec {
  name: string;
  type?: ParameterType;
  /** Defaults to `true` unless a `default` is given. */
  required?: boolean;
  /** Used when the argument is omitted. */
  default?: Value;
}

export interface FunctionSignature {
  parameters: readonly ParameterSpec[];
  /**
   * Accept any number of extra arguments, checked against the type of the
   * last parameter.
   */
  variadic?: boolean;
  description?: string;
}

export interface RegisteredFunction {
  readonly name: string;
  readonly fn: TemplateFunction;
  readonly signature?: FunctionSignature;
}

/**
 * What the evaluator needs from a registry.
 */
export interface FunctionRegistry {
  lookup(name: string): RegisteredFunction | undefined;
  has(name: string): boolean;
  names(): string[];
}

export interface Registry extends FunctionRegistry {
  readonly size: number;

  /**
   * Returns a new registry with `name` added (or replaced).
   */
  withFunction(
    name: string,
    fn: TemplateFunction,
    signature?: FunctionSignature,
  ): Registry;

  /**
   * Returns a new registry without `name`.
   */
  withoutFunction(name: string): Registry;
}

///////////////////////////////
// Registry implementation   //
///////////////////////////////

const FUNCTION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

class RegistryImpl implements Registry {
  private readonly entries: ReadonlyMap<string, RegisteredFunction>;

  constructor(entries?: ReadonlyMap<string, RegisteredFunction>) {
    this.entries = entries ?? new Map<string, RegisteredFunction>();
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(name: string): RegisteredFunction | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  withFunction(
    name: string,
    fn: TemplateFunction,
    signature?: FunctionSignature,
  ): Registry {
    if (!FUNCTION_NAME.test(name)) {
      throw createSignatureError({
        functionName: name,
        message: 'function names must be identifiers',
      });
    }
    if (name === 'if') {
      throw createSignatureError({
        functionName: name,
        message: "'if' is reserved",
      });
    }
    if (signature) {
      checkSignatureShape(name, signature);
    }

    const next = new Map(this.entries);
    next.set(name, Object.freeze({ name, fn, signature }));
    return new RegistryImpl(next);
  }

  withoutFunction(name: string): Registry {
    if (!this.entries.has(name)) return this;
    const next = new Map(this.entries);
    next.delete(name);
    return new RegistryImpl(next);
  }
}

/**
 * Required parameters may not follow optional ones.
 */
function checkSignatureShape(name: string, signature: FunctionSignature): void {
  let sawOptional = false;
  for (const param of signature.parameters) {
    const optional = isOptional(param);
    if (!optional && sawOptional) {
      throw createSignatureError({
        functionName: name,
        message: `required parameter '${param.name}' follows an optional one`,
      });
    }
    sawOptional = sawOptional || optional;
  }
}

export function createRegistry(): Registry {
  return new RegistryImpl();
}

/**
 * Registry with no functions; used by `parse`.
 */
export const EMPTY_REGISTRY: Registry = createRegistry();

///////////////////////////////
// Signature enforcement     //
///////////////////////////////

function isOptional(param: ParameterSpec): boolean {
  return param.required === false || param.default !== undefined;
}

export function matchesParameterType(
  value: Value,
  type: ParameterType | undefined,
): boolean {
  if (type === undefined || type === 'any') return true;
  if (type === 'number') return isNumber(value);
  return typeName(value) === type;
}

/**
 * Minimum and maximum argument counts; `max` is `Infinity` when variadic.
 */
export function signatureArity(signature: FunctionSignature): {
  min: number;
  max: number;
} {
  const min = signature.parameters.filter((p) => !isOptional(p)).length;
  const max = signature.variadic ? Infinity : signature.parameters.length;
  return { min, max };
}

/**
 * Check `args` against the function's signature and fill in defaults.
 * Functions without a signature receive `args` unchanged.
 */
export function bindArguments(
  entry: RegisteredFunction,
  args: readonly Value[],
  location: ErrorLocationOptions = {},
): readonly Value[] {
  const signature = entry.signature;
  if (!signature) return args;

  const { min, max } = signatureArity(signature);
  const params = signature.parameters;

  if (args.length > max) {
    throw createSignatureError({
      ...location,
      functionName: entry.name,
      message: `expected at most ${max} argument(s), got ${args.length}`,
    });
  }
  if (args.length < min) {
    const missing = params[args.length];
    throw createSignatureError({
      ...location,
      functionName: entry.name,
      message: `missing required argument '${missing.name}'`,
    });
  }

  const bound: Value[] = [];

  for (let i = 0; i < args.length; i++) {
    // Extra variadic arguments are checked against the last parameter.
    const param: ParameterSpec | undefined = params[Math.min(i, params.length - 1)];
    const arg = args[i];
    if (param && !matchesParameterType(arg, param.type)) {
      throw createSignatureError({
        ...location,
        functionName: entry.name,
        message: `argument '${param.name}' expects ${param.type}, got ${typeName(arg)}`,
      });
    }
    bound.push(arg);
  }

  for (let i = args.length; i < params.length; i++) {
    const fallback = params[i].default;
    if (fallback === undefined) break;
    bound.push(fallback);
  }

  return bound;
}
