/**
 * flowbind – Error taxonomy & helpers
 *
 * Every fallible operation in the engine throws a `TemplateError` subclass.
 * The base class carries a stable `code` plus optional location data
 * (index, line/column, caret snippet) when the failing span of the template
 * is known.
 *
 * Common usage:
 *
 *  - Parser:
 *      throw createParseError({
 *        message: 'Unclosed expression',
 *        template,
 *        position: openIndex,
 *      });
 *
 *  - Evaluator:
 *      throw createMathError({
 *        message: 'Division by zero',
 *        source,
 *        index: node.right.start,
 *      });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error codes      //
//////////////////////

/**
 * Stable error categories, one per subclass.
 */
export type TemplateErrorCode =
  /** Malformed template or expression syntax (parse time only). */
  | 'E_PARSE'
  /** Invalid or unsupported runtime operation. */
  | 'E_EVALUATION'
  /** Missing function, or a failure reported by a registry function. */
  | 'E_FUNCTION'
  /** A value could not be coerced to the requested type. */
  | 'E_TYPE'
  /** A data-source reference could not be resolved. */
  | 'E_DATA_NOT_FOUND'
  /** A call does not match the declared function signature. */
  | 'E_SIGNATURE'
  /** Division by zero and similar arithmetic failures. */
  | 'E_MATH'
  /** Array index out of bounds. */
  | 'E_INDEX'
  /** Template length, AST depth or evaluation budget exceeded. */
  | 'E_LIMIT'
  /** Application-defined failure raised by a registry function. */
  | 'E_CUSTOM';

/**
 * Location and wrapping options shared by every error factory.
 */
export interface ErrorLocationOptions {
  /**
   * Full template (or expression) source the `index` refers to.
   */
  source?: string;

  /**
   * 0-based character offset of the failing span in `source`.
   */
  index?: number;

  /**
   * Length of the failing span; drives the caret range in `snippet`.
   */
  length?: number;

  /**
   * Optional hint shown after the message by tooling.
   */
  note?: string;

  /**
   * Underlying error when this one wraps another failure.
   */
  cause?: unknown;
}

export interface TemplateErrorOptions extends ErrorLocationOptions {
  message: string;
}

/**
 * Base class for all engine errors.
 */
export class TemplateError extends Error {
  public override readonly name: string = 'TemplateError';
  public readonly code: TemplateErrorCode;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * The offending source line with a caret under the failing span, e.g.:
   *
   *   Hello {{ $input.name
   *         ^ --- Unclosed expression
   */
  public readonly snippet: string;

  public readonly note?: string;

  constructor(code: TemplateErrorCode, opts: TemplateErrorOptions) {
    super(
      opts.message,
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );
    Object.setPrototypeOf(this, new.target.prototype);

    this.code = code;

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';

    if (opts.source !== undefined && index !== null) {
      const snip = buildSnippet(opts.source, index, opts.length ?? 1, opts.message);
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.note = opts.note;
  }
}

/**
 * Type guard for any engine error.
 */
export function isTemplateError(err: unknown): err is TemplateError {
  return err instanceof TemplateError;
}

//////////////////////
// Subclasses       //
//////////////////////

export interface ParseErrorOptions {
  message: string;
  template: string;
  position: number;
  length?: number;
  note?: string;
  cause?: unknown;
}

/**
 * Raised only while parsing; a constructed Template is always well-formed.
 */
export class ParseError extends TemplateError {
  public override readonly name: string = 'ParseError';

  /** 0-based UTF-16 code unit offset into `template`, not a byte offset. */
  public readonly position: number;
  /** The same offset counted in UTF-8 bytes. */
  public readonly byteOffset: number;
  public readonly template: string;

  constructor(opts: ParseErrorOptions) {
    super('E_PARSE', {
      message: opts.message,
      source: opts.template,
      index: opts.position,
      length: opts.length,
      note: opts.note,
      cause: opts.cause,
    });
    this.position = opts.position;
    this.byteOffset = Buffer.byteLength(opts.template.slice(0, opts.position), 'utf8');
    this.template = opts.template;
  }
}

export interface EvaluationErrorOptions extends ErrorLocationOptions {
  message: string;
  context?: string;
}

export class EvaluationError extends TemplateError {
  public override readonly name: string = 'EvaluationError';
  public readonly context?: string;

  constructor(opts: EvaluationErrorOptions) {
    super('E_EVALUATION', opts);
    this.context = opts.context;
  }
}

export interface FunctionErrorOptions extends ErrorLocationOptions {
  functionName: string;
  message: string;
  /** Display form of the evaluated arguments. */
  args?: readonly string[];
}

export class FunctionError extends TemplateError {
  public override readonly name: string = 'FunctionError';
  public readonly functionName: string;
  public readonly args: readonly string[];

  constructor(opts: FunctionErrorOptions) {
    super('E_FUNCTION', {
      ...opts,
      message: `Function '${opts.functionName}': ${opts.message}`,
    });
    this.functionName = opts.functionName;
    this.args = opts.args ?? [];
  }
}

export interface TypeConversionErrorOptions extends ErrorLocationOptions {
  from: string;
  to: string;
  context?: string;
}

/**
 * A value of type `from` could not be used as `to`.
 */
export class TypeConversionError extends TemplateError {
  public override readonly name: string = 'TypeConversionError';
  public readonly from: string;
  public readonly to: string;
  public readonly context?: string;

  constructor(opts: TypeConversionErrorOptions) {
    const base = `Cannot convert ${opts.from} to ${opts.to}`;
    super('E_TYPE', {
      ...opts,
      message: opts.context ? `${base} (${opts.context})` : base,
    });
    this.from = opts.from;
    this.to = opts.to;
    this.context = opts.context;
  }
}

export interface DataNotFoundErrorOptions extends ErrorLocationOptions {
  path: string;
  available: readonly string[];
}

/**
 * An unresolved data-source reference. `available` lists the references a
 * UI can suggest instead.
 */
export class DataNotFoundError extends TemplateError {
  public override readonly name: string = 'DataNotFoundError';
  public readonly path: string;
  public readonly available: readonly string[];

  constructor(opts: DataNotFoundErrorOptions) {
    super('E_DATA_NOT_FOUND', {
      ...opts,
      message: `Data not found: ${opts.path}`,
      note:
        opts.note ??
        (opts.available.length > 0
          ? `available: ${opts.available.join(', ')}`
          : undefined),
    });
    this.path = opts.path;
    this.available = [...opts.available];
  }
}

export interface SignatureErrorOptions extends ErrorLocationOptions {
  functionName: string;
  message: string;
}

export class SignatureError extends TemplateError {
  public override readonly name: string = 'SignatureError';
  public readonly functionName: string;

  constructor(opts: SignatureErrorOptions) {
    super('E_SIGNATURE', {
      ...opts,
      message: `Invalid call to '${opts.functionName}': ${opts.message}`,
    });
    this.functionName = opts.functionName;
  }
}

export class MathError extends TemplateError {
  public override readonly name: string = 'MathError';

  constructor(opts: TemplateErrorOptions) {
    super('E_MATH', opts);
  }
}

export interface IndexErrorOptions extends ErrorLocationOptions {
  index: number;
  size: number;
}

export class IndexError extends TemplateError {
  public override readonly name: string = 'IndexError';
  public readonly position: number;
  public readonly size: number;

  constructor(opts: IndexErrorOptions) {
    // `index` on the base class is a source offset; the array index lives
    // in `position`.
    super('E_INDEX', {
      note: opts.note,
      cause: opts.cause,
      message: `Index ${opts.index} out of bounds (size ${opts.size})`,
    });
    this.position = opts.index;
    this.size = opts.size;
  }
}

export class LimitError extends TemplateError {
  public override readonly name: string = 'LimitError';

  constructor(opts: TemplateErrorOptions) {
    super('E_LIMIT', opts);
  }
}

export interface CustomErrorOptions extends ErrorLocationOptions {
  message: string;
  customCode?: string;
}

/**
 * For registry functions that need to report an application-level failure
 * without it being wrapped into a FunctionError.
 */
export class CustomError extends TemplateError {
  public override readonly name: string = 'CustomError';
  public readonly customCode?: string;

  constructor(opts: CustomErrorOptions) {
    super('E_CUSTOM', opts);
    this.customCode = opts.customCode;
  }
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

export function createParseError(opts: ParseErrorOptions): ParseError {
  return new ParseError(opts);
}

export function createEvaluationError(
  opts: EvaluationErrorOptions,
): EvaluationError {
  return new EvaluationError(opts);
}

export function createFunctionError(opts: FunctionErrorOptions): FunctionError {
  return new FunctionError(opts);
}

export function createTypeConversionError(
  opts: TypeConversionErrorOptions,
): TypeConversionError {
  return new TypeConversionError(opts);
}

export function createDataNotFoundError(
  opts: DataNotFoundErrorOptions,
): DataNotFoundError {
  return new DataNotFoundError(opts);
}

export function createSignatureError(
  opts: SignatureErrorOptions,
): SignatureError {
  return new SignatureError(opts);
}

export function createMathError(opts: TemplateErrorOptions): MathError {
  return new MathError(opts);
}

export function createIndexError(opts: IndexErrorOptions): IndexError {
  return new IndexError(opts);
}

/**
 * Template too long, AST too deep, or evaluation budget spent.
 */
export function createLimitError(opts: TemplateErrorOptions): LimitError {
  return new LimitError(opts);
}

export function createCustomError(opts: CustomErrorOptions): CustomError {
  return new CustomError(opts);
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface Located {
  line: number;
  column: number;
  /** Text of the line holding the offset, without its line break. */
  lineText: string;
}

/**
 * Resolve a character offset to its line. The offset is clamped into the
 * source; `\r\n`, `\r` and `\n` each end one line.
 */
function locate(source: string, index: number): Located {
  const last = Math.max(source.length - 1, 0);
  const offset = Number.isNaN(index) ? 0 : Math.min(Math.max(index, 0), last);

  const breaks = /\r\n|\r|\n/g;
  let line = 1;
  let lineStart = 0;
  let lineEnd = source.length;

  for (let m = breaks.exec(source); m !== null; m = breaks.exec(source)) {
    if (m.index >= offset) {
      lineEnd = m.index;
      break;
    }
    line++;
    lineStart = m.index + m[0].length;
  }

  return {
    line,
    column: offset - lineStart + 1,
    lineText: source.slice(lineStart, lineEnd),
  };
}

/**
 * 1-based line and column for a character offset.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  const { line, column } = locate(source, index);
  return { line, column };
}

/**
 * The offending line with carets under `length` characters from `index`,
 * followed by `label`:
 *
 *   {{ 10 / 0 }}
 *           ^ --- Division by zero
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  label: string,
): { line: number; column: number; snippet: string } {
  const { line, column, lineText } = locate(source, index);

  const from = Math.min(Math.max(column, 1), Math.max(lineText.length, 1));
  const carets = Math.max(1, Math.min(length, lineText.length - from + 1));
  const suffix = label.trim() === '' ? '' : ` --- ${label}`;

  return {
    line,
    column,
    snippet: `${lineText}\n${' '.repeat(from - 1)}${'^'.repeat(carets)}${suffix}`,
  };
}
