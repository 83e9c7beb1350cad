/**
 * flowbind – Tokenizer
 *
 * Turns the inside of one `{{ … }}` segment into tokens. The tokenizer works
 * on the full template string so every token offset is absolute, and it
 * stops at the first `}}` outside a string literal (emitted as a `close`
 * token).
 *
 * Data-source references are lexed as single `reference` tokens:
 *
 *   $input.user.name      → input,        path "user.name"
 *   $node('http').json.id → node "http",  path "id"
 *   $env.API_URL          → environment,  path "API_URL"
 *
 * License: Apache-2.0
 */

import { DataSource } from './context';
import { createParseError } from './errors';
import {
  MULTI_CHAR_OPERATORS,
  PUNCTUATION_CHARS,
  SINGLE_CHAR_OPERATORS,
} from './tokens';
import type { ReferenceToken, SimpleToken, Token } from './tokens';

/////////////////////
// Public API      //
/////////////////////

export interface TokenStream {
  source: string;
  tokens: Token[];
}

/**
 * Tokenize a standalone expression. The list ends with a single `eof`
 * token, or with a `close` token if the source contains `}}`.
 */
export function tokenize(source: string): TokenStream {
  const tokenizer = new Tokenizer(source);
  const tokens: Token[] = [];

  for (;;) {
    const tok = tokenizer.next();
    tokens.push(tok);
    if (tok.type === 'eof' || tok.type === 'close') break;
  }

  return { source, tokens };
}

/////////////////////
// Implementation  //
/////////////////////

export class Tokenizer {
  private readonly src: string;
  private readonly len: number;
  private pos: number;

  /**
   * @param source Full template text.
   * @param start  Offset to start reading at (just past `{{`).
   */
  constructor(source: string, start = 0) {
    this.src = source;
    this.len = source.length;
    this.pos = start;
  }

  /**
   * Offset just past the last token read.
   */
  get offset(): number {
    return this.pos;
  }

  next(): Token {
    this.skipWhitespace();

    if (this.pos >= this.len) {
      return { type: 'eof', value: '', start: this.len, end: this.len };
    }

    const start = this.pos;
    const ch = this.src.charCodeAt(this.pos);

    if (ch === 125 /* } */ && this.src.charCodeAt(this.pos + 1) === 125) {
      this.pos += 2;
      return { type: 'close', value: '}}', start, end: start + 2 };
    }

    if (
      isDigit(ch) ||
      (ch === 46 /* . */ && isDigit(this.src.charCodeAt(this.pos + 1)))
    ) {
      return this.readNumberToken();
    }

    if (ch === 34 /* " */ || ch === 39 /* ' */) {
      return this.readStringToken();
    }

    if (ch === 36 /* $ */) {
      return this.readReferenceToken();
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifierToken();
    }

    const twoChars = this.src.slice(this.pos, this.pos + 2);

    if (MULTI_CHAR_OPERATORS.includes(twoChars)) {
      this.pos += 2;
      return { type: 'operator', value: twoChars, start, end: start + 2 };
    }

    const singleChar = this.src[this.pos];

    if (SINGLE_CHAR_OPERATORS.includes(singleChar)) {
      this.pos++;
      return { type: 'operator', value: singleChar, start, end: start + 1 };
    }

    if (PUNCTUATION_CHARS.includes(singleChar)) {
      this.pos++;
      return { type: 'punct', value: singleChar, start, end: start + 1 };
    }

    throw createParseError({
      message: `Unexpected character "${singleChar}"`,
      template: this.src,
      position: start,
      note: singleChar === '=' ? "did you mean '=='?" : undefined,
    });
  }

  private skipWhitespace(): void {
    while (this.pos < this.len && isWhitespace(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  private readNumberToken(): SimpleToken {
    const start = this.pos;
    let sawDot = false;

    if (this.src.charCodeAt(this.pos) === 46 /* . */) {
      sawDot = true;
      this.pos++;
    }

    this.skipDigits();

    if (!sawDot && this.src.charCodeAt(this.pos) === 46 /* . */) {
      this.pos++;
      this.skipDigits();
    }

    const c = this.src.charCodeAt(this.pos);
    if (c === 101 /* e */ || c === 69 /* E */) {
      let expPos = this.pos + 1;
      const sign = this.src.charCodeAt(expPos);
      if (sign === 43 /* + */ || sign === 45 /* - */) {
        expPos++;
      }
      if (!isDigit(this.src.charCodeAt(expPos))) {
        throw createParseError({
          message: 'Malformed number literal',
          template: this.src,
          position: start,
          length: expPos - start,
        });
      }
      this.pos = expPos;
      this.skipDigits();
    }

    return {
      type: 'number',
      value: this.src.slice(start, this.pos),
      start,
      end: this.pos,
    };
  }

  private skipDigits(): void {
    while (this.pos < this.len && isDigit(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }
  }

  private readStringToken(): SimpleToken {
    const quote = this.src.charCodeAt(this.pos);
    const start = this.pos;
    this.pos++;

    let value = '';
    let closed = false;

    while (this.pos < this.len) {
      const ch = this.src.charCodeAt(this.pos);

      if (ch === quote) {
        this.pos++;
        closed = true;
        break;
      }

      if (ch === 92 /* \ */) {
        this.pos++;
        if (this.pos >= this.len) break;
        const esc = this.src.charCodeAt(this.pos);
        this.pos++;

        switch (esc) {
          case 110 /* n */:
            value += '\n';
            break;
          case 114 /* r */:
            value += '\r';
            break;
          case 116 /* t */:
            value += '\t';
            break;
          default:
            // \\ \' \" and unknown escapes keep the escaped character.
            value += String.fromCharCode(esc);
            break;
        }
      } else {
        value += String.fromCharCode(ch);
        this.pos++;
      }
    }

    if (!closed) {
      throw createParseError({
        message: 'Unterminated string literal',
        template: this.src,
        position: start,
        length: this.pos - start,
      });
    }

    return { type: 'string', value, start, end: this.pos };
  }

  private readIdentifierToken(): SimpleToken {
    const start = this.pos;
    this.pos++;

    while (
      this.pos < this.len &&
      isIdentifierPart(this.src.charCodeAt(this.pos))
    ) {
      this.pos++;
    }

    return {
      type: 'identifier',
      value: this.src.slice(start, this.pos),
      start,
      end: this.pos,
    };
  }

  ///////////////////////
  // References        //
  ///////////////////////

  private readReferenceToken(): ReferenceToken {
    const start = this.pos;
    this.pos++; // $

    const nameStart = this.pos;
    while (
      this.pos < this.len &&
      isIdentifierPart(this.src.charCodeAt(this.pos))
    ) {
      this.pos++;
    }
    const name = this.src.slice(nameStart, this.pos);

    let source: DataSource;
    let path = '';

    switch (name) {
      case 'input':
        source = DataSource.input();
        path = this.readOptionalPath();
        break;

      case 'node': {
        source = DataSource.node(this.readNodeId(start));
        path = this.readOptionalPath();
        if (path.startsWith('json.')) {
          path = path.slice('json.'.length);
        }
        break;
      }

      case 'env':
        source = DataSource.environment();
        path = this.readOptionalPath();
        if (path === '') {
          throw createParseError({
            message: 'Environment reference requires a variable name',
            template: this.src,
            position: start,
            length: this.pos - start,
            note: 'use $env.NAME',
          });
        }
        break;

      case 'system':
        source = DataSource.system();
        path = this.readOptionalPath();
        break;

      case 'execution':
        source = DataSource.execution();
        path = this.readOptionalPath();
        break;

      case 'workflow':
        source = DataSource.workflow();
        path = this.readOptionalPath();
        break;

      default:
        throw createParseError({
          message: 'Unknown data source',
          template: this.src,
          position: start,
          length: Math.max(1, this.pos - start),
          note: 'expected $input, $node(\'id\'), $env, $system, $execution or $workflow',
        });
    }

    return {
      type: 'reference',
      value: this.src.slice(start, this.pos),
      start,
      end: this.pos,
      source,
      path,
    };
  }

  /**
   * `('id')` or `("id")` directly after `$node`.
   */
  private readNodeId(refStart: number): string {
    const invalid = () =>
      createParseError({
        message: 'Invalid node reference',
        template: this.src,
        position: refStart,
        length: Math.max(1, this.pos - refStart),
        note: "expected $node('id')",
      });

    if (this.src.charCodeAt(this.pos) !== 40 /* ( */) throw invalid();
    this.pos++;

    const quote = this.src.charCodeAt(this.pos);
    if (quote !== 39 /* ' */ && quote !== 34 /* " */) throw invalid();
    this.pos++;

    const idStart = this.pos;
    while (this.pos < this.len && this.src.charCodeAt(this.pos) !== quote) {
      this.pos++;
    }
    if (this.pos >= this.len) throw invalid();

    const id = this.src.slice(idStart, this.pos);
    this.pos++; // closing quote

    if (id.length === 0 || this.src.charCodeAt(this.pos) !== 41 /* ) */) {
      throw invalid();
    }
    this.pos++;

    return id;
  }

  /**
   * Zero or more `.segment` parts; returns them joined without the leading
   * dot. Segments are identifier characters or digits.
   */
  private readOptionalPath(): string {
    const segments: string[] = [];

    while (this.src.charCodeAt(this.pos) === 46 /* . */) {
      const dot = this.pos;
      this.pos++;

      const segStart = this.pos;
      while (
        this.pos < this.len &&
        isIdentifierPart(this.src.charCodeAt(this.pos))
      ) {
        this.pos++;
      }

      if (this.pos === segStart) {
        throw createParseError({
          message: "Expected a path segment after '.'",
          template: this.src,
          position: dot,
        });
      }

      segments.push(this.src.slice(segStart, this.pos));
    }

    return segments.join('.');
  }
}

////////////////////////////
// Character classification
////////////////////////////

function isWhitespace(ch: number): boolean {
  return (
    ch === 32 || // space
    ch === 9 || // tab
    ch === 10 || // \n
    ch === 13 || // \r
    ch === 11 || // \v
    ch === 12 || // \f
    ch === 160 // NBSP
  );
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57;
}

function isIdentifierStart(ch: number): boolean {
  return (
    (ch >= 65 && ch <= 90) || // A-Z
    (ch >= 97 && ch <= 122) || // a-z
    ch === 95 // _
  );
}

function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}
