/**
 * flowbind – Parser
 *
 * Two layers:
 *
 *  - `parseTemplate` scans the template for `{{ … }}` segments and splits it
 *    into text and expression elements. `\{{` produces a literal `{{`.
 *  - `ExpressionParser` is a precedence-climbing parser over the tokenizer's
 *    output for the inside of one segment.
 *
 * Grammar, lowest precedence first:
 *
 *   pipeline       ternary ( '|' name ( '(' args ')' )? )*
 *   ternary        or ( '?' ternary ':' ternary )?
 *   or             and ( '||' and )*
 *   and            equality ( '&&' equality )*
 *   equality       relational ( ( '==' | '!=' ) relational )*
 *   relational     additive ( ( '<' | '<=' | '>' | '>=' | contains
 *                             | startsWith | endsWith ) additive )*
 *   additive       multiplicative ( ( '+' | '-' ) multiplicative )*
 *   multiplicative unary ( ( '*' | '/' | '%' ) unary )*
 *   unary          ( '!' | '-' ) unary | primary
 *   primary        number | string | true | false | null | reference
 *                | if '(' args ')' | name '(' args ')' | '(' pipeline ')'
 *
 * Evaluation is handled by `evaluator.ts`.
 *
 * License: Apache-2.0
 */

import type {
  BinaryOperator,
  ExpressionNode,
  FunctionCallNode,
  IfFunctionNode,
  LiteralNode,
  PipelineStage,
} from './ast';
import { createLimitError, createParseError } from './errors';
import type { ParseOptions } from './options';
import { Tokenizer } from './tokenizer';
import type { Token } from './tokens';
import { isKeywordOperator } from './tokens';
import {
  boolValue,
  floatValue,
  integerValue,
  nullValue,
  stringValue,
} from './value';

/////////////////////
// Public types    //
/////////////////////

export interface ParsedText {
  type: 'text';
  value: string;
}

export interface ParsedExpression {
  type: 'expression';
  /** Trimmed text between `{{` and `}}`. */
  source: string;
  ast: ExpressionNode;
  /** Offset of the opening `{{`. */
  start: number;
  /** Offset just past the closing `}}`. */
  end: number;
}

export type ParsedElement = ParsedText | ParsedExpression;

/////////////////////
// Public API      //
/////////////////////

const OPEN = '{{';
const CLOSE = '}}';

/**
 * Split a template into text and expression elements.
 *
 * Adjacent text (including escaped `{{`) is merged into one element; empty
 * text is dropped, so `""` yields no elements.
 */
export function parseTemplate(
  template: string,
  options: ParseOptions = {},
): ParsedElement[] {
  const maxLength = options.maxTemplateLength;
  if (typeof maxLength === 'number' && template.length > maxLength) {
    throw createLimitError({
      message: 'Maximum template length exceeded',
      source: template,
      index: maxLength,
      length: template.length - maxLength,
    });
  }

  const elements: ParsedElement[] = [];
  let text = '';
  let cursor = 0;

  const flushText = (): void => {
    if (text.length > 0) {
      elements.push({ type: 'text', value: text });
      text = '';
    }
  };

  while (cursor < template.length) {
    const open = template.indexOf(OPEN, cursor);

    if (open === -1) {
      text += template.slice(cursor);
      break;
    }

    if (open > 0 && template[open - 1] === '\\') {
      text += template.slice(cursor, open - 1) + OPEN;
      cursor = open + OPEN.length;
      continue;
    }

    text += template.slice(cursor, open);
    flushText();

    if (template.indexOf(CLOSE, open + OPEN.length) === -1) {
      throw unclosed(template, open);
    }

    const parser = new ExpressionParser(template, open, options);
    const ast = parser.parseSegment();

    elements.push({
      type: 'expression',
      source: template.slice(open + OPEN.length, parser.closeStart).trim(),
      ast,
      start: open,
      end: parser.closeEnd,
    });

    cursor = parser.closeEnd;
  }

  flushText();
  return elements;
}

/**
 * Parse a bare expression (no surrounding braces), e.g. `$input.a + 1`.
 */
export function parseExpression(
  source: string,
  options: ParseOptions = {},
): ExpressionNode {
  const parser = new ExpressionParser(source, null, options);
  return parser.parseStandalone();
}

function unclosed(template: string, open: number) {
  return createParseError({
    message: 'Unclosed expression',
    template,
    position: open,
    length: OPEN.length,
    note: "add '}}' to close the expression",
  });
}

/////////////////////
// Parser class    //
/////////////////////

class ExpressionParser {
  private readonly src: string;
  private readonly tokenizer: Tokenizer;
  private readonly maxDepth?: number;

  /** Offset of `{{` when parsing a segment, `null` for bare expressions. */
  private readonly open: number | null;

  private token: Token;
  private lastEnd = 0;

  public closeStart = 0;
  public closeEnd = 0;

  constructor(source: string, open: number | null, options: ParseOptions) {
    this.src = source;
    this.open = open;
    this.maxDepth =
      typeof options.maxAstDepth === 'number' && options.maxAstDepth >= 0
        ? options.maxAstDepth
        : undefined;

    this.tokenizer = new Tokenizer(source, open === null ? 0 : open + OPEN.length);
    this.token = this.tokenizer.next();
  }

  /////////////////////
  // Entry points    //
  /////////////////////

  parseSegment(): ExpressionNode {
    const first = this.token;
    if (first.type === 'close') {
      throw createParseError({
        message: 'Empty expression',
        template: this.src,
        position: this.open ?? first.start,
        length: first.end - (this.open ?? first.start),
      });
    }

    const expr = this.parsePipeline(1);

    if (this.token.type !== 'close') {
      this.unexpectedToken("Expected '}}'");
    }

    this.closeStart = this.token.start;
    this.closeEnd = this.token.end;
    return expr;
  }

  parseStandalone(): ExpressionNode {
    const first = this.token;
    if (first.type === 'eof') {
      throw createParseError({
        message: 'Empty expression',
        template: this.src,
        position: 0,
      });
    }

    const expr = this.parsePipeline(1);

    if (this.token.type !== 'eof') {
      this.unexpectedToken('Expected end of expression');
    }
    return expr;
  }

  /////////////////////
  // Precedence      //
  /////////////////////

  private parsePipeline(depth: number): ExpressionNode {
    this.ensureDepth(depth);

    const input = this.parseTernary(depth);
    const stages: PipelineStage[] = [];

    while (this.matchOperator('|')) {
      const nameTok = this.token;
      if (nameTok.type !== 'identifier' || nameTok.value === 'if') {
        this.unexpectedToken("Expected a function name after '|'");
      }
      this.nextToken();

      const args = this.isPunct('(') ? this.parseArguments(depth + 1) : [];
      stages.push({
        name: nameTok.value,
        args,
        start: nameTok.start,
        end: this.lastEnd,
      });
    }

    if (stages.length === 0) return input;

    return {
      type: 'Pipeline',
      input,
      stages,
      start: input.start,
      end: this.lastEnd,
    };
  }

  private parseTernary(depth: number): ExpressionNode {
    this.ensureDepth(depth);

    const condition = this.parseLogicalOr(depth);
    if (!this.matchPunct('?')) return condition;

    const consequent = this.parseTernary(depth + 1);
    this.expectPunct(':');
    const alternate = this.parseTernary(depth + 1);

    return {
      type: 'Ternary',
      condition,
      consequent,
      alternate,
      start: condition.start,
      end: alternate.end,
    };
  }

  private parseLogicalOr(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseLogicalAnd(depth);
    while (this.matchOperator('||')) {
      left = binary('||', left, this.parseLogicalAnd(depth));
    }
    return left;
  }

  private parseLogicalAnd(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseEquality(depth);
    while (this.matchOperator('&&')) {
      left = binary('&&', left, this.parseEquality(depth));
    }
    return left;
  }

  private parseEquality(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseRelational(depth);
    for (;;) {
      if (this.matchOperator('==')) {
        left = binary('==', left, this.parseRelational(depth));
      } else if (this.matchOperator('!=')) {
        left = binary('!=', left, this.parseRelational(depth));
      } else {
        return left;
      }
    }
  }

  private parseRelational(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseAdditive(depth);
    for (;;) {
      const op = this.relationalOperator();
      if (op === null) return left;
      this.nextToken();
      left = binary(op, left, this.parseAdditive(depth));
    }
  }

  private relationalOperator(): BinaryOperator | null {
    const tok = this.token;
    if (tok.type === 'operator') {
      switch (tok.value) {
        case '<':
        case '<=':
        case '>':
        case '>=':
          return tok.value;
        default:
          return null;
      }
    }
    if (tok.type === 'identifier' && isKeywordOperator(tok.value)) {
      switch (tok.value) {
        case 'contains':
        case 'startsWith':
        case 'endsWith':
          return tok.value;
      }
    }
    return null;
  }

  private parseAdditive(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseMultiplicative(depth);
    for (;;) {
      if (this.matchOperator('+')) {
        left = binary('+', left, this.parseMultiplicative(depth));
      } else if (this.matchOperator('-')) {
        left = binary('-', left, this.parseMultiplicative(depth));
      } else {
        return left;
      }
    }
  }

  private parseMultiplicative(depth: number): ExpressionNode {
    this.ensureDepth(depth);
    let left = this.parseUnary(depth);
    for (;;) {
      if (this.matchOperator('*')) {
        left = binary('*', left, this.parseUnary(depth));
      } else if (this.matchOperator('/')) {
        left = binary('/', left, this.parseUnary(depth));
      } else if (this.matchOperator('%')) {
        left = binary('%', left, this.parseUnary(depth));
      } else {
        return left;
      }
    }
  }

  private parseUnary(depth: number): ExpressionNode {
    this.ensureDepth(depth);

    const tok = this.token;
    if (tok.type === 'operator' && (tok.value === '!' || tok.value === '-')) {
      this.nextToken();
      const operand = this.parseUnary(depth + 1);
      return {
        type: 'UnaryOp',
        operator: tok.value,
        operand,
        start: tok.start,
        end: operand.end,
      };
    }

    return this.parsePrimary(depth);
  }

  /////////////////////
  // Primary         //
  /////////////////////

  private parsePrimary(depth: number): ExpressionNode {
    this.ensureDepth(depth);

    const tok = this.token;

    switch (tok.type) {
      case 'number':
        this.nextToken();
        return this.buildNumericLiteral(tok);

      case 'string':
        this.nextToken();
        return {
          type: 'Literal',
          value: stringValue(tok.value),
          raw: this.src.slice(tok.start, tok.end),
          start: tok.start,
          end: tok.end,
        };

      case 'reference':
        this.nextToken();
        return {
          type: 'DataAccess',
          source: tok.source,
          path: tok.path,
          start: tok.start,
          end: tok.end,
        };

      case 'identifier':
        return this.parseIdentifier(depth);

      case 'punct':
        if (tok.value === '(') {
          this.nextToken();
          const inner = this.parsePipeline(depth + 1);
          this.expectPunct(')');
          return inner;
        }
        return this.unexpectedToken('Expected an expression');

      default:
        return this.unexpectedToken('Expected an expression');
    }
  }

  private parseIdentifier(depth: number): ExpressionNode {
    const tok = this.token;
    const literal = keywordLiteral(tok.value);

    if (literal) {
      this.nextToken();
      return {
        type: 'Literal',
        value: literal,
        raw: tok.value,
        start: tok.start,
        end: tok.end,
      };
    }

    this.nextToken();

    if (!this.isPunct('(')) {
      throw createParseError({
        message: 'Unknown literal type',
        template: this.src,
        position: tok.start,
        length: tok.end - tok.start,
        note: isKeywordOperator(tok.value)
          ? `'${tok.value}' is an operator and needs a left-hand operand`
          : `functions are called as ${tok.value}(...)`,
      });
    }

    const args = this.parseArguments(depth + 1);

    if (tok.value === 'if') {
      return this.buildIf(tok, args);
    }

    const call: FunctionCallNode = {
      type: 'FunctionCall',
      name: tok.value,
      args,
      start: tok.start,
      end: this.lastEnd,
    };
    return call;
  }

  private buildIf(tok: Token, args: ExpressionNode[]): IfFunctionNode {
    if (args.length < 2 || args.length > 3) {
      throw createParseError({
        message: 'If function requires 2 or 3 arguments',
        template: this.src,
        position: tok.start,
        length: this.lastEnd - tok.start,
      });
    }

    return {
      type: 'IfFunction',
      condition: args[0],
      consequent: args[1],
      alternate: args[2] ?? null,
      start: tok.start,
      end: this.lastEnd,
    };
  }

  /**
   * `( arg, arg, … )`, starting at the opening parenthesis.
   */
  private parseArguments(depth: number): ExpressionNode[] {
    this.ensureDepth(depth);
    this.expectPunct('(');

    const args: ExpressionNode[] = [];
    if (this.matchPunct(')')) return args;

    for (;;) {
      args.push(this.parsePipeline(depth));
      if (this.matchPunct(',')) continue;
      this.expectPunct(')');
      return args;
    }
  }

  private buildNumericLiteral(tok: Token): LiteralNode {
    const raw = tok.value;
    const n = Number(raw);

    if (!Number.isFinite(n)) {
      throw createParseError({
        message: 'Malformed number literal',
        template: this.src,
        position: tok.start,
        length: tok.end - tok.start,
      });
    }

    const value = /^\d+$/.test(raw) && Number.isSafeInteger(n)
      ? integerValue(n)
      : floatValue(n);

    return { type: 'Literal', value, raw, start: tok.start, end: tok.end };
  }

  /////////////////////
  // Token helpers   //
  /////////////////////

  private ensureDepth(depth: number): void {
    if (this.maxDepth !== undefined && depth > this.maxDepth) {
      throw createLimitError({
        message: 'Maximum expression depth exceeded',
        source: this.src,
        index: this.token.start,
      });
    }
  }

  private isPunct(ch: string): boolean {
    return this.token.type === 'punct' && this.token.value === ch;
  }

  private matchPunct(ch: string): boolean {
    if (!this.isPunct(ch)) return false;
    this.nextToken();
    return true;
  }

  private matchOperator(op: string): boolean {
    if (this.token.type !== 'operator' || this.token.value !== op) return false;
    this.nextToken();
    return true;
  }

  private expectPunct(ch: string): void {
    if (!this.matchPunct(ch)) {
      this.unexpectedToken(`Expected '${ch}'`);
    }
  }

  private unexpectedToken(message: string): never {
    const tok = this.token;

    if (tok.type === 'eof' && this.open !== null) {
      throw unclosed(this.src, this.open);
    }

    const found =
      tok.type === 'eof' ? 'end of expression' : `'${this.src.slice(tok.start, tok.end)}'`;

    throw createParseError({
      message: `${message}, found ${found}`,
      template: this.src,
      position: tok.start,
      length: Math.max(1, tok.end - tok.start),
    });
  }

  private nextToken(): void {
    this.lastEnd = this.token.end;
    this.token = this.tokenizer.next();
  }
}

/////////////////////
// Helpers         //
/////////////////////

function binary(
  operator: BinaryOperator,
  left: ExpressionNode,
  right: ExpressionNode,
): ExpressionNode {
  return {
    type: 'BinaryOp',
    operator,
    left,
    right,
    start: left.start,
    end: right.end,
  };
}

function keywordLiteral(name: string) {
  switch (name) {
    case 'true':
      return boolValue(true);
    case 'false':
      return boolValue(false);
    case 'null':
      return nullValue();
    default:
      return undefined;
  }
}
