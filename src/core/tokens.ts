/**
 * flowbind – Token definitions
 *
 * Canonical token shapes produced by the tokenizer and consumed by the
 * parser, plus the operator and keyword sets of the expression language.
 *
 * License: Apache-2.0
 */

import type { DataSource } from './context';

/////////////////////
// Token categories //
/////////////////////

/**
 * - identifier: function and pipeline-stage names, keywords
 * - number:     numeric literal text ("3.14", "10", "1e3")
 * - string:     decoded contents of a quoted literal
 * - reference:  a complete data-source reference (`$node('a').json.id`)
 * - operator:   "&&", "||", "==", "<=", "+", "|", …
 * - punct:      "(", ")", ",", "?", ":"
 * - close:      the `}}` that ends an expression
 * - eof:        end of the tokenized range
 */
export type TokenType =
  | 'eof'
  | 'close'
  | 'identifier'
  | 'number'
  | 'string'
  | 'reference'
  | 'punct'
  | 'operator';

/**
 * `start`/`end` are 0-based offsets into the full template (end exclusive).
 */
export interface SimpleToken {
  type: Exclude<TokenType, 'reference'>;
  value: string;
  start: number;
  end: number;
}

/**
 * A resolved reference. `value` is the raw source text; `path` is the
 * dotted path after the source (empty when absent), with the `json.` prefix
 * of node references already removed.
 */
export interface ReferenceToken {
  type: 'reference';
  value: string;
  start: number;
  end: number;
  source: DataSource;
  path: string;
}

export type Token = SimpleToken | ReferenceToken;

//////////////////////////////
// Canonical operator sets  //
//////////////////////////////

export const MULTI_CHAR_OPERATORS: readonly string[] = [
  '&&',
  '||',
  '==',
  '!=',
  '<=',
  '>=',
];

export const SINGLE_CHAR_OPERATORS: readonly string[] = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '<',
  '>',
  '!',
  '|',
];

export const PUNCTUATION_CHARS: readonly string[] = ['(', ')', ',', '?', ':'];

/**
 * Identifiers that act as binary operators at relational precedence.
 */
export const KEYWORD_OPERATORS: readonly string[] = [
  'contains',
  'startsWith',
  'endsWith',
];

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

export function isKeywordOperator(name: string): boolean {
  return KEYWORD_OPERATORS.includes(name);
}
