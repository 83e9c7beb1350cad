/**
 * flowbind – Public entry point
 *
 * Template and expression engine for workflow nodes: `{{ … }}` segments
 * read from upstream data sources ($input, $node('id'), $env, $system,
 * $execution, $workflow), call registered functions and pipe values
 * through them.
 *
 *   import {
 *     Context,
 *     createRegistry,
 *     fromJson,
 *     parseWithFunctions,
 *     stringValue,
 *     asString,
 *   } from 'flowbind';
 *
 *   const registry = createRegistry().withFunction('upper', ([v]) =>
 *     stringValue(asString(v).toUpperCase()),
 *   );
 *
 *   const template = parseWithFunctions(
 *     'Order {{ $input.id }} for {{ $node("crm").customer.name | upper }}',
 *     registry,
 *   );
 *
 *   const context = new Context()
 *     .setInput(fromJson({ id: 42 }))
 *     .addNodeOutput('crm', fromJson({ customer: { name: 'Ada' } }));
 *
 *   template.render(context); // "Order 42 for ADA"
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Templates               //
/////////////////////////////

export { Template, Expression, parse, parseWithFunctions, render } from './core/template';
export type { TemplateElement } from './core/template';

export { normalizeOptions } from './core/options';
export type { TemplateOptions, NormalizedTemplateOptions } from './core/options';

export { dependenciesOf } from './core/dependencies';
export type { Dependencies } from './core/dependencies';

/////////////////////////////
// Values                  //
/////////////////////////////

export {
  nullValue,
  boolValue,
  integerValue,
  floatValue,
  numberValue,
  stringValue,
  arrayValue,
  objectValue,
  objectFromEntries,
  isNull,
  isBool,
  isNumber,
  isInteger,
  isFloat,
  isString,
  isArray,
  isObject,
  isEmpty,
  isTruthy,
  typeName,
  asBool,
  asInteger,
  asFloat,
  asString,
  asArray,
  asObject,
  lengthOf,
  getValue,
  navigate,
  setValue,
  valueEquals,
  fromJson,
  toJson,
  formatValue,
} from './core/value';
export type {
  Value,
  NullValue,
  BoolValue,
  IntegerValue,
  FloatValue,
  NumberValue,
  StringValue,
  ArrayValue,
  ObjectValue,
  ValueTypeName,
  JsonValue,
} from './core/value';

/////////////////////////////
// Context                 //
/////////////////////////////

export { Context, DataSource, dataSourceLabel } from './core/context';
export type { ContextOptions, DataSourceType } from './core/context';

/////////////////////////////
// Functions               //
/////////////////////////////

export {
  createRegistry,
  EMPTY_REGISTRY,
  bindArguments,
  matchesParameterType,
  signatureArity,
} from './core/registry';
export type {
  Registry,
  FunctionRegistry,
  RegisteredFunction,
  TemplateFunction,
  FunctionSignature,
  ParameterSpec,
  ParameterType,
} from './core/registry';

export { applyPlugins, createPluginSet } from './plugins';
export type { Plugin, ConfigurablePlugin, PluginSet } from './plugins';

/////////////////////////////
// Parsing & evaluation    //
/////////////////////////////

export { tokenize, Tokenizer } from './core/tokenizer';
export type { TokenStream } from './core/tokenizer';
export type { Token, TokenType } from './core/tokens';

export { parseTemplate, parseExpression } from './core/parser';
export type { ParsedElement, ParsedExpression, ParsedText } from './core/parser';

export { evaluate, createEvalState } from './core/evaluator';
export type { EvalState } from './core/evaluator';

export { traverse, childrenOf } from './core/ast';
export type {
  ExpressionNode,
  NodeType,
  LiteralNode,
  DataAccessNode,
  FunctionCallNode,
  PipelineNode,
  PipelineStage,
  BinaryOpNode,
  UnaryOpNode,
  TernaryNode,
  IfFunctionNode,
  BinaryOperator,
  UnaryOperator,
  Visitor,
  VisitResult,
} from './core/ast';

/////////////////////////////
// Errors                  //
/////////////////////////////

export {
  TemplateError,
  ParseError,
  EvaluationError,
  FunctionError,
  TypeConversionError,
  DataNotFoundError,
  SignatureError,
  MathError,
  IndexError,
  LimitError,
  CustomError,
  isTemplateError,
  createCustomError,
} from './core/errors';
export type { TemplateErrorCode } from './core/errors';

/////////////////////////////
// Utilities               //
/////////////////////////////

export {
  inspectValue,
  formatTemplateError,
  analyzeAst,
  describeTemplate,
} from './utils/inspect';
export type {
  InspectValueOptions,
  FormattedTemplateError,
  ExpressionAstInsight,
} from './utils/inspect';

export { validateTemplate, validateSource } from './utils/validation';
export type {
  IssueSeverity,
  DiagnosticLocation,
  TemplateValidationIssue,
  TemplateValidationStats,
  TemplateValidationResult,
  TemplateValidationOptions,
  ValidateSourceOptions,
  SourceValidationResult,
} from './utils/validation';
