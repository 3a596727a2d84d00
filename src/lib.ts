export { Session, MemoryCell, type SessionOptions, type CatalogEntry } from './core/session.js';
export { evaluateBatch, summarize, splitExpressions, withTimeout, type BatchEntry, type BatchMode, type BatchOptions, type BatchSummary } from './core/batch.js';
export { Registry, type AngleUnit, type RegistryEntry, type RegistryOptions, type MemoryHandle } from './core/registry.js';
export { ExpressionError } from './core/errors.js';
export { normalize } from './core/expr/normalize.js';
export { tokenize, TokenizerError, type Token, type TokenType } from './core/expr/tokenizer.js';
export { parseExpression, MAX_DEPTH, MAX_TREE_DEPTH } from './core/expr/parser.js';
export { evaluateExpr, evaluateToNumber } from './core/expr/evaluator.js';
export type { Expr, ExprKind, ParseResult } from './core/expr/ast.js';
export { loadConfig, parseConfig, resolveSettings, DEFAULT_SETTINGS, type Settings, type LoadedConfig } from './core/config.js';
export { Reporter, formatNumber, type OutputFormat, type ColorMode } from './core/reporter.js';
export type { ErrorKind, EvalError, EvalResult, Span, Diagnostic } from './types/diagnostic.js';
