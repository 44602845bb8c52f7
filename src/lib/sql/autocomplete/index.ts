/**
 * SQL Scope Resolution
 *
 * Context resolution for SQL autocomplete:
 * - Error-tolerant tokenizing and statement parsing (handles incomplete SQL)
 * - Dotted qualifier reading with every plausible interpretation kept
 * - CTE, temp table, derived table and batch visibility at the cursor
 *
 * @example
 * ```ts
 * import { resolveScope, visibleColumns } from './autocomplete'
 *
 * const sql = 'WITH recent AS (SELECT id, total FROM orders) SELECT  FROM recent r'
 * const context = resolveScope(sql, { line: 1, column: 54 })
 *
 * console.log(context.triggerKind) // 'column'
 * console.log(visibleColumns(context)) // [{ name: 'id', table: 'r' }, { name: 'total', table: 'r' }]
 * ```
 */

// Scope resolution
export { resolveScope, resolveAlias, getColumnsForTable, visibleColumns } from './scope-resolver'
export type { ResolveOptions } from './scope-resolver'

// Configuration
export { DEFAULT_RESOLVER_CONFIG, resolveConfig, parseResolverConfig, loadResolverConfig } from './config'
export type { ResolverConfig } from './config'

// Errors
export { CursorOutOfRangeError } from './errors'

// Types
export type {
  Token,
  TokenKind,
  CursorPosition,
  QualifiedName,
  QualifierReading,
  DotTrigger,
  LeftSideColumn,
  Resolution,
  TableKind,
  TableReference,
  StatementKind,
  ChunkRole,
  ClauseKind,
  ClauseSpan,
  ProducedColumn,
  CTEDefinition,
  Chunk,
  ChunkPathEntry,
  TempTableDefinition,
  ParseResult,
  UnparsedSubquery,
  SubqueryBounds,
  SubqueryStrategy,
  TriggerKind,
  ScopeTable,
  ScopeContext,
  VisibleColumn,
  PgQueryParser,
} from './types'

// Individual stages (for advanced usage)
export {
  tokenize,
  offsetToPosition,
  positionToOffset,
  tokensBeforeCursor,
  tokenAtCursor,
  getPartialPrefix,
  isInsideStringOrComment,
} from './tokenizer'
export type { TokenizeOptions } from './tokenizer'
export {
  parseQualifiedName,
  interpretQualifiedName,
  detectDotTrigger,
  referenceBeforeDot,
  extractLeftSideColumn,
} from './qualified-name'
export type { LeftSideOptions } from './qualified-name'
export {
  detectUnparsedSubquery,
  findSubqueryBounds,
  extractSubqueryTables,
  extractTablesBackward,
  extractTablesForward,
} from './subquery'
export type { SubqueryOptions } from './subquery'
export { parseChunks, getChunkAtPosition, findInnermostChunk, getClauseAtPosition } from './parser'
export type { ParseOptions } from './parser'
export { defaultPgQueryParser, tryPgQueryParse, mergePreciseTables } from './pg-query'
export type { PreciseTable, PreciseParseResult } from './pg-query'
