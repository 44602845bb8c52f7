/**
 * Scope Engine Types
 *
 * This file defines all interfaces for the scope resolution pipeline:
 * SQL + Cursor → Tokenizer → {QualifiedName, Subquery, ChunkParser} → ScopeResolver → ScopeContext
 */

// ============================================================================
// 1. TOKENIZER TYPES
// ============================================================================

export type TokenKind =
  | 'keyword'
  | 'identifier'
  | 'quoted_identifier'  // [name], "name" or `name`
  | 'dot'
  | 'comma'
  | 'semicolon'
  | 'star'
  | 'operator'
  | 'paren_open'
  | 'paren_close'
  | 'string'
  | 'number'
  | 'comment'
  | 'variable'           // @name, @@name
  | 'temp_table'         // #name, ##name
  | 'batch_separator'    // GO on its own line

export interface Token {
  kind: TokenKind
  /** Raw lexeme, quotes and brackets retained */
  text: string
  /** 1-indexed line of the first character */
  line: number
  /** 1-indexed column of the first character */
  column: number
  /** 0-indexed offset of the first character */
  start: number
  /** 0-indexed offset one past the last character */
  end: number
}

/**
 * Cursor position, 1-indexed. `column` is the insertion point: text typed so far
 * ends immediately before it.
 */
export interface CursorPosition {
  line: number
  column: number
}

// ============================================================================
// 2. QUALIFIED NAME TYPES
// ============================================================================

/**
 * A dotted identifier chain read backward from the cursor.
 * Ambiguous chains populate every candidate field; see parseQualifiedName.
 */
export interface QualifiedName {
  database: string | null
  schema: string | null
  table: string | null
  column: string | null
  alias: string | null
  /** Names left to right, quotes stripped */
  parts: string[]
  hasTrailingDot: boolean
}

export type QualifierReading =
  | { kind: 'alias'; alias: string }
  | { kind: 'schema'; schema: string }
  | { kind: 'alias_column'; alias: string; column: string }
  | { kind: 'schema_table'; schema: string; table: string }
  | { kind: 'database_schema'; database: string; schema: string }
  | { kind: 'object'; database: string; schema: string; table: string; column: string | null }

export interface DotTrigger {
  /** The token before the cursor is a dot */
  isAfterDot: boolean
  /** Chain before the dot, or null when no qualifier applies */
  qualified: QualifiedName | null
  /** Identifier typed after the dot, if any */
  partial: string | null
}

export interface LeftSideColumn {
  qualified: QualifiedName
  /** Qualifier directly before the column (alias or table) */
  tableRef: string | null
  columnName: string
  schema: string | null
}

/**
 * Outcome of any lookup that may fail or have several answers.
 */
export type Resolution<T> =
  | { status: 'matched'; value: T }
  | { status: 'no_match' }
  | { status: 'ambiguous'; candidates: T[] }

// ============================================================================
// 3. CHUNK TYPES
// ============================================================================

export type TableKind = 'table' | 'cte' | 'temp_table' | 'table_variable' | 'derived' | 'function'

export interface TableReference {
  /** Dotted name as written, quotes stripped */
  table: string
  name: string
  schema: string | null
  database: string | null
  /** Defaults to name when no alias is written */
  alias: string
  kind: TableKind
  /** Known column list for CTE, derived and temp references */
  columns: string[] | null
  /** Tables whose `*` feeds this reference's columns */
  starSources: string[]
}

export type StatementKind =
  | 'SELECT'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'MERGE'
  | 'CREATE'
  | 'DROP'
  | 'ALTER'
  | 'TRUNCATE'
  | 'EXEC'
  | 'DECLARE'
  | 'SET'
  | 'OTHER'

export type ChunkRole =
  | 'statement'
  | 'cte'          // body of a WITH entry
  | 'derived'      // subquery in FROM / JOIN / USING
  | 'apply'        // subquery after CROSS/OUTER APPLY
  | 'expression'   // subquery anywhere else
  | 'set_operand'  // query after UNION / EXCEPT / INTERSECT

export type ClauseKind =
  | 'before_from'
  | 'from'
  | 'condition'
  | 'select_list'
  | 'set'
  | 'insert_columns'
  | 'values'
  | 'output'
  | 'group_order'
  | 'exec'
  | 'unknown'

export interface ClauseSpan {
  clause: ClauseKind
  start: number
  end: number
}

export interface ProducedColumn {
  name: string
  /** Qualifier written before the column or star */
  source: string | null
  isStar: boolean
}

export interface CTEDefinition {
  name: string
  /** Empty means the columns are inferred from the body */
  declaredColumns: string[]
  body: Chunk
  isRecursive: boolean
  start: number
  end: number
}

export interface Chunk {
  statementKind: StatementKind
  role: ChunkRole
  tables: TableReference[]
  ctes: CTEDefinition[]
  producedColumns: ProducedColumn[]
  /** Owned nested chunks; there is no back-reference to the parent */
  subqueries: Chunk[]
  clauses: ClauseSpan[]
  /** Derived table alias and its optional column list */
  alias: string | null
  aliasColumns: string[]
  /** Temp table or table variable this statement creates */
  tempTable: string | null
  insertColumns: string[]
  batchIndex: number
  start: number
  end: number
  precise: 'merged' | 'failed' | 'skipped'
}

export interface TempTableDefinition {
  name: string
  kind: 'temp_table' | 'table_variable'
  columns: string[]
  isGlobal: boolean
  batchIndex: number
  createdAt: number
  droppedAt: number | null
}

export interface ParseResult {
  chunks: Chunk[]
  tempTables: TempTableDefinition[]
  tokens: Token[]
  batchCount: number
}

export interface ChunkPathEntry {
  chunk: Chunk
  /** Set when the chunk is the body of the parent's ctes[cteIndex] */
  cteIndex: number | null
}

// ============================================================================
// 4. SUBQUERY TYPES
// ============================================================================

export interface UnparsedSubquery {
  isInSubquery: boolean
  tables: TableReference[] | null
}

export interface SubqueryBounds {
  /** Token index of the opening paren */
  openIndex: number
  /** Token index of the closing paren, null when unterminated */
  closeIndex: number | null
  startOffset: number
  endOffset: number
}

export type SubqueryStrategy = 'parse' | 'scan'

// ============================================================================
// 5. SCOPE TYPES
// ============================================================================

export type TriggerKind = 'none' | 'table' | 'column' | 'procedure'

export interface ScopeTable extends TableReference {
  /** False for CTEs and temp tables that are available but not in FROM */
  referenced: boolean
  /** 0 = innermost query, 1 = its enclosing query, ... */
  depth: number
}

export interface ScopeContext {
  triggerKind: TriggerKind
  clause: ClauseKind
  statementKind: StatementKind | null
  visibleTables: ScopeTable[]
  ctes: CTEDefinition[]
  qualifier: QualifiedName | null
  qualifierTarget: Resolution<ScopeTable>
  /** Dotted text before the last dot, e.g. `dbo.users` for `dbo.users.na|` */
  reference: string | null
  isAfterDot: boolean
  prefix: string | null
  leftSide: LeftSideColumn | null
  inUnparsedSubquery: boolean
  depth: number
  batchIndex: number
}

export interface VisibleColumn {
  name: string
  /** Alias of the table that provides it */
  table: string
}

// ============================================================================
// PARSER INJECTION TYPES (for testability)
// ============================================================================

/**
 * Interface for pg_query parser dependency.
 * Allows injection of mock parsers for testing.
 */
export interface PgQueryParser {
  parseSync: (sql: string) => unknown
  isLoaded: () => boolean
}
