/**
 * Chunk Parser Module
 *
 * Splits a script into statements and summarises each one as a Chunk tree:
 * referenced tables, CTEs, produced columns and nested subqueries. No grammar
 * is enforced. Whatever cannot be read is skipped, so half-typed SQL still
 * yields the tables written so far.
 */

import { tokenize, isKeyword, isNameToken, stripQuotes } from './tokenizer'
import {
  findClosingParen,
  makeTableReference,
  readAlias,
  readNameList,
  readObjectName,
  readTableList,
  readTableReference,
} from './table-reference'
import { defaultPgQueryParser, mergePreciseTables, tryPgQueryParse } from './pg-query'
import type {
  Chunk,
  ChunkPathEntry,
  ChunkRole,
  ClauseKind,
  ParseResult,
  PgQueryParser,
  ProducedColumn,
  StatementKind,
  TableReference,
  TempTableDefinition,
  Token,
} from './types'

export interface ParseOptions {
  /** Pre-computed tokens for `sql`, comments included */
  tokens?: Token[]
  batchSeparator?: string
  /** Merge tables reported by libpg-query when it is loaded */
  precise?: boolean
  /** Custom parser for testing */
  parser?: PgQueryParser
  /** Subqueries nested deeper than this stay opaque */
  maxNestingDepth?: number
}

export const DEFAULT_MAX_NESTING_DEPTH = 256

const STATEMENT_STARTERS = new Set([
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'WITH', 'CREATE', 'DROP', 'ALTER',
  'TRUNCATE', 'EXEC', 'EXECUTE', 'CALL', 'DECLARE', 'SET',
])

// Control flow and session statements end the current statement but open no chunk
const BOUNDARY_KEYWORDS = new Set([
  'IF', 'WHILE', 'BEGIN', 'END', 'ELSE', 'RETURN', 'PRINT', 'USE', 'GRANT', 'REVOKE', 'DENY',
  'RAISERROR', 'THROW', 'COMMIT', 'ROLLBACK', 'BREAK', 'CONTINUE', 'GOTO', 'WAITFOR',
])

// `DROP TABLE IF EXISTS`, `CREATE TABLE IF NOT EXISTS`: IF here opens no statement
const OBJECT_KEYWORDS = new Set([
  'TABLE', 'VIEW', 'INDEX', 'PROCEDURE', 'PROC', 'FUNCTION', 'TRIGGER', 'SCHEMA', 'DATABASE',
  'SEQUENCE', 'TYPE', 'COLUMN', 'CONSTRAINT',
])

const SET_OPERATORS = new Set(['UNION', 'EXCEPT', 'INTERSECT'])

const SELECT_LIST_ENDS = new Set([
  'FROM', 'INTO', 'WHERE', 'GROUP', 'ORDER', 'HAVING', 'UNION', 'EXCEPT', 'INTERSECT',
  'OPTION', 'WINDOW', 'LIMIT', 'OFFSET', 'FETCH', 'FOR',
])

const PRECISE_KINDS: ReadonlySet<StatementKind> = new Set(['SELECT', 'INSERT', 'UPDATE', 'DELETE'])

interface ParseContext {
  /** Tokens without comments */
  tokens: Token[]
  batchIndex: number
  tempTables: TempTableDefinition[]
  /** Nesting level of the query being parsed; statements are level 0 */
  level: number
  maxNestingDepth: number
}

interface Span {
  start: number
  end: number
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse a script into statement chunks. Never throws.
 */
export function parseChunks(sql: string, options: ParseOptions = {}): ParseResult {
  const tokens = options.tokens ?? tokenize(sql, { batchSeparator: options.batchSeparator })
  const significant = tokens.filter((t) => t.kind !== 'comment')
  const ctx: ParseContext = {
    tokens: significant,
    batchIndex: 0,
    tempTables: [],
    level: 0,
    maxNestingDepth: options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH,
  }
  const parser = options.parser ?? defaultPgQueryParser
  const chunks: Chunk[] = []

  let depth = 0
  let i = 0
  while (i < significant.length) {
    const token = significant[i]

    if (token.kind === 'batch_separator') {
      ctx.batchIndex++
      depth = 0
      i++
      continue
    }
    if (token.kind === 'semicolon') {
      depth = 0
      i++
      continue
    }
    if (token.kind === 'paren_open') depth++
    if (token.kind === 'paren_close') depth = Math.max(0, depth - 1)

    // Statements only start at depth 0; `IF EXISTS (SELECT ...)` stays unparsed
    if (depth > 0 || !isStatementStart(significant, i)) {
      i++
      continue
    }

    const end = findStatementEnd(significant, i)
    const chunk = parseQuery(ctx, i, end, 'statement', { start: token.start, end: significant[end - 1].end })

    if (options.precise !== false && PRECISE_KINDS.has(chunk.statementKind)) {
      const precise = tryPgQueryParse(sql.slice(chunk.start, chunk.end), parser)
      if (precise.valid) {
        mergePreciseTables(chunk, precise.tables)
        chunk.precise = 'merged'
      } else {
        chunk.precise = precise.reason === 'not_loaded' ? 'skipped' : 'failed'
      }
    }

    chunks.push(chunk)
    i = end
  }

  return { chunks, tempTables: ctx.tempTables, tokens, batchCount: ctx.batchIndex + 1 }
}

/**
 * Whether the cursor lies inside the chunk. Trailing whitespace after the
 * last token still belongs to it.
 */
export function chunkContains(chunk: Chunk, offset: number, tokens: Token[]): boolean {
  if (offset < chunk.start) return false
  if (offset <= chunk.end) return true
  return !tokens.some((t) => t.kind !== 'comment' && t.start >= chunk.end && t.start < offset)
}

/**
 * The top-level statement chunk that owns the cursor, if any.
 */
export function getChunkAtPosition(result: ParseResult, offset: number): Chunk | null {
  let found: Chunk | null = null
  for (const chunk of result.chunks) {
    if (chunkContains(chunk, offset, result.tokens)) found = chunk
  }
  return found
}

/**
 * Walk from a statement chunk to the innermost CTE body or subquery holding
 * the cursor. The path carries the parent chain explicitly.
 */
export function findInnermostChunk(chunk: Chunk, offset: number, tokens: Token[]): ChunkPathEntry[] {
  const path: ChunkPathEntry[] = [{ chunk, cteIndex: null }]
  let current = chunk
  for (;;) {
    const cteIndex = current.ctes.findIndex((cte) => chunkContains(cte.body, offset, tokens))
    if (cteIndex >= 0) {
      current = current.ctes[cteIndex].body
      path.push({ chunk: current, cteIndex })
      continue
    }
    const sub = current.subqueries.find((s) => chunkContains(s, offset, tokens))
    if (!sub) return path
    current = sub
    path.push({ chunk: sub, cteIndex: null })
  }
}

/**
 * Clause of `chunk` the offset falls in, from the recorded clause spans.
 */
export function getClauseAtPosition(chunk: Chunk, offset: number): ClauseKind {
  let clause: ClauseKind = 'unknown'
  for (const span of chunk.clauses) {
    if (span.start <= offset) clause = span.clause
  }
  return clause
}

/**
 * Column names a chunk exposes when used as a table. Stars are left out.
 */
export function producedColumnNames(chunk: Chunk): string[] {
  return chunk.producedColumns.filter((c) => !c.isStar).map((c) => c.name)
}

/**
 * Tables whose `*` feeds the chunk's output.
 */
export function starSources(chunk: Chunk): string[] {
  const sources: string[] = []
  const add = (name: string) => {
    if (!sources.includes(name)) sources.push(name)
  }
  for (const column of chunk.producedColumns) {
    if (!column.isStar) continue
    if (column.source === null) {
      for (const table of chunk.tables) add(table.table)
      continue
    }
    const source = column.source.toLowerCase()
    const table = chunk.tables.find((t) => t.alias.toLowerCase() === source)
    add(table ? table.table : column.source)
  }
  return sources
}

// ============================================================================
// STATEMENT SEGMENTATION
// ============================================================================

function upper(token: Token | undefined): string {
  return token ? token.text.toUpperCase() : ''
}

function isCteStart(tokens: Token[], index: number): boolean {
  const next = tokens[index + 1]
  if (isKeyword(next, 'RECURSIVE')) return true
  const after = tokens[index + 2]
  return isNameToken(next) && (isKeyword(after, 'AS') || after?.kind === 'paren_open')
}

function isStatementStart(tokens: Token[], index: number): boolean {
  const token = tokens[index]
  if (token.kind !== 'keyword' || !STATEMENT_STARTERS.has(upper(token))) return false
  return upper(token) !== 'WITH' || isCteStart(tokens, index)
}

/**
 * Exclusive end index of the statement starting at `start`. Statements need
 * no semicolon: the next statement keyword at depth 0 ends them unless it
 * continues this one (INSERT ... SELECT, UNION SELECT, UPDATE ... SET, ...).
 */
export function findStatementEnd(tokens: Token[], start: number): number {
  const first = upper(tokens[start])
  let main: string | null = first === 'WITH' ? null : first
  let depth = 0
  let caseDepth = 0
  let selectSeen = main === 'SELECT'
  let setSeen = false
  let valuesSeen = false

  for (let j = start + 1; j < tokens.length; j++) {
    const token = tokens[j]
    if (token.kind === 'semicolon' || token.kind === 'batch_separator') return j
    if (token.kind === 'paren_open') {
      depth++
      continue
    }
    if (token.kind === 'paren_close') {
      if (depth === 0) return j
      depth--
      continue
    }
    if (depth > 0 || token.kind !== 'keyword') continue

    const word = upper(token)
    const prev = upper(tokens[j - 1])
    if (word === 'CASE') {
      caseDepth++
      continue
    }
    if (caseDepth > 0) {
      if (word === 'END') caseDepth--
      if (word === 'END' || word === 'ELSE') continue
    }
    if (word === 'VALUES') valuesSeen = true
    if (word === 'IF' && OBJECT_KEYWORDS.has(prev)) continue
    if (BOUNDARY_KEYWORDS.has(word)) return j
    if (!STATEMENT_STARTERS.has(word)) continue

    switch (word) {
      case 'SELECT':
        if (SET_OPERATORS.has(prev) || prev === 'ALL' || prev === 'DISTINCT' || prev === 'AS' || prev === 'FOR') continue
        if (main === null) {
          main = word
          selectSeen = true
          continue
        }
        if (main === 'INSERT' && !selectSeen && !valuesSeen) {
          selectSeen = true
          continue
        }
        return j
      case 'INSERT':
      case 'UPDATE':
      case 'DELETE':
        if (main === null) {
          main = word
          continue
        }
        if (main === 'MERGE' && prev === 'THEN') continue
        return j
      case 'MERGE':
        if (main === null) {
          main = word
          continue
        }
        return j
      case 'SET':
        if (main === 'UPDATE' && !setSeen) {
          setSeen = true
          continue
        }
        if ((main === 'MERGE' && prev === 'UPDATE') || main === 'ALTER') continue
        return j
      case 'WITH':
        // Table hints, WITH TIES and WITH CHECK OPTION
        if (!isCteStart(tokens, j)) continue
        return j
      case 'EXEC':
      case 'EXECUTE':
        if (main === 'INSERT') continue
        return j
      case 'DROP':
        if (main === 'ALTER') continue
        return j
      default:
        return j
    }
  }
  return tokens.length
}

// ============================================================================
// QUERY PARSING
// ============================================================================

function newChunk(role: ChunkRole, batchIndex: number, span: Span): Chunk {
  return {
    statementKind: 'OTHER',
    role,
    tables: [],
    ctes: [],
    producedColumns: [],
    subqueries: [],
    clauses: [],
    alias: null,
    aliasColumns: [],
    tempTable: null,
    insertColumns: [],
    batchIndex,
    start: span.start,
    end: span.end,
    precise: 'skipped',
  }
}

/** Span of the text between a paren at `open` and its match at `close`. */
function parenSpan(tokens: Token[], open: number, close: number, to: number): Span {
  const start = tokens[open].end
  if (close < to) return { start, end: tokens[close].start }
  return { start, end: close > open + 1 ? tokens[close - 1].end : start }
}

function registerTemp(ctx: ParseContext, definition: Omit<TempTableDefinition, 'batchIndex' | 'droppedAt'>): void {
  ctx.tempTables.push({ ...definition, batchIndex: ctx.batchIndex, droppedAt: null })
}

function markDropped(ctx: ParseContext, name: string, at: number): void {
  const lower = name.toLowerCase()
  for (let k = ctx.tempTables.length - 1; k >= 0; k--) {
    const def = ctx.tempTables[k]
    if (def.name.toLowerCase() === lower && def.batchIndex === ctx.batchIndex && def.createdAt < at && def.droppedAt === null) {
      def.droppedAt = at
      return
    }
  }
}

function producedColumn(item: Token[]): ProducedColumn | null {
  const n = item.length
  if (n === 0) return null
  const last = item[n - 1]

  if (last.kind === 'star') {
    const qualifier = item[n - 3]
    const source = n >= 3 && item[n - 2].kind === 'dot' && (isNameToken(qualifier) || qualifier.kind === 'temp_table')
      ? stripQuotes(qualifier.text)
      : null
    return { name: '*', source, isStar: true }
  }

  // T-SQL `alias = expression`
  if (n >= 3 && isNameToken(item[0]) && item[1].kind === 'operator' && item[1].text === '=') {
    return { name: stripQuotes(item[0].text), source: null, isStar: false }
  }

  if (n >= 2 && isKeyword(item[n - 2], 'AS')) {
    if (isNameToken(last)) return { name: stripQuotes(last.text), source: null, isStar: false }
    if (last.kind === 'string') return { name: last.text.slice(1, -1), source: null, isStar: false }
    return null
  }

  if (!isNameToken(last)) return null
  const name = stripQuotes(last.text)
  if (n === 1) return { name, source: null, isStar: false }

  const prev = item[n - 2]
  if (prev.kind === 'dot') {
    const qualifier = item[n - 3]
    const source = n >= 3 && (isNameToken(qualifier) || qualifier.kind === 'temp_table') ? stripQuotes(qualifier.text) : null
    return { name, source, isStar: false }
  }

  // Implicit alias: `COUNT(*) total`, `o.amount amt`
  if (
    isNameToken(prev) ||
    prev.kind === 'paren_close' ||
    prev.kind === 'number' ||
    prev.kind === 'string' ||
    isKeyword(prev, 'END', 'NULL')
  ) {
    return { name, source: null, isStar: false }
  }
  return null
}

function derivedReference(sub: Chunk): TableReference {
  const alias = sub.alias ?? ''
  return {
    ...makeTableReference([alias], alias, 'derived'),
    columns: sub.aliasColumns.length > 0 ? [...sub.aliasColumns] : producedColumnNames(sub),
    starSources: sub.aliasColumns.length > 0 ? [] : starSources(sub),
  }
}

/** Read `[AS] alias [(col, ...)]` after a derived table. */
function readDerivedAlias(tokens: Token[], index: number, to: number): { alias: string | null; columns: string[]; next: number } {
  const aliasRead = readAlias(tokens, index, to)
  if (aliasRead.alias !== null && aliasRead.next < to && tokens[aliasRead.next].kind === 'paren_open') {
    const list = readNameList(tokens, aliasRead.next, to)
    return { alias: aliasRead.alias, columns: list.names, next: list.next }
  }
  return { alias: aliasRead.alias, columns: [], next: aliasRead.next }
}

function skipSelectModifiers(tokens: Token[], index: number, to: number): number {
  let i = index
  while (i < to) {
    const token = tokens[i]
    if (isKeyword(token, 'DISTINCT', 'ALL', 'PERCENT')) {
      i++
    } else if (isKeyword(token, 'TOP')) {
      i++
      if (tokens[i]?.kind === 'paren_open') i = Math.min(findClosingParen(tokens, i, to) + 1, to)
      else if (tokens[i]?.kind === 'number' || tokens[i]?.kind === 'variable') i++
    } else if (isKeyword(token, 'WITH') && isKeyword(tokens[i + 1], 'TIES')) {
      i += 2
    } else {
      return i
    }
  }
  return i
}

function parseCtes(ctx: ParseContext, chunk: Chunk, index: number, to: number): number {
  const { tokens } = ctx
  let i = index
  const recursiveKeyword = isKeyword(tokens[i], 'RECURSIVE')
  if (recursiveKeyword) i++

  while (i < to) {
    const nameToken = tokens[i]
    if (!isNameToken(nameToken)) break
    const name = stripQuotes(nameToken.text)
    i++

    let declaredColumns: string[] = []
    if (i < to && tokens[i].kind === 'paren_open') {
      const list = readNameList(tokens, i, to)
      declaredColumns = list.names
      i = list.next
    }
    if (isKeyword(tokens[i], 'AS')) i++
    if (isKeyword(tokens[i], 'NOT')) i++
    if (isKeyword(tokens[i], 'MATERIALIZED')) i++
    if (i >= to || tokens[i].kind !== 'paren_open') break

    const open = i
    const close = findClosingParen(tokens, open, to)
    const span = parenSpan(tokens, open, close, to)
    const body = parseNested(ctx, open + 1, close, 'cte', span)
    if (!body) break
    chunk.ctes.push({
      name,
      declaredColumns,
      body,
      isRecursive: recursiveKeyword || referencesSelfAcrossUnion(body, name),
      start: span.start,
      end: span.end,
    })

    i = Math.min(close + 1, to)
    if (i < to && tokens[i].kind === 'comma') {
      i++
      continue
    }
    break
  }
  return i
}

function referencesSelfAcrossUnion(body: Chunk, name: string): boolean {
  const operands = body.subqueries.filter((s) => s.role === 'set_operand')
  if (operands.length === 0) return false
  const lower = name.toLowerCase()
  const refersToSelf = (chunk: Chunk) => chunk.tables.some((t) => t.schema === null && t.name.toLowerCase() === lower)
  return refersToSelf(body) || operands.some(refersToSelf)
}

function parseCreate(ctx: ParseContext, chunk: Chunk, index: number, to: number, createdAt: number): number {
  const { tokens } = ctx
  let i = index
  if (isKeyword(tokens[i], 'OR')) i += 2
  let temporary = false
  while (isKeyword(tokens[i], 'TEMPORARY', 'TEMP', 'UNIQUE', 'CLUSTERED', 'NONCLUSTERED')) {
    if (isKeyword(tokens[i], 'TEMPORARY', 'TEMP')) temporary = true
    i++
  }

  const objectKind = upper(tokens[i])
  if (objectKind !== 'TABLE' && objectKind !== 'VIEW') return i
  i++
  if (i + 2 < to && isKeyword(tokens[i], 'IF') && isKeyword(tokens[i + 1], 'NOT') && isKeyword(tokens[i + 2], 'EXISTS')) {
    i += 3
  }

  let name: string | null = null
  const first = tokens[i]
  if (i < to && first.kind === 'temp_table') {
    name = first.text
    temporary = true
    i++
  } else {
    const objectName = readObjectName(tokens, i, to)
    if (objectName) {
      name = objectName.parts.join('.')
      i = objectName.next
    }
  }

  let columns: string[] = []
  if (i < to && tokens[i].kind === 'paren_open') {
    const list = readNameList(tokens, i, to)
    columns = list.names
    i = list.next
  }

  if (objectKind === 'TABLE' && temporary && name) {
    registerTemp(ctx, { name, kind: 'temp_table', columns, isGlobal: name.startsWith('##'), createdAt })
    chunk.tempTable = name
  }
  return i
}

function parseDrop(ctx: ParseContext, chunk: Chunk, index: number, to: number, droppedAt: number): number {
  const { tokens } = ctx
  let i = index
  if (!isKeyword(tokens[i], 'TABLE')) return i
  i++
  if (i + 1 < to && isKeyword(tokens[i], 'IF') && isKeyword(tokens[i + 1], 'EXISTS')) i += 2

  while (i < to) {
    const token = tokens[i]
    if (token.kind === 'temp_table') {
      markDropped(ctx, token.text, droppedAt)
      chunk.tables.push(makeTableReference([token.text], null, 'temp_table'))
      i++
    } else {
      const objectName = readObjectName(tokens, i, to)
      if (!objectName) break
      chunk.tables.push(makeTableReference(objectName.parts, null, 'table'))
      i = objectName.next
    }
    if (i < to && tokens[i].kind === 'comma') i++
    else break
  }
  return i
}

function parseDeclare(ctx: ParseContext, chunk: Chunk, index: number, to: number, createdAt: number): number {
  const { tokens } = ctx
  let i = index
  while (i < to && tokens[i].kind === 'variable') {
    const name = tokens[i].text
    i++
    if (isKeyword(tokens[i], 'AS')) i++
    if (!isKeyword(tokens[i], 'TABLE') || tokens[i + 1]?.kind !== 'paren_open') {
      // Scalar declaration: the main loop reads any subquery in its initializer
      return i
    }
    const list = readNameList(tokens, i + 1, to)
    registerTemp(ctx, { name, kind: 'table_variable', columns: list.names, isGlobal: false, createdAt })
    chunk.tempTable = name
    i = list.next
    if (i < to && tokens[i].kind === 'comma') i++
    else break
  }
  return i
}

/** Drop an UPDATE/DELETE target that is really an alias from the FROM list. */
function dropAliasedTarget(chunk: Chunk, target: TableReference | null): void {
  if (!target || target.schema !== null || target.kind !== 'table') return
  const lower = target.name.toLowerCase()
  const aliased = chunk.tables.some((t) => t !== target && t.alias.toLowerCase() === lower)
  if (aliased) chunk.tables = chunk.tables.filter((t) => t !== target)
}

function closeClauses(chunk: Chunk): void {
  chunk.clauses.forEach((span, k) => {
    const next = chunk.clauses[k + 1]
    span.end = next ? next.start : chunk.end
  })
}

/**
 * Parse a CTE body, subquery or set operand one level down. Returns null past
 * the nesting limit, leaving the group unread.
 */
function parseNested(ctx: ParseContext, from: number, to: number, role: ChunkRole, span: Span): Chunk | null {
  if (ctx.level >= ctx.maxNestingDepth) return null
  ctx.level++
  const chunk = parseQuery(ctx, from, to, role, span)
  ctx.level--
  return chunk
}

/**
 * Parse tokens[from, to) as one query. Called for statements and, through
 * parseNested, for every CTE body and parenthesised subquery.
 */
function parseQuery(ctx: ParseContext, from: number, to: number, role: ChunkRole, span: Span): Chunk {
  const { tokens } = ctx
  const chunk = newChunk(role, ctx.batchIndex, span)
  const statementStart = from < to ? tokens[from].start : span.start

  let i = from
  if (isKeyword(tokens[i], 'WITH') && i < to) i = parseCtes(ctx, chunk, i + 1, to)
  const bodyStart = i

  let depth = 0
  let expectTable = false
  // Inside a FROM list, where a depth-0 comma (even after ON) starts another table
  let fromList = false
  let sourceRole: ChunkRole = 'derived'
  let inSelectList = false
  let selectSeen = false
  let pendingSetOp = false
  let item: Token[] = []
  let target: TableReference | null = null
  let awaitingTarget = false
  let insertColumnsPending = false

  const currentClause = (): ClauseKind => chunk.clauses[chunk.clauses.length - 1]?.clause ?? 'unknown'
  const openClause = (next: ClauseKind, at: number) => {
    if (currentClause() === next) return
    chunk.clauses.push({ clause: next, start: at, end: span.end })
  }

  const finishItem = () => {
    const column = producedColumn(item)
    if (column) chunk.producedColumns.push(column)
    item = []
  }

  while (i < to) {
    const token = tokens[i]

    if (token.kind === 'paren_open') {
      const close = findClosingParen(tokens, i, to)
      const isQuery = i + 1 < close && isKeyword(tokens[i + 1], 'SELECT', 'WITH')

      if (isQuery) {
        const subRole: ChunkRole = depth === 0 && expectTable ? sourceRole : 'expression'
        const sub = parseNested(ctx, i + 1, close, subRole, parenSpan(tokens, i, close, to))
        if (sub) chunk.subqueries.push(sub)
        if (inSelectList && depth === 0) {
          item.push(token)
          if (close < to) item.push(tokens[close])
        }
        i = Math.min(close + 1, to)
        if (subRole !== 'expression') {
          const aliasRead = readDerivedAlias(tokens, i, to)
          if (sub) {
            sub.alias = aliasRead.alias
            sub.aliasColumns = aliasRead.columns
            if (sub.alias !== null) chunk.tables.push(derivedReference(sub))
          }
          expectTable = false
          i = aliasRead.next
        }
        continue
      }

      if (depth === 0 && expectTable) {
        if (isKeyword(tokens[i + 1], 'VALUES')) {
          // (VALUES (1, 'a'), (2, 'b')) AS v(id, label)
          const aliasRead = readDerivedAlias(tokens, Math.min(close + 1, to), to)
          if (aliasRead.alias !== null) {
            chunk.tables.push({ ...makeTableReference([aliasRead.alias], aliasRead.alias, 'derived'), columns: aliasRead.columns })
          }
          i = aliasRead.next
        } else {
          // Parenthesised join: (a JOIN b ON ...)
          chunk.tables.push(...readTableList(tokens, i + 1, close))
          i = Math.min(close + 1, to)
        }
        expectTable = false
        continue
      }

      if (depth === 0 && insertColumnsPending) {
        const list = readNameList(tokens, i, to)
        chunk.insertColumns.push(...list.names)
        openClause('insert_columns', token.start)
        insertColumnsPending = false
        i = list.next
        continue
      }

      if (inSelectList && depth === 0) item.push(token)
      depth++
      i++
      continue
    }

    if (token.kind === 'paren_close') {
      if (depth > 0) depth--
      if (inSelectList && depth === 0) item.push(token)
      i++
      continue
    }

    if (depth > 0) {
      i++
      continue
    }

    insertColumnsPending = false

    if (expectTable && (isNameToken(token) || token.kind === 'variable' || token.kind === 'temp_table')) {
      const read = readTableReference(tokens, i, to, !(awaitingTarget && chunk.statementKind === 'INSERT'))
      if (read) {
        chunk.tables.push(read.ref)
        if (awaitingTarget) {
          target = read.ref
          awaitingTarget = false
          insertColumnsPending = chunk.statementKind === 'INSERT'
        }
        expectTable = false
        i = read.next
        continue
      }
    }

    if (inSelectList) {
      if (token.kind === 'comma') {
        finishItem()
        i++
        continue
      }
      if (token.kind !== 'keyword' || !SELECT_LIST_ENDS.has(upper(token))) {
        item.push(token)
        i++
        continue
      }
      finishItem()
      inSelectList = false
    }

    if (token.kind === 'comma') {
      if (fromList) expectTable = true
      i++
      continue
    }

    if (token.kind !== 'keyword') {
      i++
      continue
    }

    const word = upper(token)
    const atStart = i === bodyStart

    switch (word) {
      case 'SELECT':
        if (selectSeen && pendingSetOp) {
          const operand = parseNested(ctx, i, to, 'set_operand', { start: token.start, end: span.end })
          if (operand) chunk.subqueries.push(operand)
          i = to
          continue
        }
        if (chunk.statementKind === 'OTHER') chunk.statementKind = 'SELECT'
        selectSeen = true
        inSelectList = true
        expectTable = false
        fromList = false
        openClause('select_list', token.start)
        i = skipSelectModifiers(tokens, i + 1, to)
        continue
      case 'FROM':
      case 'JOIN':
        openClause('from', token.start)
        expectTable = true
        fromList = true
        sourceRole = 'derived'
        break
      case 'APPLY':
        openClause('from', token.start)
        expectTable = true
        fromList = true
        sourceRole = 'apply'
        break
      case 'USING':
        if (chunk.statementKind === 'MERGE') {
          openClause('from', token.start)
          expectTable = true
          fromList = true
          sourceRole = 'derived'
        }
        break
      case 'ON':
      case 'WHERE':
      case 'HAVING':
        openClause('condition', token.start)
        expectTable = false
        if (word !== 'ON') fromList = false
        break
      case 'WHEN':
        if (chunk.statementKind === 'MERGE') openClause('condition', token.start)
        fromList = false
        break
      case 'GROUP':
      case 'ORDER':
        openClause('group_order', token.start)
        fromList = false
        break
      case 'UNION':
      case 'EXCEPT':
      case 'INTERSECT':
        pendingSetOp = true
        expectTable = false
        fromList = false
        break
      case 'INTO':
        if (selectSeen && currentClause() === 'select_list') {
          i = readSelectInto(ctx, chunk, i + 1, to, statementStart)
          continue
        }
        break
      case 'INSERT':
        if (atStart) {
          chunk.statementKind = 'INSERT'
          openClause('from', token.start)
          expectTable = true
          awaitingTarget = true
        } else if (chunk.statementKind === 'MERGE') {
          openClause('insert_columns', token.start)
          insertColumnsPending = true
          i++
          continue
        }
        break
      case 'UPDATE':
      case 'MERGE':
        if (atStart) {
          chunk.statementKind = word === 'UPDATE' ? 'UPDATE' : 'MERGE'
          openClause('from', token.start)
          expectTable = true
          awaitingTarget = true
        }
        break
      case 'DELETE':
        if (atStart) {
          chunk.statementKind = 'DELETE'
          openClause('before_from', token.start)
          expectTable = true
          awaitingTarget = true
        }
        break
      case 'SET':
        if (atStart) chunk.statementKind = 'SET'
        openClause('set', token.start)
        expectTable = false
        fromList = false
        break
      case 'VALUES':
        openClause('values', token.start)
        expectTable = false
        fromList = false
        break
      case 'OUTPUT':
      case 'RETURNING':
        openClause('output', token.start)
        expectTable = false
        fromList = false
        break
      case 'EXEC':
      case 'EXECUTE':
      case 'CALL':
        if (atStart) chunk.statementKind = 'EXEC'
        openClause('exec', token.start)
        break
      case 'ALTER':
      case 'TRUNCATE':
        if (atStart) {
          chunk.statementKind = word === 'ALTER' ? 'ALTER' : 'TRUNCATE'
          if (isKeyword(tokens[i + 1], 'TABLE')) {
            openClause('from', token.start)
            expectTable = true
            i += 2
            continue
          }
        }
        break
      case 'CREATE':
        if (atStart) {
          chunk.statementKind = 'CREATE'
          i = parseCreate(ctx, chunk, i + 1, to, statementStart)
          continue
        }
        break
      case 'DROP':
        if (atStart) {
          chunk.statementKind = 'DROP'
          i = parseDrop(ctx, chunk, i + 1, to, statementStart)
          continue
        }
        break
      case 'DECLARE':
        if (atStart) {
          chunk.statementKind = 'DECLARE'
          i = parseDeclare(ctx, chunk, i + 1, to, statementStart)
          continue
        }
        break
    }
    i++
  }

  if (inSelectList) finishItem()
  closeClauses(chunk)
  dropAliasedTarget(chunk, target)
  return chunk
}

/** `SELECT ... INTO #target`: the target takes the select list's columns. */
function readSelectInto(ctx: ParseContext, chunk: Chunk, index: number, to: number, createdAt: number): number {
  const token = ctx.tokens[index]
  if (index >= to || !token) return index

  if (token.kind === 'temp_table') {
    registerTemp(ctx, {
      name: token.text,
      kind: 'temp_table',
      columns: producedColumnNames(chunk),
      isGlobal: token.text.startsWith('##'),
      createdAt,
    })
    chunk.tempTable = token.text
    return index + 1
  }

  const objectName = readObjectName(ctx.tokens, index, to)
  return objectName ? objectName.next : index
}
