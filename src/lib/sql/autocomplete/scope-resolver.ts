/**
 * Scope Resolver Module
 *
 * Entry point of the engine: given a buffer and a cursor, decides which
 * tables, CTEs and temp tables are visible and what kind of completion is
 * expected there.
 */

import {
  getPartialPrefix,
  isInsideStringOrComment,
  isKeyword,
  isNameToken,
  positionToOffset,
  tokenAtCursor,
  tokenize,
  tokensBeforeCursor,
} from './tokenizer'
import { detectDotTrigger, extractLeftSideColumn, referenceBeforeDot } from './qualified-name'
import { detectUnparsedSubquery } from './subquery'
import {
  findInnermostChunk,
  getChunkAtPosition,
  getClauseAtPosition,
  parseChunks,
  producedColumnNames,
  starSources,
} from './parser'
import { makeTableReference } from './table-reference'
import { resolveConfig, type ResolverConfig } from './config'
import type {
  CTEDefinition,
  ChunkPathEntry,
  ClauseKind,
  CursorPosition,
  DotTrigger,
  PgQueryParser,
  Resolution,
  ScopeContext,
  ScopeTable,
  StatementKind,
  TableReference,
  TempTableDefinition,
  Token,
  TriggerKind,
  VisibleColumn,
} from './types'

/**
 * Options for the scope resolver: any ResolverConfig field, plus an
 * injectable libpg-query parser.
 */
export interface ResolveOptions extends Partial<ResolverConfig> {
  /** Custom parser for testing */
  parser?: PgQueryParser
}

const CLAUSE_KEYWORDS: Record<string, ClauseKind> = {
  SELECT: 'select_list',
  FROM: 'from',
  JOIN: 'from',
  APPLY: 'from',
  INTO: 'from',
  UPDATE: 'from',
  MERGE: 'from',
  USING: 'from',
  INSERT: 'from',
  TABLE: 'from',
  DELETE: 'before_from',
  WHERE: 'condition',
  HAVING: 'condition',
  ON: 'condition',
  SET: 'set',
  VALUES: 'values',
  OUTPUT: 'output',
  RETURNING: 'output',
  GROUP: 'group_order',
  ORDER: 'group_order',
  EXEC: 'exec',
  EXECUTE: 'exec',
  CALL: 'exec',
}

// Control flow that starts a new context without a clause of its own
const CONTEXT_BREAKS = new Set(['BEGIN', 'IF', 'WHILE'])

function isWordToken(token: Token | null | undefined): boolean {
  if (!token) return false
  return isNameToken(token) || token.kind === 'keyword' || token.kind === 'variable' || token.kind === 'temp_table'
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Resolve what is visible at `cursor` (1-indexed line and column).
 *
 * @throws CursorOutOfRangeError when the cursor lies outside the buffer
 */
export function resolveScope(sql: string, cursor: CursorPosition, options: ResolveOptions = {}): ScopeContext {
  const { parser, ...overrides } = options
  const config = resolveConfig(overrides)
  const offset = positionToOffset(sql, cursor)
  const tokens = tokenize(sql, { batchSeparator: config.batchSeparator })
  const batchIndex = tokens.filter((t) => t.kind === 'batch_separator' && t.start < offset).length

  const context = emptyContext(batchIndex)
  if (isInsideStringOrComment(tokens, offset)) return context

  const parsed = parseChunks(sql, {
    tokens,
    batchSeparator: config.batchSeparator,
    precise: config.precise,
    parser,
    maxNestingDepth: config.maxNestingDepth,
  })

  let visibleTables: ScopeTable[] = []
  let ctes: CTEDefinition[] = []
  let statementKind: StatementKind | null = null
  let depth = 0
  let inUnparsedSubquery = false
  let parsedClause: ClauseKind = 'unknown'

  const statement = getChunkAtPosition(parsed, offset)
  if (statement) {
    const path = findInnermostChunk(statement, offset, parsed.tokens)
    ctes = visibleCtes(path)
    visibleTables = collectReferencedTables(path, ctes, parsed.tempTables, batchIndex, offset)
    statementKind = statement.statementKind
    depth = path.length - 1
    parsedClause = getClauseAtPosition(path[depth].chunk, offset)
  } else {
    const unparsed = detectUnparsedSubquery(tokens, offset, {
      window: config.subqueryWindow,
      strategy: config.subqueryStrategy,
      batchSeparator: config.batchSeparator,
    })
    if (unparsed.isInSubquery) {
      inUnparsedSubquery = true
      statementKind = 'SELECT'
      depth = 1
      for (const ref of unparsed.tables ?? []) {
        const resolved = resolveReference(ref, ctes, parsed.tempTables, batchIndex, offset)
        if (resolved) visibleTables.push({ ...resolved, referenced: true, depth: 0 })
      }
    }
  }

  appendAvailable(visibleTables, ctes, parsed.tempTables, batchIndex, offset)

  const dot = detectDotTrigger(tokens, offset, config.qualifiedNameWindow)
  // Past the scan window the parser's clause spans decide
  const clause = detectClause(tokens, offset, config.clauseScanWindow) ?? parsedClause
  const qualifier = dot.qualified

  return {
    ...context,
    triggerKind: detectTrigger(clause, tokens, offset, dot),
    clause,
    statementKind,
    visibleTables,
    ctes,
    qualifier,
    qualifierTarget: qualifier ? matchQualifier(visibleTables, qualifier.parts) : { status: 'no_match' },
    reference: referenceBeforeDot(tokens, offset, config.referenceWindow),
    isAfterDot: dot.isAfterDot,
    prefix: getPartialPrefix(tokens, offset),
    leftSide:
      clause === 'condition' || clause === 'set'
        ? extractLeftSideColumn(tokens, offset, {
            window: config.leftSideWindow,
            operatorReach: config.leftSideOperatorReach,
          })
        : null,
    inUnparsedSubquery,
    depth,
  }
}

/**
 * Bind an alias (or a dotted table name) to a referenced visible table.
 * The nearest scope wins; two matches at that scope are ambiguous.
 */
export function resolveAlias(context: ScopeContext, alias: string): Resolution<ScopeTable> {
  return matchQualifier(context.visibleTables, alias.split('.'))
}

/**
 * Columns known for a table, addressed by alias or by name. Physical tables
 * have no known columns here; callers look them up in their own metadata.
 */
export function getColumnsForTable(context: ScopeContext, tableOrAlias: string): string[] {
  const resolution = resolveAlias(context, tableOrAlias)
  if (resolution.status === 'matched') return resolution.value.columns ?? []
  const byName = context.visibleTables.find((t) => sameName(t.name, tableOrAlias))
  return byName?.columns ?? []
}

/**
 * Every column the referenced tables are known to provide, nearest scope
 * first.
 */
export function visibleColumns(context: ScopeContext): VisibleColumn[] {
  const columns: VisibleColumn[] = []
  for (const table of context.visibleTables) {
    if (!table.referenced || !table.columns) continue
    for (const name of table.columns) columns.push({ name, table: table.alias })
  }
  return columns
}

// ============================================================================
// VISIBILITY
// ============================================================================

function emptyContext(batchIndex: number): ScopeContext {
  return {
    triggerKind: 'none',
    clause: 'unknown',
    statementKind: null,
    visibleTables: [],
    ctes: [],
    qualifier: null,
    qualifierTarget: { status: 'no_match' },
    reference: null,
    isAfterDot: false,
    prefix: null,
    leftSide: null,
    inUnparsedSubquery: false,
    depth: 0,
    batchIndex,
  }
}

/**
 * CTEs in scope along the path. Inside the body of ctes[k] only ctes[0..k-1]
 * are visible, plus ctes[k] itself when recursive. Inner WITH lists shadow
 * outer ones.
 */
function visibleCtes(path: ChunkPathEntry[]): CTEDefinition[] {
  let visible: CTEDefinition[] = []
  path.forEach((entry, k) => {
    const { ctes } = entry.chunk
    if (ctes.length === 0) return

    const child = path[k + 1]
    let own: CTEDefinition[]
    if (child && child.cteIndex !== null) {
      own = ctes.slice(0, child.cteIndex)
      const current = ctes[child.cteIndex]
      if (current.isRecursive) own.push(current)
    } else {
      own = ctes
    }
    visible = [...visible.filter((outer) => !own.some((c) => sameName(c.name, outer.name))), ...own]
  })
  return visible
}

function cteReference(cte: CTEDefinition, alias: string | null): TableReference {
  const declared = cte.declaredColumns.length > 0
  return {
    ...makeTableReference([cte.name], alias, 'cte'),
    columns: declared ? [...cte.declaredColumns] : producedColumnNames(cte.body),
    starSources: declared ? [] : starSources(cte.body),
  }
}

/**
 * The definition of `name` live at `offset`: same batch, created before the
 * cursor, not yet dropped.
 */
function liveTempTable(
  tempTables: TempTableDefinition[],
  name: string,
  batchIndex: number,
  offset: number
): TempTableDefinition | null {
  let live: TempTableDefinition | null = null
  for (const def of tempTables) {
    if (!sameName(def.name, name) || def.batchIndex !== batchIndex) continue
    if (def.createdAt >= offset) continue
    if (def.droppedAt !== null && def.droppedAt <= offset) continue
    live = def
  }
  return live
}

/**
 * Turn a parsed reference into what it names at the cursor. Returns null for
 * temp tables without a live definition.
 */
function resolveReference(
  ref: TableReference,
  ctes: CTEDefinition[],
  tempTables: TempTableDefinition[],
  batchIndex: number,
  offset: number
): TableReference | null {
  switch (ref.kind) {
    case 'table': {
      if (ref.schema !== null || ref.database !== null) return ref
      const cte = ctes.find((c) => sameName(c.name, ref.name))
      return cte ? cteReference(cte, ref.alias) : ref
    }
    case 'temp_table':
    case 'table_variable': {
      const def = liveTempTable(tempTables, ref.name, batchIndex, offset)
      return def ? { ...ref, columns: [...def.columns] } : null
    }
    default:
      return ref
  }
}

/**
 * Tables referenced by the innermost chunk, then by enclosing chunks for as
 * long as the chunk is an expression or APPLY subquery. A set operand sees
 * what its owning query sees, but not the tables of the other operands. An
 * alias already bound at a nearer scope hides the outer one.
 */
function collectReferencedTables(
  path: ChunkPathEntry[],
  ctes: CTEDefinition[],
  tempTables: TempTableDefinition[],
  batchIndex: number,
  offset: number
): ScopeTable[] {
  const tables: ScopeTable[] = []
  for (let k = path.length - 1; k >= 0; k--) {
    const { chunk } = path[k]
    const child = k + 1 < path.length ? path[k + 1].chunk : null
    const depth = path.length - 1 - k
    for (const ref of child?.role === 'set_operand' ? [] : chunk.tables) {
      // An APPLY body cannot name its own alias
      if (child?.role === 'apply' && ref.kind === 'derived' && child.alias !== null && sameName(ref.alias, child.alias)) {
        continue
      }
      const resolved = resolveReference(ref, ctes, tempTables, batchIndex, offset)
      if (!resolved) continue
      if (tables.some((t) => t.depth < depth && sameName(t.alias, resolved.alias))) continue
      tables.push({ ...resolved, referenced: true, depth })
    }
    if (chunk.role !== 'expression' && chunk.role !== 'apply' && chunk.role !== 'set_operand') break
  }
  return tables
}

/**
 * Append CTEs and live temp tables that are in scope but not referenced yet.
 */
function appendAvailable(
  tables: ScopeTable[],
  ctes: CTEDefinition[],
  tempTables: TempTableDefinition[],
  batchIndex: number,
  offset: number
): void {
  for (const cte of ctes) {
    if (tables.some((t) => t.kind === 'cte' && sameName(t.name, cte.name))) continue
    tables.push({ ...cteReference(cte, null), referenced: false, depth: 0 })
  }

  const seen = new Set<string>()
  for (const def of tempTables) {
    const key = def.name.toLowerCase()
    if (seen.has(key)) continue
    const live = liveTempTable(tempTables, def.name, batchIndex, offset)
    if (!live) continue
    seen.add(key)
    if (tables.some((t) => sameName(t.name, live.name))) continue
    tables.push({
      ...makeTableReference([live.name], null, live.kind),
      columns: [...live.columns],
      referenced: false,
      depth: 0,
    })
  }
}

/**
 * Referenced tables a dotted qualifier can name. One part is an alias; more
 * parts name a table, with any schema or database checked against what the
 * reference wrote.
 */
function matchQualifier(tables: ScopeTable[], parts: string[]): Resolution<ScopeTable> {
  if (parts.length === 0) return { status: 'no_match' }
  const last = parts[parts.length - 1]

  const matches = tables.filter((t) => {
    if (!t.referenced) return false
    if (parts.length === 1) return sameName(t.alias, last)
    if (!sameName(t.name, last)) return false
    const schema = parts[parts.length - 2]
    if (t.schema !== null && schema !== '' && !sameName(t.schema, schema)) return false
    const database = parts.length >= 3 ? parts[parts.length - 3] : null
    return t.database === null || database === null || sameName(t.database, database)
  })
  if (matches.length === 0) return { status: 'no_match' }

  const nearest = Math.min(...matches.map((t) => t.depth))
  const candidates = matches.filter((t) => t.depth === nearest)
  if (candidates.length === 1) return { status: 'matched', value: candidates[0] }
  return { status: 'ambiguous', candidates }
}

// ============================================================================
// CLAUSE DETECTION
// ============================================================================

/**
 * Classify the paren group the cursor sits in, or null when the group says
 * nothing about the clause (function calls, expressions).
 */
function classifyGroup(before: Token[], openIndex: number): ClauseKind | null {
  const preceding = before[openIndex + 1]
  if (isKeyword(preceding, 'AS')) return 'unknown'
  if (isKeyword(preceding, 'INSERT')) return 'insert_columns'

  let k = openIndex + 1
  while (isNameToken(before[k]) || before[k]?.kind === 'dot' || before[k]?.kind === 'temp_table' || before[k]?.kind === 'variable') k++
  if (k === openIndex + 1) return null

  const keyword = before[k]
  if (isKeyword(keyword, 'INTO', 'INSERT')) return 'insert_columns'
  if (isKeyword(keyword, 'TABLE', 'WITH')) return 'unknown'
  return null
}

/**
 * Walk backward from the cursor to the keyword that opened the current
 * clause. Balanced paren groups and CASE ... END expressions are skipped; an
 * enclosing group that is a column list decides the clause itself. Returns
 * null when the window runs out first.
 */
function detectClause(tokens: Token[], offset: number, window: number): ClauseKind | null {
  const before = tokensBeforeCursor(tokens, offset, window)
  let k = 0
  const partial = tokenAtCursor(tokens, offset)
  if (isWordToken(partial) && partial === before[0]) k = 1

  let depth = 0
  let caseDepth = 0
  for (; k < before.length; k++) {
    const token = before[k]
    if (token.kind === 'semicolon' || token.kind === 'batch_separator') return 'unknown'
    if (isKeyword(token, 'END')) {
      caseDepth++
      continue
    }
    if (caseDepth > 0) {
      if (isKeyword(token, 'CASE')) caseDepth--
      else if (isKeyword(token, 'BEGIN')) return 'unknown'
      continue
    }
    if (token.kind === 'paren_close') {
      depth++
      continue
    }
    if (token.kind === 'paren_open') {
      if (depth > 0) {
        depth--
        continue
      }
      const group = classifyGroup(before, k)
      if (group !== null) return group
      continue
    }
    if (depth > 0 || token.kind !== 'keyword') continue

    const word = token.text.toUpperCase()
    if (CONTEXT_BREAKS.has(word)) return 'unknown'
    // WHEN opens a condition in MERGE only; inside CASE the enclosing clause decides
    if (word === 'WHEN' && isKeyword(before[k - 1], 'MATCHED', 'NOT')) return 'condition'
    if (word === 'BY' && isKeyword(before[k + 1], 'GROUP', 'ORDER', 'PARTITION')) return 'group_order'
    if (word === 'TABLE' && isKeyword(before[k + 1], 'CREATE')) return 'unknown'
    const clause = CLAUSE_KEYWORDS[word]
    if (clause !== undefined) return clause
  }
  return null
}

/**
 * Whether the cursor is where a table alias goes: right after a table name,
 * a closing paren or AS.
 */
function isAliasPosition(tokens: Token[], offset: number): boolean {
  const before = tokensBeforeCursor(tokens, offset, 2)
  const partial = tokenAtCursor(tokens, offset)
  const previous = isWordToken(partial) && partial === before[0] ? before[1] : before[0]
  if (!previous) return false
  if (isKeyword(previous, 'AS')) return true
  return (
    isNameToken(previous) ||
    previous.kind === 'temp_table' ||
    previous.kind === 'variable' ||
    previous.kind === 'paren_close'
  )
}

function detectTrigger(clause: ClauseKind, tokens: Token[], offset: number, dot: DotTrigger): TriggerKind {
  switch (clause) {
    case 'from':
    case 'before_from':
      if (!dot.isAfterDot && dot.qualified === null && isAliasPosition(tokens, offset)) return 'none'
      return 'table'
    case 'exec':
      return 'procedure'
    case 'unknown':
      return 'none'
    default:
      return 'column'
  }
}
