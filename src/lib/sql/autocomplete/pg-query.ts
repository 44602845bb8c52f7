/**
 * Precise Parse Module
 *
 * When the libpg-query module is loaded, statements that PostgreSQL can parse
 * are re-read from its AST and any top-level FROM tables the heuristic parser
 * missed are added to the chunk.
 */

import { parseSync as defaultParseSync } from '@libpg-query/parser'
import { isModuleLoaded as defaultIsModuleLoaded } from '../core'
import { makeTableReference } from './table-reference'
import type { Chunk, PgQueryParser } from './types'

/**
 * Default parser implementation using @libpg-query/parser.
 */
export const defaultPgQueryParser: PgQueryParser = {
  parseSync: defaultParseSync,
  isLoaded: defaultIsModuleLoaded,
}

export interface PreciseTable {
  schema: string | null
  name: string
  alias: string | null
}

export type PreciseParseResult =
  | { valid: true; tables: PreciseTable[] }
  | { valid: false; reason: 'not_loaded' }
  | { valid: false; reason: 'parse_error'; message: string }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key]
  return typeof value === 'string' && value !== '' ? value : null
}

/**
 * RangeVar appears wrapped ({ RangeVar: {...} }) in lists and bare in
 * `relation` fields.
 */
function readRangeVar(node: unknown): PreciseTable | null {
  if (!isRecord(node)) return null
  const rangeVar = isRecord(node.RangeVar) ? node.RangeVar : node
  const name = stringField(rangeVar, 'relname')
  if (!name) return null
  const alias = isRecord(rangeVar.alias) ? stringField(rangeVar.alias, 'aliasname') : null
  return { schema: stringField(rangeVar, 'schemaname'), name, alias }
}

function collectFromItem(node: unknown, tables: PreciseTable[]): void {
  if (!isRecord(node)) return
  const rangeVar = readRangeVar(node)
  if (rangeVar) {
    tables.push(rangeVar)
    return
  }
  if (isRecord(node.JoinExpr)) {
    collectFromItem(node.JoinExpr.larg, tables)
    collectFromItem(node.JoinExpr.rarg, tables)
  }
}

function collectSelect(select: Record<string, unknown>, tables: PreciseTable[]): void {
  for (const item of asArray(select.fromClause)) collectFromItem(item, tables)
  if (isRecord(select.larg)) collectSelect(select.larg, tables)
}

function collectStatement(stmt: unknown, tables: PreciseTable[]): void {
  if (!isRecord(stmt)) return

  if (isRecord(stmt.SelectStmt)) {
    collectSelect(stmt.SelectStmt, tables)
    return
  }

  const modifying = isRecord(stmt.InsertStmt)
    ? stmt.InsertStmt
    : isRecord(stmt.UpdateStmt)
      ? stmt.UpdateStmt
      : isRecord(stmt.DeleteStmt)
        ? stmt.DeleteStmt
        : null
  if (!modifying) return

  const relation = readRangeVar(modifying.relation)
  if (relation) tables.push(relation)
  for (const item of asArray(modifying.fromClause)) collectFromItem(item, tables)
  for (const item of asArray(modifying.usingClause)) collectFromItem(item, tables)
  if (isRecord(modifying.selectStmt) && isRecord(modifying.selectStmt.SelectStmt)) {
    collectSelect(modifying.selectStmt.SelectStmt, tables)
  }
}

/**
 * Try to parse SQL with pg_query for precise top-level table information.
 */
export function tryPgQueryParse(sql: string, parser: PgQueryParser): PreciseParseResult {
  if (!parser.isLoaded()) {
    return { valid: false, reason: 'not_loaded' }
  }

  let result: unknown
  try {
    result = parser.parseSync(sql)
  } catch (err) {
    return { valid: false, reason: 'parse_error', message: err instanceof Error ? err.message : String(err) }
  }

  if (!isRecord(result)) {
    console.warn('pg_query returned no parse tree')
    return { valid: false, reason: 'parse_error', message: 'no parse tree' }
  }

  const tables: PreciseTable[] = []
  for (const raw of asArray(result.stmts)) {
    if (isRecord(raw)) collectStatement(raw.stmt, tables)
  }
  return { valid: true, tables }
}

/**
 * Add pg_query tables not already found by token analysis. Returns the number added.
 *
 * A bare name that matches an alias the chunk already binds is skipped: it is
 * the `UPDATE o ... FROM orders o` target the heuristic pass resolved.
 */
export function mergePreciseTables(chunk: Chunk, tables: PreciseTable[]): number {
  let added = 0
  for (const pgTable of tables) {
    const name = pgTable.name.toLowerCase()
    const alias = (pgTable.alias ?? pgTable.name).toLowerCase()
    const exists = chunk.tables.some((t) => t.name.toLowerCase() === name && t.alias.toLowerCase() === alias)
    if (exists) continue
    const isAliasTarget = pgTable.schema === null && pgTable.alias === null && chunk.tables.some((t) => t.alias.toLowerCase() === name)
    if (isAliasTarget) continue

    const parts = pgTable.schema ? [pgTable.schema, pgTable.name] : [pgTable.name]
    chunk.tables.push(makeTableReference(parts, pgTable.alias, 'table'))
    added++
  }
  return added
}
