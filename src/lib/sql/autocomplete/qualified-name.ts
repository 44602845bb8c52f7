/**
 * Qualified Name Module
 *
 * Reads dotted identifier chains (db.schema.table.column) backward from the
 * cursor. A chain such as `a.b` is never forced into one meaning: every
 * plausible reading is populated and the scope resolver picks one using the
 * tables that are actually visible.
 */

import { isKeyword, isNameToken, stripQuotes, tokensBeforeCursor, tokenAtCursor } from './tokenizer'
import type { DotTrigger, LeftSideColumn, QualifiedName, QualifierReading, Resolution, Token } from './types'

export const DEFAULT_QUALIFIED_NAME_WINDOW = 7
export const DEFAULT_REFERENCE_WINDOW = 10
export const DEFAULT_LEFT_SIDE_WINDOW = 15
export const DEFAULT_OPERATOR_REACH = 5

function emptyQualifiedName(): QualifiedName {
  return {
    database: null,
    schema: null,
    table: null,
    column: null,
    alias: null,
    parts: [],
    hasTrailingDot: false,
  }
}

/**
 * Chain tokens may also be temp tables: `#orders.id` is valid.
 */
function isChainName(token: Token | undefined): token is Token {
  return isNameToken(token) || token?.kind === 'temp_table'
}

/**
 * Parse a window of tokens (most recent first) into a QualifiedName.
 *
 * | parts | no trailing dot                    | trailing dot             |
 * |-------|------------------------------------|--------------------------|
 * | 1     | alias                              | schema and alias         |
 * | 2     | schema+table and alias+column      | database+schema          |
 * | 3     | database+schema+table              | database+schema+table    |
 * | 4+    | first four: database..column       | same                     |
 */
export function parseQualifiedName(window: Token[]): QualifiedName {
  const result = emptyQualifiedName()
  let i = 0

  if (window[0]?.kind === 'dot') {
    result.hasTrailingDot = true
    i = 1
  }

  while (i < window.length) {
    const token = window[i]
    if (!isChainName(token)) break
    result.parts.unshift(stripQuotes(token.text))
    i++
    if (window[i]?.kind !== 'dot') break
    i++
  }

  const parts = result.parts
  const dot = result.hasTrailingDot

  switch (parts.length) {
    case 0:
      // A lone dot carries no qualifier
      result.hasTrailingDot = false
      break
    case 1:
      result.alias = parts[0]
      if (dot) result.schema = parts[0]
      break
    case 2:
      if (dot) {
        result.database = parts[0]
        result.schema = parts[1]
      } else {
        result.schema = parts[0]
        result.table = parts[1]
        result.alias = parts[0]
        result.column = parts[1]
      }
      break
    case 3:
      result.database = parts[0]
      result.schema = parts[1]
      result.table = parts[2]
      break
    default:
      result.database = parts[0]
      result.schema = parts[1]
      result.table = parts[2]
      result.column = parts[3]
  }

  return result
}

/**
 * List the readings a QualifiedName allows, most specific first.
 */
export function interpretQualifiedName(name: QualifiedName): Resolution<QualifierReading> {
  const readings: QualifierReading[] = []
  const { database, schema, table, column, alias } = name

  if (database && schema && table) {
    readings.push({ kind: 'object', database, schema, table, column })
  } else if (database && schema) {
    readings.push({ kind: 'database_schema', database, schema })
  }
  if (alias && column) readings.push({ kind: 'alias_column', alias, column })
  if (schema && table && !database) readings.push({ kind: 'schema_table', schema, table })
  if (alias && !column) readings.push({ kind: 'alias', alias })
  if (schema && !table && !database) readings.push({ kind: 'schema', schema })

  if (readings.length === 0) return { status: 'no_match' }
  if (readings.length === 1) return { status: 'matched', value: readings[0] }
  return { status: 'ambiguous', candidates: readings }
}

/**
 * Classify the text right before the cursor.
 *
 * `u.|`   → isAfterDot, qualifier u
 * `u.na|` → not a fresh dot trigger, qualifier u, partial "na"
 */
export function detectDotTrigger(
  tokens: Token[],
  offset: number,
  window = DEFAULT_QUALIFIED_NAME_WINDOW
): DotTrigger {
  const before = tokensBeforeCursor(tokens, offset, window)
  const first = before[0]

  if (first?.kind === 'dot') {
    const qualified = parseQualifiedName(before)
    return { isAfterDot: true, qualified: qualified.parts.length > 0 ? qualified : null, partial: null }
  }

  if (isChainName(first) && tokenAtCursor(tokens, offset) === first && before[1]?.kind === 'dot') {
    const qualified = parseQualifiedName(before.slice(1))
    return {
      isAfterDot: false,
      qualified: qualified.parts.length > 0 ? qualified : null,
      partial: stripQuotes(first.text.slice(0, offset - first.start)),
    }
  }

  return { isAfterDot: false, qualified: null, partial: null }
}

/**
 * The dotted reference before the last dot, e.g. `dbo.users` for `dbo.users.na|`.
 */
export function referenceBeforeDot(
  tokens: Token[],
  offset: number,
  window = DEFAULT_REFERENCE_WINDOW
): string | null {
  const before = tokensBeforeCursor(tokens, offset, window)
  let i = 0
  if (isChainName(before[0]) && tokenAtCursor(tokens, offset) === before[0]) i = 1
  if (before[i]?.kind !== 'dot') return null

  const qualified = parseQualifiedName(before.slice(i))
  return qualified.parts.length > 0 ? qualified.parts.join('.') : null
}

export interface LeftSideOptions {
  window?: number
  operatorReach?: number
}

/**
 * Find the column on the left of the comparison the cursor is completing,
 * e.g. `o.status` in `WHERE o.status = |`. A keyword between the cursor and
 * the operator ends the search.
 */
export function extractLeftSideColumn(
  tokens: Token[],
  offset: number,
  options: LeftSideOptions = {}
): LeftSideColumn | null {
  const window = options.window ?? DEFAULT_LEFT_SIDE_WINDOW
  const reach = options.operatorReach ?? DEFAULT_OPERATOR_REACH
  const before = tokensBeforeCursor(tokens, offset, window)

  let i = 0
  if (isChainName(before[0]) && tokenAtCursor(tokens, offset) === before[0]) i = 1

  let operatorIndex = -1
  for (let k = i; k < Math.min(before.length, i + reach); k++) {
    const token = before[k]
    if (isKeyword(token)) return null
    if (token.kind === 'operator') {
      operatorIndex = k
      break
    }
  }
  if (operatorIndex < 0) return null

  const qualified = parseQualifiedName(before.slice(operatorIndex + 1))
  const parts = qualified.parts
  if (parts.length === 0 || qualified.hasTrailingDot) return null

  return {
    qualified,
    columnName: parts[parts.length - 1],
    tableRef: parts.length >= 2 ? parts[parts.length - 2] : null,
    schema: parts.length >= 3 ? parts[parts.length - 3] : null,
  }
}
