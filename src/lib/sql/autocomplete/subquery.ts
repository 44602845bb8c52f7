/**
 * Subquery Boundary Module
 *
 * Finds the `( SELECT ... )` span around the cursor when the chunk parser has
 * not materialised it, for example inside `IF EXISTS (SELECT ...)`, and lists
 * the tables of that span.
 */

import { cursorTokenIndex, isKeyword, isNameToken, tokensBeforeCursor } from './tokenizer'
import { readTableList } from './table-reference'
import { parseChunks } from './parser'
import type { SubqueryBounds, SubqueryStrategy, TableReference, Token, UnparsedSubquery } from './types'

export const DEFAULT_SUBQUERY_WINDOW = 50

export interface SubqueryOptions {
  /** Tokens scanned backward from the cursor */
  window?: number
  /** 'parse' re-parses the span; 'scan' reads the FROM list around the cursor */
  strategy?: SubqueryStrategy
  batchSeparator?: string
}

function nextSignificant(tokens: Token[], index: number): Token | undefined {
  for (let k = index + 1; k < tokens.length; k++) {
    if (tokens[k].kind !== 'comment') return tokens[k]
  }
  return undefined
}

/**
 * Decide whether the cursor sits inside an unparsed `( SELECT ... )`.
 *
 * Walking backward, `)` enters a balanced group and `(` leaves one. A `(`
 * that leaves depth 0 after a SELECT was seen opens the subquery, unless it
 * follows an identifier (`AVG(SELECT ...)`) or AS (a CTE body).
 */
export function detectUnparsedSubquery(tokens: Token[], offset: number, options: SubqueryOptions = {}): UnparsedSubquery {
  const before = tokensBeforeCursor(tokens, offset, options.window ?? DEFAULT_SUBQUERY_WINDOW)
  let depth = 0
  let sawSelect = false

  for (let k = 0; k < before.length; k++) {
    const token = before[k]
    if (token.kind === 'semicolon' || token.kind === 'batch_separator') break
    if (isKeyword(token, 'INSERT', 'UPDATE', 'DELETE', 'MERGE')) break
    // WITH (NOLOCK) is a hint, not a CTE
    if (isKeyword(token, 'WITH') && before[k - 1]?.kind !== 'paren_open') break

    if (token.kind === 'paren_close') {
      depth++
      continue
    }
    if (token.kind === 'paren_open') {
      if (depth > 0) {
        depth--
        continue
      }
      if (!sawSelect) continue

      const preceding = before[k + 1]
      if (isNameToken(preceding) || isKeyword(preceding, 'AS')) break
      return { isInSubquery: true, tables: extractSubqueryTables(tokens, offset, options) }
    }
    if (depth === 0 && isKeyword(token, 'SELECT')) sawSelect = true
  }

  return { isInSubquery: false, tables: null }
}

/**
 * Token span of the subquery enclosing `cursorIndex`. An unterminated
 * subquery runs to the end of the stream.
 */
export function findSubqueryBounds(tokens: Token[], cursorIndex: number): SubqueryBounds | null {
  if (tokens.length === 0) return null

  let depth = 0
  let openIndex = -1
  for (let k = Math.min(cursorIndex, tokens.length - 1); k >= 0; k--) {
    const token = tokens[k]
    if (token.kind === 'paren_close') {
      depth++
    } else if (token.kind === 'paren_open') {
      if (depth > 0) {
        depth--
      } else if (isKeyword(nextSignificant(tokens, k), 'SELECT', 'WITH')) {
        openIndex = k
        break
      }
    }
  }
  if (openIndex < 0) return null

  depth = 0
  let closeIndex: number | null = null
  for (let k = openIndex; k < tokens.length; k++) {
    const kind = tokens[k].kind
    if (kind === 'paren_open') depth++
    else if (kind === 'paren_close') {
      depth--
      if (depth === 0) {
        closeIndex = k
        break
      }
    }
  }

  return {
    openIndex,
    closeIndex,
    startOffset: tokens[openIndex].end,
    endOffset: closeIndex !== null ? tokens[closeIndex].start : tokens[tokens.length - 1].end,
  }
}

/**
 * Tables of the subquery around the cursor. The parse strategy re-runs the
 * span through the chunk parser; the scan strategy, and the parse strategy
 * when it finds nothing, reads the FROM list backward then forward.
 */
export function extractSubqueryTables(tokens: Token[], offset: number, options: SubqueryOptions = {}): TableReference[] {
  if ((options.strategy ?? 'parse') === 'parse') {
    const bounds = findSubqueryBounds(tokens, cursorTokenIndex(tokens, offset))
    if (bounds) {
      const text = tokens
        .slice(bounds.openIndex + 1, bounds.closeIndex ?? tokens.length)
        .filter((t) => t.kind !== 'comment')
        .map((t) => t.text)
        .join(' ')
      const parsed = parseChunks(text, { batchSeparator: options.batchSeparator, precise: false })
      if (parsed.chunks.length > 0 && parsed.chunks[0].tables.length > 0) return parsed.chunks[0].tables
    }
  }

  const backward = extractTablesBackward(tokens, offset, options.window)
  return backward.length > 0 ? backward : extractTablesForward(tokens, offset)
}

/**
 * Read the FROM list between the nearest preceding FROM and the cursor,
 * staying inside the current paren group.
 */
export function extractTablesBackward(tokens: Token[], offset: number, window = DEFAULT_SUBQUERY_WINDOW): TableReference[] {
  const before = tokensBeforeCursor(tokens, offset, window)
  let depth = 0

  for (let k = 0; k < before.length; k++) {
    const token = before[k]
    if (token.kind === 'paren_close') {
      depth++
      continue
    }
    if (token.kind === 'paren_open') {
      if (depth > 0) depth--
      continue
    }
    if (depth > 0) continue
    if (token.kind === 'semicolon' || token.kind === 'batch_separator' || isKeyword(token, 'SELECT')) return []
    if (isKeyword(token, 'FROM')) return readTableList(before.slice(0, k).reverse())
  }
  return []
}

/**
 * For `(SELECT | FROM t)`: read the FROM list that follows the cursor, up to
 * the end of the group.
 */
export function extractTablesForward(tokens: Token[], offset: number): TableReference[] {
  const significant = tokens.filter((t) => t.kind !== 'comment')
  let depth = 0

  for (let k = cursorTokenIndex(significant, offset) + 1; k < significant.length; k++) {
    const token = significant[k]
    if (token.kind === 'paren_open') {
      depth++
    } else if (token.kind === 'paren_close') {
      if (depth === 0) return []
      depth--
    } else if (depth === 0 && (token.kind === 'semicolon' || token.kind === 'batch_separator')) {
      return []
    } else if (depth === 0 && isKeyword(token, 'FROM')) {
      return readTableList(significant, k + 1)
    }
  }
  return []
}
