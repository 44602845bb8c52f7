/**
 * Table Reference Reader
 *
 * Forward reader for `name [AS] alias` entries in FROM/JOIN lists. Shared by
 * the chunk parser and the subquery scanner so both produce the same
 * TableReference shape.
 */

import { TABLE_HINTS, isKeyword, isNameToken, stripQuotes } from './tokenizer'
import type { TableKind, TableReference, Token } from './types'

const LIST_TERMINATORS = new Set([
  'WHERE', 'GROUP', 'ORDER', 'HAVING', 'UNION', 'EXCEPT', 'INTERSECT', 'OPTION', 'LIMIT',
  'OFFSET', 'FETCH', 'WINDOW', 'INTO', 'SELECT', 'SET', 'OUTPUT', 'RETURNING', 'WHEN', 'FOR',
])

export function makeTableReference(parts: string[], alias: string | null, kind: TableKind): TableReference {
  const name = parts[parts.length - 1] ?? ''
  const schema = parts.length >= 2 ? parts[parts.length - 2] || null : null
  const database = parts.length >= 3 ? parts[parts.length - 3] || null : null
  return {
    table: parts.join('.'),
    name,
    schema,
    database,
    alias: alias ?? name,
    kind,
    columns: null,
    starSources: [],
  }
}

/**
 * Index of the paren closing the one at `open`, or `end` when unterminated.
 */
export function findClosingParen(tokens: Token[], open: number, end = tokens.length): number {
  let depth = 0
  for (let k = open; k < end; k++) {
    const kind = tokens[k].kind
    if (kind === 'paren_open') depth++
    else if (kind === 'paren_close') {
      depth--
      if (depth === 0) return k
    }
  }
  return end
}

export interface ObjectName {
  parts: string[]
  next: number
}

/**
 * Read `a`, `a.b`, `a.b.c` or `db..table` starting at `index`.
 */
export function readObjectName(tokens: Token[], index: number, end = tokens.length): ObjectName | null {
  const first = tokens[index]
  if (index >= end || !isNameToken(first)) return null

  const parts = [stripQuotes(first.text)]
  let i = index + 1
  while (i < end && tokens[i].kind === 'dot') {
    const after = tokens[i + 1]
    if (i + 1 < end && after.kind === 'dot') {
      parts.push('')
      i++
    } else if (i + 1 < end && isNameToken(after)) {
      parts.push(stripQuotes(after.text))
      i += 2
    } else {
      // Trailing dot while the next part is being typed
      i++
      break
    }
  }
  return { parts, next: i }
}

function isHintGroup(tokens: Token[], open: number, end: number): boolean {
  const inner = tokens[open + 1]
  return open + 1 < end && inner !== undefined && TABLE_HINTS.has(inner.text.toUpperCase())
}

/** Skip `WITH (NOLOCK)` and bare `(NOLOCK)` hint groups. */
function skipHints(tokens: Token[], index: number, end: number): number {
  let i = index
  for (;;) {
    if (isKeyword(tokens[i], 'WITH') && tokens[i + 1]?.kind === 'paren_open' && i + 1 < end) {
      i = Math.min(findClosingParen(tokens, i + 1, end) + 1, end)
    } else if (tokens[i]?.kind === 'paren_open' && i < end && isHintGroup(tokens, i, end)) {
      i = Math.min(findClosingParen(tokens, i, end) + 1, end)
    } else {
      return i
    }
  }
}

export interface AliasRead {
  alias: string | null
  next: number
}

/**
 * Read an optional `[AS] alias`. Keywords are never aliases.
 */
export function readAlias(tokens: Token[], index: number, end = tokens.length): AliasRead {
  let i = index
  const hasAs = isKeyword(tokens[i], 'AS') && i < end
  if (hasAs) i++
  const token = tokens[i]
  if (i < end && (isNameToken(token) || (hasAs && token?.kind === 'string'))) {
    const text = token.kind === 'string' ? token.text.slice(1, -1) : stripQuotes(token.text)
    return { alias: text, next: i + 1 }
  }
  return { alias: null, next: i }
}

/**
 * Read a parenthesised list such as `(a, b, c)` or `(id INT, name VARCHAR(50))`,
 * keeping the leading name of each entry. Entries that open with a keyword
 * (PRIMARY KEY, CONSTRAINT, INDEX) are skipped.
 */
export function readNameList(tokens: Token[], open: number, end = tokens.length): { names: string[]; next: number } {
  const close = findClosingParen(tokens, open, end)
  const names: string[] = []
  let depth = 0
  let atEntryStart = true
  for (let k = open + 1; k < close; k++) {
    const token = tokens[k]
    if (depth === 0 && token.kind === 'comma') {
      atEntryStart = true
      continue
    }
    if (depth === 0 && atEntryStart && isNameToken(token)) {
      names.push(stripQuotes(token.text))
    }
    atEntryStart = false
    if (token.kind === 'paren_open') depth++
    else if (token.kind === 'paren_close') depth--
  }
  return { names, next: Math.min(close + 1, end) }
}

export interface TableRead {
  ref: TableReference
  next: number
}

/**
 * Read one table entry: a table, temp table, table variable or table-valued
 * function, followed by an optional alias and hints. With `allowFunction`
 * off, `name (` stops before the paren (an INSERT column list).
 */
export function readTableReference(
  tokens: Token[],
  index: number,
  end = tokens.length,
  allowFunction = true
): TableRead | null {
  const first = tokens[index]
  if (index >= end || !first) return null

  let parts: string[]
  let kind: TableKind
  let i: number

  if (first.kind === 'variable' || first.kind === 'temp_table') {
    parts = [first.text]
    kind = first.kind === 'variable' ? 'table_variable' : 'temp_table'
    i = index + 1
  } else {
    const objectName = readObjectName(tokens, index, end)
    if (!objectName) return null
    parts = objectName.parts
    kind = 'table'
    i = objectName.next
    if (allowFunction && tokens[i]?.kind === 'paren_open' && i < end && !isHintGroup(tokens, i, end)) {
      kind = 'function'
      i = Math.min(findClosingParen(tokens, i, end) + 1, end)
    }
  }

  i = skipHints(tokens, i, end)
  const aliasRead = readAlias(tokens, i, end)
  i = skipHints(tokens, aliasRead.next, end)

  return { ref: makeTableReference(parts, aliasRead.alias, kind), next: i }
}

/**
 * Read a FROM list such as `a x, b JOIN c z ON x.id = z.id`, preserving order.
 * ON conditions and parenthesised groups are skipped.
 */
export function readTableList(tokens: Token[], start = 0, end = tokens.length): TableReference[] {
  const tables: TableReference[] = []
  let i = start
  let expectTable = true

  while (i < end) {
    const token = tokens[i]

    if (expectTable) {
      expectTable = false
      const read = readTableReference(tokens, i, end)
      if (read) {
        tables.push(read.ref)
        i = read.next
        continue
      }
    }

    if (token.kind === 'paren_open') {
      i = Math.min(findClosingParen(tokens, i, end) + 1, end)
      continue
    }
    if (token.kind === 'paren_close' || token.kind === 'semicolon') break
    if (token.kind === 'comma') expectTable = true
    if (isKeyword(token, 'JOIN', 'APPLY')) expectTable = true
    if (token.kind === 'keyword' && LIST_TERMINATORS.has(token.text.toUpperCase())) break
    i++
  }

  return tables
}
