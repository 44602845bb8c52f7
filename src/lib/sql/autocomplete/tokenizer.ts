/**
 * SQL Tokenizer Module
 *
 * Converts raw SQL into a flat, position-tagged token stream. The lexer never
 * fails: unterminated strings, brackets and comments run to the end of the
 * buffer, and unknown characters become single-character operators.
 */

import keywordData from './data/keywords.json'
import { CursorOutOfRangeError } from './errors'
import type { CursorPosition, Token, TokenKind } from './types'

export const KEYWORDS: ReadonlySet<string> = new Set([
  ...keywordData.statements,
  ...keywordData.clauses,
  ...keywordData.operators,
  ...keywordData.controlFlow,
  ...keywordData.objects,
  ...keywordData.tableHints,
])

export const TABLE_HINTS: ReadonlySet<string> = new Set(keywordData.tableHints)

export interface TokenizeOptions {
  /** Word that ends a batch when it stands alone on its line (default GO) */
  batchSeparator?: string
}

const IDENT_START = /[\p{L}_]/u
const IDENT_PART = /[\p{L}\p{N}_$#@]/u
const DIGIT = /[0-9]/
const HEX_DIGIT = /[0-9a-fA-F]/
const WHITESPACE = /\s/
const SEPARATOR_TAIL = /^[ \t]*(\d+)?[ \t]*(--.*)?\r?$/

const TWO_CHAR_OPERATORS = new Set([
  '<>', '<=', '>=', '!=', '!<', '!>', '::', '||', '+=', '-=', '/=', '%=', '&=', '|=', '^=',
])

const PUNCTUATION: Record<string, TokenKind> = {
  '.': 'dot',
  ',': 'comma',
  ';': 'semicolon',
  '(': 'paren_open',
  ')': 'paren_close',
  '*': 'star',
}

// ============================================================================
// POSITIONS
// ============================================================================

export function computeLineStarts(sql: string): number[] {
  const starts = [0]
  for (let i = 0; i < sql.length; i++) {
    if (sql[i] === '\n') starts.push(i + 1)
  }
  return starts
}

function positionAt(lineStarts: number[], offset: number): CursorPosition {
  let lo = 0
  let hi = lineStarts.length - 1
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1
    if (lineStarts[mid] <= offset) lo = mid
    else hi = mid - 1
  }
  return { line: lo + 1, column: offset - lineStarts[lo] + 1 }
}

/**
 * Convert a 0-indexed offset to a 1-indexed line/column position.
 */
export function offsetToPosition(sql: string, offset: number): CursorPosition {
  return positionAt(computeLineStarts(sql), Math.max(0, Math.min(offset, sql.length)))
}

/**
 * Convert a cursor position to an offset.
 * Throws CursorOutOfRangeError when the position is not inside the buffer.
 */
export function positionToOffset(sql: string, cursor: CursorPosition): number {
  const lineStarts = computeLineStarts(sql)
  if (!Number.isInteger(cursor.line) || !Number.isInteger(cursor.column)) {
    throw new CursorOutOfRangeError(cursor, lineStarts.length)
  }
  if (cursor.line < 1 || cursor.line > lineStarts.length || cursor.column < 1) {
    throw new CursorOutOfRangeError(cursor, lineStarts.length)
  }
  const lineStart = lineStarts[cursor.line - 1]
  const lineEnd = cursor.line < lineStarts.length ? lineStarts[cursor.line] - 1 : sql.length
  if (cursor.column > lineEnd - lineStart + 1) {
    throw new CursorOutOfRangeError(cursor, lineStarts.length)
  }
  return lineStart + cursor.column - 1
}

// ============================================================================
// SCANNERS
// ============================================================================

interface ScanResult {
  end: number
  closed: boolean
}

/** Scan a quoted run starting at the opening quote. A doubled closer is an escape. */
function scanQuoted(text: string, open: number, closer: string): ScanResult {
  let j = open + 1
  while (j < text.length) {
    if (text[j] === closer) {
      if (text[j + 1] === closer) {
        j += 2
        continue
      }
      return { end: j + 1, closed: true }
    }
    j++
  }
  return { end: text.length, closed: false }
}

/** Block comments nest. */
function scanBlockComment(text: string, open: number): ScanResult {
  let depth = 0
  let j = open
  while (j < text.length) {
    if (text[j] === '/' && text[j + 1] === '*') {
      depth++
      j += 2
    } else if (text[j] === '*' && text[j + 1] === '/') {
      depth--
      j += 2
      if (depth === 0) return { end: j, closed: true }
    } else {
      j++
    }
  }
  return { end: text.length, closed: false }
}

function scanLineEnd(text: string, start: number): number {
  const newline = text.indexOf('\n', start)
  if (newline === -1) return text.length
  return text[newline - 1] === '\r' ? newline - 1 : newline
}

function scanWord(text: string, start: number): number {
  let j = start
  while (j < text.length && IDENT_PART.test(text[j])) j++
  return j
}

function scanNumber(text: string, start: number): number {
  let j = start
  if (text[j] === '0' && (text[j + 1] === 'x' || text[j + 1] === 'X')) {
    j += 2
    while (j < text.length && HEX_DIGIT.test(text[j])) j++
    return j
  }
  while (j < text.length && DIGIT.test(text[j])) j++
  if (text[j] === '.' && DIGIT.test(text[j + 1] ?? '')) {
    j++
    while (j < text.length && DIGIT.test(text[j])) j++
  }
  if ((text[j] === 'e' || text[j] === 'E') && /[0-9+-]/.test(text[j + 1] ?? '')) {
    j += 2
    while (j < text.length && DIGIT.test(text[j])) j++
  }
  return j
}

function isAloneOnLine(text: string, start: number, end: number): boolean {
  for (let j = start - 1; j >= 0 && text[j] !== '\n'; j--) {
    if (text[j] !== ' ' && text[j] !== '\t') return false
  }
  const newline = text.indexOf('\n', end)
  const tail = text.slice(end, newline === -1 ? text.length : newline)
  return SEPARATOR_TAIL.test(tail)
}

// ============================================================================
// TOKENIZER
// ============================================================================

/**
 * Tokenize SQL. Whitespace is not emitted; gaps are recoverable from offsets.
 */
export function tokenize(sql: string, options: TokenizeOptions = {}): Token[] {
  const separator = (options.batchSeparator ?? 'GO').toUpperCase()
  const lineStarts = computeLineStarts(sql)
  const tokens: Token[] = []

  const push = (kind: TokenKind, start: number, end: number) => {
    const { line, column } = positionAt(lineStarts, start)
    tokens.push({ kind, text: sql.slice(start, end), line, column, start, end })
  }

  let i = 0
  while (i < sql.length) {
    const ch = sql[i]
    const next = sql[i + 1] ?? ''
    const start = i

    if (WHITESPACE.test(ch)) {
      i++
      continue
    }

    if (ch === '-' && next === '-') {
      i = scanLineEnd(sql, i)
      push('comment', start, i)
      continue
    }

    if (ch === '/' && next === '*') {
      i = scanBlockComment(sql, i).end
      push('comment', start, i)
      continue
    }

    if ((ch === 'N' || ch === 'n') && next === "'") {
      i = scanQuoted(sql, i + 1, "'").end
      push('string', start, i)
      continue
    }

    if (ch === "'") {
      i = scanQuoted(sql, i, "'").end
      push('string', start, i)
      continue
    }

    if (ch === '[' || ch === '"' || ch === '`') {
      i = scanQuoted(sql, i, ch === '[' ? ']' : ch).end
      push('quoted_identifier', start, i)
      continue
    }

    if (DIGIT.test(ch)) {
      i = scanNumber(sql, i)
      push('number', start, i)
      continue
    }

    if (ch === '@' || ch === '#') {
      const nameStart = next === ch ? i + 2 : i + 1
      const end = scanWord(sql, nameStart)
      if (end > nameStart) {
        i = end
        push(ch === '@' ? 'variable' : 'temp_table', start, i)
      } else {
        i++
        push('operator', start, i)
      }
      continue
    }

    if (IDENT_START.test(ch)) {
      i = scanWord(sql, i)
      const upper = sql.slice(start, i).toUpperCase()
      if (upper === separator && isAloneOnLine(sql, start, i)) {
        push('batch_separator', start, i)
      } else {
        push(KEYWORDS.has(upper) ? 'keyword' : 'identifier', start, i)
      }
      continue
    }

    const punctuation = PUNCTUATION[ch]
    if (punctuation) {
      i++
      push(punctuation, start, i)
      continue
    }

    i += TWO_CHAR_OPERATORS.has(sql.slice(i, i + 2)) ? 2 : 1
    push('operator', start, i)
  }

  return tokens
}

// ============================================================================
// TOKEN HELPERS
// ============================================================================

export function isNameToken(token: Token | undefined): token is Token & { kind: 'identifier' | 'quoted_identifier' } {
  return token !== undefined && (token.kind === 'identifier' || token.kind === 'quoted_identifier')
}

export function isKeyword(token: Token | undefined, ...words: string[]): boolean {
  if (!token || token.kind !== 'keyword') return false
  return words.length === 0 || words.includes(token.text.toUpperCase())
}

/**
 * Strip [], "" or `` quoting, undoing doubled-closer escapes.
 * An unterminated quote loses only its opener.
 */
export function stripQuotes(text: string): string {
  const open = text[0]
  const closer = open === '[' ? ']' : open === '"' || open === '`' ? open : null
  if (!closer) return text
  const inner = text.length > 1 && text.endsWith(closer) ? text.slice(1, -1) : text.slice(1)
  return inner.split(closer + closer).join(closer)
}

/**
 * Tokens whose start lies strictly before the cursor, most recent first,
 * comments skipped.
 */
export function tokensBeforeCursor(tokens: Token[], offset: number, limit = Number.POSITIVE_INFINITY): Token[] {
  const result: Token[] = []
  for (let k = cursorTokenIndex(tokens, offset); k >= 0 && result.length < limit; k--) {
    if (tokens[k].kind !== 'comment') result.push(tokens[k])
  }
  return result
}

/**
 * Index of the last token starting before the cursor, or -1.
 */
export function cursorTokenIndex(tokens: Token[], offset: number): number {
  let lo = 0
  let hi = tokens.length - 1
  let found = -1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    if (tokens[mid].start < offset) {
      found = mid
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }
  return found
}

/**
 * The token the cursor is inside or touching from the right.
 */
export function tokenAtCursor(tokens: Token[], offset: number): Token | null {
  const index = cursorTokenIndex(tokens, offset)
  if (index < 0) return null
  const token = tokens[index]
  return offset <= token.end ? token : null
}

function isClosed(token: Token): boolean {
  if (token.kind === 'string') {
    const open = token.text.indexOf("'")
    return scanQuoted(token.text, open, "'").closed
  }
  if (token.text.startsWith('/*')) {
    return scanBlockComment(token.text, 0).closed
  }
  // Line comments stay open until the newline
  return false
}

/**
 * Check if cursor is inside a string literal or comment.
 */
export function isInsideStringOrComment(tokens: Token[], offset: number): boolean {
  const token = tokenAtCursor(tokens, offset)
  if (!token || (token.kind !== 'string' && token.kind !== 'comment')) return false
  if (offset < token.end) return true
  return !isClosed(token)
}

/**
 * The identifier fragment typed immediately before the cursor, quotes stripped.
 */
export function getPartialPrefix(tokens: Token[], offset: number): string | null {
  const token = tokenAtCursor(tokens, offset)
  if (!token) return null
  switch (token.kind) {
    case 'identifier':
    case 'quoted_identifier':
    case 'keyword':
    case 'variable':
    case 'temp_table':
      return stripQuotes(token.text.slice(0, offset - token.start))
    default:
      return null
  }
}
