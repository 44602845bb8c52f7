// tests/sql-autocomplete/tokenizer.test.ts

import { describe, it, expect } from 'vitest'
import {
  tokenize,
  offsetToPosition,
  positionToOffset,
  getPartialPrefix,
  isInsideStringOrComment,
  tokensBeforeCursor,
} from '../../src/lib/sql/autocomplete/tokenizer'
import { CursorOutOfRangeError } from '../../src/lib/sql/autocomplete/errors'
import type { TokenKind } from '../../src/lib/sql/autocomplete/types'
import { withCursor } from './cursor'

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface TokenizeTestCase {
  name: string
  sql: string
  expected: Array<[TokenKind, string]>
}

interface PartialPrefixTestCase {
  name: string
  sql: string // | marks cursor
  expected: string | null
}

interface StringCommentTestCase {
  name: string
  sql: string // | marks cursor
  expected: boolean
}

// ============================================================================
// TEST DATA
// ============================================================================

const tokenizeTests: TokenizeTestCase[] = [
  {
    name: 'keeps bracket quotes in the raw text',
    sql: 'SELECT [My Table].[My Col] FROM t',
    expected: [
      ['keyword', 'SELECT'],
      ['quoted_identifier', '[My Table]'],
      ['dot', '.'],
      ['quoted_identifier', '[My Col]'],
      ['keyword', 'FROM'],
      ['identifier', 't'],
    ],
  },
  {
    name: 'reads variables and temp tables',
    sql: 'SELECT @id, @@ROWCOUNT FROM #tmp JOIN ##shared',
    expected: [
      ['keyword', 'SELECT'],
      ['variable', '@id'],
      ['comma', ','],
      ['variable', '@@ROWCOUNT'],
      ['keyword', 'FROM'],
      ['temp_table', '#tmp'],
      ['keyword', 'JOIN'],
      ['temp_table', '##shared'],
    ],
  },
  {
    name: 'reads national strings with doubled quotes',
    sql: "SELECT N'it''s', 'x'",
    expected: [
      ['keyword', 'SELECT'],
      ['string', "N'it''s'"],
      ['comma', ','],
      ['string', "'x'"],
    ],
  },
  {
    name: 'nests block comments',
    sql: 'SELECT /* a /* b */ c */ 1 -- tail',
    expected: [
      ['keyword', 'SELECT'],
      ['comment', '/* a /* b */ c */'],
      ['number', '1'],
      ['comment', '-- tail'],
    ],
  },
  {
    name: 'reads two-character operators and number forms',
    sql: 'WHERE a <> 0x1F AND b >= 1.5e3',
    expected: [
      ['keyword', 'WHERE'],
      ['identifier', 'a'],
      ['operator', '<>'],
      ['number', '0x1F'],
      ['keyword', 'AND'],
      ['identifier', 'b'],
      ['operator', '>='],
      ['number', '1.5e3'],
    ],
  },
  {
    name: 'reads stars, double-quoted names and semicolons',
    sql: 'SELECT t.* FROM "Order" o;',
    expected: [
      ['keyword', 'SELECT'],
      ['identifier', 't'],
      ['dot', '.'],
      ['star', '*'],
      ['keyword', 'FROM'],
      ['quoted_identifier', '"Order"'],
      ['identifier', 'o'],
      ['semicolon', ';'],
    ],
  },
  {
    name: 'treats GO alone on its line as a batch separator',
    sql: 'SELECT 1\nGO\nSELECT 2',
    expected: [
      ['keyword', 'SELECT'],
      ['number', '1'],
      ['batch_separator', 'GO'],
      ['keyword', 'SELECT'],
      ['number', '2'],
    ],
  },
  {
    name: 'allows a repeat count and comment after GO',
    sql: 'SELECT 1\nGO 3 -- twice\n',
    expected: [
      ['keyword', 'SELECT'],
      ['number', '1'],
      ['batch_separator', 'GO'],
      ['number', '3'],
      ['comment', '-- twice'],
    ],
  },
  {
    name: 'treats GO inside a line as an identifier',
    sql: 'SELECT go FROM t',
    expected: [
      ['keyword', 'SELECT'],
      ['identifier', 'go'],
      ['keyword', 'FROM'],
      ['identifier', 't'],
    ],
  },
  {
    name: 'runs an unterminated bracket to the end',
    sql: 'SELECT [My Tab',
    expected: [
      ['keyword', 'SELECT'],
      ['quoted_identifier', '[My Tab'],
    ],
  },
]

const partialPrefixTests: PartialPrefixTestCase[] = [
  { name: 'returns the typed fragment', sql: 'SELECT us|', expected: 'us' },
  { name: 'returns the fragment after a qualifier', sql: 'SELECT u.na|', expected: 'na' },
  { name: 'strips an unterminated bracket', sql: 'SELECT [My Co|', expected: 'My Co' },
  { name: 'returns the part before the cursor only', sql: 'SELECT us|ername', expected: 'us' },
  { name: 'returns null after whitespace', sql: 'SELECT |', expected: null },
  { name: 'returns null right after a dot', sql: 'SELECT u.|', expected: null },
]

const stringCommentTests: StringCommentTestCase[] = [
  { name: 'inside an unterminated string', sql: "SELECT 'abc|", expected: true },
  { name: 'inside a closed string', sql: "SELECT 'a|bc'", expected: true },
  { name: 'right after a closed string', sql: "SELECT 'abc'|", expected: false },
  { name: 'at the end of a line comment', sql: 'SELECT 1 -- note|', expected: true },
  { name: 'right after a closed block comment', sql: 'SELECT /* x */|', expected: false },
  { name: 'inside an unclosed block comment', sql: 'SELECT /* x |', expected: true },
  { name: 'after an identifier', sql: 'SELECT a|', expected: false },
]

// ============================================================================
// TEST RUNNER
// ============================================================================

describe('tokenizer', () => {
  describe('tokenize', () => {
    for (const tc of tokenizeTests) {
      it(tc.name, () => {
        const tokens = tokenize(tc.sql)
        expect(tokens.map((t) => [t.kind, t.text])).toEqual(tc.expected)
      })
    }

    it('records 1-indexed line and column with 0-indexed offsets', () => {
      const tokens = tokenize('SELECT a\n  FROM t')
      expect(tokens[2]).toEqual({ kind: 'keyword', text: 'FROM', line: 2, column: 3, start: 11, end: 15 })
    })

    it('uses the configured batch separator word', () => {
      expect(tokenize('SELECT 1\nGO\n', { batchSeparator: 'BATCH' }).map((t) => t.kind)).toEqual([
        'keyword',
        'number',
        'identifier',
      ])
      expect(tokenize('SELECT 1\nbatch', { batchSeparator: 'BATCH' }).map((t) => t.kind)).toEqual([
        'keyword',
        'number',
        'batch_separator',
      ])
    })

    it('never fails on stray characters', () => {
      expect(tokenize('SELECT ~ ? $').map((t) => t.kind)).toEqual(['keyword', 'operator', 'operator', 'operator'])
    })

    it('returns no tokens for empty input', () => {
      expect(tokenize('')).toEqual([])
    })
  })

  describe('positions', () => {
    const sql = 'SELECT 1\nFROM t'

    it('converts a cursor to an offset', () => {
      expect(positionToOffset(sql, { line: 1, column: 1 })).toBe(0)
      expect(positionToOffset(sql, { line: 2, column: 1 })).toBe(9)
      expect(positionToOffset(sql, { line: 2, column: 7 })).toBe(15)
    })

    it('converts an offset to a cursor', () => {
      expect(offsetToPosition(sql, 11)).toEqual({ line: 2, column: 3 })
      expect(offsetToPosition(sql, 8)).toEqual({ line: 1, column: 9 })
    })

    it('accepts the insertion point of an empty buffer', () => {
      expect(positionToOffset('', { line: 1, column: 1 })).toBe(0)
    })

    it('rejects a column past the end of the line', () => {
      expect(() => positionToOffset(sql, { line: 2, column: 8 })).toThrow(CursorOutOfRangeError)
      expect(() => positionToOffset(sql, { line: 1, column: 10 })).toThrow(CursorOutOfRangeError)
    })

    it('rejects a line outside the buffer', () => {
      expect(() => positionToOffset(sql, { line: 0, column: 1 })).toThrow(CursorOutOfRangeError)
      expect(() => positionToOffset('SELECT 1', { line: 2, column: 1 })).toThrow(
        'Cursor 2:1 is outside the buffer (1 lines)'
      )
    })
  })

  describe('getPartialPrefix', () => {
    for (const tc of partialPrefixTests) {
      it(tc.name, () => {
        const { tokens, offset } = withCursor(tc.sql)
        expect(getPartialPrefix(tokens, offset)).toBe(tc.expected)
      })
    }
  })

  describe('isInsideStringOrComment', () => {
    for (const tc of stringCommentTests) {
      it(tc.name, () => {
        const { tokens, offset } = withCursor(tc.sql)
        expect(isInsideStringOrComment(tokens, offset)).toBe(tc.expected)
      })
    }
  })

  describe('tokensBeforeCursor', () => {
    it('returns the most recent tokens first and skips comments', () => {
      const { tokens, offset } = withCursor('SELECT a /* c */ FROM |')
      expect(tokensBeforeCursor(tokens, offset, 2).map((t) => t.text)).toEqual(['FROM', 'a'])
    })
  })
})
