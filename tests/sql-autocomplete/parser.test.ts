// tests/sql-autocomplete/parser.test.ts

import { describe, it, expect } from 'vitest'
import {
  parseChunks,
  findInnermostChunk,
  getChunkAtPosition,
  getClauseAtPosition,
} from '../../src/lib/sql/autocomplete/parser'
import type { PgQueryParser, StatementKind } from '../../src/lib/sql/autocomplete/types'
import { withCursor } from './cursor'

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface SegmentationTestCase {
  name: string
  sql: string
  expectedKinds: StatementKind[]
}

interface TablesTestCase {
  name: string
  sql: string
  expectedTables: Array<{ table: string; alias: string }>
}

// ============================================================================
// TEST DATA
// ============================================================================

const segmentationTests: SegmentationTestCase[] = [
  {
    name: 'splits statements without semicolons',
    sql: 'SELECT a FROM t\nUPDATE u SET b = 1\nDELETE FROM v',
    expectedKinds: ['SELECT', 'UPDATE', 'DELETE'],
  },
  {
    name: 'keeps INSERT ... SELECT together',
    sql: 'INSERT INTO archive (id, total) SELECT id, total FROM orders',
    expectedKinds: ['INSERT'],
  },
  {
    name: 'keeps UNION operands together',
    sql: 'SELECT a FROM t UNION ALL SELECT a FROM u',
    expectedKinds: ['SELECT'],
  },
  {
    name: 'keeps a CTE with its main query',
    sql: 'WITH c AS (SELECT 1 AS x) SELECT x FROM c',
    expectedKinds: ['SELECT'],
  },
  {
    name: 'keeps MERGE branches together',
    sql: 'MERGE INTO target t USING source s ON t.id = s.id WHEN MATCHED THEN UPDATE SET t.v = s.v WHEN NOT MATCHED THEN INSERT (id, v) VALUES (s.id, s.v);',
    expectedKinds: ['MERGE'],
  },
  {
    name: 'splits on semicolons and batch separators',
    sql: 'SELECT 1; SELECT 2\nGO\nEXEC refresh_totals',
    expectedKinds: ['SELECT', 'SELECT', 'EXEC'],
  },
  {
    name: 'ends a statement at control flow',
    sql: 'SELECT a FROM t\nIF @x = 1\nBEGIN\nDELETE FROM t\nEND',
    expectedKinds: ['SELECT', 'DELETE'],
  },
  {
    name: 'reads CASE ... END inside a statement',
    sql: 'SELECT CASE WHEN a = 1 THEN 2 ELSE 3 END AS b FROM t',
    expectedKinds: ['SELECT'],
  },
  {
    name: 'leaves subqueries of IF unparsed',
    sql: 'IF EXISTS (SELECT 1 FROM t) PRINT 1',
    expectedKinds: [],
  },
]

const tablesTests: TablesTestCase[] = [
  {
    name: 'reads the INSERT target and the SELECT source',
    sql: 'INSERT INTO archive (id, total) SELECT id, total FROM orders',
    expectedTables: [
      { table: 'archive', alias: 'archive' },
      { table: 'orders', alias: 'orders' },
    ],
  },
  {
    name: 'drops an UPDATE target that is a FROM alias',
    sql: 'UPDATE o SET total = 0 FROM orders o WHERE o.id = 1',
    expectedTables: [{ table: 'orders', alias: 'o' }],
  },
  {
    name: 'drops a DELETE target that is a FROM alias',
    sql: 'DELETE o FROM orders o JOIN customers c ON c.id = o.customer_id',
    expectedTables: [
      { table: 'orders', alias: 'o' },
      { table: 'customers', alias: 'c' },
    ],
  },
  {
    name: 'reads the MERGE target and source',
    sql: 'MERGE INTO target t USING source s ON t.id = s.id WHEN MATCHED THEN DELETE;',
    expectedTables: [
      { table: 'target', alias: 't' },
      { table: 'source', alias: 's' },
    ],
  },
  {
    name: 'reads a VALUES source with its alias',
    sql: "SELECT * FROM (VALUES (1, 'a'), (2, 'b')) AS v (id, label)",
    expectedTables: [{ table: 'v', alias: 'v' }],
  },
  {
    name: 'reads a parenthesised join',
    sql: 'SELECT * FROM (a JOIN b ON a.id = b.id) JOIN c ON c.id = a.id',
    expectedTables: [
      { table: 'a', alias: 'a' },
      { table: 'b', alias: 'b' },
      { table: 'c', alias: 'c' },
    ],
  },
]

function mockParser(result: unknown): PgQueryParser {
  return { parseSync: () => result, isLoaded: () => true }
}

const auditTree = {
  stmts: [
    {
      stmt: {
        SelectStmt: {
          fromClause: [{ RangeVar: { relname: 'hidden', schemaname: 'audit', alias: { aliasname: 'h' } } }],
        },
      },
    },
  ],
}

// ============================================================================
// TEST RUNNER
// ============================================================================

describe('chunk parser', () => {
  describe('segmentation', () => {
    for (const tc of segmentationTests) {
      it(tc.name, () => {
        const result = parseChunks(tc.sql)
        expect(result.chunks.map((c) => c.statementKind)).toEqual(tc.expectedKinds)
      })
    }

    it('counts batches', () => {
      const result = parseChunks('SELECT 1\nGO\nSELECT 2')
      expect(result.batchCount).toBe(2)
      expect(result.chunks.map((c) => c.batchIndex)).toEqual([0, 1])
    })

    it('never throws on garbage', () => {
      const result = parseChunks('SELECT FROM WHERE ((( ,, ) ) ) ))) JOIN ON .')
      expect(result.chunks[0].statementKind).toBe('SELECT')
    })
  })

  describe('tables', () => {
    for (const tc of tablesTests) {
      it(tc.name, () => {
        const [chunk] = parseChunks(tc.sql).chunks
        expect(chunk.tables.map((t) => ({ table: t.table, alias: t.alias }))).toEqual(tc.expectedTables)
      })
    }

    it('reads INSERT and MERGE column lists', () => {
      expect(parseChunks('INSERT INTO archive (id, total) SELECT id, total FROM orders').chunks[0].insertColumns).toEqual([
        'id',
        'total',
      ])
      const merge =
        'MERGE INTO target t USING source s ON t.id = s.id WHEN NOT MATCHED THEN INSERT (id, v) VALUES (s.id, s.v);'
      expect(parseChunks(merge).chunks[0].insertColumns).toEqual(['id', 'v'])
    })
  })

  describe('select list', () => {
    it('reads aliases in every form', () => {
      const [chunk] = parseChunks(
        "SELECT o.id, total AS amount, COUNT(*) n, label = name, o.*, 'x' AS [Tag] FROM orders o"
      ).chunks
      expect(chunk.producedColumns).toEqual([
        { name: 'id', source: 'o', isStar: false },
        { name: 'amount', source: null, isStar: false },
        { name: 'n', source: null, isStar: false },
        { name: 'label', source: null, isStar: false },
        { name: '*', source: 'o', isStar: true },
        { name: 'Tag', source: null, isStar: false },
      ])
    })

    it('skips TOP and DISTINCT', () => {
      const [chunk] = parseChunks('SELECT DISTINCT TOP (10) id FROM orders').chunks
      expect(chunk.producedColumns.map((c) => c.name)).toEqual(['id'])
    })
  })

  describe('CTEs', () => {
    it('reads names, declared columns and bodies in order', () => {
      const [chunk] = parseChunks('WITH a AS (SELECT 1 AS x), b (y) AS (SELECT x FROM a) SELECT * FROM b').chunks
      expect(chunk.ctes.map((c) => c.name)).toEqual(['a', 'b'])
      expect(chunk.ctes[1].declaredColumns).toEqual(['y'])
      expect(chunk.ctes[0].body.producedColumns).toEqual([{ name: 'x', source: null, isStar: false }])
      expect(chunk.ctes[1].body.tables.map((t) => t.name)).toEqual(['a'])
      expect(chunk.ctes.map((c) => c.isRecursive)).toEqual([false, false])
    })

    it('marks RECURSIVE CTEs', () => {
      const sql =
        'WITH RECURSIVE tree AS (SELECT id FROM nodes UNION ALL SELECT n.id FROM nodes n JOIN tree t ON n.parent = t.id) SELECT * FROM tree'
      expect(parseChunks(sql).chunks[0].ctes[0].isRecursive).toBe(true)
    })

    it('marks CTEs that refer to themselves across UNION', () => {
      const sql =
        'WITH tree AS (SELECT id FROM nodes UNION ALL SELECT n.id FROM nodes n JOIN tree t ON n.parent = t.id) SELECT * FROM tree'
      const [cte] = parseChunks(sql).chunks[0].ctes
      expect(cte.isRecursive).toBe(true)
      expect(cte.body.subqueries.map((s) => s.role)).toEqual(['set_operand'])
    })
  })

  describe('derived tables', () => {
    it('uses an explicit column list', () => {
      const [chunk] = parseChunks('SELECT * FROM (SELECT a, b FROM t) AS d (x, y)').chunks
      expect(chunk.tables).toEqual([expect.objectContaining({ name: 'd', kind: 'derived', columns: ['x', 'y'] })])
    })

    it('falls back to the produced columns', () => {
      const [chunk] = parseChunks('SELECT * FROM (SELECT a, b AS bee FROM t) d').chunks
      expect(chunk.tables).toEqual([expect.objectContaining({ name: 'd', kind: 'derived', columns: ['a', 'bee'] })])
    })

    it('records star sources', () => {
      const [chunk] = parseChunks('SELECT * FROM (SELECT o.*, c.name FROM orders o JOIN customers c ON 1 = 1) d').chunks
      expect(chunk.tables[0].starSources).toEqual(['orders'])
      expect(chunk.tables[0].columns).toEqual(['name'])
    })
  })

  describe('temp tables', () => {
    it('records creation, columns and drop', () => {
      const sql = 'CREATE TABLE #work (id INT, name VARCHAR(50), PRIMARY KEY (id))\nDROP TABLE #work'
      const { tempTables } = parseChunks(sql)
      expect(tempTables).toEqual([
        {
          name: '#work',
          kind: 'temp_table',
          columns: ['id', 'name'],
          isGlobal: false,
          batchIndex: 0,
          createdAt: 0,
          droppedAt: 64,
        },
      ])
    })

    it('reads IF NOT EXISTS and IF EXISTS', () => {
      const sql = 'CREATE TABLE IF NOT EXISTS #t (id INT)\nDROP TABLE IF EXISTS #t'
      const result = parseChunks(sql)
      expect(result.chunks.map((c) => c.statementKind)).toEqual(['CREATE', 'DROP'])
      expect(result.tempTables).toEqual([
        expect.objectContaining({ name: '#t', columns: ['id'], createdAt: 0, droppedAt: 39 }),
      ])
    })

    it('records table variables', () => {
      const { tempTables } = parseChunks('DECLARE @rows TABLE (id INT, qty INT)')
      expect(tempTables).toEqual([expect.objectContaining({ name: '@rows', kind: 'table_variable', columns: ['id', 'qty'] })])
    })

    it('records SELECT INTO targets with the select list columns', () => {
      const result = parseChunks('SELECT id, total INTO ##snap FROM orders')
      expect(result.tempTables).toEqual([expect.objectContaining({ name: '##snap', columns: ['id', 'total'], isGlobal: true })])
      expect(result.chunks[0].tables.map((t) => t.name)).toEqual(['orders'])
    })

    it('tags definitions with their batch', () => {
      const { tempTables } = parseChunks('SELECT 1\nGO\nCREATE TABLE #late (a INT)')
      expect(tempTables.map((t) => t.batchIndex)).toEqual([1])
    })
  })

  describe('nesting limit', () => {
    it('leaves subqueries past the limit unparsed', () => {
      const { sql, offset } = withCursor('SELECT * FROM (SELECT * FROM (SELECT * FROM (SELECT * FROM t WHERE |) c) b) a')
      const result = parseChunks(sql, { maxNestingDepth: 2 })
      const statement = getChunkAtPosition(result, offset)
      if (!statement) throw new Error('no statement at cursor')
      const path = findInnermostChunk(statement, offset, result.tokens)
      expect(path.map((p) => p.chunk.role)).toEqual(['statement', 'derived', 'derived'])
      expect(path[2].chunk.subqueries).toEqual([])
      expect(path[2].chunk.tables).toEqual([])
      expect(path[1].chunk.tables.map((t) => t.name)).toEqual(['b'])
    })
  })

  describe('positions', () => {
    it('finds the clause at an offset', () => {
      const [chunk] = parseChunks('SELECT a FROM t WHERE b = 1').chunks
      expect(getClauseAtPosition(chunk, 18)).toBe('condition')
      expect(getClauseAtPosition(chunk, 11)).toBe('from')
      expect(getClauseAtPosition(chunk, 3)).toBe('select_list')
    })

    it('walks to the innermost subquery', () => {
      const { sql, offset } = withCursor('SELECT * FROM t WHERE id IN (SELECT id FROM u WHERE |)')
      const result = parseChunks(sql)
      const statement = getChunkAtPosition(result, offset)
      expect(statement).not.toBeNull()
      if (!statement) return
      const path = findInnermostChunk(statement, offset, result.tokens)
      expect(path.map((p) => p.chunk.role)).toEqual(['statement', 'expression'])
      expect(path[1].chunk.tables.map((t) => t.name)).toEqual(['u'])
    })

    it('records which CTE body holds the cursor', () => {
      const { sql, offset } = withCursor('WITH a AS (SELECT 1 AS x), b AS (SELECT | FROM a) SELECT * FROM b')
      const result = parseChunks(sql)
      const statement = getChunkAtPosition(result, offset)
      if (!statement) throw new Error('no statement at cursor')
      expect(findInnermostChunk(statement, offset, result.tokens).map((p) => p.cteIndex)).toEqual([null, 1])
    })

    it('keeps trailing whitespace in the last statement', () => {
      const { sql, offset } = withCursor('SELECT * FROM t   |')
      expect(getChunkAtPosition(parseChunks(sql), offset)?.statementKind).toBe('SELECT')
    })
  })

  describe('precise merge', () => {
    it('is skipped while libpg-query is not loaded', () => {
      const [chunk] = parseChunks('SELECT * FROM t').chunks
      expect(chunk.precise).toBe('skipped')
    })

    it('adds tables the heuristics missed', () => {
      const [chunk] = parseChunks('SELECT * FROM t', { parser: mockParser(auditTree) }).chunks
      expect(chunk.precise).toBe('merged')
      expect(chunk.tables.map((t) => [t.table, t.alias])).toEqual([
        ['t', 't'],
        ['audit.hidden', 'h'],
      ])
    })

    it('keeps the heuristic result when the parser fails', () => {
      const parser: PgQueryParser = {
        parseSync: () => {
          throw new Error('syntax error at end of input')
        },
        isLoaded: () => true,
      }
      const [chunk] = parseChunks('SELECT * FROM t WHERE', { parser }).chunks
      expect(chunk.precise).toBe('failed')
      expect(chunk.tables.map((t) => t.table)).toEqual(['t'])
    })

    it('can be turned off', () => {
      const [chunk] = parseChunks('SELECT * FROM t', { parser: mockParser(auditTree), precise: false }).chunks
      expect(chunk.precise).toBe('skipped')
      expect(chunk.tables.map((t) => t.table)).toEqual(['t'])
    })
  })
})
