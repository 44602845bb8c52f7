import type { CursorPosition } from './types'

/**
 * Thrown when a caller passes a cursor that does not lie inside the buffer.
 * Malformed SQL never throws; only a broken caller contract does.
 */
export class CursorOutOfRangeError extends Error {
  readonly cursor: CursorPosition
  readonly lineCount: number

  constructor(cursor: CursorPosition, lineCount: number) {
    super(`Cursor ${cursor.line}:${cursor.column} is outside the buffer (${lineCount} lines)`)
    this.name = 'CursorOutOfRangeError'
    this.cursor = cursor
    this.lineCount = lineCount
  }
}
