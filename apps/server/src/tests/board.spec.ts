import { describe, test, expect } from 'vitest'
import { Board, sameCoordinate } from '../board/board.js'

describe('Board', () => {
  test('rejects non-positive or fractional dimensions', () => {
    expect(() => new Board(0, 8)).toThrow(RangeError)
    expect(() => new Board(8, -1)).toThrow(RangeError)
    expect(() => new Board(2.5, 3)).toThrow(RangeError)
  })

  test('create8x8 gives a 64-cell board', () => {
    const board = Board.create8x8()
    expect(board.rows).toBe(8)
    expect(board.columns).toBe(8)
    expect(board.size).toBe(64)
  })

  test('isInside checks bounds and integrality', () => {
    const board = new Board(3, 4)
    expect(board.isInside(0, 0)).toBe(true)
    expect(board.isInside(2, 3)).toBe(true)
    expect(board.isInside(3, 0)).toBe(false)
    expect(board.isInside(0, 4)).toBe(false)
    expect(board.isInside(-1, 0)).toBe(false)
    expect(board.isInside(1.5, 0)).toBe(false)
  })

  test('toIndex and fromIndex are row-major inverses', () => {
    const board = new Board(3, 4)
    expect(board.toIndex(0, 0)).toBe(0)
    expect(board.toIndex(1, 2)).toBe(6)
    expect(board.toIndex(2, 3)).toBe(11)
    expect(board.fromIndex(6)).toEqual({ row: 1, col: 2 })

    for (let index = 0; index < board.size; index++) {
      const { row, col } = board.fromIndex(index)
      expect(board.toIndex(row, col)).toBe(index)
    }
  })

  test('coordinate conversions throw outside the board', () => {
    const board = new Board(3, 3)
    expect(() => board.toIndex(3, 0)).toThrow(RangeError)
    expect(() => board.fromIndex(9)).toThrow(RangeError)
    expect(() => board.fromIndex(-1)).toThrow(RangeError)
    expect(() => board.fromIndex(1.5)).toThrow(RangeError)
  })

  test('allCells yields every cell once in row-major order', () => {
    const board = new Board(2, 3)
    const cells = Array.from(board.allCells())
    expect(cells).toEqual([
      { row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 },
      { row: 1, col: 0 }, { row: 1, col: 1 }, { row: 1, col: 2 },
    ])
    // fresh iteration each call
    expect(Array.from(board.allCells())).toHaveLength(6)
  })

  test('dark squares are the ones with odd row + col', () => {
    const board = Board.create8x8()
    expect(board.isDarkSquare(0, 0)).toBe(false)
    expect(board.isDarkSquare(0, 1)).toBe(true)
    expect(board.isDarkSquare(7, 0)).toBe(true)
    expect(board.isDarkSquare(7, 7)).toBe(false)
    expect(() => board.isDarkSquare(8, 0)).toThrow(RangeError)

    const dark = Array.from(board.allCells()).filter(c => board.isDarkSquare(c.row, c.col))
    expect(dark).toHaveLength(32)
  })

  test('sameCoordinate compares by value', () => {
    expect(sameCoordinate({ row: 1, col: 2 }, { row: 1, col: 2 })).toBe(true)
    expect(sameCoordinate({ row: 1, col: 2 }, { row: 2, col: 1 })).toBe(false)
  })
})
