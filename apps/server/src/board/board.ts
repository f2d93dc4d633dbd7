export interface Coordinate {
  row: number
  col: number
}

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col
}

/**
 * Rectangular coordinate space shared by the grid games.
 * Immutable once constructed; every coordinate operation rejects
 * positions outside the board with a RangeError.
 */
export class Board {
  readonly rows: number
  readonly columns: number

  constructor(rows: number, columns: number) {
    if (!Number.isInteger(rows) || rows <= 0) {
      throw new RangeError(`rows must be a positive integer, got ${rows}`)
    }
    if (!Number.isInteger(columns) || columns <= 0) {
      throw new RangeError(`columns must be a positive integer, got ${columns}`)
    }
    this.rows = rows
    this.columns = columns
  }

  static create8x8(): Board {
    return new Board(8, 8)
  }

  get size(): number {
    return this.rows * this.columns
  }

  isInside(row: number, col: number): boolean {
    return Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.rows && col >= 0 && col < this.columns
  }

  toIndex(row: number, col: number): number {
    this.assertInside(row, col)
    return row * this.columns + col
  }

  fromIndex(index: number): Coordinate {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} is outside the board`)
    }
    return {
      row: Math.floor(index / this.columns),
      col: index % this.columns
    }
  }

  // Row-major; each call starts a fresh iteration
  *allCells(): Generator<Coordinate> {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.columns; col++) {
        yield { row, col }
      }
    }
  }

  // (0,0) is light, (0,1) dark
  isDarkSquare(row: number, col: number): boolean {
    this.assertInside(row, col)
    return (row + col) % 2 === 1
  }

  private assertInside(row: number, col: number): void {
    if (!this.isInside(row, col)) {
      throw new RangeError(`Cell (${row},${col}) is outside the board`)
    }
  }
}
