import {
  type Board,
  type CellValue,
  type Coord,
  INVISIBLE_ROWS,
  createBoardCells,
  createCellValue,
} from "./types";

export function createEmptyBoard(height: number, width: number): Board {
  const totalHeight = height + INVISIBLE_ROWS;
  return {
    cells: createBoardCells(totalHeight, width),
    height,
    invisibleRows: INVISIBLE_ROWS,
    totalHeight,
    width,
  };
}

export function inBounds(board: Board, [row, col]: Coord): boolean {
  return row >= 0 && row < board.totalHeight && col >= 0 && col < board.width;
}

// Storage index; callers must have checked bounds
export function idx(board: Board, row: number, col: number): number {
  return row * board.width + col;
}

// Safe indexer with bounds checking
export function idxSafe(board: Board, coord: Coord): number {
  if (!inBounds(board, coord)) {
    throw new Error(
      `idxSafe: out-of-bounds (${String(coord[0])}, ${String(coord[1])})`,
    );
  }
  return idx(board, coord[0], coord[1]);
}

export function cellAt(board: Board, coord: Coord): CellValue {
  return createCellValue(board.cells[idxSafe(board, coord)] ?? 0);
}

/**
 * Write one cell. Only the placement and line-clear engines call this;
 * everything else reads the board.
 */
export function setCell(board: Board, coord: Coord, value: CellValue): void {
  board.cells[idxSafe(board, coord)] = value;
}

export function isRowFull(board: Board, row: number): boolean {
  for (let col = 0; col < board.width; col++) {
    if (cellAt(board, [row, col]) === 0) return false;
  }
  return true;
}

export function clearRow(board: Board, row: number): void {
  const start = idxSafe(board, [row, 0]);
  board.cells.fill(0, start, start + board.width);
}

// Overwrite row `to` with the contents of row `from`
export function copyRow(board: Board, from: number, to: number): void {
  const src = idxSafe(board, [from, 0]);
  const dst = idxSafe(board, [to, 0]);
  board.cells.copyWithin(dst, src, src + board.width);
}

export function countOccupied(board: Board): number {
  let n = 0;
  for (const value of board.cells) {
    if (value !== 0) n++;
  }
  return n;
}

/** Read-only copy of one row, for presentation and tests. */
export function readRow(board: Board, row: number): ReadonlyArray<CellValue> {
  const out: Array<CellValue> = [];
  for (let col = 0; col < board.width; col++) {
    out.push(cellAt(board, [row, col]));
  }
  return out;
}

/** Copies of the visible rows, top to bottom. */
export function visibleRows(
  board: Board,
): ReadonlyArray<ReadonlyArray<CellValue>> {
  const rows: Array<ReadonlyArray<CellValue>> = [];
  for (let row = board.invisibleRows; row < board.totalHeight; row++) {
    rows.push(readRow(board, row));
  }
  return rows;
}
