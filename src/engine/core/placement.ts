import { cellAt, inBounds, setCell } from "./board";
import { normalizeRotation } from "./pieces";
import { pieceCells } from "./piece";
import {
  type ActivePiece,
  type Board,
  type CellValue,
  type Coord,
  EMPTY_CELL,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

// Collision is always judged against settled geometry. The live piece is
// drawn in the board, so queries lift it out first and put it back after.

function writeCells(
  board: Board,
  cells: ReadonlyArray<Coord>,
  value: CellValue,
): void {
  for (const coord of cells) setCell(board, coord, value);
}

function fits(board: Board, cells: ReadonlyArray<Coord>): boolean {
  for (const coord of cells) {
    if (!inBounds(board, coord) || cellAt(board, coord) !== 0) return false;
  }
  return true;
}

function withPieceLifted(
  board: Board,
  piece: ActivePiece,
  check: () => boolean,
): boolean {
  const current = pieceCells(piece);
  writeCells(board, current, EMPTY_CELL);
  const ok = check();
  // Restore unconditionally, whatever the verdict
  writeCells(board, current, piece.color);
  return ok;
}

/** Would the piece fit after shifting by (rowDelta, colDelta)? */
export function canPlace(
  board: Board,
  piece: ActivePiece,
  rowDelta: number,
  colDelta: number,
): boolean {
  return withPieceLifted(board, piece, () =>
    fits(board, pieceCells(piece, rowDelta, colDelta)),
  );
}

/** Would the piece fit after turning `rotationDelta` states (+1 = clockwise)? */
export function canRotate(
  board: Board,
  piece: ActivePiece,
  rotationDelta: number,
): boolean {
  return withPieceLifted(board, piece, () =>
    fits(board, pieceCells(piece, 0, 0, rotationDelta)),
  );
}

/** Only valid after {@link canPlace} returned true for the same deltas. */
export function commitMove(
  board: Board,
  piece: ActivePiece,
  rowDelta: number,
  colDelta: number,
): void {
  writeCells(board, pieceCells(piece), EMPTY_CELL);
  piece.row = createGridCoord(gridCoordAsNumber(piece.row) + rowDelta);
  piece.col = createGridCoord(gridCoordAsNumber(piece.col) + colDelta);
  writeCells(board, pieceCells(piece), piece.color);
}

/** Only valid after {@link canRotate} returned true for the same delta. */
export function commitRotate(
  board: Board,
  piece: ActivePiece,
  rotationDelta: number,
): void {
  writeCells(board, pieceCells(piece), EMPTY_CELL);
  piece.rotation = normalizeRotation(piece.kind, piece.rotation + rotationDelta);
  writeCells(board, pieceCells(piece), piece.color);
}

// Query-then-commit; false means nothing changed
export function tryMove(
  board: Board,
  piece: ActivePiece,
  rowDelta: number,
  colDelta: number,
): boolean {
  if (!canPlace(board, piece, rowDelta, colDelta)) return false;
  commitMove(board, piece, rowDelta, colDelta);
  return true;
}

export function tryRotate(
  board: Board,
  piece: ActivePiece,
  rotationDelta: number,
): boolean {
  if (!canRotate(board, piece, rotationDelta)) return false;
  commitRotate(board, piece, rotationDelta);
  return true;
}

/** Move down until blocked; returns the number of rows travelled. */
export function dropToBottom(board: Board, piece: ActivePiece): number {
  let distance = 0;
  while (tryMove(board, piece, 1, 0)) distance++;
  return distance;
}

/** Legality of a piece that is not yet drawn in the board. */
export function canSpawn(board: Board, piece: ActivePiece): boolean {
  return fits(board, pieceCells(piece));
}

/** Draw a freshly spawned piece. Only valid after {@link canSpawn}. */
export function stampPiece(board: Board, piece: ActivePiece): void {
  writeCells(board, pieceCells(piece), piece.color);
}
