import { clearRow, copyRow, isRowFull } from "../core/board";
import { pieceRowSpan } from "../core/piece";

import type { ActivePiece, Board } from "../core/types";

/**
 * Full rows among those the landed piece spans, lowest row first.
 * Nothing else can have filled up since the previous landing.
 */
export function findFullRows(
  board: Board,
  landed: ActivePiece,
): ReadonlyArray<number> {
  const [top, bottom] = pieceRowSpan(landed);
  const rows: Array<number> = [];
  for (let row = bottom; row >= top; row--) {
    if (isRowFull(board, row)) rows.push(row);
  }
  return rows;
}

/**
 * Remove `rows` and let everything above fall, in place.
 *
 * Walks up from the lowest removed row; each row takes the nearest row above
 * it that is neither being removed nor already used as a source, or is
 * emptied when no such row is left. Buffer rows shift like any other; the
 * top row is cleared at the end since nothing can have moved into it.
 */
export function compactRows(board: Board, rows: ReadonlyArray<number>): void {
  if (rows.length === 0) return;

  const removed = new Set(rows);
  const consumed: Array<boolean> = Array.from(
    { length: board.totalHeight },
    () => false,
  );
  const lowest = Math.max(...rows);

  for (let row = lowest; row >= 1; row--) {
    let from = row - 1;
    while (from >= 0 && (removed.has(from) || consumed[from] === true)) from--;
    if (from >= 0) {
      copyRow(board, from, row);
      consumed[from] = true;
    } else {
      clearRow(board, row);
    }
  }
  clearRow(board, 0);
}

/**
 * Run once per landing: find the full rows the piece completed and compact
 * them away. Returns the cleared rows (lowest first); the score gain is
 * their count.
 */
export function clearLinesAfterLanding(
  board: Board,
  landed: ActivePiece,
): ReadonlyArray<number> {
  const rows = findFullRows(board, landed);
  compactRows(board, rows);
  return rows;
}
