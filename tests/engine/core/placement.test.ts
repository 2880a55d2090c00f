import { countOccupied, createEmptyBoard, setCell } from "@/engine/core/board";
import { createPiece } from "@/engine/core/piece";
import {
  canPlace,
  canRotate,
  canSpawn,
  commitMove,
  commitRotate,
  dropToBottom,
  stampPiece,
  tryMove,
  tryRotate,
} from "@/engine/core/placement";
import { type ActivePiece, type Board, createCellValue } from "@/engine/core/types";

import { occupiedCells, sortCells } from "../../test-helpers";

function liveT(board: Board, row = 10, col = 4): ActivePiece {
  const piece = createPiece({
    col,
    color: createCellValue(6),
    kind: "T",
    rotation: 0,
    row,
  });
  stampPiece(board, piece);
  return piece;
}

describe("@/engine/core/placement — collision queries", () => {
  test("queries never change the board, whatever the answer", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    setCell(board, [11, 3], createCellValue(2));
    const before = Array.from(board.cells);

    expect(canPlace(board, piece, 1, 0)).toBe(false);
    expect(canPlace(board, piece, 0, 1)).toBe(true);
    expect(canRotate(board, piece, 1)).toBe(true);
    expect(canRotate(board, piece, -1)).toBe(true);

    expect(Array.from(board.cells)).toEqual(before);
  });

  test("repeating a query gives the same answer", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    setCell(board, [11, 4], createCellValue(2));
    expect(canRotate(board, piece, 1)).toBe(false);
    expect(canRotate(board, piece, 1)).toBe(false);
    expect(canPlace(board, piece, 0, -1)).toBe(true);
    expect(canPlace(board, piece, 0, -1)).toBe(true);
  });

  test("the piece's own cells do not block it", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    // Shifting right overlaps two of its current cells
    expect(canPlace(board, piece, 0, 1)).toBe(true);
    expect(canPlace(board, piece, 1, 0)).toBe(true);
  });

  test("walls and floor reject, the buffer rows above do not", () => {
    const board = createEmptyBoard(20, 10);
    const piece = createPiece({
      col: 2,
      color: createCellValue(1),
      kind: "I",
      rotation: 0,
      row: 2,
    });
    stampPiece(board, piece);
    expect(canPlace(board, piece, 0, -1)).toBe(false);
    expect(canPlace(board, piece, 0, 6)).toBe(true);
    expect(canPlace(board, piece, 0, 7)).toBe(false);
    expect(canPlace(board, piece, -2, 0)).toBe(true);
    expect(canPlace(board, piece, -3, 0)).toBe(false);
    expect(canPlace(board, piece, 19, 0)).toBe(true);
    expect(canPlace(board, piece, 20, 0)).toBe(false);
  });
});

describe("@/engine/core/placement — commits", () => {
  test("commitMove lifts and redraws the piece at its new anchor", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    commitMove(board, piece, 1, -2);
    expect(piece.row).toBe(11);
    expect(piece.col).toBe(2);
    expect(sortCells(occupiedCells(board))).toEqual([
      [10, 2],
      [11, 1],
      [11, 2],
      [11, 3],
    ]);
  });

  test("commitRotate turns the piece in place", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    commitRotate(board, piece, 1);
    expect(piece.rotation).toBe(1);
    expect(sortCells(occupiedCells(board))).toEqual([
      [9, 4],
      [10, 4],
      [10, 5],
      [11, 4],
    ]);
    commitRotate(board, piece, -2);
    expect(piece.rotation).toBe(3);
    expect(countOccupied(board)).toBe(4);
  });

  test("tryMove / tryRotate leave everything alone when rejected", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    setCell(board, [11, 4], createCellValue(2));
    const before = Array.from(board.cells);

    expect(tryRotate(board, piece, 1)).toBe(false);
    expect(tryMove(board, piece, 1, 0)).toBe(false);
    expect(piece.rotation).toBe(0);
    expect(piece.row).toBe(10);
    expect(Array.from(board.cells)).toEqual(before);

    expect(tryMove(board, piece, 0, 1)).toBe(true);
    expect(piece.col).toBe(5);
  });

  test("dropToBottom reports the distance travelled", () => {
    const board = createEmptyBoard(20, 10);
    const piece = liveT(board);
    expect(dropToBottom(board, piece)).toBe(11);
    expect(piece.row).toBe(21);
    expect(dropToBottom(board, piece)).toBe(0);
  });

  test("canSpawn checks an undrawn piece; stampPiece draws it", () => {
    const board = createEmptyBoard(20, 10);
    const piece = createPiece({
      col: 0,
      color: createCellValue(4),
      kind: "O",
      rotation: 0,
      row: 2,
    });
    expect(canSpawn(board, piece)).toBe(true);
    expect(countOccupied(board)).toBe(0);

    stampPiece(board, piece);
    expect(sortCells(occupiedCells(board))).toEqual([
      [2, 0],
      [2, 1],
      [3, 0],
      [3, 1],
    ]);
    // Now drawn, the same cells count as occupied
    expect(canSpawn(board, piece)).toBe(false);
  });
});
