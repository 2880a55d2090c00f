import { PIECE_KINDS, getShape, pieceKindAt, rotationCount, shapeExtent } from "./pieces";
import { createPiece } from "./piece";
import { canSpawn } from "./placement";
import { type RandomSource } from "./rng/interface";
import {
  type ActivePiece,
  type Board,
  type PieceKind,
  MAX_COLOR,
  MIN_COLOR,
  createCellValue,
} from "./types";

export type SpawnLayout = Readonly<{
  row: number;
  colMin: number;
  colMax: number;
}>;

/**
 * Anchor row putting the shape's topmost cell on the first visible row, and
 * the inclusive anchor-column range keeping every cell inside the walls.
 * Throws when the range is empty; config validation rules that out up front.
 */
export function spawnLayout(
  board: Board,
  kind: PieceKind,
  rotation: number,
): SpawnLayout {
  const e = shapeExtent(getShape(kind, rotation));
  const layout = {
    colMax: board.width - e.colMax - 1,
    colMin: 0 - e.colMin,
    row: board.invisibleRows - e.rowMin,
  };
  if (layout.colMin > layout.colMax || layout.row + e.rowMax >= board.totalHeight) {
    throw new Error("space too small");
  }
  return layout;
}

/**
 * Pick the next piece type: one draw over [0, n], where n is an out-of-range
 * sentinel; on the sentinel or a repeat of the previous type, one reroll over
 * [0, n-1] that is taken as is.
 */
export function chooseKind(
  rng: RandomSource,
  previous: PieceKind | null,
): { kind: PieceKind; next: RandomSource } {
  const n = PIECE_KINDS.length;
  const first = rng.nextInt(0, n);
  if (first.value !== n && (previous === null || pieceKindAt(first.value) !== previous)) {
    return { kind: pieceKindAt(first.value), next: first.next };
  }
  const second = first.next.nextInt(0, n - 1);
  return { kind: pieceKindAt(second.value), next: second.next };
}

export type SpawnResult =
  | { kind: "spawned"; piece: ActivePiece; rng: RandomSource }
  | { kind: "blocked"; piece: ActivePiece; rng: RandomSource };

/**
 * Roll a new piece (type, color, rotation, column in that order) and test it
 * against the board. Does not write to the board: the caller stamps a
 * spawned piece, and a blocked one never touches it.
 */
export function rollPiece(
  board: Board,
  rng: RandomSource,
  previous: PieceKind | null,
): SpawnResult {
  const chosen = chooseKind(rng, previous);
  const color = chosen.next.nextInt(MIN_COLOR, MAX_COLOR);
  const rotation = color.next.nextInt(0, rotationCount(chosen.kind) - 1);
  const layout = spawnLayout(board, chosen.kind, rotation.value);
  const col = rotation.next.nextInt(layout.colMin, layout.colMax);

  const piece = createPiece({
    col: col.value,
    color: createCellValue(color.value),
    kind: chosen.kind,
    rotation: rotation.value,
    row: layout.row,
  });

  return canSpawn(board, piece)
    ? { kind: "spawned", piece, rng: col.next }
    : { kind: "blocked", piece, rng: col.next };
}
