import { getShape, normalizeRotation, shapeExtent } from "./pieces";
import {
  type ActivePiece,
  type CellValue,
  type Coord,
  type Extent,
  type PieceKind,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

export function createPiece(opts: {
  kind: PieceKind;
  rotation: number;
  row: number;
  col: number;
  color: CellValue;
}): ActivePiece {
  return {
    col: createGridCoord(opts.col),
    color: opts.color,
    kind: opts.kind,
    rotation: normalizeRotation(opts.kind, opts.rotation),
    row: createGridCoord(opts.row),
  };
}

/**
 * Absolute board cells of a piece, optionally shifted and/or evaluated at a
 * different rotation state.
 */
export function pieceCells(
  piece: ActivePiece,
  rowDelta = 0,
  colDelta = 0,
  rotationDelta = 0,
): ReadonlyArray<Coord> {
  const row = gridCoordAsNumber(piece.row) + rowDelta;
  const col = gridCoordAsNumber(piece.col) + colDelta;
  return getShape(piece.kind, piece.rotation + rotationDelta).map(
    ([dr, dc]): Coord => [row + dr, col + dc],
  );
}

export function pieceExtent(piece: ActivePiece): Extent {
  return shapeExtent(getShape(piece.kind, piece.rotation));
}

/** Absolute rows spanned by the piece, inclusive. */
export function pieceRowSpan(piece: ActivePiece): readonly [number, number] {
  const e = pieceExtent(piece);
  const row = gridCoordAsNumber(piece.row);
  return [row + e.rowMin, row + e.rowMax];
}
