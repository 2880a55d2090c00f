import { type Coord, type Extent, type PieceKind, type Shape } from "./types";

// Catalog order; a piece's index here is what the spawn randomizer draws
export const PIECE_KINDS: ReadonlyArray<PieceKind> = [
  "I",
  "O",
  "J",
  "L",
  "S",
  "Z",
  "T",
] as const;

type PieceDefinition = {
  // Rotation state 0, as (row, col) offsets around the anchor
  base: Shape;
  rotations: 1 | 2 | 4;
};

// Right-handed Nintendo rotation system: every later state is the previous
// one turned clockwise about the anchor.
const DEFINITIONS: Record<PieceKind, PieceDefinition> = {
  I: {
    base: [
      [0, -2],
      [0, -1],
      [0, 0],
      [0, 1],
    ],
    rotations: 2,
  },
  J: {
    base: [
      [1, 1],
      [0, 1],
      [0, 0],
      [0, -1],
    ],
    rotations: 4,
  },
  L: {
    base: [
      [1, -1],
      [0, -1],
      [0, 0],
      [0, 1],
    ],
    rotations: 4,
  },
  O: {
    base: [
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ],
    rotations: 1,
  },
  S: {
    base: [
      [-1, 0],
      [0, 0],
      [0, 1],
      [1, 1],
    ],
    rotations: 2,
  },
  T: {
    base: [
      [0, 0],
      [-1, 0],
      [0, -1],
      [0, 1],
    ],
    rotations: 4,
  },
  Z: {
    base: [
      [-1, 1],
      [0, 1],
      [0, 0],
      [1, 0],
    ],
    rotations: 2,
  },
};

/** Clockwise quarter turn: (y, x) → (x, -y). */
export function rotateOffsetCW([y, x]: Coord): Coord {
  return [x, 0 - y];
}

/** Counter-clockwise quarter turn, the inverse of {@link rotateOffsetCW}. */
export function rotateOffsetCCW([y, x]: Coord): Coord {
  return [0 - x, y];
}

function buildRotations(def: PieceDefinition): ReadonlyArray<Shape> {
  const states: Array<Shape> = [def.base];
  for (let i = 1; i < def.rotations; i++) {
    const prev = states[i - 1] ?? def.base;
    states.push(Object.freeze(prev.map(rotateOffsetCW)));
  }
  return Object.freeze(states);
}

// Precomputed once at module load and shared by every piece
const ROTATIONS: Readonly<Record<PieceKind, ReadonlyArray<Shape>>> = Object.freeze({
  I: buildRotations(DEFINITIONS.I),
  J: buildRotations(DEFINITIONS.J),
  L: buildRotations(DEFINITIONS.L),
  O: buildRotations(DEFINITIONS.O),
  S: buildRotations(DEFINITIONS.S),
  T: buildRotations(DEFINITIONS.T),
  Z: buildRotations(DEFINITIONS.Z),
});

export function rotationCount(kind: PieceKind): number {
  return DEFINITIONS[kind].rotations;
}

/** Wrap any rotation index (negative included) into [0, rotationCount). */
export function normalizeRotation(kind: PieceKind, rotation: number): number {
  const n = rotationCount(kind);
  return ((rotation % n) + n) % n;
}

export function getShape(kind: PieceKind, rotation: number): Shape {
  const shape = ROTATIONS[kind][normalizeRotation(kind, rotation)];
  if (shape === undefined) {
    // normalizeRotation keeps the index in range
    throw new Error(`No rotation state ${String(rotation)} for ${kind}`);
  }
  return shape;
}

export function shapeExtent(shape: Shape): Extent {
  let rowMin = Infinity;
  let rowMax = -Infinity;
  let colMin = Infinity;
  let colMax = -Infinity;
  for (const [row, col] of shape) {
    rowMin = Math.min(rowMin, row);
    rowMax = Math.max(rowMax, row);
    colMin = Math.min(colMin, col);
    colMax = Math.max(colMax, col);
  }
  return { colMax, colMin, rowMax, rowMin };
}

export function pieceKindAt(index: number): PieceKind {
  const kind = PIECE_KINDS[index];
  if (kind === undefined) {
    throw new Error(`Piece index ${String(index)} out of range`);
  }
  return kind;
}

export function pieceKindIndex(kind: PieceKind): number {
  return PIECE_KINDS.indexOf(kind);
}
