// Rows kept above the visible playfield so tall pieces can spawn without special cases
export const INVISIBLE_ROWS = 2 as const;
export const DEFAULT_VISIBLE_HEIGHT = 20 as const;
export const DEFAULT_BOARD_WIDTH = 10 as const;

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// Cell values - 0=empty, 1-7=color tag of an occupied cell
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

export const EMPTY_CELL = 0 as CellValue;
export const MIN_COLOR = 1 as const;
export const MAX_COLOR = 7 as const;

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

// CellValue constructors and guards
export function isCellValue(n: unknown): n is CellValue {
  return (
    typeof n === "number" && Number.isInteger(n) && n >= 0 && n <= MAX_COLOR
  );
}

export function createCellValue(value: number): CellValue {
  if (!isCellValue(value)) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value;
}

// Row-major storage; storage row 0 is the top invisible row
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(totalHeight: number, width: number): BoardCells {
  return new Uint8Array(totalHeight * width) as BoardCells;
}

export type Board = {
  readonly width: number;
  readonly height: number; // visible height only
  readonly invisibleRows: number; // rows above the visible area (0..invisibleRows-1)
  readonly totalHeight: number; // height + invisibleRows
  readonly cells: BoardCells;
};

// (row, col) pair; row grows downward
export type Coord = readonly [row: number, col: number];

// Pieces and rotation
export type PieceKind = "I" | "O" | "J" | "L" | "S" | "Z" | "T";

export type Shape = ReadonlyArray<Coord>;

export type Extent = Readonly<{
  rowMin: number;
  rowMax: number;
  colMin: number;
  colMax: number;
}>;

// The live piece. Mutated in place by the placement engine while it falls.
export type ActivePiece = {
  readonly kind: PieceKind;
  rotation: number;
  row: GridCoord;
  col: GridCoord;
  readonly color: CellValue;
};
