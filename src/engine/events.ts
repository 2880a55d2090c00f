import type { Tick, PieceKind } from "./types";

export type LandingSource = "gravity" | "softDrop" | "hardDrop";

export type DomainEvent =
  | {
      kind: "PieceSpawned";
      pieceKind: PieceKind;
      rotation: number;
      row: number;
      col: number;
      tick: Tick;
    }
  | { kind: "MovedLeft"; fromCol: number; toCol: number; tick: Tick }
  | { kind: "MovedRight"; fromCol: number; toCol: number; tick: Tick }
  | { kind: "MovedDown"; fromRow: number; toRow: number; tick: Tick }
  | { kind: "Rotated"; dir: "CW" | "CCW"; rotation: number; tick: Tick }
  | { kind: "HardDropped"; distance: number; tick: Tick }
  | {
      kind: "Landed";
      source: LandingSource;
      pieceKind: PieceKind;
      tick: Tick;
    }
  | { kind: "LinesCleared"; rows: Array<number>; score: number; tick: Tick }
  | { kind: "GameOver"; score: number; tick: Tick };
