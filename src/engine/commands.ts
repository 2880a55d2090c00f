export type Command =
  | { kind: "RotateCW" }
  | { kind: "RotateCCW" }
  | { kind: "ShiftLeft" }
  | { kind: "ShiftRight" }
  | { kind: "SoftDrop" }
  | { kind: "HardDrop" };
