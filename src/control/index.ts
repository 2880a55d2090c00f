import type { ControlIntent } from "./types";
import type { InputEvent } from "../device/types";

export function toIntent(ev: InputEvent): ControlIntent {
  switch (ev) {
    case "rotate-cw":
      return { command: { kind: "RotateCW" }, kind: "command" };
    case "rotate-ccw":
      return { command: { kind: "RotateCCW" }, kind: "command" };
    case "shift-left":
      return { command: { kind: "ShiftLeft" }, kind: "command" };
    case "shift-right":
      return { command: { kind: "ShiftRight" }, kind: "command" };
    case "soft-drop-step":
      return { command: { kind: "SoftDrop" }, kind: "command" };
    case "hard-drop":
      return { command: { kind: "HardDrop" }, kind: "command" };
    case "quit":
      return { kind: "quit" };
  }
}
