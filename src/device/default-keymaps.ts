import type { InputEvent, Keymap } from "./types";

// Key name (as a terminal or DOM adapter reports it) → InputEvent
export const DEFAULT_KEYMAP: Keymap = new Map<string, InputEvent>([
  // Classic single-hand layout
  ["w", "rotate-cw"],
  ["a", "shift-left"],
  ["d", "shift-right"],
  ["s", "hard-drop"],
  ["q", "quit"],

  // Arrows and the usual rotate pair
  ["ArrowUp", "rotate-cw"],
  ["ArrowLeft", "shift-left"],
  ["ArrowRight", "shift-right"],
  ["ArrowDown", "soft-drop-step"],
  ["Space", "hard-drop"],
  ["z", "rotate-ccw"],
  ["x", "rotate-cw"],
  ["Escape", "quit"],
]);

export function mapKey(
  key: string,
  keymap: Keymap = DEFAULT_KEYMAP,
): InputEvent | undefined {
  return keymap.get(key) ?? keymap.get(key.toLowerCase());
}
