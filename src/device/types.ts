/**
 * Discrete command events an input layer forwards to the runtime. Each one is
 * applied atomically before the next tick's gravity.
 */
export type InputEvent =
  | "rotate-cw"
  | "rotate-ccw"
  | "shift-left"
  | "shift-right"
  | "soft-drop-step"
  | "hard-drop"
  | "quit";

export type Keymap = ReadonlyMap<string, InputEvent>;
