import type { Command } from "../engine/commands";

// What an input event means to the runtime: an engine command, or leaving
export type ControlIntent =
  | { kind: "command"; command: Command }
  | { kind: "quit" };
