// Lightweight, opt-in debug logging utilities for the engine + tests

// Topics can be enabled via:
// - the BLOCKFALL_DEBUG environment variable: "true", "1", "on", or a comma list of topics
//   e.g. BLOCKFALL_DEBUG=spawn,clear
// - setDebugConfig({ on: true }) or setDebugConfig({ spawn: true, gameover: true })

export type DebugTopic = "spawn" | "clear" | "gameover" | "runtime";

type DebugConfig = { on?: boolean } & Partial<Record<DebugTopic, boolean>>;

let override: DebugConfig | null = null;

/** Programmatic switch; takes precedence over the environment. Pass null to clear. */
export function setDebugConfig(cfg: DebugConfig | null): void {
  override = cfg;
}

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env["BLOCKFALL_DEBUG"];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  if (override !== null) {
    if (override.on === true) return true;
    return topic !== undefined && override[topic] === true;
  }
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
