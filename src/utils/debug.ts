// Lightweight, opt-in debug logging plus always-on warnings

// Topics can be enabled via the VIRTUAL_INPUT_DEBUG environment variable:
// "true", "1", "on", or a comma list of topics,
// e.g. VIRTUAL_INPUT_DEBUG=input,menu,profile

const ENV_KEY = "VIRTUAL_INPUT_DEBUG";

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

/** Non-fatal problems the host should see regardless of debug topics. */
export function warn(topic: string, message: string, data?: unknown): void {
  if (data !== undefined) {
    console.warn(`[${topic}] ${message}`, data);
  } else {
    console.warn(`[${topic}] ${message}`);
  }
}
