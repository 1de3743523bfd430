import type { EventLevel, SessionEvent } from "./types";

function truncate(value: string, maxChars = 200): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, maxChars)}…`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes("api_key") ||
    normalized.includes("apikey") ||
    normalized.includes("authorization") ||
    normalized.includes("token") ||
    normalized === "content" ||
    normalized.endsWith("_content")
  );
}

export function safeData(input: unknown): Record<string, unknown> | undefined {
  if (!input || typeof input !== "object") {
    return undefined;
  }

  const sanitize = (value: unknown, depth: number): unknown => {
    if (depth > 3) {
      return "[truncated-depth]";
    }
    if (typeof value === "string") {
      return truncate(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.slice(0, 20).map((item) => sanitize(item, depth + 1));
    }
    if (typeof value === "object") {
      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        if (isSensitiveKey(key)) {
          out[key] = "[redacted]";
          continue;
        }
        out[key] = sanitize(child, depth + 1);
      }
      return out;
    }
    return String(value);
  };

  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(input)) {
    out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, 1);
  }
  return out;
}

export function formatEventLine(event: SessionEvent): string {
  const data = event.data ? ` ${JSON.stringify(event.data)}` : "";
  return `${event.ts} [${event.node}] ${event.level.toUpperCase()} ${event.event}${data}`;
}

export interface LogInput {
  node: string;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export function createLogger(
  sessionId: string,
  options: { echo?: (event: SessionEvent) => void } = {},
): {
  log: (event: LogInput) => void;
  getEvents: () => SessionEvent[];
} {
  const events: SessionEvent[] = [];

  return {
    log(event) {
      const entry: SessionEvent = {
        ts: new Date().toISOString(),
        session_id: sessionId,
        node: event.node,
        level: event.level,
        event: event.event,
        data: safeData(event.data),
      };
      events.push(entry);
      options.echo?.(entry);
    },
    getEvents() {
      return [...events];
    },
  };
}

export type SessionLogger = ReturnType<typeof createLogger>;
