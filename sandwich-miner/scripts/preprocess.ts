import type { SourceResult } from "./types";

export interface PreprocessConfig {
  minContentChars: number;
  maxContentChars: number;
}

export type PreprocessOutcome =
  | { accepted: true; content: string; truncated: boolean }
  | { accepted: false; reason: "content_empty" | "content_too_short"; chars: number };

export function safeExcerpt(text: string, maxChars: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 1)}…`;
}

function normalizeContent(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function preprocessContent(result: SourceResult, config: PreprocessConfig): PreprocessOutcome {
  const content = normalizeContent(result.content);
  if (content.length === 0) {
    return { accepted: false, reason: "content_empty", chars: 0 };
  }
  if (content.length < config.minContentChars) {
    return { accepted: false, reason: "content_too_short", chars: content.length };
  }
  if (content.length > config.maxContentChars) {
    return { accepted: true, content: content.slice(0, config.maxContentChars), truncated: true };
  }
  return { accepted: true, content, truncated: false };
}
