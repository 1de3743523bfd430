import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage, FatalError } from "./errors";
import type { ForagerSnapshot } from "./forager";
import type { SandwichStore, SessionSummary, StoredSandwich } from "./types";

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

export function writeJsonPretty(filePath: string, data: unknown): void {
  writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

export function buildDatedDirName(generatedAt: string): string {
  return generatedAt.slice(0, 10);
}

export function toSafeFileName(name: string): string {
  const safe = name
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return safe.slice(0, 60) || "untitled";
}

export interface ArtifactDirs {
  baseDir?: string;
  sandwichesDir: string;
  sessionsDir: string;
}

function resolveBase(dirs: ArtifactDirs): string {
  return dirs.baseDir ?? process.cwd();
}

/** Writes `<sandwichesDir>/<date>/<name>__<id8>.json`; returns the path relative to the base dir. */
export function writeSandwichArtifact(dirs: ArtifactDirs, sandwich: StoredSandwich): { path: string } {
  const dateDir = buildDatedDirName(sandwich.created_at);
  const fileName = `${toSafeFileName(sandwich.assembled.name)}__${sandwich.sandwich_id.slice(0, 8)}.json`;
  const relativePath = path.join(dirs.sandwichesDir, dateDir, fileName);
  const absolutePath = path.resolve(resolveBase(dirs), relativePath);
  ensureDir(path.dirname(absolutePath));
  writeJsonPretty(absolutePath, { meta: { sandwich_version: 1 }, ...sandwich });
  return { path: relativePath };
}

export function writeSessionSummary(dirs: ArtifactDirs, summary: SessionSummary): { path: string } {
  const relativePath = path.join(dirs.sessionsDir, `${summary.session_id}.json`);
  const absolutePath = path.resolve(resolveBase(dirs), relativePath);
  ensureDir(path.dirname(absolutePath));
  writeJsonPretty(absolutePath, summary);
  return { path: relativePath };
}

export function createFileSandwichStore(dirs: ArtifactDirs): SandwichStore {
  return {
    async save(sandwich) {
      try {
        return writeSandwichArtifact(dirs, sandwich);
      } catch (error) {
        throw new FatalError(`Cannot write sandwich artifact: ${errorMessage(error)}`, "store_unreachable", {
          cause: error,
        });
      }
    },
  };
}

const SummaryForagerSchema = z.object({
  forager: z.object({
    current_tier: z.number().int().min(1),
    consecutive_successes: z.number().int().min(0),
    consecutive_failures: z.number().int().min(0),
  }),
});

/** Forager state saved with a previous session's summary, or null when there is none. */
export function readForagerSnapshot(dirs: ArtifactDirs, sessionId: string): ForagerSnapshot | null {
  const absolutePath = path.resolve(resolveBase(dirs), dirs.sessionsDir, `${sessionId}.json`);
  if (!existsSync(absolutePath)) return null;
  const parsed = SummaryForagerSchema.safeParse(JSON.parse(readFileSync(absolutePath, "utf-8")));
  return parsed.success ? parsed.data.forager : null;
}
