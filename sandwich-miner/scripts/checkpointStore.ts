import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage, FatalError } from "./errors";
import { PIPELINE_STATES, type Checkpoint, type CheckpointSink } from "./types";

export interface ReplayableSink extends CheckpointSink {
  all(sessionId: string): Checkpoint[];
}

export function createMemoryCheckpointStore(): ReplayableSink {
  const bySession = new Map<string, Checkpoint[]>();
  return {
    append(checkpoint) {
      const list = bySession.get(checkpoint.session_id) ?? [];
      list.push(checkpoint);
      bySession.set(checkpoint.session_id, list);
    },
    latest(sessionId) {
      const list = bySession.get(sessionId);
      return list && list.length > 0 ? list[list.length - 1] : null;
    },
    all(sessionId) {
      return [...(bySession.get(sessionId) ?? [])];
    },
  };
}

const CheckpointSchema = z.object({
  checkpoint_id: z.string(),
  session_id: z.string(),
  state: z.enum(PIPELINE_STATES),
  created_at: z.string(),
  data: z.record(z.unknown()),
  transition_reason: z.string(),
});

const CheckpointFileSchema = z.object({
  version: z.literal(1),
  session_id: z.string(),
  updated_at: z.string(),
  checkpoints: z.array(CheckpointSchema),
});

type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

function unreachable(action: string, filePath: string, error: unknown): FatalError {
  return new FatalError(
    `Checkpoint store ${action} failed at ${filePath}: ${errorMessage(error)}`,
    "checkpoint_store_unreachable",
    { cause: error },
  );
}

/**
 * One JSON file per session under `dir`. Writes are synchronous, so a
 * checkpoint is on disk before the state machine moves.
 */
export function createFileCheckpointStore(dir: string): ReplayableSink {
  const cache = new Map<string, CheckpointFile>();

  const fileFor = (sessionId: string): string =>
    path.join(dir, `${sessionId.replace(/[^a-zA-Z0-9_-]/g, "_")}.json`);

  const load = (sessionId: string): CheckpointFile | null => {
    const cached = cache.get(sessionId);
    if (cached) return cached;
    const filePath = fileFor(sessionId);
    if (!existsSync(filePath)) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw unreachable("read", filePath, error);
    }
    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FatalError(`Invalid checkpoint file at ${filePath}`, "checkpoint_store_corrupt");
    }
    cache.set(sessionId, parsed.data);
    return parsed.data;
  };

  return {
    append(checkpoint) {
      const current = load(checkpoint.session_id);
      const next: CheckpointFile = {
        version: 1,
        session_id: checkpoint.session_id,
        updated_at: new Date().toISOString(),
        checkpoints: [...(current?.checkpoints ?? []), { ...checkpoint, data: { ...checkpoint.data } }],
      };
      const filePath = fileFor(checkpoint.session_id);
      try {
        mkdirSync(dir, { recursive: true });
        writeFileSync(filePath, `${JSON.stringify(next, null, 2)}\n`, "utf-8");
      } catch (error) {
        throw unreachable("write", filePath, error);
      }
      cache.set(checkpoint.session_id, next);
    },
    latest(sessionId) {
      const file = load(sessionId);
      if (!file || file.checkpoints.length === 0) return null;
      return file.checkpoints[file.checkpoints.length - 1];
    },
    all(sessionId) {
      return [...(load(sessionId)?.checkpoints ?? [])];
    },
  };
}
