import "dotenv/config";
import { randomUUID } from "node:crypto";
import path from "node:path";
import { parseArgs } from "node:util";
import { createFileSandwichStore, readForagerSnapshot, writeSessionSummary } from "./artifacts";
import { createFileCheckpointStore } from "./checkpointStore";
import { CONFIG_PATH, loadConfig, type SandwichConfig } from "./config";
import { createCorpus } from "./corpus";
import { createEmbeddingClient } from "./embeddings";
import { errorMessage } from "./errors";
import { createForager, type SourceTiers } from "./forager";
import { createSandwichLlm } from "./llm";
import { createLogger, formatEventLine } from "./logger";
import { resumeSession, runSession } from "./session";
import { createWebSearchSource } from "./sources/webSearch";
import { createWikipediaSource } from "./sources/wikipedia";
import { createStateMachine } from "./stateMachine";
import type { SessionSummary } from "./types";

function parseCli(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      "max-sandwiches": { type: "string" },
      "max-duration": { type: "string" },
      resume: { type: "string" },
      config: { type: "string" },
      quiet: { type: "boolean", default: false },
    },
    strict: true,
  });

  const positiveInt = (raw: string | undefined, flag: string): number | undefined => {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) throw new Error(`--${flag} expects a positive integer, got "${raw}"`);
    return value;
  };

  return {
    maxSandwiches: positiveInt(values["max-sandwiches"], "max-sandwiches"),
    maxDuration: positiveInt(values["max-duration"], "max-duration"),
    resume: values.resume,
    configPath: values.config ?? CONFIG_PATH,
    quiet: values.quiet ?? false,
  };
}

function buildSources(config: SandwichConfig): SourceTiers {
  const sources: SourceTiers = {};
  if (config.foraging.wikipedia.enabled) {
    sources[1] = [createWikipediaSource({ maxPerMinute: config.foraging.wikipedia.maxPerMinute })];
  }
  if (config.foraging.webSearch.enabled) {
    sources[2] = [createWebSearchSource({ maxPerMinute: config.foraging.webSearch.maxPerMinute })];
  }
  return sources;
}

function printSummary(summary: SessionSummary, summaryPath: string): void {
  console.log("\n--- Session Summary ---");
  console.log(`Session ID: ${summary.session_id}`);
  console.log(`Stop reason: ${summary.stop_reason}`);
  console.log(`Iterations: ${summary.iterations}`);
  console.log(`Sandwiches made: ${summary.sandwiches_made}`);
  for (const sandwich of summary.sandwiches) {
    console.log(`  - ${sandwich.name} [${sandwich.verdict}, ${sandwich.overall_score.toFixed(2)}] ${sandwich.path}`);
  }
  console.log(`Forager tier: ${summary.forager.current_tier}`);
  console.log(`Summary written: ${summaryPath}`);
}

async function main() {
  try {
    const cli = parseCli(process.argv.slice(2));
    const loaded = loadConfig(cli.configPath);
    const config: SandwichConfig = {
      ...loaded,
      session: {
        ...loaded.session,
        maxSandwiches: cli.maxSandwiches ?? loaded.session.maxSandwiches,
        maxDurationMinutes: cli.maxDuration ?? loaded.session.maxDurationMinutes,
      },
    };

    const sessionId = cli.resume ?? randomUUID();
    const logger = createLogger(sessionId, {
      echo: cli.quiet ? undefined : (event) => console.error(formatEventLine(event)),
    });
    const dirs = { sandwichesDir: config.output.sandwichesDir, sessionsDir: config.output.sessionsDir };
    const sink = createFileCheckpointStore(path.resolve(process.cwd(), config.output.checkpointsDir));
    const llm = createSandwichLlm({ ...config.llm, logger });
    const deps = {
      forager: createForager({
        sources: buildSources(config),
        llm,
        config: {
          successesToPromote: config.foraging.successesToPromote,
          failuresToDemote: config.foraging.failuresToDemote,
        },
        logger,
      }),
      llm,
      corpus: createCorpus(),
      store: createFileSandwichStore(dirs),
      config,
      embeddings: config.embeddings.enabled ? createEmbeddingClient({ model: config.embeddings.model }) : null,
      logger,
    };

    const summary = cli.resume
      ? await resumeSession({
          ...deps,
          sessionId,
          sink,
          foragerSnapshot: readForagerSnapshot(dirs, sessionId),
        })
      : await runSession({ ...deps, machine: createStateMachine({ sessionId, sink, logger }) });

    const written = writeSessionSummary(dirs, summary);
    printSummary(summary, written.path);
    if (summary.stop_reason.startsWith("fatal")) process.exitCode = 1;
  } catch (error) {
    console.error(`Session failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

void main();
