import { randomUUID } from "node:crypto";
import { createMutex } from "./concurrency";
import { ConfigurationError, errorMessage } from "./errors";
import type { SessionLogger } from "./logger";
import type { ContentSource, ForagingResult, SandwichLlm, SourceResult } from "./types";

export interface ForagerConfig {
  successesToPromote: number;
  failuresToDemote: number;
}

export const DEFAULT_FORAGER_CONFIG: ForagerConfig = {
  successesToPromote: 5,
  failuresToDemote: 3,
};

export type SourceTiers = Record<number, ContentSource[]>;

export interface ForagerOptions {
  sources: SourceTiers;
  llm: Pick<SandwichLlm, "generateCuriosity">;
  config?: Partial<ForagerConfig>;
  logger?: SessionLogger;
  /** Picks an index in [0, length). Defaults to a uniform random choice. */
  chooseIndex?: (length: number) => number;
}

export interface ForagerSnapshot {
  current_tier: number;
  consecutive_successes: number;
  consecutive_failures: number;
}

function uniformIndex(length: number): number {
  return Math.floor(Math.random() * length);
}

function configuredTiers(sources: SourceTiers): number[] {
  return Object.keys(sources)
    .map((key) => Number(key))
    .filter((tier) => Number.isInteger(tier) && tier >= 1)
    .sort((a, b) => a - b);
}

export function createForager(options: ForagerOptions) {
  const config: ForagerConfig = { ...DEFAULT_FORAGER_CONFIG, ...options.config };
  if (config.successesToPromote < 1 || config.failuresToDemote < 1) {
    throw new ConfigurationError("successesToPromote and failuresToDemote must be at least 1");
  }
  const chooseIndex = options.chooseIndex ?? uniformIndex;
  const tiers = configuredTiers(options.sources);
  const maxTier = tiers.length > 0 ? tiers[tiers.length - 1] : 1;
  const mutex = createMutex();
  const emit = options.logger?.log ?? (() => {});

  let currentTier = 1;
  let consecutiveSuccesses = 0;
  let consecutiveFailures = 0;

  const assertStreaks = (): void => {
    if (consecutiveSuccesses > 0 && consecutiveFailures > 0) {
      throw new Error(
        `Forager streaks out of sync: successes=${consecutiveSuccesses} failures=${consecutiveFailures}`,
      );
    }
  };

  const tierSources = (): { tier: number; sources: ContentSource[] } => {
    for (let tier = currentTier; tier >= 1; tier -= 1) {
      const list = options.sources[tier];
      if (list && list.length > 0) return { tier, sources: list };
    }
    throw new ConfigurationError(`no sources configured at or below tier ${currentTier}`);
  };

  const forageOnce = async (curiosity?: string): Promise<ForagingResult | null> => {
    const { tier, sources } = tierSources();
    const index = chooseIndex(sources.length);
    const source = sources[Math.min(Math.max(0, Math.floor(index)), sources.length - 1)];
    const prompt = curiosity && curiosity.trim() ? curiosity : null;

    let result: SourceResult;
    try {
      result = prompt ? await source.fetch(prompt) : await source.fetchRandom();
    } catch (error) {
      emit({
        node: "forager",
        level: "warn",
        event: "SOURCE_FAILED",
        data: { source: source.name, tier, query: prompt, error: errorMessage(error) },
      });
      return null;
    }

    if (!result.content) {
      emit({
        node: "forager",
        level: "info",
        event: "SOURCE_EMPTY",
        data: { source: source.name, tier, query: prompt },
      });
      return null;
    }

    emit({
      node: "forager",
      level: "info",
      event: "SOURCE_OK",
      data: { source: source.name, tier, query: prompt, title: result.title, chars: result.content.length },
    });
    return {
      source_result: result,
      source_name: source.name,
      curiosity_prompt: prompt,
      log_id: randomUUID(),
    };
  };

  return {
    get currentTier(): number {
      return currentTier;
    },
    get consecutiveSuccesses(): number {
      return consecutiveSuccesses;
    },
    get consecutiveFailures(): number {
      return consecutiveFailures;
    },
    get maxTier(): number {
      return maxTier;
    },
    snapshot(): ForagerSnapshot {
      return {
        current_tier: currentTier,
        consecutive_successes: consecutiveSuccesses,
        consecutive_failures: consecutiveFailures,
      };
    },
    generateCuriosity(recentTopics: string[]): Promise<string> {
      return options.llm.generateCuriosity(recentTopics);
    },
    forage(curiosity?: string): Promise<ForagingResult | null> {
      return mutex.runExclusive(() => forageOnce(curiosity));
    },
    recordSuccess(): void {
      consecutiveFailures = 0;
      consecutiveSuccesses += 1;
      if (consecutiveSuccesses >= config.successesToPromote && currentTier < maxTier) {
        const from = currentTier;
        currentTier += 1;
        consecutiveSuccesses = 0;
        emit({
          node: "forager",
          level: "info",
          event: "TIER_PROMOTED",
          data: { from, to: currentTier, after_successes: config.successesToPromote },
        });
      }
      assertStreaks();
    },
    recordFailure(): void {
      consecutiveSuccesses = 0;
      consecutiveFailures += 1;
      if (consecutiveFailures >= config.failuresToDemote && currentTier > 1) {
        const from = currentTier;
        currentTier -= 1;
        consecutiveFailures = 0;
        emit({
          node: "forager",
          level: "info",
          event: "TIER_DEMOTED",
          data: { from, to: currentTier, after_failures: config.failuresToDemote },
        });
      }
      assertStreaks();
    },
    /** Restores tier and streaks, e.g. from a persisted session summary. */
    restore(snapshot: ForagerSnapshot): void {
      if (snapshot.consecutive_successes > 0 && snapshot.consecutive_failures > 0) {
        throw new Error("Cannot restore forager with both streaks nonzero");
      }
      currentTier = Math.min(Math.max(1, Math.floor(snapshot.current_tier)), maxTier);
      consecutiveSuccesses = Math.max(0, snapshot.consecutive_successes);
      consecutiveFailures = Math.max(0, snapshot.consecutive_failures);
    },
  };
}

export type Forager = ReturnType<typeof createForager>;
