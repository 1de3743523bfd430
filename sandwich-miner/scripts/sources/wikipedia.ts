import { z } from "zod";
import { errorForHttpStatus, ParseError } from "../errors";
import { isRetryableFailure, withRetry } from "../retry";
import type { ContentSource, SourceResult } from "../types";
import { createRateLimiter, emptyResult, type RateLimiter } from "./base";

const USER_AGENT = "sandwich-miner/0.1 (research project)";

const RandomResponseSchema = z.object({
  query: z.object({ random: z.array(z.object({ title: z.string() })) }),
});

const SearchResponseSchema = z.object({
  query: z.object({ search: z.array(z.object({ title: z.string() })) }),
});

const SummaryResponseSchema = z.object({
  title: z.string(),
  extract: z.string().default(""),
  description: z.string().optional(),
  content_urls: z.object({ desktop: z.object({ page: z.string() }) }).optional(),
});

export interface WikipediaSourceOptions {
  language?: string;
  maxPerMinute?: number;
  rateLimiter?: RateLimiter;
  retries?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function createWikipediaSource(options: WikipediaSourceOptions = {}): ContentSource {
  const language = options.language ?? "en";
  const actionApi = `https://${language}.wikipedia.org/w/api.php`;
  const restApi = `https://${language}.wikipedia.org/api/rest_v1`;
  const limiter = options.rateLimiter ?? createRateLimiter(options.maxPerMinute ?? 30);

  const getJson = async <T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.infer<T>> => {
    const body = await withRetry(
      async () => {
        await limiter.waitIfNeeded();
        const response = await fetch(url, { headers: { "User-Agent": USER_AGENT, Accept: "application/json" } });
        if (!response.ok) {
          throw errorForHttpStatus(response.status, `Wikipedia HTTP ${response.status} for ${url}`);
        }
        return response.json();
      },
      {
        retries: options.retries ?? 2,
        baseDelayMs: 500,
        maxDelayMs: 4000,
        jitter: true,
        sleep: options.sleep,
        retryOn: (err) => isRetryableFailure(err) || err instanceof TypeError,
      },
    );
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected Wikipedia response from ${url}`, "schema_mismatch");
    }
    return parsed.data;
  };

  const summary = async (title: string, metadata: Record<string, unknown>): Promise<SourceResult> => {
    const page = await getJson(
      `${restApi}/page/summary/${encodeURIComponent(title.replace(/ /g, "_"))}`,
      SummaryResponseSchema,
    );
    return {
      content: page.extract,
      url: page.content_urls?.desktop.page ?? `https://${language}.wikipedia.org/wiki/${encodeURIComponent(title)}`,
      title: page.title,
      content_type: "text",
      metadata: { ...metadata, source: "wikipedia", description: page.description ?? null },
    };
  };

  const fetchRandom = async (): Promise<SourceResult> => {
    const data = await getJson(
      `${actionApi}?action=query&list=random&rnnamespace=0&rnlimit=1&format=json`,
      RandomResponseSchema,
    );
    const first = data.query.random[0];
    if (!first) return emptyResult({ error: "no_results" });
    return summary(first.title, { random: true });
  };

  return {
    name: "wikipedia",
    tier: 1,
    fetchRandom,
    async fetch(query) {
      if (query === undefined) return fetchRandom();
      const data = await getJson(
        `${actionApi}?action=query&list=search&srsearch=${encodeURIComponent(query)}&srlimit=1&format=json`,
        SearchResponseSchema,
      );
      const first = data.query.search[0];
      if (!first) return emptyResult({ query, error: "no_results" });
      return summary(first.title, { query });
    },
  };
}
