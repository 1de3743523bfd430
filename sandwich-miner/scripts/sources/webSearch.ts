import TurndownService from "turndown";
import { errorMessage } from "../errors";
import type { ContentSource, SourceResult } from "../types";
import { createRateLimiter, emptyResult, truncateContent, type RateLimiter } from "./base";

export const DUCKDUCKGO_HTML_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT = "Mozilla/5.0 (compatible; sandwich-miner/0.1; research project)";
const MAX_PAGE_CHARS = 10_000;

const SEED_WORDS = [
  "theorem",
  "paradox",
  "optimization",
  "constraint",
  "equilibrium",
  "convergence",
  "entropy",
  "symmetry",
  "recursion",
  "emergence",
  "bifurcation",
  "resonance",
  "topology",
  "duality",
  "invariant",
];

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});
turndown.remove(["script", "style", "nav", "header", "footer", "aside"]);

export function htmlToText(html: string): string {
  return turndown.turndown(html).trim();
}

function decodeEntities(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&");
}

/** DuckDuckGo wraps result links in a `/l/?uddg=<target>` redirect. */
export function resolveResultHref(href: string): string {
  const absolute = href.startsWith("//") ? `https:${href}` : href;
  try {
    const url = new URL(absolute, DUCKDUCKGO_HTML_URL);
    return url.searchParams.get("uddg") ?? url.toString();
  } catch {
    return absolute;
  }
}

export function parseFirstResult(html: string): { href: string; title: string } | null {
  const anchor = /<a\b([^>]*\bclass="[^"]*\bresult__a\b[^"]*"[^>]*)>([\s\S]*?)<\/a>/i.exec(html);
  if (!anchor) return null;
  const attrs = anchor[1] ?? "";
  const href = /\bhref="([^"]*)"/i.exec(attrs)?.[1] ?? "";
  const title = decodeEntities((anchor[2] ?? "").replace(/<[^>]+>/g, "")).trim();
  return { href: decodeEntities(href), title };
}

export interface WebSearchSourceOptions {
  maxPerMinute?: number;
  rateLimiter?: RateLimiter;
  chooseIndex?: (length: number) => number;
}

export function createWebSearchSource(options: WebSearchSourceOptions = {}): ContentSource {
  const limiter = options.rateLimiter ?? createRateLimiter(options.maxPerMinute ?? 10);
  const chooseIndex = options.chooseIndex ?? ((length: number) => Math.floor(Math.random() * length));

  const fetchPage = async (url: string, title: string, query: string): Promise<SourceResult> => {
    await limiter.waitIfNeeded();
    let html: string;
    try {
      const response = await fetch(url, { headers: { "User-Agent": USER_AGENT }, redirect: "follow" });
      if (!response.ok) {
        return emptyResult({ query, error: `HTTP ${response.status}` }, { url, title, content_type: "html" });
      }
      html = await response.text();
    } catch (error) {
      return emptyResult({ query, error: errorMessage(error) }, { url, title, content_type: "html" });
    }
    return {
      content: truncateContent(htmlToText(html), MAX_PAGE_CHARS),
      url,
      title,
      content_type: "html",
      metadata: { query, source: "web_search" },
    };
  };

  const search = async (query: string): Promise<SourceResult> => {
    await limiter.waitIfNeeded();
    let html: string;
    try {
      const response = await fetch(DUCKDUCKGO_HTML_URL, {
        method: "POST",
        headers: { "User-Agent": USER_AGENT, "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ q: query }).toString(),
      });
      if (!response.ok) {
        return emptyResult({ query, error: `HTTP ${response.status}` });
      }
      html = await response.text();
    } catch (error) {
      return emptyResult({ query, error: errorMessage(error) });
    }

    const first = parseFirstResult(html);
    if (!first) return emptyResult({ query, error: "no_results" });
    if (!first.href) return emptyResult({ query, error: "no_href" }, { title: first.title });
    return fetchPage(resolveResultHref(first.href), first.title, query);
  };

  const fetchRandom = async (): Promise<SourceResult> => {
    const word = SEED_WORDS[chooseIndex(SEED_WORDS.length)] ?? "theorem";
    return search(word);
  };

  return {
    name: "web_search",
    tier: 2,
    fetchRandom,
    async fetch(query) {
      if (query === undefined) return fetchRandom();
      return search(query);
    },
  };
}
