import { AsyncCaller } from "@langchain/core/utils/async_caller";
import { load, type CheerioAPI } from "cheerio";

import { errorMessage } from "../errors.js";
import { stderrLogger, type Logger } from "../logging/logger.js";
import type { SourceDocument } from "../retrieval/types.js";

export type DocumentLoader = {
  /** Returns one document per URL that produced text, in input order. */
  load(urls: string[]): Promise<SourceDocument[]>;
};

export type ScrapeFn = (url: string) => Promise<CheerioAPI>;

const NOISE = "script, style, noscript, template, svg, nav, header, footer, aside, form";
const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote";

function squash(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Article text as blank-line separated blocks, falling back to the whole body. */
export function extractArticleText($: CheerioAPI): string {
  $(NOISE).remove();

  const blocks = $(BLOCKS)
    .toArray()
    .filter((el) => $(el).parents(BLOCKS).length === 0)
    .map((el) => squash($(el).text()))
    .filter((text) => text.length > 0);

  if (blocks.length > 0) return blocks.join("\n\n");
  return squash($("body").text());
}

/** Non-2xx response. `status` lets the caller skip retries on client errors. */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number, statusText: string) {
    super(`HTTP ${statusText ? `${status} ${statusText}` : status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

async function fetchHtml(url: string, timeoutMs: number): Promise<string> {
  const res = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: { accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8" }
  });
  if (!res.ok) {
    throw new HttpStatusError(url, res.status, res.statusText);
  }
  return res.text();
}

export function httpScraper(params: { timeoutMs: number; maxRetries?: number }): ScrapeFn {
  const caller = new AsyncCaller({ maxRetries: params.maxRetries ?? 1 });
  return async (url) => load(await caller.call(fetchHtml, url, params.timeoutMs));
}

export class WebDocumentLoader implements DocumentLoader {
  private readonly scrape: ScrapeFn;
  private readonly logger: Logger;

  constructor(
    params: { timeoutMs?: number; maxRetries?: number; scrape?: ScrapeFn; logger?: Logger } = {}
  ) {
    this.scrape =
      params.scrape ??
      httpScraper({ timeoutMs: params.timeoutMs ?? 15_000, maxRetries: params.maxRetries });
    this.logger = params.logger ?? stderrLogger;
  }

  async load(urls: string[]): Promise<SourceDocument[]> {
    const loaded = await Promise.all(urls.map((url) => this.loadOne(url)));
    return loaded.filter((doc): doc is SourceDocument => doc !== null);
  }

  private async loadOne(url: string): Promise<SourceDocument | null> {
    let $: CheerioAPI;
    try {
      $ = await this.scrape(url);
    } catch (err: unknown) {
      this.logger.warn(`skipped ${url}: ${errorMessage(err)}`);
      return null;
    }

    const text = extractArticleText($);
    if (!text) {
      this.logger.warn(`skipped ${url}: no text content`);
      return null;
    }
    return { url, text };
  }
}
