import axios from "axios";
import type { AxiosInstance } from "axios";
import { readFile } from "fs/promises";
import { parseQuoteDocument, type QuoteDocument } from "../extraction/document.ts";
import { DocumentFetchError } from "../errors.ts";
import type { Config } from "../types/index.ts";

/** Produces a parsed quote page for a symbol, or throws. */
export interface DocumentSource {
  fetch(symbol: string): Promise<QuoteDocument>;
}

export class HttpDocumentSource implements DocumentSource {
  private axios: AxiosInstance;
  private lastRequestTime: number = 0;
  private readonly minRequestDelay: number;
  private readonly quotePath: string;

  constructor(source: Config["source"], client?: AxiosInstance) {
    this.axios =
      client ??
      axios.create({
        baseURL: source.baseUrl,
        headers: {
          "User-Agent": source.userAgent,
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
          Connection: "keep-alive",
          "Upgrade-Insecure-Requests": "1",
          "Cache-Control": "max-age=0",
        },
        timeout: source.timeoutMs,
        responseType: "text",
      });
    this.minRequestDelay = source.requestDelayMs;
    this.quotePath = source.quotePath;
  }

  private async enforceRateLimit(): Promise<void> {
    const now = Date.now();
    const timeSinceLastRequest = now - this.lastRequestTime;
    if (timeSinceLastRequest < this.minRequestDelay) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.minRequestDelay - timeSinceLastRequest)
      );
    }
    this.lastRequestTime = Date.now();
  }

  async fetch(symbol: string): Promise<QuoteDocument> {
    await this.enforceRateLimit();

    try {
      const response = await this.axios.get<unknown>(
        this.quotePath.replace("{symbol}", encodeURIComponent(symbol))
      );
      if (typeof response.data !== "string" || !response.data.trim()) {
        throw new DocumentFetchError(`Empty quote page for ${symbol}`, response.status);
      }
      return parseQuoteDocument(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) {
          throw new DocumentFetchError(`Quote page for ${symbol} not found`, 404, {
            cause: error,
          });
        }
        if (status === 403 || status === 429) {
          throw new DocumentFetchError(
            `Blocked by quote source (HTTP ${status}), try again later`,
            status,
            { cause: error }
          );
        }
        // Keep axios' own message ("timeout of 30000ms exceeded",
        // "connect ECONNREFUSED ...") so classification sees it
        throw new DocumentFetchError(
          status ? `Quote source error: HTTP ${status}` : error.message,
          status,
          { cause: error }
        );
      }
      throw error;
    }
  }
}

/**
 * Serves saved HTML: one page for every symbol, or a page per symbol.
 * Used for offline runs (`--html-file`) and tests.
 */
export class StaticDocumentSource implements DocumentSource {
  constructor(private readonly pages: string | Record<string, string>) {}

  static async fromFile(path: string): Promise<StaticDocumentSource> {
    return new StaticDocumentSource(await readFile(path, "utf-8"));
  }

  async fetch(symbol: string): Promise<QuoteDocument> {
    const html =
      typeof this.pages === "string" ? this.pages : this.pages[symbol];
    if (html === undefined) {
      throw new DocumentFetchError(`No saved page for ${symbol}`, 404);
    }
    return parseQuoteDocument(html);
  }
}
