import { describe, it, expect, vi } from "vitest";
import { IntelligentExtractor } from "./intelligent-extractor.ts";
import { parseQuoteDocument, type QuoteDocument } from "./document.ts";
import { ErrorTracker } from "../resilience/error-tracker.ts";
import type { Logger } from "../logger.ts";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const SUMMARY_PAGE = `<html>
<head><title>Apple Inc. (AAPL) Stock Price, News, Quote</title></head>
<body>
<h1>Apple Inc. (AAPL)</h1>
<fin-streamer data-symbol="AAPL" data-field="regularMarketPrice">150.25</fin-streamer>
<table>
<tr><td>Previous Close</td><td>152.55</td></tr>
<tr><td>Volume</td><td>52,341,245</td></tr>
<tr><td>Avg. Volume</td><td>61.2M</td></tr>
<tr><td>PE Ratio (TTM)</td><td>24.51</td></tr>
<tr><td>Forward Dividend &amp; Yield</td><td>0.96 (0.52%)</td></tr>
</table>
</body>
</html>`;

describe("IntelligentExtractor", () => {
  const extractor = () => new IntelligentExtractor({ logger: silentLogger() });

  it("reads price fields through the symbol-specific attribute", () => {
    const doc = parseQuoteDocument(SUMMARY_PAGE);
    expect(extractor().extract(doc, "currentPrice", "AAPL")).toBe(150.25);
  });

  it("reads labeled table rows", () => {
    const doc = parseQuoteDocument(SUMMARY_PAGE);
    const ex = extractor();
    expect(ex.extract(doc, "previousClose", "AAPL")).toBe(152.55);
    expect(ex.extract(doc, "volume", "AAPL")).toBe(52_341_245);
    expect(ex.extract(doc, "avgVolume", "AAPL")).toBe(61_200_000);
    expect(ex.extract(doc, "peRatio", "AAPL")).toBe(24.51);
    expect(ex.extract(doc, "dividendYield", "AAPL")).toBe(0.52);
  });

  it("cleans the company name from the page header", () => {
    const doc = parseQuoteDocument(SUMMARY_PAGE);
    expect(extractor().extract(doc, "companyName", "AAPL")).toBe("Apple Inc.");
  });

  it("falls back to page metadata for the company name", () => {
    const doc = parseQuoteDocument(`<html><head>
      <meta property="og:title" content="Tesla, Inc. (TSLA) Stock Price, News, Quote &amp; History">
      </head><body></body></html>`);
    expect(extractor().extract(doc, "companyName", "TSLA")).toBe("Tesla, Inc.");
  });

  it("reads values embedded in page scripts", () => {
    const doc = parseQuoteDocument(`<html><body>
      <script>root.App.main = {"regularMarketPrice":{"raw":187.44,"fmt":"187.44"}};</script>
      </body></html>`);
    expect(extractor().extract(doc, "currentPrice", "MSFT")).toBe(187.44);
  });

  it("returns undefined when no strategy finds the field", () => {
    const doc = parseQuoteDocument("<html><body><p>Nothing here</p></body></html>");
    expect(extractor().extract(doc, "currentPrice", "AAPL")).toBeUndefined();
    expect(extractor().extract(doc, "beta", "AAPL")).toBeUndefined();
  });

  it("rejects implausible prices and keeps looking", () => {
    const page = `<html><body>
      <fin-streamer data-symbol="AAPL" data-field="regularMarketPrice">20000</fin-streamer>
      <div data-testid="qsp-price">$199.99</div>
      </body></html>`;
    const doc = parseQuoteDocument(page);
    expect(extractor().extract(doc, "currentPrice", "AAPL")).toBe(199.99);

    const wide = new IntelligentExtractor({
      logger: silentLogger(),
      bounds: { priceMin: 0.01, priceMax: 50_000, ratioMin: -1000, ratioMax: 1000 },
    });
    expect(wide.extract(doc, "currentPrice", "AAPL")).toBe(20000);
  });

  it("evicts a stale cached strategy and falls through", () => {
    const ex = extractor();
    const first = parseQuoteDocument(SUMMARY_PAGE);
    expect(ex.extract(first, "currentPrice", "AAPL")).toBe(150.25);
    expect(ex.cachedStrategy("AAPL", "currentPrice")).toBe("directAttribute");

    const redesigned = parseQuoteDocument(
      `<html><body><div data-testid="qsp-price">151.00</div></body></html>`
    );
    expect(ex.extract(redesigned, "currentPrice", "AAPL")).toBe(151);
    expect(ex.cachedStrategy("AAPL", "currentPrice")).toBe("fallbackSelectors");
    expect(ex.cacheSize).toBe(1);
  });

  it("gives the same answers with the cache disabled", () => {
    const ex = new IntelligentExtractor({ logger: silentLogger(), cacheEnabled: false });
    const doc = parseQuoteDocument(SUMMARY_PAGE);
    expect(ex.extract(doc, "currentPrice", "AAPL")).toBe(150.25);
    expect(ex.extract(doc, "volume", "AAPL")).toBe(52_341_245);
    expect(ex.cacheSize).toBe(0);
  });

  it("clears the cache", () => {
    const ex = extractor();
    ex.extract(parseQuoteDocument(SUMMARY_PAGE), "currentPrice", "AAPL");
    ex.clearCache();
    expect(ex.cacheSize).toBe(0);
  });

  it("never throws when the document itself fails", () => {
    const boom = (): never => {
      throw new Error("boom");
    };
    const broken: QuoteDocument = {
      find: boom,
      findAll: boom,
      pageText: boom,
      scripts: boom,
    };
    const logger = silentLogger();
    const errors = new ErrorTracker({ logger: silentLogger() });
    const ex = new IntelligentExtractor({ logger, errors });

    expect(ex.extract(broken, "currentPrice", "AAPL")).toBeUndefined();
    expect(ex.extract(broken, "companyName", "AAPL")).toBeUndefined();
    expect(ex.extract(broken, "peRatio", "AAPL")).toBeUndefined();
    expect(logger.debug).toHaveBeenCalled();

    const recorded = errors.getErrors();
    expect(recorded).toHaveLength(vi.mocked(logger.debug).mock.calls.length);
    expect(recorded.every((e) => e.category === "parsing" && e.severity === "low")).toBe(true);
    expect(recorded[0]?.errorMessage).toBe("boom");
    expect(recorded[0]?.context).toEqual({
      operation: "extract",
      strategy: "directAttribute",
      field: "currentPrice",
      symbol: "AAPL",
    });
  });

  it("scans currency-marked leaves for the current price only", () => {
    const doc = parseQuoteDocument(
      "<html><body><div><span>$150.25</span><span>Market data</span></div></body></html>"
    );
    const ex = extractor();
    expect(ex.extract(doc, "currentPrice", "AAPL")).toBe(150.25);
    expect(ex.extract(doc, "previousClose", "AAPL")).toBeUndefined();
    expect(ex.extract(doc, "openPrice", "AAPL")).toBeUndefined();
  });

  it("reads company profile rows", () => {
    const doc = parseQuoteDocument(`<html><body><table>
      <tr><td>Sector</td><td>Technology</td></tr>
      <tr><td>Full Time Employees</td><td>164,000</td></tr>
      <tr><td>Headquarters</td><td>Cupertino, CA</td></tr>
      <tr><td>Website</td><td>https://www.example.com</td></tr>
      </table></body></html>`);
    const ex = extractor();
    expect(ex.extract(doc, "sector", "AAPL")).toBe("Technology");
    expect(ex.extract(doc, "employees", "AAPL")).toBe(164_000);
    expect(ex.extract(doc, "headquarters", "AAPL")).toBe("Cupertino, CA");
    expect(ex.extract(doc, "website", "AAPL")).toBe("https://www.example.com");
  });
});
