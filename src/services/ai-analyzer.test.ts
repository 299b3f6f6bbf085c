import { describe, it, expect, vi } from "vitest";
import axios, { AxiosError, type AxiosAdapter } from "axios";
import { AiAnalyzer, parseAnalysisReply } from "./ai-analyzer.ts";
import { ErrorTracker } from "../resilience/error-tracker.ts";
import { DEFAULT_CONFIG } from "../config.ts";
import { createStockData } from "../types/index.ts";
import type { Logger } from "../logger.ts";

const quiet: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const apple = createStockData("AAPL", {
  priceInfo: { currentPrice: 150.25, priceChange: -2.3, timestamp: "2024-03-04T15:00:00.000Z" },
  companyInfo: { companyName: "Apple Inc." },
});

const settings = { ...DEFAULT_CONFIG.ai, apiKey: "test-secret" };

function clientWith(adapter: AxiosAdapter) {
  return axios.create({ baseURL: settings.baseUrl, adapter });
}

describe("parseAnalysisReply", () => {
  it("reads the JSON object inside a reply", () => {
    const reply =
      'Here is my view: {"insights":["Margins expanding"],"recommendations":["Hold"],"confidence_score":0.9} Thanks.';
    expect(parseAnalysisReply(reply)).toEqual({
      insights: ["Margins expanding"],
      recommendations: ["Hold"],
      confidenceScore: 0.9,
    });
  });

  it("defaults the confidence score", () => {
    expect(parseAnalysisReply('{"insights":["a"]}')).toEqual({
      insights: ["a"],
      recommendations: [],
      confidenceScore: 0.7,
    });
  });

  it("falls back to the raw text", () => {
    const fallback = { insights: ["no json here"], recommendations: [], confidenceScore: 0.5 };
    expect(parseAnalysisReply("no json here")).toEqual(fallback);
    expect(parseAnalysisReply('{"confidence_score": 3}').confidenceScore).toBe(0.5);
    expect(parseAnalysisReply("{not json}").insights).toEqual(["{not json}"]);
  });
});

describe("AiAnalyzer", () => {
  it("reports disabled without an API key", async () => {
    const errors = new ErrorTracker({ logger: quiet });
    const analyzer = new AiAnalyzer({ ...settings, apiKey: "" }, errors);

    const result = await analyzer.analyze(apple);

    expect(analyzer.enabled).toBe(false);
    expect(result.analysisType).toBe("disabled");
    expect(result.insights).toEqual(["AI analysis is disabled - no API key configured"]);
  });

  it("sends the prompt and parses the completion", async () => {
    const requests: unknown[] = [];
    const adapter: AxiosAdapter = async (config) => {
      requests.push(JSON.parse(String(config.data)));
      return {
        data: {
          choices: [
            {
              message: {
                content:
                  '{"insights":["Trading below recent highs"],"recommendations":["Watch support"],"confidence_score":0.8}',
              },
            },
          ],
        },
        status: 200,
        statusText: "OK",
        headers: {},
        config,
      };
    };
    const analyzer = new AiAnalyzer(settings, new ErrorTracker({ logger: quiet }), clientWith(adapter));

    const result = await analyzer.analyze(apple);

    expect(result).toMatchObject({
      symbol: "AAPL",
      analysisType: "comprehensive",
      insights: ["Trading below recent highs"],
      recommendations: ["Watch support"],
      confidenceScore: 0.8,
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      model: settings.model,
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
    });
    expect(JSON.stringify(requests[0])).toContain("Apple Inc. (AAPL)");
  });

  it("turns API failures into an error result", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError("Request failed with status code 401", "ERR_BAD_REQUEST", config, undefined, {
        data: {},
        status: 401,
        statusText: "Unauthorized",
        headers: {},
        config,
      });
    };
    const errors = new ErrorTracker({ logger: quiet });
    const analyzer = new AiAnalyzer(settings, errors, clientWith(adapter));

    const result = await analyzer.analyze(apple);

    expect(result.analysisType).toBe("error");
    expect(result.insights).toEqual(["Analysis failed: AI API unauthorized: check the API key"]);
    expect(errors.getErrors()[0]?.category).toBe("api");
  });
});
