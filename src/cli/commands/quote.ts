import { Command, Option } from "clipanion";
import { QuoteAgent, type ExtractionReport } from "../../index.ts";
import { StaticDocumentSource } from "../../services/quote-page-fetcher.ts";
import {
  formatAnalysis,
  formatHealth,
  formatIndicators,
  formatPatterns,
  formatStockData,
} from "../../format.ts";

export class QuoteCommand extends Command {
  static override paths = [["quote"]];

  static override usage = Command.Usage({
    description: "Scrape quote data for one or more symbols",
    details: `
      Fetches each symbol's quote page and extracts price, trading metrics,
      financial ratios and company info. Fields the page does not expose are
      shown as N/A.

      The command exits with status 1 if any symbol could not be scraped.
    `,
    examples: [
      ["Quote a single symbol", "quotescope quote AAPL"],
      ["Quote several symbols as JSON", "quotescope quote AAPL MSFT --json"],
      ["Include indicators and AI analysis", "quotescope quote AAPL --history --analyze"],
      ["Extract from a saved page", "quotescope quote AAPL --html-file ./aapl.html"],
    ],
  });

  symbols = Option.Rest({ required: 1 });

  analyze = Option.Boolean("--analyze", false, {
    description: "Request an AI analysis of each quote",
  });

  history = Option.Boolean("--history", false, {
    description: "Fetch one year of daily bars and compute indicators",
  });

  json = Option.Boolean("--json", false, {
    description: "Print results as JSON",
  });

  health = Option.Boolean("--health", false, {
    description: "Print health and error summary after the batch",
  });

  htmlFile = Option.String("--html-file", {
    description: "Read the quote page from a saved HTML file instead of the network",
  });

  async execute() {
    const source = this.htmlFile
      ? await StaticDocumentSource.fromFile(this.htmlFile)
      : undefined;
    const agent = new QuoteAgent({ source });

    let failed = 0;
    const reports: ExtractionReport[] = [];

    for (const symbol of this.symbols) {
      const report = await agent.extractStockData(symbol, {
        includeAnalysis: this.analyze,
        includeHistory: this.history,
      });
      reports.push(report);

      if (!report.success) {
        failed++;
        if (!this.json) console.error(`Failed to scrape ${symbol}: ${report.error}`);
        continue;
      }
      if (this.json) continue;

      console.log(formatStockData(report.stockData));
      if (report.indicators) console.log(formatIndicators(report.indicators));
      if (report.patterns) console.log(formatPatterns(report.patterns));
      if (report.analysis) console.log(formatAnalysis(report.analysis));
      for (const insight of report.insights) console.log(`  • ${insight}`);
    }

    if (this.json) {
      const output = this.health
        ? { results: reports, health: agent.getHealth(), session: agent.getSessionSummary() }
        : reports;
      console.log(JSON.stringify(output, null, 2));
    } else if (this.health) {
      console.log(formatHealth(agent.getHealth()));
    }

    return failed > 0 ? 1 : 0;
  }
}
