import { Command, Option } from "clipanion";
import * as t from "typanion";
import { QuoteAgent } from "../../index.ts";
import { INTERVALS, PERIODS } from "../../services/historical.ts";
import { calculateTechnicalIndicators } from "../../analysis/indicators.ts";
import { analyzePricePatterns } from "../../analysis/patterns.ts";
import { formatIndicators, formatPatterns } from "../../format.ts";

export class HistoryCommand extends Command {
  static override paths = [["history"]];

  static override usage = Command.Usage({
    description: "Technical indicators and price patterns from historical bars",
    examples: [
      ["One year of daily bars", "quotescope history AAPL"],
      ["Six months, weekly", "quotescope history AAPL --period 6mo --interval 1wk"],
    ],
  });

  symbol = Option.String({ required: true });

  period = Option.String("--period", "1y", {
    description: `Range of data (${PERIODS.join(", ")})`,
    validator: t.isEnum(PERIODS),
  });

  interval = Option.String("--interval", "1d", {
    description: `Bar size (${INTERVALS.join(", ")})`,
    validator: t.isEnum(INTERVALS),
  });

  json = Option.Boolean("--json", false, {
    description: "Print results as JSON",
  });

  async execute() {
    const agent = new QuoteAgent();
    const symbol = this.symbol.toUpperCase();

    const history = await agent.historical.getHistorical(symbol, this.period, this.interval);
    if (!history) {
      console.error(`No historical data available for ${symbol}`);
      return 1;
    }

    const indicators = calculateTechnicalIndicators(history);
    const patterns = analyzePricePatterns(history);

    if (this.json) {
      console.log(JSON.stringify({ symbol, bars: history.dataPoints.length, indicators, patterns }, null, 2));
      return 0;
    }

    console.log(`${symbol}: ${history.dataPoints.length} bars (${this.period}, ${this.interval})`);
    console.log(formatIndicators(indicators));
    console.log(formatPatterns(patterns));
    return 0;
  }
}
