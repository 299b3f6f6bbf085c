#!/usr/bin/env tsx

import { Cli, Builtins } from "clipanion";
import { QuoteCommand } from "./commands/quote.ts";
import { HistoryCommand } from "./commands/history.ts";
import { ServeCommand } from "./commands/serve.ts";

const cli = new Cli({
  binaryLabel: "quotescope",
  binaryName: "quotescope",
  binaryVersion: "1.0.0",
});

cli.register(QuoteCommand);
cli.register(HistoryCommand);
cli.register(ServeCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2));
