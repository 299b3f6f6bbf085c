import { Command } from "clipanion";
import { QuoteAgent } from "../../index.ts";
import { RpcServer } from "../../server/rpc-server.ts";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Run the JSON-RPC tool server on stdin/stdout",
    details: `
      Reads one JSON-RPC 2.0 request per line from stdin and writes one
      response per line to stdout. Logs go to stderr.
    `,
    examples: [["Start the server", "quotescope serve"]],
  });

  async execute() {
    const server = new RpcServer(new QuoteAgent());
    await server.serve(process.stdin, process.stdout);
    return 0;
  }
}
