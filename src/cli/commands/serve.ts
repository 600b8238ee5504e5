import { Command, Option } from "clipanion";
import { startService } from "../../gateway/lifecycle.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the HTTP API and, when enabled, the expiry keeper",
    examples: [
      ["Start with default config", "tenure serve"],
      ["Start with custom config", "tenure serve --config ./tenure.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      await startService(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start service: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // The server handle keeps the process alive until a signal closes it.
    return 0;
  }
}
