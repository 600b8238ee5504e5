import { Command } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { selectNetwork } from "../../config/schema.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration and state locations",
    examples: [["Show status", "tenure status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const network = selectNetwork(config);
    this.context.stdout.write(`Tenure Status\n`);
    this.context.stdout.write(`-------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(`API:         ${config.server.hostname}:${config.server.port}\n`);
    this.context.stdout.write(`Network:     ${config.network} (registry ${network.triggerRegistry})\n`);
    this.context.stdout.write(
      `Keeper:      ${config.keeper.enabled ? `enabled, ${network.pollSchedule}` : "disabled"}\n`,
    );
  }
}
