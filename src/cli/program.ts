import { Builtins, Cli } from "clipanion";
import { createRequire } from "node:module";
import { ServeCommand } from "./commands/serve.js";
import { DepositCommand, WithdrawCommand } from "./commands/deposit.js";
import { DepositsCommand, SummaryCommand, TotalsCommand } from "./commands/account.js";
import { KeeperRunsCommand, ProbeCommand, SweepCommand } from "./commands/expiry.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { StatusCommand } from "./commands/status.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Tenure",
    binaryName: "tenure",
    binaryVersion: pkg.version,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  cli.register(ServeCommand);

  // Ledger
  cli.register(DepositCommand);
  cli.register(WithdrawCommand);
  cli.register(DepositsCommand);
  cli.register(SummaryCommand);
  cli.register(TotalsCommand);

  // Expiry
  cli.register(ProbeCommand);
  cli.register(SweepCommand);
  cli.register(KeeperRunsCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(StatusCommand);

  return cli;
}
