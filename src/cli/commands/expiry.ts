import { Command, Option } from "clipanion";
import { formatTime, withVault } from "../context.js";

export class ProbeCommand extends Command {
  static override paths = [["expiry", "probe"]];

  static override usage = Command.Usage({
    description: "List accounts whose temporary role has lapsed (read-only)",
    examples: [["Probe for lapsed roles", "tenure expiry probe"]],
  });

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ vault }) => {
      const { workNeeded, candidates } = vault.probe();
      if (!workNeeded) {
        this.context.stdout.write("No lapsed roles.\n");
        return;
      }
      this.context.stdout.write(`Lapsed roles (${candidates.length}):\n`);
      for (const account of candidates) {
        this.context.stdout.write(`  ${account}\n`);
      }
    });
  }
}

export class SweepCommand extends Command {
  static override paths = [["expiry", "sweep"]];

  static override usage = Command.Usage({
    description: "Deactivate lapsed temporary roles, one bounded batch",
    details: `
      Without arguments, probes first and sweeps what the probe returns.
      With account arguments, sweeps only those accounts.
    `,
    examples: [
      ["Probe and sweep one batch", "tenure expiry sweep"],
      ["Sweep specific accounts", "tenure expiry sweep 0x1111111111111111111111111111111111111111"],
    ],
  });

  accounts = Option.Rest();

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ vault, runLog }) => {
      const startedAt = Date.now();
      let candidates: readonly string[] = this.accounts;
      let swept: number;
      try {
        if (candidates.length === 0) candidates = vault.probe().candidates;
        swept = candidates.length > 0 ? vault.sweep(candidates) : 0;
      } catch (err) {
        runLog.record({
          source: "manual",
          candidates: candidates.length,
          swept: 0,
          startedAt,
          completedAt: Date.now(),
          success: false,
          error: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }
      runLog.record({
        source: "manual",
        candidates: candidates.length,
        swept,
        startedAt,
        completedAt: Date.now(),
        success: true,
      });
      this.context.stdout.write(`Swept ${swept} of ${candidates.length} candidate(s)\n`);
    });
  }
}

export class KeeperRunsCommand extends Command {
  static override paths = [["expiry", "runs"]];

  static override usage = Command.Usage({
    description: "Show recent probe/sweep rounds",
    examples: [["Last 10 rounds", "tenure expiry runs --limit 10"]],
  });

  limit = Option.String("--limit", "20", { description: "Number of rounds to show" });

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ runLog }) => {
      const runs = runLog.recent(Number(this.limit) || 20);
      if (runs.length === 0) {
        this.context.stdout.write("No sweep rounds recorded.\n");
        return;
      }
      for (const run of runs) {
        const status = run.success ? "ok" : `failed: ${run.error ?? "unknown"}`;
        this.context.stdout.write(
          `  ${formatTime(run.startedAt)}  ${run.source}  swept ${run.swept}/${run.candidates}  ${status}\n`,
        );
      }
    });
  }
}
