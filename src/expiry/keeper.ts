import { Cron } from "croner";
import type { TenureVault } from "../vault/lock-vault.js";
import type { NetworkConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { SweepRunLog, SweepSource } from "./run-log.js";
import { systemClock, type Clock } from "../utils/types.js";

export interface ExpiryKeeperDeps {
  vault: TenureVault;
  runLog: SweepRunLog;
  network: NetworkConfig;
  logger: Logger;
  clock?: Clock;
}

export interface KeeperRun {
  readonly candidates: number;
  readonly swept: number;
}

/**
 * Optional self-scheduling driver for the probe/sweep pair. It only calls the
 * same public operations an external trigger would; the vault never wakes
 * itself up. One round per tick: a backlog above the batch cap drains over
 * several ticks.
 */
export class ExpiryKeeper {
  private readonly vault: TenureVault;
  private readonly runLog: SweepRunLog;
  private readonly network: NetworkConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private cron: Cron | null = null;

  constructor(deps: ExpiryKeeperDeps) {
    this.vault = deps.vault;
    this.runLog = deps.runLog;
    this.network = deps.network;
    this.logger = deps.logger.child({ component: "keeper" });
    this.clock = deps.clock ?? systemClock;
  }

  start(): void {
    if (this.cron) return;
    this.cron = new Cron(this.network.pollSchedule, { protect: true }, () => {
      this.runOnce("schedule");
    });
    this.logger.info(
      {
        schedule: this.network.pollSchedule,
        triggerRegistry: this.network.triggerRegistry,
        nextRun: this.cron.nextRun()?.toISOString() ?? null,
      },
      "Expiry keeper started",
    );
  }

  stop(): void {
    if (this.cron) {
      this.cron.stop();
      this.cron = null;
      this.logger.info("Expiry keeper stopped");
    }
  }

  isRunning(): boolean {
    return this.cron !== null;
  }

  /** Probes, sweeps when there is work, and records the round. Never throws. */
  runOnce(source: SweepSource = "manual"): KeeperRun {
    const startedAt = this.clock();
    let candidates = 0;
    try {
      const probe = this.vault.probe();
      candidates = probe.candidates.length;
      const swept = probe.workNeeded ? this.vault.sweep(probe.candidates) : 0;
      this.runLog.record({
        source,
        candidates,
        swept,
        startedAt,
        completedAt: this.clock(),
        success: true,
      });
      return { candidates, swept };
    } catch (err) {
      this.runLog.record({
        source,
        candidates,
        swept: 0,
        startedAt,
        completedAt: this.clock(),
        success: false,
        error: err instanceof Error ? err.message : String(err),
      });
      return { candidates, swept: 0 };
    }
  }
}
