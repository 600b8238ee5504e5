import { loadConfig } from "../config/loader.js";
import { getStateDir, ensureDir } from "../config/paths.js";
import { selectNetwork } from "../config/schema.js";
import type { TenureConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { TenureDB } from "../vault/db.js";
import { TenureVault } from "../vault/lock-vault.js";
import { SweepRunLog } from "../expiry/run-log.js";
import { ExpiryKeeper } from "../expiry/keeper.js";
import { createApp, VaultServer } from "./server.js";

export interface ServiceContext {
  config: TenureConfig;
  logger: Logger;
  db: TenureDB;
  vault: TenureVault;
  runLog: SweepRunLog;
  keeper: ExpiryKeeper | null;
  server: VaultServer;
  shutdown: () => Promise<void>;
}

export interface OpenedVault {
  db: TenureDB;
  vault: TenureVault;
  runLog: SweepRunLog;
}

const SHUTDOWN_TIMEOUT_MS = 5_000;

/** Opens the state database and wires the vault over it. */
export function openVault(stateDir: string, logger: Logger): OpenedVault {
  const db = new TenureDB(ensureDir(stateDir));
  const vault = new TenureVault({ db, logger });
  const runLog = new SweepRunLog(db, logger);
  return { db, vault, runLog };
}

export async function startService(configPath?: string): Promise<ServiceContext> {
  // 1. Load config; the network selection is fixed for the life of the process
  const config = loadConfig(configPath);
  const network = selectNetwork(config);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info({ network: config.network }, "Starting tenure service...");

  // 3. Open state
  const { db, vault, runLog } = openVault(getStateDir(), logger);

  const conservation = vault.verifyConservation();
  if (!conservation.holds) {
    logger.warn(
      {
        totalLocked: conservation.totalLocked.toString(),
        recordSum: conservation.recordSum.toString(),
        custodyBalance: conservation.custodyBalance.toString(),
      },
      "Conservation check failed at startup",
    );
  }

  // 4. Optional self-scheduling keeper
  let keeper: ExpiryKeeper | null = null;
  if (config.keeper.enabled) {
    keeper = new ExpiryKeeper({ vault, runLog, network, logger });
    keeper.start();
  }

  // 5. HTTP API
  const server = new VaultServer(createApp(vault, runLog, logger), config.server.port, config.server.hostname);
  await server.start();
  logger.info({ port: config.server.port, hostname: config.server.hostname }, "API server started");

  // 6. Graceful shutdown
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    keeper?.stop();
    await server.stop();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("Tenure service started");
  return { config, logger, db, vault, runLog, keeper, server, shutdown };
}
