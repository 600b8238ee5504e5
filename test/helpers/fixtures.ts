import { vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "../../src/logging/logger.js";
import type { TenureConfig } from "../../src/config/types.js";
import { TenureDB } from "../../src/vault/db.js";
import { TenureVault } from "../../src/vault/lock-vault.js";
import type { CurrencyRail } from "../../src/currency/custody.js";

/** 2026-01-01T00:00:00.000Z */
export const T0 = Date.UTC(2026, 0, 1);

export function mockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: ReturnType<typeof mockLogger>): Logger {
  return mock as unknown as Logger;
}

export interface FakeClock {
  readonly now: () => number;
  set(ms: number): void;
  advance(ms: number): void;
}

export function fakeClock(start: number = T0): FakeClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

/** Deterministic lower-case address for the n-th test account. */
export function account(n: number): string {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

export function mockRail(): CurrencyRail & {
  receive: ReturnType<typeof vi.fn>;
  transfer: ReturnType<typeof vi.fn>;
  balance: ReturnType<typeof vi.fn>;
} {
  return {
    receive: vi.fn(),
    transfer: vi.fn().mockReturnValue(true),
    balance: vi.fn().mockReturnValue(0n),
  };
}

export interface TestVault {
  dir: string;
  db: TenureDB;
  vault: TenureVault;
  clock: FakeClock;
  logger: ReturnType<typeof mockLogger>;
  cleanup(): void;
}

export function createTestVault(opts: { rail?: CurrencyRail; batchCap?: number } = {}): TestVault {
  const dir = mkdtempSync(join(tmpdir(), "tenure-test-"));
  const db = new TenureDB(dir);
  const clock = fakeClock();
  const logger = mockLogger();
  const vault = new TenureVault({
    db,
    logger: asLogger(logger),
    clock: clock.now,
    rail: opts.rail,
    batchCap: opts.batchCap,
  });
  return {
    dir,
    db,
    vault,
    clock,
    logger,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function makeTenureConfig(overrides: Partial<TenureConfig> = {}): TenureConfig {
  return {
    network: "local",
    networks: { local: { triggerRegistry: "local", pollSchedule: "*/5 * * * *" } },
    server: { port: 18545, hostname: "127.0.0.1" },
    keeper: { enabled: false },
    logging: { level: "info" },
    ...overrides,
  };
}
