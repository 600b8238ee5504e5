import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { TenureVault } from "../vault/lock-vault.js";
import type { DepositRecord } from "../ledger/types.js";
import type { TimedRole } from "../roles/types.js";
import { parseLockPeriod } from "../ledger/periods.js";
import { TenureError, type TenureErrorCode } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { SweepRunLog } from "../expiry/run-log.js";

const amountSchema = z
  .string()
  .regex(/^\d+$/, "amount must be a base-unit integer string")
  .transform((v) => BigInt(v));

const depositBody = z.object({
  account: z.string().min(1),
  amount: amountSchema,
  lockPeriod: z.union([z.string().min(1), z.number()]).transform((v) => parseLockPeriod(v)),
});

const withdrawBody = z.object({
  account: z.string().min(1),
  index: z.number().int(),
});

const indexParams = z.object({
  index: z.string().regex(/^\d+$/, "index must be a non-negative integer").transform(Number),
});

const sweepBody = z.object({
  candidates: z.array(z.string().min(1)),
  count: z.number().int().nonnegative().optional(),
});

const STATUS: Record<TenureErrorCode, 400 | 404 | 409 | 502> = {
  ZeroAmount: 400,
  InvalidLockPeriod: 400,
  InvalidAccount: 400,
  InvalidIndex: 404,
  LockNotExpired: 409,
  AlreadyWithdrawn: 409,
  TransferFailed: 502,
};

export function serializeRecord(r: DepositRecord) {
  return {
    index: r.index,
    amount: r.amount.toString(),
    originalAmount: r.originalAmount.toString(),
    createdAt: r.createdAt,
    lockUntil: r.lockUntil,
    state: r.state,
    withdrawn: r.withdrawn,
  };
}

function serializeTimedRole(t: TimedRole | null) {
  return t ? { active: t.active, lastActive: t.lastActive, expiry: t.expiry } : null;
}

/**
 * JSON surface over the vault. Amounts travel as decimal strings of base
 * units. Reads are open; every route maps `TenureError` codes to a status.
 */
export function createApp(vault: TenureVault, runLog: SweepRunLog, logger: Logger): Hono {
  const app = new Hono();
  const startedAt = Date.now();
  const log = logger.child({ component: "http" });

  app.onError((err, c) => {
    if (err instanceof TenureError) {
      log.warn({ code: err.code, path: c.req.path }, err.message);
      return c.json({ error: err.code, message: err.message }, STATUS[err.code]);
    }
    log.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json({ error: "internal", message: "Internal error" }, 500);
  });

  app.get("/health", (c) => {
    const conservation = vault.verifyConservation();
    return c.json({
      status: conservation.holds ? "ok" : "degraded",
      uptime: Date.now() - startedAt,
      totalLocked: conservation.totalLocked.toString(),
      conservation: {
        holds: conservation.holds,
        recordSum: conservation.recordSum.toString(),
        custodyBalance: conservation.custodyBalance.toString(),
      },
    });
  });

  app.post("/deposits", async (c) => {
    const body = depositBody.safeParse(await readJson(c));
    if (!body.success) return invalid(c, body.error);
    const { record, outcome } = vault.deposit(body.data.account, body.data.amount, body.data.lockPeriod);
    return c.json(
      {
        deposit: serializeRecord(record),
        role: outcome.kind === "none" ? null : outcome.role,
      },
      201,
    );
  });

  app.post("/withdrawals", async (c) => {
    const body = withdrawBody.safeParse(await readJson(c));
    if (!body.success) return invalid(c, body.error);
    const amount = vault.withdraw(body.data.account, body.data.index);
    return c.json({ index: body.data.index, amount: amount.toString() });
  });

  app.get("/totals", (c) => {
    return c.json({ totalLocked: vault.getTotalLocked().toString() });
  });

  app.get("/accounts/:account/deposits", (c) => {
    const deposits = vault.getUserDeposits(c.req.param("account"));
    return c.json({ deposits: deposits.map(serializeRecord) });
  });

  app.get("/accounts/:account/deposits/:index", (c) => {
    const params = indexParams.safeParse({ index: c.req.param("index") });
    if (!params.success) return invalid(c, params.error);
    const record = vault.getDepositByIndex(c.req.param("account"), params.data.index);
    return c.json({ deposit: serializeRecord(record) });
  });

  app.get("/accounts/:account/summary", (c) => {
    const s = vault.getSummary(c.req.param("account"));
    return c.json({
      account: s.account,
      depositCount: s.depositCount,
      lifetimeDeposited: s.lifetimeDeposited.toString(),
      activeDeposited: s.activeDeposited.toString(),
      roles: s.roles,
      timedRole: serializeTimedRole(s.timedRole),
    });
  });

  app.get("/expiry/probe", (c) => {
    return c.json(vault.probe());
  });

  app.post("/expiry/sweep", async (c) => {
    const body = sweepBody.safeParse(await readJson(c));
    if (!body.success) return invalid(c, body.error);
    const { candidates, count } = body.data;
    const startedAt = Date.now();
    try {
      const swept = vault.sweep(candidates, count);
      runLog.record({
        source: "external",
        candidates: candidates.length,
        swept,
        startedAt,
        completedAt: Date.now(),
        success: true,
      });
      return c.json({ swept });
    } catch (err) {
      runLog.record({
        source: "external",
        candidates: candidates.length,
        swept: 0,
        startedAt,
        completedAt: Date.now(),
        success: false,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  });

  return app;
}

/** Malformed JSON parses as `undefined` so the schema reports it. */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

function invalid(c: Context, error: z.ZodError) {
  return c.json(
    {
      error: "invalid_request",
      message: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
    },
    400,
  );
}

export class VaultServer {
  private server: ReturnType<typeof serve> | null = null;

  constructor(
    private readonly app: Hono,
    private readonly port: number,
    private readonly hostname: string,
  ) {}

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
