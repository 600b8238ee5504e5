import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { DepositCommand, WithdrawCommand } from "../../src/cli/commands/deposit.js";
import { DepositsCommand, SummaryCommand, TotalsCommand } from "../../src/cli/commands/account.js";
import { KeeperRunsCommand, ProbeCommand, SweepCommand } from "../../src/cli/commands/expiry.js";
import { ConfigValidateCommand } from "../../src/cli/commands/config-cmd.js";
import { createCli } from "../../src/cli/program.js";
import { account } from "../helpers/fixtures.js";

// Helper to capture stdout
function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

const ALICE = account(1);

async function deposit(amount: string, period = "short", base = false): Promise<string> {
  const cmd = new DepositCommand();
  cmd.account = ALICE;
  cmd.amount = amount;
  cmd.period = period;
  cmd.base = base;
  const { stream, output } = captureStdout();
  cmd.context = { ...cmd.context, stdout: stream };
  await cmd.execute();
  return output();
}

describe("CLI: ledger commands", () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), "tenure-cli-test-"));
    process.env["TENURE_STATE_DIR"] = stateDir;
  });

  afterEach(() => {
    delete process.env["TENURE_STATE_DIR"];
    rmSync(stateDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("deposits decimal units", async () => {
    const out = await deposit("1");
    expect(out).toMatch(/^Deposited 1 as #0\n {2}locked until: \d{4}-\d{2}-\d{2}T/);
    expect(out).toContain("  role:         ActiveParticipant\n");
  });

  it("deposits base units", async () => {
    const out = await deposit("2000000000000000", "short", true);
    expect(out.split("\n")[0]).toBe("Deposited 0.002 as #0");
  });

  it("rejects something that is not an amount", async () => {
    expect(await deposit("lots")).toBe("Not an amount: lots\n");
    expect(process.exitCode).toBe(1);
  });

  it("reports a domain error with its code", async () => {
    expect(await deposit("1", "200")).toBe(
      "Error (InvalidLockPeriod): Unsupported lock period: 200ms\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("refuses to withdraw a locked deposit", async () => {
    await deposit("1");
    const cmd = new WithdrawCommand();
    cmd.account = ALICE;
    cmd.index = "0";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toMatch(/^Error \(LockNotExpired\): Deposit 0 is locked until /);
    expect(process.exitCode).toBe(1);
  });

  it("rejects an index that is not a plain integer", async () => {
    await deposit("1");
    const cmd = new WithdrawCommand();
    cmd.account = ALICE;
    cmd.index = "0x1";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("Not an index: 0x1\n");
    expect(process.exitCode).toBe(1);
  });

  it("lists deposits", async () => {
    await deposit("0.5", "medium");
    const cmd = new DepositsCommand();
    cmd.account = ALICE;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    const lines = output().split("\n");
    expect(lines[0]).toBe("Deposits (1):");
    expect(lines[1]).toMatch(/^ {2}#0 {2}\[LOCKED\] {2}0\.5 {2}until \d{4}-/);
  });

  it("summarises an account without deposits", async () => {
    const cmd = new SummaryCommand();
    cmd.account = ALICE;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe(
      `Account:   ${ALICE}\n` +
        "Deposits:  0\n" +
        "Lifetime:  0\n" +
        "Active:    0\n" +
        "Roles:     (none)\n",
    );
  });

  it("rejects a malformed account", async () => {
    const cmd = new SummaryCommand();
    cmd.account = "bob";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("Error (InvalidAccount): Not an account address: bob\n");
  });

  it("prints totals and the conservation check", async () => {
    await deposit("2", "long");
    const cmd = new TotalsCommand();
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe(
      "Total locked:    2\n" +
        "Record sum:      2\n" +
        "Custody balance: 2\n" +
        "Conservation:    OK\n",
    );
    expect(process.exitCode).toBeUndefined();
  });
});

describe("CLI: expiry commands", () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), "tenure-cli-test-"));
    process.env["TENURE_STATE_DIR"] = stateDir;
  });

  afterEach(() => {
    delete process.env["TENURE_STATE_DIR"];
    rmSync(stateDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("probes, sweeps and records the round", async () => {
    await deposit("0.5");

    const probe = new ProbeCommand();
    const probed = captureStdout();
    probe.context = { ...probe.context, stdout: probed.stream };
    await probe.execute();
    expect(probed.output()).toBe("No lapsed roles.\n");

    const sweep = new SweepCommand();
    sweep.accounts = [];
    const swept = captureStdout();
    sweep.context = { ...sweep.context, stdout: swept.stream };
    await sweep.execute();
    expect(swept.output()).toBe("Swept 0 of 0 candidate(s)\n");

    const runs = new KeeperRunsCommand();
    runs.limit = "5";
    const listed = captureStdout();
    runs.context = { ...runs.context, stdout: listed.stream };
    await runs.execute();
    expect(listed.output()).toMatch(/^ {2}\S+ {2}manual {2}swept 0\/0 {2}ok\n$/);
  });

  it("sweeps named accounts that have not lapsed as no-ops", async () => {
    await deposit("0.5");
    const sweep = new SweepCommand();
    sweep.accounts = [ALICE];
    const { stream, output } = captureStdout();
    sweep.context = { ...sweep.context, stdout: stream };
    await sweep.execute();

    expect(output()).toBe("Swept 0 of 1 candidate(s)\n");
  });

  it("records a failed sweep before reporting it", async () => {
    const sweep = new SweepCommand();
    sweep.accounts = ["bob"];
    const swept = captureStdout();
    sweep.context = { ...sweep.context, stdout: swept.stream };
    await sweep.execute();

    expect(swept.output()).toBe("Error (InvalidAccount): Not an account address: bob\n");
    expect(process.exitCode).toBe(1);

    const runs = new KeeperRunsCommand();
    runs.limit = "5";
    const listed = captureStdout();
    runs.context = { ...runs.context, stdout: listed.stream };
    await runs.execute();
    expect(listed.output()).toMatch(
      /^ {2}\S+ {2}manual {2}swept 0\/1 {2}failed: Not an account address: bob\n$/,
    );
  });
});

describe("CLI: ConfigValidateCommand", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "tenure-cli-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  async function validate(path: string): Promise<string> {
    const cmd = new ConfigValidateCommand();
    cmd.configFile = path;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();
    return output();
  }

  it("validates a correct config file", async () => {
    const configPath = join(tempDir, "valid.json");
    writeFileSync(
      configPath,
      JSON.stringify({
        network: "testnet",
        networks: { testnet: { triggerRegistry: "registry-test", pollSchedule: "* * * * *" } },
        server: { port: 18545 },
        keeper: { enabled: true },
      }),
    );
    expect(await validate(configPath)).toBe(`Config is valid: ${configPath}\n`);
  });

  it("rejects an invalid config file", async () => {
    const configPath = join(tempDir, "invalid.json");
    writeFileSync(configPath, JSON.stringify({ server: { port: "not-a-number" } }));
    expect(await validate(configPath)).toContain(`Config is INVALID: ${configPath}\n`);
    expect(process.exitCode).toBe(1);
  });

  it("reports missing config file", async () => {
    const missing = join(tempDir, "nonexistent.json");
    expect(await validate(missing)).toBe(`Config file not found: ${missing}\n`);
  });
});

describe("CLI: program", () => {
  it("prints the package version", async () => {
    const { stream, output } = captureStdout();
    const code = await createCli().run(["--version"], { stdout: stream });
    expect(code).toBe(0);
    expect(output()).toBe("0.1.0\n");
  });
});
