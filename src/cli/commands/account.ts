import { Command, Option } from "clipanion";
import { formatAmount } from "../../ledger/periods.js";
import { formatTime, withVault } from "../context.js";

export class DepositsCommand extends Command {
  static override paths = [["deposits"]];

  static override usage = Command.Usage({
    description: "List every deposit slot of an account, withdrawn ones included",
    examples: [["List deposits", "tenure deposits 0x1111111111111111111111111111111111111111"]],
  });

  account = Option.String({ name: "account", required: true });

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ vault }) => {
      const deposits = vault.getUserDeposits(this.account);
      if (deposits.length === 0) {
        this.context.stdout.write("No deposits.\n");
        return;
      }

      this.context.stdout.write(`Deposits (${deposits.length}):\n`);
      for (const d of deposits) {
        const status = d.withdrawn ? "WITHDRAWN" : d.state;
        this.context.stdout.write(
          `  #${d.index}  [${status}]  ${formatAmount(d.amount)}  until ${formatTime(d.lockUntil)}\n`,
        );
      }
    });
  }
}

export class SummaryCommand extends Command {
  static override paths = [["summary"]];

  static override usage = Command.Usage({
    description: "Show deposit totals and roles for an account",
    examples: [["Account summary", "tenure summary 0x1111111111111111111111111111111111111111"]],
  });

  account = Option.String({ name: "account", required: true });

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ vault }) => {
      const s = vault.getSummary(this.account);
      this.context.stdout.write(
        `Account:   ${s.account}\n` +
          `Deposits:  ${s.depositCount}\n` +
          `Lifetime:  ${formatAmount(s.lifetimeDeposited)}\n` +
          `Active:    ${formatAmount(s.activeDeposited)}\n` +
          `Roles:     ${s.roles.length > 0 ? s.roles.join(", ") : "(none)"}\n`,
      );
      if (s.timedRole) {
        const state = s.timedRole.active ? "active" : "lapsed";
        this.context.stdout.write(
          `Activity:  ${state}, expires ${formatTime(s.timedRole.expiry)}\n`,
        );
      }
    });
  }
}

export class TotalsCommand extends Command {
  static override paths = [["totals"]];

  static override usage = Command.Usage({
    description: "Show the total locked value and the conservation check",
    examples: [["Show totals", "tenure totals"]],
  });

  async execute(): Promise<void> {
    await withVault(this.context.stdout, ({ vault }) => {
      const report = vault.verifyConservation();
      this.context.stdout.write(
        `Total locked:    ${formatAmount(report.totalLocked)}\n` +
          `Record sum:      ${formatAmount(report.recordSum)}\n` +
          `Custody balance: ${formatAmount(report.custodyBalance)}\n` +
          `Conservation:    ${report.holds ? "OK" : "VIOLATED"}\n`,
      );
      if (!report.holds) process.exitCode = 1;
    });
  }
}
