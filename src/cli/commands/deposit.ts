import { Command, Option } from "clipanion";
import { formatAmount, parseLockPeriod, units } from "../../ledger/periods.js";
import { formatTime, withVault } from "../context.js";

export class DepositCommand extends Command {
  static override paths = [["deposit"]];

  static override usage = Command.Usage({
    description: "Lock an amount for one of the fixed lock periods",
    examples: [
      ["Lock 1.5 units for a year", "tenure deposit 0x1111111111111111111111111111111111111111 1.5 --period medium"],
      ["Lock base units", "tenure deposit 0x1111111111111111111111111111111111111111 2000000000000000 --base"],
    ],
  });

  account = Option.String({ name: "account", required: true });
  amount = Option.String({ name: "amount", required: true });

  period = Option.String("--period,-p", "short", {
    description: "short | medium | long, or a duration in ms",
  });

  base = Option.Boolean("--base", false, {
    description: "Treat the amount as base units instead of decimal units",
  });

  async execute(): Promise<void> {
    const amount = this.parseAmount();
    if (amount === null) {
      this.context.stdout.write(`Not an amount: ${this.amount}\n`);
      process.exitCode = 1;
      return;
    }

    await withVault(this.context.stdout, ({ vault }) => {
      const { record, outcome } = vault.deposit(this.account, amount, parseLockPeriod(this.period));
      this.context.stdout.write(
        `Deposited ${formatAmount(record.amount)} as #${record.index}\n` +
          `  locked until: ${formatTime(record.lockUntil)}\n` +
          `  role:         ${outcome.kind === "none" ? "(none)" : outcome.role}\n`,
      );
    });
  }

  private parseAmount(): bigint | null {
    if (!/^-?\d+(\.\d+)?$/.test(this.amount)) return null;
    if (!this.base) return units(this.amount);
    return this.amount.includes(".") ? null : BigInt(this.amount);
  }
}

export class WithdrawCommand extends Command {
  static override paths = [["withdraw"]];

  static override usage = Command.Usage({
    description: "Withdraw an unlocked deposit by index",
    examples: [["Withdraw deposit #0", "tenure withdraw 0x1111111111111111111111111111111111111111 0"]],
  });

  account = Option.String({ name: "account", required: true });
  index = Option.String({ name: "index", required: true });

  async execute(): Promise<void> {
    if (!/^\d+$/.test(this.index)) {
      this.context.stdout.write(`Not an index: ${this.index}\n`);
      process.exitCode = 1;
      return;
    }

    await withVault(this.context.stdout, ({ vault }) => {
      const amount = vault.withdraw(this.account, Number(this.index));
      this.context.stdout.write(`Withdrew ${formatAmount(amount)} from #${this.index}\n`);
    });
  }
}
