import { LOCK_PERIODS, DAY_MS, units } from "../ledger/periods.js";
import type { DepositFacts, RoleOutcome } from "./types.js";

export const ONE_UNIT = units("1");
export const BIG_DEPOSIT = units("5");
/** Strict lower bound for the temporary role. */
export const ACTIVITY_FLOOR = units("0.001");
export const FREQUENT_DEPOSIT_COUNT = 3;
export const ACTIVITY_WINDOW_MS = 8 * DAY_MS;

export interface RoleRule {
  readonly id: string;
  readonly matches: (facts: DepositFacts) => boolean;
  readonly outcome: Exclude<RoleOutcome, { kind: "none" }>;
}

/** Evaluated top to bottom; the first match is the only role a deposit earns. */
export const ROLE_RULES: readonly RoleRule[] = [
  {
    id: "long-term-commitment",
    matches: (f) => f.amount >= ONE_UNIT && f.lockPeriod === LOCK_PERIODS.LONG,
    outcome: { kind: "permanent", role: "LongTermCommitter" },
  },
  {
    id: "frequent-deposits",
    matches: (f) => f.amount >= ONE_UNIT && f.depositCount >= FREQUENT_DEPOSIT_COUNT,
    outcome: { kind: "permanent", role: "FrequentDepositor" },
  },
  {
    id: "big-deposit",
    matches: (f) => f.amount >= BIG_DEPOSIT,
    outcome: { kind: "permanent", role: "BigDepositor" },
  },
  {
    id: "activity",
    matches: (f) => f.amount > ACTIVITY_FLOOR,
    outcome: { kind: "temporary", role: "ActiveParticipant" },
  },
];

export function classifyDeposit(facts: DepositFacts): RoleOutcome {
  const rule = ROLE_RULES.find((r) => r.matches(facts));
  return rule ? rule.outcome : { kind: "none" };
}
