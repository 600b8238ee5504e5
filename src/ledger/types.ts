import type { AccountId } from "../utils/types.js";

export type LockState = "LOCKED" | "UNLOCKED";

export interface DepositRecord {
  readonly account: AccountId;
  readonly index: number;
  /** Live amount; zero once withdrawn. */
  readonly amount: bigint;
  /** Amount at creation, kept after withdrawal for lifetime totals. */
  readonly originalAmount: bigint;
  readonly createdAt: number;
  readonly lockUntil: number;
  readonly state: LockState;
  readonly withdrawn: boolean;
}

export interface ConservationReport {
  readonly totalLocked: bigint;
  readonly recordSum: bigint;
  readonly custodyBalance: bigint;
  readonly holds: boolean;
}
