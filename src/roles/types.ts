import type { AccountId } from "../utils/types.js";

export type PermanentRole = "LongTermCommitter" | "FrequentDepositor" | "BigDepositor";
export type TemporaryRole = "ActiveParticipant";
export type Role = PermanentRole | TemporaryRole;

export const ROLES: readonly Role[] = [
  "LongTermCommitter",
  "FrequentDepositor",
  "BigDepositor",
  "ActiveParticipant",
];

/** Facts about one deposit the rule chain classifies. */
export interface DepositFacts {
  readonly amount: bigint;
  readonly lockPeriod: number;
  /** Records the account holds, the one just appended included. */
  readonly depositCount: number;
}

export type RoleOutcome =
  | { readonly kind: "permanent"; readonly role: PermanentRole }
  | { readonly kind: "temporary"; readonly role: TemporaryRole }
  | { readonly kind: "none" };

export interface TimedRole {
  readonly account: AccountId;
  readonly active: boolean;
  readonly lastActive: number;
  readonly expiry: number;
}
