import { formatUnits, parseUnits } from "viem";

export const DAY_MS = 86_400_000;

export const LOCK_PERIODS = {
  SHORT: 180 * DAY_MS,
  MEDIUM: 365 * DAY_MS,
  LONG: 5 * 365 * DAY_MS,
} as const;

export type LockPeriodName = keyof typeof LOCK_PERIODS;

const NAMES: readonly LockPeriodName[] = ["SHORT", "MEDIUM", "LONG"];

const BY_DURATION = new Map<number, LockPeriodName>(
  NAMES.map((name) => [LOCK_PERIODS[name], name]),
);

/** Exact match only; 179 or 181 days is not SHORT. */
export function lockPeriodName(durationMs: number): LockPeriodName | null {
  return BY_DURATION.get(durationMs) ?? null;
}

/**
 * Accepts `short|medium|long` (any case) or a duration in milliseconds.
 * Returns the duration unvalidated; the ledger decides whether it is canonical.
 */
export function parseLockPeriod(input: string | number): number {
  if (typeof input === "number") return input;
  const upper = input.trim().toUpperCase();
  const named = NAMES.find((name) => name === upper);
  return named ? LOCK_PERIODS[named] : Number(input);
}

export const DECIMALS = 18;

/** Converts a decimal unit string ("0.002") into base units. */
export function units(value: string): bigint {
  return parseUnits(value, DECIMALS);
}

/** Base units rendered as a decimal unit string ("1.5"). */
export function formatAmount(amount: bigint): string {
  return formatUnits(amount, DECIMALS);
}
