import { isAddress } from "viem";
import { TenureError } from "../errors.js";

declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

/** Lower-cased 20-byte hex address. */
export type AccountId = Brand<string, "AccountId">;

export const AccountId = {
  make: (value: string): AccountId => value as AccountId,

  parse(value: string): AccountId {
    if (!isAddress(value, { strict: false })) {
      throw new TenureError("InvalidAccount", `Not an account address: ${value}`);
    }
    return value.toLowerCase() as AccountId;
  },
};

/** Milliseconds since the epoch. Injected so tests can move time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
