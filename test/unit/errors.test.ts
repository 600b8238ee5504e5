import { describe, it, expect } from "vitest";
import { TenureError } from "../../src/errors.js";
import { AccountId } from "../../src/utils/types.js";

describe("TenureError", () => {
  it("carries a code and its category", () => {
    const err = new TenureError("LockNotExpired", "still locked");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(TenureError);
    expect(err.name).toBe("TenureError");
    expect(err.code).toBe("LockNotExpired");
    expect(err.category).toBe("state");
    expect(err.toString()).toBe("TenureError(LockNotExpired): still locked");
  });

  it("classifies every code", () => {
    expect(new TenureError("ZeroAmount", "").category).toBe("validation");
    expect(new TenureError("InvalidIndex", "").category).toBe("validation");
    expect(new TenureError("AlreadyWithdrawn", "").category).toBe("state");
    expect(new TenureError("TransferFailed", "").category).toBe("external");
  });

  it("keeps the cause", () => {
    const cause = new Error("inner");
    expect(new TenureError("TransferFailed", "outer", { cause }).cause).toBe(cause);
  });

  it("narrows with is()", () => {
    const err: unknown = new TenureError("ZeroAmount", "zero");
    expect(TenureError.is(err)).toBe(true);
    expect(TenureError.is(err, "ZeroAmount")).toBe(true);
    expect(TenureError.is(err, "InvalidIndex")).toBe(false);
    expect(TenureError.is(new Error("plain"))).toBe(false);
  });
});

describe("AccountId.parse", () => {
  it("lower-cases a valid address", () => {
    expect(AccountId.parse("0xABCDEF0000000000000000000000000000000001")).toBe(
      "0xabcdef0000000000000000000000000000000001",
    );
  });

  it.each(["", "0x123", "alice", "0xZZ00000000000000000000000000000000000000"])(
    "rejects %j",
    (value) => {
      expect(() => AccountId.parse(value)).toThrow(TenureError);
    },
  );
});
