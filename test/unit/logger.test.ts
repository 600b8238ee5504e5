import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("creates a logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("tags records with the service name", () => {
    const logger = createLogger({ level: "warn", json: true });
    expect(logger.bindings()).toEqual({ service: "tenure" });
  });

  it("creates a child logger", () => {
    const logger = createLogger({ level: "info", json: true });
    const child = logger.child({ component: "vault" });
    expect(child.level).toBe("info");
    expect(child.bindings()).toEqual({ service: "tenure", component: "vault" });
  });

  it("writes to a file destination", () => {
    dir = mkdtempSync(join(tmpdir(), "tenure-log-"));
    const logger = createLogger({ level: "error", file: join(dir, "tenure.log") });
    expect(logger.level).toBe("error");
  });
});
