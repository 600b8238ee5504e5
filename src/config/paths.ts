import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["TENURE_STATE_DIR"] ?? join(homedir(), ".tenure");
}

export function getConfigPath(): string {
  return process.env["TENURE_CONFIG_PATH"] ?? "tenure.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
