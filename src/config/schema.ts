import { z } from "zod";
import type { NetworkConfig, TenureConfig } from "./types.js";

const networkSchema = z.object({
  triggerRegistry: z.string().min(1),
  pollSchedule: z.string().min(1).default("*/5 * * * *"),
});

const serverSchema = z.object({
  port: z.number().int().positive().default(18545),
  hostname: z.string().default("127.0.0.1"),
});

const keeperSchema = z.object({
  enabled: z.boolean().default(false),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const LOCAL_NETWORK = {
  triggerRegistry: "local",
  pollSchedule: "*/5 * * * *",
} satisfies NetworkConfig;

export const tenureConfigSchema = z
  .object({
    network: z.string().min(1).default("local"),
    networks: z.record(z.string(), networkSchema).default({}),
    server: serverSchema.default({}),
    keeper: keeperSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .transform((cfg) => ({
    ...cfg,
    networks: { local: LOCAL_NETWORK, ...cfg.networks },
  }))
  .refine((cfg) => cfg.network in cfg.networks, (cfg) => ({
    message: `Unknown network "${cfg.network}"`,
    path: ["network"],
  }));

export function parseConfig(raw: unknown): TenureConfig {
  return tenureConfigSchema.parse(raw);
}

export function selectNetwork(config: TenureConfig): NetworkConfig {
  const network = config.networks[config.network];
  if (!network) {
    throw new Error(`Unknown network "${config.network}"`);
  }
  return network;
}
