export interface TenureConfig {
  /** Key into `networks`; selects the trigger registry and poll schedule. */
  readonly network: string;
  readonly networks: Record<string, NetworkConfig>;
  readonly server: ServerConfig;
  readonly keeper: KeeperConfig;
  readonly logging?: LoggingConfig;
}

export interface NetworkConfig {
  /** Identity of the external automation registry allowed to drive sweeps. */
  readonly triggerRegistry: string;
  /** Cron pattern the keeper polls on. */
  readonly pollSchedule: string;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface KeeperConfig {
  readonly enabled: boolean;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
