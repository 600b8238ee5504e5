import type { AccountId } from "../utils/types.js";
import type { Role } from "../roles/types.js";

export interface DepositedEvent {
  readonly account: AccountId;
  readonly index: number;
  readonly amount: bigint;
  readonly lockUntil: number;
}

export interface WithdrawnEvent {
  readonly account: AccountId;
  readonly index: number;
  readonly amount: bigint;
  readonly timestamp: number;
}

export interface RoleGrantedEvent {
  readonly account: AccountId;
  readonly role: Role;
  /** Set for the temporary role only. */
  readonly expiry?: number;
}

export interface RoleRefreshedEvent {
  readonly account: AccountId;
  readonly expiry: number;
}

export interface RoleRevokedEvent {
  readonly account: AccountId;
  readonly role: Role;
}

export interface VaultEvents {
  deposited: (event: DepositedEvent) => void;
  withdrawn: (event: WithdrawnEvent) => void;
  roleGranted: (event: RoleGrantedEvent) => void;
  roleRefreshed: (event: RoleRefreshedEvent) => void;
  roleRevoked: (event: RoleRevokedEvent) => void;
}
