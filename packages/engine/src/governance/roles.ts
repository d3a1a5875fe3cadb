import { ethers } from "ethers";
import type { Journaled } from "../chain/journal.js";
import { normalizeAddress } from "../utils/address.js";

export const ROLE_NAMES = [
  "OWNER_ROLE",
  "ROLE_MANAGER_ROLE",
  "FEE_PROPOSER_ROLE",
  "FEE_EXECUTOR_ROLE",
  "FEE_CANCELER_ROLE",
  "FEE_TAKER_ROLE",
  "POOL_PROPOSER_ROLE",
  "POOL_EXECUTOR_ROLE",
  "POOL_CANCELER_ROLE",
  "POOL_DISPOSER_ROLE",
  "ACTION_PROPOSER_ROLE",
  "ACTION_EXECUTOR_ROLE",
  "ACTION_CANCELER_ROLE",
  "ACTION_DISPOSER_ROLE",
  "TRANSACTION_PROPOSER_ROLE",
  "TRANSACTION_EXECUTOR_ROLE",
  "TRANSACTION_CANCELER_ROLE",
  "TRANSACTION_DISPOSER_ROLE",
] as const;

export type RoleName = (typeof ROLE_NAMES)[number];

/**
 * OWNER administers the role manager, the role manager administers every
 * operational role and OWNER administers itself.
 */
export function roleAdmin(role: RoleName): RoleName {
  if (role === "OWNER_ROLE" || role === "ROLE_MANAGER_ROLE") {
    return "OWNER_ROLE";
  }
  return "ROLE_MANAGER_ROLE";
}

export function roleId(role: RoleName): string {
  return ethers.id(role);
}

export function isRoleName(value: string): value is RoleName {
  return ROLE_NAMES.some((role) => role === value);
}

type RoleSnapshot = Map<RoleName, Set<string>>;

export class RoleBook implements Journaled<RoleSnapshot> {
  private members: RoleSnapshot = new Map();

  has(role: RoleName, account: string): boolean {
    return this.members.get(role)?.has(normalizeAddress(account, "account")) ?? false;
  }

  grant(role: RoleName, account: string): boolean {
    const normalized = normalizeAddress(account, "account");
    const holders = this.members.get(role) ?? new Set<string>();
    if (holders.has(normalized)) return false;
    holders.add(normalized);
    this.members.set(role, holders);
    return true;
  }

  revoke(role: RoleName, account: string): boolean {
    return this.members.get(role)?.delete(normalizeAddress(account, "account")) ?? false;
  }

  holders(role: RoleName): string[] {
    return [...(this.members.get(role) ?? [])];
  }

  snapshot(): RoleSnapshot {
    return new Map([...this.members].map(([role, holders]) => [role, new Set(holders)]));
  }

  restore(snapshot: RoleSnapshot): void {
    this.members = new Map([...snapshot].map(([role, holders]) => [role, new Set(holders)]));
  }
}
