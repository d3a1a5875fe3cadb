import { EngineError } from "../errors.js";
import { normalizeAddress } from "../utils/address.js";
import type { Journaled } from "./journal.js";

type BalanceSnapshot = Map<string, bigint>;

/** Fungible balances keyed by (token, holder). */
export class TokenLedger implements Journaled<BalanceSnapshot> {
  private balances: BalanceSnapshot = new Map();

  balanceOf(token: string, holder: string): bigint {
    return this.balances.get(this.key(token, holder)) ?? 0n;
  }

  totalSupply(token: string): bigint {
    const prefix = `${normalizeAddress(token, "token")}:`;
    let total = 0n;
    for (const [key, amount] of this.balances) {
      if (key.startsWith(prefix)) total += amount;
    }
    return total;
  }

  mint(token: string, to: string, amount: bigint): void {
    this.assertAmount(amount);
    const key = this.key(token, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  burn(token: string, from: string, amount: bigint): void {
    this.assertAmount(amount);
    this.debit(token, from, amount);
  }

  transfer(token: string, from: string, to: string, amount: bigint): void {
    this.assertAmount(amount);
    this.debit(token, from, amount);
    const key = this.key(token, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  snapshot(): BalanceSnapshot {
    return new Map(this.balances);
  }

  restore(snapshot: BalanceSnapshot): void {
    this.balances = new Map(snapshot);
  }

  private debit(token: string, from: string, amount: bigint): void {
    const key = this.key(token, from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new EngineError("InsufficientBalance", "transfer amount exceeds balance", {
        token: normalizeAddress(token, "token"),
        holder: normalizeAddress(from, "holder"),
        balance,
        amount,
      });
    }
    this.balances.set(key, balance - amount);
  }

  private key(token: string, holder: string): string {
    return `${normalizeAddress(token, "token")}:${normalizeAddress(holder, "holder")}`;
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new EngineError("InvalidInput", "token amount must be non-negative", { amount });
    }
  }
}
