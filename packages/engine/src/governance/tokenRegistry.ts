import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { capture, type Journaled, type Restorer } from "../chain/journal.js";
import { EngineError } from "../errors.js";
import { isZeroAddress, normalizeAddress } from "../utils/address.js";
import type { AdminVault, ExecuteOptions } from "./adminVault.js";
import { ProposalBook, type ProposalState } from "./proposals.js";
import type { RoleName } from "./roles.js";

const logger = createLogger("token-registry");

/** Tokens the gas refund may pay out in, governed through the vault's roles and delay. */
export class TokenRegistry implements ChainContract, Journaled<Restorer[]> {
  readonly contractName = "TokenRegistry";
  private approved = new Set<string>();
  private readonly proposals = new ProposalBook("token");

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly vault: AdminVault
  ) {}

  isApprovedToken(token: string): boolean {
    return this.approved.has(normalizeAddress(token, "token"));
  }

  approvedTokens(): string[] {
    return [...this.approved];
  }

  getTokenProposal(token: string): ProposalState {
    const normalized = normalizeAddress(token, "token");
    return this.proposals.state(normalized, this.chain.clock.now(), this.window());
  }

  proposeToken(caller: string, token: string): void {
    this.chain.transaction(() => {
      this.requireRole("TRANSACTION_PROPOSER_ROLE", caller);
      const normalized = this.tokenAddress(token);
      if (this.approved.has(normalized)) {
        throw new EngineError("AlreadyApproved", "token already approved", { token: normalized });
      }
      this.proposals.propose(normalized, normalized, this.chain.clock.now(), this.window());
      this.emit("proposed", normalized, caller);
    });
  }

  approveToken(caller: string, token: string, options: ExecuteOptions = {}): void {
    this.chain.transaction(() => {
      this.requireRole(options.bypassDelay ? "OWNER_ROLE" : "TRANSACTION_EXECUTOR_ROLE", caller);
      const normalized = this.tokenAddress(token);
      if (this.approved.has(normalized)) {
        throw new EngineError("AlreadyApproved", "token already approved", { token: normalized });
      }
      this.proposals.consume(normalized, normalized, this.chain.clock.now(), this.window(), options);
      this.approved.add(normalized);
      this.emit("executed", normalized, caller);
      if (options.bypassDelay) {
        logger.warn({ token: normalized, caller }, "token approved without delay");
      }
    });
  }

  cancelTokenProposal(caller: string, token: string): void {
    this.chain.transaction(() => {
      this.requireRole("TRANSACTION_CANCELER_ROLE", caller);
      const normalized = this.tokenAddress(token);
      this.proposals.cancel(normalized);
      this.emit("cancelled", normalized, caller);
    });
  }

  revokeToken(caller: string, token: string): void {
    this.chain.transaction(() => {
      this.requireRole("TRANSACTION_DISPOSER_ROLE", caller);
      const normalized = this.tokenAddress(token);
      if (!this.approved.delete(normalized)) {
        throw new EngineError("NotFound", "token is not approved", { token: normalized });
      }
      this.emit("removed", normalized, caller);
    });
  }

  snapshot(): Restorer[] {
    const saved = new Set(this.approved);
    return [
      () => {
        this.approved = new Set(saved);
      },
      capture(this.proposals),
    ];
  }

  restore(restorers: Restorer[]): void {
    for (const restoreState of restorers) {
      restoreState();
    }
  }

  private window() {
    return { delay: this.vault.getDelay(), ttl: this.vault.proposalTtl };
  }

  private requireRole(role: RoleName, caller: string): void {
    if (!this.vault.hasRole(role, caller)) {
      throw new EngineError("RoleUnauthorized", `caller lacks ${role}`, { role, account: caller });
    }
  }

  private tokenAddress(token: string): string {
    const normalized = normalizeAddress(token, "token");
    if (isZeroAddress(normalized)) {
      throw new EngineError("InvalidInput", "token must not be the zero address");
    }
    return normalized;
  }

  private emit(operation: "proposed" | "executed" | "cancelled" | "removed", token: string, actor: string): void {
    this.chain.events.emitGovernance({
      category: "token",
      operation,
      subject: token,
      actor: normalizeAddress(actor, "actor"),
      data: {},
    });
  }
}
