import { ethers } from "ethers";
import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { capture, type Journaled, type Restorer } from "../chain/journal.js";
import { EngineError } from "../errors.js";
import type { AdminVault, ExecuteOptions } from "../governance/adminVault.js";
import { ProposalBook, type ProposalState } from "../governance/proposals.js";
import type { RoleName } from "../governance/roles.js";
import { isZeroAddress, normalizeAddress } from "../utils/address.js";

const logger = createLogger("wallet-setup-registry");

export interface WalletConfig {
  fallbackHandler: string;
  modules: string[];
  guard: string;
}

const CONFIG_KEY = "current";
const abiCoder = ethers.AbiCoder.defaultAbiCoder();

export function hashWalletConfig(config: WalletConfig): string {
  return ethers.keccak256(
    abiCoder.encode(["address", "address[]", "address"], [config.fallbackHandler, config.modules, config.guard])
  );
}

function normalizeConfig(config: WalletConfig): WalletConfig {
  const normalized: WalletConfig = {
    fallbackHandler: normalizeAddress(config.fallbackHandler, "fallbackHandler"),
    modules: config.modules.map((module) => normalizeAddress(module, "module")),
    guard: normalizeAddress(config.guard, "guard"),
  };
  if (
    isZeroAddress(normalized.fallbackHandler) &&
    isZeroAddress(normalized.guard) &&
    normalized.modules.length === 0
  ) {
    throw new EngineError("InvalidInput", "wallet config must set a fallback handler, a guard or a module");
  }
  if (normalized.modules.some(isZeroAddress)) {
    throw new EngineError("InvalidInput", "module must not be the zero address");
  }
  return normalized;
}

function copyConfig(config: WalletConfig): WalletConfig {
  return { ...config, modules: [...config.modules] };
}

interface SetupState {
  current: WalletConfig;
  pending?: WalletConfig;
}

/** Single governed slot holding the baseline configuration of newly provisioned wallets. */
export class WalletSetupRegistry implements ChainContract, Journaled<Restorer[]> {
  readonly contractName = "WalletSetupRegistry";
  private state: SetupState;
  private readonly proposals = new ProposalBook("wallet config");

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly vault: AdminVault
  ) {
    this.state = {
      current: { fallbackHandler: ethers.ZeroAddress, modules: [], guard: ethers.ZeroAddress },
    };
  }

  getCurrentConfig(): WalletConfig {
    return copyConfig(this.state.current);
  }

  getPendingConfig(): WalletConfig | undefined {
    return this.state.pending ? copyConfig(this.state.pending) : undefined;
  }

  getConfigProposal(): ProposalState {
    return this.proposals.state(CONFIG_KEY, this.chain.clock.now(), this.window());
  }

  proposeConfig(caller: string, config: WalletConfig): void {
    this.chain.transaction(() => {
      this.requireRole("TRANSACTION_PROPOSER_ROLE", caller);
      const normalized = normalizeConfig(config);
      const configHash = hashWalletConfig(normalized);
      this.proposals.propose(CONFIG_KEY, configHash, this.chain.clock.now(), this.window());
      this.state.pending = normalized;
      this.emit("proposed", caller, { configHash, ...normalized });
    });
  }

  cancelConfigProposal(caller: string): void {
    this.chain.transaction(() => {
      this.requireRole("TRANSACTION_CANCELER_ROLE", caller);
      const cancelled = this.proposals.cancel(CONFIG_KEY);
      this.state.pending = undefined;
      this.emit("cancelled", caller, { configHash: cancelled.target });
    });
  }

  /** Promotes the pending config; the caller restates it so a swapped proposal cannot slip through. */
  approveConfig(caller: string, config: WalletConfig, options: ExecuteOptions = {}): void {
    this.chain.transaction(() => {
      this.requireRole(options.bypassDelay ? "OWNER_ROLE" : "TRANSACTION_EXECUTOR_ROLE", caller);
      const normalized = normalizeConfig(config);
      const configHash = hashWalletConfig(normalized);
      this.proposals.consume(CONFIG_KEY, configHash, this.chain.clock.now(), this.window(), options);
      this.state = { current: normalized };
      this.emit("executed", caller, { configHash, emergency: Boolean(options.bypassDelay) });
      logger.info({ configHash }, "wallet baseline config approved");
    });
  }

  updateCurrentConfig(caller: string, config: WalletConfig): void {
    this.chain.transaction(() => {
      this.requireRole("OWNER_ROLE", caller);
      const normalized = normalizeConfig(config);
      this.state = { ...this.state, current: normalized };
      this.emit("updated", caller, { configHash: hashWalletConfig(normalized), ...normalized });
    });
  }

  snapshot(): Restorer[] {
    const saved: SetupState = {
      current: copyConfig(this.state.current),
      pending: this.state.pending ? copyConfig(this.state.pending) : undefined,
    };
    return [
      () => {
        this.state = {
          current: copyConfig(saved.current),
          pending: saved.pending ? copyConfig(saved.pending) : undefined,
        };
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

  private emit(
    operation: "proposed" | "cancelled" | "executed" | "updated",
    actor: string,
    data: Record<string, unknown>
  ): void {
    this.chain.events.emitGovernance({
      category: "config",
      operation,
      subject: "wallet",
      actor: normalizeAddress(actor, "actor"),
      data,
    });
  }
}
