import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import type { Journaled } from "../chain/journal.js";
import { EngineError } from "../errors.js";
import { isZeroAddress, normalizeAddress, sameAddress } from "../utils/address.js";

const logger = createLogger("smart-wallet");

export type WalletOperation = "call" | "delegatecall";

/**
 * Capability a wallet hands to the code it delegates into. It is only
 * honoured while the wallet's execution frame is open.
 */
export interface WalletHandle {
  readonly wallet: string;
  readonly initiator: string;
  readonly target: string;
  readonly operation: WalletOperation;
}

export interface TransactionRequest {
  wallet: string;
  target: string;
  operation: WalletOperation;
  initiator: string;
}

export interface TransactionGuard extends ChainContract {
  checkTransaction(request: TransactionRequest): void;
}

export function isTransactionGuard(code: ChainContract | undefined): code is TransactionGuard {
  return code !== undefined && "checkTransaction" in code && typeof code.checkTransaction === "function";
}

const liveHandles = new WeakSet<WalletHandle>();

export function isLiveHandle(handle: WalletHandle): boolean {
  return liveHandles.has(handle);
}

export interface WalletSetup {
  owners: string[];
  threshold: number;
  modules: string[];
  guard: string;
  fallbackHandler: string;
}

interface WalletState {
  owners: string[];
  threshold: number;
  modules: Set<string>;
  guard: string;
  fallbackHandler: string;
}

/** User-owned execution context holding funds; the twin of a Safe proxy. */
export class SmartWallet implements ChainContract, Journaled<WalletState> {
  readonly contractName = "SmartWallet";
  private state: WalletState;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    setup: WalletSetup
  ) {
    if (setup.owners.length === 0) {
      throw new EngineError("InvalidInput", "wallet needs at least one owner");
    }
    if (setup.threshold < 1 || setup.threshold > setup.owners.length) {
      throw new EngineError("InvalidInput", "threshold out of range", {
        threshold: setup.threshold,
        owners: setup.owners.length,
      });
    }
    this.state = {
      owners: setup.owners.map((owner) => normalizeAddress(owner, "owner")),
      threshold: setup.threshold,
      modules: new Set(setup.modules.map((module) => normalizeAddress(module, "module"))),
      guard: normalizeAddress(setup.guard, "guard"),
      fallbackHandler: normalizeAddress(setup.fallbackHandler, "fallbackHandler"),
    };
  }

  getOwners(): string[] {
    return [...this.state.owners];
  }

  getThreshold(): number {
    return this.state.threshold;
  }

  isOwner(account: string): boolean {
    return this.state.owners.some((owner) => sameAddress(owner, account));
  }

  isModuleEnabled(module: string): boolean {
    return this.state.modules.has(normalizeAddress(module, "module"));
  }

  getModules(): string[] {
    return [...this.state.modules];
  }

  getGuard(): string {
    return this.state.guard;
  }

  getFallbackHandler(): string {
    return this.state.fallbackHandler;
  }

  enableModule(caller: string, module: string): void {
    this.chain.transaction(() => {
      this.requireOwner(caller);
      const normalized = normalizeAddress(module, "module");
      if (isZeroAddress(normalized)) {
        throw new EngineError("InvalidInput", "module must not be the zero address");
      }
      this.state.modules.add(normalized);
    });
  }

  disableModule(caller: string, module: string): void {
    this.chain.transaction(() => {
      this.requireOwner(caller);
      if (!this.state.modules.delete(normalizeAddress(module, "module"))) {
        throw new EngineError("NotFound", "module not enabled", { module });
      }
    });
  }

  setGuard(caller: string, guard: string): void {
    this.chain.transaction(() => {
      this.requireOwner(caller);
      this.state.guard = normalizeAddress(guard, "guard");
    });
  }

  /** Entry point for enabled modules such as the bundle verifier. */
  execTransactionFromModule<T>(module: string, target: string, run: (handle: WalletHandle) => T): T {
    if (!this.isModuleEnabled(module)) {
      throw new EngineError("ModuleNotEnabled", "caller is not an enabled module", {
        wallet: this.address,
        module,
      });
    }
    return this.delegate(normalizeAddress(module, "module"), target, run);
  }

  /** Owner-initiated delegated execution. */
  execTransaction<T>(owner: string, target: string, run: (handle: WalletHandle) => T): T {
    this.requireOwner(owner);
    return this.delegate(normalizeAddress(owner, "owner"), target, run);
  }

  snapshot(): WalletState {
    return { ...this.state, owners: [...this.state.owners], modules: new Set(this.state.modules) };
  }

  restore(snapshot: WalletState): void {
    this.state = { ...snapshot, owners: [...snapshot.owners], modules: new Set(snapshot.modules) };
  }

  private delegate<T>(initiator: string, target: string, run: (handle: WalletHandle) => T): T {
    const request: TransactionRequest = {
      wallet: this.address,
      target: normalizeAddress(target, "target"),
      operation: "delegatecall",
      initiator,
    };
    return this.chain.transaction(() => {
      this.checkGuard(request);
      const handle: WalletHandle = Object.freeze({
        wallet: request.wallet,
        initiator: request.initiator,
        target: request.target,
        operation: request.operation,
      });
      liveHandles.add(handle);
      try {
        return run(handle);
      } finally {
        liveHandles.delete(handle);
      }
    });
  }

  private checkGuard(request: TransactionRequest): void {
    if (isZeroAddress(this.state.guard)) {
      return;
    }
    const guard = this.chain.codeAt(this.state.guard);
    if (!isTransactionGuard(guard)) {
      logger.error({ wallet: this.address, guard: this.state.guard }, "guard has no code");
      throw new EngineError("TransactionNotAllowed", "configured guard is not deployed", {
        guard: this.state.guard,
      });
    }
    guard.checkTransaction(request);
  }

  private requireOwner(caller: string): void {
    if (!this.isOwner(caller)) {
      throw new EngineError("UnauthorizedCaller", "caller is not a wallet owner", {
        wallet: this.address,
        caller,
      });
    }
  }
}
