import { ethers } from "ethers";
import { createLogger } from "../../../../shared/logger.js";
import { EngineError } from "../errors.js";
import { normalizeAddress } from "../utils/address.js";
import { SystemClock, type Clock } from "./clock.js";
import { EventLog } from "./events.js";
import { capture, isJournaled, type Journaled, type Restorer } from "./journal.js";
import { TokenLedger } from "./tokens.js";

const logger = createLogger("chain");

/** Anything that lives at an address on a simulated chain. */
export interface ChainContract {
  readonly contractName: string;
  readonly address: string;
}

interface CodeSnapshot {
  code: Map<string, ChainContract>;
  nonces: Map<string, number>;
  states: Restorer[];
}

class CodeStore implements Journaled<CodeSnapshot> {
  private code = new Map<string, ChainContract>();
  private nonces = new Map<string, number>();

  get(address: string): ChainContract | undefined {
    return this.code.get(address);
  }

  set(contract: ChainContract): void {
    this.code.set(contract.address, contract);
  }

  nextNonce(deployer: string): number {
    const nonce = this.nonces.get(deployer) ?? 0;
    this.nonces.set(deployer, nonce + 1);
    return nonce;
  }

  snapshot(): CodeSnapshot {
    const states: Restorer[] = [];
    for (const contract of this.code.values()) {
      if (isJournaled(contract)) {
        states.push(capture(contract));
      }
    }
    return { code: new Map(this.code), nonces: new Map(this.nonces), states };
  }

  restore(snapshot: CodeSnapshot): void {
    this.code = new Map(snapshot.code);
    this.nonces = new Map(snapshot.nonces);
    for (const restoreState of snapshot.states) {
      restoreState();
    }
  }
}

export interface SimulatedChainOptions {
  chainId: bigint | number;
  clock?: Clock;
}

/**
 * In-memory ledger standing in for one EVM chain. Every mutation made
 * inside {@link SimulatedChain.transaction} is rolled back if the callback
 * throws, which gives the all-or-nothing semantics of a reverted
 * transaction.
 */
export class SimulatedChain {
  readonly chainId: bigint;
  readonly clock: Clock;
  readonly tokens = new TokenLedger();
  readonly events: EventLog;
  private readonly code = new CodeStore();
  private readonly stores: Journaled<unknown>[];
  private depth = 0;

  constructor(options: SimulatedChainOptions) {
    this.chainId = BigInt(options.chainId);
    if (this.chainId <= 0n) {
      throw new EngineError("InvalidInput", "chain id must be positive", {
        chainId: this.chainId,
      });
    }
    this.clock = options.clock ?? new SystemClock();
    this.events = new EventLog(this.clock, this.chainId);
    this.stores = [this.tokens, this.events, this.code];
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  transaction<T>(run: () => T): T {
    const restorers = this.stores.map((store) => capture(store));
    this.depth += 1;
    try {
      return run();
    } catch (error) {
      for (const restore of restorers.reverse()) {
        restore();
      }
      logger.debug(
        { chainId: this.chainId.toString(), depth: this.depth, err: error },
        "transaction reverted"
      );
      throw error;
    } finally {
      this.depth -= 1;
    }
  }

  codeAt(address: string): ChainContract | undefined {
    return this.code.get(normalizeAddress(address));
  }

  hasCode(address: string): boolean {
    return this.codeAt(address) !== undefined;
  }

  /** CREATE-style deployment: the address follows from deployer and nonce. */
  deploy<T extends ChainContract>(deployer: string, build: (address: string) => T): T {
    const from = normalizeAddress(deployer, "deployer");
    return this.transaction(() => {
      const address = ethers.getCreateAddress({ from, nonce: this.code.nextNonce(from) });
      return this.install(address, build);
    });
  }

  /** Deployment at a precomputed address, such as a CREATE2 result. */
  deployAt<T extends ChainContract>(address: string, build: (address: string) => T): T {
    const target = normalizeAddress(address);
    return this.transaction(() => this.install(target, build));
  }

  private install<T extends ChainContract>(address: string, build: (address: string) => T): T {
    if (this.code.get(address) !== undefined) {
      throw new EngineError("AddressInUse", "contract already deployed at address", {
        address,
      });
    }
    const contract = build(address);
    if (contract.address !== address) {
      throw new EngineError("InvalidInput", "contract reported a different address", {
        expected: address,
        actual: contract.address,
      });
    }
    this.code.set(contract);
    logger.debug(
      { chainId: this.chainId.toString(), address, contract: contract.contractName },
      "contract deployed"
    );
    return contract;
  }
}
