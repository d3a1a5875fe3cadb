import { ethers } from "ethers";
import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { EngineError } from "../errors.js";
import { isZeroAddress, normalizeAddress } from "../utils/address.js";
import type { WalletSetupRegistry } from "./setupRegistry.js";
import { SmartWallet } from "./smartWallet.js";

const logger = createLogger("wallet-provisioner");
const abiCoder = ethers.AbiCoder.defaultAbiCoder();

export interface WalletProvisionerOptions {
  /** Bytecode every wallet proxy is created from; only its hash matters. */
  initCode: string;
  saltNonce?: bigint;
}

export function walletSalt(owner: string, saltNonce: bigint): string {
  return ethers.keccak256(abiCoder.encode(["address", "uint256"], [owner, saltNonce]));
}

/**
 * Deterministic wallet factory. The predicted address depends only on the
 * factory address, the init-code hash and the owner, so it is the same on
 * every chain the factory is deployed to at the same address.
 */
export class WalletProvisioner implements ChainContract {
  readonly contractName = "WalletProvisioner";
  readonly initCodeHash: string;
  readonly saltNonce: bigint;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly setupRegistry: WalletSetupRegistry,
    options: WalletProvisionerOptions
  ) {
    if (!ethers.isHexString(options.initCode) || ethers.dataLength(options.initCode) === 0) {
      throw new EngineError("InvalidInput", "wallet init code must be non-empty hex");
    }
    this.initCodeHash = ethers.keccak256(options.initCode);
    this.saltNonce = options.saltNonce ?? 0n;
  }

  predictAddress(owner: string): string {
    const normalized = this.ownerAddress(owner);
    return ethers.getCreate2Address(this.address, walletSalt(normalized, this.saltNonce), this.initCodeHash);
  }

  isProvisioned(owner: string): boolean {
    return this.chain.codeAt(this.predictAddress(owner)) instanceof SmartWallet;
  }

  /** Creates the wallet and applies the governed baseline config in one transaction. */
  provision(owner: string): SmartWallet {
    const normalized = this.ownerAddress(owner);
    const predicted = this.predictAddress(normalized);
    return this.chain.transaction(() => {
      if (this.chain.hasCode(predicted)) {
        throw new EngineError("WalletAlreadyDeployed", "wallet already exists at predicted address", {
          owner: normalized,
          wallet: predicted,
        });
      }
      const config = this.setupRegistry.getCurrentConfig();
      const wallet = this.chain.deployAt(
        predicted,
        (address) =>
          new SmartWallet(this.chain, address, {
            owners: [normalized],
            threshold: 1,
            modules: config.modules,
            guard: config.guard,
            fallbackHandler: config.fallbackHandler,
          })
      );
      this.chain.events.emitGovernance({
        category: "wallet",
        operation: "deployed",
        subject: predicted,
        actor: this.address,
        data: { owner: normalized, modules: config.modules, guard: config.guard },
      });
      logger.info(
        { chainId: this.chain.chainId.toString(), owner: normalized, wallet: predicted },
        "wallet provisioned"
      );
      return wallet;
    });
  }

  private ownerAddress(owner: string): string {
    const normalized = normalizeAddress(owner, "owner");
    if (isZeroAddress(normalized)) {
      throw new EngineError("InvalidInput", "owner must not be the zero address");
    }
    return normalized;
  }
}
