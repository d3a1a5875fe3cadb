import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { EngineError } from "../errors.js";
import { normalizeAddress } from "../utils/address.js";

/**
 * Minimal share vault. Shares are a token whose address is the pool's
 * own address, minted one-for-one against the deposited asset.
 */
export class VaultPool implements ChainContract {
  readonly contractName = "VaultPool";
  readonly asset: string;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    asset: string
  ) {
    this.asset = normalizeAddress(asset, "asset");
  }

  sharesOf(holder: string): bigint {
    return this.chain.tokens.balanceOf(this.address, holder);
  }

  totalAssets(): bigint {
    return this.chain.tokens.balanceOf(this.asset, this.address);
  }

  deposit(owner: string, assets: bigint): bigint {
    this.requirePositive(assets);
    this.chain.tokens.transfer(this.asset, owner, this.address, assets);
    this.chain.tokens.mint(this.address, owner, assets);
    return assets;
  }

  redeem(owner: string, shares: bigint): bigint {
    this.requirePositive(shares);
    this.chain.tokens.burn(this.address, owner, shares);
    this.chain.tokens.transfer(this.asset, this.address, owner, shares);
    return shares;
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new EngineError("InvalidInput", "amount must be greater than zero", { pool: this.address });
    }
  }
}
