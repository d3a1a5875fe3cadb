import { ethers } from "ethers";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import { ActionType } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import { decodeParams, encodeParams, readBytes4, readUint } from "./abi.js";
import type { ActionContext, FeeTaking, SimpleAction } from "./types.js";
import { VaultPool } from "./vaultPool.js";

const PARAM_TYPES = ["bytes4", "uint256"] as const;

const BASIS_POINTS = 10_000n;
const SECONDS_PER_YEAR = 31_536_000n;

/** Annual fee of `feeBasis` on `shares`, prorated over `elapsed` seconds and rounded down. */
export function accruedFee(shares: bigint, feeBasis: bigint, elapsed: bigint): bigint {
  if (elapsed <= 0n) {
    return 0n;
  }
  const annualFee = (shares * feeBasis) / BASIS_POINTS;
  return (annualFee * elapsed) / SECONDS_PER_YEAR;
}

export interface PoolAmountParams {
  poolId: string;
  /** `MaxUint256` uses the wallet's whole balance. */
  amount: bigint;
}

export function encodePoolParams(params: PoolAmountParams): string {
  return encodeParams(PARAM_TYPES, [params.poolId, params.amount]);
}

export function decodePoolParams(params: string, action: string): PoolAmountParams {
  const decoded = decodeParams(PARAM_TYPES, params, action);
  return { poolId: readBytes4(decoded, 0), amount: readUint(decoded, 1) };
}

export function resolvePool(ctx: ActionContext, protocolName: string, poolId: string): VaultPool {
  const address = ctx.registry.getPoolAddress(protocolName, poolId);
  const pool = ctx.chain.codeAt(address);
  if (!(pool instanceof VaultPool)) {
    throw new EngineError("InvalidInput", "registered pool has no vault code", { protocolName, poolId, address });
  }
  return pool;
}

/**
 * Deposits the wallet's asset into a registered pool in exchange for
 * shares. The fee taker charges positions opened here in pool shares.
 */
export class PoolSupplyAction implements SimpleAction, FeeTaking, ChainContract {
  readonly contractName = "PoolSupplyAction";
  readonly kind = "simple";
  readonly actionType = ActionType.DEPOSIT;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    readonly protocolName: string
  ) {}

  executeAction(ctx: ActionContext, params: string): void {
    const { poolId, amount: requested } = decodePoolParams(params, this.contractName);
    const pool = resolvePool(ctx, this.protocolName, poolId);
    const amount =
      requested === ethers.MaxUint256 ? ctx.chain.tokens.balanceOf(pool.asset, ctx.wallet) : requested;

    ctx.registry.initializeFeeTimestamp(ctx.wallet, pool.address);
    const balanceBefore = pool.sharesOf(ctx.wallet);
    pool.deposit(ctx.wallet, amount);
    const balanceAfter = pool.sharesOf(ctx.wallet);

    ctx.emit(LogId.BALANCE_UPDATE, {
      strategyId: ctx.strategyId,
      poolId,
      balanceBefore,
      balanceAfter,
      balanceChange: balanceAfter - balanceBefore,
    });
  }

  takeFee(ctx: ActionContext, poolId: string, feeBasis: bigint): bigint {
    const pool = resolvePool(ctx, this.protocolName, poolId);
    const lastTaken = ctx.registry.getLastFeeTimestamp(ctx.wallet, pool.address);
    if (lastTaken === 0n) {
      ctx.registry.initializeFeeTimestamp(ctx.wallet, pool.address);
      return 0n;
    }

    const elapsed = ctx.chain.clock.now() - lastTaken;
    const fee = accruedFee(pool.sharesOf(ctx.wallet), feeBasis, elapsed);
    const recipient = ctx.registry.getFeeRecipient();
    if (fee > 0n) {
      ctx.chain.tokens.transfer(pool.address, ctx.wallet, recipient, fee);
    }
    ctx.registry.updateFeeTimestamp(ctx.wallet, pool.address);

    ctx.emit(LogId.FEE_TAKEN, { strategyId: ctx.strategyId, poolId, feeBasis, elapsed, fee, recipient });
    return fee;
  }
}
