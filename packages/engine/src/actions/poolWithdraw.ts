import { ethers } from "ethers";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import { ActionType } from "../bundle/types.js";
import { decodePoolParams, resolvePool } from "./poolSupply.js";
import type { ActionContext, SimpleAction } from "./types.js";

/** Redeems pool shares held by the wallet back into the pool asset. */
export class PoolWithdrawAction implements SimpleAction, ChainContract {
  readonly contractName = "PoolWithdrawAction";
  readonly kind = "simple";
  readonly actionType = ActionType.WITHDRAW;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    readonly protocolName: string
  ) {}

  executeAction(ctx: ActionContext, params: string): void {
    const { poolId, amount: requested } = decodePoolParams(params, this.contractName);
    const pool = resolvePool(ctx, this.protocolName, poolId);
    const balanceBefore = pool.sharesOf(ctx.wallet);
    const shares = requested === ethers.MaxUint256 ? balanceBefore : requested;

    pool.redeem(ctx.wallet, shares);
    ctx.registry.updateFeeTimestamp(ctx.wallet, pool.address);
    const balanceAfter = pool.sharesOf(ctx.wallet);

    ctx.emit(LogId.BALANCE_UPDATE, {
      strategyId: ctx.strategyId,
      poolId,
      balanceBefore,
      balanceAfter,
      balanceChange: balanceAfter - balanceBefore,
    });
  }
}
