import { ethers } from "ethers";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import { ActionType } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import { decodeParams, encodeParams, readAddress, readUint } from "./abi.js";
import type { ActionContext, SimpleAction } from "./types.js";

const PARAM_TYPES = ["address", "address", "uint256"] as const;

export interface SendTokenParams {
  token: string;
  to: string;
  /** `MaxUint256` sends the wallet's whole balance. */
  amount: bigint;
}

export function encodeSendTokenParams(params: SendTokenParams): string {
  return encodeParams(PARAM_TYPES, [params.token, params.to, params.amount]);
}

export class SendTokenAction implements SimpleAction, ChainContract {
  readonly contractName = "SendTokenAction";
  readonly kind = "simple";
  readonly actionType = ActionType.TRANSFER;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    readonly protocolName = "Core"
  ) {}

  executeAction(ctx: ActionContext, params: string): void {
    const decoded = decodeParams(PARAM_TYPES, params, this.contractName);
    const token = readAddress(decoded, 0);
    const to = readAddress(decoded, 1);
    const requested = readUint(decoded, 2);
    const amount =
      requested === ethers.MaxUint256 ? ctx.chain.tokens.balanceOf(token, ctx.wallet) : requested;
    if (amount === 0n) {
      throw new EngineError("InvalidInput", "nothing to send", { token });
    }
    ctx.chain.tokens.transfer(token, ctx.wallet, to, amount);
    ctx.emit(LogId.TRANSFER, { strategyId: ctx.strategyId, token, to, amount });
  }
}
