import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import { ActionType, type BundleContext } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import { decodeParams, encodeParams, readAddress, readUint } from "./abi.js";
import type { BridgeOutbox } from "./bridgeOutbox.js";
import type { ActionContext, BundleAwareAction } from "./types.js";

const PARAM_TYPES = ["address", "uint256", "uint256"] as const;

export interface BridgeSendParams {
  token: string;
  amount: bigint;
  destinationChainId: bigint;
}

export function encodeBridgeSendParams(params: BridgeSendParams): string {
  return encodeParams(PARAM_TYPES, [params.token, params.amount, params.destinationChainId]);
}

/**
 * Burns tokens on this chain and posts the signed bundle with them, so the
 * destination chain can mint and run its own sequence from the same
 * signature.
 */
export class BridgeSendAction implements BundleAwareAction, ChainContract {
  readonly contractName = "BridgeSendAction";
  readonly kind = "bundle-aware";
  readonly actionType = ActionType.BRIDGE;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly outbox: BridgeOutbox,
    readonly protocolName = "Bridge"
  ) {}

  executeActionWithBundleContext(ctx: ActionContext, params: string, context: BundleContext): void {
    const decoded = decodeParams(PARAM_TYPES, params, this.contractName);
    const token = readAddress(decoded, 0);
    const amount = readUint(decoded, 1);
    const destinationChainId = readUint(decoded, 2);
    if (destinationChainId === ctx.chain.chainId) {
      throw new EngineError("InvalidInput", "destination chain must differ from source chain", {
        chainId: destinationChainId,
      });
    }
    if (amount === 0n) {
      throw new EngineError("InvalidInput", "bridge amount must be greater than zero");
    }
    ctx.chain.tokens.burn(token, ctx.wallet, amount);
    const message = this.outbox.enqueue({
      destinationChainId,
      wallet: ctx.wallet,
      token,
      amount,
      bundle: context.bundle,
      signature: context.signature,
    });
    ctx.emit(LogId.BRIDGE_SEND, {
      strategyId: ctx.strategyId,
      messageId: message.id,
      token,
      amount,
      destinationChainId,
    });
  }
}
