import { ethers } from "ethers";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import { ActionType, RefundRecipient } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import type { TokenRegistry } from "../governance/tokenRegistry.js";
import { normalizeAddress } from "../utils/address.js";
import { decodeParams, encodeParams, readAddress, readUint } from "./abi.js";
import type { ActionContext, RefundCapable, RefundPayment, RefundRequest, SimpleAction } from "./types.js";

const PARAM_TYPES = ["tuple(address refundToken, uint256 maxRefundAmount, uint8 refundRecipient)"] as const;

export interface GasRefundParams {
  refundToken: string;
  maxRefundAmount: bigint;
  refundRecipient: number;
}

export function encodeGasRefundParams(params: GasRefundParams): string {
  return encodeParams(PARAM_TYPES, [[params.refundToken, params.maxRefundAmount, params.refundRecipient]]);
}

export function decodeGasRefundParams(params: string): GasRefundParams {
  const decoded = decodeParams(PARAM_TYPES, params, "GasRefundAction");
  const fields: unknown = decoded[0];
  if (!(fields instanceof ethers.Result)) {
    throw new EngineError("InvalidCallData", "refund params are not a tuple");
  }
  return {
    refundToken: readAddress(fields, 0),
    maxRefundAmount: readUint(fields, 1),
    refundRecipient: Number(readUint(fields, 2)),
  };
}

export interface RefundQuoteRequest {
  token: string;
  actionCount: number;
  chainId: bigint;
}

export interface RefundPricer {
  /** Refund owed in `token` base units; throws when the token cannot be priced. */
  quote(request: RefundQuoteRequest): bigint;
}

export interface FixedRatePricerOptions {
  baseGas: bigint;
  gasPerAction: bigint;
  gasPriceWei: bigint;
}

const WEI_PER_ETHER = 10n ** 18n;

export class FixedRatePricer implements RefundPricer {
  private readonly tokenPerEther = new Map<string, bigint>();

  constructor(private readonly options: FixedRatePricerOptions) {}

  /** `unitsPerEther` is how many token base units one ether buys. */
  setRate(token: string, unitsPerEther: bigint): void {
    if (unitsPerEther <= 0n) {
      throw new EngineError("InvalidInput", "token rate must be positive", { token });
    }
    this.tokenPerEther.set(normalizeAddress(token, "token"), unitsPerEther);
  }

  quote(request: RefundQuoteRequest): bigint {
    const rate = this.tokenPerEther.get(normalizeAddress(request.token, "token"));
    if (rate === undefined) {
      throw new EngineError("RefundFailure", "no price for refund token", { token: request.token });
    }
    const gas = this.options.baseGas + this.options.gasPerAction * BigInt(request.actionCount);
    return (gas * this.options.gasPriceWei * rate) / WEI_PER_ETHER;
  }
}

/**
 * Marks a sequence as refunding its submitter. The in-sequence step only
 * validates the signed refund parameters; payment happens afterwards in
 * {@link GasRefundAction.processRefund}. The verifier rejects an entry
 * whose refund fields differ from these params.
 */
export class GasRefundAction implements SimpleAction, RefundCapable, ChainContract {
  readonly contractName = "GasRefundAction";
  readonly kind = "simple";
  readonly actionType = ActionType.FEE;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly tokenRegistry: TokenRegistry,
    private readonly pricer: RefundPricer,
    readonly protocolName = "Core"
  ) {}

  executeAction(_ctx: ActionContext, params: string): void {
    this.decode(params);
  }

  processRefund(ctx: ActionContext, request: RefundRequest): RefundPayment {
    const token = normalizeAddress(request.refundToken, "refundToken");
    if (!this.tokenRegistry.isApprovedToken(token)) {
      throw new EngineError("RefundFailure", "refund token is not approved", { token });
    }
    const recipient = this.recipientFor(ctx, request);
    const quoted = this.pricer.quote({ token, actionCount: request.actionCount, chainId: ctx.chain.chainId });
    const amount = quoted < request.maxRefundAmount ? quoted : request.maxRefundAmount;
    if (amount > 0n) {
      ctx.chain.tokens.transfer(token, ctx.wallet, recipient, amount);
    }
    ctx.emit(LogId.GAS_REFUND, { token, amount, recipient, refundRecipient: request.refundRecipient });
    return { token, amount, recipient };
  }

  decode(params: string): GasRefundParams {
    return decodeGasRefundParams(params);
  }

  private recipientFor(ctx: ActionContext, request: RefundRequest): string {
    switch (request.refundRecipient) {
      case RefundRecipient.EXECUTOR:
        return normalizeAddress(request.executor, "executor");
      case RefundRecipient.FEE_RECIPIENT:
        return ctx.registry.getFeeRecipient();
      default:
        throw new EngineError("RefundFailure", "unknown refund recipient", {
          refundRecipient: request.refundRecipient,
        });
    }
  }
}
