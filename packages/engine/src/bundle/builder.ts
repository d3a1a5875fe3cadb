import { ethers } from "ethers";
import { encodeActionCall } from "../actions/abi.js";
import { RefundRecipient, type ChainSequence, type Sequence } from "./types.js";

export interface ActionStep {
  actionId: string;
  protocolName: string;
  actionType: number;
  /** ABI-encoded action params. */
  params: string;
  strategyId?: number;
}

export function buildSequence(name: string, steps: ActionStep[]): Sequence {
  return {
    name,
    actions: steps.map((step) => ({ protocolName: step.protocolName, actionType: step.actionType })),
    actionIds: steps.map((step) => step.actionId.toLowerCase()),
    callData: steps.map((step) => encodeActionCall(step.params, step.strategyId ?? 0)),
  };
}

export interface ChainSequenceOptions {
  chainId: bigint;
  sequence: Sequence;
  sequenceNonce?: bigint;
  deploySafe?: boolean;
  enableGasRefund?: boolean;
  refundToken?: string;
  maxRefundAmount?: bigint;
  refundRecipient?: number;
}

export function buildChainSequence(options: ChainSequenceOptions): ChainSequence {
  return {
    chainId: options.chainId,
    sequenceNonce: options.sequenceNonce ?? 0n,
    deploySafe: options.deploySafe ?? false,
    enableGasRefund: options.enableGasRefund ?? false,
    refundToken: options.refundToken ?? ethers.ZeroAddress,
    maxRefundAmount: options.maxRefundAmount ?? 0n,
    refundRecipient: options.refundRecipient ?? RefundRecipient.EXECUTOR,
    sequence: options.sequence,
  };
}
