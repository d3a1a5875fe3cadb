import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import type { LogIdValue } from "../chain/events.js";
import type { BundleContext } from "../bundle/types.js";
import type { AdminVault } from "../governance/adminVault.js";

/**
 * What an action sees while it runs. Balances it moves belong to
 * `wallet`, never to the action or the executor.
 */
export interface ActionContext {
  readonly wallet: string;
  readonly chain: SimulatedChain;
  readonly registry: AdminVault;
  readonly strategyId: number;
  emit(logId: LogIdValue, payload: Record<string, unknown>): void;
}

interface ActionIdentity extends ChainContract {
  readonly protocolName: string;
  readonly actionType: number;
}

export interface SimpleAction extends ActionIdentity {
  readonly kind: "simple";
  executeAction(ctx: ActionContext, params: string): void;
}

/** Receives the originating bundle and signature alongside its own params. */
export interface BundleAwareAction extends ActionIdentity {
  readonly kind: "bundle-aware";
  executeActionWithBundleContext(ctx: ActionContext, params: string, context: BundleContext): void;
}

export type Action = SimpleAction | BundleAwareAction;

export interface RefundRequest {
  refundToken: string;
  maxRefundAmount: bigint;
  refundRecipient: number;
  /** Account that submitted the bundle. */
  executor: string;
  actionCount: number;
}

export interface RefundPayment {
  token: string;
  amount: bigint;
  recipient: string;
}

export interface RefundCapable {
  processRefund(ctx: ActionContext, request: RefundRequest): RefundPayment;
}

export interface FeeTaking {
  /** Charges the wallet's position in `poolId` for the time since its last fee; returns the shares taken. */
  takeFee(ctx: ActionContext, poolId: string, feeBasis: bigint): bigint;
}

export function isAction(code: ChainContract | undefined): code is Action {
  if (code === undefined || !("kind" in code)) {
    return false;
  }
  return (
    (code.kind === "simple" || code.kind === "bundle-aware") &&
    "protocolName" in code &&
    typeof code.protocolName === "string" &&
    "actionType" in code &&
    typeof code.actionType === "number"
  );
}

export function isRefundCapable(action: Action): action is Action & RefundCapable {
  return "processRefund" in action && typeof action.processRefund === "function";
}

export function isFeeTaking(action: Action): action is Action & FeeTaking {
  return "takeFee" in action && typeof action.takeFee === "function";
}
