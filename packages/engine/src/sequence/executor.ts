import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { decodeActionCall } from "../actions/abi.js";
import {
  isAction,
  isFeeTaking,
  isRefundCapable,
  type Action,
  type ActionContext,
  type RefundPayment,
  type RefundRequest,
} from "../actions/types.js";
import type { BundleContext, Sequence } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import type { AdminVault } from "../governance/adminVault.js";
import { sameAddress } from "../utils/address.js";
import { isLiveHandle, type WalletHandle } from "../wallet/smartWallet.js";

const logger = createLogger("sequence-executor");

/** The part of a {@link Sequence} the executor consumes. */
export type SequenceCalls = Pick<Sequence, "name" | "actionIds" | "callData">;

export interface ExecutedAction {
  index: number;
  actionId: string;
  address: string;
  protocolName: string;
  actionType: number;
}

export interface SequenceResult {
  name: string;
  actions: ExecutedAction[];
}

export interface FeeTake {
  actionId: string;
  poolId: string;
  feeBasis: bigint;
}

export interface TakenFee extends FeeTake {
  shares: bigint;
}

interface ResolvedAction {
  actionId: string;
  address: string;
  action: Action;
}

/**
 * Stateless executor the wallet delegates into. Every action of a
 * sequence runs against the wallet's balances, and the first failure
 * reverts the whole sequence.
 */
export class SequenceExecutor implements ChainContract {
  readonly contractName = "SequenceExecutor";

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly registry: AdminVault
  ) {}

  executeSequence(handle: WalletHandle, sequence: SequenceCalls, bundleContext?: BundleContext): SequenceResult {
    this.requireWalletFrame(handle);
    if (sequence.actionIds.length !== sequence.callData.length) {
      throw new EngineError("LengthMismatch", "actionIds and callData differ in length", {
        actionIds: sequence.actionIds.length,
        callData: sequence.callData.length,
      });
    }

    return this.chain.transaction(() => {
      // Resolve everything first so an unknown id never leaves earlier actions half-run.
      const resolved = sequence.actionIds.map((actionId) => this.resolve(actionId));
      const executed: ExecutedAction[] = [];

      resolved.forEach(({ actionId, address, action }, index) => {
        const { params, strategyId } = decodeActionCall(sequence.callData[index]);
        const ctx = this.context(handle, strategyId);
        if (action.kind === "bundle-aware") {
          if (bundleContext === undefined) {
            throw new EngineError("MissingBundleContext", "action requires the originating bundle", {
              index,
              actionId,
            });
          }
          action.executeActionWithBundleContext(ctx, params, bundleContext);
        } else {
          action.executeAction(ctx, params);
        }
        executed.push({
          index,
          actionId,
          address,
          protocolName: action.protocolName,
          actionType: action.actionType,
        });
      });

      logger.debug(
        { wallet: handle.wallet, sequence: sequence.name, actions: executed.length },
        "sequence executed"
      );
      return { name: sequence.name, actions: executed };
    });
  }

  /** Post-sequence refund step of a refund-capable action, run in the wallet frame. */
  executeRefund(handle: WalletHandle, actionId: string, request: RefundRequest): RefundPayment {
    this.requireWalletFrame(handle);
    const { action } = this.resolve(actionId);
    if (!isRefundCapable(action)) {
      throw new EngineError("RefundFailure", "resolved action cannot process refunds", { actionId });
    }
    return this.chain.transaction(() => action.processRefund(this.context(handle, 0), request));
  }

  /** Fee-taking step of each named deposit action, run in the wallet frame. One failure reverts all. */
  executeFeeTakes(handle: WalletHandle, takes: FeeTake[]): TakenFee[] {
    this.requireWalletFrame(handle);
    return this.chain.transaction(() =>
      takes.map((take) => {
        const { actionId, action } = this.resolve(take.actionId);
        if (!isFeeTaking(action)) {
          throw new EngineError("InvalidActionType", "resolved action cannot take fees", { actionId });
        }
        const shares = action.takeFee(this.context(handle, 0), take.poolId, take.feeBasis);
        return { ...take, actionId, shares };
      })
    );
  }

  private resolve(actionId: string): ResolvedAction {
    const address = this.registry.getActionAddress(actionId);
    const action = this.chain.codeAt(address);
    if (!isAction(action)) {
      throw new EngineError("UnresolvedAction", "registered address holds no action", {
        actionId,
        address,
      });
    }
    return { actionId: actionId.toLowerCase(), address, action };
  }

  private context(handle: WalletHandle, strategyId: number): ActionContext {
    return {
      wallet: handle.wallet,
      chain: this.chain,
      registry: this.registry,
      strategyId,
      emit: (logId, payload) => {
        this.chain.events.emitAction({ caller: handle.wallet, logId, payload });
      },
    };
  }

  private requireWalletFrame(handle: WalletHandle): void {
    if (!isLiveHandle(handle) || !sameAddress(handle.target, this.address)) {
      throw new EngineError("UnauthorizedCaller", "executor is only reachable through a wallet frame", {
        wallet: handle.wallet,
      });
    }
  }
}
