import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { LogId } from "../chain/events.js";
import type { Journaled } from "../chain/journal.js";
import { decodeActionCall } from "../actions/abi.js";
import { decodeGasRefundParams } from "../actions/gasRefund.js";
import { isAction, type RefundRequest } from "../actions/types.js";
import { EngineError, describeError } from "../errors.js";
import type { AdminVault } from "../governance/adminVault.js";
import type { ExecutedAction, SequenceExecutor } from "../sequence/executor.js";
import { normalizeAddress, sameAddress } from "../utils/address.js";
import type { WalletProvisioner } from "../wallet/provisioner.js";
import { SmartWallet } from "../wallet/smartWallet.js";
import {
  bundleDigest,
  domainSeparator,
  hashBundle,
  recoverBundleSigner,
  type SigningDomainConfig,
} from "./typedData.js";
import { FEE_ACTION, type Bundle, type ChainSequence } from "./types.js";

const logger = createLogger("bundle-verifier");

export type BundlePhase =
  | "AwaitingSignature"
  | "SignatureVerified"
  | "ChainSequenceSelected"
  | "Executing"
  | "Completed";

export type RefundOutcome =
  | { status: "disabled" }
  | { status: "paid"; token: string; amount: bigint; recipient: string }
  | { status: "failed"; reason: string };

export interface BundleExecutionReceipt {
  bundleHash: string;
  digest: string;
  signer: string;
  wallet: string;
  chainId: bigint;
  sequenceNonce: bigint;
  sequenceName: string;
  walletProvisioned: boolean;
  phases: BundlePhase[];
  actions: ExecutedAction[];
  refund: RefundOutcome;
}

export interface BundleVerifierDependencies {
  registry: AdminVault;
  executor: SequenceExecutor;
  provisioner: WalletProvisioner;
  domain: SigningDomainConfig;
}

/**
 * Wallet module that executes owner-signed bundles. A bundle runs on a
 * chain only through the entry matching that chain and the wallet's
 * current nonce, and the nonce moves on once it has run, so every signed
 * entry executes at most once.
 */
export class TypedDataBundleVerifier implements ChainContract, Journaled<Map<string, bigint>> {
  readonly contractName = "TypedDataBundleVerifier";
  private nonces = new Map<string, bigint>();

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly deps: BundleVerifierDependencies
  ) {}

  getSequenceNonce(wallet: string): bigint {
    return this.nonces.get(normalizeAddress(wallet, "wallet")) ?? 0n;
  }

  getBundleHash(bundle: Bundle): string {
    return hashBundle(bundle);
  }

  getDomainSeparator(wallet: string): string {
    return domainSeparator(this.deps.domain, wallet);
  }

  getDigest(wallet: string, bundle: Bundle): string {
    return bundleDigest(this.deps.domain, wallet, bundle);
  }

  executeBundle(submitter: string, walletAddress: string, bundle: Bundle, signature: string): BundleExecutionReceipt {
    const wallet = normalizeAddress(walletAddress, "wallet");
    const executor = normalizeAddress(submitter, "submitter");
    const phases: BundlePhase[] = ["AwaitingSignature"];

    return this.chain.transaction(() => {
      const now = this.chain.clock.now();
      if (now > bundle.expiry) {
        throw new EngineError("Expired", "bundle has expired", { expiry: bundle.expiry, now });
      }

      const signer = this.recoverSigner(wallet, bundle, signature);
      const existing = this.chain.codeAt(wallet);
      this.authorize(signer, wallet, existing);
      phases.push("SignatureVerified");

      const nonce = this.getSequenceNonce(wallet);
      const entry = bundle.sequences.find(
        (candidate) => candidate.chainId === this.chain.chainId && candidate.sequenceNonce === nonce
      );
      if (entry === undefined) {
        throw new EngineError("NoMatchingSequence", "no sequence for this chain and nonce", {
          chainId: this.chain.chainId,
          expectedNonce: nonce,
          wallet,
        });
      }
      phases.push("ChainSequenceSelected");

      const feeActionId = this.validate(entry);

      let walletContract: SmartWallet;
      let walletProvisioned = false;
      if (existing instanceof SmartWallet) {
        walletContract = existing;
      } else if (entry.deploySafe) {
        walletContract = this.deps.provisioner.provision(signer);
        walletProvisioned = true;
      } else {
        throw new EngineError("WalletNotDeployed", "wallet does not exist and deploySafe is unset", { wallet });
      }

      phases.push("Executing");
      const result = walletContract.execTransactionFromModule(this.address, this.deps.executor.address, (handle) =>
        this.deps.executor.executeSequence(handle, entry.sequence, { bundle, signature })
      );
      this.nonces.set(wallet, nonce + 1n);

      const bundleHash = hashBundle(bundle);
      this.chain.events.emitAction({
        caller: wallet,
        logId: LogId.BUNDLE_EXECUTED,
        payload: { bundleHash, sequenceNonce: nonce, sequenceName: entry.sequence.name, signer },
      });

      const refund: RefundOutcome =
        entry.enableGasRefund && feeActionId !== undefined
          ? this.refund(walletContract, executor, entry, feeActionId)
          : { status: "disabled" };
      phases.push("Completed");

      logger.info(
        {
          chainId: this.chain.chainId.toString(),
          wallet,
          sequenceNonce: nonce.toString(),
          sequence: entry.sequence.name,
          refund: refund.status,
        },
        "bundle executed"
      );

      return {
        bundleHash,
        digest: this.getDigest(wallet, bundle),
        signer,
        wallet,
        chainId: this.chain.chainId,
        sequenceNonce: nonce,
        sequenceName: entry.sequence.name,
        walletProvisioned,
        phases,
        actions: result.actions,
        refund,
      };
    });
  }

  snapshot(): Map<string, bigint> {
    return new Map(this.nonces);
  }

  restore(snapshot: Map<string, bigint>): void {
    this.nonces = new Map(snapshot);
  }

  private recoverSigner(wallet: string, bundle: Bundle, signature: string): string {
    try {
      return recoverBundleSigner(this.deps.domain, wallet, bundle, signature);
    } catch (error) {
      throw new EngineError("SignerNotAuthorized", "signature could not be recovered", {
        wallet,
        reason: describeError(error),
      });
    }
  }

  /**
   * An existing wallet accepts its owners. A wallet that does not exist
   * yet accepts only the signer whose predicted wallet it is.
   */
  private authorize(signer: string, wallet: string, existing: ChainContract | undefined): void {
    const authorized =
      existing instanceof SmartWallet
        ? existing.isOwner(signer)
        : existing === undefined && sameAddress(this.deps.provisioner.predictAddress(signer), wallet);
    if (!authorized) {
      throw new EngineError("SignerNotAuthorized", "signer does not control the wallet", { wallet, signer });
    }
  }

  /** Checks run before any side effect. Returns the fee action id when one is present. */
  private validate(entry: ChainSequence): string | undefined {
    const { sequence } = entry;
    if (sequence.actions.length !== sequence.actionIds.length || sequence.actionIds.length !== sequence.callData.length) {
      throw new EngineError("LengthMismatch", "sequence arrays differ in length", {
        actions: sequence.actions.length,
        actionIds: sequence.actionIds.length,
        callData: sequence.callData.length,
      });
    }

    sequence.actions.forEach((definition, index) => {
      const actionId = sequence.actionIds[index];
      const address = this.deps.registry.getActionAddress(actionId);
      const action = this.chain.codeAt(address);
      if (!isAction(action)) {
        throw new EngineError("UnresolvedAction", "registered address holds no action", { actionId, address });
      }
      if (action.protocolName !== definition.protocolName || action.actionType !== definition.actionType) {
        throw new EngineError("ActionMismatch", "resolved action differs from the signed definition", {
          index,
          actionId,
          expected: definition,
          actual: { protocolName: action.protocolName, actionType: action.actionType },
        });
      }
    });

    const feeIndex = sequence.actions.findIndex((definition) => definition.actionType === FEE_ACTION);
    if (entry.enableGasRefund && feeIndex === -1) {
      throw new EngineError("FeeActionRequired", "gas refund enabled without a fee action");
    }
    if (!entry.enableGasRefund && feeIndex !== -1) {
      throw new EngineError("FeeActionForbidden", "fee action present while gas refund is disabled", {
        index: feeIndex,
      });
    }
    if (feeIndex === -1) {
      return undefined;
    }
    this.matchRefundParams(entry, feeIndex);
    return sequence.actionIds[feeIndex];
  }

  /** The fee action's signed params and the entry's refund fields must agree. */
  private matchRefundParams(entry: ChainSequence, feeIndex: number): void {
    const { params } = decodeActionCall(entry.sequence.callData[feeIndex]);
    const signed = decodeGasRefundParams(params);
    const matches =
      sameAddress(signed.refundToken, entry.refundToken) &&
      signed.maxRefundAmount === entry.maxRefundAmount &&
      signed.refundRecipient === entry.refundRecipient;
    if (!matches) {
      throw new EngineError("RefundParamsMismatch", "fee action params differ from the refund fields", {
        index: feeIndex,
        params: signed,
        entry: {
          refundToken: entry.refundToken,
          maxRefundAmount: entry.maxRefundAmount,
          refundRecipient: entry.refundRecipient,
        },
      });
    }
  }

  /** Runs after the sequence is committed; a failure here is recorded, never rethrown. */
  private refund(wallet: SmartWallet, executor: string, entry: ChainSequence, feeActionId: string): RefundOutcome {
    const request: RefundRequest = {
      refundToken: entry.refundToken,
      maxRefundAmount: entry.maxRefundAmount,
      refundRecipient: entry.refundRecipient,
      executor,
      actionCount: entry.sequence.actionIds.length,
    };
    try {
      const payment = wallet.execTransactionFromModule(this.address, this.deps.executor.address, (handle) =>
        this.deps.executor.executeRefund(handle, feeActionId, request)
      );
      return { status: "paid", ...payment };
    } catch (error) {
      const reason = describeError(error);
      logger.warn({ wallet: wallet.address, token: entry.refundToken, reason }, "gas refund failed");
      this.chain.events.emitAction({
        caller: wallet.address,
        logId: LogId.GAS_REFUND_FAILED,
        payload: { token: entry.refundToken, maxRefundAmount: entry.maxRefundAmount, reason },
      });
      return { status: "failed", reason };
    }
  }
}
