import { createLogger } from "../../../../shared/logger.js";
import type { BridgeMessage, BridgeOutbox } from "../actions/bridgeOutbox.js";
import type { Bundle } from "../bundle/types.js";
import type { BundleExecutionReceipt } from "../bundle/verifier.js";
import type { EngineDeployment } from "../deployment.js";
import { EngineError, describeError } from "../errors.js";
import { normalizeAddress } from "../utils/address.js";

const logger = createLogger("bundle-relayer");

export type SubmissionResult =
  | { chainId: bigint; status: "executed"; receipt: BundleExecutionReceipt }
  | { chainId: bigint; status: "failed"; error: Error };

export interface BridgeDelivery {
  messageId: number;
  sourceChainId: bigint;
  destinationChainId: bigint;
  result: SubmissionResult;
}

/** Submits signed bundles to the verifier of each chain it knows about. */
export class BundleRelayer {
  readonly address: string;
  private readonly deployments = new Map<bigint, EngineDeployment>();

  constructor(address: string, deployments: EngineDeployment[]) {
    this.address = normalizeAddress(address, "relayer");
    for (const deployment of deployments) {
      if (this.deployments.has(deployment.chain.chainId)) {
        throw new EngineError("InvalidInput", "duplicate chain deployment", {
          chainId: deployment.chain.chainId,
        });
      }
      this.deployments.set(deployment.chain.chainId, deployment);
    }
  }

  chainIds(): bigint[] {
    return [...this.deployments.keys()];
  }

  deployment(chainId: bigint): EngineDeployment {
    const deployment = this.deployments.get(chainId);
    if (!deployment) {
      throw new EngineError("UnknownChain", "no deployment for chain", { chainId });
    }
    return deployment;
  }

  submit(chainId: bigint, wallet: string, bundle: Bundle, signature: string): BundleExecutionReceipt {
    const { verifier } = this.deployment(chainId);
    return verifier.executeBundle(this.address, wallet, bundle, signature);
  }

  /** Tries every chain the bundle names; a failure on one chain does not stop the others. */
  submitEverywhere(wallet: string, bundle: Bundle, signature: string): SubmissionResult[] {
    const targets = [...new Set(bundle.sequences.map((entry) => entry.chainId))].filter((chainId) =>
      this.deployments.has(chainId)
    );
    return targets.map((chainId) => this.attempt(chainId, () => this.submit(chainId, wallet, bundle, signature)));
  }

  /**
   * Delivers pending bridge messages from `sourceChainId`: mints the
   * bridged amount to the wallet on the destination chain and runs the
   * carried bundle there. A failed delivery leaves the destination chain
   * untouched and marks the message failed; the burned amount stays with
   * the message until {@link BundleRelayer.retryBridgeMessage} delivers it.
   */
  relayBridgeMessages(sourceChainId: bigint): BridgeDelivery[] {
    const { outbox } = this.deployment(sourceChainId);
    return outbox.pending().map((message) => this.relay(outbox, message));
  }

  /** Delivers a failed message again, settling it as delivered or failed. */
  retryBridgeMessage(sourceChainId: bigint, messageId: number): BridgeDelivery {
    const { outbox } = this.deployment(sourceChainId);
    const message = outbox.requeue(messageId);
    logger.info(
      { sourceChainId: sourceChainId.toString(), messageId, destinationChainId: message.destinationChainId.toString() },
      "retrying bridge message"
    );
    return this.relay(outbox, message);
  }

  private relay(outbox: BridgeOutbox, message: BridgeMessage): BridgeDelivery {
    const result = this.deliver(message);
    if (result.status === "executed") {
      outbox.markDelivered(message.id);
    } else {
      outbox.markFailed(message.id, describeError(result.error));
    }
    return {
      messageId: message.id,
      sourceChainId: message.sourceChainId,
      destinationChainId: message.destinationChainId,
      result,
    };
  }

  private deliver(message: BridgeMessage): SubmissionResult {
    return this.attempt(message.destinationChainId, () => {
      const destination = this.deployment(message.destinationChainId);
      return destination.chain.transaction(() => {
        destination.chain.tokens.mint(message.token, message.wallet, message.amount);
        return destination.verifier.executeBundle(this.address, message.wallet, message.bundle, message.signature);
      });
    });
  }

  private attempt(chainId: bigint, run: () => BundleExecutionReceipt): SubmissionResult {
    try {
      return { chainId, status: "executed", receipt: run() };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.warn({ chainId: chainId.toString(), reason: describeError(failure) }, "bundle submission failed");
      return { chainId, status: "failed", error: failure };
    }
  }
}
