import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import type { Journaled } from "../chain/journal.js";
import type { BundleContext } from "../bundle/types.js";
import { EngineError } from "../errors.js";

export type BridgeMessageStatus = "pending" | "delivered" | "failed";

export interface BridgeMessage extends BundleContext {
  id: number;
  sourceChainId: bigint;
  destinationChainId: bigint;
  wallet: string;
  token: string;
  amount: bigint;
  status: BridgeMessageStatus;
  failureReason?: string;
}

export type NewBridgeMessage = Omit<BridgeMessage, "id" | "status" | "failureReason" | "sourceChainId">;

/**
 * Messages burned on this chain and waiting to be minted and replayed
 * elsewhere. Messages are stored and handed out as copies. A failed
 * message keeps its burned amount and can be put back in the queue with
 * {@link BridgeOutbox.requeue}.
 */
export class BridgeOutbox implements ChainContract, Journaled<BridgeMessage[]> {
  readonly contractName = "BridgeOutbox";
  private messages: BridgeMessage[] = [];

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string
  ) {}

  enqueue(message: NewBridgeMessage): BridgeMessage {
    const entry: BridgeMessage = {
      ...structuredClone(message),
      id: this.messages.length,
      sourceChainId: this.chain.chainId,
      status: "pending",
    };
    this.messages.push(entry);
    return structuredClone(entry);
  }

  get(id: number): BridgeMessage {
    return structuredClone(this.find(id));
  }

  pending(): BridgeMessage[] {
    return this.messages.filter((message) => message.status === "pending").map((message) => structuredClone(message));
  }

  markDelivered(id: number): void {
    this.settle(id, "delivered");
  }

  markFailed(id: number, reason: string): void {
    this.settle(id, "failed", reason);
  }

  /** Puts a failed message back in the queue. */
  requeue(id: number): BridgeMessage {
    const message = this.find(id);
    if (message.status !== "failed") {
      throw new EngineError("InvalidInput", "only failed bridge messages can be requeued", {
        id,
        status: message.status,
      });
    }
    const requeued: BridgeMessage = { ...message, status: "pending", failureReason: undefined };
    this.messages[id] = requeued;
    return structuredClone(requeued);
  }

  snapshot(): BridgeMessage[] {
    return structuredClone(this.messages);
  }

  restore(snapshot: BridgeMessage[]): void {
    this.messages = structuredClone(snapshot);
  }

  private find(id: number): BridgeMessage {
    const message = this.messages[id];
    if (message === undefined) {
      throw new EngineError("NotFound", "bridge message not found", { id });
    }
    return message;
  }

  private settle(id: number, status: BridgeMessageStatus, reason?: string): void {
    const message = this.find(id);
    if (message.status !== "pending") {
      throw new EngineError("InvalidInput", "bridge message already settled", { id, status: message.status });
    }
    this.messages[id] = { ...message, status, failureReason: reason };
  }
}
