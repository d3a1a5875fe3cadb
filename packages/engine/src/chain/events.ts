import { buildAuditRecord, type AuditRecord } from "../../../../shared/structuredLogger.js";
import type { Clock } from "./clock.js";
import type { Journaled } from "./journal.js";

export type GovernanceCategory =
  | "action"
  | "pool"
  | "fee"
  | "role"
  | "delay"
  | "token"
  | "config"
  | "wallet";

export type GovernanceOperation =
  | "proposed"
  | "executed"
  | "granted"
  | "cancelled"
  | "removed"
  | "revoked"
  | "updated"
  | "deployed";

export const LogId = {
  BALANCE_UPDATE: 1,
  TRANSFER: 2,
  BRIDGE_SEND: 3,
  GAS_REFUND: 4,
  GAS_REFUND_FAILED: 5,
  BUNDLE_EXECUTED: 6,
  FEE_TAKEN: 7,
} as const;

export type LogIdValue = (typeof LogId)[keyof typeof LogId];

export interface GovernanceEvent {
  channel: "governance";
  category: GovernanceCategory;
  operation: GovernanceOperation;
  subject: string;
  actor: string;
  data: Record<string, unknown>;
  timestamp: bigint;
}

export interface ActionEvent {
  channel: "action";
  caller: string;
  logId: LogIdValue;
  payload: Record<string, unknown>;
  timestamp: bigint;
}

export type ChainEvent = GovernanceEvent | ActionEvent;

/**
 * Append-only event stream. Entries emitted inside a reverted transaction
 * are discarded together with the rest of its state.
 */
export class EventLog implements Journaled<number> {
  private entries: ChainEvent[] = [];

  constructor(private readonly clock: Clock, private readonly chainId: bigint) {}

  emitGovernance(event: Omit<GovernanceEvent, "channel" | "timestamp">): GovernanceEvent {
    const entry: GovernanceEvent = {
      channel: "governance",
      ...event,
      timestamp: this.clock.now(),
    };
    this.entries.push(entry);
    return entry;
  }

  emitAction(event: Omit<ActionEvent, "channel" | "timestamp">): ActionEvent {
    const entry: ActionEvent = {
      channel: "action",
      ...event,
      timestamp: this.clock.now(),
    };
    this.entries.push(entry);
    return entry;
  }

  all(): readonly ChainEvent[] {
    return this.entries;
  }

  governance(category?: GovernanceCategory): GovernanceEvent[] {
    return this.entries.filter(
      (entry): entry is GovernanceEvent =>
        entry.channel === "governance" && (category === undefined || entry.category === category)
    );
  }

  actions(logId?: LogIdValue): ActionEvent[] {
    return this.entries.filter(
      (entry): entry is ActionEvent =>
        entry.channel === "action" && (logId === undefined || entry.logId === logId)
    );
  }

  toAuditRecords(component: string): AuditRecord[] {
    return this.entries.map((entry) =>
      entry.channel === "governance"
        ? buildAuditRecord({
            component,
            event: `${entry.category}.${entry.operation}`,
            timestamp: new Date(Number(entry.timestamp) * 1000).toISOString(),
            chainId: this.chainId,
            details: { subject: entry.subject, actor: entry.actor, ...entry.data },
          })
        : buildAuditRecord({
            component,
            event: `log.${entry.logId}`,
            timestamp: new Date(Number(entry.timestamp) * 1000).toISOString(),
            wallet: entry.caller,
            chainId: this.chainId,
            details: { payload: entry.payload },
          })
    );
  }

  snapshot(): number {
    return this.entries.length;
  }

  restore(length: number): void {
    this.entries = this.entries.slice(0, length);
  }
}
