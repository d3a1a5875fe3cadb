import type { Journaled } from "../chain/journal.js";
import { EngineError } from "../errors.js";

export interface PendingProposal {
  target: string;
  proposedAt: bigint;
}

export type ProposalState =
  | { status: "unset" }
  | { status: "proposed"; target: string; proposedAt: bigint; executableAt: bigint }
  | { status: "expired"; target: string; proposedAt: bigint };

export interface ProposalWindow {
  delay: bigint;
  /** Seconds a proposal stays executable once its delay has passed; 0 never expires. */
  ttl: bigint;
}

type ProposalSnapshot = Map<string, PendingProposal>;

/**
 * Two-phase proposal book. Each key moves Unset -> Proposed -> Unset,
 * either by consumption after the delay or by cancellation.
 */
export class ProposalBook implements Journaled<ProposalSnapshot> {
  private pending: ProposalSnapshot = new Map();

  constructor(readonly label: string) {}

  state(key: string, now: bigint, window: ProposalWindow): ProposalState {
    const proposal = this.pending.get(key);
    if (!proposal) {
      return { status: "unset" };
    }
    if (this.isExpired(proposal, now, window)) {
      return { status: "expired", target: proposal.target, proposedAt: proposal.proposedAt };
    }
    return {
      status: "proposed",
      target: proposal.target,
      proposedAt: proposal.proposedAt,
      executableAt: proposal.proposedAt + window.delay,
    };
  }

  propose(key: string, target: string, now: bigint, window: ProposalWindow): PendingProposal {
    const existing = this.pending.get(key);
    if (existing && !this.isExpired(existing, now, window)) {
      throw new EngineError("AlreadyProposed", `${this.label} proposal already pending`, {
        key,
        target: existing.target,
        proposedAt: existing.proposedAt,
      });
    }
    const proposal: PendingProposal = { target, proposedAt: now };
    this.pending.set(key, proposal);
    return proposal;
  }

  cancel(key: string): PendingProposal {
    const existing = this.pending.get(key);
    if (!existing) {
      throw new EngineError("NotProposed", `${this.label} was not proposed`, { key });
    }
    this.pending.delete(key);
    return existing;
  }

  /**
   * Validates and clears a proposal. The delay boundary is inclusive:
   * a proposal made at t with delay d may be consumed from t + d onward.
   */
  consume(
    key: string,
    target: string,
    now: bigint,
    window: ProposalWindow,
    options: { bypassDelay?: boolean } = {}
  ): PendingProposal | undefined {
    const existing = this.pending.get(key);
    if (options.bypassDelay) {
      this.pending.delete(key);
      return existing;
    }
    if (!existing) {
      throw new EngineError("NotProposed", `${this.label} was not proposed`, { key });
    }
    if (existing.target !== target) {
      throw new EngineError("ProposalMismatch", `${this.label} target differs from proposal`, {
        key,
        proposed: existing.target,
        requested: target,
      });
    }
    const executableAt = existing.proposedAt + window.delay;
    if (now < executableAt) {
      throw new EngineError("GovernanceDelayNotElapsed", `${this.label} delay has not passed`, {
        key,
        now,
        executableAt,
      });
    }
    if (this.isExpired(existing, now, window)) {
      throw new EngineError("ProposalExpired", `${this.label} proposal expired`, {
        key,
        proposedAt: existing.proposedAt,
      });
    }
    this.pending.delete(key);
    return existing;
  }

  snapshot(): ProposalSnapshot {
    return new Map(this.pending);
  }

  restore(snapshot: ProposalSnapshot): void {
    this.pending = new Map(snapshot);
  }

  private isExpired(proposal: PendingProposal, now: bigint, window: ProposalWindow): boolean {
    return window.ttl > 0n && now > proposal.proposedAt + window.delay + window.ttl;
  }
}
