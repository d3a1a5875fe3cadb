import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import type { GovernanceCategory, GovernanceOperation } from "../chain/events.js";
import { capture, type Journaled, type Restorer } from "../chain/journal.js";
import { EngineError } from "../errors.js";
import { isBytes4, isZeroAddress, normalizeAddress, shortId } from "../utils/address.js";
import { ProposalBook, type ProposalState, type ProposalWindow } from "./proposals.js";
import { RoleBook, roleAdmin, roleId, type RoleName } from "./roles.js";

const logger = createLogger("admin-vault");

export interface AdminVaultOptions {
  admin: string;
  delay: bigint;
  maxDelay: bigint;
  /** 0 keeps proposals executable indefinitely. */
  proposalTtl?: bigint;
}

export interface ExecuteOptions {
  /** OWNER-only emergency path that skips the governance delay. */
  bypassDelay?: boolean;
}

export interface FeeRange {
  minBasis: bigint;
  maxBasis: bigint;
}

interface VaultState {
  delay: bigint;
  actions: Map<string, string>;
  pools: Map<string, string>;
  feeRecipient: string;
  feeRange: FeeRange;
  feeTimestamps: Map<string, bigint>;
}

function cloneState(state: VaultState): VaultState {
  return {
    delay: state.delay,
    actions: new Map(state.actions),
    pools: new Map(state.pools),
    feeRecipient: state.feeRecipient,
    feeRange: { ...state.feeRange },
    feeTimestamps: new Map(state.feeTimestamps),
  };
}

function poolKey(protocolName: string, poolId: string): string {
  return `${protocolName}:${poolId.toLowerCase()}`;
}

/**
 * Governed registry of trusted action and pool addresses. Every mapping
 * change is proposed, waits out the delay and is then executed with the
 * same target, so a proposer cannot be front-run with a different address.
 */
export class AdminVault implements ChainContract, Journaled<Restorer[]> {
  readonly contractName = "AdminVault";
  readonly maxDelay: bigint;
  readonly proposalTtl: bigint;

  private readonly roles = new RoleBook();
  private readonly roleProposals = new ProposalBook("role");
  private readonly actionProposals = new ProposalBook("action");
  private readonly poolProposals = new ProposalBook("pool");
  private readonly feeRecipientProposals = new ProposalBook("fee recipient");
  private state: VaultState;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    options: AdminVaultOptions
  ) {
    const admin = normalizeAddress(options.admin, "admin");
    if (options.delay < 0n || options.delay > options.maxDelay) {
      throw new EngineError("InvalidInput", "delay must be within [0, maxDelay]", {
        delay: options.delay,
        maxDelay: options.maxDelay,
      });
    }
    this.maxDelay = options.maxDelay;
    this.proposalTtl = options.proposalTtl ?? 0n;
    this.state = {
      delay: options.delay,
      actions: new Map(),
      pools: new Map(),
      feeRecipient: admin,
      feeRange: { minBasis: 0n, maxBasis: 0n },
      feeTimestamps: new Map(),
    };
    this.roles.grant("OWNER_ROLE", admin);
    this.roles.grant("ROLE_MANAGER_ROLE", admin);
  }

  // ---------------------------------------------------------------------------
  // Roles

  hasRole(role: RoleName, account: string): boolean {
    return this.roles.has(role, account);
  }

  getRoleAdmin(role: RoleName): RoleName {
    return roleAdmin(role);
  }

  getRoleMembers(role: RoleName): string[] {
    return this.roles.holders(role);
  }

  getRoleProposal(role: RoleName, account: string): ProposalState {
    const grantee = normalizeAddress(account, "account");
    return this.roleProposals.state(`${role}:${grantee}`, this.now(), this.window());
  }

  proposeRole(caller: string, role: RoleName, account: string): void {
    this.chain.transaction(() => {
      this.requireRole(roleAdmin(role), caller);
      const grantee = this.nonZero(account, "account");
      if (this.roles.has(role, grantee)) {
        throw new EngineError("AlreadyAdded", "account already holds role", { role, account: grantee });
      }
      this.roleProposals.propose(`${role}:${grantee}`, grantee, this.now(), this.window());
      this.emit("role", "proposed", role, caller, { roleId: roleId(role), account: grantee });
    });
  }

  grantRole(caller: string, role: RoleName, account: string, options: ExecuteOptions = {}): void {
    this.chain.transaction(() => {
      const grantee = this.nonZero(account, "account");
      this.authorizeExecute(roleAdmin(role), caller, options);
      if (this.roles.has(role, grantee)) {
        throw new EngineError("AlreadyAdded", "account already holds role", { role, account: grantee });
      }
      this.roleProposals.consume(`${role}:${grantee}`, grantee, this.now(), this.window(), options);
      this.roles.grant(role, grantee);
      this.emit("role", "granted", role, caller, {
        roleId: roleId(role),
        account: grantee,
        emergency: Boolean(options.bypassDelay),
      });
      this.noteEmergency(options, "role", role, caller);
    });
  }

  cancelRoleProposal(caller: string, role: RoleName, account: string): void {
    this.chain.transaction(() => {
      this.requireRole(roleAdmin(role), caller);
      const grantee = normalizeAddress(account, "account");
      this.roleProposals.cancel(`${role}:${grantee}`);
      this.emit("role", "cancelled", role, caller, { roleId: roleId(role), account: grantee });
    });
  }

  revokeRole(caller: string, role: RoleName, account: string): void {
    this.chain.transaction(() => {
      this.requireRole(roleAdmin(role), caller);
      const holder = normalizeAddress(account, "account");
      if (!this.roles.revoke(role, holder)) {
        throw new EngineError("NotFound", "account does not hold role", { role, account: holder });
      }
      this.emit("role", "revoked", role, caller, { roleId: roleId(role), account: holder });
    });
  }

  renounceRole(caller: string, role: RoleName): void {
    this.chain.transaction(() => {
      const holder = normalizeAddress(caller, "caller");
      if (!this.roles.revoke(role, holder)) {
        throw new EngineError("NotFound", "account does not hold role", { role, account: holder });
      }
      this.emit("role", "revoked", role, holder, { roleId: roleId(role), account: holder, renounced: true });
    });
  }

  // ---------------------------------------------------------------------------
  // Delay

  getDelay(): bigint {
    return this.state.delay;
  }

  changeDelay(caller: string, seconds: bigint): void {
    this.chain.transaction(() => {
      this.requireRole("OWNER_ROLE", caller);
      if (seconds < 0n || seconds > this.maxDelay) {
        throw new EngineError("InvalidInput", "delay must be within [0, maxDelay]", {
          delay: seconds,
          maxDelay: this.maxDelay,
        });
      }
      const previous = this.state.delay;
      this.state.delay = seconds;
      this.emit("delay", "updated", "delay", caller, { previous, delay: seconds });
      logger.info({ previous: previous.toString(), delay: seconds.toString() }, "governance delay changed");
    });
  }

  // ---------------------------------------------------------------------------
  // Actions

  proposeAction(caller: string, actionId: string, actionAddress: string): void {
    this.chain.transaction(() => {
      this.requireRole("ACTION_PROPOSER_ROLE", caller);
      const id = this.actionKey(actionId);
      const target = this.nonZero(actionAddress, "actionAddress");
      if (this.state.actions.has(id)) {
        throw new EngineError("AlreadyAdded", "action id already registered", { actionId: id });
      }
      this.actionProposals.propose(id, target, this.now(), this.window());
      this.emit("action", "proposed", id, caller, { address: target });
    });
  }

  addAction(
    caller: string,
    actionId: string,
    actionAddress: string,
    options: ExecuteOptions = {}
  ): void {
    this.chain.transaction(() => {
      this.authorizeExecute("ACTION_EXECUTOR_ROLE", caller, options);
      const id = this.actionKey(actionId);
      const target = this.nonZero(actionAddress, "actionAddress");
      if (this.state.actions.has(id)) {
        throw new EngineError("AlreadyAdded", "action id already registered", { actionId: id });
      }
      this.actionProposals.consume(id, target, this.now(), this.window(), options);
      this.state.actions.set(id, target);
      this.emit("action", "executed", id, caller, {
        address: target,
        emergency: Boolean(options.bypassDelay),
      });
      this.noteEmergency(options, "action", id, caller);
    });
  }

  cancelActionProposal(caller: string, actionId: string): void {
    this.chain.transaction(() => {
      this.requireRole("ACTION_CANCELER_ROLE", caller);
      const id = this.actionKey(actionId);
      const cancelled = this.actionProposals.cancel(id);
      this.emit("action", "cancelled", id, caller, { address: cancelled.target });
    });
  }

  removeAction(caller: string, actionId: string): void {
    this.chain.transaction(() => {
      this.requireRole("ACTION_DISPOSER_ROLE", caller);
      const id = this.actionKey(actionId);
      const existing = this.state.actions.get(id);
      if (existing === undefined) {
        throw new EngineError("NotFound", "action id not registered", { actionId: id });
      }
      this.state.actions.delete(id);
      this.emit("action", "removed", id, caller, { address: existing });
    });
  }

  getActionAddress(actionId: string): string {
    const address = this.findActionAddress(actionId);
    if (address === undefined) {
      throw new EngineError("UnresolvedAction", "action id is not registered", {
        actionId: actionId.toLowerCase(),
      });
    }
    return address;
  }

  findActionAddress(actionId: string): string | undefined {
    return this.state.actions.get(actionId.toLowerCase());
  }

  getActionProposal(actionId: string): ProposalState {
    return this.actionProposals.state(this.actionKey(actionId), this.now(), this.window());
  }

  // ---------------------------------------------------------------------------
  // Pools

  proposePool(caller: string, protocolName: string, poolAddress: string): void {
    this.chain.transaction(() => {
      this.requireRole("POOL_PROPOSER_ROLE", caller);
      const { key, pool, poolId } = this.poolEntry(protocolName, poolAddress);
      if (this.state.pools.has(key)) {
        throw new EngineError("AlreadyAdded", "pool already registered", { protocolName, poolId });
      }
      this.poolProposals.propose(key, pool, this.now(), this.window());
      this.emit("pool", "proposed", key, caller, { protocolName, poolId, address: pool });
    });
  }

  addPool(
    caller: string,
    protocolName: string,
    poolAddress: string,
    options: ExecuteOptions = {}
  ): void {
    this.chain.transaction(() => {
      this.authorizeExecute("POOL_EXECUTOR_ROLE", caller, options);
      const { key, pool, poolId } = this.poolEntry(protocolName, poolAddress);
      if (this.state.pools.has(key)) {
        throw new EngineError("AlreadyAdded", "pool already registered", { protocolName, poolId });
      }
      this.poolProposals.consume(key, pool, this.now(), this.window(), options);
      this.state.pools.set(key, pool);
      this.emit("pool", "executed", key, caller, {
        protocolName,
        poolId,
        address: pool,
        emergency: Boolean(options.bypassDelay),
      });
      this.noteEmergency(options, "pool", key, caller);
    });
  }

  cancelPoolProposal(caller: string, protocolName: string, poolAddress: string): void {
    this.chain.transaction(() => {
      this.requireRole("POOL_CANCELER_ROLE", caller);
      const { key, poolId } = this.poolEntry(protocolName, poolAddress);
      const cancelled = this.poolProposals.cancel(key);
      this.emit("pool", "cancelled", key, caller, { protocolName, poolId, address: cancelled.target });
    });
  }

  removePool(caller: string, protocolName: string, poolAddress: string): void {
    this.chain.transaction(() => {
      this.requireRole("POOL_DISPOSER_ROLE", caller);
      const { key, pool, poolId } = this.poolEntry(protocolName, poolAddress);
      if (!this.state.pools.delete(key)) {
        throw new EngineError("NotFound", "pool not registered", { protocolName, poolId });
      }
      this.emit("pool", "removed", key, caller, { protocolName, poolId, address: pool });
    });
  }

  getPoolAddress(protocolName: string, poolId: string): string {
    const address = this.state.pools.get(poolKey(protocolName, poolId));
    if (address === undefined) {
      throw new EngineError("NotFound", "pool not registered", { protocolName, poolId });
    }
    return address;
  }

  getPoolProposal(protocolName: string, poolAddress: string): ProposalState {
    const { key } = this.poolEntry(protocolName, poolAddress);
    return this.poolProposals.state(key, this.now(), this.window());
  }

  isRegisteredPool(poolAddress: string): boolean {
    const pool = normalizeAddress(poolAddress, "pool");
    for (const registered of this.state.pools.values()) {
      if (registered === pool) return true;
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Fees

  getFeeRecipient(): string {
    return this.state.feeRecipient;
  }

  getFeeRange(): FeeRange {
    return { ...this.state.feeRange };
  }

  proposeFeeRecipient(caller: string, recipient: string): void {
    this.chain.transaction(() => {
      this.requireRole("FEE_PROPOSER_ROLE", caller);
      const target = this.nonZero(recipient, "recipient");
      this.feeRecipientProposals.propose("recipient", target, this.now(), this.window());
      this.emit("fee", "proposed", "recipient", caller, { recipient: target });
    });
  }

  setFeeRecipient(caller: string, recipient: string, options: ExecuteOptions = {}): void {
    this.chain.transaction(() => {
      this.authorizeExecute("FEE_EXECUTOR_ROLE", caller, options);
      const target = this.nonZero(recipient, "recipient");
      this.feeRecipientProposals.consume("recipient", target, this.now(), this.window(), options);
      const previous = this.state.feeRecipient;
      this.state.feeRecipient = target;
      this.emit("fee", "executed", "recipient", caller, {
        previous,
        recipient: target,
        emergency: Boolean(options.bypassDelay),
      });
      this.noteEmergency(options, "fee", "recipient", caller);
    });
  }

  cancelFeeRecipientProposal(caller: string): void {
    this.chain.transaction(() => {
      this.requireRole("FEE_CANCELER_ROLE", caller);
      const cancelled = this.feeRecipientProposals.cancel("recipient");
      this.emit("fee", "cancelled", "recipient", caller, { recipient: cancelled.target });
    });
  }

  setFeeRange(caller: string, minBasis: bigint, maxBasis: bigint): void {
    this.chain.transaction(() => {
      this.requireRole("OWNER_ROLE", caller);
      if (minBasis < 0n || minBasis > maxBasis) {
        throw new EngineError("InvalidFeeRange", "minimum fee exceeds maximum fee", {
          minBasis,
          maxBasis,
        });
      }
      this.state.feeRange = { minBasis, maxBasis };
      this.emit("fee", "updated", "range", caller, { minBasis, maxBasis });
    });
  }

  /** Throws unless `feeBasis` lies within the configured fee range. */
  checkFeeBasis(feeBasis: bigint): void {
    const { minBasis, maxBasis } = this.state.feeRange;
    if (feeBasis < minBasis || feeBasis > maxBasis) {
      throw new EngineError("FeeBasisOutOfRange", "fee basis is outside the fee range", {
        feeBasis,
        minBasis,
        maxBasis,
      });
    }
  }

  /** Starts the fee clock for a wallet's position in a pool; later calls keep the first value. */
  initializeFeeTimestamp(wallet: string, poolAddress: string): bigint {
    const key = this.feeKey(wallet, poolAddress);
    const existing = this.state.feeTimestamps.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const now = this.now();
    this.state.feeTimestamps.set(key, now);
    return now;
  }

  updateFeeTimestamp(wallet: string, poolAddress: string): bigint {
    const key = this.feeKey(wallet, poolAddress);
    const now = this.now();
    this.state.feeTimestamps.set(key, now);
    return now;
  }

  getLastFeeTimestamp(wallet: string, poolAddress: string): bigint {
    const key = `${normalizeAddress(wallet, "wallet")}:${normalizeAddress(poolAddress, "pool")}`;
    return this.state.feeTimestamps.get(key) ?? 0n;
  }

  // ---------------------------------------------------------------------------
  // Journal

  snapshot(): Restorer[] {
    const saved = cloneState(this.state);
    return [
      () => {
        this.state = cloneState(saved);
      },
      capture(this.roles),
      capture(this.roleProposals),
      capture(this.actionProposals),
      capture(this.poolProposals),
      capture(this.feeRecipientProposals),
    ];
  }

  restore(restorers: Restorer[]): void {
    for (const restoreState of restorers) {
      restoreState();
    }
  }

  // ---------------------------------------------------------------------------

  private now(): bigint {
    return this.chain.clock.now();
  }

  private window(): ProposalWindow {
    return { delay: this.state.delay, ttl: this.proposalTtl };
  }

  private requireRole(role: RoleName, caller: string): void {
    if (!this.roles.has(role, caller)) {
      throw new EngineError("RoleUnauthorized", `caller lacks ${role}`, {
        role,
        roleId: roleId(role),
        account: caller,
      });
    }
  }

  private authorizeExecute(role: RoleName, caller: string, options: ExecuteOptions): void {
    this.requireRole(options.bypassDelay ? "OWNER_ROLE" : role, caller);
  }

  private noteEmergency(
    options: ExecuteOptions,
    category: GovernanceCategory,
    subject: string,
    caller: string
  ): void {
    if (options.bypassDelay) {
      logger.warn({ category, subject, caller }, "governance delay bypassed by owner");
    }
  }

  private emit(
    category: GovernanceCategory,
    operation: GovernanceOperation,
    subject: string,
    actor: string,
    data: Record<string, unknown>
  ): void {
    this.chain.events.emitGovernance({
      category,
      operation,
      subject,
      actor: normalizeAddress(actor, "actor"),
      data,
    });
    logger.debug({ category, operation, subject }, "governance event");
  }

  private nonZero(value: string, field: string): string {
    const address = normalizeAddress(value, field);
    if (isZeroAddress(address)) {
      throw new EngineError("InvalidInput", `${field} must not be the zero address`, { field });
    }
    return address;
  }

  private actionKey(actionId: string): string {
    if (!isBytes4(actionId) || actionId === "0x00000000") {
      throw new EngineError("InvalidInput", "action id must be a non-zero bytes4 value", {
        actionId,
      });
    }
    return actionId.toLowerCase();
  }

  private poolEntry(
    protocolName: string,
    poolAddress: string
  ): { key: string; pool: string; poolId: string } {
    if (protocolName.trim() === "") {
      throw new EngineError("InvalidInput", "protocol name must not be empty");
    }
    const pool = this.nonZero(poolAddress, "poolAddress");
    const poolId = shortId(pool);
    return { key: poolKey(protocolName, poolId), pool, poolId };
  }

  private feeKey(wallet: string, poolAddress: string): string {
    const pool = normalizeAddress(poolAddress, "pool");
    if (!this.isRegisteredPool(pool)) {
      throw new EngineError("NotFound", "pool not registered", { pool });
    }
    return `${normalizeAddress(wallet, "wallet")}:${pool}`;
  }
}

export function poolIdOf(poolAddress: string): string {
  return shortId(poolAddress);
}

export function actionIdOf(actionAddress: string): string {
  return shortId(actionAddress);
}
