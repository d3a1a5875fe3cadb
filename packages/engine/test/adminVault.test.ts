import { strict as assert } from "node:assert";
import test from "node:test";

import { ethers } from "ethers";

import { poolIdOf } from "../src/governance/adminVault.js";
import { roleId } from "../src/governance/roles.js";
import { ADMIN, START_TIME, STRANGER, createEnvironment, registerPool, USDC } from "./helpers.js";

const ACTION_ID = "0x1a2b3c4d";
const ACTION_A = ethers.getAddress("0x" + "c1".repeat(20));
const ACTION_B = ethers.getAddress("0x" + "c2".repeat(20));

test("the initial admin holds OWNER and ROLE_MANAGER only", () => {
  const env = createEnvironment();
  const outsider = STRANGER.address;

  assert.equal(env.vault.hasRole("OWNER_ROLE", ADMIN.address), true);
  assert.equal(env.vault.hasRole("ROLE_MANAGER_ROLE", ADMIN.address), true);
  assert.equal(env.vault.hasRole("ACTION_PROPOSER_ROLE", outsider), false);
  assert.equal(env.vault.getRoleAdmin("OWNER_ROLE"), "OWNER_ROLE");
  assert.equal(env.vault.getRoleAdmin("ROLE_MANAGER_ROLE"), "OWNER_ROLE");
  assert.equal(env.vault.getRoleAdmin("POOL_DISPOSER_ROLE"), "ROLE_MANAGER_ROLE");
  assert.equal(roleId("OWNER_ROLE"), ethers.id("OWNER_ROLE"));
});

test("addAction fails before the delay and succeeds exactly at it", () => {
  const env = createEnvironment({ delay: 100n });
  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_A);

  env.clock.advance(99);
  assert.throws(() => env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A), {
    code: "GovernanceDelayNotElapsed",
  });
  assert.equal(env.vault.findActionAddress(ACTION_ID), undefined);

  env.clock.advance(1);
  env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A);
  assert.equal(env.vault.getActionAddress(ACTION_ID), ACTION_A);
  assert.deepEqual(env.vault.getActionProposal(ACTION_ID), { status: "unset" });
});

test("executing with a different address than proposed is a ProposalMismatch", () => {
  const env = createEnvironment();
  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_A);

  assert.throws(() => env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_B), { code: "ProposalMismatch" });
  assert.equal(env.vault.getActionProposal(ACTION_ID).status, "proposed");
});

test("a second proposal for a pending id is rejected until the first is cancelled", () => {
  const env = createEnvironment({ delay: 10n });
  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_A);

  assert.throws(() => env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_B), { code: "AlreadyProposed" });

  env.vault.cancelActionProposal(ADMIN.address, ACTION_ID);
  assert.throws(() => env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A), { code: "NotProposed" });

  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_B);
  assert.deepEqual(env.vault.getActionProposal(ACTION_ID), {
    status: "proposed",
    target: ACTION_B,
    proposedAt: START_TIME,
    executableAt: START_TIME + 10n,
  });
});

test("proposals past their ttl cannot be executed and may be proposed again", () => {
  const env = createEnvironment({ delay: 100n, proposalTtl: 50n });
  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_A);

  env.clock.advance(150);
  assert.equal(env.vault.getActionProposal(ACTION_ID).status, "proposed");

  env.clock.advance(1);
  assert.equal(env.vault.getActionProposal(ACTION_ID).status, "expired");
  assert.throws(() => env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A), { code: "ProposalExpired" });

  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_B);
  assert.equal(env.vault.getActionProposal(ACTION_ID).status, "proposed");
});

test("governance calls without the matching role are RoleUnauthorized and leave no trace", () => {
  const env = createEnvironment();
  const eventsBefore = env.chain.events.all().length;

  assert.throws(() => env.vault.proposeAction(STRANGER.address, ACTION_ID, ACTION_A), {
    code: "RoleUnauthorized",
  });
  assert.throws(() => env.vault.removeAction(STRANGER.address, ACTION_ID), { code: "RoleUnauthorized" });
  assert.throws(() => env.vault.changeDelay(STRANGER.address, 5n), { code: "RoleUnauthorized" });
  assert.equal(env.chain.events.all().length, eventsBefore);
});

test("removing an action makes it unresolvable", () => {
  const env = createEnvironment();
  env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_A);
  env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A);

  assert.throws(() => env.vault.proposeAction(ADMIN.address, ACTION_ID, ACTION_B), { code: "AlreadyAdded" });

  env.vault.removeAction(ADMIN.address, ACTION_ID);
  assert.throws(() => env.vault.getActionAddress(ACTION_ID), { code: "UnresolvedAction" });
  assert.throws(() => env.vault.removeAction(ADMIN.address, ACTION_ID), { code: "NotFound" });

  const removed = env.chain.events.governance("action").at(-1);
  assert.equal(removed?.operation, "removed");
  assert.equal(removed?.subject, ACTION_ID);
});

test("action ids must be non-zero bytes4 and addresses non-zero", () => {
  const env = createEnvironment();

  assert.throws(() => env.vault.proposeAction(ADMIN.address, "0x00000000", ACTION_A), { code: "InvalidInput" });
  assert.throws(() => env.vault.proposeAction(ADMIN.address, "0x1234", ACTION_A), { code: "InvalidInput" });
  assert.throws(() => env.vault.proposeAction(ADMIN.address, ACTION_ID, ethers.ZeroAddress), {
    code: "InvalidInput",
  });
});

test("owners may bypass the delay and the event records the emergency", () => {
  const env = createEnvironment({ delay: 3600n });

  env.vault.addAction(ADMIN.address, ACTION_ID, ACTION_A, { bypassDelay: true });

  assert.equal(env.vault.getActionAddress(ACTION_ID), ACTION_A);
  const executed = env.chain.events.governance("action").at(-1);
  assert.equal(executed?.operation, "executed");
  assert.deepEqual(executed?.data, { address: ACTION_A, emergency: true });
});

test("the delay bypass is refused to executors without OWNER", () => {
  const env = createEnvironment();
  env.vault.proposeRole(ADMIN.address, "ACTION_EXECUTOR_ROLE", STRANGER.address);
  env.vault.grantRole(ADMIN.address, "ACTION_EXECUTOR_ROLE", STRANGER.address);
  env.vault.changeDelay(ADMIN.address, 3600n);

  assert.throws(() => env.vault.addAction(STRANGER.address, ACTION_ID, ACTION_A, { bypassDelay: true }), {
    code: "RoleUnauthorized",
  });
});

test("role grants are delay gated and revocable", () => {
  const env = createEnvironment({ delay: 100n });
  const grantee = STRANGER.address;

  env.vault.proposeRole(ADMIN.address, "POOL_PROPOSER_ROLE", grantee);
  assert.throws(() => env.vault.grantRole(ADMIN.address, "POOL_PROPOSER_ROLE", grantee), {
    code: "GovernanceDelayNotElapsed",
  });

  env.clock.advance(100);
  env.vault.grantRole(ADMIN.address, "POOL_PROPOSER_ROLE", grantee);
  assert.equal(env.vault.hasRole("POOL_PROPOSER_ROLE", grantee), true);
  assert.ok(env.vault.getRoleMembers("POOL_PROPOSER_ROLE").includes(grantee));

  env.vault.revokeRole(ADMIN.address, "POOL_PROPOSER_ROLE", grantee);
  assert.equal(env.vault.hasRole("POOL_PROPOSER_ROLE", grantee), false);
  assert.throws(() => env.vault.revokeRole(ADMIN.address, "POOL_PROPOSER_ROLE", grantee), { code: "NotFound" });
});

test("role proposals need the role's admin and can be cancelled", () => {
  const env = createEnvironment();

  assert.throws(() => env.vault.proposeRole(STRANGER.address, "FEE_TAKER_ROLE", STRANGER.address), {
    code: "RoleUnauthorized",
  });
  assert.throws(() => env.vault.proposeRole(ADMIN.address, "FEE_TAKER_ROLE", ethers.ZeroAddress), {
    code: "InvalidInput",
  });

  env.vault.proposeRole(ADMIN.address, "FEE_TAKER_ROLE", STRANGER.address);
  env.vault.cancelRoleProposal(ADMIN.address, "FEE_TAKER_ROLE", STRANGER.address);
  assert.deepEqual(env.vault.getRoleProposal("FEE_TAKER_ROLE", STRANGER.address), { status: "unset" });
  assert.throws(() => env.vault.grantRole(ADMIN.address, "FEE_TAKER_ROLE", STRANGER.address), {
    code: "NotProposed",
  });
});

test("renouncing a role removes it from the caller", () => {
  const env = createEnvironment();

  env.vault.renounceRole(ADMIN.address, "ACTION_DISPOSER_ROLE");

  assert.equal(env.vault.hasRole("ACTION_DISPOSER_ROLE", ADMIN.address), false);
  assert.throws(() => env.vault.renounceRole(ADMIN.address, "ACTION_DISPOSER_ROLE"), { code: "NotFound" });
});

test("changeDelay is bounded by the maximum delay", () => {
  const env = createEnvironment();

  env.vault.changeDelay(ADMIN.address, 432_000n);
  assert.equal(env.vault.getDelay(), 432_000n);
  assert.throws(() => env.vault.changeDelay(ADMIN.address, 432_001n), { code: "InvalidInput" });
});

test("pools are keyed by protocol name and the pool address hash", () => {
  const env = createEnvironment();
  const { pool, poolId } = registerPool(env, "AaveV3", USDC);

  assert.equal(poolId, ethers.dataSlice(ethers.keccak256(pool.address), 0, 4));
  assert.equal(env.vault.getPoolAddress("AaveV3", poolId), pool.address);
  assert.equal(env.vault.isRegisteredPool(pool.address), true);
  assert.throws(() => env.vault.getPoolAddress("MorphoBlue", poolId), { code: "NotFound" });
  assert.throws(() => env.vault.proposePool(ADMIN.address, "AaveV3", pool.address), { code: "AlreadyAdded" });

  env.vault.removePool(ADMIN.address, "AaveV3", pool.address);
  assert.throws(() => env.vault.getPoolAddress("AaveV3", poolIdOf(pool.address)), { code: "NotFound" });
});

test("pool proposals validate input and can be cancelled", () => {
  const env = createEnvironment();
  const poolAddress = ethers.getAddress("0x" + "d1".repeat(20));

  assert.throws(() => env.vault.proposePool(ADMIN.address, " ", poolAddress), { code: "InvalidInput" });
  assert.throws(() => env.vault.proposePool(ADMIN.address, "AaveV3", ethers.ZeroAddress), {
    code: "InvalidInput",
  });

  env.vault.proposePool(ADMIN.address, "AaveV3", poolAddress);
  env.vault.cancelPoolProposal(ADMIN.address, "AaveV3", poolAddress);
  assert.deepEqual(env.vault.getPoolProposal("AaveV3", poolAddress), { status: "unset" });
});

test("the fee recipient changes through propose and execute", () => {
  const env = createEnvironment({ delay: 60n });
  const recipient = STRANGER.address;
  assert.equal(env.vault.getFeeRecipient(), ADMIN.address);

  env.vault.proposeFeeRecipient(ADMIN.address, recipient);
  assert.throws(() => env.vault.setFeeRecipient(ADMIN.address, recipient), { code: "GovernanceDelayNotElapsed" });

  env.clock.advance(60);
  env.vault.setFeeRecipient(ADMIN.address, recipient);
  assert.equal(env.vault.getFeeRecipient(), recipient);

  env.vault.proposeFeeRecipient(ADMIN.address, ADMIN.address);
  env.vault.cancelFeeRecipientProposal(ADMIN.address);
  assert.throws(() => env.vault.cancelFeeRecipientProposal(ADMIN.address), { code: "NotProposed" });
});

test("setFeeRange rejects an inverted range", () => {
  const env = createEnvironment();

  env.vault.setFeeRange(ADMIN.address, 10n, 100n);
  assert.deepEqual(env.vault.getFeeRange(), { minBasis: 10n, maxBasis: 100n });
  assert.throws(() => env.vault.setFeeRange(ADMIN.address, 101n, 100n), { code: "InvalidFeeRange" });
  assert.deepEqual(env.vault.getFeeRange(), { minBasis: 10n, maxBasis: 100n });
});

test("fee timestamps are tracked per wallet and registered pool", () => {
  const env = createEnvironment();
  const { pool } = registerPool(env, "AaveV3", USDC);
  const wallet = STRANGER.address;

  assert.equal(env.vault.initializeFeeTimestamp(wallet, pool.address), START_TIME);
  env.clock.advance(30);
  assert.equal(env.vault.initializeFeeTimestamp(wallet, pool.address), START_TIME);
  assert.equal(env.vault.updateFeeTimestamp(wallet, pool.address), START_TIME + 30n);
  assert.equal(env.vault.getLastFeeTimestamp(wallet, pool.address), START_TIME + 30n);
  assert.throws(() => env.vault.initializeFeeTimestamp(wallet, ethers.getAddress("0x" + "d2".repeat(20))), {
    code: "NotFound",
  });
});
