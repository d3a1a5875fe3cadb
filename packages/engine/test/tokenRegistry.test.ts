import { strict as assert } from "node:assert";
import test from "node:test";

import { ethers } from "ethers";

import { ADMIN, STRANGER, USDC, WETH, createEnvironment } from "./helpers.js";

test("tokens are approved after the governance delay", () => {
  const env = createEnvironment({ delay: 120n });

  env.tokenRegistry.proposeToken(ADMIN.address, USDC);
  assert.throws(() => env.tokenRegistry.approveToken(ADMIN.address, USDC), { code: "GovernanceDelayNotElapsed" });

  env.clock.advance(120);
  env.tokenRegistry.approveToken(ADMIN.address, USDC);

  assert.equal(env.tokenRegistry.isApprovedToken(USDC), true);
  assert.equal(env.tokenRegistry.isApprovedToken(USDC.toLowerCase()), true);
  assert.deepEqual(env.tokenRegistry.approvedTokens(), [USDC]);
  assert.throws(() => env.tokenRegistry.proposeToken(ADMIN.address, USDC), { code: "AlreadyApproved" });
});

test("approving an unproposed token fails with NotProposed", () => {
  const env = createEnvironment();

  assert.throws(() => env.tokenRegistry.approveToken(ADMIN.address, WETH), { code: "NotProposed" });
  assert.throws(() => env.tokenRegistry.proposeToken(ADMIN.address, ethers.ZeroAddress), { code: "InvalidInput" });
});

test("token proposals can be cancelled and approvals revoked", () => {
  const env = createEnvironment();

  env.tokenRegistry.proposeToken(ADMIN.address, WETH);
  env.tokenRegistry.cancelTokenProposal(ADMIN.address, WETH);
  assert.deepEqual(env.tokenRegistry.getTokenProposal(WETH), { status: "unset" });

  env.tokenRegistry.proposeToken(ADMIN.address, WETH);
  env.tokenRegistry.approveToken(ADMIN.address, WETH);
  env.tokenRegistry.revokeToken(ADMIN.address, WETH);

  assert.equal(env.tokenRegistry.isApprovedToken(WETH), false);
  assert.throws(() => env.tokenRegistry.revokeToken(ADMIN.address, WETH), { code: "NotFound" });
  assert.deepEqual(
    env.chain.events.governance("token").map((event) => event.operation),
    ["proposed", "cancelled", "proposed", "executed", "removed"]
  );
});

test("token registry operations require the transaction roles", () => {
  const env = createEnvironment();

  assert.throws(() => env.tokenRegistry.proposeToken(STRANGER.address, USDC), { code: "RoleUnauthorized" });
  assert.throws(() => env.tokenRegistry.approveToken(STRANGER.address, USDC), { code: "RoleUnauthorized" });
  assert.throws(() => env.tokenRegistry.cancelTokenProposal(STRANGER.address, USDC), { code: "RoleUnauthorized" });
  assert.throws(() => env.tokenRegistry.revokeToken(STRANGER.address, USDC), { code: "RoleUnauthorized" });
});
