import { strict as assert } from "node:assert";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";

import { ethers } from "ethers";

import { applyEnvOverrides, loadEngineConfig, parseEngineConfig } from "../src/config.js";

const REPO_CONFIG = fileURLToPath(new URL("../../../config/engine.json", import.meta.url));

function rawConfig(): Record<string, unknown> {
  return {
    chainId: "137",
    signingDomain: { name: "TestVault", version: "2", saltLabel: "test-salt" },
    governance: { delaySeconds: 60, maxDelaySeconds: 600 },
    walletFactory: { address: "0x" + "fa".repeat(20), initCode: "0xabcd" },
    refund: { baseGas: 1, gasPerAction: "2", gasPriceWei: "3" },
  };
}

test("parseEngineConfig normalises integers to bigint and fills defaults", () => {
  const config = parseEngineConfig(rawConfig());

  assert.equal(config.chainId, 137n);
  assert.deepEqual(config.governance, { delay: 60n, maxDelay: 600n, proposalTtl: 0n });
  assert.equal(config.walletFactory.address, ethers.getAddress("0x" + "fa".repeat(20)));
  assert.equal(config.walletFactory.saltNonce, 0n);
  assert.deepEqual(config.refund, { baseGas: 1n, gasPerAction: 2n, gasPriceWei: 3n });
  assert.deepEqual(config.signingDomain, { name: "TestVault", version: "2", saltLabel: "test-salt" });
});

test("parseEngineConfig rejects a delay above the maximum", () => {
  const raw = rawConfig();
  raw.governance = { delaySeconds: 601, maxDelaySeconds: 600 };

  assert.throws(() => parseEngineConfig(raw), { name: "EngineError", code: "InvalidInput" });
});

test("parseEngineConfig rejects a zero chain id", () => {
  const raw = rawConfig();
  raw.chainId = 0;

  assert.throws(() => parseEngineConfig(raw), { code: "InvalidInput", message: "chainId must be positive" });
});

test("environment overrides replace chain id, delay, ttl and domain name", () => {
  const merged = applyEnvOverrides(rawConfig(), {
    ENGINE_CHAIN_ID: "10",
    ENGINE_GOVERNANCE_DELAY: "120",
    ENGINE_PROPOSAL_TTL: "30",
    ENGINE_SIGNING_DOMAIN_NAME: "Override",
  });
  const config = parseEngineConfig(merged);

  assert.equal(config.chainId, 10n);
  assert.deepEqual(config.governance, { delay: 120n, maxDelay: 600n, proposalTtl: 30n });
  assert.equal(config.signingDomain.name, "Override");
  assert.equal(config.signingDomain.saltLabel, "test-salt");
});

test("non-numeric delay overrides are rejected", () => {
  assert.throws(() => applyEnvOverrides(rawConfig(), { ENGINE_GOVERNANCE_DELAY: "soon" }), {
    code: "InvalidInput",
  });
});

test("loadEngineConfig reads the repository config file", async () => {
  const config = await loadEngineConfig(REPO_CONFIG, {});

  assert.equal(config.chainId, 1n);
  assert.equal(config.governance.delay, 86_400n);
  assert.equal(config.governance.maxDelay, 432_000n);
  assert.equal(config.signingDomain.name, "SeqVault");
  assert.equal(config.walletFactory.address, ethers.getAddress("0x4e1dcf7ad4e460cfd30791ccc4f9c8a4f820ec67"));
});

test("loadEngineConfig reports malformed JSON", async (t) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "engine-config-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  const file = path.join(dir, "engine.json");
  await fs.writeFile(file, "{ not json", "utf8");

  await assert.rejects(loadEngineConfig(file, {}), { code: "InvalidInput" });
});
