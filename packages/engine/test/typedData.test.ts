import { strict as assert } from "node:assert";
import test from "node:test";

import { ethers } from "ethers";

import { buildChainSequence, buildSequence } from "../src/bundle/builder.js";
import { parseBundle, serializeBundle } from "../src/bundle/schema.js";
import {
  BUNDLE_TYPES,
  bundleDigest,
  bundleDomain,
  bundleValue,
  domainSeparator,
  hashBundle,
  recoverBundleSigner,
} from "../src/bundle/typedData.js";
import type { Bundle } from "../src/bundle/types.js";
import { isEngineError } from "../src/errors.js";
import { OWNER, STRANGER, TEST_CONFIG, USDC, createEnvironment, sign } from "./helpers.js";

const WALLET = ethers.getAddress("0x" + "c3".repeat(20));
const domain = TEST_CONFIG.signingDomain;

function sampleBundle(actionType = 0): Bundle {
  const sequence = buildSequence("supply", [
    { actionId: "0xAABBCCDD", protocolName: "AaveV3", actionType, params: "0x1234", strategyId: 3 },
  ]);
  return {
    expiry: 1_800_000_000n,
    sequences: [
      buildChainSequence({ chainId: 1n, sequence }),
      buildChainSequence({ chainId: 137n, sequence, deploySafe: true }),
    ],
  };
}

test("the signing domain is pinned to chain 1 and salted by label", () => {
  const typed = bundleDomain(domain, WALLET.toLowerCase());

  assert.deepEqual(typed, {
    name: "SeqVault",
    version: "1.0.0",
    chainId: 1n,
    verifyingContract: WALLET,
    salt: ethers.id("SeqVaultBundles"),
  });
  assert.equal(domainSeparator(domain, WALLET), ethers.TypedDataEncoder.hashDomain(typed));
});

test("verifiers on different chains compute the same digest", () => {
  const mainnet = createEnvironment({ chainId: 1n });
  const polygon = createEnvironment({ chainId: 137n });
  const bundle = sampleBundle();

  assert.equal(mainnet.verifier.getDigest(WALLET, bundle), polygon.verifier.getDigest(WALLET, bundle));
  assert.equal(mainnet.verifier.getDomainSeparator(WALLET), polygon.verifier.getDomainSeparator(WALLET));
  assert.equal(mainnet.verifier.getBundleHash(bundle), hashBundle(bundle));
});

test("the digest is the typed-data hash of the bundle", () => {
  const bundle = sampleBundle();

  assert.equal(
    bundleDigest(domain, WALLET, bundle),
    ethers.TypedDataEncoder.hash(bundleDomain(domain, WALLET), BUNDLE_TYPES, bundleValue(bundle))
  );
});

test("signatures recover to their signer only for the signed wallet", async () => {
  const bundle = sampleBundle();
  const signature = await sign(OWNER, WALLET, bundle);

  assert.equal(recoverBundleSigner(domain, WALLET, bundle, signature), OWNER.address);
  assert.notEqual(recoverBundleSigner(domain, STRANGER.address, bundle, signature), OWNER.address);
  assert.equal(ethers.recoverAddress(bundleDigest(domain, WALLET, bundle), signature), OWNER.address);
});

test("changing a signed action definition changes the bundle hash", () => {
  assert.notEqual(hashBundle(sampleBundle(0)), hashBundle(sampleBundle(5)));
});

test("the sequence builder lowercases ids and encodes action calls", () => {
  const [entry] = sampleBundle().sequences;

  assert.deepEqual(entry.sequence.actionIds, ["0xaabbccdd"]);
  assert.deepEqual(entry.sequence.actions, [{ protocolName: "AaveV3", actionType: 0 }]);
  assert.equal(entry.refundToken, ethers.ZeroAddress);
  assert.equal(entry.sequenceNonce, 0n);
  assert.equal(entry.deploySafe, false);
});

test("bundles parse from JSON with string integers", () => {
  const bundle = sampleBundle();
  const parsed = parseBundle(JSON.parse(serializeBundle(bundle)));

  assert.deepEqual(parsed, bundle);
  assert.equal(hashBundle(parsed), hashBundle(bundle));
});

test("malformed bundles report their issues", () => {
  const entry = {
    chainId: 1,
    sequenceNonce: 0,
    deploySafe: false,
    enableGasRefund: false,
    refundToken: "0xnot-an-address",
    maxRefundAmount: "0",
    refundRecipient: 0,
    sequence: { name: "x", actions: [], actionIds: [], callData: [] },
  };

  assert.throws(
    () => parseBundle({ expiry: 1, sequences: [entry] }),
    (error: unknown) => {
      if (!isEngineError(error, "InvalidInput")) {
        return false;
      }
      assert.deepEqual(error.details, { issues: ["sequences.0.refundToken: invalid address"] });
      return true;
    }
  );
  assert.throws(() => parseBundle({ expiry: "soon", sequences: [] }), { code: "InvalidInput" });

  const checksummed = parseBundle({ expiry: 1, sequences: [{ ...entry, refundToken: USDC.toLowerCase() }] });
  assert.equal(checksummed.sequences[0].refundToken, USDC);
});
