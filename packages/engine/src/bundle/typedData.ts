import { ethers } from "ethers";
import type { ActionDefinition, Bundle, ChainSequence, Sequence } from "./types.js";

/**
 * Bundles are always signed against chain id 1, whatever chain executes
 * them. The verifying contract is the wallet, so one signature covers the
 * wallet's sequences on every chain listed in the bundle.
 */
export const SIGNING_CHAIN_ID = 1n;

export interface SigningDomainConfig {
  name: string;
  version: string;
  /** Hashed into the domain salt. */
  saltLabel: string;
}

export const BUNDLE_TYPES: Record<string, ethers.TypedDataField[]> = {
  Bundle: [
    { name: "expiry", type: "uint256" },
    { name: "sequences", type: "ChainSequence[]" },
  ],
  ChainSequence: [
    { name: "chainId", type: "uint256" },
    { name: "sequenceNonce", type: "uint256" },
    { name: "deploySafe", type: "bool" },
    { name: "enableGasRefund", type: "bool" },
    { name: "refundToken", type: "address" },
    { name: "maxRefundAmount", type: "uint256" },
    { name: "refundRecipient", type: "uint8" },
    { name: "sequence", type: "Sequence" },
  ],
  Sequence: [
    { name: "name", type: "string" },
    { name: "actions", type: "ActionDefinition[]" },
    { name: "actionIds", type: "bytes4[]" },
    { name: "callData", type: "bytes[]" },
  ],
  ActionDefinition: [
    { name: "protocolName", type: "string" },
    { name: "actionType", type: "uint8" },
  ],
};

export function bundleDomain(config: SigningDomainConfig, wallet: string): ethers.TypedDataDomain {
  return {
    name: config.name,
    version: config.version,
    chainId: SIGNING_CHAIN_ID,
    verifyingContract: ethers.getAddress(wallet),
    salt: ethers.id(config.saltLabel),
  };
}

function actionValue(action: ActionDefinition): Record<string, unknown> {
  return { protocolName: action.protocolName, actionType: action.actionType };
}

function sequenceValue(sequence: Sequence): Record<string, unknown> {
  return {
    name: sequence.name,
    actions: sequence.actions.map(actionValue),
    actionIds: [...sequence.actionIds],
    callData: [...sequence.callData],
  };
}

function chainSequenceValue(entry: ChainSequence): Record<string, unknown> {
  return {
    chainId: entry.chainId,
    sequenceNonce: entry.sequenceNonce,
    deploySafe: entry.deploySafe,
    enableGasRefund: entry.enableGasRefund,
    refundToken: entry.refundToken,
    maxRefundAmount: entry.maxRefundAmount,
    refundRecipient: entry.refundRecipient,
    sequence: sequenceValue(entry.sequence),
  };
}

export function bundleValue(bundle: Bundle): Record<string, unknown> {
  return { expiry: bundle.expiry, sequences: bundle.sequences.map(chainSequenceValue) };
}

/** Struct hash of the bundle, independent of wallet and domain. */
export function hashBundle(bundle: Bundle): string {
  return ethers.TypedDataEncoder.from(BUNDLE_TYPES).hash(bundleValue(bundle));
}

export function domainSeparator(config: SigningDomainConfig, wallet: string): string {
  return ethers.TypedDataEncoder.hashDomain(bundleDomain(config, wallet));
}

/** The digest a wallet owner signs. */
export function bundleDigest(config: SigningDomainConfig, wallet: string, bundle: Bundle): string {
  return ethers.TypedDataEncoder.hash(bundleDomain(config, wallet), BUNDLE_TYPES, bundleValue(bundle));
}

export function recoverBundleSigner(
  config: SigningDomainConfig,
  wallet: string,
  bundle: Bundle,
  signature: string
): string {
  return ethers.verifyTypedData(bundleDomain(config, wallet), BUNDLE_TYPES, bundleValue(bundle), signature);
}

export async function signBundle(
  signer: ethers.Signer,
  config: SigningDomainConfig,
  wallet: string,
  bundle: Bundle
): Promise<string> {
  return signer.signTypedData(bundleDomain(config, wallet), BUNDLE_TYPES, bundleValue(bundle));
}
