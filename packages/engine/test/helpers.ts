import { ethers } from "ethers";

import { PoolSupplyAction } from "../src/actions/poolSupply.js";
import { SimulatedChain, type ChainContract } from "../src/chain/chain.js";
import { ManualClock } from "../src/chain/clock.js";
import { signBundle } from "../src/bundle/typedData.js";
import type { Bundle } from "../src/bundle/types.js";
import { VaultPool } from "../src/actions/vaultPool.js";
import { deployEngine, type DeploymentConfig, type EngineDeployment } from "../src/deployment.js";
import { actionIdOf, poolIdOf } from "../src/governance/adminVault.js";
import type { RoleName } from "../src/governance/roles.js";

export const START_TIME = 1_700_000_000n;

export const ADMIN = new ethers.Wallet("0x" + "01".repeat(32));
export const OWNER = new ethers.Wallet("0x" + "02".repeat(32));
export const STRANGER = new ethers.Wallet("0x" + "03".repeat(32));
export const RELAYER = ethers.getAddress("0x" + "0e".repeat(20));

export const USDC = ethers.getAddress("0x" + "a1".repeat(20));
export const WETH = ethers.getAddress("0x" + "b2".repeat(20));

export const TEST_CONFIG: DeploymentConfig = {
  signingDomain: { name: "SeqVault", version: "1.0.0", saltLabel: "SeqVaultBundles" },
  governance: { delay: 0n, maxDelay: 432_000n, proposalTtl: 0n },
  walletFactory: {
    address: ethers.getAddress("0x" + "fa".repeat(20)),
    initCode: "0x5365715661756c74",
    saltNonce: 0n,
  },
  refund: { baseGas: 50_000n, gasPerAction: 100_000n, gasPriceWei: 1_000_000_000n },
};

const OPERATOR_ROLES: RoleName[] = [
  "ACTION_PROPOSER_ROLE",
  "ACTION_EXECUTOR_ROLE",
  "ACTION_CANCELER_ROLE",
  "ACTION_DISPOSER_ROLE",
  "POOL_PROPOSER_ROLE",
  "POOL_EXECUTOR_ROLE",
  "POOL_CANCELER_ROLE",
  "POOL_DISPOSER_ROLE",
  "FEE_PROPOSER_ROLE",
  "FEE_EXECUTOR_ROLE",
  "FEE_CANCELER_ROLE",
  "TRANSACTION_PROPOSER_ROLE",
  "TRANSACTION_EXECUTOR_ROLE",
  "TRANSACTION_CANCELER_ROLE",
  "TRANSACTION_DISPOSER_ROLE",
];

export interface TestEnvironment extends EngineDeployment {
  clock: ManualClock;
}

export interface EnvironmentOptions {
  chainId?: bigint;
  delay?: bigint;
  proposalTtl?: bigint;
}

/**
 * Deploys the engine with zero delay, hands every operational role to the
 * admin and only then applies the requested delay.
 */
export function createEnvironment(options: EnvironmentOptions = {}): TestEnvironment {
  const clock = new ManualClock(START_TIME);
  const chain = new SimulatedChain({ chainId: options.chainId ?? 1n, clock });
  const deployment = deployEngine(
    chain,
    {
      ...TEST_CONFIG,
      governance: { ...TEST_CONFIG.governance, proposalTtl: options.proposalTtl ?? 0n },
    },
    ADMIN.address
  );
  for (const role of OPERATOR_ROLES) {
    deployment.vault.proposeRole(ADMIN.address, role, ADMIN.address);
    deployment.vault.grantRole(ADMIN.address, role, ADMIN.address);
  }
  if (options.delay !== undefined && options.delay > 0n) {
    deployment.vault.changeDelay(ADMIN.address, options.delay);
  }
  return { ...deployment, clock };
}

/** Deploys an action contract from the admin and registers it under its address-derived id. */
export function registerAction<T extends ChainContract>(env: TestEnvironment, build: (address: string) => T): { action: T; actionId: string } {
  const action = env.chain.deploy(ADMIN.address, build);
  const actionId = actionIdOf(action.address);
  env.vault.proposeAction(ADMIN.address, actionId, action.address);
  env.clock.advance(env.vault.getDelay());
  env.vault.addAction(ADMIN.address, actionId, action.address);
  return { action, actionId };
}

export function registerPool(env: TestEnvironment, protocolName: string, asset: string): { pool: VaultPool; poolId: string } {
  const pool = env.chain.deploy(ADMIN.address, (address) => new VaultPool(env.chain, address, asset));
  env.vault.proposePool(ADMIN.address, protocolName, pool.address);
  env.clock.advance(env.vault.getDelay());
  env.vault.addPool(ADMIN.address, protocolName, pool.address);
  return { pool, poolId: poolIdOf(pool.address) };
}

export interface LendingFixture {
  pool: VaultPool;
  poolId: string;
  supplyId: string;
}

/** An "AaveV3" supply action and a USDC pool registered for it. */
export function registerLending(env: TestEnvironment): LendingFixture {
  const { actionId } = registerAction(env, (address) => new PoolSupplyAction(env.chain, address, "AaveV3"));
  const { pool, poolId } = registerPool(env, "AaveV3", USDC);
  return { pool, poolId, supplyId: actionId };
}

export function sign(owner: ethers.Wallet, wallet: string, bundle: Bundle): Promise<string> {
  return signBundle(owner, TEST_CONFIG.signingDomain, wallet, bundle);
}
