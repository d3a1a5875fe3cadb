import { ethers } from "ethers";
import { createLogger } from "../../../shared/logger.js";
import { BridgeOutbox } from "./actions/bridgeOutbox.js";
import { FixedRatePricer } from "./actions/gasRefund.js";
import { TypedDataBundleVerifier } from "./bundle/verifier.js";
import type { SimulatedChain } from "./chain/chain.js";
import type { EngineConfig } from "./config.js";
import { AdminVault } from "./governance/adminVault.js";
import { TokenRegistry } from "./governance/tokenRegistry.js";
import { SequenceExecutor } from "./sequence/executor.js";
import { normalizeAddress } from "./utils/address.js";
import { FeeTakeModule } from "./wallet/feeTakeModule.js";
import { ExecutorGuard } from "./wallet/guard.js";
import { WalletProvisioner } from "./wallet/provisioner.js";
import { WalletSetupRegistry } from "./wallet/setupRegistry.js";

const logger = createLogger("deployment");

export type DeploymentConfig = Pick<EngineConfig, "signingDomain" | "governance" | "walletFactory" | "refund">;

export interface EngineDeployment {
  chain: SimulatedChain;
  admin: string;
  vault: AdminVault;
  tokenRegistry: TokenRegistry;
  setupRegistry: WalletSetupRegistry;
  executor: SequenceExecutor;
  guard: ExecutorGuard;
  outbox: BridgeOutbox;
  provisioner: WalletProvisioner;
  verifier: TypedDataBundleVerifier;
  feeTaker: FeeTakeModule;
  pricer: FixedRatePricer;
}

/**
 * Deploys the core contracts from `admin` and points the wallet baseline
 * config at the verifier module and executor guard. The fee take module
 * is deployed but left out of the baseline; wallets enable it themselves.
 * Running it with the same admin on several chains yields the same
 * addresses on each.
 */
export function deployEngine(chain: SimulatedChain, config: DeploymentConfig, adminAddress: string): EngineDeployment {
  const admin = normalizeAddress(adminAddress, "admin");
  return chain.transaction(() => {
    const vault = chain.deploy(
      admin,
      (address) =>
        new AdminVault(chain, address, {
          admin,
          delay: config.governance.delay,
          maxDelay: config.governance.maxDelay,
          proposalTtl: config.governance.proposalTtl,
        })
    );
    const tokenRegistry = chain.deploy(admin, (address) => new TokenRegistry(chain, address, vault));
    const setupRegistry = chain.deploy(admin, (address) => new WalletSetupRegistry(chain, address, vault));
    const executor = chain.deploy(admin, (address) => new SequenceExecutor(chain, address, vault));
    const guard = chain.deploy(admin, (address) => new ExecutorGuard(chain, address, executor.address));
    const outbox = chain.deploy(admin, (address) => new BridgeOutbox(chain, address));
    const provisioner = chain.deployAt(
      config.walletFactory.address,
      (address) =>
        new WalletProvisioner(chain, address, setupRegistry, {
          initCode: config.walletFactory.initCode,
          saltNonce: config.walletFactory.saltNonce,
        })
    );
    const verifier = chain.deploy(
      admin,
      (address) =>
        new TypedDataBundleVerifier(chain, address, {
          registry: vault,
          executor,
          provisioner,
          domain: config.signingDomain,
        })
    );

    const feeTaker = chain.deploy(admin, (address) => new FeeTakeModule(chain, address, vault, executor));

    setupRegistry.updateCurrentConfig(admin, {
      fallbackHandler: ethers.ZeroAddress,
      modules: [verifier.address],
      guard: guard.address,
    });

    logger.info(
      { chainId: chain.chainId.toString(), vault: vault.address, verifier: verifier.address },
      "engine deployed"
    );

    return {
      chain,
      admin,
      vault,
      tokenRegistry,
      setupRegistry,
      executor,
      guard,
      outbox,
      provisioner,
      verifier,
      feeTaker,
      pricer: new FixedRatePricer(config.refund),
    };
  });
}
