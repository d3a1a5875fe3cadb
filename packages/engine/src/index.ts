export { EngineError, isEngineError, describeError, type EngineErrorCode } from "./errors.js";
export {
  applyEnvOverrides,
  DEFAULT_CONFIG_PATH,
  engineConfigSchema,
  loadEngineConfig,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config.js";

export { ManualClock, SystemClock, type Clock } from "./chain/clock.js";
export { SimulatedChain, type ChainContract, type SimulatedChainOptions } from "./chain/chain.js";
export { TokenLedger } from "./chain/tokens.js";
export {
  EventLog,
  LogId,
  type ActionEvent,
  type ChainEvent,
  type GovernanceEvent,
  type LogIdValue,
} from "./chain/events.js";
export type { Journaled } from "./chain/journal.js";

export {
  AdminVault,
  actionIdOf,
  poolIdOf,
  type AdminVaultOptions,
  type ExecuteOptions,
  type FeeRange,
} from "./governance/adminVault.js";
export { ProposalBook, type ProposalState } from "./governance/proposals.js";
export { ROLE_NAMES, roleAdmin, roleId, isRoleName, type RoleName } from "./governance/roles.js";
export { TokenRegistry } from "./governance/tokenRegistry.js";

export {
  SmartWallet,
  isLiveHandle,
  type TransactionGuard,
  type TransactionRequest,
  type WalletHandle,
  type WalletSetup,
} from "./wallet/smartWallet.js";
export { ExecutorGuard } from "./wallet/guard.js";
export { WalletSetupRegistry, hashWalletConfig, type WalletConfig } from "./wallet/setupRegistry.js";
export { FeeTakeModule, type FeeTakeReceipt } from "./wallet/feeTakeModule.js";
export { WalletProvisioner, walletSalt, type WalletProvisionerOptions } from "./wallet/provisioner.js";

export {
  isAction,
  isFeeTaking,
  isRefundCapable,
  type Action,
  type ActionContext,
  type BundleAwareAction,
  type FeeTaking,
  type RefundPayment,
  type RefundRequest,
  type SimpleAction,
} from "./actions/types.js";
export { decodeActionCall, encodeActionCall, type ActionCall } from "./actions/abi.js";
export { VaultPool } from "./actions/vaultPool.js";
export { SendTokenAction, encodeSendTokenParams, type SendTokenParams } from "./actions/sendToken.js";
export { PoolSupplyAction, accruedFee, encodePoolParams, type PoolAmountParams } from "./actions/poolSupply.js";
export { PoolWithdrawAction } from "./actions/poolWithdraw.js";
export {
  FixedRatePricer,
  GasRefundAction,
  decodeGasRefundParams,
  encodeGasRefundParams,
  type GasRefundParams,
  type RefundPricer,
} from "./actions/gasRefund.js";
export { BridgeOutbox, type BridgeMessage, type BridgeMessageStatus } from "./actions/bridgeOutbox.js";
export { BridgeSendAction, encodeBridgeSendParams, type BridgeSendParams } from "./actions/bridgeSend.js";

export {
  SequenceExecutor,
  type ExecutedAction,
  type FeeTake,
  type SequenceResult,
  type TakenFee,
} from "./sequence/executor.js";

export {
  ActionType,
  FEE_ACTION,
  RefundRecipient,
  type ActionDefinition,
  type Bundle,
  type BundleContext,
  type ChainSequence,
  type Sequence,
} from "./bundle/types.js";
export {
  BUNDLE_TYPES,
  SIGNING_CHAIN_ID,
  bundleDigest,
  bundleDomain,
  domainSeparator,
  hashBundle,
  recoverBundleSigner,
  signBundle,
  type SigningDomainConfig,
} from "./bundle/typedData.js";
export { bundleSchema, parseBundle, serializeBundle } from "./bundle/schema.js";
export { buildChainSequence, buildSequence, type ActionStep } from "./bundle/builder.js";
export {
  TypedDataBundleVerifier,
  type BundleExecutionReceipt,
  type BundlePhase,
  type RefundOutcome,
} from "./bundle/verifier.js";

export { deployEngine, type DeploymentConfig, type EngineDeployment } from "./deployment.js";
export { BundleRelayer, type BridgeDelivery, type SubmissionResult } from "./relayer/relayer.js";
