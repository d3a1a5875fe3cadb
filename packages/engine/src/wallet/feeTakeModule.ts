import { createLogger } from "../../../../shared/logger.js";
import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { isAction } from "../actions/types.js";
import { ActionType } from "../bundle/types.js";
import { EngineError } from "../errors.js";
import type { AdminVault } from "../governance/adminVault.js";
import { roleId } from "../governance/roles.js";
import type { FeeTake, SequenceExecutor, TakenFee } from "../sequence/executor.js";
import { normalizeAddress } from "../utils/address.js";
import { SmartWallet } from "./smartWallet.js";

const logger = createLogger("fee-take-module");

export interface FeeTakeReceipt {
  wallet: string;
  recipient: string;
  fees: TakenFee[];
}

/**
 * Wallet module through which a FEE_TAKER charges the wallet's deposit
 * positions. Wallets opt in by enabling it. Fees are paid in pool shares
 * to the vault's fee recipient.
 */
export class FeeTakeModule implements ChainContract {
  readonly contractName = "FeeTakeModule";

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    private readonly registry: AdminVault,
    private readonly executor: SequenceExecutor
  ) {}

  takeFees(caller: string, walletAddress: string, actionIds: string[], poolIds: string[], feeBases: bigint[]): FeeTakeReceipt {
    if (!this.registry.hasRole("FEE_TAKER_ROLE", caller)) {
      throw new EngineError("RoleUnauthorized", "caller lacks FEE_TAKER_ROLE", {
        role: "FEE_TAKER_ROLE",
        roleId: roleId("FEE_TAKER_ROLE"),
        account: caller,
      });
    }
    if (actionIds.length !== poolIds.length || poolIds.length !== feeBases.length) {
      throw new EngineError("LengthMismatch", "fee take arrays differ in length", {
        actionIds: actionIds.length,
        poolIds: poolIds.length,
        feeBases: feeBases.length,
      });
    }

    const walletContract = this.chain.codeAt(normalizeAddress(walletAddress, "wallet"));
    if (!(walletContract instanceof SmartWallet)) {
      throw new EngineError("WalletNotDeployed", "no wallet at address", { wallet: walletAddress });
    }

    const takes: FeeTake[] = actionIds.map((actionId, index) => {
      this.requireDepositAction(actionId);
      this.registry.checkFeeBasis(feeBases[index]);
      return { actionId, poolId: poolIds[index], feeBasis: feeBases[index] };
    });

    const fees = walletContract.execTransactionFromModule(this.address, this.executor.address, (handle) =>
      this.executor.executeFeeTakes(handle, takes)
    );
    const recipient = this.registry.getFeeRecipient();
    logger.info(
      {
        chainId: this.chain.chainId.toString(),
        wallet: walletContract.address,
        positions: fees.length,
        shares: fees.reduce((total, fee) => total + fee.shares, 0n).toString(),
      },
      "fees taken"
    );
    return { wallet: walletContract.address, recipient, fees };
  }

  private requireDepositAction(actionId: string): void {
    const address = this.registry.getActionAddress(actionId);
    const action = this.chain.codeAt(address);
    if (!isAction(action)) {
      throw new EngineError("UnresolvedAction", "registered address holds no action", { actionId, address });
    }
    if (action.actionType !== ActionType.DEPOSIT) {
      throw new EngineError("InvalidActionType", "fees are only taken through deposit actions", {
        actionId,
        actionType: action.actionType,
      });
    }
  }
}
