import type { ChainContract, SimulatedChain } from "../chain/chain.js";
import { EngineError } from "../errors.js";
import { normalizeAddress, sameAddress } from "../utils/address.js";
import type { TransactionGuard, TransactionRequest } from "./smartWallet.js";

/** Only lets a wallet delegate into the sequence executor. */
export class ExecutorGuard implements TransactionGuard, ChainContract {
  readonly contractName = "ExecutorGuard";
  readonly executor: string;

  constructor(
    readonly chain: SimulatedChain,
    readonly address: string,
    executor: string
  ) {
    this.executor = normalizeAddress(executor, "executor");
  }

  checkTransaction(request: TransactionRequest): void {
    if (request.operation === "delegatecall" && sameAddress(request.target, this.executor)) {
      return;
    }
    throw new EngineError("TransactionNotAllowed", "wallet may only delegate into the sequence executor", {
      wallet: request.wallet,
      target: request.target,
      operation: request.operation,
    });
  }
}
