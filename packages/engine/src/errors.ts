export type EngineErrorCode =
  // bundle verification
  | "Expired"
  | "SignerNotAuthorized"
  | "NoMatchingSequence"
  | "ActionMismatch"
  | "FeeActionRequired"
  | "FeeActionForbidden"
  | "RefundParamsMismatch"
  | "LengthMismatch"
  | "WalletNotDeployed"
  // sequence execution
  | "UnresolvedAction"
  | "InvalidCallData"
  | "UnauthorizedCaller"
  | "MissingBundleContext"
  | "RefundFailure"
  // governance
  | "RoleUnauthorized"
  | "GovernanceDelayNotElapsed"
  | "NotProposed"
  | "AlreadyProposed"
  | "ProposalMismatch"
  | "ProposalExpired"
  | "AlreadyAdded"
  | "AlreadyApproved"
  | "NotFound"
  | "InvalidFeeRange"
  | "InvalidActionType"
  | "FeeBasisOutOfRange"
  | "InvalidInput"
  // wallet
  | "WalletAlreadyDeployed"
  | "ModuleNotEnabled"
  | "TransactionNotAllowed"
  // substrate
  | "InsufficientBalance"
  | "AddressInUse"
  | "UnknownChain";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = details;
  }
}

export function isEngineError(
  error: unknown,
  code?: EngineErrorCode
): error is EngineError {
  if (!(error instanceof EngineError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  if (error instanceof EngineError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
