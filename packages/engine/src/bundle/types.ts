export const ActionType = {
  DEPOSIT: 0,
  WITHDRAW: 1,
  SWAP: 2,
  COVER: 3,
  FEE: 4,
  TRANSFER: 5,
  CUSTOM: 6,
  BRIDGE: 12,
} as const;

export type ActionTypeName = keyof typeof ActionType;
export type ActionTypeValue = (typeof ActionType)[ActionTypeName];

/** Sentinel type every gas-refunding sequence must carry. */
export const FEE_ACTION = ActionType.FEE;

export const RefundRecipient = {
  EXECUTOR: 0,
  FEE_RECIPIENT: 1,
} as const;

export type RefundRecipientValue = (typeof RefundRecipient)[keyof typeof RefundRecipient];

export interface ActionDefinition {
  protocolName: string;
  /** uint8 as signed; not narrowed so foreign values still hash and mismatch. */
  actionType: number;
}

export interface Sequence {
  name: string;
  actions: ActionDefinition[];
  actionIds: string[];
  callData: string[];
}

export interface ChainSequence {
  chainId: bigint;
  sequenceNonce: bigint;
  deploySafe: boolean;
  enableGasRefund: boolean;
  refundToken: string;
  maxRefundAmount: bigint;
  refundRecipient: number;
  sequence: Sequence;
}

export interface Bundle {
  expiry: bigint;
  sequences: ChainSequence[];
}

export interface BundleContext {
  bundle: Bundle;
  signature: string;
}
