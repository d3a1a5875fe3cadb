import { ethers } from "ethers";
import { EngineError, describeError } from "../errors.js";
import { isBytes4, normalizeAddress } from "../utils/address.js";

const abiCoder = ethers.AbiCoder.defaultAbiCoder();

const ACTION_INTERFACE = new ethers.Interface([
  "function executeAction(bytes params, uint16 strategyId)",
]);

export interface ActionCall {
  params: string;
  strategyId: number;
}

/** ABI encoding of `executeAction(bytes,uint16)`, the shape of every `callData` entry. */
export function encodeActionCall(params: string, strategyId = 0): string {
  return ACTION_INTERFACE.encodeFunctionData("executeAction", [params, strategyId]);
}

export function decodeActionCall(callData: string): ActionCall {
  let decoded: ethers.Result;
  try {
    decoded = ACTION_INTERFACE.decodeFunctionData("executeAction", callData);
  } catch (error) {
    throw new EngineError("InvalidCallData", "callData is not an executeAction call", {
      reason: describeError(error),
    });
  }
  const params: unknown = decoded[0];
  const strategyId: unknown = decoded[1];
  if (typeof params !== "string" || typeof strategyId !== "bigint") {
    throw new EngineError("InvalidCallData", "executeAction arguments have unexpected types");
  }
  return { params, strategyId: Number(strategyId) };
}

export function encodeParams(types: readonly string[], values: readonly unknown[]): string {
  return abiCoder.encode(types, values);
}

export function decodeParams(types: readonly string[], params: string, action: string): ethers.Result {
  try {
    return abiCoder.decode(types, params);
  } catch (error) {
    throw new EngineError("InvalidCallData", `${action} params could not be decoded`, {
      action,
      reason: describeError(error),
    });
  }
}

export function readAddress(result: ethers.Result, index: number): string {
  const value: unknown = result[index];
  if (typeof value !== "string") {
    throw new EngineError("InvalidCallData", `param ${index} is not an address`);
  }
  return normalizeAddress(value, `param ${index}`);
}

export function readUint(result: ethers.Result, index: number): bigint {
  const value: unknown = result[index];
  if (typeof value !== "bigint") {
    throw new EngineError("InvalidCallData", `param ${index} is not an integer`);
  }
  return value;
}

export function readBytes4(result: ethers.Result, index: number): string {
  const value: unknown = result[index];
  if (typeof value !== "string" || !isBytes4(value)) {
    throw new EngineError("InvalidCallData", `param ${index} is not bytes4`);
  }
  return value.toLowerCase();
}
