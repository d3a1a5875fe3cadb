import { ethers } from "ethers";
import { EngineError } from "../errors.js";

export function normalizeAddress(value: string, field = "address"): string {
  if (!ethers.isAddress(value)) {
    throw new EngineError("InvalidInput", `${field} is not a valid address`, {
      field,
      value,
    });
  }
  return ethers.getAddress(value);
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(value: string): boolean {
  return sameAddress(value, ethers.ZeroAddress);
}

/** Four-byte identifier, as used for action and pool ids. */
export function isBytes4(value: string): boolean {
  return ethers.isHexString(value, 4);
}

export function shortId(address: string): string {
  return ethers.dataSlice(ethers.keccak256(normalizeAddress(address)), 0, 4);
}
