import { ethers } from "ethers";
import { z } from "zod";
import { EngineError } from "../errors.js";
import type { Bundle } from "./types.js";

const uintSchema = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/, "expected a decimal integer")])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n, "must be non-negative");

const uint8Schema = z.number().int().min(0).max(255);

const addressSchema = z
  .string()
  .refine((value) => ethers.isAddress(value), "invalid address")
  .transform((value) => ethers.getAddress(value));

const bytes4Schema = z
  .string()
  .refine((value) => ethers.isHexString(value, 4), "expected bytes4 hex")
  .transform((value) => value.toLowerCase());

const bytesSchema = z.string().refine((value) => ethers.isHexString(value), "expected hex bytes");

const actionDefinitionSchema = z.object({
  protocolName: z.string(),
  actionType: uint8Schema,
});

const sequenceSchema = z.object({
  name: z.string(),
  actions: z.array(actionDefinitionSchema),
  actionIds: z.array(bytes4Schema),
  callData: z.array(bytesSchema),
});

const chainSequenceSchema = z.object({
  chainId: uintSchema,
  sequenceNonce: uintSchema,
  deploySafe: z.boolean(),
  enableGasRefund: z.boolean(),
  refundToken: addressSchema,
  maxRefundAmount: uintSchema,
  refundRecipient: uint8Schema,
  sequence: sequenceSchema,
});

export const bundleSchema = z.object({
  expiry: uintSchema,
  sequences: z.array(chainSequenceSchema),
});

/** Parses a bundle received as JSON, where integers may arrive as strings. */
export function parseBundle(raw: unknown): Bundle {
  const parsed = bundleSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError("InvalidInput", "bundle payload is malformed", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/** JSON-safe form of a bundle; the inverse of {@link parseBundle}. */
export function serializeBundle(bundle: Bundle): string {
  return JSON.stringify(bundle, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
}
