import { promises as fs } from "node:fs";
import path from "node:path";
import { ethers } from "ethers";
import { z } from "zod";
import { EngineError } from "./errors.js";
import type { SigningDomainConfig } from "./bundle/typedData.js";

const integerString = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]);

const addressSchema = z.string().regex(/^0x[a-fA-F0-9]{40}$/);

export const engineConfigSchema = z.object({
  chainId: integerString,
  signingDomain: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    saltLabel: z.string().min(1),
  }),
  governance: z
    .object({
      delaySeconds: z.number().int().min(0),
      maxDelaySeconds: z.number().int().min(1),
      proposalTtlSeconds: z.number().int().min(0).default(0),
    })
    .refine((value) => value.delaySeconds <= value.maxDelaySeconds, {
      message: "delaySeconds must not exceed maxDelaySeconds",
    }),
  walletFactory: z.object({
    address: addressSchema,
    initCode: z.string().regex(/^0x([a-fA-F0-9]{2})+$/),
    saltNonce: integerString.default(0),
  }),
  refund: z.object({
    baseGas: integerString,
    gasPerAction: integerString,
    gasPriceWei: integerString,
  }),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export interface EngineConfig {
  chainId: bigint;
  signingDomain: SigningDomainConfig;
  governance: {
    delay: bigint;
    maxDelay: bigint;
    proposalTtl: bigint;
  };
  walletFactory: {
    address: string;
    initCode: string;
    saltNonce: bigint;
  };
  refund: {
    baseGas: bigint;
    gasPerAction: bigint;
    gasPriceWei: bigint;
  };
}

export const DEFAULT_CONFIG_PATH = path.join("config", "engine.json");

export function parseEngineConfig(raw: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError("InvalidInput", "engine configuration is invalid", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  const config = parsed.data;
  const chainId = BigInt(config.chainId);
  if (chainId === 0n) {
    throw new EngineError("InvalidInput", "chainId must be positive");
  }
  return {
    chainId,
    signingDomain: { ...config.signingDomain },
    governance: {
      delay: BigInt(config.governance.delaySeconds),
      maxDelay: BigInt(config.governance.maxDelaySeconds),
      proposalTtl: BigInt(config.governance.proposalTtlSeconds),
    },
    walletFactory: {
      address: ethers.getAddress(config.walletFactory.address.toLowerCase()),
      initCode: config.walletFactory.initCode,
      saltNonce: BigInt(config.walletFactory.saltNonce),
    },
    refund: {
      baseGas: BigInt(config.refund.baseGas),
      gasPerAction: BigInt(config.refund.gasPerAction),
      gasPriceWei: BigInt(config.refund.gasPriceWei),
    },
  };
}

function readIntegerOverride(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new EngineError("InvalidInput", `${key} must be a non-negative integer`, { key, value });
  }
  return Number(value.trim());
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/** Layers ENGINE_* environment variables over a raw config document. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const merged: RawConfig = { ...raw };

  const chainId = env.ENGINE_CHAIN_ID?.trim();
  if (chainId) {
    merged.chainId = chainId;
  }

  const delay = readIntegerOverride(env, "ENGINE_GOVERNANCE_DELAY");
  const ttl = readIntegerOverride(env, "ENGINE_PROPOSAL_TTL");
  if (delay !== undefined || ttl !== undefined) {
    const governance = section(raw, "governance");
    if (delay !== undefined) governance.delaySeconds = delay;
    if (ttl !== undefined) governance.proposalTtlSeconds = ttl;
    merged.governance = governance;
  }

  const domainName = env.ENGINE_SIGNING_DOMAIN_NAME?.trim();
  if (domainName) {
    merged.signingDomain = { ...section(raw, "signingDomain"), name: domainName };
  }
  return merged;
}

export async function loadEngineConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  const resolved = path.resolve(configPath);
  const contents = await fs.readFile(resolved, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new EngineError("InvalidInput", `failed to parse configuration JSON (${resolved})`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseEngineConfig(applyEnvOverrides(raw, env));
}
