import { createHash } from "node:crypto";

export interface AuditRecordInput {
  component: string;
  event: string;
  timestamp?: string;
  level?: string;
  wallet?: string;
  chainId?: bigint | number | string;
  details?: Record<string, unknown>;
}

export interface AuditRecord {
  timestamp: string;
  component: string;
  event: string;
  level: string;
  wallet?: string;
  chainId?: string;
  details?: unknown;
  integrity: {
    version: number;
    eventHash: string;
    hashedFields: Record<string, string>;
  };
}

interface HashedPlaceholder {
  hashed: true;
  algorithm: "sha256";
  digest: string;
  type: string;
  length?: number;
}

interface SanitizeResult {
  value: unknown;
  hashes: Record<string, string>;
}

// Signed material and opaque payloads never reach the log verbatim.
const HASH_EXACT = new Set([
  "bundle",
  "calldata",
  "params",
  "payload",
  "signature",
]);

const HASH_SUFFIXES = ["calldata", "signature", "payload"];

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Uint8Array) return "bytes";
  return typeof value;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("hex");
  return JSON.stringify(value, (_key, entry: unknown) =>
    typeof entry === "bigint" ? entry.toString() : entry
  );
}

function hashedRepresentation(value: unknown): HashedPlaceholder {
  const digest = `sha256:${createHash("sha256").update(stringify(value)).digest("hex")}`;
  const placeholder: HashedPlaceholder = {
    hashed: true,
    algorithm: "sha256",
    digest,
    type: describeType(value),
  };
  if (typeof value === "string" || Array.isArray(value)) {
    placeholder.length = value.length;
  }
  return placeholder;
}

function shouldHash(path: string[]): boolean {
  const normalized = path
    .filter((segment) => !/^\d+$/.test(segment))
    .map((segment) => segment.toLowerCase());
  for (const segment of normalized) {
    if (HASH_EXACT.has(segment)) {
      return true;
    }
    if (HASH_SUFFIXES.some((suffix) => segment.endsWith(suffix))) {
      return true;
    }
  }
  return false;
}

function sanitizeValue(value: unknown, path: string[]): SanitizeResult {
  const hashes: Record<string, string> = {};
  if (value === undefined) {
    return { value: undefined, hashes };
  }
  if (shouldHash(path) || value instanceof Uint8Array) {
    const placeholder = hashedRepresentation(value);
    hashes[path.join(".").toLowerCase()] = placeholder.digest;
    return { value: placeholder, hashes };
  }
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return { value, hashes };
  }
  if (typeof value === "number") {
    return { value, hashes };
  }
  if (typeof value === "bigint") {
    return { value: value.toString(), hashes };
  }
  if (Array.isArray(value)) {
    const result: unknown[] = [];
    value.forEach((entry: unknown, index) => {
      const sanitized = sanitizeValue(entry, [...path, String(index)]);
      result.push(sanitized.value);
      Object.assign(hashes, sanitized.hashes);
    });
    return { value: result, hashes };
  }
  if (value instanceof Map) {
    return sanitizeValue(Object.fromEntries(value), path);
  }
  if (typeof value === "object") {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const sanitized = sanitizeValue(entry, [...path, key]);
      if (sanitized.value !== undefined) {
        record[key] = sanitized.value;
      }
      Object.assign(hashes, sanitized.hashes);
    }
    return { value: record, hashes };
  }
  return { value: String(value), hashes };
}

/**
 * Builds a canonical audit record: bigint values become decimal strings,
 * signed payloads are replaced by sha256 placeholders and the whole
 * record is bound by an integrity hash over its sanitized form.
 */
export function buildAuditRecord(input: AuditRecordInput): AuditRecord {
  const timestamp = input.timestamp ?? new Date().toISOString();
  const level = input.level ?? "info";
  const chainId = input.chainId === undefined ? undefined : String(input.chainId);
  const details = sanitizeValue(input.details, ["details"]);
  const canonical = JSON.stringify({
    timestamp,
    component: input.component,
    event: input.event,
    level,
    wallet: input.wallet,
    chainId,
    details: details.value,
  });
  const digest = createHash("sha256").update(canonical).digest("hex");
  return {
    timestamp,
    component: input.component,
    event: input.event,
    level,
    wallet: input.wallet,
    chainId,
    details: details.value,
    integrity: {
      version: 1,
      eventHash: `sha256:${digest}`,
      hashedFields: details.hashes,
    },
  };
}
