import { blake3 } from "@noble/hashes/blake3.js";
import { bytesToHex } from "@noble/hashes/utils.js";

import { canonicalBytes } from "./canonical.js";

export type DigestPrefix = "run1" | "cov1" | "ov1" | "w1" | "gw1" | "pol1" | "data1" | "nf1" | "strat1" | "cert1";

export function blake3hex(data: Uint8Array | string): string {
  const input = typeof data === "string" ? new TextEncoder().encode(data) : data;
  return bytesToHex(blake3(input));
}

/** Hex blake3 of the canonical bytes of `value`. */
export function digest(value: unknown): string {
  return blake3hex(canonicalBytes(value));
}

export function digestRef(prefix: DigestPrefix, value: unknown): string {
  return `${prefix}_${digest(value)}`;
}

export function hasDigestPrefix(ref: string, prefix: DigestPrefix): boolean {
  return ref.startsWith(`${prefix}_`) && /^[0-9a-f]{64}$/.test(ref.slice(prefix.length + 1));
}
