export type CanonicalizeErrorCode =
  | "E_DUPLICATE_KEY_LABEL"
  | "E_NON_INTEGER_NUMBER"
  | "E_UNSUPPORTED_VALUE";

export class CanonicalizeError extends Error {
  readonly code: CanonicalizeErrorCode;
  readonly detail: string;

  constructor(code: CanonicalizeErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = "CanonicalizeError";
    this.code = code;
    this.detail = detail;
  }
}

const encoder = new TextEncoder();

/**
 * Byte-stable canonical form for identity material.
 *
 * Object keys are sorted by code unit and properties holding `undefined` are
 * dropped. Sets and maps are ordered by the canonical label of their members.
 * Only safe integers are accepted as numbers; no digest depends on float
 * formatting.
 */
export function canonicalize(value: unknown): unknown {
  return canonicalizeInner(value, "");
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function canonicalBytes(value: unknown): Uint8Array {
  return encoder.encode(canonicalJson(value));
}

export function canonicalLabel(value: unknown): string {
  return canonicalJson(value);
}

export function compareLabels(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

function canonicalizeInner(value: unknown, at: string): unknown {
  if (value === null) {
    return null;
  }

  if (value === undefined) {
    throw new CanonicalizeError("E_UNSUPPORTED_VALUE", `undefined at ${pointerOrRoot(at)}`);
  }

  if (typeof value === "number") {
    return canonicalizeNumber(value, at);
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "bigint" || typeof value === "symbol" || typeof value === "function") {
    throw new CanonicalizeError("E_UNSUPPORTED_VALUE", `${typeof value} at ${pointerOrRoot(at)}`);
  }

  if (Array.isArray(value)) {
    return value.map((entry, index) => canonicalizeInner(entry, `${at}/${index}`));
  }

  if (value instanceof Set) {
    return canonicalizeSet(value, at);
  }

  if (value instanceof Map) {
    return canonicalizeMap(value, at);
  }

  if (value instanceof Date) {
    throw new CanonicalizeError("E_UNSUPPORTED_VALUE", `Date at ${pointerOrRoot(at)}`);
  }

  if (ArrayBuffer.isView(value)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }

  if (value instanceof ArrayBuffer) {
    return Array.from(new Uint8Array(value));
  }

  if (isPlainObject(value)) {
    return canonicalizeObject(value, at);
  }

  throw new CanonicalizeError("E_UNSUPPORTED_VALUE", `object at ${pointerOrRoot(at)}`);
}

function canonicalizeNumber(value: number, at: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new CanonicalizeError("E_NON_INTEGER_NUMBER", `${String(value)} at ${pointerOrRoot(at)}`);
  }
  return Object.is(value, -0) ? 0 : value;
}

function canonicalizeSet(set: Set<unknown>, at: string): unknown[] {
  const entries = Array.from(set.values()).map((entry, index) => {
    const canonicalValue = canonicalizeInner(entry, `${at}/${index}`);
    return { label: JSON.stringify(canonicalValue), value: canonicalValue };
  });
  entries.sort((a, b) => compareLabels(a.label, b.label));
  return entries.map((entry) => entry.value);
}

function canonicalizeMap(map: Map<unknown, unknown>, at: string): Array<{ key: unknown; value: unknown }> {
  const seen = new Set<string>();
  const entries = Array.from(map.entries()).map(([key, value], index) => {
    const canonicalKey = canonicalizeInner(key, `${at}/${index}/key`);
    const label = JSON.stringify(canonicalKey);
    if (seen.has(label)) {
      throw new CanonicalizeError("E_DUPLICATE_KEY_LABEL", label);
    }
    seen.add(label);
    return { label, key: canonicalKey, value: canonicalizeInner(value, `${at}/${index}/value`) };
  });
  entries.sort((a, b) => compareLabels(a.label, b.label));
  return entries.map(({ key, value }) => ({ key, value }));
}

function canonicalizeObject(value: Record<string, unknown>, at: string): Record<string, unknown> {
  const keys = Object.keys(value).sort(compareLabels);
  // Keys are defined, not assigned, so `__proto__` stays an own property.
  const result: Record<string, unknown> = {};
  for (const key of keys) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    Object.defineProperty(result, key, {
      value: canonicalizeInner(entry, `${at}/${key}`),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

function pointerOrRoot(at: string): string {
  return at === "" ? "/" : at;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
