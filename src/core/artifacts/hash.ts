import { createHash } from "node:crypto";

export type Hash = string;

/** Deterministic SHA-256 digest for text. */
export function sha256Text(s: string): Hash {
  return createHash("sha256").update(s, "utf8").digest("hex");
}

/**
 * JSON with object keys sorted at every level, so equal shapes hash equally
 * regardless of property order. BigInts are written as `"<digits>n"`.
 */
export function canonicalJSON(x: unknown): string {
  return JSON.stringify(x, (_key, value: unknown) => {
    if (typeof value === "bigint") {
      return `${value.toString()}n`;
    }
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      const sorted: Record<string, unknown> = {};
      for (const key of Object.keys(value).sort()) {
        sorted[key] = Reflect.get(value, key);
      }
      return sorted;
    }
    return value;
  });
}

/** SHA-256 of the canonical JSON form. */
export function sha256JSON(x: unknown): Hash {
  return sha256Text(canonicalJSON(x));
}

/** First `length` hex digits of a digest, for keys and log lines. */
export function shortHash(h: Hash, length = 12): string {
  return h.slice(0, length);
}
