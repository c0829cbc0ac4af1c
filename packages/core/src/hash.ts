/**
 * Config hashing and run ids for provenance tracking.
 * Uses a basic FNV-1a hash over canonical JSON; no crypto needed.
 */
import { randomBytes } from "node:crypto";

/** JSON with object keys sorted at every depth, so equal configs hash equally. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v && typeof v === "object" && !Array.isArray(v)) {
      const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return Object.fromEntries(entries);
    }
    return v;
  });
}

export function hashConfig(config: unknown): string {
  const json = canonicalJson(config);
  let hash = 0x811c9dc5;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}

/**
 * Time-derived run id: `[tag_]YYYYMMDDhhmmssSSS_<8 hex>`.
 * The random suffix keeps same-millisecond runs distinct.
 */
export function runId(tag?: string, now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[-:T.Z]/g, "").slice(0, 17);
  const rand = randomBytes(4).toString("hex");
  if (tag) return `${tag}_${ts}_${rand}`;
  return `${ts}_${rand}`;
}
