/**
 * Pro Forma — Run fingerprint
 *
 * A run's fingerprint is the SHA-256 of its result body (monthly and annual
 * rows, exit, returns, waterfall, partner returns) serialized as JSON with
 * object keys sorted at every depth. Array order is kept: period order is
 * part of the result. Keys holding `undefined` drop out, as in JSON.
 */

import { createHash } from "node:crypto";

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value === null || typeof value !== "object") return value;

  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((key) => [key, canonicalize(Reflect.get(value, key))]),
  );
}

export function deterministicHash(value: unknown): string {
  return createHash("sha256").update(JSON.stringify(canonicalize(value)), "utf8").digest("hex");
}
