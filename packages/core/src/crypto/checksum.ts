import { createHash } from "crypto";
import type { JsonValue, RecordStoreSnapshot } from "../record_store/record_store.types";

/**
 * Recursively sorts the keys of an object, including nested objects.
 * This is the core of canonical serialization.
 */
function sortKeys(value: JsonValue): JsonValue {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  const sorted: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    const inner = value[key];
    if (inner !== undefined) {
      sorted[key] = sortKeys(inner);
    }
  }
  return sorted;
}

/**
 * Deterministic JSON string for a value: keys sorted at every depth.
 */
export function canonicalize(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

export function sha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * CanonicalFingerprint of a RecordStore snapshot.
 *
 * Collections are ordered by name and records by id before hashing, so the
 * result does not depend on YAML formatting, key order or list order.
 */
export function computeCanonicalFingerprint(snapshot: RecordStoreSnapshot): string {
  const collections = [...snapshot.collections]
    .sort((a, b) => compareStrings(a.spec.name, b.spec.name))
    .map((collection) => ({
      name: collection.spec.name,
      extras: collection.extras,
      records: [...collection.records]
        .sort((a, b) => compareStrings(a.id, b.id))
        .map((r) => ({ id: r.id, kind: r.kind, payload: r.payload, updatedAt: r.updatedAt })),
    }));
  return sha256(canonicalize(collections));
}

/**
 * Code-unit ordering, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
