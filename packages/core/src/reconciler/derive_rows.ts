import { canonicalize, compareStrings, sha256 } from '../crypto/checksum';
import type { CacheRow } from '../record_projection/record_projection.types';
import type {
  CanonicalRecord,
  CollectionSpec,
  RecordStoreSnapshot,
} from '../record_store/record_store.types';

export function deriveRow(spec: CollectionSpec, record: CanonicalRecord): CacheRow {
  const status = record.payload['status'];
  return {
    key: `${spec.name}/${record.id}`,
    collection: spec.name,
    kind: record.kind,
    id: record.id,
    status: typeof status === 'string' ? status : null,
    payload: record.payload,
    updatedAt: record.updatedAt,
    contentHash: sha256(
      canonicalize({ kind: record.kind, id: record.id, payload: record.payload, updatedAt: record.updatedAt }),
    ),
  };
}

/**
 * One row per record, sorted by collection then id.
 */
export function deriveRows(snapshot: RecordStoreSnapshot): CacheRow[] {
  return snapshot.collections
    .flatMap((collection) => collection.records.map((record) => deriveRow(collection.spec, record)))
    .sort((a, b) => compareStrings(a.collection, b.collection) || compareStrings(a.id, b.id));
}
