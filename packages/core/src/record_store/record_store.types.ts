/**
 * Value that survives a JSON round trip unchanged.
 * Record payloads are restricted to this so that canonical hashing and the
 * derived cache see exactly what the YAML file holds.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RecordKind = 'task' | 'role' | 'approval' | 'decision' | 'metadata';

/**
 * One canonical entity. `payload` holds every field of the YAML item except
 * `id` and `updated_at`.
 */
export type CanonicalRecord = {
  id: string;
  kind: RecordKind;
  payload: JsonObject;
  updatedAt: string | null;
};

/**
 * Input for orchestrator-mediated writes. `updatedAt` defaults to now.
 */
export type RecordInput = {
  id: string;
  payload: JsonObject;
  updatedAt?: string;
};

/**
 * Where a record kind lives on disk.
 */
export type CollectionSpec = {
  /** Collection name, also the cache row prefix */
  name: string;
  kind: RecordKind;
  /** File name inside the state directory */
  file: string;
  /** Top-level key holding the list of items */
  listKey: string;
};

export const RECORD_COLLECTIONS: readonly CollectionSpec[] = [
  { name: 'approvals', kind: 'approval', file: 'approvals.yaml', listKey: 'approval_log' },
  { name: 'decisions', kind: 'decision', file: 'decisions.yaml', listKey: 'decisions' },
  { name: 'metadata', kind: 'metadata', file: 'metadata.yaml', listKey: 'entries' },
  { name: 'roles', kind: 'role', file: 'team.yaml', listKey: 'roles' },
  { name: 'tasks', kind: 'task', file: 'board.yaml', listKey: 'tasks' },
];

export type RecordCollection = {
  spec: CollectionSpec;
  records: CanonicalRecord[];
  /** Other top-level keys of the file (e.g. board `columns`) */
  extras: JsonObject;
};

/**
 * The whole RecordStore at one point in time, collections in
 * RECORD_COLLECTIONS order.
 */
export type RecordStoreSnapshot = {
  collections: RecordCollection[];
};

/**
 * Raw file content handed to the validator. `content` is null for a file
 * that does not exist yet.
 */
export type RecordFile = {
  file: string;
  content: string | null;
};

export function collectionForKind(kind: RecordKind): CollectionSpec {
  const spec = RECORD_COLLECTIONS.find((c) => c.kind === kind);
  if (!spec) {
    throw new Error(`No collection is registered for record kind '${kind}'`);
  }
  return spec;
}
