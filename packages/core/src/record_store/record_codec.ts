import * as yaml from 'js-yaml';
import type {
  CanonicalRecord,
  CollectionSpec,
  JsonObject,
  JsonValue,
  RecordCollection,
} from './record_store.types';
import { RecordParseError } from './record_store.errors';
import { errorMessage } from '../utils/atomic_write';

/**
 * Converts a loaded YAML value into a JsonValue, rejecting anything JSON
 * cannot represent (non-finite numbers, non-plain objects).
 */
export function toJsonValue(value: unknown, file: string, where: string): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RecordParseError(file, `${where}: non-finite number`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toJsonValue(item, file, `${where}[${i}]`));
  }
  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toJsonValue(inner, file, `${where}.${key}`);
    }
    return out;
  }
  throw new RecordParseError(file, `${where}: unsupported value of type ${typeof value}`);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses one collection file. `null` content means the file does not exist
 * and yields an empty collection.
 */
export function parseCollection(spec: CollectionSpec, content: string | null): RecordCollection {
  if (content === null) {
    return { spec, records: [], extras: {} };
  }

  let loaded: unknown;
  try {
    // CORE_SCHEMA keeps timestamps as plain strings
    loaded = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: spec.file });
  } catch (error) {
    throw new RecordParseError(spec.file, errorMessage(error));
  }

  if (loaded === undefined || loaded === null) {
    return { spec, records: [], extras: {} };
  }
  if (!isPlainObject(loaded)) {
    throw new RecordParseError(spec.file, 'top level must be a mapping');
  }

  const document = toJsonValue(loaded, spec.file, '$');
  if (!isJsonObject(document)) {
    throw new RecordParseError(spec.file, 'top level must be a mapping');
  }

  const { [spec.listKey]: items, ...extras } = document;
  if (items === undefined || items === null) {
    return { spec, records: [], extras };
  }
  if (!Array.isArray(items)) {
    throw new RecordParseError(spec.file, `'${spec.listKey}' must be a list`);
  }

  const seen = new Set<string>();
  const records: CanonicalRecord[] = items.map((item, index) => {
    const where = `${spec.listKey}[${index}]`;
    if (!isJsonObject(item)) {
      throw new RecordParseError(spec.file, `${where} must be a mapping`);
    }
    const { id, updated_at: updatedAt, ...payload } = item;
    if (typeof id !== 'string' || id.length === 0) {
      throw new RecordParseError(spec.file, `${where} is missing a string 'id'`);
    }
    if (seen.has(id)) {
      throw new RecordParseError(spec.file, `duplicate id '${id}'`);
    }
    seen.add(id);
    if (updatedAt !== undefined && updatedAt !== null && typeof updatedAt !== 'string') {
      throw new RecordParseError(spec.file, `${where}.updated_at must be a string`);
    }
    return { id, kind: spec.kind, payload, updatedAt: updatedAt ?? null };
  });

  return { spec, records, extras };
}

/**
 * Renders a collection back to YAML. Extras come first, then the list.
 */
export function serializeCollection(collection: RecordCollection): string {
  const items: JsonObject[] = collection.records.map((record) => {
    const item: JsonObject = { id: record.id, ...record.payload };
    if (record.updatedAt !== null) {
      item['updated_at'] = record.updatedAt;
    }
    return item;
  });

  const document: JsonObject = { ...collection.extras, [collection.spec.listKey]: items };
  return yaml.dump(document, { schema: yaml.CORE_SCHEMA, noRefs: true, lineWidth: -1 });
}
