import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import boardSchema from "./schemas/board.schema.json";
import teamSchema from "./schemas/team.schema.json";
import approvalsSchema from "./schemas/approvals.schema.json";
import decisionsSchema from "./schemas/decisions.schema.json";
import metadataSchema from "./schemas/metadata.schema.json";
import configSchema from "./schemas/config.schema.json";
import packManifestSchema from "./schemas/pack_manifest.schema.json";
import eventSchema from "./schemas/event.schema.json";
import cacheSnapshotSchema from "./schemas/cache_snapshot.schema.json";
import portableCheckpointSchema from "./schemas/portable_checkpoint.schema.json";
import localCheckpointSchema from "./schemas/local_checkpoint.schema.json";
import heartbeatSchema from "./schemas/heartbeat.schema.json";
import workerRegistrySchema from "./schemas/worker_registry.schema.json";

export const Schemas = {
  "board.yaml": boardSchema,
  "team.yaml": teamSchema,
  "approvals.yaml": approvalsSchema,
  "decisions.yaml": decisionsSchema,
  "metadata.yaml": metadataSchema,
  config: configSchema,
  packManifest: packManifestSchema,
  event: eventSchema,
  cacheSnapshot: cacheSnapshotSchema,
  portableCheckpoint: portableCheckpointSchema,
  localCheckpoint: localCheckpointSchema,
  heartbeat: heartbeatSchema,
  workerRegistry: workerRegistrySchema,
} as const;

export type SchemaName = keyof typeof Schemas;

/**
 * Singleton cache of compiled AJV validators, one per schema name.
 *
 * Ajv keeps compiled functions keyed by schema object, so asking twice for
 * the same name returns the same function.
 */
export class SchemaValidationCache {
  private static loaded = new Set<SchemaName>();
  private static ajv: Ajv | null = null;

  static getValidator<T = unknown>(name: SchemaName): ValidateFunction<T> {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
      addFormats(this.ajv);
    }
    this.loaded.add(name);
    return this.ajv.compile<T>(Schemas[name]);
  }

  static hasSchema(name: string): name is SchemaName {
    return Object.prototype.hasOwnProperty.call(Schemas, name);
  }

  /**
   * Clears the cache (useful for testing).
   */
  static clearCache(): void {
    this.loaded.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: SchemaName[] } {
    return {
      cachedSchemas: this.loaded.size,
      schemasLoaded: Array.from(this.loaded),
    };
  }
}

export type FieldError = {
  field: string;
  message: string;
};

/**
 * Runs a cached validator and flattens AJV errors to `{field, message}`.
 */
export function validateAgainst(name: SchemaName, data: unknown): FieldError[] {
  const validate = SchemaValidationCache.getValidator(name);
  if (validate(data)) {
    return [];
  }
  return (validate.errors ?? []).map((error) => ({
    field: error.instancePath || "/",
    message: error.message ?? "Validation failed",
  }));
}
