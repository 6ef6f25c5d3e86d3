import * as yaml from 'js-yaml';
import type { RecordFile } from '../record_store/record_store.types';
import { SchemaValidationCache, validateAgainst } from './schema_cache';
import { errorMessage } from '../utils/atomic_write';

export type RecordFileError = {
  file: string;
  field: string;
  message: string;
};

export type ValidationReport = {
  valid: boolean;
  errors: RecordFileError[];
};

/**
 * Pass/fail gate over the raw RecordStore files.
 * A failing report means "do not reconcile, do not sync".
 */
export interface RecordValidator {
  validate(files: RecordFile[]): Promise<ValidationReport>;
}

/**
 * Validates each collection file against its JSON schema with AJV.
 * Missing files pass; files without a registered schema pass.
 */
export class SchemaRecordValidator implements RecordValidator {
  async validate(files: RecordFile[]): Promise<ValidationReport> {
    const errors: RecordFileError[] = [];

    for (const { file, content } of files) {
      if (content === null || !SchemaValidationCache.hasSchema(file)) {
        continue;
      }

      let document: unknown;
      try {
        document = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: file });
      } catch (error) {
        errors.push({ file, field: '/', message: errorMessage(error) });
        continue;
      }
      if (document === undefined || document === null) {
        continue;
      }

      for (const fieldError of validateAgainst(file, document)) {
        errors.push({ file, ...fieldError });
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
