export { SchemaValidationCache, Schemas, validateAgainst } from './schema_cache';
export type { SchemaName, FieldError } from './schema_cache';
export { SchemaRecordValidator } from './record_validator';
export type { RecordValidator, ValidationReport, RecordFileError } from './record_validator';
export { ValidationFailedError } from './validation.errors';
