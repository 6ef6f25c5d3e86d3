import { SchemaRecordValidator } from './record_validator';
import { SchemaValidationCache } from './schema_cache';

describe('SchemaRecordValidator', () => {
  const validator = new SchemaRecordValidator();

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('should pass valid and missing files', async () => {
    const report = await validator.validate([
      { file: 'board.yaml', content: 'columns: [backlog]\ntasks:\n  - id: T-1\n    title: Docs\n    status: backlog\n' },
      { file: 'team.yaml', content: null },
      { file: 'approvals.yaml', content: '' },
    ]);

    expect(report).toEqual({ valid: true, errors: [] });
  });

  it('should report field-level errors with the file name', async () => {
    const report = await validator.validate([
      { file: 'board.yaml', content: 'tasks:\n  - id: T-1\n    status: backlog\n' },
      { file: 'approvals.yaml', content: 'approval_log:\n  - id: A-1\n    status: maybe\n' },
    ]);

    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      { file: 'board.yaml', field: '/tasks/0', message: "must have required property 'title'" },
      { file: 'approvals.yaml', field: '/approval_log/0/status', message: 'must be equal to one of the allowed values' },
    ]);
  });

  it('should report YAML syntax errors instead of throwing', async () => {
    const report = await validator.validate([{ file: 'decisions.yaml', content: 'decisions: [oops' }]);

    expect(report.valid).toBe(false);
    expect(report.errors[0]?.file).toBe('decisions.yaml');
    expect(report.errors[0]?.field).toBe('/');
  });

  it('should cache compiled validators per schema', () => {
    const first = SchemaValidationCache.getValidator('board.yaml');
    const second = SchemaValidationCache.getValidator('board.yaml');

    expect(second).toBe(first);
    expect(SchemaValidationCache.getCacheStats()).toEqual({ cachedSchemas: 1, schemasLoaded: ['board.yaml'] });
  });
});
