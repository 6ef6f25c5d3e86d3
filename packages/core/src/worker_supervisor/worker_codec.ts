import { SchemaValidationCache } from '../validation/schema_cache';
import { HeartbeatFormatError } from './worker_supervisor.errors';
import type { Heartbeat, WorkerRecord } from './worker_supervisor.types';
import { errorMessage } from '../utils/atomic_write';

type RegistryDocument = {
  workers: WorkerRecord[];
};

function firstProblem(errors: { instancePath: string; message?: string }[] | null | undefined): string {
  const first = errors?.[0];
  return `${first?.instancePath || '/'} ${first?.message ?? 'is invalid'}`;
}

/**
 * @throws HeartbeatFormatError when the text is not a heartbeat of this worker
 */
export function parseHeartbeat(workerId: string, content: string): Heartbeat {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new HeartbeatFormatError(workerId, errorMessage(error));
  }

  const validate = SchemaValidationCache.getValidator<Heartbeat>('heartbeat');
  if (!validate(parsed)) {
    throw new HeartbeatFormatError(workerId, firstProblem(validate.errors));
  }
  if (parsed.workerId !== workerId) {
    throw new HeartbeatFormatError(workerId, `reported by ${parsed.workerId}`);
  }
  return parsed;
}

export function serializeHeartbeat(heartbeat: Heartbeat): string {
  return JSON.stringify(heartbeat, null, 2) + '\n';
}

/**
 * @throws Error describing the first problem when the registry is malformed
 */
export function parseRegistry(content: string): WorkerRecord[] {
  const parsed: unknown = JSON.parse(content);
  const validate = SchemaValidationCache.getValidator<RegistryDocument>('workerRegistry');
  if (!validate(parsed)) {
    throw new Error(`Invalid worker registry: ${firstProblem(validate.errors)}`);
  }
  return parsed.workers;
}

export function serializeRegistry(records: WorkerRecord[]): string {
  const document: RegistryDocument = { workers: records };
  return JSON.stringify(document, null, 2) + '\n';
}
