import * as yaml from 'js-yaml';
import { SchemaValidationCache } from '../validation/schema_cache';
import { InvalidWorkerIdError } from './checkpoint_store.errors';
import type { LocalCheckpoint, PortableCheckpoint, ResumableState } from './checkpoint_store.types';

const WORKER_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Worker ids become directory names, so they must be a single safe segment.
 */
export function assertWorkerId(workerId: string): void {
  if (!WORKER_ID_PATTERN.test(workerId)) {
    throw new InvalidWorkerIdError(workerId);
  }
}

export function checkpointFileName(sequenceNo: number, extension: 'yaml' | 'json'): string {
  return `${String(sequenceNo).padStart(6, '0')}.${extension}`;
}

/**
 * Sequence number encoded in a checkpoint file name, or null for anything
 * else (temp files included).
 */
export function sequenceFromFileName(fileName: string, extension: 'yaml' | 'json'): number | null {
  const match = new RegExp(`^(\\d+)\\.${extension}$`).exec(fileName);
  return match?.[1] === undefined ? null : Number(match[1]);
}

export function toPortable(checkpoint: PortableCheckpoint): PortableCheckpoint {
  const { workerId, sequenceNo, timestamp, retryCount, resumableState } = checkpoint;
  return { workerId, sequenceNo, timestamp, retryCount, resumableState };
}

type PortableDocument = {
  worker_id: string;
  sequence_no: number;
  timestamp: string;
  retry_count: number;
  resumable_state: {
    progress_summary: string;
    next_steps: string[];
    task_id?: string;
    role?: string;
    prompt_ref?: string;
  };
};

/**
 * Portable checkpoints are read by people too: snake_case YAML, optional
 * fields left out when absent.
 */
export function serializePortable(checkpoint: PortableCheckpoint): string {
  const state = checkpoint.resumableState;
  const document: PortableDocument = {
    worker_id: checkpoint.workerId,
    sequence_no: checkpoint.sequenceNo,
    timestamp: checkpoint.timestamp,
    retry_count: checkpoint.retryCount,
    resumable_state: {
      progress_summary: state.progressSummary,
      next_steps: state.nextSteps,
      ...(state.taskId !== undefined ? { task_id: state.taskId } : {}),
      ...(state.role !== undefined ? { role: state.role } : {}),
      ...(state.promptRef !== undefined ? { prompt_ref: state.promptRef } : {}),
    },
  };
  return yaml.dump(document, { schema: yaml.CORE_SCHEMA, noRefs: true, lineWidth: -1 });
}

/**
 * @throws Error describing the first problem when the text is not a portable checkpoint
 */
export function parsePortable(content: string): PortableCheckpoint {
  const document = yaml.load(content, { schema: yaml.CORE_SCHEMA });
  const validate = SchemaValidationCache.getValidator<PortableDocument>('portableCheckpoint');
  if (!validate(document)) {
    const first = validate.errors?.[0];
    throw new Error(`${first?.instancePath || '/'} ${first?.message ?? 'is invalid'}`);
  }

  const raw = document.resumable_state;
  const resumableState: ResumableState = {
    progressSummary: raw.progress_summary,
    nextSteps: raw.next_steps,
  };
  if (raw.task_id !== undefined) resumableState.taskId = raw.task_id;
  if (raw.role !== undefined) resumableState.role = raw.role;
  if (raw.prompt_ref !== undefined) resumableState.promptRef = raw.prompt_ref;

  return {
    workerId: document.worker_id,
    sequenceNo: document.sequence_no,
    timestamp: document.timestamp,
    retryCount: document.retry_count,
    resumableState,
  };
}

export function serializeLocal(checkpoint: LocalCheckpoint): string {
  return JSON.stringify(checkpoint, null, 2);
}

export function parseLocal(content: string): LocalCheckpoint {
  const parsed: unknown = JSON.parse(content);
  const validate = SchemaValidationCache.getValidator<LocalCheckpoint>('localCheckpoint');
  if (!validate(parsed)) {
    const first = validate.errors?.[0];
    throw new Error(`${first?.instancePath || '/'} ${first?.message ?? 'is invalid'}`);
  }
  return parsed;
}
