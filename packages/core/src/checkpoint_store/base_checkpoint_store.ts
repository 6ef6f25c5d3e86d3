import { createLogger } from '../logger';
import {
  assertWorkerId,
  checkpointFileName,
  parseLocal,
  parsePortable,
  sequenceFromFileName,
  serializeLocal,
  serializePortable,
  toPortable,
} from './checkpoint_codec';
import type {
  CheckpointStore,
  CheckpointWriteResult,
  LocalCheckpoint,
  PortableCheckpoint,
} from './checkpoint_store.types';
import { errorMessage } from '../utils/atomic_write';

const logger = createLogger('[CheckpointStore] ');

export type CheckpointTier = 'portable' | 'local';

const EXTENSION = { portable: 'yaml', local: 'json' } as const;

/**
 * Shared checkpoint logic over a "tier/worker/file → text" backend.
 * Subclasses decide where the text lives and must replace files atomically.
 */
export abstract class TextCheckpointStore implements CheckpointStore {
  protected abstract listFiles(tier: CheckpointTier, workerId: string): Promise<string[]>;
  protected abstract readText(tier: CheckpointTier, workerId: string, fileName: string): Promise<string | null>;
  /** @returns a reference to the written file */
  protected abstract writeText(tier: CheckpointTier, workerId: string, fileName: string, content: string): Promise<string>;

  async write(checkpoint: LocalCheckpoint): Promise<CheckpointWriteResult> {
    assertWorkerId(checkpoint.workerId);
    const { workerId, sequenceNo } = checkpoint;

    const portableRef = await this.writeText(
      'portable',
      workerId,
      checkpointFileName(sequenceNo, 'yaml'),
      serializePortable(toPortable(checkpoint)),
    );
    const localRef = await this.writeText(
      'local',
      workerId,
      checkpointFileName(sequenceNo, 'json'),
      serializeLocal(checkpoint),
    );
    return { portableRef, localRef };
  }

  async nextSequence(workerId: string): Promise<number> {
    assertWorkerId(workerId);
    const sequences = [
      ...(await this.sequences('portable', workerId)),
      ...(await this.sequences('local', workerId)),
    ];
    return Math.max(0, ...sequences) + 1;
  }

  async latestPortable(workerId: string): Promise<PortableCheckpoint | null> {
    return this.latest('portable', workerId, parsePortable);
  }

  async latestLocal(workerId: string): Promise<LocalCheckpoint | null> {
    return this.latest('local', workerId, parseLocal);
  }

  async listPortable(workerId: string): Promise<PortableCheckpoint[]> {
    assertWorkerId(workerId);
    const result: PortableCheckpoint[] = [];
    for (const sequenceNo of (await this.sequences('portable', workerId)).sort((a, b) => a - b)) {
      const checkpoint = await this.readOne('portable', workerId, sequenceNo, parsePortable);
      if (checkpoint) result.push(checkpoint);
    }
    return result;
  }

  private async sequences(tier: CheckpointTier, workerId: string): Promise<number[]> {
    const files = await this.listFiles(tier, workerId);
    return files
      .map((name) => sequenceFromFileName(name, EXTENSION[tier]))
      .filter((n): n is number => n !== null);
  }

  private async latest<T>(
    tier: CheckpointTier,
    workerId: string,
    parse: (content: string) => T,
  ): Promise<T | null> {
    assertWorkerId(workerId);
    const newestFirst = (await this.sequences(tier, workerId)).sort((a, b) => b - a);
    for (const sequenceNo of newestFirst) {
      const checkpoint = await this.readOne(tier, workerId, sequenceNo, parse);
      if (checkpoint) return checkpoint;
    }
    return null;
  }

  private async readOne<T>(
    tier: CheckpointTier,
    workerId: string,
    sequenceNo: number,
    parse: (content: string) => T,
  ): Promise<T | null> {
    const fileName = checkpointFileName(sequenceNo, EXTENSION[tier]);
    const content = await this.readText(tier, workerId, fileName);
    if (content === null) return null;
    try {
      return parse(content);
    } catch (error) {
      logger.warn(`Skipping unreadable ${tier} checkpoint ${workerId}/${fileName}: ${errorMessage(error)}`);
      return null;
    }
  }
}
