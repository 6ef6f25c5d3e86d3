import * as fs from 'fs/promises';
import * as path from 'path';
import fg from 'fast-glob';
import type { IEventLog } from '../event_log/event_log.types';
import { createLogger } from '../logger';
import type { Reconciler } from '../reconciler/reconciler';
import { CacheCorruptionError } from '../record_projection/record_projection.errors';
import type { CacheSnapshot } from '../record_projection/record_projection.types';
import { errorMessage, isNotFound } from '../utils/atomic_write';
import { systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { readPack, writePack } from './pack_codec';
import { CURRENT_PACK_VERSION } from './memory_pack.types';
import type {
  ExportPackOptions,
  ImportPackResult,
  InboxImportResult,
  PackManifest,
} from './memory_pack.types';

const logger = createLogger('[MemoryPack] ');

export type MemoryPackServiceDependencies = {
  projectId: string;
  eventLog: IEventLog;
  reconciler: Reconciler;
  /** Directory scanned by importInbox, usually `.ai/memory/inbox` */
  inboxPath?: string;
  clock?: Clock;
};

/**
 * MemoryPackService - portable snapshots of the event log plus a derived
 * summary, tagged with the RecordStore fingerprint.
 *
 * Neither export nor import writes the RecordStore.
 */
export class MemoryPackService {
  private readonly projectId: string;
  private readonly eventLog: IEventLog;
  private readonly reconciler: Reconciler;
  private readonly inboxPath: string | null;
  private readonly clock: Clock;

  constructor(deps: MemoryPackServiceDependencies) {
    this.projectId = deps.projectId;
    this.eventLog = deps.eventLog;
    this.reconciler = deps.reconciler;
    this.inboxPath = deps.inboxPath ?? null;
    this.clock = deps.clock ?? systemClock;
  }

  async exportPack(target: string, options: ExportPackOptions = {}): Promise<PackManifest> {
    const format = options.format ?? 'directory';
    const fingerprint = await this.reconciler.currentFingerprint();

    const query: { sinceSequence?: number; limit?: number } = {};
    if (options.sinceSequence !== undefined) query.sinceSequence = options.sinceSequence;
    if (options.maxEvents !== undefined) query.limit = options.maxEvents;
    const events = await this.eventLog.list(query);

    const derivedSummary = options.includeSummary === false ? null : await this.freshSummary(fingerprint);

    const manifest: PackManifest = {
      formatVersion: CURRENT_PACK_VERSION,
      projectId: this.projectId,
      fingerprint,
      createdAt: this.clock().toISOString(),
      eventCount: events.length,
      hasDerivedSummary: derivedSummary !== null,
    };

    await writePack(target, format, { manifest, events, derivedSummary });
    await this.eventLog.append('export', {
      target,
      format,
      eventCount: events.length,
      fingerprint,
    });
    logger.info(`Exported ${events.length} event(s) to ${target}`);
    return manifest;
  }

  /**
   * Imports a pack all-or-nothing. The pack is fully validated before any
   * event is appended. The summary is installed only when its fingerprint
   * equals the current RecordStore's; otherwise a full reconcile runs.
   */
  async importPack(source: string): Promise<ImportPackResult> {
    const { manifest, events, derivedSummary } = await readPack(source);
    const currentFingerprint = await this.reconciler.currentFingerprint();

    const { imported, skipped } = await this.eventLog.appendImported(events);

    let summaryApplied = false;
    if (derivedSummary) {
      if (derivedSummary.fingerprint === currentFingerprint) {
        summaryApplied = await this.reconciler.installSnapshot(derivedSummary);
      } else {
        logger.info(
          `Discarding derived summary from ${manifest.projectId}: fingerprint ${manifest.fingerprint.slice(0, 12)} ` +
            `does not match current ${currentFingerprint.slice(0, 12)}`,
        );
      }
    }

    const reconciled = !summaryApplied;
    if (reconciled) {
      await this.reconciler.reconcile();
    }

    // A re-import that adds nothing leaves the log exactly as it was
    if (imported > 0) {
      await this.eventLog.append('import', {
        source,
        projectId: manifest.projectId,
        importedEvents: imported,
        skippedEvents: skipped,
        summaryApplied,
      });
    }
    logger.info(`Imported ${imported} event(s), skipped ${skipped} from ${source}`);

    return { manifest, importedEvents: imported, skippedEvents: skipped, summaryApplied, reconciled };
  }

  /**
   * Imports every pack dropped in the inbox: `*.gz` files and directories
   * holding a manifest. Imported packs move to `processed/`; failed ones
   * stay where they are and are reported.
   */
  async importInbox(): Promise<InboxImportResult[]> {
    if (this.inboxPath === null) {
      return [];
    }
    const inbox = this.inboxPath;
    const found = await fg(['*.gz', '*/manifest.json'], {
      cwd: inbox,
      onlyFiles: true,
      ignore: ['processed/**'],
    });
    const sources = found
      .map((entry) => (entry.endsWith('/manifest.json') ? path.dirname(entry) : entry))
      .sort();

    const results: InboxImportResult[] = [];
    for (const name of sources) {
      const source = path.join(inbox, name);
      let result: ImportPackResult;
      try {
        result = await this.importPack(source);
      } catch (error) {
        const message = errorMessage(error);
        logger.error(`Failed to import ${source}: ${message}`);
        results.push({ source, status: 'failed', error: message });
        continue;
      }
      try {
        await this.moveToProcessed(source);
      } catch (error) {
        logger.warn(`Imported ${source} but could not move it to processed/: ${errorMessage(error)}`);
      }
      results.push({ source, status: 'imported', result });
    }
    return results;
  }

  async purgeEvents(retentionDays: number): Promise<number> {
    return this.eventLog.purgeOlderThan(retentionDays);
  }

  /**
   * Moves an imported pack under `processed/`, numbering the name when a
   * pack of the same name was processed before.
   */
  private async moveToProcessed(source: string): Promise<string> {
    const processed = path.join(path.dirname(source), 'processed');
    await fs.mkdir(processed, { recursive: true });

    const name = path.basename(source);
    const ext = name.endsWith('.gz') ? '.gz' : '';
    const stem = name.slice(0, name.length - ext.length);
    for (let n = 0; ; n++) {
      const target = path.join(processed, n === 0 ? name : `${stem}-${n}${ext}`);
      try {
        await fs.access(target);
      } catch (error) {
        if (!isNotFound(error)) throw error;
        await fs.rename(source, target);
        return target;
      }
    }
  }

  private async freshSummary(fingerprint: string): Promise<CacheSnapshot> {
    let cached: CacheSnapshot | null = null;
    try {
      cached = await this.reconciler.cache.getSnapshot();
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      logger.warn(`Ignoring corrupted cache while exporting: ${error.message}`);
    }
    if (cached && cached.fingerprint === fingerprint) {
      return cached;
    }
    return (await this.reconciler.reconcile()).snapshot;
  }
}
