import type { LogEvent } from '../event_log/event_log.types';
import type { CacheSnapshot } from '../record_projection/record_projection.types';

export const CURRENT_PACK_VERSION = '1';
export const SUPPORTED_PACK_VERSIONS: readonly string[] = [CURRENT_PACK_VERSION];

export const MANIFEST_ENTRY = 'manifest.json';
export const EVENTS_ENTRY = 'events.jsonl';
export const SUMMARY_ENTRY = 'derived_summary.json';

export type PackManifest = {
  formatVersion: string;
  projectId: string;
  /** CanonicalFingerprint of the exporting RecordStore */
  fingerprint: string;
  createdAt: string;
  eventCount: number;
  hasDerivedSummary: boolean;
};

/**
 * `directory` writes the three entries as files; `gzip` writes one
 * compressed JSON bundle holding the same entries.
 */
export type PackFormat = 'directory' | 'gzip';

export type PackContents = {
  manifest: PackManifest;
  events: LogEvent[];
  derivedSummary: CacheSnapshot | null;
};

export type ExportPackOptions = {
  format?: PackFormat;
  /** Export only events after this sequence number */
  sinceSequence?: number;
  /** Export at most the last N events */
  maxEvents?: number;
  includeSummary?: boolean;
};

export type ImportPackResult = {
  manifest: PackManifest;
  importedEvents: number;
  skippedEvents: number;
  summaryApplied: boolean;
  /** True when a full reconcile ran instead of installing the summary */
  reconciled: boolean;
};

export type InboxImportResult =
  | { source: string; status: 'imported'; result: ImportPackResult }
  | { source: string; status: 'failed'; error: string };
