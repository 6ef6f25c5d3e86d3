import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import type { ErrorObject } from 'ajv';
import type { LogEvent } from '../event_log/event_log.types';
import type { CacheSnapshot } from '../record_projection/record_projection.types';
import { SchemaValidationCache } from '../validation/schema_cache';
import { isNotFound, writeFileAtomic, errorMessage } from '../utils/atomic_write';
import { InvalidPackError, MemoryPackError, UnsupportedPackVersionError } from './memory_pack.errors';
import {
  EVENTS_ENTRY,
  MANIFEST_ENTRY,
  SUMMARY_ENTRY,
  SUPPORTED_PACK_VERSIONS,
} from './memory_pack.types';
import type { PackContents, PackFormat, PackManifest } from './memory_pack.types';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

type PackEntries = Map<string, string>;

function toEntries(contents: PackContents): PackEntries {
  const entries: PackEntries = new Map();
  entries.set(MANIFEST_ENTRY, `${JSON.stringify(contents.manifest, null, 2)}\n`);
  entries.set(EVENTS_ENTRY, contents.events.map((event) => `${JSON.stringify(event)}\n`).join(''));
  if (contents.derivedSummary) {
    entries.set(SUMMARY_ENTRY, JSON.stringify(contents.derivedSummary));
  }
  return entries;
}

/**
 * Writes a pack. The target must not exist yet: packs are immutable.
 * A directory pack is assembled beside the target and renamed into place.
 */
export async function writePack(target: string, format: PackFormat, contents: PackContents): Promise<void> {
  if (await pathExists(target)) {
    throw new MemoryPackError(`Refusing to overwrite existing pack at ${target}`);
  }
  const entries = toEntries(contents);

  if (format === 'gzip') {
    const bundle = JSON.stringify(Object.fromEntries(entries));
    await writeFileAtomic(target, await gzipAsync(Buffer.from(bundle, 'utf-8')));
    return;
  }

  const staging = `${target}.${randomBytes(4).toString('hex')}.partial`;
  await fs.mkdir(staging, { recursive: true });
  try {
    for (const [name, content] of entries) {
      await fs.writeFile(path.join(staging, name), content, 'utf-8');
    }
    await fs.rename(staging, target);
  } catch (error) {
    await fs.rm(staging, { recursive: true, force: true });
    throw error;
  }
}

/**
 * Reads and fully validates a pack in either form.
 * @throws UnsupportedPackVersionError, InvalidPackError
 */
export async function readPack(source: string): Promise<PackContents> {
  let stats: Stats;
  try {
    stats = await fs.stat(source);
  } catch (error) {
    if (isNotFound(error)) {
      throw new InvalidPackError('pack', `${source} does not exist`);
    }
    throw error;
  }

  const entries = stats.isDirectory() ? await readDirectoryEntries(source) : await readGzipEntries(source);
  return decodeEntries(entries);
}

async function readDirectoryEntries(dir: string): Promise<PackEntries> {
  const entries: PackEntries = new Map();
  for (const name of [MANIFEST_ENTRY, EVENTS_ENTRY, SUMMARY_ENTRY]) {
    try {
      entries.set(name, await fs.readFile(path.join(dir, name), 'utf-8'));
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }
  return entries;
}

async function readGzipEntries(file: string): Promise<PackEntries> {
  let bundle: unknown;
  try {
    const raw = await gunzipAsync(await fs.readFile(file));
    bundle = JSON.parse(raw.toString('utf-8'));
  } catch (error) {
    throw new InvalidPackError('pack', `not a gzip JSON bundle: ${errorMessage(error)}`);
  }
  if (typeof bundle !== 'object' || bundle === null || Array.isArray(bundle)) {
    throw new InvalidPackError('pack', 'bundle must be a JSON object');
  }

  const entries: PackEntries = new Map();
  for (const [name, content] of Object.entries(bundle)) {
    if (typeof content !== 'string') {
      throw new InvalidPackError(name, 'bundle entry must be a string');
    }
    entries.set(name, content);
  }
  return entries;
}

function fieldOf(prefix: string, error: ErrorObject | undefined): string {
  if (!error) return prefix;
  const missing: unknown = error.params['missingProperty'];
  const pointer = typeof missing === 'string' ? `${error.instancePath}/${missing}` : error.instancePath;
  return pointer === '' ? prefix : `${prefix}${pointer.replace(/\//g, '.')}`;
}

function decodeManifest(text: string | undefined): PackManifest {
  if (text === undefined) {
    throw new InvalidPackError('manifest', `${MANIFEST_ENTRY} is missing`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InvalidPackError('manifest', `${MANIFEST_ENTRY} is not valid JSON`);
  }

  // Version first: a newer layout may legitimately fail the current schema
  if (typeof parsed === 'object' && parsed !== null && 'formatVersion' in parsed) {
    const version = parsed.formatVersion;
    if (typeof version !== 'string') {
      throw new UnsupportedPackVersionError(JSON.stringify(version), SUPPORTED_PACK_VERSIONS);
    }
    if (!SUPPORTED_PACK_VERSIONS.includes(version)) {
      throw new UnsupportedPackVersionError(version, SUPPORTED_PACK_VERSIONS);
    }
  }

  const validate = SchemaValidationCache.getValidator<PackManifest>('packManifest');
  if (!validate(parsed)) {
    const first = validate.errors?.[0];
    throw new InvalidPackError(fieldOf('manifest', first), first?.message ?? 'is invalid');
  }
  return parsed;
}

function decodeEvents(text: string | undefined): LogEvent[] {
  if (text === undefined) {
    throw new InvalidPackError('events', `${EVENTS_ENTRY} is missing`);
  }
  const validate = SchemaValidationCache.getValidator<LogEvent>('event');

  const events: LogEvent[] = [];
  for (const [index, line] of text.split('\n').entries()) {
    if (line.trim() === '') continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new InvalidPackError(`events[${index + 1}]`, 'not valid JSON');
    }
    if (!validate(parsed)) {
      const first = validate.errors?.[0];
      throw new InvalidPackError(fieldOf(`events[${index + 1}]`, first), first?.message ?? 'is invalid');
    }
    events.push(parsed);
  }
  return events;
}

function decodeSummary(text: string | undefined, manifest: PackManifest): CacheSnapshot | null {
  if (!manifest.hasDerivedSummary) {
    return null;
  }
  if (text === undefined) {
    throw new InvalidPackError('derived_summary', `${SUMMARY_ENTRY} is missing but the manifest declares one`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InvalidPackError('derived_summary', `${SUMMARY_ENTRY} is not valid JSON`);
  }
  const validate = SchemaValidationCache.getValidator<CacheSnapshot>('cacheSnapshot');
  if (!validate(parsed)) {
    const first = validate.errors?.[0];
    throw new InvalidPackError(fieldOf('derived_summary', first), first?.message ?? 'is invalid');
  }
  if (parsed.fingerprint !== manifest.fingerprint) {
    throw new InvalidPackError('derived_summary.fingerprint', 'does not match the manifest fingerprint');
  }
  return parsed;
}

function decodeEntries(entries: PackEntries): PackContents {
  const manifest = decodeManifest(entries.get(MANIFEST_ENTRY));
  const events = decodeEvents(entries.get(EVENTS_ENTRY));
  if (events.length !== manifest.eventCount) {
    throw new InvalidPackError(
      'manifest.eventCount',
      `declares ${manifest.eventCount} event(s) but the pack holds ${events.length}`,
    );
  }
  const derivedSummary = decodeSummary(entries.get(SUMMARY_ENTRY), manifest);
  return { manifest, events, derivedSummary };
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
