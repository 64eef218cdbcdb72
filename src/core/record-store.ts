/**
 * Record Store - keyed, write-once persistence of extracted flight rows
 *
 * One CSV file per normalized search (origin, destination, date). A stored
 * entry is reused verbatim whenever the freshness policy accepts it; the
 * default policy accepts every entry forever, so a stale file is reused until
 * something deletes it. Writes are atomic (temp file + rename). There is no
 * locking: two concurrent identical searches may both extract and the last
 * rename wins.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FLIGHT_COLUMNS, type FlightField, type FlightRecord, type SearchRequest } from '../types/flights.js';
import { encodeRequest } from './request-encoder.js';
import type { Extractor } from './page-extractor.js';
import { parseCsv, stringifyCsv } from '../utils/csv.js';
import { logger } from '../utils/logger.js';

// ============================================
// KEYS
// ============================================

export interface StoreKey {
  readonly origin: string;
  readonly destination: string;
  readonly date: string;
}

export function normalizeRequest(request: SearchRequest): StoreKey {
  return {
    origin: request.origin.trim().toUpperCase(),
    destination: request.destination.trim().toUpperCase(),
    date: request.date.trim(),
  };
}

export function storeKeyToString(key: StoreKey): string {
  return `${key.origin}-${key.destination}-${key.date}`;
}

/**
 * File name for a key. Every UTF-8 byte outside [A-Za-z0-9-] is written as
 * %XX, so '_' only ever appears as the separator and two distinct keys never
 * share a file.
 */
export function storeFileName(key: StoreKey): string {
  return `flights_${escapeSegment(key.origin)}_${escapeSegment(key.destination)}_${escapeSegment(key.date)}.csv`;
}

function escapeSegment(value: string): string {
  let escaped = '';
  for (const byte of Buffer.from(value, 'utf-8')) {
    const char = String.fromCharCode(byte);
    escaped += /[A-Za-z0-9-]/.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return escaped;
}

// ============================================
// FRESHNESS POLICIES
// ============================================

export interface StoredEntryInfo {
  key: StoreKey;
  filePath: string;
  storedAt: Date;
}

export interface FreshnessPolicy {
  readonly name: string;
  isFresh(entry: StoredEntryInfo, now: Date): boolean;
}

/**
 * Entries never expire
 */
export const writeOncePolicy: FreshnessPolicy = {
  name: 'write-once',
  isFresh: () => true,
};

/**
 * Entries older than maxAgeMs are refetched and overwritten
 */
export function maxAgePolicy(maxAgeMs: number): FreshnessPolicy {
  return {
    name: `max-age(${maxAgeMs}ms)`,
    isFresh: (entry, now) => now.getTime() - entry.storedAt.getTime() <= maxAgeMs,
  };
}

// ============================================
// STORE
// ============================================

export interface RecordStoreConfig {
  dataDir: string;
  policy: FreshnessPolicy;
  now: () => Date;
}

export const DEFAULT_RECORD_STORE_CONFIG: RecordStoreConfig = {
  dataDir: './data/flights',
  policy: writeOncePolicy,
  now: () => new Date(),
};

export interface RecordStoreStats {
  hits: number;
  misses: number;
  expired: number;
  extractions: number;
}

export type LoadSource = 'store' | 'extraction';

export interface LoadResult {
  records: FlightRecord[];
  source: LoadSource;
  filePath: string;
}

export class RecordStore {
  private config: RecordStoreConfig;
  private stats: RecordStoreStats = { hits: 0, misses: 0, expired: 0, extractions: 0 };

  constructor(
    private readonly extractor: Extractor,
    config: Partial<RecordStoreConfig> = {}
  ) {
    this.config = { ...DEFAULT_RECORD_STORE_CONFIG, ...config };
  }

  getFilePath(request: SearchRequest): string {
    return path.resolve(this.config.dataDir, storeFileName(normalizeRequest(request)));
  }

  getStats(): RecordStoreStats {
    return { ...this.stats };
  }

  getPolicy(): FreshnessPolicy {
    return this.config.policy;
  }

  /**
   * Stored rows for the request, or extract, persist and return fresh rows.
   * A stored entry the policy accepts is returned with zero extraction calls.
   */
  async loadOrFetch(request: SearchRequest): Promise<FlightRecord[]> {
    const result = await this.loadOrFetchWithSource(request);
    return result.records;
  }

  async loadOrFetchWithSource(request: SearchRequest): Promise<LoadResult> {
    const key = normalizeRequest(request);
    const filePath = this.getFilePath(request);
    const log = logger.recordStore.child({ storeKey: storeKeyToString(key) });

    const info = await this.entryInfo(key, filePath);
    if (info) {
      if (this.config.policy.isFresh(info, this.config.now())) {
        const records = await this.readFile(filePath);
        this.stats.hits++;
        log.info('Reusing stored search', { filePath, rows: records.length });
        return { records, source: 'store', filePath };
      }
      this.stats.expired++;
      log.info('Stored search expired, refetching', { filePath, policy: this.config.policy.name });
    } else {
      this.stats.misses++;
    }

    this.stats.extractions++;
    const records = await this.extractor.extract(encodeRequest(key));
    await this.writeFile(filePath, records);
    log.info('Stored extracted search', { filePath, rows: records.length });
    return { records, source: 'extraction', filePath };
  }

  async has(request: SearchRequest): Promise<boolean> {
    const info = await this.entryInfo(normalizeRequest(request), this.getFilePath(request));
    return info !== null;
  }

  /**
   * Stored rows regardless of freshness, or null when nothing is stored
   */
  async load(request: SearchRequest): Promise<FlightRecord[] | null> {
    const filePath = this.getFilePath(request);
    try {
      return await this.readFile(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async save(request: SearchRequest, records: readonly FlightRecord[]): Promise<void> {
    await this.writeFile(this.getFilePath(request), records);
  }

  async delete(request: SearchRequest): Promise<void> {
    try {
      await fs.unlink(this.getFilePath(request));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  private async entryInfo(key: StoreKey, filePath: string): Promise<StoredEntryInfo | null> {
    try {
      const stat = await fs.stat(filePath);
      return { key, filePath, storedAt: stat.mtime };
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private async readFile(filePath: string): Promise<FlightRecord[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    return decodeRecords(content);
  }

  private async writeFile(filePath: string, records: readonly FlightRecord[]): Promise<void> {
    const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;
    const content = encodeRecords(records);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      logger.recordStore.error(`Failed to save ${filePath}`, { error });
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}

// ============================================
// SERIALIZATION
// ============================================

export function encodeRecords(records: readonly FlightRecord[]): string {
  return stringifyCsv(
    FLIGHT_COLUMNS.map((column) => column.header),
    records.map((record) => FLIGHT_COLUMNS.map((column) => record[column.field]))
  );
}

/**
 * Rows are mapped by header name, so a file with reordered columns still
 * loads. A column missing from the header reads as ''.
 */
export function decodeRecords(content: string): FlightRecord[] {
  const [header, ...rows] = parseCsv(content);
  if (!header) {
    return [];
  }
  const indexOf = (name: string) => header.indexOf(name);
  const columns = FLIGHT_COLUMNS.map((column) => ({ ...column, index: indexOf(column.header) }));

  return rows.map((row) => {
    const cell = (field: FlightField): string => {
      const column = columns.find((c) => c.field === field);
      return column && column.index >= 0 ? row[column.index] ?? '' : '';
    };
    return {
      departureTime: cell('departureTime'),
      arrivalTime: cell('arrivalTime'),
      airline: cell('airline'),
      duration: cell('duration'),
      stops: cell('stops'),
      price: cell('price'),
      co2Emissions: cell('co2Emissions'),
      emissionsVariation: cell('emissionsVariation'),
    };
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
