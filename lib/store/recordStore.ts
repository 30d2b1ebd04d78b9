/**
 * Flat record stores: one JSON array per collection.
 * Path: {dataDir}/{collection}.json
 * Atomic write: temp file then rename. Missing file is created empty;
 * a file that cannot be decoded is recovered as an empty collection.
 */

import { writeFile, readFile, mkdir, rename } from 'fs/promises';
import path from 'path';
import { StorageCorruptError } from '../errors';
import type { UpgradeResult } from './migrations';

export interface RecordRepository<T> {
  readonly name: string;
  loadAll(): Promise<T[]>;
  saveAll(records: readonly T[]): Promise<void>;
}

export type RecordCodec<T> = {
  decode: (raw: unknown) => T | null;
  /** Schema upgrade applied to raw records before decoding. */
  upgrade?: (records: readonly unknown[]) => UpgradeResult;
};

/** 4-space indent keeps the files stable under diff; non-ASCII is written as-is. */
export function serializeRecords<T>(records: readonly T[]): string {
  return `${JSON.stringify(records, null, 4)}\n`;
}

/**
 * Parse, upgrade and decode a raw file body. Returns null when the body is not
 * a JSON array. `upgraded` is true when the schema pass rewrote any record.
 */
export function decodeRecords<T>(
  body: string,
  codec: RecordCodec<T>,
  label: string
): { records: T[]; upgraded: boolean; upgradedRaw: unknown[] } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;

  const { records: raw, changed } = codec.upgrade ? codec.upgrade(parsed) : { records: parsed, changed: false };
  const records: T[] = [];
  raw.forEach((entry, index) => {
    const decoded = codec.decode(entry);
    if (decoded === null) {
      console.warn(`[recordStore] ${label}: skipping malformed record at index ${index}`);
      return;
    }
    records.push(decoded);
  });
  return { records, upgraded: changed, upgradedRaw: raw };
}

export class JsonFileRepository<T> implements RecordRepository<T> {
  readonly filePath: string;

  constructor(
    readonly name: string,
    dataDir: string,
    private readonly codec: RecordCodec<T>
  ) {
    this.filePath = path.join(dataDir, `${name}.json`);
  }

  async loadAll(): Promise<T[]> {
    let body: string;
    try {
      body = await readFile(this.filePath, 'utf8');
    } catch (e) {
      const err = e as NodeJS.ErrnoException;
      if (err?.code !== 'ENOENT') throw e;
      await this.writeBody(serializeRecords([]));
      return [];
    }

    const result = decodeRecords(body, this.codec, this.name);
    if (!result) {
      console.warn(`[recordStore] ${new StorageCorruptError(path.basename(this.filePath)).message}`);
      return [];
    }
    if (result.upgraded) {
      console.warn(`[recordStore] ${this.name}: upgraded legacy records, saving ${path.basename(this.filePath)}`);
      await this.writeBody(serializeRecords(result.upgradedRaw));
    }
    return result.records;
  }

  async saveAll(records: readonly T[]): Promise<void> {
    await this.writeBody(serializeRecords(records));
  }

  private async writeBody(body: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${Date.now()}.tmp`;
    await writeFile(tempPath, body, 'utf8');
    await rename(tempPath, this.filePath);
  }
}

/**
 * In-process stand-in. Keeps the serialized body so a load always returns
 * fresh copies, exactly as a file round trip would.
 */
export class MemoryRepository<T> implements RecordRepository<T> {
  private body: string;
  saveCount = 0;

  constructor(
    readonly name: string,
    private readonly codec: RecordCodec<T>,
    initial: readonly unknown[] = []
  ) {
    this.body = serializeRecords(initial);
  }

  async loadAll(): Promise<T[]> {
    const result = decodeRecords(this.body, this.codec, this.name);
    if (!result) return [];
    if (result.upgraded) this.body = serializeRecords(result.upgradedRaw);
    return result.records;
  }

  async saveAll(records: readonly T[]): Promise<void> {
    this.body = serializeRecords(records);
    this.saveCount += 1;
  }

  /** Raw stored records, for assertions. */
  snapshot(): unknown {
    return JSON.parse(this.body);
  }
}
