import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import type { ZodType, ZodTypeDef } from 'zod';

import { silentLogger, type Logger } from '../telemetry/logger';
import { fail, ok, type CoreResult } from './result';

export interface StorageBackend {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export type DocumentSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export function createMemoryBackend(): StorageBackend {
  const store = new Map<string, string>();
  return {
    getItem(key: string): string | null {
      return store.get(key) ?? null;
    },
    setItem(key: string, value: string): void {
      store.set(key, value);
    },
  } satisfies StorageBackend;
}

const SAFE_KEY_CHAR = /[A-Za-z0-9._-]/;

/** Longest encoded stem kept verbatim; leaves room for `.json.tmp` under the usual 255-byte limit. */
export const MAX_FILE_STEM = 180;

/**
 * Maps a store key to a portable file name; every other character is
 * percent-encoded per UTF-8 byte. Over-long stems are cut and suffixed with
 * `~` and the key's SHA-256, which no unhashed name can contain.
 */
export function keyToFileName(key: string): string {
  let encoded = '';
  for (const char of key) {
    if (SAFE_KEY_CHAR.test(char)) {
      encoded += char;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf8')) {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  if (encoded.length > MAX_FILE_STEM) {
    const digest = createHash('sha256').update(key, 'utf8').digest('hex');
    encoded = `${encoded.slice(0, MAX_FILE_STEM - digest.length - 1)}~${digest}`;
  }
  return `${encoded}.json`;
}

export function createFileBackend(dir: string): StorageBackend {
  const root = path.resolve(dir);
  const fileFor = (key: string): string => path.join(root, keyToFileName(key));
  return {
    getItem(key: string): string | null {
      const file = fileFor(key);
      if (!existsSync(file)) {
        return null;
      }
      return readFileSync(file, 'utf8');
    },
    setItem(key: string, value: string): void {
      mkdirSync(root, { recursive: true });
      const file = fileFor(key);
      const temp = `${file}.tmp`;
      writeFileSync(temp, value, 'utf8');
      renameSync(temp, file);
    },
  } satisfies StorageBackend;
}

/**
 * Keyed whole-document store. Reads never throw: a missing key, unreadable
 * content or a document that fails its schema all yield the caller's fallback.
 * Writes replace the previous document; last write wins. A failed write is
 * reported as `StorageFailed` and leaves the previous document in place.
 */
export class DocumentStore {
  private readonly backend: StorageBackend;

  private readonly logger: Logger;

  constructor(backend: StorageBackend, logger: Logger = silentLogger) {
    this.backend = backend;
    this.logger = logger;
  }

  private readRaw(key: string): string | null {
    try {
      return this.backend.getItem(key);
    } catch (error) {
      this.logger.warn('document read failed', { key, error: String(error) });
      return null;
    }
  }

  get<T, F = T>(key: string, schema: DocumentSchema<T>, fallback: F): T | F {
    const raw = this.readRaw(key);
    if (raw === null) {
      return fallback;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('corrupt document', { key, reason: 'json' });
      return fallback;
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('corrupt document', {
        key,
        reason: 'schema',
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return fallback;
    }
    return result.data;
  }

  put<T>(key: string, document: T): CoreResult<void> {
    try {
      this.backend.setItem(key, JSON.stringify(document, null, 2));
    } catch (error) {
      this.logger.error('document write failed', { key, error: String(error) });
      return fail('StorageFailed', 'document could not be written', { key });
    }
    return ok(undefined);
  }
}

export function createMemoryStore(logger?: Logger): DocumentStore {
  return new DocumentStore(createMemoryBackend(), logger);
}

export function createFileStore(dir: string, logger?: Logger): DocumentStore {
  return new DocumentStore(createFileBackend(dir), logger);
}
