import { randomBytes } from 'node:crypto';

import type { PulseContext } from '../core/context';
import { codeIndexKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { CodeIndexSchema, type CodeIndex, type CodeNamespace } from './types';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const ALPHABET_SIZE = ALPHABET.length;
const USER_CODE_PATTERN = /^[A-Z0-9_-]+$/;

export const DEFAULT_CODE_LENGTH = 6;
export const DEFAULT_MAX_ATTEMPTS = 5000;

export type RandomBytesSource = (size: number) => Uint8Array;

export type GenerateOptions = {
  length?: number;
  maxAttempts?: number;
  randomBytes?: RandomBytesSource;
  /** Extra collision check, e.g. a document already stored under the code. */
  isTaken?: (code: string) => boolean;
};

const cryptoBytes: RandomBytesSource = (size) => randomBytes(size);

function randomIndexes(count: number, source: RandomBytesSource): number[] {
  const result: number[] = [];
  if (count <= 0) {
    return result;
  }
  const maxMultiple = Math.floor(256 / ALPHABET_SIZE) * ALPHABET_SIZE;
  while (result.length < count) {
    const bytes = source(count);
    for (const byte of bytes) {
      if (byte < maxMultiple) {
        result.push(byte % ALPHABET_SIZE);
        if (result.length === count) {
          break;
        }
      }
    }
  }
  return result;
}

function encode(values: readonly number[]): string {
  return values.map((value) => ALPHABET[value] ?? '').join('');
}

export function drawCode(length: number = DEFAULT_CODE_LENGTH, source: RandomBytesSource = cryptoBytes): string {
  return encode(randomIndexes(length, source));
}

/**
 * Draws codes until one is not in `existing`. The loop is capped at
 * `maxAttempts`; a saturated namespace fails with `Exhausted`.
 */
export function generateCode(existing: Iterable<string>, options: GenerateOptions = {}): CoreResult<string> {
  const length = options.length ?? DEFAULT_CODE_LENGTH;
  if (!Number.isInteger(length) || length <= 0) {
    return fail('InvalidInput', 'code length must be a positive integer', { length });
  }
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const source = options.randomBytes ?? cryptoBytes;
  const taken = new Set(existing);
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const code = drawCode(length, source);
    if (!taken.has(code) && !options.isTaken?.(code)) {
      return ok(code);
    }
  }
  return fail('Exhausted', 'no free code found', { length, attempts: maxAttempts, taken: taken.size });
}

/** Codes typed by people are compared after trimming and upper-casing. */
export function normalizeCode(raw: string | null | undefined): string {
  if (typeof raw !== 'string') {
    return '';
  }
  return raw.trim().toUpperCase();
}

export function isUserCode(code: string): boolean {
  return USER_CODE_PATTERN.test(code);
}

const EMPTY_INDEX: CodeIndex = { codes: [] };

/** Per-namespace record of issued codes, persisted through the document store. */
export class CodeRegistry {
  private readonly ctx: PulseContext;

  private readonly source: RandomBytesSource | undefined;

  constructor(ctx: PulseContext, source?: RandomBytesSource) {
    this.ctx = ctx;
    this.source = source;
  }

  private lengthFor(namespace: CodeNamespace): number {
    return namespace === 'share' ? this.ctx.config.shareCodeLength : this.ctx.config.codeLength;
  }

  issued(namespace: CodeNamespace): string[] {
    return this.ctx.store.get(codeIndexKey(namespace), CodeIndexSchema, EMPTY_INDEX).codes;
  }

  issue(namespace: CodeNamespace, isTaken?: (code: string) => boolean): CoreResult<string> {
    const existing = this.issued(namespace);
    const generated = generateCode(existing, {
      length: this.lengthFor(namespace),
      maxAttempts: this.ctx.config.maxCodeAttempts,
      randomBytes: this.source,
      isTaken,
    });
    if (!generated.ok) {
      this.ctx.logger.error('code generation failed', { namespace, ...generated.error.detail });
      return generated;
    }
    const recorded = this.ctx.store.put(codeIndexKey(namespace), { codes: [...existing, generated.value] });
    return recorded.ok ? generated : recorded;
  }

  /** Records a caller-chosen code so later generated codes never collide with it. */
  reserve(namespace: CodeNamespace, code: string): CoreResult<void> {
    const existing = this.issued(namespace);
    if (existing.includes(code)) {
      return ok(undefined);
    }
    return this.ctx.store.put(codeIndexKey(namespace), { codes: [...existing, code] });
  }
}
