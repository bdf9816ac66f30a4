import type { RandomBytesSource } from '@shared/codes/registry';
import { createPulseContext, type PulseContext, type PulseContextOptions } from '@shared/core/context';
import type { CoreErrorCode, CoreResult } from '@shared/core/result';
import { createPulseCore, type PulseCore, type PulseCoreOptions } from '@shared/pulse/core';
import { createLogger, silentLogger, type LogLevel, type Logger } from '@shared/telemetry/logger';

/** Wednesday 21 February 2024, local time; ISO week 2024-W08. */
export const FIXED_NOW = new Date(2024, 1, 21, 10, 0, 0);

export function testContext(options: PulseContextOptions = {}): PulseContext {
  return createPulseContext({ logger: silentLogger, now: () => FIXED_NOW, random: () => 0, ...options });
}

export function testCore(options: PulseCoreOptions = {}): PulseCore {
  return createPulseCore({ logger: silentLogger, now: () => FIXED_NOW, random: () => 0, ...options });
}

/** Hands out the given byte batches in order, one per draw. */
export function queuedBytes(batches: number[][]): RandomBytesSource {
  const queue = [...batches];
  return () => {
    const next = queue.shift();
    if (!next) {
      throw new Error('byte queue exhausted');
    }
    return Uint8Array.from(next);
  };
}

export function errorCode<T>(result: CoreResult<T>): CoreErrorCode | null {
  return result.ok ? null : result.error.code;
}

export type CapturedLine = { level: LogLevel; entry: Record<string, unknown> };

/** Logger whose parsed output lands in `lines`. */
export function capturingLogger(level: LogLevel = 'debug'): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level,
    now: () => FIXED_NOW,
    sink: (lineLevel, line) => {
      const parsed: unknown = JSON.parse(line);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        lines.push({ level: lineLevel, entry: { ...parsed } });
      }
    },
  });
  return { logger, lines };
}
