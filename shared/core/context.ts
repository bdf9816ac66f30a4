import { normalizeConfig, type PulseConfig } from './config';
import { createMemoryStore, type DocumentStore } from './pstore';
import { createLogger, type Logger } from '../telemetry/logger';

/** Everything a component needs, passed explicitly instead of module-level state. */
export type PulseContext = {
  store: DocumentStore;
  config: PulseConfig;
  logger: Logger;
  now: () => Date;
  random: () => number;
};

export type PulseContextOptions = Partial<Omit<PulseContext, 'config'>> & {
  config?: Partial<PulseConfig>;
};

export function createPulseContext(options: PulseContextOptions = {}): PulseContext {
  const config = normalizeConfig(options.config);
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  return {
    store: options.store ?? createMemoryStore(logger.child('store')),
    config,
    logger,
    now: options.now ?? (() => new Date()),
    random: options.random ?? Math.random,
  };
}

export function pickRandom<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
