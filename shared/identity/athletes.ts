import { pickRandom, type PulseContext } from '../core/context';
import { athleteKey, legacyAthleteKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import type { Logger } from '../telemetry/logger';
import { MetricRecordSchema, type MetricRecord } from '../aggregate/types';
import { canonicalize } from './canonical';
import { LegacyProfileSchema, migrateLegacyProfile } from './legacy';
import {
  AthleteProfileSchema,
  FamilyContactSchema,
  type AthleteProfile,
  type AthleteSeed,
  type FamilyContact,
  type RecordInput,
} from './types';

export type RegisterOptions = {
  confirmPin?: string;
  seed?: AthleteSeed;
};

export class AthleteAccounts {
  private readonly ctx: PulseContext;

  private readonly log: Logger;

  constructor(ctx: PulseContext) {
    this.ctx = ctx;
    this.log = ctx.logger.child('athletes');
  }

  private load(key: string): AthleteProfile | null {
    return this.ctx.store.get(athleteKey(key), AthleteProfileSchema, null);
  }

  private save(profile: AthleteProfile): CoreResult<void> {
    return this.ctx.store.put(athleteKey(profile.identity), profile);
  }

  register(raw: string, pin: string, options: RegisterOptions = {}): CoreResult<AthleteProfile> {
    const key = canonicalize(raw);
    if (!key || !pin) {
      return fail('InvalidInput', 'identity and pin are required');
    }
    if (options.confirmPin !== undefined && options.confirmPin !== pin) {
      return fail('InvalidInput', 'pin confirmation does not match');
    }
    if (this.load(key)) {
      return fail('AlreadyExists', 'athlete already registered', { identity: key });
    }
    const seed = options.seed ?? {};
    const palette = this.ctx.config.palette;
    const profile: AthleteProfile = {
      identity: key,
      pin,
      color: seed.color ?? pickRandom(palette, this.ctx.random) ?? palette[0] ?? '',
      createdAt: this.ctx.now().toISOString(),
      teams: [...(seed.teams ?? [])],
      logs: { ...(seed.logs ?? {}) },
    };
    if (seed.family) {
      profile.family = FamilyContactSchema.parse(seed.family);
    }
    const saved = this.save(profile);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('athlete registered', { identity: key });
    return ok(profile);
  }

  /**
   * Resolves the canonical profile, falling back once to a profile stored
   * under the raw trimmed name. A legacy match with the right PIN is copied to
   * the canonical key; the legacy document itself is left in place.
   */
  authenticate(raw: string, pin: string): CoreResult<AthleteProfile> {
    const key = canonicalize(raw);
    if (!key) {
      return fail('InvalidInput', 'identity is required');
    }
    const profile = this.load(key);
    if (profile) {
      return profile.pin === pin ? ok(profile) : fail('InvalidInput', 'pin does not match', { identity: key });
    }
    const trimmed = typeof raw === 'string' ? raw.trim() : '';
    const legacy = trimmed ? this.ctx.store.get(legacyAthleteKey(trimmed), LegacyProfileSchema, null) : null;
    if (!legacy) {
      return fail('NotFound', 'athlete not found', { identity: key });
    }
    if (legacy.pin !== pin) {
      return fail('InvalidInput', 'pin does not match', { identity: key });
    }
    const migrated = migrateLegacyProfile(legacy, key, this.ctx.config.palette[0] ?? '');
    if (!migrated) {
      this.log.warn('legacy profile could not be migrated', { identity: key });
      return fail('Corrupt', 'legacy profile is unreadable', { identity: key });
    }
    const saved = this.save(migrated);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('legacy profile migrated', { identity: key, legacyKey: trimmed });
    return ok(migrated);
  }

  get(raw: string): CoreResult<AthleteProfile> {
    const key = canonicalize(raw);
    const profile = key ? this.load(key) : null;
    if (!profile) {
      return fail('NotFound', 'athlete not found', { identity: key });
    }
    return ok(profile);
  }

  /** Loads, mutates and rewrites a profile in one step; the identity cannot change. */
  update(raw: string, mutate: (profile: AthleteProfile) => AthleteProfile): CoreResult<AthleteProfile> {
    const current = this.get(raw);
    if (!current.ok) {
      return current;
    }
    const next: AthleteProfile = { ...mutate(current.value), identity: current.value.identity };
    const saved = this.save(next);
    if (!saved.ok) {
      return saved;
    }
    return ok(next);
  }

  appendRecord(raw: string, logName: string, record: RecordInput): CoreResult<MetricRecord> {
    const name = typeof logName === 'string' ? logName.trim() : '';
    if (!name) {
      return fail('InvalidInput', 'log name is required');
    }
    if (typeof record.amount !== 'number' || !Number.isFinite(record.amount)) {
      return fail('InvalidInput', 'record amount must be a finite number', { log: name });
    }
    const parsed = MetricRecordSchema.safeParse(record);
    if (!parsed.success) {
      return fail('InvalidInput', 'record must have a date and a numeric amount', { log: name });
    }
    const entry = parsed.data;
    const updated = this.update(raw, (profile) => ({
      ...profile,
      logs: { ...profile.logs, [name]: [...(profile.logs[name] ?? []), entry] },
    }));
    if (!updated.ok) {
      return updated;
    }
    this.log.debug('record appended', { identity: updated.value.identity, log: name });
    return ok(entry);
  }

  updateFamilyContact(raw: string, contact: Partial<FamilyContact>): CoreResult<AthleteProfile> {
    return this.update(raw, (profile) => ({
      ...profile,
      family: FamilyContactSchema.parse({ ...(profile.family ?? {}), ...contact }),
    }));
  }
}
