import { z } from 'zod';

import { AthleteProfileSchema, type AthleteProfile } from './types';

export const LegacyProfileSchema = z.object({ pin: z.string() }).passthrough();

export type LegacyProfile = z.infer<typeof LegacyProfileSchema>;

const LOG_FIELD_SUFFIXES = ['_log', '_sessions'] as const;

const LEGACY_CONTACT_FIELDS: ReadonlyArray<[string, string]> = [
  ['parent_name', 'parentName'],
  ['parent_email', 'parentEmail'],
  ['phone', 'phone'],
  ['notes', 'notes'],
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** `training_log` -> `training`, `gym_sessions` -> `gym`; null for non-log fields. */
export function legacyLogName(field: string): string | null {
  for (const suffix of LOG_FIELD_SUFFIXES) {
    if (field.endsWith(suffix) && field.length > suffix.length) {
      return field.slice(0, -suffix.length);
    }
  }
  return null;
}

function collectLogs(raw: LegacyProfile): Record<string, unknown[]> {
  const logs: Record<string, unknown[]> = {};
  const existing = raw.logs;
  if (isPlainObject(existing)) {
    for (const [name, entries] of Object.entries(existing)) {
      if (Array.isArray(entries)) {
        logs[name] = [...entries];
      }
    }
  }
  for (const [field, value] of Object.entries(raw)) {
    const name = legacyLogName(field);
    if (!name || !Array.isArray(value)) {
      continue;
    }
    logs[name] = [...(logs[name] ?? []), ...value];
  }
  return logs;
}

function collectContact(raw: LegacyProfile): Record<string, string> | undefined {
  const current = raw.family;
  const previous = raw.family_info;
  const source = isPlainObject(current) ? current : isPlainObject(previous) ? previous : null;
  if (!source) {
    return undefined;
  }
  const contact: Record<string, string> = {};
  for (const [legacyField, field] of LEGACY_CONTACT_FIELDS) {
    const value = source[field] ?? source[legacyField];
    if (typeof value === 'string') {
      contact[field] = value;
    }
  }
  return contact;
}

/**
 * Rebuilds a profile stored under its raw username into the current shape,
 * keyed by `canonical`. Returns null when the result still fails validation.
 */
export function migrateLegacyProfile(raw: LegacyProfile, canonical: string, fallbackColor: string): AthleteProfile | null {
  const created = raw.createdAt ?? raw.created;
  const teams = raw.teams;
  const color = raw.color;
  const candidate = {
    identity: canonical,
    pin: raw.pin,
    color: typeof color === 'string' && color ? color : fallbackColor,
    createdAt: typeof created === 'string' ? created : undefined,
    teams: Array.isArray(teams) ? teams.filter((team): team is string => typeof team === 'string') : [],
    logs: collectLogs(raw),
    family: collectContact(raw),
  };
  const parsed = AthleteProfileSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}
