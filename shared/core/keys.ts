import type { CodeNamespace } from '../codes/types';
import type { PlanTargetType } from '../plans/types';

export const STAFFROOM_KEY = 'staffroom';

export function athleteKey(canonical: string): string {
  return `athlete:${canonical}`;
}

/** Profiles written before usernames were normalized live under the raw, trimmed name. */
export function legacyAthleteKey(raw: string): string {
  return `athlete-legacy:${raw.trim()}`;
}

export function coachKey(canonical: string): string {
  return `coach:${canonical}`;
}

export function teamKey(code: string): string {
  return `team:${code}`;
}

export function familyKey(code: string): string {
  return `family:${code}`;
}

export function shareKey(code: string): string {
  return `share:${code}`;
}

export function codeIndexKey(namespace: CodeNamespace): string {
  return `codes:${namespace}`;
}

export function planIndexKey(type: PlanTargetType, id: string): string {
  return `plans:${type}:${id}`;
}
