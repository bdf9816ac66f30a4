const DISALLOWED = /[^A-Za-z0-9._-]/g;

/**
 * Canonical lookup key for a user-typed identity: every character outside
 * letters, digits, `.`, `_` and `-` is dropped (spaces included), then the
 * rest is lower-cased. An empty result is never a valid key.
 */
export function canonicalize(raw: string | null | undefined): string {
  if (typeof raw !== 'string') {
    return '';
  }
  return raw.replace(DISALLOWED, '').toLowerCase();
}
