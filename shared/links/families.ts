import { pickRandom, type PulseContext } from '../core/context';
import { familyKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { isUserCode, normalizeCode, type CodeRegistry } from '../codes/registry';
import { canonicalize } from '../identity/canonical';
import type { Logger } from '../telemetry/logger';
import { FamilySchema, type Family, type FamilyChild } from './types';

/**
 * First palette color no sibling uses yet; once every color is taken, any
 * palette color at random.
 */
export function pickChildColor(
  siblings: readonly FamilyChild[],
  palette: readonly string[],
  random: () => number,
): string {
  const used = new Set(siblings.map((child) => child.color));
  const free = palette.find((color) => !used.has(color));
  if (free) {
    return free;
  }
  return pickRandom(palette, random) ?? '';
}

export class FamilyDirectory {
  private readonly ctx: PulseContext;

  private readonly codes: CodeRegistry;

  private readonly log: Logger;

  constructor(ctx: PulseContext, codes: CodeRegistry) {
    this.ctx = ctx;
    this.codes = codes;
    this.log = ctx.logger.child('families');
  }

  private load(code: string): Family | null {
    return this.ctx.store.get(familyKey(code), FamilySchema, null);
  }

  private familyName(name: string | undefined): string {
    const trimmed = typeof name === 'string' ? name.trim() : '';
    return trimmed || this.ctx.config.defaultFamilyName;
  }

  private save(family: Family): CoreResult<void> {
    return this.ctx.store.put(familyKey(family.code), family);
  }

  create(name?: string): CoreResult<Family> {
    const issued = this.codes.issue('family', (code) => this.load(code) !== null);
    if (!issued.ok) {
      return issued;
    }
    const family: Family = {
      code: issued.value,
      name: this.familyName(name),
      children: [],
      createdAt: this.ctx.now().toISOString(),
    };
    const saved = this.save(family);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('family created', { code: family.code });
    return ok(family);
  }

  /** Creates the family under a caller-chosen code when missing; an existing family is returned unchanged. */
  ensure(rawCode: string, name?: string): CoreResult<Family> {
    const code = normalizeCode(rawCode);
    if (!code || !isUserCode(code)) {
      return fail('InvalidInput', 'family code must be letters, digits, "-" or "_"', { code });
    }
    const existing = this.load(code);
    if (existing) {
      return ok(existing);
    }
    const family: Family = {
      code,
      name: this.familyName(name),
      children: [],
      createdAt: this.ctx.now().toISOString(),
    };
    const reserved = this.codes.reserve('family', code);
    if (!reserved.ok) {
      return reserved;
    }
    const saved = this.save(family);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('family created', { code, explicitCode: true });
    return ok(family);
  }

  get(rawCode: string): CoreResult<Family> {
    const code = normalizeCode(rawCode);
    const family = code ? this.load(code) : null;
    return family ? ok(family) : fail('NotFound', 'family not found', { code });
  }

  /** Unknown codes fail; callers that want a family created first call `ensure`. */
  link(rawCode: string, athlete: string): CoreResult<FamilyChild> {
    const identity = canonicalize(athlete);
    if (!identity) {
      return fail('InvalidInput', 'identity is required');
    }
    const found = this.get(rawCode);
    if (!found.ok) {
      return found;
    }
    const family = found.value;
    const linked = family.children.find((child) => child.identity === identity);
    if (linked) {
      return ok(linked);
    }
    const child: FamilyChild = {
      identity,
      color: pickChildColor(family.children, this.ctx.config.palette, this.ctx.random),
    };
    const saved = this.save({ ...family, children: [...family.children, child] });
    if (!saved.ok) {
      return saved;
    }
    this.log.info('child linked', { code: family.code, identity, color: child.color });
    return ok(child);
  }
}
