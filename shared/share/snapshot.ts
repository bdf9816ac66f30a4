import { isoWeekId } from '../aggregate/dates';
import { weeklyTotalsByLog } from '../aggregate/rollups';
import type { MetricRecord } from '../aggregate/types';
import type { PulseContext } from '../core/context';
import { shareKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { normalizeCode, type CodeRegistry } from '../codes/registry';
import type { AthleteAccounts } from '../identity/athletes';
import type { Logger } from '../telemetry/logger';
import { ShareSnapshotSchema, type ShareSnapshot } from './types';

/**
 * Publishes point-in-time copies of an athlete's logs under share codes.
 * Anyone holding a code can read the snapshot; codes never expire.
 */
export class SnapshotExporter {
  private readonly ctx: PulseContext;

  private readonly codes: CodeRegistry;

  private readonly athletes: AthleteAccounts;

  private readonly log: Logger;

  constructor(ctx: PulseContext, codes: CodeRegistry, athletes: AthleteAccounts) {
    this.ctx = ctx;
    this.codes = codes;
    this.athletes = athletes;
    this.log = ctx.logger.child('share');
  }

  private load(code: string): ShareSnapshot | null {
    return this.ctx.store.get(shareKey(code), ShareSnapshotSchema, null);
  }

  create(athlete: string, logNames: readonly string[], referenceDate?: Date): CoreResult<ShareSnapshot> {
    const names: string[] = [];
    for (const raw of logNames) {
      const name = typeof raw === 'string' ? raw.trim() : '';
      if (!name) {
        return fail('InvalidInput', 'log names must be non-empty');
      }
      if (!names.includes(name)) {
        names.push(name);
      }
    }
    const profile = this.athletes.get(athlete);
    if (!profile.ok) {
      return profile;
    }
    const issued = this.codes.issue('share', (code) => this.load(code) !== null);
    if (!issued.ok) {
      return issued;
    }
    const generatedAt = this.ctx.now();
    const reference = referenceDate ?? generatedAt;
    const logs: Record<string, MetricRecord[]> = {};
    for (const name of names) {
      logs[name] = (profile.value.logs[name] ?? []).map((record) => ({ ...record }));
    }
    const snapshot: ShareSnapshot = {
      code: issued.value,
      identity: profile.value.identity,
      generatedAt: generatedAt.toISOString(),
      week: isoWeekId(reference),
      logs,
      weeklyTotals: weeklyTotalsByLog(logs, names, reference),
    };
    const saved = this.ctx.store.put(shareKey(snapshot.code), snapshot);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('snapshot created', { code: snapshot.code, identity: snapshot.identity, logs: names });
    return ok(snapshot);
  }

  resolve(rawCode: string): CoreResult<ShareSnapshot> {
    const code = normalizeCode(rawCode);
    const snapshot = code ? this.load(code) : null;
    return snapshot ? ok(snapshot) : fail('NotFound', 'snapshot not found', { code });
  }
}
