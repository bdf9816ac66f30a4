import type { PulseContext } from '../core/context';
import { teamKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { normalizeCode, type CodeRegistry } from '../codes/registry';
import type { AthleteAccounts } from '../identity/athletes';
import type { Logger } from '../telemetry/logger';
import { TeamSchema, type Team } from './types';

export class TeamDirectory {
  private readonly ctx: PulseContext;

  private readonly codes: CodeRegistry;

  private readonly athletes: AthleteAccounts;

  private readonly log: Logger;

  constructor(ctx: PulseContext, codes: CodeRegistry, athletes: AthleteAccounts) {
    this.ctx = ctx;
    this.codes = codes;
    this.athletes = athletes;
    this.log = ctx.logger.child('teams');
  }

  private load(code: string): Team | null {
    return this.ctx.store.get(teamKey(code), TeamSchema, null);
  }

  create(name: string, coach?: string): CoreResult<Team> {
    const trimmed = typeof name === 'string' ? name.trim() : '';
    if (!trimmed) {
      return fail('InvalidInput', 'team name is required');
    }
    const issued = this.codes.issue('team', (code) => this.load(code) !== null);
    if (!issued.ok) {
      return issued;
    }
    const team: Team = {
      code: issued.value,
      name: trimmed,
      coach: coach ?? null,
      roster: [],
      createdAt: this.ctx.now().toISOString(),
    };
    const saved = this.ctx.store.put(teamKey(team.code), team);
    if (!saved.ok) {
      return saved;
    }
    this.log.info('team created', { code: team.code });
    return ok(team);
  }

  get(rawCode: string): CoreResult<Team> {
    const code = normalizeCode(rawCode);
    const team = code ? this.load(code) : null;
    return team ? ok(team) : fail('NotFound', 'team not found', { code });
  }

  /** Adds the athlete to the roster and the team to the athlete's profile; repeats are no-ops. */
  join(athlete: string, rawCode: string): CoreResult<Team> {
    const found = this.get(rawCode);
    if (!found.ok) {
      return found;
    }
    const team = found.value;
    const profile = this.athletes.get(athlete);
    if (!profile.ok) {
      return profile;
    }
    const identity = profile.value.identity;
    let next = team;
    if (!team.roster.includes(identity)) {
      next = { ...team, roster: [...team.roster, identity] };
      const saved = this.ctx.store.put(teamKey(team.code), next);
      if (!saved.ok) {
        return saved;
      }
      this.log.info('athlete joined team', { code: team.code, identity });
    }
    if (!profile.value.teams.includes(team.code)) {
      const updated = this.athletes.update(identity, (current) => ({
        ...current,
        teams: current.teams.includes(team.code) ? current.teams : [...current.teams, team.code],
      }));
      if (!updated.ok) {
        return updated;
      }
    }
    return ok(next);
  }
}
