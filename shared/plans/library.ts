import type { PulseContext } from '../core/context';
import { planIndexKey } from '../core/keys';
import { fail, ok, type CoreResult } from '../core/result';
import { normalizeCode } from '../codes/registry';
import type { AthleteAccounts } from '../identity/athletes';
import { canonicalize } from '../identity/canonical';
import type { CoachAccounts } from '../identity/coaches';
import type { TeamDirectory } from '../links/teams';
import type { Logger } from '../telemetry/logger';
import {
  PlanIndexSchema,
  type PlanGroup,
  type PlanIndex,
  type PlanMeta,
  type PlanTarget,
  type PlanTargetType,
  type TrainingPlan,
} from './types';

export const ATHLETE_PLAN_LIMIT = 30;
export const BROWSE_PLAN_LIMIT = 20;

const EMPTY_INDEX: PlanIndex = { plans: [] };

type ResolvedTarget = { type: PlanTargetType; id: string };

function capOf(limit: number, fallback: number): number {
  return Number.isInteger(limit) && limit > 0 ? limit : fallback;
}

function newestFirst(plans: readonly TrainingPlan[], limit: number): TrainingPlan[] {
  return plans.slice(-limit).reverse();
}

/**
 * Training plans a coach routes to a team or a single athlete. An athlete
 * sees their own plans plus those of every team they belong to.
 */
export class PlanLibrary {
  private readonly ctx: PulseContext;

  private readonly coaches: CoachAccounts;

  private readonly teams: TeamDirectory;

  private readonly athletes: AthleteAccounts;

  private readonly log: Logger;

  constructor(ctx: PulseContext, coaches: CoachAccounts, teams: TeamDirectory, athletes: AthleteAccounts) {
    this.ctx = ctx;
    this.coaches = coaches;
    this.teams = teams;
    this.athletes = athletes;
    this.log = ctx.logger.child('plans');
  }

  private index(target: ResolvedTarget): PlanIndex {
    return this.ctx.store.get(planIndexKey(target.type, target.id), PlanIndexSchema, EMPTY_INDEX);
  }

  private resolve(target: PlanTarget): CoreResult<ResolvedTarget> {
    if (target.type === 'team') {
      const team = this.teams.get(target.code);
      return team.ok ? ok<ResolvedTarget>({ type: 'team', id: team.value.code }) : team;
    }
    const athlete = this.athletes.get(target.identity);
    return athlete.ok ? ok<ResolvedTarget>({ type: 'athlete', id: athlete.value.identity }) : athlete;
  }

  assign(coach: string, target: PlanTarget, meta: PlanMeta): CoreResult<TrainingPlan> {
    const author = this.coaches.get(coach);
    if (!author.ok) {
      return author;
    }
    const file = typeof meta.file === 'string' ? meta.file.trim() : '';
    if (!file) {
      return fail('InvalidInput', 'plan file reference is required');
    }
    const resolved = this.resolve(target);
    if (!resolved.ok) {
      return resolved;
    }
    const title = typeof meta.title === 'string' ? meta.title.trim() : '';
    const plan: TrainingPlan = {
      file,
      title: title || file,
      uploadedAt: this.ctx.now().toISOString(),
      assignedTo: resolved.value.id,
      type: resolved.value.type,
      uploadedBy: author.value.identity,
    };
    const current = this.index(resolved.value);
    const saved = this.ctx.store.put(planIndexKey(resolved.value.type, resolved.value.id), {
      plans: [...current.plans, plan],
    });
    if (!saved.ok) {
      return saved;
    }
    this.log.info('plan assigned', { type: plan.type, assignedTo: plan.assignedTo, uploadedBy: plan.uploadedBy });
    return ok(plan);
  }

  /** Coach view of one target's plans, newest first. Targets nobody assigned to are empty. */
  list(target: PlanTarget, limit: number = BROWSE_PLAN_LIMIT): CoreResult<TrainingPlan[]> {
    const id = target.type === 'team' ? normalizeCode(target.code) : canonicalize(target.identity);
    if (!id) {
      return fail('InvalidInput', 'plan target is required');
    }
    return ok(newestFirst(this.index({ type: target.type, id }).plans, capOf(limit, BROWSE_PLAN_LIMIT)));
  }

  /**
   * Direct assignments first, then one group per team membership in join
   * order; each group newest first and capped. Sources without plans are left out.
   */
  listFor(athlete: string, limit: number = ATHLETE_PLAN_LIMIT): CoreResult<PlanGroup[]> {
    const profile = this.athletes.get(athlete);
    if (!profile.ok) {
      return profile;
    }
    const sources: ResolvedTarget[] = [
      { type: 'athlete', id: profile.value.identity },
      ...profile.value.teams.map((code): ResolvedTarget => ({ type: 'team', id: code })),
    ];
    const groups: PlanGroup[] = [];
    for (const source of sources) {
      const plans = newestFirst(this.index(source).plans, capOf(limit, ATHLETE_PLAN_LIMIT));
      if (plans.length > 0) {
        groups.push({ type: source.type, assignedTo: source.id, plans });
      }
    }
    return ok(groups);
  }
}
