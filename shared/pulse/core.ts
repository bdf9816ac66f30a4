import { loadAlerts as computeLoadAlerts } from '../aggregate/alerts';
import { monthlyGrid as computeMonthlyGrid, weeklyTotal as computeWeeklyTotal } from '../aggregate/rollups';
import type { DatedAmount, LoadAlert, MetricRecord, MonthlyGrid, TaggedLog } from '../aggregate/types';
import { CodeRegistry, type RandomBytesSource } from '../codes/registry';
import { loadConfig, type PulseConfig } from '../core/config';
import { createPulseContext, type PulseContext, type PulseContextOptions } from '../core/context';
import { createFileStore } from '../core/pstore';
import { ok, type CoreResult } from '../core/result';
import { AthleteAccounts, type RegisterOptions } from '../identity/athletes';
import { CoachAccounts } from '../identity/coaches';
import type { AthleteProfile, CoachAccount, FamilyContact, RecordInput } from '../identity/types';
import { FamilyDirectory } from '../links/families';
import { buildFamilyWeek, buildTeamOverview } from '../links/overview';
import { TeamDirectory } from '../links/teams';
import type { Family, FamilyChild, FamilyWeek, Team, TeamOverview } from '../links/types';
import { PlanLibrary } from '../plans/library';
import type { PlanGroup, PlanMeta, PlanTarget, TrainingPlan } from '../plans/types';
import { SnapshotExporter } from '../share/snapshot';
import type { ShareSnapshot } from '../share/types';
import { Staffroom } from '../staffroom/forum';
import type { ListMessagesOptions, StaffroomMessage } from '../staffroom/types';
import { createLogger } from '../telemetry/logger';

export type PulseCoreOptions = PulseContextOptions & {
  randomBytes?: RandomBytesSource;
};

/**
 * The operations a UI layer calls. Every component shares the one injected
 * store; nothing is held at module level.
 */
export class PulseCore {
  readonly ctx: PulseContext;

  readonly athletes: AthleteAccounts;

  readonly coaches: CoachAccounts;

  readonly teams: TeamDirectory;

  readonly families: FamilyDirectory;

  readonly snapshots: SnapshotExporter;

  readonly staffroom: Staffroom;

  readonly plans: PlanLibrary;

  constructor(options: PulseCoreOptions = {}) {
    this.ctx = createPulseContext(options);
    const codes = new CodeRegistry(this.ctx, options.randomBytes);
    this.athletes = new AthleteAccounts(this.ctx);
    this.coaches = new CoachAccounts(this.ctx);
    this.teams = new TeamDirectory(this.ctx, codes, this.athletes);
    this.families = new FamilyDirectory(this.ctx, codes);
    this.snapshots = new SnapshotExporter(this.ctx, codes, this.athletes);
    this.staffroom = new Staffroom(this.ctx, this.coaches);
    this.plans = new PlanLibrary(this.ctx, this.coaches, this.teams, this.athletes);
  }

  private lookupProfile = (identity: string): AthleteProfile | null => {
    const found = this.athletes.get(identity);
    return found.ok ? found.value : null;
  };

  register(identity: string, pin: string, options?: RegisterOptions): CoreResult<AthleteProfile> {
    return this.athletes.register(identity, pin, options);
  }

  authenticate(identity: string, pin: string): CoreResult<AthleteProfile> {
    return this.athletes.authenticate(identity, pin);
  }

  appendRecord(identity: string, logName: string, record: RecordInput): CoreResult<MetricRecord> {
    return this.athletes.appendRecord(identity, logName, record);
  }

  updateFamilyContact(identity: string, contact: Partial<FamilyContact>): CoreResult<AthleteProfile> {
    return this.athletes.updateFamilyContact(identity, contact);
  }

  registerCoach(identity: string, pin: string, confirmPin?: string): CoreResult<CoachAccount> {
    return this.coaches.register(identity, pin, confirmPin);
  }

  authenticateCoach(identity: string, pin: string): CoreResult<CoachAccount> {
    return this.coaches.authenticate(identity, pin);
  }

  createTeam(name: string, coach?: string): CoreResult<string> {
    const created = this.teams.create(name, coach);
    return created.ok ? ok(created.value.code) : created;
  }

  getTeam(code: string): CoreResult<Team> {
    return this.teams.get(code);
  }

  joinTeam(identity: string, code: string): CoreResult<Team> {
    return this.teams.join(identity, code);
  }

  createFamily(name?: string): CoreResult<string> {
    const created = this.families.create(name);
    return created.ok ? ok(created.value.code) : created;
  }

  ensureFamily(code: string, name?: string): CoreResult<Family> {
    return this.families.ensure(code, name);
  }

  getFamily(code: string): CoreResult<Family> {
    return this.families.get(code);
  }

  linkChild(code: string, identity: string): CoreResult<FamilyChild> {
    return this.families.link(code, identity);
  }

  createSnapshot(identity: string, logNames: readonly string[], referenceDate?: Date): CoreResult<string> {
    const created = this.snapshots.create(identity, logNames, referenceDate);
    return created.ok ? ok(created.value.code) : created;
  }

  resolveSnapshot(code: string): CoreResult<ShareSnapshot> {
    return this.snapshots.resolve(code);
  }

  weeklyTotal(records: readonly DatedAmount[], referenceDate: Date = this.ctx.now()): number {
    return computeWeeklyTotal(records, referenceDate);
  }

  monthlyGrid(subjects: readonly TaggedLog[], year: number, month: number): MonthlyGrid {
    return computeMonthlyGrid(subjects, year, month);
  }

  loadAlerts(records: readonly DatedAmount[], referenceDate: Date = this.ctx.now()): LoadAlert[] {
    return computeLoadAlerts(records, referenceDate, this.ctx.config.loadThresholds);
  }

  teamOverview(code: string, referenceDate: Date = this.ctx.now()): CoreResult<TeamOverview> {
    const team = this.teams.get(code);
    if (!team.ok) {
      return team;
    }
    return ok(buildTeamOverview(team.value, this.lookupProfile, referenceDate));
  }

  familyWeek(code: string, referenceDate: Date = this.ctx.now()): CoreResult<FamilyWeek> {
    const family = this.families.get(code);
    if (!family.ok) {
      return family;
    }
    return ok(buildFamilyWeek(family.value, this.lookupProfile, referenceDate));
  }

  postMessage(coach: string, text: string, teamCode?: string): CoreResult<StaffroomMessage> {
    return this.staffroom.post(coach, text, teamCode);
  }

  listMessages(options?: ListMessagesOptions): StaffroomMessage[] {
    return this.staffroom.list(options);
  }

  assignPlan(coach: string, target: PlanTarget, meta: PlanMeta): CoreResult<TrainingPlan> {
    return this.plans.assign(coach, target, meta);
  }

  listPlans(target: PlanTarget, limit?: number): CoreResult<TrainingPlan[]> {
    return this.plans.list(target, limit);
  }

  listPlansFor(identity: string, limit?: number): CoreResult<PlanGroup[]> {
    return this.plans.listFor(identity, limit);
  }
}

export function createPulseCore(options: PulseCoreOptions = {}): PulseCore {
  return new PulseCore(options);
}

/** File-backed core configured from the environment (`PULSE_DATA_DIR` and friends). */
export function openPulseCore(env: Record<string, string | undefined> = process.env, overrides?: Partial<PulseConfig>): PulseCore {
  const config = loadConfig(env, overrides);
  const logger = createLogger({ level: config.logLevel });
  return new PulseCore({
    config,
    logger,
    store: createFileStore(config.dataDir, logger.child('store')),
  });
}
