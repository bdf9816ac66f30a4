import { isoWeekId } from '../aggregate/dates';
import { monthlyGrid, weeklyTotal } from '../aggregate/rollups';
import type { TaggedLog } from '../aggregate/types';
import type { AthleteProfile } from '../identity/types';
import type { Family, FamilyWeek, Team, TeamOverview } from './types';

export const OVERVIEW_LOG = 'training';

export type ProfileLookup = (identity: string) => AthleteProfile | null;

export function buildTeamOverview(
  team: Team,
  lookup: ProfileLookup,
  referenceDate: Date,
  logName: string = OVERVIEW_LOG,
): TeamOverview {
  const rows = team.roster.map((identity) => {
    const profile = lookup(identity);
    return {
      identity,
      color: profile?.color ?? null,
      weeklyTotal: profile ? weeklyTotal(profile.logs[logName] ?? [], referenceDate) : 0,
      found: profile !== null,
    };
  });
  return { code: team.code, name: team.name, week: isoWeekId(referenceDate), rows };
}

/**
 * Weekly totals per child plus the month grid of the reference date, tagged
 * by child identity. Children whose profile is missing count as zero.
 */
export function buildFamilyWeek(
  family: Family,
  lookup: ProfileLookup,
  referenceDate: Date,
  logName: string = OVERVIEW_LOG,
): FamilyWeek {
  const subjects: TaggedLog[] = [];
  const children = family.children.map((child) => {
    const profile = lookup(child.identity);
    const records = profile?.logs[logName] ?? [];
    subjects.push({ tag: child.identity, records });
    return {
      identity: child.identity,
      color: child.color,
      weeklyTotal: weeklyTotal(records, referenceDate),
      found: profile !== null,
    };
  });
  return {
    code: family.code,
    name: family.name,
    week: isoWeekId(referenceDate),
    children,
    month: monthlyGrid(subjects, referenceDate.getFullYear(), referenceDate.getMonth() + 1),
  };
}
