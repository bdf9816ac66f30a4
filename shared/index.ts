export { createPulseCore, openPulseCore, PulseCore, type PulseCoreOptions } from './pulse/core';
export { CoreError, fail, ok, unwrap, type CoreErrorCode, type CoreResult } from './core/result';
export { DEFAULT_CONFIG, loadConfig, normalizeConfig, type PulseConfig } from './core/config';
export { DocumentStore, createFileStore, createMemoryStore, type StorageBackend } from './core/pstore';
export { createLogger, formatLog, type LogEntry, type Logger, type LogLevel } from './telemetry/logger';
export { canonicalize } from './identity/canonical';
export { generateCode, normalizeCode } from './codes/registry';
export { combine, dailyTotal, monthlyGrid, weeklyTotal, weeklyTotalsByLog } from './aggregate/rollups';
export { loadAlerts, weeklyBand } from './aggregate/alerts';
export { parseRecordDate, isoWeekId } from './aggregate/dates';
export type { DatedAmount, LoadAlert, MetricRecord, MonthlyDay, MonthlyGrid, TaggedLog } from './aggregate/types';
export type { AthleteProfile, CoachAccount, FamilyContact, RecordInput } from './identity/types';
export type { Family, FamilyChild, FamilyWeek, Team, TeamOverview } from './links/types';
export type { ShareSnapshot } from './share/types';
export type { StaffroomMessage } from './staffroom/types';
export type { PlanGroup, PlanMeta, PlanTarget, TrainingPlan } from './plans/types';
