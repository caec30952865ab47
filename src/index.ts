export * from './types';
export * from './errors';
export * from './config';
export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';
export { ProfileStore, createDefaultProfile } from './profile';
export type { TriggerInput } from './profile';
export { UsageLedger, classifyUsage, validateSample } from './usageLedger';
export {
  RewardLedger,
  limitPoints,
  streakPoints,
  milestoneNotification,
  rewardNotification,
} from './rewardLedger';
export type { RewardLedgerOptions } from './rewardLedger';
export {
  checkTime,
  checkLocation,
  matchTime,
  matchLocation,
  selectIntervention,
  distanceMeters,
} from './triggers';
export type { TriggerMatch } from './triggers';
export { render, dailyCheckInNotification, deliver } from './interventions';
export type { DispatchContext } from './interventions';
export { HabitEngine } from './engine';
export type { EngineOptions, Dispatch } from './engine';
export {
  fetchUsageSamples,
  batchFetchUsageSamples,
  toUsageSample,
} from './queries';
export type { UsageDatabase, UsageQuery } from './queries';
export { toLocalDateString, toTimeOfDay, normalizeTimeOfDay } from './time';
