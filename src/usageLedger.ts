/**
 * Usage ledger
 *
 * Per-day usage minutes keyed by (date, app), plus the streak counters derived
 * from them. The profile is read per call and never written.
 */

import { WARNING_RATIO } from './config';
import { ConfigurationError } from './errors';
import { isDateKey } from './time';
import {
  AppId,
  DateKey,
  Profile,
  ProgressHistory,
  StreakState,
  UsageSample,
  UsageStatus,
} from './types';

export class UsageLedger {
  private readonly days = new Map<DateKey, Map<AppId, number>>();
  private readonly streakState = new Map<AppId, number>();
  private readonly history = new Map<DateKey, ReadonlyMap<AppId, number>>();

  /**
   * Store (overwrite) the sample, then re-apply the streak rule for its app.
   *
   * The rule starts from the current streak, not from the previous day's
   * value: recording the same under-limit day twice counts it twice. Callers
   * record each app at most once per day, in day order.
   *
   * @returns the app's streak after the update
   */
  record(sample: UsageSample, profile: Profile): number {
    validateSample(sample);

    let day = this.days.get(sample.date);
    if (!day) {
      day = new Map();
      this.days.set(sample.date, day);
    }
    day.set(sample.app, sample.minutes);

    const limit = profile.dailyLimitMinutes.get(sample.app);
    if (limit === undefined) {
      return this.streak(sample.app);
    }

    const next = sample.minutes <= limit ? this.streak(sample.app) + 1 : 0;
    this.streakState.set(sample.app, next);

    return next;
  }

  /**
   * Recorded minutes, or 0 when nothing was recorded
   */
  usage(date: DateKey, app: AppId): number {
    return this.days.get(date)?.get(app) ?? 0;
  }

  usageOn(date: DateKey): Map<AppId, number> {
    return new Map(this.days.get(date));
  }

  streak(app: AppId): number {
    return this.streakState.get(app) ?? 0;
  }

  streaks(): StreakState {
    return new Map(this.streakState);
  }

  /**
   * Capture the day's usage of every target app (0 where unrecorded)
   */
  snapshotProgress(date: DateKey, profile: Profile): ReadonlyMap<AppId, number> {
    const progress = new Map<AppId, number>();
    for (const app of profile.targetApps) {
      progress.set(app, this.usage(date, app));
    }

    this.history.set(date, progress);
    return progress;
  }

  progress(date: DateKey): ReadonlyMap<AppId, number> | undefined {
    return this.history.get(date);
  }

  progressHistory(): ProgressHistory {
    return new Map(this.history);
  }
}

/**
 * over: above the limit; warning: above 80% of it; ok otherwise or unlimited
 */
export function classifyUsage(minutes: number, limit?: number): UsageStatus {
  if (limit === undefined) return 'ok';
  if (minutes > limit) return 'over';
  if (minutes > limit * WARNING_RATIO) return 'warning';
  return 'ok';
}

/**
 * Throws INVALID_SAMPLE for a malformed date, app id or minute count
 */
export function validateSample(sample: UsageSample): void {
  if (!isDateKey(sample.date)) {
    throw new ConfigurationError(
      'INVALID_SAMPLE',
      `Sample date "${sample.date}" is not a YYYY-MM-DD calendar day`
    );
  }
  if (!sample.app.trim()) {
    throw new ConfigurationError('INVALID_SAMPLE', 'Sample app id is empty');
  }
  if (!Number.isInteger(sample.minutes) || sample.minutes < 0) {
    throw new ConfigurationError(
      'INVALID_SAMPLE',
      `Usage for "${sample.app}" must be whole minutes ≥ 0 (got ${sample.minutes})`
    );
  }
}
