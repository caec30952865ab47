/**
 * Reward ledger
 *
 * Daily points for staying under limits and holding streaks, exact-length
 * milestones, and reward grants swept from the catalog.
 *
 * Idempotency per calendar day is the caller's responsibility.
 */

import {
  DEFAULT_MILESTONES,
  DEFAULT_REWARDS,
  MAX_STREAK_POINTS,
  POINTS_UNDER_HALF_LIMIT,
  POINTS_UNDER_LIMIT,
  STREAK_POINTS_PER_DAY,
} from './config';
import { ConfigurationError } from './errors';
import { deliver } from './interventions';
import { Logger, silentLogger } from './logger';
import {
  AppId,
  DailyResult,
  MilestoneHit,
  Milestones,
  NotificationPayload,
  Notifier,
  Profile,
  Reward,
  RewardState,
  StreakState,
} from './types';

export interface RewardLedgerOptions {
  rewards?: readonly Reward[];
  milestones?: Milestones;
  notifier?: Notifier;
  logger?: Logger;
}

export class RewardLedger {
  private points = 0;
  private readonly granted: string[] = [];
  private readonly rewards: readonly Reward[];
  private readonly milestoneLengths: [number, string][];
  private readonly notifier?: Notifier;
  private readonly logger: Logger;

  constructor(options: RewardLedgerOptions = {}) {
    this.rewards = validateRewards(options.rewards ?? DEFAULT_REWARDS);
    this.milestoneLengths = [
      ...(options.milestones ?? DEFAULT_MILESTONES),
    ].sort(([a], [b]) => a - b);
    this.notifier = options.notifier;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the daily evaluation against today's usage and current streaks.
   * Missing usage for a limited app counts as 0 minutes.
   */
  evaluateDaily(
    profile: Profile,
    todayUsage: ReadonlyMap<AppId, number>,
    streaks: StreakState
  ): DailyResult {
    if (profile.dailyLimitMinutes.size === 0) {
      throw new ConfigurationError(
        'NO_LIMITS_CONFIGURED',
        'Daily evaluation needs at least one app limit'
      );
    }

    let pointsEarned = 0;

    for (const [app, limit] of profile.dailyLimitMinutes) {
      pointsEarned += limitPoints(todayUsage.get(app) ?? 0, limit);
    }

    const milestonesHit: MilestoneHit[] = [];

    for (const [app, streak] of streaks) {
      if (streak <= 0) continue;

      pointsEarned += streakPoints(streak);

      for (const [length, label] of this.milestoneLengths) {
        if (streak === length) {
          milestonesHit.push({ app, label });
        }
      }
    }

    this.points += pointsEarned;

    for (const hit of milestonesHit) {
      this.logger.info(`Milestone "${hit.label}" reached for ${hit.app}`);
      deliver(this.notifier, milestoneNotification(hit), this.logger);
    }

    const rewardsGranted = this.sweep();

    return { pointsEarned, milestonesHit, rewardsGranted };
  }

  state(): RewardState {
    return { points: this.points, grantedRewards: [...this.granted] };
  }

  /**
   * One pass over the catalog in order; each entry is granted at most once
   * per pass, so earlier (cheaper) entries are paid for first.
   */
  private sweep(): string[] {
    const grantedNow: string[] = [];

    for (const reward of this.rewards) {
      if (this.points >= reward.costPoints) {
        this.points -= reward.costPoints;
        this.granted.push(reward.name);
        grantedNow.push(reward.name);

        this.logger.info(
          `Granted ${reward.name} (-${reward.costPoints}, ${this.points} left)`
        );
        deliver(this.notifier, rewardNotification(reward.name), this.logger);
      }
    }

    return grantedNow;
  }
}

/**
 * +20 at/under the limit, +20 more at/under half of it (integer division)
 */
export function limitPoints(usage: number, limit: number): number {
  if (usage > limit) return 0;

  return usage <= Math.floor(limit / 2)
    ? POINTS_UNDER_LIMIT + POINTS_UNDER_HALF_LIMIT
    : POINTS_UNDER_LIMIT;
}

/**
 * 5 per streak day, capped at 50
 */
export function streakPoints(streak: number): number {
  if (streak <= 0) return 0;
  return Math.min(streak * STREAK_POINTS_PER_DAY, MAX_STREAK_POINTS);
}

export function milestoneNotification(hit: MilestoneHit): NotificationPayload {
  return {
    title: 'Milestone Achieved',
    body: `Congratulations! You've achieved ${hit.label} for ${hit.app}!`,
  };
}

export function rewardNotification(reward: string): NotificationPayload {
  return {
    title: 'Reward Earned',
    body: `You've earned the ${reward}!`,
  };
}

function validateRewards(rewards: readonly Reward[]): readonly Reward[] {
  for (const reward of rewards) {
    if (!Number.isInteger(reward.costPoints) || reward.costPoints <= 0) {
      throw new ConfigurationError(
        'INVALID_CATALOG',
        `Reward "${reward.name}" must cost a positive whole number of points`
      );
    }
  }
  return rewards.map(r => ({ ...r }));
}
