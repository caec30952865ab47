/**
 * Engine facade
 *
 * Wires the profile, both ledgers, the trigger evaluator and the dispatcher
 * behind the three host events: daily check-in, background tick and location
 * update. Every method runs to completion synchronously, so calls never
 * interleave.
 */

import { DEFAULT_TIMEZONE } from './config';
import { deliver, DispatchContext, render } from './interventions';
import { createLogger, Logger } from './logger';
import { createDefaultProfile, ProfileStore } from './profile';
import { RewardLedger } from './rewardLedger';
import { toLocalDateString, toTimeOfDay } from './time';
import { matchLocation, matchTime, TriggerMatch } from './triggers';
import { UsageLedger, validateSample } from './usageLedger';
import {
  DailyResult,
  DateKey,
  DistanceFn,
  Intervention,
  InterventionKind,
  LocationFix,
  Milestones,
  NotificationPayload,
  Notifier,
  RandomSource,
  Reward,
  RewardState,
  Trigger,
  UsageSample,
} from './types';

export interface EngineOptions {
  profile?: ProfileStore;
  timezone?: string; // IANA timezone, defaults to UTC
  random?: RandomSource;
  distance?: DistanceFn;
  notifier?: Notifier;
  logger?: Logger;
  rewards?: readonly Reward[];
  milestones?: Milestones;
}

/**
 * What a fired trigger produced
 */
export interface Dispatch {
  trigger: Trigger;
  intervention: Intervention;
  payload?: NotificationPayload; // undefined when the kind has no content
}

export class HabitEngine {
  readonly profile: ProfileStore;
  readonly usage = new UsageLedger();
  private readonly rewards: RewardLedger;
  private readonly timezone: string;
  private readonly random: RandomSource;
  private readonly distance?: DistanceFn;
  private readonly notifier?: Notifier;
  private readonly logger: Logger;
  private readonly counts = new Map<InterventionKind, number>();

  constructor(options: EngineOptions = {}) {
    this.profile = options.profile ?? createDefaultProfile();
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.random = options.random ?? Math.random;
    this.distance = options.distance;
    this.notifier = options.notifier;
    this.logger = options.logger ?? createLogger('Habit Engine');
    this.rewards = new RewardLedger({
      rewards: options.rewards,
      milestones: options.milestones,
      notifier: options.notifier,
      logger: this.logger,
    });
  }

  record(sample: UsageSample): number {
    const streak = this.usage.record(sample, this.profile);

    if (this.profile.limitFor(sample.app) === undefined) {
      this.logger.debug(
        `No limit for ${sample.app}; streak left at ${streak}`
      );
    }

    return streak;
  }

  /**
   * Record the day's samples, evaluate points/milestones/rewards and keep a
   * progress snapshot. Calling it twice for one day awards twice.
   *
   * Pass each app's sample for a day at most once, here or through
   * backgroundTick: every under-limit record extends the streak.
   */
  dailyCheckIn(date: DateKey, samples: readonly UsageSample[] = []): DailyResult {
    this.recordAll(samples);

    const result = this.rewards.evaluateDaily(
      this.profile,
      this.usage.usageOn(date),
      this.usage.streaks()
    );
    this.usage.snapshotProgress(date, this.profile);

    this.logger.info(
      `Check-in ${date}: +${result.pointsEarned} points, ` +
        `${result.milestonesHit.length} milestone(s), ` +
        `${result.rewardsGranted.length} reward(s)`
    );

    return result;
  }

  /**
   * Periodic host tick: record the given samples, then check the time
   * triggers against the local clock.
   *
   * Usage is cumulative per day, so hand over each app's sample at most once
   * per day (here or through dailyCheckIn); recording it on every tick adds a
   * streak day per tick.
   */
  backgroundTick(
    now: Date = new Date(),
    samples: readonly UsageSample[] = []
  ): Dispatch | undefined {
    const today = toLocalDateString(now, this.timezone);
    this.recordAll(samples);

    const match = matchTime(
      toTimeOfDay(now, this.timezone),
      this.profile.timeTriggers(),
      this.profile.interventionCatalog,
      this.random
    );

    return match && this.dispatch(match, today);
  }

  onLocation(fix: LocationFix, now: Date = new Date()): Dispatch | undefined {
    const match = matchLocation(
      fix,
      this.profile.locationTriggers(),
      this.profile.interventionCatalog,
      this.random,
      this.distance
    );

    return match && this.dispatch(match, toLocalDateString(now, this.timezone));
  }

  rewardState(): RewardState {
    return this.rewards.state();
  }

  /**
   * How often each intervention kind has fired
   */
  interventionCounts(): ReadonlyMap<InterventionKind, number> {
    return new Map(this.counts);
  }

  /**
   * All or nothing: one bad sample rejects the batch before anything is stored
   */
  private recordAll(samples: readonly UsageSample[]): void {
    samples.forEach(validateSample);

    for (const sample of samples) {
      this.record(sample);
    }
  }

  private dispatch(match: TriggerMatch<Trigger>, today: DateKey): Dispatch {
    const { trigger, intervention } = match;
    const kind = intervention.kind;

    this.counts.set(kind, (this.counts.get(kind) ?? 0) + 1);
    this.logger.info(
      `${describeTrigger(trigger)} fired → ${intervention.name} (${kind})`
    );

    const payload = render(intervention, this.heaviestApp(today));
    if (payload) {
      deliver(this.notifier, payload, this.logger);
    }

    return { trigger, intervention, payload };
  }

  /**
   * Target app with the most usage today (first listed wins ties)
   */
  private heaviestApp(date: DateKey): DispatchContext {
    let context: DispatchContext = { minutes: 0 };

    for (const app of this.profile.targetApps) {
      const minutes = this.usage.usage(date, app);
      if (context.app === undefined || minutes > context.minutes) {
        context = { app, minutes };
      }
    }

    return context;
  }
}

function describeTrigger(trigger: Trigger): string {
  return trigger.kind === 'time'
    ? `Time trigger ${trigger.time}`
    : `Location trigger "${trigger.name}"`;
}
