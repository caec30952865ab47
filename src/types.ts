/**
 * Type definitions for the habit intervention engine
 * Usage samples in, streaks/rewards/interventions out
 */

/**
 * Identifier of a tracked application (e.g. "Instagram")
 */
export type AppId = string;

/**
 * Calendar day, YYYY-MM-DD (local to user timezone)
 */
export type DateKey = string;

/**
 * Time of day, HH:mm, 24h, zero padded
 */
export type TimeOfDay = string;

/**
 * Emotional state mapped to a replacement suggestion
 */
export interface EmotionCue {
  emotion: string;
  replacement: string;
}

/**
 * Read-only view of the user's configuration
 */
export interface Profile {
  targetApps: ReadonlySet<AppId>;
  dailyLimitMinutes: ReadonlyMap<AppId, number>; // keys ⊆ targetApps
  replacementActivities: readonly string[];
  implementationIntentions: readonly string[];
  emotionCues: readonly EmotionCue[];
}

/**
 * One observed usage value for an app on a day.
 * Cumulative per day: a later sample for the same key replaces the earlier one.
 */
export interface UsageSample {
  date: DateKey;
  app: AppId;
  minutes: number;
}

/**
 * Consecutive days at/under limit, per app (absent = 0)
 */
export type StreakState = ReadonlyMap<AppId, number>;

/**
 * Per-day usage of every target app, captured at check-in
 */
export type ProgressHistory = ReadonlyMap<DateKey, ReadonlyMap<AppId, number>>;

/**
 * Dashboard classification of a day's usage against its limit
 */
export type UsageStatus = 'ok' | 'warning' | 'over';

export interface Reward {
  name: string;
  costPoints: number; // > 0
}

/**
 * Streak length → label. Fires on exact match only.
 */
export type Milestones = ReadonlyMap<number, string>;

export interface RewardState {
  points: number;
  grantedRewards: readonly string[]; // every grant, in order (may repeat)
}

export interface MilestoneHit {
  app: AppId;
  label: string;
}

/**
 * Outcome of one daily evaluation
 */
export interface DailyResult {
  pointsEarned: number;
  milestonesHit: MilestoneHit[];
  rewardsGranted: string[];
}

export interface TimeTrigger {
  kind: 'time';
  time: TimeOfDay;
}

export interface LocationTrigger {
  kind: 'location';
  name: string;
  latitude: number;
  longitude: number;
  radiusMeters: number;
}

export type Trigger = TimeTrigger | LocationTrigger;

/**
 * Resolved position from the location provider
 */
export interface LocationFix {
  latitude: number;
  longitude: number;
}

export type InterventionKind =
  | 'obvious'
  | 'unattractive'
  | 'difficult'
  | 'unsatisfying';

export interface Intervention {
  kind: InterventionKind;
  name: string;
  actionDescription: string;
}

/**
 * What the notifier collaborator receives
 */
export interface NotificationPayload {
  title: string;
  body: string;
}

/**
 * Delivery is fire-and-forget from the engine's point of view
 */
export interface Notifier {
  notify(payload: NotificationPayload): void;
}

/**
 * Uniform random source in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Distance in meters between two coordinates
 */
export type DistanceFn = (a: LocationFix, b: LocationFix) => number;
