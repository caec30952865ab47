/**
 * Engine defaults
 *
 * Point rules, catalogs and the demo profile the app ships with.
 */

import {
  EmotionCue,
  Intervention,
  Milestones,
  Reward,
  Trigger,
} from './types';

export const POINTS_UNDER_LIMIT = 20;
export const POINTS_UNDER_HALF_LIMIT = 20;
export const STREAK_POINTS_PER_DAY = 5;
export const MAX_STREAK_POINTS = 50; // per app, per day

export const DEFAULT_RADIUS_METERS = 100;
export const DEFAULT_TIMEZONE = 'UTC';

/**
 * Above this share of the limit, usage is flagged as a warning
 */
export const WARNING_RATIO = 0.8;

export const DEFAULT_REWARDS: readonly Reward[] = [
  { name: 'Digital Badge', costPoints: 100 },
  { name: 'Achievement Unlock', costPoints: 250 },
  { name: 'Custom Reward', costPoints: 500 },
];

export const DEFAULT_MILESTONES: Milestones = new Map([
  [7, 'One week streak'],
  [30, 'One month streak'],
  [90, 'Three month streak'],
]);

export const DEFAULT_INTERVENTIONS: readonly Intervention[] = [
  {
    kind: 'obvious',
    name: 'Usage Alert',
    actionDescription: 'Show notification with current usage time when app opens',
  },
  {
    kind: 'unattractive',
    name: 'Distraction Reminder',
    actionDescription: "Show what you're missing while using the app",
  },
  {
    kind: 'difficult',
    name: 'Friction Builder',
    actionDescription: 'Add 20-second delay before opening problem apps',
  },
  {
    kind: 'unsatisfying',
    name: 'Goal Reminder',
    actionDescription: 'Show time lost towards personal goals',
  },
];

export const DEFAULT_TRIGGERS: readonly Trigger[] = [
  { kind: 'time', time: '07:00' },
  { kind: 'time', time: '12:00' },
  { kind: 'time', time: '21:00' },
  {
    kind: 'location',
    name: 'Home',
    latitude: 40.7128,
    longitude: -74.006,
    radiusMeters: DEFAULT_RADIUS_METERS,
  },
  {
    kind: 'location',
    name: 'Work',
    latitude: 40.7112,
    longitude: -74.0055,
    radiusMeters: DEFAULT_RADIUS_METERS,
  },
];

/**
 * Demo profile used at onboarding
 */
export const DEFAULT_PROFILE = {
  targetApps: ['Instagram', 'Facebook', 'TikTok'],
  dailyLimitMinutes: { Instagram: 30, Facebook: 20, TikTok: 15 },
  replacementActivities: ['Reading', 'Walking', 'Meditation'],
  implementationIntentions: [
    'When I feel bored, I will read instead of opening Instagram',
    'After lunch, I will take a 10-minute walk instead of checking Facebook',
  ],
  emotionCues: [
    { emotion: 'Bored', replacement: 'Try reading for 10 minutes' },
    { emotion: 'Stressed', replacement: 'Try 5 minutes of deep breathing' },
  ] satisfies EmotionCue[],
};
