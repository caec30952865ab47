/**
 * Profile store
 *
 * Target apps, daily limits and intervention configuration. Every setter is a
 * total overwrite of its field; nothing merges.
 */

import {
  DEFAULT_INTERVENTIONS,
  DEFAULT_PROFILE,
  DEFAULT_RADIUS_METERS,
  DEFAULT_TRIGGERS,
} from './config';
import { ConfigurationError } from './errors';
import { normalizeTimeOfDay } from './time';
import {
  AppId,
  EmotionCue,
  Intervention,
  LocationTrigger,
  Profile,
  TimeTrigger,
  Trigger,
} from './types';

/**
 * Trigger as accepted from callers: radius is optional, time may be "H:mm"
 */
export type TriggerInput =
  | TimeTrigger
  | (Omit<LocationTrigger, 'radiusMeters'> & { radiusMeters?: number });

const INTERVENTION_KINDS: ReadonlySet<string> = new Set([
  'obvious',
  'unattractive',
  'difficult',
  'unsatisfying',
]);

export class ProfileStore implements Profile {
  private apps = new Set<AppId>();
  private limits = new Map<AppId, number>();
  private activities: string[] = [];
  private intentions: string[] = [];
  private cues: EmotionCue[] = [];
  private triggers: Trigger[] = [];
  private catalog: Intervention[] = [];

  get targetApps(): ReadonlySet<AppId> {
    return this.apps;
  }

  get dailyLimitMinutes(): ReadonlyMap<AppId, number> {
    return this.limits;
  }

  get replacementActivities(): readonly string[] {
    return this.activities;
  }

  get implementationIntentions(): readonly string[] {
    return this.intentions;
  }

  get emotionCues(): readonly EmotionCue[] {
    return this.cues;
  }

  get interventionCatalog(): readonly Intervention[] {
    return this.catalog;
  }

  /**
   * Limits of apps that are no longer targeted are dropped
   */
  setTargetApps(apps: Iterable<AppId>): void {
    const next = new Set<AppId>();
    for (const app of apps) {
      const id = app.trim();
      if (id) next.add(id);
    }

    this.apps = next;
    this.limits = new Map(
      [...this.limits].filter(([app]) => next.has(app))
    );
  }

  setLimits(limits: Readonly<Record<AppId, number>>): void {
    const next = new Map<AppId, number>();

    for (const [app, minutes] of Object.entries(limits)) {
      if (!this.apps.has(app)) {
        throw new ConfigurationError(
          'UNKNOWN_APP',
          `Cannot set a limit for "${app}": not a target app`
        );
      }
      if (!Number.isInteger(minutes) || minutes < 0) {
        throw new ConfigurationError(
          'INVALID_LIMIT',
          `Limit for "${app}" must be a whole number of minutes ≥ 0 (got ${minutes})`
        );
      }
      next.set(app, minutes);
    }

    this.limits = next;
  }

  setReplacementActivities(activities: readonly string[]): void {
    this.activities = [...activities];
  }

  setImplementationIntentions(intentions: readonly string[]): void {
    this.intentions = [...intentions];
  }

  setEmotionCues(cues: readonly EmotionCue[]): void {
    this.cues = cues.map(cue => ({ ...cue }));
  }

  setTriggers(triggers: readonly TriggerInput[]): void {
    this.triggers = triggers.map(toTrigger);
  }

  setInterventionCatalog(catalog: readonly Intervention[]): void {
    for (const intervention of catalog) {
      if (!INTERVENTION_KINDS.has(intervention.kind)) {
        throw new ConfigurationError(
          'INVALID_CATALOG',
          `Unknown intervention kind "${intervention.kind}"`
        );
      }
    }
    this.catalog = catalog.map(i => ({ ...i }));
  }

  limitFor(app: AppId): number | undefined {
    return this.limits.get(app);
  }

  timeTriggers(): TimeTrigger[] {
    return this.triggers.filter((t): t is TimeTrigger => t.kind === 'time');
  }

  locationTriggers(): LocationTrigger[] {
    return this.triggers.filter(
      (t): t is LocationTrigger => t.kind === 'location'
    );
  }

  /**
   * Case-insensitive lookup of the replacement for an emotional state
   */
  suggestReplacement(emotion: string): string | undefined {
    const needle = emotion.trim().toLowerCase();
    return this.cues.find(c => c.emotion.toLowerCase() === needle)
      ?.replacement;
  }

  /**
   * Detached copy, safe to hand to other components
   */
  snapshot(): Profile {
    return {
      targetApps: new Set(this.apps),
      dailyLimitMinutes: new Map(this.limits),
      replacementActivities: [...this.activities],
      implementationIntentions: [...this.intentions],
      emotionCues: this.cues.map(cue => ({ ...cue })),
    };
  }
}

function toTrigger(input: TriggerInput): Trigger {
  if (input.kind === 'time') {
    const time = normalizeTimeOfDay(input.time);
    if (!time) {
      throw new ConfigurationError(
        'INVALID_TIME',
        `"${input.time}" is not a valid time of day (expected HH:mm)`
      );
    }
    return { kind: 'time', time };
  }

  const radiusMeters = input.radiusMeters ?? DEFAULT_RADIUS_METERS;
  const validCoordinates =
    Number.isFinite(input.latitude) &&
    Number.isFinite(input.longitude) &&
    Math.abs(input.latitude) <= 90 &&
    Math.abs(input.longitude) <= 180;

  if (!validCoordinates || !Number.isFinite(radiusMeters) || radiusMeters <= 0) {
    throw new ConfigurationError(
      'INVALID_TRIGGER',
      `Location trigger "${input.name}" needs valid coordinates and a positive radius`
    );
  }

  return {
    kind: 'location',
    name: input.name,
    latitude: input.latitude,
    longitude: input.longitude,
    radiusMeters,
  };
}

/**
 * Profile pre-filled with the onboarding demo data
 */
export function createDefaultProfile(): ProfileStore {
  const profile = new ProfileStore();

  profile.setTargetApps(DEFAULT_PROFILE.targetApps);
  profile.setLimits(DEFAULT_PROFILE.dailyLimitMinutes);
  profile.setReplacementActivities(DEFAULT_PROFILE.replacementActivities);
  profile.setImplementationIntentions(DEFAULT_PROFILE.implementationIntentions);
  profile.setEmotionCues(DEFAULT_PROFILE.emotionCues);
  profile.setTriggers(DEFAULT_TRIGGERS);
  profile.setInterventionCatalog(DEFAULT_INTERVENTIONS);

  return profile;
}
