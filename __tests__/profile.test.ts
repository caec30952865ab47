/**
 * Tests for the profile store
 */

import { isConfigurationError } from '../src/errors';
import { createDefaultProfile, ProfileStore } from '../src/profile';
import { Intervention } from '../src/types';

/**
 * Helper: run fn and return the thrown value
 */
function thrown(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Profile Store', () => {
  let profile: ProfileStore;

  beforeEach(() => {
    profile = new ProfileStore();
    profile.setTargetApps(['A', 'B']);
  });

  /* ------------------------------------------------------------------ */
  /* Apps and limits                                                     */
  /* ------------------------------------------------------------------ */
  describe('Apps and limits', () => {
    it('should overwrite limits wholesale', () => {
      profile.setLimits({ A: 10 });
      profile.setLimits({ B: 5 });

      expect(profile.limitFor('A')).toBeUndefined();
      expect(profile.limitFor('B')).toBe(5);
    });

    it('should drop limits of apps no longer targeted', () => {
      profile.setLimits({ A: 10, B: 5 });
      profile.setTargetApps(['B', 'C', 'C', ' ']);

      expect([...profile.targetApps]).toEqual(['B', 'C']);
      expect([...profile.dailyLimitMinutes]).toEqual([['B', 5]]);
    });

    it('should only accept limits for target apps', () => {
      const error = thrown(() => profile.setLimits({ Z: 10 }));

      expect(isConfigurationError(error, 'UNKNOWN_APP')).toBe(true);
    });

    it('should only accept whole, non-negative minutes', () => {
      expect(
        isConfigurationError(thrown(() => profile.setLimits({ A: -1 })), 'INVALID_LIMIT')
      ).toBe(true);
      expect(
        isConfigurationError(thrown(() => profile.setLimits({ A: 1.5 })), 'INVALID_LIMIT')
      ).toBe(true);
      expect(profile.dailyLimitMinutes.size).toBe(0);
    });
  });

  /* ------------------------------------------------------------------ */
  /* Triggers and catalog                                                */
  /* ------------------------------------------------------------------ */
  describe('Triggers and catalog', () => {
    it('should normalize times and default the radius', () => {
      profile.setTriggers([
        { kind: 'time', time: '7:00' },
        { kind: 'location', name: 'Gym', latitude: 1, longitude: 2 },
      ]);

      expect(profile.timeTriggers()).toEqual([{ kind: 'time', time: '07:00' }]);
      expect(profile.locationTriggers()).toEqual([
        { kind: 'location', name: 'Gym', latitude: 1, longitude: 2, radiusMeters: 100 },
      ]);
    });

    it('should reject invalid triggers', () => {
      const badTime = thrown(() =>
        profile.setTriggers([{ kind: 'time', time: '25:00' }])
      );
      const badPlace = thrown(() =>
        profile.setTriggers([
          { kind: 'location', name: 'Nowhere', latitude: 91, longitude: 0 },
        ])
      );
      const badRadius = thrown(() =>
        profile.setTriggers([
          { kind: 'location', name: 'Dot', latitude: 0, longitude: 0, radiusMeters: 0 },
        ])
      );

      expect(isConfigurationError(badTime, 'INVALID_TIME')).toBe(true);
      expect(isConfigurationError(badPlace, 'INVALID_TRIGGER')).toBe(true);
      expect(isConfigurationError(badRadius, 'INVALID_TRIGGER')).toBe(true);
    });

    it('should reject unknown intervention kinds', () => {
      const stored: Intervention[] = JSON.parse(
        '[{"kind":"sleepy","name":"Nap","actionDescription":"Lie down"}]'
      );

      expect(
        isConfigurationError(
          thrown(() => profile.setInterventionCatalog(stored)),
          'INVALID_CATALOG'
        )
      ).toBe(true);
    });
  });

  /* ------------------------------------------------------------------ */
  /* Defaults and lookups                                                */
  /* ------------------------------------------------------------------ */
  describe('Defaults and lookups', () => {
    it('should load the onboarding profile', () => {
      const defaults = createDefaultProfile();

      expect([...defaults.targetApps]).toEqual(['Instagram', 'Facebook', 'TikTok']);
      expect(defaults.limitFor('TikTok')).toBe(15);
      expect(defaults.timeTriggers().map(t => t.time)).toEqual([
        '07:00',
        '12:00',
        '21:00',
      ]);
      expect(defaults.locationTriggers().map(t => t.name)).toEqual(['Home', 'Work']);
      expect(defaults.interventionCatalog).toHaveLength(4);
      expect(defaults.replacementActivities).toEqual(['Reading', 'Walking', 'Meditation']);
    });

    it('should suggest replacements by emotion, ignoring case', () => {
      const defaults = createDefaultProfile();

      expect(defaults.suggestReplacement('bored')).toBe('Try reading for 10 minutes');
      expect(defaults.suggestReplacement('Stressed')).toBe(
        'Try 5 minutes of deep breathing'
      );
      expect(defaults.suggestReplacement('Tired')).toBeUndefined();
    });

    it('should hand out detached snapshots', () => {
      profile.setLimits({ A: 10 });
      const snapshot = profile.snapshot();

      profile.setLimits({ B: 1 });

      expect(snapshot.dailyLimitMinutes.get('A')).toBe(10);
      expect(snapshot.dailyLimitMinutes.has('B')).toBe(false);
    });
  });
});
