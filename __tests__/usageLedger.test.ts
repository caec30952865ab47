/**
 * Tests for the usage ledger
 *
 * Covers: streak counting, resets, last-write-wins, progress snapshots
 */

import { isConfigurationError } from '../src/errors';
import { ProfileStore } from '../src/profile';
import { UsageSample } from '../src/types';
import { classifyUsage, UsageLedger } from '../src/usageLedger';

/**
 * Helper: profile tracking A (limit 30) and B (no limit)
 */
function createProfile(): ProfileStore {
  const profile = new ProfileStore();
  profile.setTargetApps(['A', 'B']);
  profile.setLimits({ A: 30 });
  return profile;
}

function sample(day: number, minutes: number, app = 'A'): UsageSample {
  return { date: `2024-01-${String(day).padStart(2, '0')}`, app, minutes };
}

describe('Usage Ledger', () => {
  let profile: ProfileStore;
  let ledger: UsageLedger;

  beforeEach(() => {
    profile = createProfile();
    ledger = new UsageLedger();
  });

  /* ------------------------------------------------------------------ */
  /* Streaks                                                             */
  /* ------------------------------------------------------------------ */
  describe('Streaks', () => {
    it('should count one day per under-limit sample', () => {
      const usage = [10, 30, 0, 20, 15];

      const streaks = usage.map((minutes, i) =>
        ledger.record(sample(i + 1, minutes), profile)
      );

      expect(streaks).toEqual([1, 2, 3, 4, 5]);
      expect(ledger.streak('A')).toBe(5);
    });

    it('should reset to 0 on the first day over the limit', () => {
      const streaks = [10, 40, 5].map((minutes, i) =>
        ledger.record(sample(i + 1, minutes), profile)
      );

      expect(streaks).toEqual([1, 0, 1]);
    });

    it('should leave the streak alone for an app without a limit', () => {
      expect(ledger.record(sample(1, 100, 'B'), profile)).toBe(0);
      expect(ledger.streaks().has('B')).toBe(false);
      expect(ledger.usage('2024-01-01', 'B')).toBe(100);
    });

    it('should count the same under-limit day twice when recorded twice', () => {
      ledger.record(sample(1, 10), profile);
      ledger.record(sample(1, 10), profile);

      expect(ledger.streak('A')).toBe(2);
    });

    it('should default unknown apps to streak 0', () => {
      expect(ledger.streak('Z')).toBe(0);
    });
  });

  /* ------------------------------------------------------------------ */
  /* Usage storage                                                       */
  /* ------------------------------------------------------------------ */
  describe('Usage storage', () => {
    it('should return 0 for unrecorded keys', () => {
      expect(ledger.usage('2024-01-01', 'A')).toBe(0);
      expect(ledger.usageOn('2024-01-01').size).toBe(0);
    });

    it('should keep the last sample for a (date, app) pair', () => {
      expect(ledger.record(sample(1, 10), profile)).toBe(1);
      expect(ledger.record(sample(1, 50), profile)).toBe(0);

      expect(ledger.usage('2024-01-01', 'A')).toBe(50);
    });

    it('should reject malformed samples', () => {
      const bad: UsageSample[] = [
        { date: '2024-02-30', app: 'A', minutes: 1 },
        { date: '01/02/2024', app: 'A', minutes: 1 },
        { date: '2024-01-01', app: ' ', minutes: 1 },
        { date: '2024-01-01', app: 'A', minutes: -1 },
        { date: '2024-01-01', app: 'A', minutes: 1.5 },
      ];

      for (const s of bad) {
        let caught: unknown;
        try {
          ledger.record(s, profile);
        } catch (error) {
          caught = error;
        }
        expect(isConfigurationError(caught, 'INVALID_SAMPLE')).toBe(true);
      }

      expect(ledger.streak('A')).toBe(0);
    });
  });

  /* ------------------------------------------------------------------ */
  /* Progress snapshots                                                  */
  /* ------------------------------------------------------------------ */
  describe('Progress snapshots', () => {
    it('should capture every target app, 0 where unrecorded', () => {
      ledger.record(sample(1, 10), profile);

      const progress = ledger.snapshotProgress('2024-01-01', profile);

      expect([...progress]).toEqual([
        ['A', 10],
        ['B', 0],
      ]);
      expect(ledger.progress('2024-01-01')?.get('A')).toBe(10);
      expect(ledger.progress('2024-01-02')).toBeUndefined();
      expect(ledger.progressHistory().size).toBe(1);
    });
  });

  describe('classifyUsage', () => {
    it('should flag usage against the limit', () => {
      expect(classifyUsage(31, 30)).toBe('over');
      expect(classifyUsage(25, 30)).toBe('warning');
      expect(classifyUsage(24, 30)).toBe('ok');
      expect(classifyUsage(30, 30)).toBe('warning');
      expect(classifyUsage(100)).toBe('ok');
    });
  });
});
