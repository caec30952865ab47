/**
 * Trigger evaluator
 *
 * Stateless: each check looks at the current inputs and the configured
 * triggers, and picks at most one intervention.
 *
 * Policies:
 * - time: exact HH:mm equality, no tolerance window
 * - location: strictly inside the radius; the first matching trigger in
 *   configured order wins and evaluation stops there
 * - selection: uniform over the whole catalog, whatever the trigger
 */

import { ConfigurationError } from './errors';
import { normalizeTimeOfDay } from './time';
import {
  DistanceFn,
  Intervention,
  LocationFix,
  LocationTrigger,
  RandomSource,
  TimeOfDay,
  TimeTrigger,
} from './types';

/**
 * Mean earth radius (IUGG), meters
 */
const EARTH_RADIUS_METERS = 6_371_008.8;

export interface TriggerMatch<T> {
  trigger: T;
  intervention: Intervention;
}

export function selectIntervention(
  catalog: readonly Intervention[],
  random: RandomSource = Math.random
): Intervention {
  if (catalog.length === 0) {
    throw new ConfigurationError(
      'EMPTY_INTERVENTION_CATALOG',
      'A trigger fired but the intervention catalog is empty'
    );
  }

  const index = Math.min(
    catalog.length - 1,
    Math.max(0, Math.floor(random() * catalog.length))
  );

  return catalog[index];
}

export function matchTime(
  now: TimeOfDay,
  triggers: readonly TimeTrigger[],
  catalog: readonly Intervention[],
  random?: RandomSource
): TriggerMatch<TimeTrigger> | undefined {
  const current = normalizeTimeOfDay(now) ?? now;
  const trigger = triggers.find(t => t.time === current);
  if (!trigger) return undefined;

  return { trigger, intervention: selectIntervention(catalog, random) };
}

export function matchLocation(
  fix: LocationFix,
  triggers: readonly LocationTrigger[],
  catalog: readonly Intervention[],
  random?: RandomSource,
  distance: DistanceFn = distanceMeters
): TriggerMatch<LocationTrigger> | undefined {
  const trigger = triggers.find(t => distance(fix, t) < t.radiusMeters);
  if (!trigger) return undefined;

  return { trigger, intervention: selectIntervention(catalog, random) };
}

export function checkTime(
  now: TimeOfDay,
  triggers: readonly TimeTrigger[],
  catalog: readonly Intervention[],
  random?: RandomSource
): Intervention | undefined {
  return matchTime(now, triggers, catalog, random)?.intervention;
}

export function checkLocation(
  fix: LocationFix,
  triggers: readonly LocationTrigger[],
  catalog: readonly Intervention[],
  random?: RandomSource,
  distance?: DistanceFn
): Intervention | undefined {
  return matchLocation(fix, triggers, catalog, random, distance)?.intervention;
}

/**
 * Great-circle distance (haversine)
 */
export function distanceMeters(a: LocationFix, b: LocationFix): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;

  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) *
      Math.cos(toRad(b.latitude)) *
      Math.sin(dLon / 2) ** 2;

  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}
