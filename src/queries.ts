/**
 * Firestore query helpers for fetching usage samples
 *
 * Scope:
 * - Read-only source of UsageSample values for the engine
 * - Single query per user (no N+1)
 * - Explicit limits to control cost
 */

import type { DocumentData } from 'firebase-admin/firestore';
import { DEFAULT_TIMEZONE } from './config';
import { createLogger } from './logger';
import { isDateKey, toLocalDateString } from './time';
import { UsageSample } from './types';

const DEFAULT_WINDOW_DAYS = 28;
const DEFAULT_LIMIT = 500;

const logger = createLogger('Usage Queries');

/**
 * The slice of the Firestore query API these helpers use.
 * A firebase-admin `Firestore` instance satisfies it.
 */
export interface UsageQuery {
  where(field: string, op: '>=' | '<=', value: string): UsageQuery;
  orderBy(field: string, direction: 'asc' | 'desc'): UsageQuery;
  limit(limit: number): UsageQuery;
  get(): Promise<{ docs: ReadonlyArray<{ data(): DocumentData }> }>;
}

export interface UsageDatabase {
  collection(path: string): {
    doc(id: string): {
      collection(path: string): UsageQuery;
    };
  };
}

/**
 * Normalize a usage document into a sample, or null when unusable
 */
export function toUsageSample(data: DocumentData): UsageSample | null {
  const date = typeof data.date === 'string' ? data.date : '';
  const app = typeof data.app === 'string' ? data.app.trim() : '';

  if (!isDateKey(date) || !app) {
    return null;
  }

  // Defensive normalization of minutes
  const minutes = Math.max(0, Math.floor(Number(data.minutes) || 0));

  return { date, app, minutes };
}

/**
 * Fetch usage samples for a user within the last N days
 *
 * Newest days are kept when the window holds more than `limit` documents;
 * samples come back oldest first, ready to record in day order.
 *
 * @param db - Firestore instance
 * @param userId - User ID
 * @param days - Lookback window (default: 28)
 * @param options - Optional query tuning
 */
export async function fetchUsageSamples(
  db: UsageDatabase,
  userId: string,
  days: number = DEFAULT_WINDOW_DAYS,
  options?: {
    limit?: number;
    referenceDate?: Date;
    timezone?: string;
  }
): Promise<UsageSample[]> {
  const limit = options?.limit ?? DEFAULT_LIMIT;
  const referenceDate = options?.referenceDate ?? new Date();
  const timezone = options?.timezone ?? DEFAULT_TIMEZONE;

  const startDate = new Date(referenceDate);
  startDate.setDate(startDate.getDate() - days);

  const snapshot = await db
    .collection('users')
    .doc(userId)
    .collection('usage')
    .where('date', '>=', toLocalDateString(startDate, timezone))
    .where('date', '<=', toLocalDateString(referenceDate, timezone))
    .orderBy('date', 'desc')
    .limit(limit)
    .get();

  const samples: UsageSample[] = [];
  for (const doc of snapshot.docs) {
    const sample = toUsageSample(doc.data());
    if (sample) samples.push(sample);
  }

  return samples.reverse();
}

/**
 * Batch fetch usage samples for multiple users
 *
 * @param db - Firestore instance
 * @param userIds - User IDs
 * @param days - Lookback window
 */
export async function batchFetchUsageSamples(
  db: UsageDatabase,
  userIds: string[],
  days: number = DEFAULT_WINDOW_DAYS
): Promise<Map<string, UsageSample[]>> {
  const results = await Promise.all(
    userIds.map(async userId => {
      try {
        const samples = await fetchUsageSamples(db, userId, days);
        return [userId, samples] as const;
      } catch (error) {
        // Fail-soft: return empty data for this user
        logger.warn(`Could not fetch usage for ${userId}`, error);
        const empty: UsageSample[] = [];
        return [userId, empty] as const;
      }
    })
  );

  return new Map(results);
}

/**
 * REQUIRED FIRESTORE INDEX
 *
 * Collection: users/{userId}/usage
 *
 * Single-field index on `date` (created automatically) covers the
 * range filter + orderBy on the same field.
 *
 * Documents: { date: 'YYYY-MM-DD', app: string, minutes: number }
 * One document per (date, app); writers overwrite it as the day's
 * cumulative total grows.
 */
