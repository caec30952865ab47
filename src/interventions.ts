/**
 * Intervention dispatcher
 *
 * Maps an intervention to the notification content shown to the user, and
 * hands payloads to the notifier.
 */

import { Logger } from './logger';
import {
  AppId,
  Intervention,
  NotificationPayload,
  Notifier,
} from './types';

/**
 * Usage figure quoted by the "obvious" intervention
 */
export interface DispatchContext {
  app?: AppId;
  minutes: number;
}

/**
 * Content for an intervention, or undefined for a kind with no mapping
 */
export function render(
  intervention: Pick<Intervention, 'kind'>,
  context: DispatchContext = { minutes: 0 }
): NotificationPayload | undefined {
  switch (intervention.kind) {
    case 'obvious':
      return {
        title: 'Usage Alert',
        body: `You've already spent ${context.minutes} minutes on ${
          context.app ?? 'your tracked apps'
        } today`,
      };

    case 'unattractive':
      return {
        title: 'Time Well Spent?',
        body: "You could read 10 pages in the time you'll spend scrolling",
      };

    case 'difficult':
      return {
        title: 'Taking a Pause',
        body: "Let's wait 20 seconds before opening this app",
      };

    case 'unsatisfying':
      return {
        title: 'Goal Reminder',
        body: 'Every minute on social media is a minute not spent on your goals',
      };

    default:
      return undefined;
  }
}

/**
 * Recurring check-in reminder
 */
export function dailyCheckInNotification(): NotificationPayload {
  return {
    title: 'Daily Check-In',
    body: 'Time to review your progress!',
  };
}

/**
 * Fire-and-forget delivery: a failing notifier is logged, never rethrown
 */
export function deliver(
  notifier: Notifier | undefined,
  payload: NotificationPayload,
  logger: Logger
): boolean {
  if (!notifier) return false;

  try {
    notifier.notify(payload);
    return true;
  } catch (error) {
    logger.error(`Failed to deliver "${payload.title}"`, error);
    return false;
  }
}
