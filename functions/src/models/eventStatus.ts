import { EventStatus, TicketedEvent } from './event';

const LIFECYCLE_ORDER: Record<Exclude<EventStatus, 'cancelled'>, number> = {
  draft: 0,
  published: 1,
  ongoing: 2,
  completed: 3,
};

export class InvalidStatusTransitionError extends Error {
  constructor(readonly from: EventStatus, readonly to: EventStatus) {
    super(`Cannot move event status from ${from} to ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}

/**
 * Statuses only move forward. Drafts must be published before anything else
 * happens to them; cancellation is allowed until the event has completed.
 */
export function canTransitionStatus(from: EventStatus, to: EventStatus): boolean {
  if (from === to) {
    return true;
  }
  if (from === 'cancelled' || from === 'completed') {
    return false;
  }
  if (to === 'cancelled') {
    return true;
  }
  if (from === 'draft') {
    return to === 'published';
  }
  return LIFECYCLE_ORDER[to] > LIFECYCLE_ORDER[from];
}

export function transitionStatus(from: EventStatus, to: EventStatus): EventStatus {
  if (!canTransitionStatus(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
  return to;
}

/**
 * Status an event should carry at `now` given its schedule. Only published and
 * ongoing events move on their own.
 */
export function scheduledStatusAt(
  event: Pick<TicketedEvent, 'status' | 'startTime' | 'endTime'>,
  now: Date
): EventStatus {
  if (event.status !== 'published' && event.status !== 'ongoing') {
    return event.status;
  }

  if (now.getTime() > event.endTime.getTime()) {
    return 'completed';
  }

  if (event.status === 'published' && now.getTime() >= event.startTime.getTime()) {
    return 'ongoing';
  }

  return event.status;
}
