import { hasEnded, TicketedEvent } from '../models/event';

export interface RejectedEventRecord {
  eventId: string;
  reason: string;
}

export interface CandidateEvents {
  events: TicketedEvent[];
  /** Records that could not be turned into events. */
  rejected: RejectedEventRecord[];
}

/**
 * Source of events that may still be recommended at `now`: published or ongoing,
 * and not yet over.
 */
export interface EventCatalog {
  listCandidateEvents(now: Date): Promise<CandidateEvents>;
}

export function isCandidateEvent(event: TicketedEvent, now: Date): boolean {
  return (event.status === 'published' || event.status === 'ongoing') && !hasEnded(event, now);
}

export class InMemoryEventCatalog implements EventCatalog {
  constructor(private readonly events: TicketedEvent[]) {}

  async listCandidateEvents(now: Date): Promise<CandidateEvents> {
    return {
      events: this.events.filter(event => isCandidateEvent(event, now)),
      rejected: [],
    };
  }
}
