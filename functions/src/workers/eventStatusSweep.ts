import type { Firestore } from 'firebase-admin/firestore';
import { FieldValue, Timestamp } from 'firebase-admin/firestore';
import * as logger from 'firebase-functions/logger';
import { EventStatus, isEventStatus } from '../models/event';
import { scheduledStatusAt, transitionStatus } from '../models/eventStatus';
import { extractDate, isRecord } from '../normalizers/eventRecordNormalizer';

// Firestore caps a batch at 500 writes
const BATCH_LIMIT = 500;

export interface StatusSweepCandidate {
  id: string;
  status: EventStatus;
  startTime: Date;
  endTime: Date;
}

export interface StatusUpdate {
  eventId: string;
  from: EventStatus;
  to: EventStatus;
}

export interface SweepStats {
  scanned: number;
  updated: number;
  malformed: number;
}

export function planStatusUpdates(events: StatusSweepCandidate[], now: Date): StatusUpdate[] {
  const updates: StatusUpdate[] = [];
  for (const event of events) {
    const next = scheduledStatusAt(event, now);
    if (next !== event.status) {
      updates.push({ eventId: event.id, from: event.status, to: transitionStatus(event.status, next) });
    }
  }
  return updates;
}

export function toSweepCandidate(id: string, data: unknown): StatusSweepCandidate | null {
  if (!isRecord(data) || !isEventStatus(data.status)) {
    return null;
  }
  const startTime = extractDate(data.startTime);
  const endTime = extractDate(data.endTime);
  if (!startTime || !endTime) {
    return null;
  }
  return { id, status: data.status, startTime, endTime };
}

/**
 * Moves published events to ongoing once they start and live events to completed
 * once they end.
 */
export async function sweepEventStatuses(db: Firestore, now: Date): Promise<SweepStats> {
  const snapshot = await db
    .collection('events')
    .where('status', 'in', ['published', 'ongoing'])
    .where('startTime', '<=', Timestamp.fromDate(now))
    .get();

  const candidates: StatusSweepCandidate[] = [];
  let malformed = 0;
  for (const doc of snapshot.docs) {
    const candidate = toSweepCandidate(doc.id, doc.data());
    if (candidate) {
      candidates.push(candidate);
    } else {
      malformed += 1;
      logger.warn('Skipping event with unreadable schedule during status sweep', { eventId: doc.id });
    }
  }

  const updates = planStatusUpdates(candidates, now);
  for (let offset = 0; offset < updates.length; offset += BATCH_LIMIT) {
    const batch = db.batch();
    for (const update of updates.slice(offset, offset + BATCH_LIMIT)) {
      batch.update(db.collection('events').doc(update.eventId), {
        status: update.to,
        statusUpdatedAt: FieldValue.serverTimestamp(),
      });
    }
    await batch.commit();
  }

  const stats: SweepStats = { scanned: snapshot.size, updated: updates.length, malformed };
  logger.info('Event status sweep finished', stats);
  return stats;
}
