import { Timestamp } from 'firebase-admin/firestore';
import { firestore } from '../firebase/admin';
import { normalizeEventRecord } from '../normalizers/eventRecordNormalizer';
import { CandidateEvents, EventCatalog } from './eventCatalog';

const DEFAULT_CANDIDATE_LIMIT = 500;

export class FirestoreEventCatalog implements EventCatalog {
  private readonly db: FirebaseFirestore.Firestore;

  constructor(db?: FirebaseFirestore.Firestore, private readonly candidateLimit = DEFAULT_CANDIDATE_LIMIT) {
    this.db = db ?? firestore;
  }

  async listCandidateEvents(now: Date): Promise<CandidateEvents> {
    const snapshot = await this.db
      .collection('events')
      .where('status', 'in', ['published', 'ongoing'])
      .where('endTime', '>=', Timestamp.fromDate(now))
      .limit(this.candidateLimit)
      .get();

    const result: CandidateEvents = { events: [], rejected: [] };
    for (const doc of snapshot.docs) {
      const normalized = normalizeEventRecord(doc.id, doc.data());
      if (normalized.ok) {
        result.events.push(normalized.event);
      } else {
        result.rejected.push({ eventId: normalized.eventId, reason: normalized.reason });
      }
    }
    return result;
  }
}
