import { FieldValue } from 'firebase-admin/firestore';
import { firestore } from '../firebase/admin';
import { CreateInteractionInput, INTERACTION_POINTS } from '../models/interaction';
import { normalizeInterestProfileRecord } from '../normalizers/interestProfileNormalizer';
import { InterestPreferences, InterestProfile, InterestProfileSnapshot } from './interestProfile';
import { InterestProfileStore } from './interestProfileStore';

const COLLECTION = 'interestProfiles';

const PREFERENCE_FIELDS: ReadonlyArray<keyof InterestPreferences> = [
  'preferredCategories',
  'pricePreference',
  'preferredCity',
  'maxTravelDistanceKm',
  'followedOrganizerIds',
];

function interactionUpdate(input: CreateInteractionInput): Record<string, unknown> {
  return {
    userId: input.userId,
    inferredWeights: {
      [input.category]: FieldValue.increment(INTERACTION_POINTS[input.type]),
    },
    interactionCounts: {
      [input.category]: {
        [input.type]: FieldValue.increment(1),
      },
    },
    lastInteractionAt: FieldValue.serverTimestamp(),
    updatedAt: FieldValue.serverTimestamp(),
  };
}

export class FirestoreInterestProfileStore implements InterestProfileStore {
  private readonly db: FirebaseFirestore.Firestore;

  constructor(db?: FirebaseFirestore.Firestore) {
    this.db = db ?? firestore;
  }

  async findProfile(userId: string): Promise<InterestProfileSnapshot | null> {
    const snapshot = await this.doc(userId).get();
    if (!snapshot.exists) {
      return null;
    }
    return normalizeInterestProfileRecord(snapshot.data());
  }

  async recordInteraction(input: CreateInteractionInput): Promise<void> {
    // Nested maps merge, so concurrent interactions on other categories are kept.
    await this.doc(input.userId).set(interactionUpdate(input), { merge: true });
  }

  async recordInteractions(inputs: CreateInteractionInput[]): Promise<void> {
    if (inputs.length === 0) {
      return;
    }
    const batch = this.db.batch();
    for (const input of inputs) {
      batch.set(this.doc(input.userId), interactionUpdate(input), { merge: true });
    }
    await batch.commit();
  }

  async updatePreferences(
    userId: string,
    patch: Partial<InterestPreferences>
  ): Promise<InterestProfileSnapshot> {
    const fields = PREFERENCE_FIELDS.filter(field => patch[field] !== undefined);
    if (fields.length > 0) {
      await this.doc(userId).set(
        { ...patch, userId, updatedAt: FieldValue.serverTimestamp() },
        { mergeFields: [...fields, 'userId', 'updatedAt'] }
      );
    }

    const stored = await this.findProfile(userId);
    return stored ?? InterestProfile.empty().toSnapshot();
  }

  async resetProfile(userId: string): Promise<void> {
    const ref = this.doc(userId);
    const snapshot = await ref.get();
    if (!snapshot.exists) {
      return;
    }
    await ref.set(
      {
        inferredWeights: {},
        interactionCounts: {},
        resetAt: FieldValue.serverTimestamp(),
        updatedAt: FieldValue.serverTimestamp(),
      },
      { mergeFields: ['inferredWeights', 'interactionCounts', 'resetAt', 'updatedAt'] }
    );
  }

  private doc(userId: string): FirebaseFirestore.DocumentReference {
    return this.db.collection(COLLECTION).doc(userId);
  }
}
