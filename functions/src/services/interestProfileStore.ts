import * as logger from 'firebase-functions/logger';
import { CreateInteractionInput } from '../models/interaction';
import { Clock, systemClock } from '../utils/clock';
import {
  InterestPreferences,
  InterestProfile,
  InterestProfileOptions,
  InterestProfileSnapshot,
} from './interestProfile';

/**
 * Persistence for interest profiles. `findProfile` answers `null` for users who
 * have never interacted or set preferences.
 */
export interface InterestProfileStore {
  findProfile(userId: string): Promise<InterestProfileSnapshot | null>;
  recordInteraction(input: CreateInteractionInput): Promise<void>;
  /** All-or-nothing: either every interaction is recorded or none is. */
  recordInteractions(inputs: CreateInteractionInput[]): Promise<void>;
  updatePreferences(userId: string, patch: Partial<InterestPreferences>): Promise<InterestProfileSnapshot>;
  resetProfile(userId: string): Promise<void>;
}

export async function loadProfileOrDefault(
  store: InterestProfileStore,
  userId: string,
  options: InterestProfileOptions = {}
): Promise<InterestProfile> {
  const snapshot = await store.findProfile(userId);
  if (!snapshot) {
    logger.debug('No interest profile stored; using an empty profile', { userId });
    return InterestProfile.empty(options);
  }
  return InterestProfile.fromSnapshot(snapshot, options);
}

export class InMemoryInterestProfileStore implements InterestProfileStore {
  private readonly profiles = new Map<string, InterestProfileSnapshot>();

  constructor(seed: Record<string, InterestProfileSnapshot> = {}, private readonly clock: Clock = systemClock) {
    for (const [userId, snapshot] of Object.entries(seed)) {
      this.profiles.set(userId, InterestProfile.fromSnapshot(snapshot).toSnapshot());
    }
  }

  async findProfile(userId: string): Promise<InterestProfileSnapshot | null> {
    const snapshot = this.profiles.get(userId);
    return snapshot ? InterestProfile.fromSnapshot(snapshot).toSnapshot() : null;
  }

  async recordInteraction(input: CreateInteractionInput): Promise<void> {
    await this.recordInteractions([input]);
  }

  async recordInteractions(inputs: CreateInteractionInput[]): Promise<void> {
    const touched = new Map<string, InterestProfile>();
    for (const input of inputs) {
      const profile = touched.get(input.userId) ?? this.load(input.userId);
      profile.recordInteraction(input.category, input.type);
      touched.set(input.userId, profile);
    }
    const now = this.clock.now();
    for (const [userId, profile] of touched) {
      profile.markUpdated(now);
      this.profiles.set(userId, profile.toSnapshot());
    }
  }

  async updatePreferences(
    userId: string,
    patch: Partial<InterestPreferences>
  ): Promise<InterestProfileSnapshot> {
    const profile = this.load(userId);
    profile.updatePreferences(patch);
    profile.markUpdated(this.clock.now());
    const snapshot = profile.toSnapshot();
    this.profiles.set(userId, snapshot);
    return snapshot;
  }

  async resetProfile(userId: string): Promise<void> {
    const snapshot = this.profiles.get(userId);
    if (!snapshot) {
      return;
    }
    const profile = InterestProfile.fromSnapshot(snapshot);
    profile.reset();
    profile.markUpdated(this.clock.now());
    this.profiles.set(userId, profile.toSnapshot());
  }

  private load(userId: string): InterestProfile {
    const snapshot = this.profiles.get(userId);
    return snapshot ? InterestProfile.fromSnapshot(snapshot) : InterestProfile.empty();
  }
}
