import { categoryOrder, EventCategory, isEventCategory } from '../models/eventCategory';
import { INTERACTION_POINTS, INTERACTION_TYPES, InteractionType } from '../models/interaction';
import { PricePreference } from '../models/pricing';

export type InteractionCounts = Record<InteractionType, number>;

export interface InterestPreferences {
  preferredCategories: EventCategory[];
  pricePreference: PricePreference | null;
  preferredCity: string | null;
  maxTravelDistanceKm: number | null;
  followedOrganizerIds: string[];
}

export interface InterestProfileSnapshot extends InterestPreferences {
  inferredWeights: Partial<Record<EventCategory, number>>;
  interactionCounts: Partial<Record<EventCategory, InteractionCounts>>;
  /** Last write by a store; null for profiles never persisted. */
  updatedAt: Date | null;
}

export interface InterestProfileOptions {
  /** Interactions needed before the profile reaches full confidence. */
  coldStartThreshold?: number;
}

export const DEFAULT_COLD_START_THRESHOLD = 20;

function emptyCounts(): InteractionCounts {
  return { view: 0, like: 0, share: 0, purchase: 0 };
}

/**
 * A user's accumulated preference signal: explicit choices made in settings plus
 * weights inferred from what they view, like, share and buy.
 */
export class InterestProfile {
  private preferredCategories: Set<EventCategory>;
  private pricePreferenceValue: PricePreference | null;
  private preferredCityValue: string | null;
  private maxTravelDistanceValue: number | null;
  private followedOrganizers: Set<string>;
  private readonly inferredWeights = new Map<EventCategory, number>();
  private readonly interactionCounts = new Map<EventCategory, InteractionCounts>();
  private readonly coldStartThreshold: number;
  private updatedAtValue: Date | null;

  constructor(snapshot: Partial<InterestProfileSnapshot> = {}, options: InterestProfileOptions = {}) {
    const threshold = options.coldStartThreshold ?? DEFAULT_COLD_START_THRESHOLD;
    if (!Number.isFinite(threshold) || threshold <= 0) {
      throw new RangeError('coldStartThreshold must be a positive number');
    }
    this.coldStartThreshold = threshold;

    this.preferredCategories = new Set(snapshot.preferredCategories ?? []);
    this.pricePreferenceValue = snapshot.pricePreference ?? null;
    this.preferredCityValue = snapshot.preferredCity ?? null;
    this.maxTravelDistanceValue = snapshot.maxTravelDistanceKm ?? null;
    this.followedOrganizers = new Set(snapshot.followedOrganizerIds ?? []);
    this.updatedAtValue = snapshot.updatedAt ? new Date(snapshot.updatedAt.getTime()) : null;

    for (const [category, weight] of entriesOf(snapshot.inferredWeights ?? {})) {
      if (weight > 0) {
        this.inferredWeights.set(category, weight);
      }
    }
    for (const [category, counts] of entriesOf(snapshot.interactionCounts ?? {})) {
      const sanitized = emptyCounts();
      for (const type of INTERACTION_TYPES) {
        sanitized[type] = Math.max(0, Math.floor(counts[type] ?? 0));
      }
      this.interactionCounts.set(category, sanitized);
    }
  }

  static empty(options: InterestProfileOptions = {}): InterestProfile {
    return new InterestProfile({}, options);
  }

  static fromSnapshot(snapshot: InterestProfileSnapshot, options: InterestProfileOptions = {}): InterestProfile {
    return new InterestProfile(snapshot, options);
  }

  get pricePreference(): PricePreference | null {
    return this.pricePreferenceValue;
  }

  get preferredCity(): string | null {
    return this.preferredCityValue;
  }

  get maxTravelDistanceKm(): number | null {
    return this.maxTravelDistanceValue;
  }

  get updatedAt(): Date | null {
    return this.updatedAtValue;
  }

  markUpdated(at: Date): void {
    this.updatedAtValue = new Date(at.getTime());
  }

  hasPreferredCategories(): boolean {
    return this.preferredCategories.size > 0;
  }

  prefersCategory(category: EventCategory): boolean {
    return this.preferredCategories.has(category);
  }

  followsOrganizer(organizerId: string): boolean {
    return this.followedOrganizers.has(organizerId);
  }

  /**
   * Adds the interaction's points to the category's inferred weight. Repeated
   * calls accumulate.
   */
  recordInteraction(category: EventCategory, type: InteractionType): void {
    this.inferredWeights.set(category, this.inferredWeight(category) + INTERACTION_POINTS[type]);

    const counts = this.interactionCounts.get(category) ?? emptyCounts();
    counts[type] += 1;
    this.interactionCounts.set(category, counts);
  }

  interactionCount(category: EventCategory, type: InteractionType): number {
    return this.interactionCounts.get(category)?.[type] ?? 0;
  }

  inferredWeight(category: EventCategory): number {
    return this.inferredWeights.get(category) ?? 0;
  }

  totalInteractions(): number {
    let total = 0;
    for (const counts of this.interactionCounts.values()) {
      for (const type of INTERACTION_TYPES) {
        total += counts[type];
      }
    }
    return total;
  }

  /**
   * How much behavioural data backs this profile, saturating at 1.
   */
  confidenceScore(): number {
    return Math.min(1, this.totalInteractions() / this.coldStartThreshold);
  }

  isNewUser(): boolean {
    return this.totalInteractions() === 0;
  }

  topCategories(limit = 5): EventCategory[] {
    return Array.from(this.inferredWeights.entries())
      .sort((a, b) => b[1] - a[1] || categoryOrder(a[0]) - categoryOrder(b[0]))
      .slice(0, Math.max(0, limit))
      .map(([category]) => category);
  }

  updatePreferences(patch: Partial<InterestPreferences>): void {
    if (patch.preferredCategories !== undefined) {
      this.preferredCategories = new Set(patch.preferredCategories);
    }
    if (patch.pricePreference !== undefined) {
      this.pricePreferenceValue = patch.pricePreference;
    }
    if (patch.preferredCity !== undefined) {
      this.preferredCityValue = patch.preferredCity;
    }
    if (patch.maxTravelDistanceKm !== undefined) {
      this.maxTravelDistanceValue = patch.maxTravelDistanceKm;
    }
    if (patch.followedOrganizerIds !== undefined) {
      this.followedOrganizers = new Set(patch.followedOrganizerIds);
    }
  }

  followOrganizer(organizerId: string): void {
    this.followedOrganizers.add(organizerId);
  }

  unfollowOrganizer(organizerId: string): void {
    this.followedOrganizers.delete(organizerId);
  }

  /**
   * Clears behavioural data. Explicit preferences survive a reset.
   */
  reset(): void {
    this.inferredWeights.clear();
    this.interactionCounts.clear();
  }

  toSnapshot(): InterestProfileSnapshot {
    const inferredWeights: Partial<Record<EventCategory, number>> = {};
    for (const [category, weight] of this.inferredWeights) {
      inferredWeights[category] = weight;
    }

    const interactionCounts: Partial<Record<EventCategory, InteractionCounts>> = {};
    for (const [category, counts] of this.interactionCounts) {
      interactionCounts[category] = { ...counts };
    }

    return {
      preferredCategories: Array.from(this.preferredCategories).sort(
        (a, b) => categoryOrder(a) - categoryOrder(b)
      ),
      pricePreference: this.pricePreferenceValue,
      preferredCity: this.preferredCityValue,
      maxTravelDistanceKm: this.maxTravelDistanceValue,
      followedOrganizerIds: Array.from(this.followedOrganizers).sort(),
      inferredWeights,
      interactionCounts,
      updatedAt: this.updatedAtValue ? new Date(this.updatedAtValue.getTime()) : null,
    };
  }
}

function entriesOf<V>(record: Partial<Record<EventCategory, V>>): Array<[EventCategory, V]> {
  const entries: Array<[EventCategory, V]> = [];
  for (const [category, value] of Object.entries(record)) {
    if (isEventCategory(category) && value !== undefined) {
      entries.push([category, value]);
    }
  }
  return entries;
}
