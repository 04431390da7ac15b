import * as logger from 'firebase-functions/logger';
import { GeoPoint } from '../models/event';
import { CreateInteractionInput } from '../models/interaction';
import { DiscoveryFeedBuilder, FeedSection } from './discoveryFeedBuilder';
import { EventCatalog } from './eventCatalog';
import { InterestPreferences, InterestProfile, InterestProfileOptions } from './interestProfile';
import { InterestProfileStore, loadProfileOrDefault } from './interestProfileStore';
import { RankingResult, RecommendationEngine, ScoredEvent } from './recommendationEngine';

export interface DiscoveryServiceDeps {
  profiles: InterestProfileStore;
  catalog: EventCatalog;
  engine: RecommendationEngine;
  feedBuilder: DiscoveryFeedBuilder;
  profileOptions?: InterestProfileOptions;
}

export interface DiscoveryRequest {
  userId: string;
  now: Date;
  location: GeoPoint | null;
}

export interface RecommendationResult {
  profile: InterestProfile;
  personalized: boolean;
  recommendations: ScoredEvent[];
}

export interface FeedResult {
  profile: InterestProfile;
  personalized: boolean;
  sections: FeedSection[];
}

/**
 * Ties the profile store and event catalog to the scoring engine. Everything
 * time-dependent is driven by the request's `now`.
 */
export class DiscoveryService {
  constructor(private readonly deps: DiscoveryServiceDeps) {}

  async getProfile(userId: string): Promise<InterestProfile> {
    return loadProfileOrDefault(this.deps.profiles, userId, this.deps.profileOptions);
  }

  async recommend(request: DiscoveryRequest, limit: number): Promise<RecommendationResult> {
    const { profile, ranking } = await this.rank(request);
    return {
      profile,
      personalized: !ranking.coldStart,
      recommendations: ranking.scored.slice(0, Math.max(0, limit)),
    };
  }

  async buildFeed(request: DiscoveryRequest): Promise<FeedResult> {
    const { profile, ranking } = await this.rank(request);
    return {
      profile,
      personalized: !ranking.coldStart,
      sections: this.deps.feedBuilder.buildSections(ranking.scored, request.now),
    };
  }

  async recordInteractions(inputs: CreateInteractionInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }
    if (inputs.length === 1) {
      await this.deps.profiles.recordInteraction(inputs[0]);
    } else {
      await this.deps.profiles.recordInteractions(inputs);
    }
    return inputs.length;
  }

  async updatePreferences(userId: string, patch: Partial<InterestPreferences>): Promise<InterestProfile> {
    const snapshot = await this.deps.profiles.updatePreferences(userId, patch);
    return InterestProfile.fromSnapshot(snapshot, this.deps.profileOptions);
  }

  async resetProfile(userId: string): Promise<void> {
    await this.deps.profiles.resetProfile(userId);
  }

  private async rank(request: DiscoveryRequest): Promise<{ profile: InterestProfile; ranking: RankingResult }> {
    const [profile, candidates] = await Promise.all([
      this.getProfile(request.userId),
      this.deps.catalog.listCandidateEvents(request.now),
    ]);

    for (const rejected of candidates.rejected) {
      logger.warn('Skipping malformed event record', rejected);
    }

    const ranking = this.deps.engine.rank(candidates.events, profile, request.now, request.location);
    for (const skipped of ranking.skipped) {
      logger.warn('Skipping event that cannot be scored', skipped);
    }

    return { profile, ranking };
  }
}
