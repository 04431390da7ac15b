import { EVENT_CATEGORY_LABELS } from '../models/eventCategory';
import { isFreeEvent, isHappeningNow, minTicketPrice, TicketedEvent, ticketsSoldRatio } from '../models/event';
import { INTERACTION_POINTS } from '../models/interaction';
import { matchesPricePreference } from '../models/pricing';
import { DAY_MS, isWeekendInTimeZone } from '../utils/timezone';
import { InterestProfile } from './interestProfile';

export type SignalId =
  | 'categoryMatch'
  | 'purchaseAffinity'
  | 'likeAffinity'
  | 'followedOrganizer'
  | 'happeningNow'
  | 'sameCity'
  | 'withinTravelRadius'
  | 'upcomingSoon'
  | 'popularity'
  | 'weekend'
  | 'priceMatch'
  | 'highRating'
  | 'freeEvent'
  | 'recentlyAdded'
  | 'outsideTravelRadius';

export type ScoringWeights = Record<SignalId, number>;

export interface ScoringConfig {
  weights: ScoringWeights;
  /** Purchases (or likes) in a category at which the affinity bonus saturates. */
  affinitySaturationCount: number;
  /** rating mean × tickets sold ratio must exceed this to count as popular. */
  popularityThreshold: number;
  highRatingThreshold: number;
  upcomingWindowDays: number;
  recentlyAddedDays: number;
  /** Radius used when the profile has no travel distance of its own. */
  defaultTravelRadiusKm: number;
  /** Contributions must exceed this to be explained to the user. */
  reasonVisibilityThreshold: number;
  maxReasons: number;
  coldStartConfidenceFloor: number;
  coldStartTopN: number;
  coldStartMaxPerCategory: number;
  /** Zone used to decide which calendar day an event starts on. */
  timeZone: string;
}

export type ScoringConfigOverrides = Partial<Omit<ScoringConfig, 'weights'>> & {
  weights?: Partial<ScoringWeights>;
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  categoryMatch: 40,
  purchaseAffinity: 35,
  likeAffinity: 25,
  followedOrganizer: 30,
  happeningNow: 25,
  sameCity: 20,
  withinTravelRadius: 15,
  upcomingSoon: 15,
  popularity: 10,
  weekend: 10,
  priceMatch: 8,
  highRating: 5,
  freeEvent: 5,
  recentlyAdded: 5,
  outsideTravelRadius: -10,
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: DEFAULT_SCORING_WEIGHTS,
  affinitySaturationCount: 3,
  popularityThreshold: 2.5,
  highRatingThreshold: 4.0,
  upcomingWindowDays: 7,
  recentlyAddedDays: 7,
  defaultTravelRadiusKm: 20,
  reasonVisibilityThreshold: 5,
  maxReasons: 3,
  coldStartConfidenceFloor: 0.1,
  coldStartTopN: 10,
  coldStartMaxPerCategory: 2,
  timeZone: 'Africa/Kampala',
};

export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  return {
    ...DEFAULT_SCORING_CONFIG,
    ...overrides,
    weights: {
      ...DEFAULT_SCORING_WEIGHTS,
      ...overrides.weights,
    },
  };
}

// Signals built from the user's category history; muted during cold start.
export const INTEREST_SIGNALS: readonly SignalId[] = ['categoryMatch', 'purchaseAffinity', 'likeAffinity'];

export interface SignalContribution {
  id: SignalId;
  contribution: number;
  reason: string | null;
}

export interface SignalContext {
  event: TicketedEvent;
  profile: InterestProfile;
  now: Date;
  /** Null when the caller has no location for the user. */
  distanceKm: number | null;
  config: ScoringConfig;
}

type SignalFn = (context: SignalContext) => SignalContribution | null;

function contribution(id: SignalId, value: number, reason: string | null): SignalContribution {
  return { id, contribution: roundScore(value), reason };
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================
// SIGNALS
// ============================================

function categoryMatch({ event, profile, config }: SignalContext): SignalContribution | null {
  if (!profile.prefersCategory(event.category)) {
    return null;
  }
  return contribution(
    'categoryMatch',
    config.weights.categoryMatch,
    `Matches your ${EVENT_CATEGORY_LABELS[event.category]} interests`
  );
}

/**
 * Share of the saturation weight reached by one interaction type's points.
 */
function normalizedAffinity(
  profile: InterestProfile,
  context: SignalContext,
  type: 'purchase' | 'like'
): number {
  const count = profile.interactionCount(context.event.category, type);
  if (count <= 0) {
    return 0;
  }
  const derivedWeight = count * INTERACTION_POINTS[type];
  const saturationWeight = context.config.affinitySaturationCount * INTERACTION_POINTS[type];
  return Math.min(1, derivedWeight / saturationWeight);
}

function purchaseAffinity(context: SignalContext): SignalContribution | null {
  const share = normalizedAffinity(context.profile, context, 'purchase');
  if (share <= 0) {
    return null;
  }
  return contribution(
    'purchaseAffinity',
    context.config.weights.purchaseAffinity * share,
    "Similar to events you've attended"
  );
}

function likeAffinity(context: SignalContext): SignalContribution | null {
  const share = normalizedAffinity(context.profile, context, 'like');
  if (share <= 0) {
    return null;
  }
  return contribution('likeAffinity', context.config.weights.likeAffinity * share, 'Based on events you liked');
}

function followedOrganizer({ event, profile, config }: SignalContext): SignalContribution | null {
  if (!profile.followsOrganizer(event.organizerId)) {
    return null;
  }
  const reason = event.organizerName
    ? `From ${event.organizerName}, an organizer you follow`
    : 'From an organizer you follow';
  return contribution('followedOrganizer', config.weights.followedOrganizer, reason);
}

function happeningNow({ event, now, config }: SignalContext): SignalContribution | null {
  if (!isHappeningNow(event, now)) {
    return null;
  }
  return contribution('happeningNow', config.weights.happeningNow, 'Happening right now');
}

function sameCity({ event, profile, config }: SignalContext): SignalContribution | null {
  const city = profile.preferredCity?.trim().toLowerCase();
  if (!city || event.venue.city.trim().toLowerCase() !== city) {
    return null;
  }
  return contribution('sameCity', config.weights.sameCity, `In ${event.venue.city}`);
}

function withinTravelRadius({ profile, distanceKm, config }: SignalContext): SignalContribution | null {
  if (distanceKm === null) {
    return null;
  }
  const radius = profile.maxTravelDistanceKm ?? config.defaultTravelRadiusKm;
  if (distanceKm > radius) {
    return null;
  }
  const reason = distanceKm < 1 ? 'Less than 1 km away' : `${Math.round(distanceKm)} km away`;
  return contribution('withinTravelRadius', config.weights.withinTravelRadius, reason);
}

function upcomingSoon({ event, now, config }: SignalContext): SignalContribution | null {
  const untilStart = event.startTime.getTime() - now.getTime();
  if (untilStart <= 0 || untilStart > config.upcomingWindowDays * DAY_MS) {
    return null;
  }
  const days = Math.floor(untilStart / DAY_MS);
  let reason: string;
  if (days === 0) {
    reason = 'Starts within 24 hours';
  } else if (days === 1) {
    reason = 'Starts in 1 day';
  } else {
    reason = `Starts in ${days} days`;
  }
  return contribution('upcomingSoon', config.weights.upcomingSoon, reason);
}

function popularity({ event, config }: SignalContext): SignalContribution | null {
  const soldRatio = ticketsSoldRatio(event);
  if (event.rating.mean * soldRatio <= config.popularityThreshold) {
    return null;
  }
  return contribution(
    'popularity',
    config.weights.popularity,
    `Popular event (${Math.round(soldRatio * 100)}% sold)`
  );
}

function weekend({ event, config }: SignalContext): SignalContribution | null {
  if (!isWeekendInTimeZone(event.startTime, config.timeZone)) {
    return null;
  }
  return contribution('weekend', config.weights.weekend, 'On the weekend');
}

function priceMatch({ event, profile, config }: SignalContext): SignalContribution | null {
  const preference = profile.pricePreference;
  if (!preference || !matchesPricePreference(minTicketPrice(event), preference)) {
    return null;
  }
  return contribution('priceMatch', config.weights.priceMatch, 'Matches your price preference');
}

function highRating({ event, config }: SignalContext): SignalContribution | null {
  if (event.rating.count === 0 || event.rating.mean < config.highRatingThreshold) {
    return null;
  }
  return contribution('highRating', config.weights.highRating, `Highly rated (${event.rating.mean.toFixed(1)}★)`);
}

function freeEvent({ event, config }: SignalContext): SignalContribution | null {
  if (!isFreeEvent(event)) {
    return null;
  }
  return contribution('freeEvent', config.weights.freeEvent, 'Free event');
}

function recentlyAdded({ event, now, config }: SignalContext): SignalContribution | null {
  const age = now.getTime() - event.createdAt.getTime();
  if (age < 0 || age > config.recentlyAddedDays * DAY_MS) {
    return null;
  }
  return contribution('recentlyAdded', config.weights.recentlyAdded, 'Recently added');
}

function outsideTravelRadius({ profile, distanceKm, config }: SignalContext): SignalContribution | null {
  const maxDistance = profile.maxTravelDistanceKm;
  if (distanceKm === null || maxDistance === null || distanceKm <= maxDistance) {
    return null;
  }
  return contribution('outsideTravelRadius', config.weights.outsideTravelRadius, null);
}

// Table order doubles as the tie-break order for reasons.
export const SIGNALS: ReadonlyArray<{ id: SignalId; evaluate: SignalFn }> = [
  { id: 'categoryMatch', evaluate: categoryMatch },
  { id: 'purchaseAffinity', evaluate: purchaseAffinity },
  { id: 'likeAffinity', evaluate: likeAffinity },
  { id: 'followedOrganizer', evaluate: followedOrganizer },
  { id: 'happeningNow', evaluate: happeningNow },
  { id: 'sameCity', evaluate: sameCity },
  { id: 'withinTravelRadius', evaluate: withinTravelRadius },
  { id: 'upcomingSoon', evaluate: upcomingSoon },
  { id: 'popularity', evaluate: popularity },
  { id: 'weekend', evaluate: weekend },
  { id: 'priceMatch', evaluate: priceMatch },
  { id: 'highRating', evaluate: highRating },
  { id: 'freeEvent', evaluate: freeEvent },
  { id: 'recentlyAdded', evaluate: recentlyAdded },
  { id: 'outsideTravelRadius', evaluate: outsideTravelRadius },
];

export function signalOrder(id: SignalId): number {
  return SIGNALS.findIndex(signal => signal.id === id);
}
