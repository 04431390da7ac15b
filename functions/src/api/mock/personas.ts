import { InterestProfileSnapshot } from '../../services/interestProfile';

export interface MockPersona {
  userId: string;
  description: string;
  profile: InterestProfileSnapshot;
}

// Mock personas with distinct preferences
export const MOCK_PERSONAS = new Map<string, MockPersona>([
  [
    'mock-newcomer',
    {
      userId: 'mock-newcomer',
      description: 'Just installed the app: no preferences and no history (cold start)',
      profile: {
        preferredCategories: [],
        pricePreference: null,
        preferredCity: null,
        maxTravelDistanceKm: null,
        followedOrganizerIds: [],
        inferredWeights: {},
        interactionCounts: {},
        updatedAt: null,
      },
    },
  ],
  [
    'mock-music-fan',
    {
      userId: 'mock-music-fan',
      description: 'Buys tickets to concerts and music nights in Kampala',
      profile: {
        preferredCategories: ['music', 'concerts'],
        pricePreference: 'budget',
        preferredCity: 'Kampala',
        maxTravelDistanceKm: 15,
        followedOrganizerIds: ['org-kampala-sounds'],
        inferredWeights: {
          music: 22,  // 3 purchases, 2 likes, 1 view
          concerts: 10,
          nightlife: 3,
        },
        interactionCounts: {
          music: { view: 1, like: 2, share: 0, purchase: 3 },
          concerts: { view: 0, like: 0, share: 0, purchase: 2 },
          nightlife: { view: 0, like: 1, share: 0, purchase: 0 },
        },
        updatedAt: null,
      },
    },
  ],
  [
    'mock-culture-lover',
    {
      userId: 'mock-culture-lover',
      description: 'Browses galleries, poetry and drama; prefers free events',
      profile: {
        preferredCategories: ['arts-culture', 'exhibitions', 'poetry'],
        pricePreference: 'free',
        preferredCity: 'Entebbe',
        maxTravelDistanceKm: null,
        followedOrganizerIds: [],
        inferredWeights: {
          exhibitions: 9,
          poetry: 6,
          drama: 2,
        },
        interactionCounts: {
          exhibitions: { view: 3, like: 2, share: 0, purchase: 0 },
          poetry: { view: 0, like: 2, share: 0, purchase: 0 },
          drama: { view: 0, like: 0, share: 1, purchase: 0 },
        },
        updatedAt: null,
      },
    },
  ],
  [
    'mock-tech-professional',
    {
      userId: 'mock-tech-professional',
      description: 'Attends meetups and networking sessions after work',
      profile: {
        preferredCategories: ['technology', 'networking', 'education'],
        pricePreference: 'moderate',
        preferredCity: 'Kampala',
        maxTravelDistanceKm: 10,
        followedOrganizerIds: ['org-innovation-hub'],
        inferredWeights: {
          technology: 31,
          networking: 8,
        },
        interactionCounts: {
          technology: { view: 6, like: 0, share: 0, purchase: 5 },
          networking: { view: 3, like: 0, share: 0, purchase: 1 },
        },
        updatedAt: null,
      },
    },
  ],
]);

export function getPersona(userId: string): MockPersona | null {
  return MOCK_PERSONAS.get(userId) ?? null;
}

export function personaProfiles(): Record<string, InterestProfileSnapshot> {
  const profiles: Record<string, InterestProfileSnapshot> = {};
  for (const [userId, persona] of MOCK_PERSONAS) {
    profiles[userId] = persona.profile;
  }
  return profiles;
}
