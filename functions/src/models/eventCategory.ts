export const EVENT_CATEGORIES = [
  'music',
  'arts-culture',
  'concerts',
  'sports-wellness',
  'technology',
  'fundraising',
  'comedy',
  'poetry',
  'drama',
  'exhibitions',
  'networking',
  'education',
  'food-drinks',
  'nightlife',
  'festivals',
  'other',
] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

export const EVENT_CATEGORY_LABELS: Record<EventCategory, string> = {
  'music': 'Music',
  'arts-culture': 'Arts & Culture',
  'concerts': 'Concerts',
  'sports-wellness': 'Sports & Wellness',
  'technology': 'Technology',
  'fundraising': 'Fundraising',
  'comedy': 'Comedy',
  'poetry': 'Poetry',
  'drama': 'Drama',
  'exhibitions': 'Exhibitions',
  'networking': 'Networking',
  'education': 'Education',
  'food-drinks': 'Food & Drinks',
  'nightlife': 'Nightlife',
  'festivals': 'Festivals',
  'other': 'Other',
};

export function isEventCategory(value: unknown): value is EventCategory {
  return typeof value === 'string' && EVENT_CATEGORIES.some(category => category === value);
}

/**
 * Position of a category in the catalogue, used as a stable tie-breaker.
 */
export function categoryOrder(category: EventCategory): number {
  return EVENT_CATEGORIES.indexOf(category);
}
