import { EventCategory } from './eventCategory';

export type InteractionType = 'view' | 'like' | 'share' | 'purchase';

export const INTERACTION_TYPES: readonly InteractionType[] = ['view', 'like', 'share', 'purchase'];

export interface CreateInteractionInput {
  userId: string;
  eventId: string;
  category: EventCategory;
  type: InteractionType;
}

// Points added to a category's inferred weight per interaction
export const INTERACTION_POINTS: Record<InteractionType, number> = {
  'purchase': 5,
  'like': 3,
  'share': 2,
  'view': 1,
};

export function isInteractionType(value: unknown): value is InteractionType {
  return typeof value === 'string' && INTERACTION_TYPES.some(type => type === value);
}
