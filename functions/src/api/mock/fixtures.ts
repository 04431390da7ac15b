import { EventVenue, NO_RATING, TicketedEvent } from '../../models/event';
import { DAY_MS } from '../../utils/timezone';

const HOUR_MS = 60 * 60 * 1000;

const VENUES: Record<string, EventVenue> = {
  nationalTheatre: {
    name: 'Uganda National Cultural Centre',
    address: 'De Winton Rd',
    city: 'Kampala',
    geo: { lat: 0.3163, lng: 32.5822 },
  },
  kololoGrounds: {
    name: 'Kololo Independence Grounds',
    address: 'Kololo',
    city: 'Kampala',
    geo: { lat: 0.3305, lng: 32.5953 },
  },
  innovationHub: {
    name: 'Innovation Village',
    address: 'Ntinda',
    city: 'Kampala',
    geo: { lat: 0.3541, lng: 32.6136 },
  },
  botanicalGardens: {
    name: 'Entebbe Botanical Gardens',
    address: 'Portal Rd',
    city: 'Entebbe',
    geo: { lat: 0.0596, lng: 32.4737 },
  },
  sourceOfTheNile: {
    name: 'Source of the Nile Gardens',
    address: 'Nile Crescent',
    city: 'Jinja',
    geo: { lat: 0.4244, lng: 33.2042 },
  },
};

// Helpers to create dates relative to the reference instant
function daysFrom(reference: Date, days: number, hours = 0): Date {
  return new Date(reference.getTime() + days * DAY_MS + hours * HOUR_MS);
}

function hoursFrom(reference: Date, hours: number): Date {
  return new Date(reference.getTime() + hours * HOUR_MS);
}

/**
 * Sample catalogue positioned around `reference` so that every feed section has
 * something to show whenever the mock routes are called.
 */
export function buildMockEvents(reference: Date): TicketedEvent[] {
  return [
    {
      id: 'mock-event-1',
      title: 'Afrobeat Live at the Amphitheatre',
      category: 'music',
      startTime: hoursFrom(reference, -1),
      endTime: hoursFrom(reference, 2),
      venue: VENUES.nationalTheatre,
      ticketTypes: [
        { id: 'regular', name: 'Regular', price: 30_000, quantity: 200, sold: 170 },
        { id: 'vip', name: 'VIP', price: 80_000, quantity: 50, sold: 45 },
      ],
      rating: { mean: 4.6, count: 58 },
      likeCount: 120,
      createdAt: daysFrom(reference, -10),
      organizerId: 'org-kampala-sounds',
      organizerName: 'Kampala Sounds',
      status: 'ongoing',
    },
    {
      id: 'mock-event-2',
      title: 'Nyege Nyege Warm-up Concert',
      category: 'concerts',
      startTime: daysFrom(reference, 2, 6),
      endTime: daysFrom(reference, 2, 11),
      venue: VENUES.kololoGrounds,
      ticketTypes: [{ id: 'regular', name: 'Regular', price: 50_000, quantity: 1_000, sold: 820 }],
      rating: { mean: 4.3, count: 210 },
      likeCount: 640,
      createdAt: daysFrom(reference, -20),
      organizerId: 'org-kampala-sounds',
      organizerName: 'Kampala Sounds',
      status: 'published',
    },
    {
      id: 'mock-event-3',
      title: 'Kampala Tech Meetup: Building for Mobile Money',
      category: 'technology',
      startTime: daysFrom(reference, 1, 8),
      endTime: daysFrom(reference, 1, 11),
      venue: VENUES.innovationHub,
      ticketTypes: [{ id: 'standard', name: 'Standard', price: 60_000, quantity: 120, sold: 40 }],
      rating: { mean: 4.1, count: 12 },
      likeCount: 33,
      createdAt: daysFrom(reference, -3),
      organizerId: 'org-innovation-hub',
      organizerName: 'Innovation Village',
      status: 'published',
    },
    {
      id: 'mock-event-4',
      title: 'Founders & Funders Breakfast',
      category: 'networking',
      startTime: daysFrom(reference, 4),
      endTime: daysFrom(reference, 4, 3),
      venue: VENUES.innovationHub,
      ticketTypes: [{ id: 'standard', name: 'Standard', price: 120_000, quantity: 60, sold: 25 }],
      rating: NO_RATING,
      likeCount: 9,
      createdAt: daysFrom(reference, -1),
      organizerId: 'org-innovation-hub',
      organizerName: 'Innovation Village',
      status: 'published',
    },
    {
      id: 'mock-event-5',
      title: 'Open Studio: Contemporary Ugandan Painters',
      category: 'exhibitions',
      startTime: daysFrom(reference, 3),
      endTime: daysFrom(reference, 5),
      venue: VENUES.botanicalGardens,
      ticketTypes: [],
      rating: { mean: 4.8, count: 25 },
      likeCount: 77,
      createdAt: daysFrom(reference, -6),
      organizerId: 'org-entebbe-arts',
      organizerName: 'Entebbe Arts Collective',
      status: 'published',
    },
    {
      id: 'mock-event-6',
      title: 'Poetry in the Garden',
      category: 'poetry',
      startTime: daysFrom(reference, 6),
      endTime: daysFrom(reference, 6, 3),
      venue: VENUES.botanicalGardens,
      ticketTypes: [{ id: 'free', name: 'Free Entry', price: 0, quantity: 80, sold: 12 }],
      rating: NO_RATING,
      likeCount: 14,
      createdAt: daysFrom(reference, -2),
      organizerId: 'org-entebbe-arts',
      organizerName: 'Entebbe Arts Collective',
      status: 'published',
    },
    {
      id: 'mock-event-7',
      title: 'Stand-up Comedy Night',
      category: 'comedy',
      startTime: daysFrom(reference, 5, 10),
      endTime: daysFrom(reference, 5, 13),
      venue: VENUES.nationalTheatre,
      ticketTypes: [{ id: 'regular', name: 'Regular', price: 25_000, quantity: 300, sold: 260 }],
      rating: { mean: 4.5, count: 90 },
      likeCount: 310,
      createdAt: daysFrom(reference, -14),
      organizerId: 'org-laugh-out',
      organizerName: 'Laugh Out Uganda',
      status: 'published',
    },
    {
      id: 'mock-event-8',
      title: 'Nile Sunrise Run',
      category: 'sports-wellness',
      startTime: daysFrom(reference, 2),
      endTime: daysFrom(reference, 2, 4),
      venue: VENUES.sourceOfTheNile,
      ticketTypes: [{ id: 'runner', name: 'Runner', price: 15_000, quantity: 400, sold: 150 }],
      rating: { mean: 3.9, count: 40 },
      likeCount: 52,
      createdAt: daysFrom(reference, -4),
      organizerId: 'org-jinja-runners',
      organizerName: null,
      status: 'published',
    },
    {
      id: 'mock-event-9',
      title: 'Rolex Street Food Festival',
      category: 'food-drinks',
      startTime: daysFrom(reference, 9),
      endTime: daysFrom(reference, 9, 8),
      venue: VENUES.kololoGrounds,
      ticketTypes: [{ id: 'entry', name: 'Entry', price: 10_000, quantity: 2_000, sold: 300 }],
      rating: NO_RATING,
      likeCount: 88,
      createdAt: daysFrom(reference, -30),
      organizerId: 'org-taste-kampala',
      organizerName: 'Taste of Kampala',
      status: 'published',
    },
    {
      id: 'mock-event-10',
      title: 'Charity Gala for School Libraries',
      category: 'fundraising',
      startTime: daysFrom(reference, 12),
      endTime: daysFrom(reference, 12, 5),
      venue: VENUES.nationalTheatre,
      ticketTypes: [{ id: 'table', name: 'Table Seat', price: 250_000, quantity: 100, sold: 30 }],
      rating: NO_RATING,
      likeCount: 5,
      createdAt: daysFrom(reference, -8),
      organizerId: 'org-read-uganda',
      organizerName: 'Read Uganda',
      status: 'published',
    },
    {
      id: 'mock-event-11',
      title: 'Cancelled: Jazz on the Lake',
      category: 'music',
      startTime: daysFrom(reference, 3),
      endTime: daysFrom(reference, 3, 4),
      venue: VENUES.botanicalGardens,
      ticketTypes: [{ id: 'regular', name: 'Regular', price: 40_000, quantity: 150, sold: 0 }],
      rating: NO_RATING,
      likeCount: 2,
      createdAt: daysFrom(reference, -5),
      organizerId: 'org-kampala-sounds',
      organizerName: 'Kampala Sounds',
      status: 'cancelled',
    },
  ];
}
