import assert from 'node:assert/strict';
import test from 'node:test';
import { TicketedEvent } from '../models/event';
import { buildEvent, hoursAfter, KAMPALA, REFERENCE_NOW } from '../testing/eventBuilders';
import { DiscoveryFeedBuilder } from './discoveryFeedBuilder';
import { InterestProfile } from './interestProfile';
import { RecommendationEngine } from './recommendationEngine';

const JINJA = { lat: 0.4244, lng: 33.2042 };
const TOMORROW = new Date('2025-06-12T09:00:00.000Z');

function engine(): RecommendationEngine {
  return new RecommendationEngine({ timeZone: 'UTC' });
}

function startingAt(id: string, start: Date, overrides: Partial<TicketedEvent> = {}): TicketedEvent {
  return buildEvent({ id, startTime: start, endTime: hoursAfter(start, 3), ...overrides });
}

test('RecommendationEngine', async t => {
  await t.test('preferred and purchased categories outrank others', () => {
    const profile = new InterestProfile({ preferredCategories: ['music'] });
    profile.recordInteraction('music', 'purchase');
    const eventA = startingAt('evt-a', TOMORROW, { category: 'music' });
    const eventB = startingAt('evt-b', TOMORROW, { category: 'sports-wellness' });

    const scored = engine().score([eventA, eventB], profile, REFERENCE_NOW);

    assert.deepEqual(
      scored.map(item => [item.event.id, item.score]),
      [['evt-a', 66.67], ['evt-b', 15]]
    );
    assert.deepEqual(scored[0].reasons, [
      'Matches your Music interests',
      'Starts in 1 day',
      "Similar to events you've attended",
    ]);
    assert.deepEqual(scored[1].reasons, ['Starts in 1 day']);

    const sections = new DiscoveryFeedBuilder().buildSections(scored, REFERENCE_NOW);
    assert.deepEqual(
      sections.map(section => [section.id, section.events.map(item => item.event.id)]),
      [
        ['recommended-for-you', ['evt-b']],
        ['based-on-your-interests', ['evt-a']],
      ]
    );
  });

  await t.test('no events means no recommendations and no sections', () => {
    const scored = engine().score([], InterestProfile.empty(), REFERENCE_NOW);
    assert.deepEqual(scored, []);
    assert.deepEqual(new DiscoveryFeedBuilder().buildSections(scored, REFERENCE_NOW), []);
  });

  await t.test('identical inputs rank identically', () => {
    const profile = new InterestProfile({ preferredCategories: ['comedy'], preferredCity: 'Kampala' });
    const events = [
      startingAt('evt-1', TOMORROW, { category: 'comedy' }),
      startingAt('evt-2', new Date('2025-06-14T10:00:00.000Z'), { ticketTypes: [] }),
      buildEvent({ id: 'evt-3', rating: { mean: 4.4, count: 3 } }),
      startingAt('evt-4', hoursAfter(REFERENCE_NOW, -1)),
    ];

    const first = engine().rank(events, profile, REFERENCE_NOW, KAMPALA);
    const second = engine().rank(events, profile, REFERENCE_NOW, KAMPALA);
    assert.deepEqual(second, first);
  });

  await t.test('purchases never lower the score of their category', () => {
    const withPreferences = new InterestProfile({ preferredCategories: ['comedy'] });
    const brandNew = InterestProfile.empty();
    const event = buildEvent({ category: 'music' });
    const preferredScores: number[] = [];
    const newUserScores: number[] = [];

    for (let purchases = 0; purchases <= 4; purchases += 1) {
      preferredScores.push(engine().score([event], withPreferences, REFERENCE_NOW)[0].score);
      newUserScores.push(engine().score([event], brandNew, REFERENCE_NOW)[0].score);
      withPreferences.recordInteraction('music', 'purchase');
      brandNew.recordInteraction('music', 'purchase');
    }

    assert.deepEqual(preferredScores, [0, 11.67, 23.33, 35, 35]);
    for (let i = 1; i < newUserScores.length; i += 1) {
      assert.ok(newUserScores[i] >= newUserScores[i - 1], `score dropped at step ${i}`);
    }
  });

  await t.test('cold start spreads the head across categories', () => {
    const popularMusic = (index: number) =>
      startingAt(`music-${index}`, hoursAfter(TOMORROW, index), {
        rating: { mean: 4.5, count: 10 },
        ticketTypes: [{ id: 'regular', name: 'Regular', price: 20_000, quantity: 100, sold: 90 }],
      });
    const events = [
      popularMusic(0),
      popularMusic(1),
      popularMusic(2),
      popularMusic(3),
      startingAt('comedy-1', hoursAfter(TOMORROW, 4), { category: 'comedy' }),
      startingAt('tech-1', hoursAfter(TOMORROW, 5), { category: 'technology' }),
    ];

    const result = engine().rank(events, InterestProfile.empty(), REFERENCE_NOW);

    assert.equal(result.coldStart, true);
    assert.deepEqual(
      result.scored.map(item => item.event.id),
      ['music-0', 'music-1', 'comedy-1', 'tech-1', 'music-2', 'music-3']
    );
    assert.equal(result.scored[0].score, 30);
  });

  await t.test('live events do not use up cold-start head slots', () => {
    const popular = {
      rating: { mean: 4.5, count: 10 },
      ticketTypes: [{ id: 'regular', name: 'Regular', price: 20_000, quantity: 100, sold: 90 }],
    };
    const live = (id: string, category: TicketedEvent['category']) =>
      startingAt(id, hoursAfter(REFERENCE_NOW, -1), { category, ...popular });
    const events = [
      live('live-comedy-0', 'comedy'),
      live('live-comedy-1', 'comedy'),
      live('live-drama-0', 'drama'),
      live('live-drama-1', 'drama'),
      ...[0, 1, 2, 3].map(index => startingAt(`music-${index}`, hoursAfter(TOMORROW, index), popular)),
      startingAt('tech-0', hoursAfter(TOMORROW, 5), { category: 'technology' }),
    ];
    const narrowHead = new RecommendationEngine({ timeZone: 'UTC', coldStartTopN: 4 });

    const result = narrowHead.rank(events, InterestProfile.empty(), REFERENCE_NOW);

    assert.deepEqual(
      result.scored.map(item => [item.event.id, item.score]),
      [
        ['live-comedy-0', 40],
        ['live-comedy-1', 40],
        ['live-drama-0', 40],
        ['live-drama-1', 40],
        ['music-0', 30],
        ['music-1', 30],
        ['tech-0', 15],
        ['music-2', 30],
        ['music-3', 30],
      ]
    );

    const sections = new DiscoveryFeedBuilder({ sectionSize: 4 }).buildSections(result.scored, REFERENCE_NOW);
    assert.deepEqual(
      sections.map(section => [section.id, section.events.map(item => item.event.id)]),
      [
        ['happening-now', ['live-comedy-0', 'live-comedy-1', 'live-drama-0', 'live-drama-1']],
        ['recommended-for-you', ['music-0', 'music-1', 'tech-0', 'music-2']],
        ['popular-right-now', ['music-3']],
      ]
    );
  });

  await t.test('cold start depends on preferences and confidence', () => {
    const profile = InterestProfile.empty();
    assert.equal(engine().isColdStart(profile), true);
    profile.recordInteraction('music', 'view');
    assert.equal(engine().isColdStart(profile), true);
    profile.recordInteraction('music', 'view');
    assert.equal(engine().isColdStart(profile), false);
    assert.equal(engine().isColdStart(new InterestProfile({ preferredCategories: ['music'] })), false);
  });

  await t.test('an ongoing event beats the same event starting soon', () => {
    const ongoing = startingAt('ongoing', hoursAfter(REFERENCE_NOW, -1));
    const soon = startingAt('soon', hoursAfter(REFERENCE_NOW, 1));
    const profile = new InterestProfile({ preferredCategories: ['poetry'] });

    const scored = engine().score([soon, ongoing], profile, REFERENCE_NOW);

    assert.deepEqual(
      scored.map(item => [item.event.id, item.score, item.reasons]),
      [
        ['ongoing', 25, ['Happening right now']],
        ['soon', 15, ['Starts within 24 hours']],
      ]
    );
    const sections = new DiscoveryFeedBuilder().buildSections(scored, REFERENCE_NOW);
    assert.equal(sections[0].id, 'happening-now');
    assert.deepEqual(sections[0].events.map(item => item.event.id), ['ongoing']);
  });

  await t.test('skips malformed events and drops finished ones', () => {
    const events = [
      buildEvent({ id: 'good' }),
      buildEvent({ id: '' }),
      buildEvent({ id: 'bad-date', startTime: new Date('not a date') }),
      buildEvent({ id: 'backwards', endTime: new Date('2025-06-23T14:00:00.000Z') }),
      buildEvent({ id: 'cancelled', status: 'cancelled' }),
      buildEvent({ id: 'completed', status: 'completed' }),
      buildEvent({ id: 'draft', status: 'draft' }),
      startingAt('ended', hoursAfter(REFERENCE_NOW, -5)),
    ];
    const noCity = buildEvent({ id: 'no-city' });
    Reflect.deleteProperty(noCity.venue, 'city');
    const nullTicket = buildEvent({ id: 'null-ticket' });
    Reflect.set(nullTicket.ticketTypes, 0, null);
    const noRating = buildEvent({ id: 'no-rating' });
    Reflect.deleteProperty(noRating, 'rating');
    events.push(noCity, nullTicket, noRating);

    const profile = new InterestProfile({ preferredCity: 'Kampala' });
    const result = engine().rank(events, profile, REFERENCE_NOW);

    assert.deepEqual(result.scored.map(item => item.event.id), ['good']);
    assert.deepEqual(result.skipped, [
      { eventId: '', reason: 'event id is missing' },
      { eventId: 'bad-date', reason: 'startTime and endTime must be valid dates' },
      { eventId: 'backwards', reason: 'startTime must be before endTime' },
      { eventId: 'no-city', reason: 'venue must include a city and numeric geo.lat / geo.lng' },
      { eventId: 'null-ticket', reason: 'ticketTypes must list tickets with numeric price, quantity and sold' },
      { eventId: 'no-rating', reason: 'rating must have a numeric mean and count' },
    ]);
  });

  await t.test('ties break on start time, then id', () => {
    const events = [
      buildEvent({ id: 'b' }),
      buildEvent({ id: 'a' }),
      startingAt('early', new Date('2025-06-23T08:00:00.000Z')),
    ];

    const scored = engine().score(events, new InterestProfile({ preferredCategories: ['poetry'] }), REFERENCE_NOW);

    assert.deepEqual(scored.map(item => item.event.id), ['early', 'a', 'b']);
  });

  await t.test('small contributions count toward the score but are not explained', () => {
    const event = buildEvent({ ticketTypes: [], createdAt: new Date('2025-06-10T00:00:00.000Z') });

    const [scored] = engine().score([event], InterestProfile.empty(), REFERENCE_NOW);

    assert.equal(scored.score, 10);
    assert.deepEqual(scored.reasons, []);
    assert.deepEqual(scored.signals.map(signal => signal.id), ['freeEvent', 'recentlyAdded']);
  });

  await t.test('explains at most three reasons, strongest first', () => {
    const profile = new InterestProfile({
      preferredCategories: ['music'],
      followedOrganizerIds: ['org-1'],
      preferredCity: ' kampala ',
      pricePreference: 'budget',
    });

    const [scored] = engine().score([buildEvent()], profile, REFERENCE_NOW);

    assert.equal(scored.score, 98);
    assert.deepEqual(scored.reasons, [
      'Matches your Music interests',
      'From Test Organizer, an organizer you follow',
      'In Kampala',
    ]);
    assert.equal(scored.signals.length, 4);
  });

  await t.test('weekend and popularity use the configured thresholds', () => {
    const event = startingAt('saturday', new Date('2025-06-14T10:00:00.000Z'), {
      rating: { mean: 4.5, count: 10 },
      ticketTypes: [{ id: 'regular', name: 'Regular', price: 20_000, quantity: 100, sold: 90 }],
    });

    const [scored] = engine().score([event], new InterestProfile({ preferredCategories: ['poetry'] }), REFERENCE_NOW);

    assert.equal(scored.score, 40);
    assert.deepEqual(scored.reasons, ['Starts in 3 days', 'Popular event (90% sold)', 'On the weekend']);
  });

  await t.test('distance rewards nearby events and penalises far ones only past an explicit limit', () => {
    const event = buildEvent();

    const [nearby] = engine().score([event], InterestProfile.empty(), REFERENCE_NOW, KAMPALA);
    assert.equal(nearby.score, 15);
    assert.deepEqual(nearby.reasons, ['Less than 1 km away']);

    const [farWithoutLimit] = engine().score([event], InterestProfile.empty(), REFERENCE_NOW, JINJA);
    assert.equal(farWithoutLimit.score, 0);

    const limited = new InterestProfile({ maxTravelDistanceKm: 10 });
    const [farWithLimit] = engine().score([event], limited, REFERENCE_NOW, JINJA);
    assert.equal(farWithLimit.score, -10);
    assert.deepEqual(farWithLimit.reasons, []);
  });

  await t.test('weights are configuration', () => {
    const custom = new RecommendationEngine({ timeZone: 'UTC', weights: { categoryMatch: 100 } });
    const [scored] = custom.score([buildEvent()], new InterestProfile({ preferredCategories: ['music'] }), REFERENCE_NOW);
    assert.equal(scored.score, 100);
    assert.equal(custom.config.weights.sameCity, 20);
  });
});
