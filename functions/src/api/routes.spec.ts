import assert from 'node:assert/strict';
import test from 'node:test';
import request from 'supertest';
import { DiscoveryFeedBuilder } from '../services/discoveryFeedBuilder';
import { DiscoveryService } from '../services/discoveryService';
import { InMemoryEventCatalog } from '../services/eventCatalog';
import { InMemoryInterestProfileStore } from '../services/interestProfileStore';
import { RecommendationEngine } from '../services/recommendationEngine';
import { buildEvent, hoursAfter, REFERENCE_NOW } from '../testing/eventBuilders';
import { fixedClock } from '../utils/clock';
import { createApiApp } from './routes';

const API_KEY = 'test-api-key';
const TOMORROW = new Date('2025-06-12T09:00:00.000Z');

function buildApp(apiKey: string | null = API_KEY) {
  const engine = new RecommendationEngine({ timeZone: 'UTC' });
  const feedBuilder = new DiscoveryFeedBuilder();
  const clock = fixedClock(REFERENCE_NOW);
  const service = new DiscoveryService({
    profiles: new InMemoryInterestProfileStore({}, clock),
    catalog: new InMemoryEventCatalog([
      buildEvent({ id: 'music-tomorrow', startTime: TOMORROW, endTime: hoursAfter(TOMORROW, 3) }),
      buildEvent({ id: 'comedy-later', category: 'comedy' }),
    ]),
    engine,
    feedBuilder,
  });

  return createApiApp({
    service,
    clock,
    apiKey,
    recommendationLimit: 50,
    mock: { engine, feedBuilder, clock, defaultLimit: 50 },
  });
}

test('Discovery API', async t => {
  const agent = request(buildApp());

  await t.test('rejects requests without the API key', async () => {
    const response = await agent.get('/status').expect(403);
    assert.deepEqual(response.body, { error: 'Forbidden', message: 'Invalid or missing API key' });
  });

  await t.test('answers 500 when no API key is configured', async () => {
    const response = await request(buildApp(null)).get('/status').set('x-api-key', API_KEY).expect(500);
    assert.deepEqual(response.body, { error: 'Internal Server Error', message: 'API key not configured' });
  });

  await t.test('accepts the key as a header or a query parameter', async () => {
    const response = await agent.get('/status').set('x-api-key', API_KEY).expect(200);
    assert.deepEqual(response.body, { status: 'healthy', timestamp: '2025-06-11T09:00:00.000Z' });

    await agent.get('/status').query({ apiKey: API_KEY }).expect(200);
  });

  await t.test('ranks candidate events for a new user', async () => {
    const response = await agent
      .post('/recommendations')
      .set('x-api-key', API_KEY)
      .send({ userId: 'new-user' })
      .expect(200);

    assert.equal(response.body.count, 2);
    assert.equal(response.body.personalized, false);
    assert.equal(response.body.confidence, 0);
    assert.deepEqual(response.body.recommendations[0], {
      eventId: 'music-tomorrow',
      title: 'Test Event',
      category: 'music',
      categoryLabel: 'Music',
      startTime: '2025-06-12T09:00:00.000Z',
      endTime: '2025-06-12T12:00:00.000Z',
      venue: { name: 'Test Hall', city: 'Kampala' },
      organizerId: 'org-1',
      organizerName: 'Test Organizer',
      priceRange: { min: 20_000, max: 20_000 },
      score: 15,
      reasons: ['Starts in 1 day'],
      ticketSales: { open: true, message: 'Tickets available', closesIn: '1d 0h' },
    });
  });

  await t.test('honours now and limit from the body', async () => {
    const response = await agent
      .post('/recommendations')
      .set('x-api-key', API_KEY)
      .send({ userId: 'new-user', now: '2025-06-12T10:00:00.000Z', limit: 1 })
      .expect(200);

    assert.equal(response.body.count, 1);
    assert.equal(response.body.recommendations[0].eventId, 'music-tomorrow');
    assert.deepEqual(response.body.recommendations[0].reasons, ['Happening right now']);
  });

  await t.test('validates recommendation requests', async () => {
    const missingUser = await agent.post('/recommendations').set('x-api-key', API_KEY).send({}).expect(400);
    assert.deepEqual(missingUser.body, { error: 'userId is required and must be a string' });

    const badLocation = await agent
      .post('/recommendations')
      .set('x-api-key', API_KEY)
      .send({ userId: 'new-user', location: { lat: 120, lng: 0 } })
      .expect(400);
    assert.deepEqual(badLocation.body, { error: 'location lat/lng are out of range' });

    const badLimit = await agent
      .post('/recommendations')
      .set('x-api-key', API_KEY)
      .send({ userId: 'new-user', limit: 0 })
      .expect(400);
    assert.deepEqual(badLimit.body, { error: 'limit must be an integer between 1 and 200' });
  });

  await t.test('records interactions and reflects them in the profile', async () => {
    await agent
      .post('/interactions')
      .set('x-api-key', API_KEY)
      .send({ userId: 'fan', eventId: 'comedy-later', category: 'comedy', type: 'purchase' })
      .expect(204);

    const response = await agent.get('/users/fan/interest-profile').set('x-api-key', API_KEY).expect(200);
    assert.deepEqual(response.body.inferredWeights, { comedy: 5 });
    assert.equal(response.body.confidence, 0.05);
    assert.equal(response.body.isNewUser, false);
    assert.deepEqual(response.body.topCategories, ['comedy']);
    assert.equal(response.body.updatedAt, '2025-06-11T09:00:00.000Z');
  });

  await t.test('rejects invalid interactions', async () => {
    const response = await agent
      .post('/interactions')
      .set('x-api-key', API_KEY)
      .send({ userId: 'fan', eventId: 'comedy-later', category: 'comedy', type: 'bookmark' })
      .expect(400);
    assert.deepEqual(response.body, { error: 'body.type must be one of: view, like, share, purchase' });
  });

  await t.test('a batch with one bad entry records nothing', async () => {
    const response = await agent
      .post('/interactions/batch')
      .set('x-api-key', API_KEY)
      .send({
        interactions: [
          { userId: 'batcher', eventId: 'e1', category: 'music', type: 'like' },
          { userId: 'batcher', eventId: 'e2', category: 'karaoke', type: 'like' },
        ],
      })
      .expect(400);
    assert.match(response.body.error, /^interactions\[1\]\.category must be one of: music, /);

    const profile = await agent.get('/users/batcher/interest-profile').set('x-api-key', API_KEY).expect(200);
    assert.equal(profile.body.isNewUser, true);
    assert.equal(profile.body.updatedAt, null);
  });

  await t.test('records a valid batch', async () => {
    const response = await agent
      .post('/interactions/batch')
      .set('x-api-key', API_KEY)
      .send({
        interactions: [
          { userId: 'batcher', eventId: 'e1', category: 'music', type: 'like' },
          { userId: 'batcher', eventId: 'e2', category: 'music', type: 'share' },
        ],
      })
      .expect(200);
    assert.deepEqual(response.body, { recorded: 2 });

    const profile = await agent.get('/users/batcher/interest-profile').set('x-api-key', API_KEY).expect(200);
    assert.deepEqual(profile.body.inferredWeights, { music: 5 });
  });

  await t.test('rejects empty batches', async () => {
    const response = await agent
      .post('/interactions/batch')
      .set('x-api-key', API_KEY)
      .send({ interactions: [] })
      .expect(400);
    assert.deepEqual(response.body, { error: 'interactions must be an array of 1 to 100 entries' });
  });

  await t.test('updates preferences and uses them for the feed', async () => {
    const updated = await agent
      .put('/users/planner/interest-profile/preferences')
      .set('x-api-key', API_KEY)
      .send({ preferredCategories: ['music'], pricePreference: 'budget' })
      .expect(200);
    assert.deepEqual(updated.body.preferredCategories, ['music']);
    assert.equal(updated.body.pricePreference, 'budget');

    const feed = await agent
      .post('/recommendations/feed')
      .set('x-api-key', API_KEY)
      .send({ userId: 'planner' })
      .expect(200);

    assert.equal(feed.body.personalized, true);
    assert.deepEqual(
      feed.body.sections.map((section: { id: string; events: Array<{ eventId: string; score: number }> }) => [
        section.id,
        section.events.map(event => [event.eventId, event.score]),
      ]),
      [
        ['recommended-for-you', [['comedy-later', 8]]],
        ['based-on-your-interests', [['music-tomorrow', 63]]],
      ]
    );
  });

  await t.test('validates preference patches', async () => {
    const response = await agent
      .put('/users/planner/interest-profile/preferences')
      .set('x-api-key', API_KEY)
      .send({ maxTravelDistanceKm: -3 })
      .expect(400);
    assert.deepEqual(response.body, { error: 'maxTravelDistanceKm must be a positive number or null' });

    const empty = await agent
      .put('/users/planner/interest-profile/preferences')
      .set('x-api-key', API_KEY)
      .send({})
      .expect(400);
    assert.deepEqual(empty.body, { error: 'at least one preference field is required' });
  });

  await t.test('callers may not touch someone else’s profile', async () => {
    const response = await agent
      .get('/users/fan/interest-profile')
      .set('x-api-key', API_KEY)
      .set('x-user-id', 'someone-else')
      .expect(403);
    assert.deepEqual(response.body, { error: 'Forbidden' });
  });

  await t.test('reset clears behaviour', async () => {
    await agent.delete('/users/fan/interest-profile').set('x-api-key', API_KEY).set('x-user-id', 'fan').expect(204);

    const response = await agent.get('/users/fan/interest-profile').set('x-api-key', API_KEY).expect(200);
    assert.equal(response.body.isNewUser, true);
    assert.deepEqual(response.body.inferredWeights, {});
  });
});
