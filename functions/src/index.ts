import * as functions from 'firebase-functions/v1';
import * as logger from 'firebase-functions/logger';
import { createApiApp } from './api/routes';
import { loadConfig } from './config/appConfig';
import { firestore } from './firebase/admin';
import { DiscoveryFeedBuilder } from './services/discoveryFeedBuilder';
import { DiscoveryService } from './services/discoveryService';
import { FirestoreEventCatalog } from './services/firestoreEventCatalog';
import { FirestoreInterestProfileStore } from './services/firestoreInterestProfileStore';
import { RecommendationEngine } from './services/recommendationEngine';
import { systemClock } from './utils/clock';
import { sweepEventStatuses as runStatusSweep } from './workers/eventStatusSweep';

const config = loadConfig();

const engine = new RecommendationEngine(config.scoring);
const feedBuilder = new DiscoveryFeedBuilder({ sectionSize: config.feedSectionSize });
const profileOptions = { coldStartThreshold: config.coldStartThreshold };

const service = new DiscoveryService({
  profiles: new FirestoreInterestProfileStore(firestore),
  catalog: new FirestoreEventCatalog(firestore),
  engine,
  feedBuilder,
  profileOptions,
});

const app = createApiApp({
  service,
  clock: systemClock,
  apiKey: config.apiKey,
  recommendationLimit: config.recommendationLimit,
  mock: {
    engine,
    feedBuilder,
    clock: systemClock,
    defaultLimit: config.recommendationLimit,
    profileOptions,
  },
});

export const api = functions
  .runWith({
    timeoutSeconds: 60,
    memory: '512MB',
    secrets: ['API_KEY'],
  })
  .https.onRequest(app);

export const sweepEventStatuses = functions
  .runWith({
    timeoutSeconds: 300,
    memory: '256MB',
  })
  .pubsub
  .schedule('*/15 * * * *')
  .timeZone(config.timeZone)
  .onRun(async () => {
    try {
      await runStatusSweep(firestore, systemClock.now());
    } catch (error) {
      logger.error('Event status sweep failed', error);
      throw error;
    }
    return null;
  });
