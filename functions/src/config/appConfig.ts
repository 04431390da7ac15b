import { DEFAULT_COLD_START_THRESHOLD } from '../services/interestProfile';
import { DEFAULT_SECTION_SIZE } from '../services/discoveryFeedBuilder';
import {
  DEFAULT_SCORING_CONFIG,
  DEFAULT_SCORING_WEIGHTS,
  resolveScoringConfig,
  ScoringConfig,
  ScoringWeights,
  SignalId,
} from '../services/scoringSignals';
import { isValidTimeZone } from '../utils/timezone';

export interface AppConfig {
  /** Null when API_KEY is unset; authenticated routes then answer 500. */
  apiKey: string | null;
  timeZone: string;
  coldStartThreshold: number;
  feedSectionSize: number;
  recommendationLimit: number;
  scoring: ScoringConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_RECOMMENDATION_LIMIT = 50;

type Env = Record<string, string | undefined>;

function readOptional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const raw = readOptional(env, name);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return parsed;
}

function isSignalId(value: string): value is SignalId {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SCORING_WEIGHTS, value);
}

function parseWeights(raw: string | null): Partial<ScoringWeights> {
  if (raw === null) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `SCORING_WEIGHTS must be valid JSON: ${error instanceof Error ? error.message : 'parse failed'}`
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('SCORING_WEIGHTS must be a JSON object');
  }

  const weights: Partial<ScoringWeights> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isSignalId(key)) {
      throw new ConfigError(`SCORING_WEIGHTS has unknown signal "${key}"`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigError(`SCORING_WEIGHTS.${key} must be a finite number`);
    }
    weights[key] = value;
  }
  return weights;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const timeZone = readOptional(env, 'DISCOVERY_TIME_ZONE') ?? DEFAULT_SCORING_CONFIG.timeZone;
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`DISCOVERY_TIME_ZONE "${timeZone}" is not a valid IANA time zone`);
  }

  return {
    apiKey: readOptional(env, 'API_KEY'),
    timeZone,
    coldStartThreshold: readPositiveInteger(env, 'COLD_START_THRESHOLD', DEFAULT_COLD_START_THRESHOLD),
    feedSectionSize: readPositiveInteger(env, 'FEED_SECTION_SIZE', DEFAULT_SECTION_SIZE),
    recommendationLimit: readPositiveInteger(env, 'RECOMMENDATION_LIMIT', DEFAULT_RECOMMENDATION_LIMIT),
    scoring: resolveScoringConfig({
      timeZone,
      weights: parseWeights(readOptional(env, 'SCORING_WEIGHTS')),
    }),
  };
}
