import type { Logger } from 'pino';
import { requireCredential, type AppConfig } from '../../config/env.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import { createLLMProvider } from '../../llm/factory.js';
import type { LLMProvider } from '../../llm/types.js';
import { KakaoLocalClient } from '../places/kakao/kakao-local.client.js';
import { PlaceEnricher } from './enrichment/place-enricher.js';
import { KeywordSynthesizer } from './keywords/keyword-synthesizer.js';
import { LocationResolver } from './location/location-resolver.js';
import { loadStationDirectory, type StationDirectory } from './location/station-directory.js';
import { MeetingPlacePipeline } from './pipeline.js';
import type { PlaceSearchProvider, ReviewSource } from './providers.js';
import { LlmRecommender } from './recommendation/llm-recommender.js';
import { PlaceSearcher } from './search/place-searcher.js';

export interface PipelineCollaborators {
  places: PlaceSearchProvider;
  reviews: ReviewSource | null;
  llm: LLMProvider;
  stations: StationDirectory;
  city: string;
  logger?: Logger;
}

export function assemblePipeline(collaborators: PipelineCollaborators): MeetingPlacePipeline {
  const log = collaborators.logger ?? rootLogger;
  return new MeetingPlacePipeline({
    locationResolver: new LocationResolver(collaborators.places, {
      city: collaborators.city,
      stations: collaborators.stations,
    }),
    keywordSynthesizer: new KeywordSynthesizer(log),
    placeSearcher: new PlaceSearcher(collaborators.places, log),
    placeEnricher: new PlaceEnricher(collaborators.reviews, log),
    recommender: new LlmRecommender(collaborators.llm, log),
    logger: log,
  });
}

/**
 * Wire the pipeline from configuration.
 * Missing credentials throw ConfigError here, before any request is served.
 */
export function createMeetingPlacePipeline(config: AppConfig): MeetingPlacePipeline {
  const kakao = new KakaoLocalClient({
    apiKey: requireCredential(config, 'KAKAO_REST_API_KEY'),
    timeoutMs: config.kakao.timeoutMs,
    maxRetries: config.kakao.maxRetries,
  });

  return assemblePipeline({
    places: kakao,
    reviews: kakao,
    llm: createLLMProvider(config),
    stations: loadStationDirectory(config.stationDistrictsFile),
    city: config.searchCity,
  });
}
