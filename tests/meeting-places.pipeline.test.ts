import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, getConfig } from '../src/config/env.js';
import {
  MeetingPlacePipeline,
  assemblePipeline,
  createMeetingPlacePipeline,
  type PipelineInput,
} from '../src/services/meeting-places/index.js';
import { StationDirectory } from '../src/services/meeting-places/location/station-directory.js';
import type { PlaceResult } from '../src/services/meeting-places/types.js';
import { buildPlace } from './helpers/fixtures.js';
import { FakeLLM, FakePlaceProvider, FakeReviewSource, silentLogger } from './helpers/fakes.js';

const stations = new StationDirectory([['강남', '강남구']]);

const placesByQuery: Record<string, PlaceResult[]> = {
  '강남구 한식 맛집': [buildPlace('1', { name: '한식당' }), buildPlace('2', { name: '고깃집' })],
  '강남구 조용한': [buildPlace('2', { name: '고깃집' }), buildPlace('3', { name: '조용한 식당' })],
  '강남구 일식 맛집': [buildPlace('4', { name: '스시집', categoryName: '음식점 > 일식' })],
};

const input: PipelineInput = {
  purpose: 'dining',
  locationChoiceType: 'PreferenceArea',
  preferredDistrict: '강남구',
  districtVotes: { 강남구: 3, 마포구: 1 },
  participantLocations: [
    { participantId: 'p1' },
    { participantId: 'p2' },
    { participantId: 'p3' },
    { participantId: 'p4' },
  ],
  preferences: [
    { foodTypes: ['korean'], atmospheres: ['quiet'], conditions: [] },
    { foodTypes: ['korean'], atmospheres: [], conditions: [] },
    { foodTypes: ['japanese'], atmospheres: [], conditions: [] },
    { foodTypes: [], atmospheres: [], conditions: [] },
  ],
  topN: 3,
  traceId: 'trace-pipeline',
};

const modelReply = JSON.stringify({
  recommendations: [
    { place_id: '3', place_name: '조용한 식당', rank: 1, reason: '조용한 분위기', match_score: 90, matched_preferences: ['조용한'] },
    { place_id: '1', place_name: '한식당', rank: 2, reason: '한식 선호' },
  ],
  summary: '조용한 한식 위주로 골랐습니다.',
});

describe('MeetingPlacePipeline.runFullPipeline', () => {
  it('runs every stage on healthy collaborators', async () => {
    const places = new FakePlaceProvider({
      placesByQuery,
      addressMatches: [{ latitude: 37.517, longitude: 127.047, formattedAddress: '서울 강남구' }],
    });
    const reviews = new FakeReviewSource([{ title: '후기', contents: '조용하고 <b>주차</b> 가능', url: 'http://blog.example/1' }]);
    const llm = new FakeLLM(modelReply);
    const pipeline = assemblePipeline({ places, reviews, llm, stations, city: '서울', logger: silentLogger });

    const result = await pipeline.runFullPipeline(input);

    assert.deepEqual(places.addressQueries, ['서울 강남구']);
    assert.deepEqual(result.context.centerLocation, {
      latitude: 37.517,
      longitude: 127.047,
      address: '서울 강남구',
      district: '강남구',
    });
    assert.equal(result.context.expectedParticipantCount, 4);
    assert.deepEqual(result.context.aggregatedPreferences.foodTypes, { korean: 2, japanese: 1 });

    assert.deepEqual(result.keywords.map(k => [k.keyword, k.priority]), [
      ['강남구 한식 맛집', 1],
      ['강남구 조용한', 2],
      ['강남구 맛집', 3],
      ['강남구 일식 맛집', 3],
    ]);
    assert.ok(places.keywordRequests.every(r =>
      r.anchor?.latitude === 37.517 && r.anchor.longitude === 127.047 && r.radiusMeters === 5000 && r.pageSize === 15
    ));

    assert.deepEqual(result.places.map(p => p.id), ['1', '2', '3', '4']);
    assert.ok(result.places.every(p => p.enriched));
    assert.deepEqual(result.places[0]?.reviewSnippets, ['조용하고 주차 가능']);
    assert.deepEqual(reviews.queries, ['강남구 한식당', '강남구 고깃집', '강남구 조용한 식당', '강남구 스시집']);

    const prompt = llm.calls[0]?.messages[1]?.content ?? '';
    assert.ok(prompt.includes('- 선호 지역: 강남구 (투표: 강남구 3표, 마포구 1표)'));
    assert.ok(prompt.includes('### 3. 조용한 식당\n- ID: 3\n'));
    assert.deepEqual(llm.calls[0]?.opts, { traceId: 'trace-pipeline' });

    assert.equal(result.recommendations.degraded, false);
    assert.equal(result.recommendations.summary, '조용한 한식 위주로 골랐습니다.');
    assert.equal(result.recommendations.meetingContextSummary, '강남구 지역, 4명, 식사 모임');
    assert.equal(result.recommendations.totalCandidatesConsidered, 4);
    assert.deepEqual(result.recommendations.recommendations.map(r => [r.placeId, r.placeName, r.rank]), [
      ['3', '조용한 식당', 1],
      ['1', '한식당', 2],
    ]);
    assert.equal(result.recommendations.recommendations[0]?.url, 'http://place.example/3');
    assert.deepEqual(result.degradations, []);
  });

  it('records each degraded stage and still returns a result', async () => {
    const places = new FakePlaceProvider({
      placesByQuery,
      failingQueries: ['강남구 조용한'],
      addressMatches: new Error('geocoder down'),
    });
    const llm = new FakeLLM('죄송합니다, 추천할 수 없습니다.');
    const pipeline = assemblePipeline({ places, reviews: null, llm, stations, city: '서울', logger: silentLogger });

    const result = await pipeline.runFullPipeline(input);

    assert.deepEqual(result.context.centerLocation, { latitude: 0, longitude: 0, district: '강남구' });
    assert.ok(places.keywordRequests.every(r => r.anchor === undefined));
    assert.deepEqual(result.places.map(p => [p.id, p.enriched]), [['1', false], ['2', false], ['4', false]]);

    assert.equal(result.recommendations.degraded, true);
    assert.deepEqual(result.recommendations.recommendations.map(r => [r.placeId, r.rank]), [['1', 1], ['2', 2], ['4', 3]]);
    assert.deepEqual(result.degradations.map(d => [d.stage, d.code]), [
      ['location', 'geocode_failed'],
      ['search', 'search_failed'],
      ['recommendation', 'model_output_unparseable'],
    ]);
    assert.equal(result.degradations[1]?.detail, 'search failed: 강남구 조용한');
  });

  it('returns an empty recommendation set when nothing is found', async () => {
    const places = new FakePlaceProvider();
    const llm = new FakeLLM(modelReply);
    const pipeline = assemblePipeline({ places, reviews: null, llm, stations, city: '서울', logger: silentLogger });

    const result = await pipeline.runFullPipeline({
      locationChoiceType: 'PreferenceSubway',
      preferredStation: '강남역',
      participantLocations: [{ participantId: 'p1' }],
      preferences: [{ foodTypes: [], atmospheres: [], conditions: [] }],
    });

    assert.equal(result.context.purpose, 'dining');
    assert.deepEqual(result.context.centerLocation, { latitude: 0, longitude: 0, district: '강남구' });
    assert.deepEqual(result.places, []);
    assert.deepEqual(result.recommendations.recommendations, []);
    assert.equal(llm.calls.length, 0);
    assert.deepEqual(result.degradations.map(d => d.code), ['station_lookup_failed']);
  });
});

describe('MeetingPlacePipeline.analyze', () => {
  it('builds context and keywords without searching', async () => {
    const places = new FakePlaceProvider({ reverseDistrict: '마포구' });
    const llm = new FakeLLM(modelReply);
    const pipeline = assemblePipeline({ places, reviews: null, llm, stations, city: '서울', logger: silentLogger });

    const result = await pipeline.analyze({
      title: '동창회',
      purpose: 'drink',
      locationChoiceType: 'CenterLocation',
      participantLocations: [
        { participantId: 'a', latitude: 37.55, longitude: 126.92 },
        { participantId: 'b', latitude: 37.57, longitude: 126.94 },
      ],
      preferences: [],
      expectedCount: 10,
      maxKeywords: 3,
    });

    assert.equal(result.context.title, '동창회');
    assert.equal(result.context.centerLocation?.district, '마포구');
    assert.deepEqual(result.keywords.map(k => k.keyword), ['마포구 단체 모임장소', '마포구 회식', '마포구 맛집']);
    assert.equal(places.keywordRequests.length, 0);
    assert.equal(llm.calls.length, 0);
  });
});

describe('createMeetingPlacePipeline', () => {
  it('fails at construction without the Kakao key', () => {
    assert.throws(
      () => createMeetingPlacePipeline(getConfig({ OPENAI_API_KEY: 'test-secret' })),
      (err: unknown) => err instanceof ConfigError && err.keys.includes('KAKAO_REST_API_KEY')
    );
  });

  it('builds from complete configuration', () => {
    const pipeline = createMeetingPlacePipeline(getConfig({
      KAKAO_REST_API_KEY: 'test-secret',
      OPENAI_API_KEY: 'test-secret',
    }));

    assert.ok(pipeline instanceof MeetingPlacePipeline);
  });
});
