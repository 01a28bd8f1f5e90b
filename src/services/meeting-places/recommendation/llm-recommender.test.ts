import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import type { CompletionOptions, LLMProvider, Message } from '../../../llm/types.js';
import { DegradationLog } from '../degradation.js';
import { buildCandidate, buildContext } from '../../../../tests/helpers/fixtures.js';
import {
  LlmRecommender,
  parseModelResponse,
  stripCodeFence,
  summarizeMeeting,
} from './llm-recommender.js';

const silent = pino({ level: 'silent' });

class FakeLLM implements LLMProvider {
  readonly defaultModel = 'test-model';
  readonly calls: Array<{ messages: Message[]; opts: CompletionOptions | undefined }> = [];

  constructor(private readonly reply: () => Promise<string>) {}

  complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, opts });
    return this.reply();
  }
}

const replyWith = (text: string) => new FakeLLM(() => Promise.resolve(text));

const candidates = [
  buildCandidate('1', { name: '첫째', phone: '02-111-1111', distanceMeters: 120 }),
  buildCandidate('2', { name: '둘째', categoryName: '음식점 > 일식 > 초밥' }),
  buildCandidate('3', { name: '셋째', roadAddress: '서울 강남구 테헤란로 3' }),
  buildCandidate('4', { name: '넷째' }),
  buildCandidate('5', { name: '다섯째' }),
];

const context = buildContext({ centerLocation: { latitude: 37.5, longitude: 127.03, district: '강남구' } });

describe('LlmRecommender.recommend', () => {
  it('orders by rank and copies display fields', async () => {
    const llm = replyWith('```json\n' + JSON.stringify({
      recommendations: [
        { place_id: '2', place_name: '둘째', rank: 2, reason: '초밥', match_score: 80, matched_preferences: ['일식'], considerations: [] },
        { place_id: '1', place_name: '첫째', rank: 1, reason: '가까움', match_score: 92, matched_preferences: ['한식'], considerations: ['예약 권장'] },
      ],
      summary: '두 곳을 추천합니다.',
    }) + '\n```');
    const recommender = new LlmRecommender(llm, silent);

    const result = await recommender.recommend(context, candidates, 3, { traceId: 'trace-1' });

    assert.equal(result.degraded, false);
    assert.equal(result.summary, '두 곳을 추천합니다.');
    assert.equal(result.modelUsed, 'test-model');
    assert.equal(result.totalCandidatesConsidered, 5);
    assert.equal(result.meetingContextSummary, '강남구 지역, 4명, 식사 모임');
    assert.deepEqual(result.recommendations[0], {
      placeId: '1',
      placeName: '첫째',
      rank: 1,
      reason: '가까움',
      matchScore: 92,
      matchedPreferences: ['한식'],
      considerations: ['예약 권장'],
      address: '서울 강남구 역삼동',
      latitude: 37.5,
      longitude: 127.03,
      url: 'http://place.example/1',
      category: '음식점 > 한식',
      phone: '02-111-1111',
      distanceMeters: 120,
    });
    assert.deepEqual(result.recommendations.map(r => [r.placeId, r.rank]), [['1', 1], ['2', 2]]);
    assert.deepEqual(llm.calls[0]?.opts, { traceId: 'trace-1' });
  });

  it('falls back to the first three candidates on an unparseable reply', async () => {
    const recommender = new LlmRecommender(replyWith('not json at all'), silent);
    const degradations = new DegradationLog(silent);

    const result = await recommender.recommend(context, candidates, 3, { degradations });

    assert.equal(result.degraded, true);
    assert.equal(result.summary, '기본 추천 결과입니다.');
    assert.deepEqual(result.recommendations.map(r => [r.placeId, r.rank, r.reason]), [
      ['1', 1, '한식 카테고리의 장소입니다.'],
      ['2', 2, '초밥 카테고리의 장소입니다.'],
      ['3', 3, '한식 카테고리의 장소입니다.'],
    ]);
    for (const rec of result.recommendations) {
      assert.deepEqual(rec.matchedPreferences, []);
      assert.deepEqual(rec.considerations, ['추천 모델 응답을 해석하지 못해 기본 추천이 제공되었습니다.']);
    }
    assert.equal(result.recommendations[2]?.roadAddress, '서울 강남구 테헤란로 3');
    assert.deepEqual(degradations.list().map(r => r.code), ['model_output_unparseable']);
  });

  it('falls back when the model call fails', async () => {
    const llm = new FakeLLM(() => Promise.reject(new Error('request timed out')));
    const recommender = new LlmRecommender(llm, silent);
    const degradations = new DegradationLog(silent);

    const result = await recommender.recommend(context, candidates.slice(0, 2), 3, { degradations });

    assert.equal(result.degraded, true);
    assert.deepEqual(result.recommendations.map(r => r.placeId), ['1', '2']);
    assert.deepEqual(result.recommendations[0]?.considerations, ['추천 모델 호출에 실패해 기본 추천이 제공되었습니다.']);
    assert.deepEqual(degradations.list(), [
      { stage: 'recommendation', code: 'model_call_failed', detail: 'request timed out' },
    ]);
  });

  it('falls back on missing fields and on an empty list', async () => {
    for (const reply of ['{"summary":"x"}', '{"recommendations":[],"summary":"x"}', '{"recommendations":[{"reason":"no id"}]}']) {
      const recommender = new LlmRecommender(replyWith(reply), silent);
      const degradations = new DegradationLog(silent);

      const result = await recommender.recommend(context, candidates, 3, { degradations });

      assert.equal(result.degraded, true, reply);
      assert.equal(result.recommendations.length, 3);
      assert.deepEqual(degradations.list().map(r => r.code), ['model_output_invalid']);
    }
  });

  it('resolves by name, keeps unknown places bare and numbers ranks in reply order', async () => {
    const llm = replyWith(JSON.stringify({
      recommendations: [
        { place_name: '셋째', reason: 'a' },
        { place_id: '999', place_name: '없는 곳', reason: 'b', match_score: 140 },
        { place_id: '3', place_name: '셋째', reason: 'dup' },
        { place_id: '4', reason: 'c' },
        { place_id: '5', reason: 'd' },
      ],
      summary: 's',
    }));
    const recommender = new LlmRecommender(llm, silent);

    const result = await recommender.recommend(context, candidates, 3);

    assert.deepEqual(result.recommendations.map(r => [r.placeId, r.placeName, r.rank]), [
      ['3', '셋째', 1],
      ['999', '없는 곳', 2],
      ['4', '넷째', 3],
    ]);
    assert.deepEqual(result.recommendations[1], {
      placeId: '999',
      placeName: '없는 곳',
      rank: 2,
      reason: 'b',
      matchScore: 140,
      matchedPreferences: [],
      considerations: [],
    });
  });

  it('skips the model without candidates', async () => {
    const llm = replyWith('{}');
    const recommender = new LlmRecommender(llm, silent);

    const result = await recommender.recommend(context, [], 3);

    assert.equal(llm.calls.length, 0);
    assert.deepEqual(result.recommendations, []);
    assert.equal(result.degraded, false);
    assert.equal(result.summary, '추천할 장소 후보가 없습니다.');
  });
});

describe('model reply parsing', () => {
  it('strips code fences', () => {
    assert.equal(stripCodeFence('```json\n{"a":1}\n```'), '{"a":1}');
    assert.equal(stripCodeFence('text ```\n[1]\n``` tail'), '[1]');
    assert.equal(stripCodeFence('  {"a":1} '), '{"a":1}');
  });

  it('accepts numeric place ids', () => {
    const outcome = parseModelResponse('{"recommendations":[{"place_id":42,"rank":1}]}');

    assert.ok(outcome.ok);
    assert.equal(outcome.value.recommendations[0]?.place_id, '42');
    assert.equal(outcome.value.summary, '추천이 완료되었습니다.');
  });

  it('summarizes a meeting without a district', () => {
    assert.equal(
      summarizeMeeting(buildContext({ purpose: 'cafe', expectedParticipantCount: 2 })),
      '미정 지역, 2명, 카페 모임'
    );
  });
});
