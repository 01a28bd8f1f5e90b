/**
 * Recommendation Prompt
 *
 * Grounds the ranking model in the meeting: purpose, head count, how the
 * location was chosen, weighted preferences and the candidate list.
 */

import {
  PROMPT_MAX_CANDIDATES,
  PROMPT_MAX_PREFERENCES,
  PROMPT_MAX_SNIPPETS,
  PROMPT_SNIPPET_CHARS,
} from '../../../config/index.js';
import type { Message } from '../../../llm/types.js';
import { getTopPreference } from '../preferences/preference-aggregator.js';
import {
  CATEGORY_LABELS,
  PREFERENCE_CATEGORIES,
  PURPOSE_LABELS,
  labelFor,
} from '../preferences/preference-tags.js';
import type { LocationChoiceType, MeetingContext, PlaceCandidate } from '../types.js';

export const RECOMMENDATION_PROMPT_VERSION = 'place_recommendation_v1';

export const RECOMMENDATION_SYSTEM_PROMPT = `당신은 모임 장소 추천 전문가입니다.
모임 정보와 참가자 선호도를 고려해 장소 후보 중에서 가장 적합한 장소를 고릅니다.

다음 JSON 형식으로만 응답하세요. 다른 텍스트는 포함하지 마세요.
{
  "recommendations": [
    {
      "place_id": "후보의 ID",
      "place_name": "장소명",
      "rank": 1,
      "reason": "추천 이유 (2-3문장)",
      "match_score": 85,
      "matched_preferences": ["매칭된 선호도"],
      "considerations": ["고려사항이나 주의점"]
    }
  ],
  "summary": "전체 추천 요약 (1-2문장)"
}

추천 기준:
1. 선호 음식 종류와 일치하는지
2. 선호 분위기와 맞는지
3. 필요한 조건(주차, 룸, 단체 등)을 충족하는지
4. 참가 인원이 이용하기 적합한지
5. 접근성 (거리)
`;

const LOCATION_CHOICE_LABELS = {
  CenterLocation: '참가자 중간 지점',
  PreferenceArea: '선호 지역 투표',
  PreferenceSubway: '선호 역 투표',
} satisfies Record<LocationChoiceType, string>;

/** "강남구 3표, 마포구 1표", most votes first. */
export function formatVotes(votes: Record<string, number> | undefined): string | undefined {
  if (!votes) return undefined;
  const entries = Object.entries(votes).sort((a, b) => b[1] - a[1]);
  if (entries.length === 0) return undefined;
  return entries.map(([name, count]) => `${name} ${count}표`).join(', ');
}

export function meetingDistrict(context: Pick<MeetingContext, 'centerLocation' | 'preferredDistrict'>): string | undefined {
  return context.centerLocation?.district ?? context.preferredDistrict;
}

/** Cuts by code point so a surrogate pair is never split. */
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

function meetingSection(context: MeetingContext): string[] {
  const lines = [
    '## 모임 정보',
    `- 모임 유형: ${PURPOSE_LABELS[context.purpose]}`,
    `- 참가 인원: ${context.expectedParticipantCount}명`,
  ];
  if (context.title) lines.push(`- 모임명: ${context.title}`);
  if (context.description) lines.push(`- 모임 설명: ${context.description}`);
  if (context.candidateTimes.length > 0) lines.push(`- 후보 일시: ${context.candidateTimes.join(', ')}`);

  lines.push(`- 위치 선정 방식: ${LOCATION_CHOICE_LABELS[context.locationChoiceType]}`);
  lines.push(`- 지역: ${meetingDistrict(context) ?? '미정'}`);

  if (context.locationChoiceType === 'PreferenceArea' && context.preferredDistrict) {
    const votes = formatVotes(context.districtVotes);
    lines.push(`- 선호 지역: ${context.preferredDistrict}${votes ? ` (투표: ${votes})` : ''}`);
  }
  if (context.locationChoiceType === 'PreferenceSubway' && context.preferredStation) {
    const votes = formatVotes(context.stationVotes);
    lines.push(`- 선호 역: ${context.preferredStation}${votes ? ` (투표: ${votes})` : ''}`);
  }
  return lines;
}

function preferenceSection(context: MeetingContext): string[] {
  const lines = ['## 참가자 선호도'];
  for (const category of PREFERENCE_CATEGORIES) {
    const top = getTopPreference(context.aggregatedPreferences, category, PROMPT_MAX_PREFERENCES);
    if (top.length === 0) continue;
    const rendered = top.map(({ tag, count }) => `${labelFor(category, tag)}(${count}명)`).join(', ');
    lines.push(`- ${CATEGORY_LABELS[category]}: ${rendered}`);
  }
  if (lines.length === 1) lines.push('- 특별한 선호 없음');
  return lines;
}

function candidateSection(candidates: readonly PlaceCandidate[]): string[] {
  const lines = ['## 장소 후보 목록'];
  candidates.slice(0, PROMPT_MAX_CANDIDATES).forEach((c, index) => {
    lines.push(
      `### ${index + 1}. ${c.name}`,
      `- ID: ${c.id}`,
      `- 카테고리: ${c.categoryName}`,
      `- 주소: ${c.roadAddress ?? c.address}`,
      `- 전화: ${c.phone ?? '정보 없음'}`,
      `- 거리: ${c.distanceMeters !== undefined ? `${c.distanceMeters}m` : '거리 정보 없음'}`
    );
    if (c.extractedKeywords.length > 0) {
      lines.push(`- 특징 키워드: ${c.extractedKeywords.join(', ')}`);
    }
    const snippets = c.reviewSnippets.slice(0, PROMPT_MAX_SNIPPETS);
    if (snippets.length > 0) {
      lines.push('- 블로그 리뷰 요약:');
      for (const snippet of snippets) {
        lines.push(`  > ${truncate(snippet, PROMPT_SNIPPET_CHARS)}`);
      }
    }
  });
  return lines;
}

export function buildRecommendationPrompt(
  context: MeetingContext,
  candidates: readonly PlaceCandidate[],
  topN: number
): string {
  return [
    ...meetingSection(context),
    '',
    ...preferenceSection(context),
    '',
    ...candidateSection(candidates),
    '',
    `위 후보 중에서 가장 적합한 장소 ${topN}곳을 추천해주세요. JSON 형식으로만 응답하세요.`,
  ].join('\n');
}

export function buildRecommendationMessages(
  context: MeetingContext,
  candidates: readonly PlaceCandidate[],
  topN: number
): Message[] {
  return [
    { role: 'system', content: RECOMMENDATION_SYSTEM_PROMPT },
    { role: 'user', content: buildRecommendationPrompt(context, candidates, topN) },
  ];
}
