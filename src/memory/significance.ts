import { loadKeywordSets } from './keywords.js';
import { extractTokens } from './tokenizer.js';
import type { KeywordSets } from './types.js';

// 각 항목의 최대 가중치
export const WEIGHTS = {
  length: 0.3,
  complexity: 0.2,
  technical: 0.25,
  importance: 0.15,
  actionable: 0.1,
} as const;

// 이 길이(문자)에서 length 항목이 포화
const LENGTH_SATURATION = 500;
// 질문 토큰 수가 이 값에서 complexity 항목이 포화
const COMPLEXITY_SATURATION = 8;

export function clampSignificance(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((kw) => text.includes(kw));
}

/**
 * 답변의 중요도 휴리스틱 점수 (0~1). 답변이 없으면 0.
 */
export function scoreSignificance(
  question: string,
  answer: string | null | undefined,
  keywords: KeywordSets = loadKeywordSets(),
): number {
  if (answer === null || answer === undefined) return 0;

  const q = question.toLowerCase();
  const a = answer.toLowerCase();
  let score = 0;

  score += Math.min(answer.length / LENGTH_SATURATION, 1) * WEIGHTS.length;
  score += Math.min(extractTokens(question).length / COMPLEXITY_SATURATION, 1) * WEIGHTS.complexity;

  // 기술 키워드는 답변에서만 확인
  if (containsAny(a, keywords.technical)) score += WEIGHTS.technical;
  if (containsAny(a, keywords.importance) || containsAny(q, keywords.importance)) score += WEIGHTS.importance;
  if (containsAny(a, keywords.actionable) || containsAny(q, keywords.actionable)) score += WEIGHTS.actionable;

  return Math.min(score, 1);
}
