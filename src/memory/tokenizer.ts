export const MAX_TOKENS = 20;
const MIN_TOKEN_LENGTH = 2;
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * 텍스트에서 소문자 토큰 집합을 추출한다.
 * 등장 순서 기준 첫 20개의 고유 토큰, 2자 미만은 제외.
 */
export function extractTokens(text: string): string[] {
  const tokens = new Set<string>();
  for (const match of text.toLowerCase().matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (token.length < MIN_TOKEN_LENGTH) continue;
    tokens.add(token);
    if (tokens.size >= MAX_TOKENS) break;
  }
  return [...tokens];
}

/** 공백 기준 단어 수 (답변 토큰 수) */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}
