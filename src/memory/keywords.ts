import fs from 'fs';
import { z } from 'zod';

import { KEYWORDS_FILE } from '../config.js';
import { MalformedError, NotFoundError, errorMessage } from '../errors.js';
import type { KeywordSets } from './types.js';

const keywordList = z.array(z.string().min(1));

const keywordSetsSchema = z.object({
  technical: keywordList,
  importance: keywordList,
  actionable: keywordList,
});

let cached: { filePath: string; sets: KeywordSets } | null = null;

/**
 * 키워드 파일을 로드한다. 소문자로 정규화하고 경로별로 캐시.
 */
export function loadKeywordSets(filePath: string = KEYWORDS_FILE): KeywordSets {
  if (cached && cached.filePath === filePath) return cached.sets;

  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Keyword file not found: ${filePath}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new MalformedError(`Invalid JSON in keyword file ${filePath}`, {
      filePath,
      cause: errorMessage(err),
    });
  }

  const parsed = keywordSetsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedError(`Invalid keyword file ${filePath}`, { filePath, issues: parsed.error.issues });
  }

  const lower = (list: string[]) => list.map((kw) => kw.toLowerCase());
  const sets: KeywordSets = {
    technical: lower(parsed.data.technical),
    importance: lower(parsed.data.importance),
    actionable: lower(parsed.data.actionable),
  };
  cached = { filePath, sets };
  return sets;
}
