import { z } from 'zod';

import type { IndexDocument } from './types.js';

const entryRef = z.object({
  session: z.string(),
  seq: z.number().int().positive(),
});

const qaEntry = z.object({
  seq: z.number().int().positive(),
  timestamp: z.string(),
  user: z.string(),
  q: z.string(),
  q_tokens: z.array(z.string()),
  q_hash: z.string(),
  a: z.string().nullable(),
  a_significance: z.number().min(0).max(1),
  a_tokens: z.number().int().nonnegative(),
  topic_tags: z.array(z.string()),
});

const session = z.object({
  session_id: z.string().min(1),
  created_at: z.string(),
  last_updated: z.string(),
  qa_sequence: z.array(qaEntry),
});

// 이전 버전 문서에는 revision/created_at 등이 없을 수 있음
const metadata = z.object({
  version: z.number().int().default(1),
  created_at: z.string().default(''),
  last_updated: z.string().default(''),
  total_qa_pairs: z.number().int().nonnegative().default(0),
  stored_answers: z.number().int().nonnegative().default(0),
  empty_answers_count: z.number().int().nonnegative().default(0),
  revision: z.number().int().nonnegative().default(0),
});

export const indexDocumentSchema = z.object({
  metadata,
  sessions: z.array(session),
  index: z.object({
    by_topic: z.record(z.string(), z.array(entryRef)),
    by_recency: z.array(entryRef.extend({ timestamp: z.string() })),
    by_semantic_hash: z.record(z.string(), entryRef),
  }),
});

export type ParseResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseIndexDocument(raw: unknown): ParseResult<IndexDocument> {
  const parsed = indexDocumentSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
  return { ok: true, value: parsed.data };
}
