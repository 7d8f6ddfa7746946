import { z } from 'zod';

import type { Analysis, CronConfig, Snapshot } from './types.js';

// 스냅샷은 부분적으로 손상돼도 읽을 수 있도록 기본값을 둔다

const questionRecord = z.object({
  session: z.string().default(''),
  seq: z.number().int(),
  timestamp: z.string(),
  user: z.string().default('unknown'),
  q: z.string(),
  q_tokens: z.array(z.string()).default([]),
  topics: z.array(z.string()).default([]),
});

const answerRecord = z.object({
  session: z.string().default(''),
  seq: z.number().int(),
  timestamp: z.string(),
  user: z.string().default('unknown'),
  q: z.string().default(''),
  a: z.string(),
  significance: z.number().default(0),
  a_tokens: z.number().int().default(0),
});

export const snapshotSchema: z.ZodType<Snapshot, z.ZodTypeDef, unknown> = z.object({
  count: z.number().int().nonnegative(),
  questions: z.array(questionRecord).default([]),
  answers: z.array(answerRecord).default([]),
  summary: z.string().default(''),
  cutoff_time: z.string(),
  hours: z.number().positive().default(1),
  session_id: z.string().nullable().default(null),
});

export const analysisSchema: z.ZodType<Analysis, z.ZodTypeDef, unknown> = z.object({
  period: z.string().default('unknown'),
  analyzed_at: z.string().default(''),
  total_questions: z.number().int().nonnegative().default(0),
  total_answers: z.number().int().nonnegative().default(0),
  topics: z.record(z.string(), z.number()).default({}),
  high_significance_answers: z
    .array(
      z.object({
        seq: z.number().int(),
        q_preview: z.string(),
        significance: z.number(),
        tokens: z.number().int().default(0),
      }),
    )
    .default([]),
  low_significance_answers: z
    .array(z.object({ seq: z.number().int(), q_preview: z.string(), significance: z.number() }))
    .default([]),
  missing_answers: z.array(z.number().int()).default([]),
  patterns: z.array(z.string()).default([]),
});

export const cronConfigSchema: z.ZodType<CronConfig, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int().default(1),
  name: z.string(),
  description: z.string().default(''),
  schedule: z.object({
    kind: z.literal('cron'),
    expr: z.string().min(1),
    tz: z.string().default('UTC'),
  }),
  config: z.object({
    index_file: z.string().min(1),
    output_dir: z.string().min(1),
    hours: z.number().positive().default(1),
    session_id: z.string().nullable().default(null),
    timeout_ms: z.number().int().positive().default(60000),
  }),
  enabled: z.boolean().default(true),
  created: z.string().default(''),
});
