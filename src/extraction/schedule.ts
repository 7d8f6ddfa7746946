import fs from 'fs';
import path from 'path';
import { CronExpressionParser } from 'cron-parser';

import {
  CRON_CONFIG_FILE,
  EXTRACTION_CRON,
  EXTRACTION_HOURS,
  EXTRACTION_TIMEOUT,
  EXTRACTIONS_DIR,
  INDEX_FILE,
  SCHEDULER_POLL_INTERVAL,
  TIMEZONE,
} from '../config.js';
import { IOFailureError, MalformedError, NotFoundError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { formatIssues } from '../memory/schema.js';
import { cronConfigSchema } from './schema.js';
import type { CronConfig, TriggerReport } from './types.js';

export const CRON_JOB_NAME = 'memory-extraction-summarizer';

export interface CronConfigInput {
  expr?: string;
  tz?: string;
  indexFile?: string;
  outputDir?: string;
  hours?: number;
  sessionId?: string | null;
  timeoutMs?: number;
}

export function createCronConfig(input: CronConfigInput = {}, now: Date = new Date()): CronConfig {
  return {
    version: 1,
    name: CRON_JOB_NAME,
    description: 'Extract and summarize conversations periodically',
    schedule: {
      kind: 'cron',
      expr: input.expr || EXTRACTION_CRON,
      tz: input.tz || TIMEZONE,
    },
    config: {
      index_file: input.indexFile || INDEX_FILE,
      output_dir: input.outputDir || EXTRACTIONS_DIR,
      hours: input.hours ?? EXTRACTION_HOURS,
      session_id: input.sessionId ?? null,
      timeout_ms: input.timeoutMs ?? EXTRACTION_TIMEOUT,
    },
    enabled: true,
    created: now.toISOString(),
  };
}

export function saveCronConfig(config: CronConfig, filePath: string = CRON_CONFIG_FILE): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2), 'utf-8');
  } catch (err) {
    throw new IOFailureError(`Could not write ${filePath}`, err instanceof Error ? err : undefined, { filePath });
  }
  logger.info({ filePath, expr: config.schedule.expr }, 'cron 설정 저장');
}

export function loadCronConfig(filePath: string = CRON_CONFIG_FILE): CronConfig {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Config file not found: ${filePath}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new MalformedError(`Invalid JSON in ${filePath}: ${errorMessage(err)}`, { filePath });
  }

  const parsed = cronConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedError(`Invalid cron config in ${filePath}`, { filePath, issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}

export function isValidCronExpression(expr: string): boolean {
  try {
    CronExpressionParser.parse(expr);
    return true;
  } catch {
    return false;
  }
}

export function computeNextRun(config: CronConfig, from: Date = new Date()): string | null {
  try {
    const interval = CronExpressionParser.parse(config.schedule.expr, {
      tz: config.schedule.tz,
      currentDate: from,
    });
    return interval.next().toISOString();
  } catch {
    logger.warn({ cron: config.schedule.expr }, '잘못된 cron 표현식');
    return null;
  }
}

interface ExtractionLoopOpts {
  config: CronConfig;
  run: (config: CronConfig) => TriggerReport;
  pollIntervalMs?: number;
}

export interface ExtractionLoop {
  stop(): void;
  /** 다음 실행 예정 시각 (ISO), 계산 불가면 null */
  nextRun(): string | null;
}

/**
 * 폴링 루프: 예정 시각이 지나면 추출을 실행하고 다음 시각을 다시 계산한다.
 */
export function startExtractionLoop(opts: ExtractionLoopOpts): ExtractionLoop {
  const { config, run, pollIntervalMs = SCHEDULER_POLL_INTERVAL } = opts;
  let next = computeNextRun(config);
  let running = false;

  const tick = () => {
    if (!config.enabled || running || !next) return;
    if (Date.now() < Date.parse(next)) return;

    running = true;
    try {
      const report = run(config);
      logger.info({ status: report.status, extractionDir: report.extraction_dir }, '예약 추출 실행 완료');
    } catch (err) {
      // 실패해도 루프는 유지, 다음 주기에 다시 시도
      logger.error({ err: errorMessage(err) }, '예약 추출 실패');
    } finally {
      running = false;
      next = computeNextRun(config);
    }
  };

  const timer = setInterval(tick, pollIntervalMs);
  logger.info({ expr: config.schedule.expr, tz: config.schedule.tz, nextRun: next }, '추출 스케줄러 시작');

  return {
    stop: () => {
      clearInterval(timer);
      logger.info('추출 스케줄러 중지');
    },
    nextRun: () => next,
  };
}
