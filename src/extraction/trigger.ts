import fs from 'fs';
import path from 'path';
import { spawnSync } from 'child_process';

import { ProcessFailedError, TimeoutError } from '../errors.js';
import { logger } from '../logger.js';
import { runAnalysis } from './analyze.js';
import { METADATA_SUFFIX } from './snapshot.js';
import type { CronConfig, TriggerReport } from './types.js';

/** 추출 디렉토리명: YYYYMMDD-HHMMSS (UTC) */
export function extractionDirName(now: Date): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

/** 현재 실행 중인 CLI를 그대로 다시 호출하는 명령 (로더 옵션 포함) */
export function defaultCliCommand(): string[] {
  return [process.execPath, ...process.execArgv, process.argv[1]];
}

export function buildExtractCommand(config: CronConfig, outputDir: string, cliCommand: string[]): string[] {
  const cmd = [
    ...cliCommand,
    'extract',
    '--index', config.config.index_file,
    '--output-dir', outputDir,
    '--hours', String(config.config.hours),
  ];
  if (config.config.session_id) {
    cmd.push('--session', config.config.session_id);
  }
  return cmd;
}

/**
 * 외부 프로세스를 동기 실행한다. 타임아웃은 재시도 없이 실패로 처리.
 */
export function runProcess(command: string[], timeoutMs: number): string {
  const [file, ...args] = command;
  const display = command.join(' ');
  const result = spawnSync(file, args, { encoding: 'utf-8', timeout: timeoutMs });

  if (result.error) {
    if ('code' in result.error && result.error.code === 'ETIMEDOUT') {
      throw new TimeoutError(display, timeoutMs);
    }
    throw new ProcessFailedError(display, null, result.error.message);
  }
  if (result.status !== 0) {
    throw new ProcessFailedError(display, result.status, result.stderr);
  }
  return result.stdout;
}

function removeIfEmpty(dir: string): void {
  if (fs.existsSync(dir) && fs.readdirSync(dir).length === 0) fs.rmdirSync(dir);
}

export interface TriggerOptions {
  cliCommand?: string[];
  now?: Date;
}

/**
 * cron 설정에 따라 추출 프로세스를 실행하고, 스냅샷이 생기면 바로 분석한다.
 */
export function triggerExtraction(config: CronConfig, opts: TriggerOptions = {}): TriggerReport {
  const now = opts.now ?? new Date();
  const extractionDir = path.join(config.config.output_dir, extractionDirName(now));
  fs.mkdirSync(extractionDir, { recursive: true });

  const command = buildExtractCommand(config, extractionDir, opts.cliCommand ?? defaultCliCommand());
  logger.info({ extractionDir, hours: config.config.hours, session: config.config.session_id }, '대화 추출 시작');

  const startTime = Date.now();
  let stdout: string;
  try {
    stdout = runProcess(command, config.config.timeout_ms);
  } finally {
    // 실패했거나 추출할 대화가 없으면 빈 디렉토리를 남기지 않는다
    removeIfEmpty(extractionDir);
  }
  logger.info({ durationMs: Date.now() - startTime }, '대화 추출 완료');
  logger.debug({ stdout }, '추출 프로세스 출력');

  const timestamp = new Date().toISOString();
  const hasSnapshot =
    fs.existsSync(extractionDir) && fs.readdirSync(extractionDir).some((f) => f.endsWith(METADATA_SUFFIX));
  if (!hasSnapshot) {
    return {
      timestamp,
      status: 'empty',
      extraction_dir: extractionDir,
      message: `No conversations found in past ${config.config.hours} hour(s)`,
    };
  }

  const { result, report } = runAnalysis(extractionDir);
  if (!result.ok) {
    return {
      timestamp,
      status: 'analysis_failed',
      extraction_dir: extractionDir,
      message: result.error,
      report,
    };
  }

  return {
    timestamp,
    status: 'completed',
    extraction_dir: extractionDir,
    message: `Conversations extracted and analyzed in ${extractionDir}`,
    report,
  };
}
