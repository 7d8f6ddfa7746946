import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

vi.mock('../logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { buildExtractCommand, extractionDirName, runProcess, triggerExtraction } = await import('./trigger.js');
const { createCronConfig } = await import('./schedule.js');
const { ProcessFailedError, TimeoutError } = await import('../errors.js');

const NOW = new Date('2026-10-19T12:00:00.000Z');

const SNAPSHOT = {
  count: 1,
  questions: [
    {
      session: 'dev',
      seq: 1,
      timestamp: '2026-10-19T11:30:00.000Z',
      user: 'kim',
      q: 'how to deploy',
      q_tokens: ['how', 'to', 'deploy'],
      topics: ['ops'],
    },
  ],
  answers: [],
  summary: 'Found 1 questions and 0 answers in past 1 hour(s)',
  cutoff_time: '2026-10-19T11:00:00.000Z',
  hours: 1,
  session_id: 'dev',
};

let tmpDir: string;

/** extract 대신 실행될 가짜 CLI. --output-dir 인자에 body가 만든 파일을 쓴다 */
function fakeCli(body: string): string[] {
  const script = path.join(tmpDir, `fake-${Math.random().toString(36).slice(2)}.cjs`);
  fs.writeFileSync(
    script,
    [
      "const fs = require('fs');",
      "const path = require('path');",
      "const outputDir = process.argv[process.argv.indexOf('--output-dir') + 1];",
      body,
    ].join('\n'),
  );
  return [process.execPath, script];
}

function makeConfig() {
  return createCronConfig(
    {
      indexFile: path.join(tmpDir, 'qa-index.json'),
      outputDir: path.join(tmpDir, 'extractions'),
      hours: 1,
      sessionId: 'dev',
      timeoutMs: 10000,
    },
    NOW,
  );
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qa-memory-trigger-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('extractionDirName', () => {
  it('UTC 기준 YYYYMMDD-HHMMSS', () => {
    expect(extractionDirName(new Date('2026-01-02T03:04:05.678Z'))).toBe('20260102-030405');
  });
});

describe('buildExtractCommand', () => {
  it('extract 인자를 붙이고 세션이 있으면 --session', () => {
    const config = makeConfig();
    expect(buildExtractCommand(config, '/out', ['qa-memory'])).toEqual([
      'qa-memory',
      'extract',
      '--index',
      config.config.index_file,
      '--output-dir',
      '/out',
      '--hours',
      '1',
      '--session',
      'dev',
    ]);
  });

  it('세션이 없으면 --session 생략', () => {
    const config = { ...makeConfig(), config: { ...makeConfig().config, session_id: null } };
    expect(buildExtractCommand(config, '/out', ['qa-memory'])).not.toContain('--session');
  });
});

describe('runProcess', () => {
  it('성공하면 stdout을 반환한다', () => {
    expect(runProcess([process.execPath, '-e', "process.stdout.write('done')"], 10000)).toBe('done');
  });

  it('0이 아닌 종료 코드는 ProcessFailedError', () => {
    try {
      runProcess([process.execPath, '-e', 'process.exit(3)'], 10000);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ProcessFailedError);
      if (err instanceof ProcessFailedError) expect(err.context?.exitCode).toBe(3);
    }
  });

  it('시간 초과는 재시도 없이 TimeoutError', () => {
    expect(() => runProcess([process.execPath, '-e', 'setTimeout(() => {}, 10000)'], 300)).toThrow(TimeoutError);
  });

  it('실행 파일이 없으면 ProcessFailedError', () => {
    expect(() => runProcess([path.join(tmpDir, 'no-such-binary')], 1000)).toThrow(ProcessFailedError);
  });
});

describe('triggerExtraction', () => {
  it('스냅샷이 생기면 분석까지 마친다', () => {
    const cli = fakeCli(`fs.writeFileSync(path.join(outputDir, 'dev-qa.json'), ${JSON.stringify(JSON.stringify(SNAPSHOT))});`);
    const report = triggerExtraction(makeConfig(), { cliCommand: cli, now: NOW });

    const expectedDir = path.join(tmpDir, 'extractions', '20261019-120000');
    expect(report.status).toBe('completed');
    expect(report.extraction_dir).toBe(expectedDir);
    expect(fs.existsSync(path.join(expectedDir, 'analysis.json'))).toBe(true);
    expect(report.report?.split('\n')).toContain('   - Focus topic: ops');
  });

  it('추출할 대화가 없으면 empty, 빈 디렉토리는 지운다', () => {
    const report = triggerExtraction(makeConfig(), { cliCommand: fakeCli("console.log('nothing');"), now: NOW });

    expect(report.status).toBe('empty');
    expect(report.message).toBe('No conversations found in past 1 hour(s)');
    expect(fs.existsSync(report.extraction_dir)).toBe(false);
  });

  it('메타데이터가 깨졌으면 analysis_failed', () => {
    const cli = fakeCli("fs.writeFileSync(path.join(outputDir, 'dev-qa.json'), '{ broken');");
    const report = triggerExtraction(makeConfig(), { cliCommand: cli, now: NOW });

    expect(report.status).toBe('analysis_failed');
    expect(report.message.startsWith('Malformed metadata in ')).toBe(true);
    expect(report.report?.startsWith('Error: Malformed metadata in ')).toBe(true);
  });

  it('추출 프로세스 실패는 그대로 던지고 빈 디렉토리는 지운다', () => {
    const cli = fakeCli('process.exit(2);');
    expect(() => triggerExtraction(makeConfig(), { cliCommand: cli, now: NOW })).toThrow(ProcessFailedError);
    expect(fs.existsSync(path.join(tmpDir, 'extractions', '20261019-120000'))).toBe(false);
  });

  it('시간 초과도 빈 디렉토리를 남기지 않는다', () => {
    const config = { ...makeConfig(), config: { ...makeConfig().config, timeout_ms: 300 } };
    const cli = fakeCli('setTimeout(() => {}, 10000);');
    expect(() => triggerExtraction(config, { cliCommand: cli, now: NOW })).toThrow(TimeoutError);
    expect(fs.existsSync(path.join(tmpDir, 'extractions', '20261019-120000'))).toBe(false);
  });
});
