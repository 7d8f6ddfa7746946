import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AnswerRecord, QuestionRecord, Snapshot, SnapshotContents } from './types.js';

vi.mock('../logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { persistSnapshot, formatQuestionFile, formatAnswerFile, sanitizeTimestamp, snapshotLabel } = await import(
  './snapshot.js'
);
const {
  analyzeSnapshot,
  generateReport,
  loadAnalysis,
  readSnapshot,
  runAnalysis,
  PATTERN_HIGH_QUALITY,
  PATTERN_LOW_QUALITY,
} = await import('./analyze.js');

function question(seq: number, topics: string[], q = `question ${seq}`, session = 'dev'): QuestionRecord {
  return {
    session,
    seq,
    timestamp: `2026-10-19T11:0${seq}:00.000Z`,
    user: 'kim',
    q,
    q_tokens: [],
    topics,
  };
}

function answer(seq: number, significance: number, q = `question ${seq}`, session = 'dev'): AnswerRecord {
  return {
    session,
    seq,
    timestamp: `2026-10-19T11:0${seq}:00.000Z`,
    user: 'kim',
    q,
    a: `answer ${seq}`,
    significance,
    a_tokens: 2,
  };
}

function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  const questions = [question(1, ['db'], 'how to index'), question(2, ['db', 'ops']), question(3, [])];
  const answers = [answer(1, 0.9, 'how to index'), answer(2, 0.3)];
  return {
    count: questions.length,
    questions,
    answers,
    summary: 'Found 3 questions and 2 answers in past 1 hour(s)',
    cutoff_time: '2026-10-19T11:00:00.000Z',
    hours: 1,
    session_id: 'dev',
    ...overrides,
  };
}

function contentsOf(snapshot: Snapshot): SnapshotContents {
  const questions: Record<string, string> = {};
  const answers: Record<string, string> = {};
  snapshot.questions.forEach((q) => (questions[`${q.seq}.txt`] = q.q));
  snapshot.answers.forEach((a) => (answers[`${a.seq}.txt`] = a.a));
  return { metadata: snapshot, questions, answers };
}

const NOW = new Date('2026-10-19T12:00:00.000Z');
let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qa-memory-analyze-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('snapshot 파일 포맷', () => {
  it('타임스탬프를 파일명용으로 바꾼다', () => {
    expect(sanitizeTimestamp('2026-10-19T11:05:00.000Z')).toBe('2026-10-19T11-05-00.000');
  });

  it('세션이 없으면 all-sessions 라벨', () => {
    expect(snapshotLabel(makeSnapshot({ session_id: null }))).toBe('all-sessions');
    expect(snapshotLabel(makeSnapshot({ session_id: 'a/b' }))).toBe('a_b');
  });

  it('질문 파일', () => {
    expect(formatQuestionFile(question(1, ['db'], 'how to index'))).toBe(
      '[1] kim (2026-10-19T11:01:00.000Z)\nTopics: db\nTokens: 3\n\nhow to index',
    );
    expect(formatQuestionFile(question(3, []))).toContain('\nTopics: none\n');
  });

  it('답변 파일', () => {
    expect(formatAnswerFile(answer(2, 0.3))).toBe(
      '[2] Response to: question 2\nTimestamp: 2026-10-19T11:02:00.000Z\nSignificance: 0.30\nTokens: 2\n\nanswer 2',
    );
  });
});

describe('persistSnapshot + readSnapshot', () => {
  it('메타데이터와 텍스트 파일을 저장하고 다시 읽는다', () => {
    const snapshot = makeSnapshot();
    const files = persistSnapshot(tmpDir, snapshot);

    expect(files.metadataFile).toBe(path.join(tmpDir, 'dev-qa.json'));
    expect(files.questions.map((f) => path.basename(f))).toEqual([
      '2026-10-19T11-01-00.000-1.txt',
      '2026-10-19T11-02-00.000-2.txt',
      '2026-10-19T11-03-00.000-3.txt',
    ]);
    expect(files.answers).toHaveLength(2);

    const read = readSnapshot(tmpDir);
    expect(read.ok).toBe(true);
    if (!read.ok) return;
    expect(read.data.metadata).toEqual(snapshot);
    expect(Object.keys(read.data.questions)).toHaveLength(3);
    expect(read.data.answers['2026-10-19T11-02-00.000-2.txt']).toBe(formatAnswerFile(answer(2, 0.3)));
  });

  it('디렉토리가 없으면 에러 결과', () => {
    const dir = path.join(tmpDir, 'missing');
    expect(readSnapshot(dir)).toEqual({ ok: false, error: `Directory not found: ${dir}` });
  });

  it('메타데이터 파일이 없으면 에러 결과', () => {
    expect(readSnapshot(tmpDir)).toEqual({ ok: false, error: `No metadata file found in ${tmpDir}` });
  });

  it('메타데이터가 깨졌으면 에러 결과', () => {
    const file = path.join(tmpDir, 'dev-qa.json');
    fs.writeFileSync(file, '{ nope');
    const read = readSnapshot(tmpDir);
    expect(read.ok).toBe(false);
    if (read.ok) return;
    expect(read.error.startsWith(`Malformed metadata in ${file}:`)).toBe(true);
  });

  it('questions/answers 디렉토리가 없어도 읽는다', () => {
    fs.writeFileSync(path.join(tmpDir, 'dev-qa.json'), JSON.stringify(makeSnapshot()));
    const read = readSnapshot(tmpDir);
    expect(read.ok && read.data.questions).toEqual({});
  });
});

describe('analyzeSnapshot', () => {
  it('토픽, 중요도 구간, 누락 답변, 집중 토픽', () => {
    const analysis = analyzeSnapshot(contentsOf(makeSnapshot()), NOW);

    expect(analysis).toEqual({
      period: '2026-10-19T11:00:00.000Z',
      analyzed_at: '2026-10-19T12:00:00.000Z',
      total_questions: 3,
      total_answers: 2,
      topics: { db: 2, ops: 1 },
      high_significance_answers: [{ seq: 1, q_preview: 'how to index', significance: 0.9, tokens: 2 }],
      low_significance_answers: [{ seq: 2, q_preview: 'question 2', significance: 0.3 }],
      missing_answers: [3],
      patterns: ['Focus topic: db'],
    });
  });

  it('Object.prototype 이름의 토픽도 숫자로 센다', () => {
    const snapshot = makeSnapshot({
      questions: [question(1, ['constructor']), question(2, ['constructor', 'toString'])],
      answers: [],
    });
    const analysis = analyzeSnapshot(contentsOf(snapshot), NOW);

    expect(analysis.topics).toEqual({ constructor: 2, toString: 1 });
    expect(analysis.patterns).toEqual(['Focus topic: constructor']);
    expect(generateReport({ ok: true, analysis }).split('\n')).toContain('   constructor: 2 question(s)');
  });

  it('누락 답변은 (세션, seq) 단위로 대조한다', () => {
    const snapshot = makeSnapshot({
      questions: [question(1, [], 'q', 'a'), question(1, [], 'q', 'b')],
      answers: [answer(1, 0.6, 'q', 'a')],
    });
    expect(analyzeSnapshot(contentsOf(snapshot), NOW).missing_answers).toEqual([1]);
  });

  it('답변이 5개 초과이고 평균이 높으면 고품질 패턴', () => {
    const answers = [1, 2, 3, 4, 5, 6].map((seq) => answer(seq, 0.9));
    const snapshot = makeSnapshot({ questions: [], answers });
    expect(analyzeSnapshot(contentsOf(snapshot), NOW).patterns).toEqual([PATTERN_HIGH_QUALITY]);
  });

  it('평균이 낮으면 저품질 패턴', () => {
    const answers = [1, 2, 3, 4, 5, 6].map((seq) => answer(seq, 0.1));
    const snapshot = makeSnapshot({ questions: [], answers });
    expect(analyzeSnapshot(contentsOf(snapshot), NOW).patterns).toEqual([PATTERN_LOW_QUALITY]);
  });

  it('답변이 5개 이하면 품질 패턴 없음', () => {
    const answers = [1, 2, 3, 4, 5].map((seq) => answer(seq, 0.9));
    const snapshot = makeSnapshot({ questions: [], answers });
    expect(analyzeSnapshot(contentsOf(snapshot), NOW).patterns).toEqual([]);
  });
});

describe('generateReport', () => {
  it('에러 결과는 에러 문구만', () => {
    expect(generateReport({ ok: false, error: 'boom' })).toBe('Error: boom');
  });

  it('분석 리포트', () => {
    const analysis = analyzeSnapshot(contentsOf(makeSnapshot()), NOW);
    expect(generateReport({ ok: true, analysis }).split('\n')).toEqual([
      'CONVERSATION ANALYSIS REPORT',
      '================================',
      '',
      'Period: 2026-10-19T11:00:00.000Z',
      '',
      'Statistics:',
      '   Questions: 3',
      '   Answers: 2',
      '   Topics: 2',
      '',
      'High Quality Answers (sig >= 0.85):',
      '   [1] how to index... (sig: 0.90)',
      '',
      'Topics Discussed:',
      '   db: 2 question(s)',
      '   ops: 1 question(s)',
      '',
      'Questions without answers: 1',
      '   [Seq 3]',
      '',
      'Patterns:',
      '   - Focus topic: db',
      '',
      'Analysis complete.',
    ]);
  });
});

describe('runAnalysis', () => {
  it('analysis.json을 저장하고 다시 읽을 수 있다', () => {
    persistSnapshot(tmpDir, makeSnapshot());
    const run = runAnalysis(tmpDir, NOW);

    expect(run.result.ok).toBe(true);
    expect(run.analysisFile).toBe(path.join(tmpDir, 'analysis.json'));
    if (!run.result.ok || !run.analysisFile) return;

    const loaded = loadAnalysis(run.analysisFile);
    expect(loaded).toEqual({ ok: true, value: run.result.analysis });
  });

  it('읽기 실패는 에러 리포트로 끝난다', () => {
    const run = runAnalysis(tmpDir, NOW);
    expect(run.result.ok).toBe(false);
    expect(run.report).toBe(`Error: No metadata file found in ${tmpDir}`);
    expect(run.analysisFile).toBeNull();
    expect(fs.existsSync(path.join(tmpDir, 'analysis.json'))).toBe(false);
  });

  it('손상된 analysis.json은 ok: false', () => {
    const file = path.join(tmpDir, 'analysis.json');
    fs.writeFileSync(file, '[]');
    expect(loadAnalysis(file).ok).toBe(false);
  });
});
