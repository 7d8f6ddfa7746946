import fs from 'fs';
import path from 'path';

import { IOFailureError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { formatIssues, type ParseResult } from '../memory/schema.js';
import { analysisSchema, snapshotSchema } from './schema.js';
import { ANSWERS_DIR, METADATA_SUFFIX, QUESTIONS_DIR } from './snapshot.js';
import type { Analysis, AnalysisResult, SnapshotContents, SnapshotRead } from './types.js';

export const ANALYSIS_FILE = 'analysis.json';

export const HIGH_SIGNIFICANCE = 0.85;
export const LOW_SIGNIFICANCE = 0.5;
const HIGH_QUALITY_MEAN = 0.8;
const LOW_QUALITY_MEAN = 0.5;
// 이 수를 초과해야 품질 패턴을 판단
const MIN_ANSWERS_FOR_QUALITY = 5;

export const PATTERN_HIGH_QUALITY = 'High quality conversation period';
export const PATTERN_LOW_QUALITY = 'Low quality/off-topic conversation';

function readTextFiles(dir: string): Record<string, string> {
  const files: Record<string, string> = {};
  if (!fs.existsSync(dir)) return files;
  for (const name of fs.readdirSync(dir).filter((f) => f.endsWith('.txt')).sort()) {
    files[name] = fs.readFileSync(path.join(dir, name), 'utf-8');
  }
  return files;
}

/**
 * 추출 디렉토리를 읽는다. questions/answers 하위 디렉토리는 없어도 된다.
 * 디렉토리/메타데이터 문제는 예외 대신 에러 결과로 반환.
 */
export function readSnapshot(extractionDir: string): SnapshotRead {
  if (!fs.existsSync(extractionDir) || !fs.statSync(extractionDir).isDirectory()) {
    return { ok: false, error: `Directory not found: ${extractionDir}` };
  }

  const metadataName = fs
    .readdirSync(extractionDir)
    .filter((f) => f.endsWith(METADATA_SUFFIX))
    .sort()[0];
  if (!metadataName) {
    return { ok: false, error: `No metadata file found in ${extractionDir}` };
  }

  const metadataFile = path.join(extractionDir, metadataName);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(metadataFile, 'utf-8'));
  } catch (err) {
    return { ok: false, error: `Malformed metadata in ${metadataFile}: ${errorMessage(err)}` };
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `Malformed metadata in ${metadataFile}: ${formatIssues(parsed.error).join('; ')}` };
  }

  return {
    ok: true,
    data: {
      metadata: parsed.data,
      questions: readTextFiles(path.join(extractionDir, QUESTIONS_DIR)),
      answers: readTextFiles(path.join(extractionDir, ANSWERS_DIR)),
    },
  };
}

function mostFrequent(counts: Record<string, number>): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [key, count] of Object.entries(counts)) {
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

export function analyzeSnapshot(contents: SnapshotContents, now: Date = new Date()): Analysis {
  const { metadata } = contents;
  const analysis: Analysis = {
    period: metadata.cutoff_time,
    analyzed_at: now.toISOString(),
    total_questions: Object.keys(contents.questions).length,
    total_answers: Object.keys(contents.answers).length,
    topics: {},
    high_significance_answers: [],
    low_significance_answers: [],
    missing_answers: [],
    patterns: [],
  };

  // 토픽명이 Object.prototype 멤버와 겹칠 수 있어 Map으로 센다
  const topicCounts = new Map<string, number>();
  for (const q of metadata.questions) {
    for (const topic of q.topics) {
      topicCounts.set(topic, (topicCounts.get(topic) ?? 0) + 1);
    }
  }
  analysis.topics = Object.fromEntries(topicCounts);

  for (const a of metadata.answers) {
    if (a.significance >= HIGH_SIGNIFICANCE) {
      analysis.high_significance_answers.push({
        seq: a.seq,
        q_preview: a.q,
        significance: a.significance,
        tokens: a.a_tokens,
      });
    } else if (a.significance < LOW_SIGNIFICANCE) {
      analysis.low_significance_answers.push({ seq: a.seq, q_preview: a.q, significance: a.significance });
    }
  }

  // 여러 세션이 섞일 수 있으므로 (session, seq) 단위로 대조
  const answered = new Set(metadata.answers.map((a) => `${a.session}#${a.seq}`));
  const missing = new Set<number>();
  for (const q of metadata.questions) {
    if (!answered.has(`${q.session}#${q.seq}`)) missing.add(q.seq);
  }
  analysis.missing_answers = [...missing].sort((x, y) => x - y);

  if (metadata.answers.length > MIN_ANSWERS_FOR_QUALITY) {
    const mean = metadata.answers.reduce((sum, a) => sum + a.significance, 0) / metadata.answers.length;
    if (mean > HIGH_QUALITY_MEAN) analysis.patterns.push(PATTERN_HIGH_QUALITY);
    if (mean < LOW_QUALITY_MEAN) analysis.patterns.push(PATTERN_LOW_QUALITY);
  }

  const topTopic = mostFrequent(analysis.topics);
  if (topTopic) analysis.patterns.push(`Focus topic: ${topTopic}`);

  return analysis;
}

/** 사람이 읽는 분석 리포트. 에러 결과면 에러 메시지만 */
export function generateReport(result: AnalysisResult): string {
  if (!result.ok) return `Error: ${result.error}`;
  const { analysis } = result;

  const lines: string[] = [
    'CONVERSATION ANALYSIS REPORT',
    '================================',
    '',
    `Period: ${analysis.period}`,
    '',
    'Statistics:',
    `   Questions: ${analysis.total_questions}`,
    `   Answers: ${analysis.total_answers}`,
    `   Topics: ${Object.keys(analysis.topics).length}`,
    '',
    `High Quality Answers (sig >= ${HIGH_SIGNIFICANCE}):`,
  ];
  for (const ans of analysis.high_significance_answers.slice(0, 5)) {
    lines.push(`   [${ans.seq}] ${ans.q_preview.slice(0, 60)}... (sig: ${ans.significance.toFixed(2)})`);
  }

  const topics = Object.entries(analysis.topics).sort((x, y) => y[1] - x[1]);
  if (topics.length > 0) {
    lines.push('', 'Topics Discussed:');
    for (const [topic, count] of topics.slice(0, 5)) {
      lines.push(`   ${topic}: ${count} question(s)`);
    }
  }

  if (analysis.missing_answers.length > 0) {
    lines.push('', `Questions without answers: ${analysis.missing_answers.length}`);
    for (const seq of analysis.missing_answers.slice(0, 3)) {
      lines.push(`   [Seq ${seq}]`);
    }
  }

  if (analysis.patterns.length > 0) {
    lines.push('', 'Patterns:');
    for (const pattern of analysis.patterns) {
      lines.push(`   - ${pattern}`);
    }
  }

  lines.push('', 'Analysis complete.');
  return lines.join('\n');
}

export function saveAnalysis(extractionDir: string, analysis: Analysis): string {
  const filePath = path.join(extractionDir, ANALYSIS_FILE);
  try {
    fs.writeFileSync(filePath, JSON.stringify(analysis, null, 2), 'utf-8');
  } catch (err) {
    throw new IOFailureError(`Could not write ${filePath}`, err instanceof Error ? err : undefined, { filePath });
  }
  return filePath;
}

export function loadAnalysis(filePath: string): ParseResult<Analysis> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    return { ok: false, issues: [errorMessage(err)] };
  }
  const parsed = analysisSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
  return { ok: true, value: parsed.data };
}

export interface AnalysisRun {
  result: AnalysisResult;
  report: string;
  /** 성공 시 저장된 analysis.json 경로 */
  analysisFile: string | null;
}

/**
 * 읽기 → 분석 → 리포트 → analysis.json 저장.
 * 읽기 문제는 에러 리포트로 끝나고, 저장 실패만 IOFailureError로 던진다.
 */
export function runAnalysis(extractionDir: string, now: Date = new Date()): AnalysisRun {
  const read = readSnapshot(extractionDir);
  if (!read.ok) {
    logger.warn({ extractionDir, error: read.error }, '스냅샷 분석 불가');
    const result: AnalysisResult = { ok: false, error: read.error };
    return { result, report: generateReport(result), analysisFile: null };
  }

  const analysis = analyzeSnapshot(read.data, now);
  const result: AnalysisResult = { ok: true, analysis };
  const analysisFile = saveAnalysis(extractionDir, analysis);
  logger.info({ extractionDir, patterns: analysis.patterns.length }, '스냅샷 분석 완료');
  return { result, report: generateReport(result), analysisFile };
}
