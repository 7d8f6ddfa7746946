import fs from 'fs';
import path from 'path';

import { IOFailureError } from '../errors.js';
import { logger } from '../logger.js';
import { countWords } from '../memory/tokenizer.js';
import type { AnswerRecord, QuestionRecord, Snapshot, SnapshotFiles } from './types.js';

export const QUESTIONS_DIR = 'questions';
export const ANSWERS_DIR = 'answers';
export const METADATA_SUFFIX = '-qa.json';
const ALL_SESSIONS_LABEL = 'all-sessions';

/** 파일명용 타임스탬프: ':' → '-', 'Z' 제거 */
export function sanitizeTimestamp(timestamp: string): string {
  return timestamp.replace(/:/g, '-').replace('Z', '');
}

export function snapshotLabel(snapshot: Snapshot): string {
  return (snapshot.session_id || ALL_SESSIONS_LABEL).replace(/[\\/]/g, '_');
}

export function formatQuestionFile(q: QuestionRecord): string {
  const topics = q.topics.length > 0 ? q.topics.join(', ') : 'none';
  return [
    `[${q.seq}] ${q.user} (${q.timestamp})`,
    `Topics: ${topics}`,
    `Tokens: ${countWords(q.q)}`,
    '',
    q.q,
  ].join('\n');
}

export function formatAnswerFile(a: AnswerRecord): string {
  return [
    `[${a.seq}] Response to: ${a.q}`,
    `Timestamp: ${a.timestamp}`,
    `Significance: ${a.significance.toFixed(2)}`,
    `Tokens: ${a.a_tokens}`,
    '',
    a.a,
  ].join('\n');
}

function writeFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new IOFailureError(`Could not write ${filePath}`, err instanceof Error ? err : undefined, { filePath });
  }
}

/**
 * 스냅샷을 디렉토리에 저장한다.
 *
 * outputDir/
 *   {label}-qa.json
 *   questions/{ts}-{seq}.txt
 *   answers/{ts}-{seq}.txt
 */
export function persistSnapshot(outputDir: string, snapshot: Snapshot): SnapshotFiles {
  const questionsDir = path.join(outputDir, QUESTIONS_DIR);
  const answersDir = path.join(outputDir, ANSWERS_DIR);
  try {
    fs.mkdirSync(questionsDir, { recursive: true });
    fs.mkdirSync(answersDir, { recursive: true });
  } catch (err) {
    throw new IOFailureError(`Could not create ${outputDir}`, err instanceof Error ? err : undefined, { outputDir });
  }

  const metadataFile = path.join(outputDir, `${snapshotLabel(snapshot)}${METADATA_SUFFIX}`);
  writeFile(metadataFile, JSON.stringify(snapshot, null, 2));

  const questions = snapshot.questions.map((q) => {
    const file = path.join(questionsDir, `${sanitizeTimestamp(q.timestamp)}-${q.seq}.txt`);
    writeFile(file, formatQuestionFile(q));
    return file;
  });

  const answers = snapshot.answers.map((a) => {
    const file = path.join(answersDir, `${sanitizeTimestamp(a.timestamp)}-${a.seq}.txt`);
    writeFile(file, formatAnswerFile(a));
    return file;
  });

  logger.info({ outputDir, questions: questions.length, answers: answers.length }, '스냅샷 저장 완료');
  return { metadataFile, questionsDir, answersDir, questions, answers };
}
