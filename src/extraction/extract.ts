import type { IndexDocument } from '../memory/types.js';
import type { AnswerRecord, QuestionRecord, Snapshot } from './types.js';

const QUESTION_PREVIEW_LENGTH = 80;
const HOUR_MS = 60 * 60 * 1000;

export interface ExtractOptions {
  hours: number;
  /** 지정 시 해당 세션만 */
  sessionId?: string | null;
  now?: Date;
}

export function summarizeCounts(questions: number, answers: number, hours: number): string {
  return `Found ${questions} questions and ${answers} answers in past ${hours} hour(s)`;
}

/**
 * now - hours 이후의 QA를 질문/답변 레코드로 분리한다.
 * 답변이 비어 있는 엔트리는 질문 레코드만 만든다.
 */
export function extractSince(doc: IndexDocument, opts: ExtractOptions): Snapshot {
  const now = opts.now ?? new Date();
  const sessionId = opts.sessionId ?? null;
  const cutoff = new Date(now.getTime() - opts.hours * HOUR_MS);

  const questions: QuestionRecord[] = [];
  const answers: AnswerRecord[] = [];

  for (const session of doc.sessions) {
    if (sessionId && session.session_id !== sessionId) continue;

    for (const qa of session.qa_sequence) {
      if (Date.parse(qa.timestamp) < cutoff.getTime()) continue;

      questions.push({
        session: session.session_id,
        seq: qa.seq,
        timestamp: qa.timestamp,
        user: qa.user,
        q: qa.q,
        q_tokens: qa.q_tokens,
        topics: qa.topic_tags,
      });

      if (qa.a) {
        answers.push({
          session: session.session_id,
          seq: qa.seq,
          timestamp: qa.timestamp,
          user: qa.user,
          q: qa.q.slice(0, QUESTION_PREVIEW_LENGTH),
          a: qa.a,
          significance: qa.a_significance,
          a_tokens: qa.a_tokens,
        });
      }
    }
  }

  return {
    count: questions.length,
    questions,
    answers,
    summary: summarizeCounts(questions.length, answers.length, opts.hours),
    cutoff_time: cutoff.toISOString(),
    hours: opts.hours,
    session_id: sessionId,
  };
}
