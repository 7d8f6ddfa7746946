import { resolveRef, findSession } from './document.js';
import { extractTokens } from './tokenizer.js';
import type { EntryRef, IndexDocument, QaEntry } from './types.js';

const SAME_SESSION_BOOST = 1.5;

export interface RelevantPair {
  score: number;
  session: string;
  seq: number;
  q: string;
  a: string | null;
  significance: number;
  timestamp: string;
}

export interface FindRelevantOptions {
  /** 지정 시 이 세션의 엔트리만, 점수 1.5배 */
  sessionId?: string;
  limit?: number;
  minSignificance?: number;
}

/**
 * 질문 토큰 겹침 수로 관련 QA를 찾는다.
 * 점수 내림차순, 동점이면 최신순.
 */
export function findRelevant(doc: IndexDocument, query: string, opts: FindRelevantOptions = {}): RelevantPair[] {
  const { sessionId, limit = 5, minSignificance = 0 } = opts;
  if (limit <= 0) return [];

  const queryTokens = new Set(extractTokens(query));
  const relevant: RelevantPair[] = [];

  for (const session of doc.sessions) {
    if (sessionId && session.session_id !== sessionId) continue;

    for (const qa of session.qa_sequence) {
      // 답변이 없는 엔트리는 중요도 필터 대상이 아님
      if (qa.a && qa.a_significance < minSignificance) continue;

      const overlap = qa.q_tokens.filter((t) => queryTokens.has(t)).length;
      const score = sessionId ? overlap * SAME_SESSION_BOOST : overlap;

      relevant.push({
        score,
        session: session.session_id,
        seq: qa.seq,
        q: qa.q,
        a: qa.a,
        significance: qa.a_significance,
        timestamp: qa.timestamp,
      });
    }
  }

  relevant.sort((x, y) => y.score - x.score || Date.parse(y.timestamp) - Date.parse(x.timestamp));
  return relevant.slice(0, limit);
}

/** 세션의 마지막 window개 엔트리 (원래 순서) */
export function recent(doc: IndexDocument, sessionId: string, window: number): QaEntry[] {
  const session = findSession(doc, sessionId);
  if (!session || window <= 0) return [];
  return session.qa_sequence.slice(-window);
}

export interface ResolvedRef {
  ref: EntryRef;
  /** 참조 대상이 세션에 없으면 null */
  entry: QaEntry | null;
}

export type TopicLookup =
  | { found: false; topic: string }
  | { found: true; topic: string; refs: ResolvedRef[] };

export function byTopic(doc: IndexDocument, topic: string): TopicLookup {
  if (!Object.hasOwn(doc.index.by_topic, topic)) return { found: false, topic };
  return {
    found: true,
    topic,
    refs: doc.index.by_topic[topic].map((ref) => ({ ref, entry: resolveRef(doc, ref) ?? null })),
  };
}

export function byHash(doc: IndexDocument, hash: string): ResolvedRef | null {
  if (!Object.hasOwn(doc.index.by_semantic_hash, hash)) return null;
  const ref = doc.index.by_semantic_hash[hash];
  return { ref, entry: resolveRef(doc, ref) ?? null };
}

/** 전체 세션 기준 최근 n개 (recency 인덱스) */
export function byRecency(doc: IndexDocument, n: number): ResolvedRef[] {
  if (n <= 0) return [];
  return doc.index.by_recency.slice(0, n).map((r) => {
    const ref = { session: r.session, seq: r.seq };
    return { ref, entry: resolveRef(doc, ref) ?? null };
  });
}

export function listTopics(doc: IndexDocument): string[] {
  return Object.keys(doc.index.by_topic).sort((a, b) => a.localeCompare(b));
}

export interface MemoryStats {
  totalPairs: number;
  storedAnswers: number;
  emptyAnswers: number;
  sessions: number;
  topics: number;
  /** 답변이 있는 엔트리 기준, 없으면 0 */
  averageSignificance: number;
  lastUpdated: string;
}

export function collectStats(doc: IndexDocument): MemoryStats {
  let sum = 0;
  let answered = 0;
  for (const session of doc.sessions) {
    for (const qa of session.qa_sequence) {
      if (!qa.a) continue;
      sum += qa.a_significance;
      answered += 1;
    }
  }

  return {
    totalPairs: doc.metadata.total_qa_pairs,
    storedAnswers: doc.metadata.stored_answers,
    emptyAnswers: doc.metadata.empty_answers_count,
    sessions: doc.sessions.length,
    topics: Object.keys(doc.index.by_topic).length,
    averageSignificance: answered > 0 ? sum / answered : 0,
    lastUpdated: doc.metadata.last_updated,
  };
}
