import crypto from 'crypto';

import { NotFoundError, SessionExistsError, SessionNotFoundError } from '../errors.js';
import { clampSignificance, scoreSignificance } from './significance.js';
import { countWords, extractTokens } from './tokenizer.js';
import type { EntryRef, IndexDocument, NewEntryInput, QaEntry, Session } from './types.js';

// 인덱스 문서에 대한 순수 연산. 파일 I/O는 index-store.ts 담당.

export const DOCUMENT_VERSION = 1;

export function hashText(text: string): string {
  return crypto.createHash('md5').update(text, 'utf-8').digest('hex');
}

export function createEmptyDocument(now: string = new Date().toISOString()): IndexDocument {
  return {
    metadata: {
      version: DOCUMENT_VERSION,
      created_at: now,
      last_updated: now,
      total_qa_pairs: 0,
      stored_answers: 0,
      empty_answers_count: 0,
      revision: 0,
    },
    sessions: [],
    index: {
      by_topic: {},
      by_recency: [],
      by_semantic_hash: {},
    },
  };
}

export function findSession(doc: IndexDocument, sessionId: string): Session | undefined {
  return doc.sessions.find((s) => s.session_id === sessionId);
}

function requireSession(doc: IndexDocument, sessionId: string): Session {
  const session = findSession(doc, sessionId);
  if (!session) throw new SessionNotFoundError(sessionId);
  return session;
}

/** 미등록/빈 세션은 1, 그 외 max(seq) + 1 */
export function nextSequence(doc: IndexDocument, sessionId: string): number {
  const session = findSession(doc, sessionId);
  if (!session) return 1;
  return session.qa_sequence.reduce((max, qa) => Math.max(max, qa.seq), 0) + 1;
}

export function createSession(doc: IndexDocument, sessionId: string, now: string = new Date().toISOString()): Session {
  if (findSession(doc, sessionId)) throw new SessionExistsError(sessionId);
  const session: Session = {
    session_id: sessionId,
    created_at: now,
    last_updated: now,
    qa_sequence: [],
  };
  doc.sessions.push(session);
  doc.metadata.last_updated = now;
  return session;
}

function normalizeAnswer(answer: string | null | undefined): string | null {
  if (answer === null || answer === undefined) return null;
  return answer.trim() ? answer : null;
}

// '__proto__'는 객체 키로 저장할 수 없어 버린다
const RESERVED_TAG = '__proto__';

function normalizeTags(tags: string[] | undefined): string[] {
  if (!tags) return [];
  return [...new Set(tags.map((t) => t.trim()).filter((t) => t && t !== RESERVED_TAG))];
}

export function buildEntry(seq: number, input: NewEntryInput, now: string): QaEntry {
  const answer = normalizeAnswer(input.a);
  const significance = clampSignificance(input.significance ?? scoreSignificance(input.q, answer));

  return {
    seq,
    timestamp: now,
    user: input.user || 'unknown',
    q: input.q,
    q_tokens: extractTokens(input.q),
    q_hash: hashText(input.q),
    a: answer,
    a_significance: significance,
    a_tokens: answer ? countWords(answer) : 0,
    topic_tags: normalizeTags(input.topicTags),
  };
}

// 토픽은 자유 텍스트라 'constructor' 같은 키도 들어온다. 자기 속성만 본다
function addTopicRef(byTopic: Record<string, EntryRef[]>, tag: string, ref: EntryRef): void {
  if (Object.hasOwn(byTopic, tag)) byTopic[tag].push(ref);
  else byTopic[tag] = [ref];
}

/**
 * 세션에 QA 엔트리를 추가하고 세 가지 보조 인덱스와 카운터를 갱신한다.
 * 세션은 미리 생성되어 있어야 한다.
 */
export function appendEntry(
  doc: IndexDocument,
  sessionId: string,
  input: NewEntryInput,
  now: string = new Date().toISOString(),
): QaEntry {
  const session = requireSession(doc, sessionId);
  const entry = buildEntry(nextSequence(doc, sessionId), input, now);

  session.qa_sequence.push(entry);
  session.last_updated = now;

  const ref: EntryRef = { session: sessionId, seq: entry.seq };
  for (const tag of entry.topic_tags) {
    addTopicRef(doc.index.by_topic, tag, { ...ref });
  }
  doc.index.by_recency.unshift({ ...ref, timestamp: now });
  doc.index.by_semantic_hash[entry.q_hash] = { ...ref };

  doc.metadata.total_qa_pairs += 1;
  if (entry.a) doc.metadata.stored_answers += 1;
  else doc.metadata.empty_answers_count += 1;
  doc.metadata.last_updated = now;

  return entry;
}

export function resolveRef(doc: IndexDocument, ref: EntryRef): QaEntry | undefined {
  return findSession(doc, ref.session)?.qa_sequence.find((qa) => qa.seq === ref.seq);
}

function requireEntry(doc: IndexDocument, sessionId: string, seq: number): QaEntry {
  const entry = requireSession(doc, sessionId).qa_sequence.find((qa) => qa.seq === seq);
  if (!entry) {
    throw new NotFoundError(`Entry not found: ${sessionId}#${seq}`, { sessionId, seq });
  }
  return entry;
}

export function setSignificance(
  doc: IndexDocument,
  sessionId: string,
  seq: number,
  value: number,
  now: string = new Date().toISOString(),
): QaEntry {
  const entry = requireEntry(doc, sessionId, seq);
  entry.a_significance = clampSignificance(value);
  doc.metadata.last_updated = now;
  return entry;
}

function sameRef(a: EntryRef, sessionId: string, seq: number): boolean {
  return a.session === sessionId && a.seq === seq;
}

/**
 * 엔트리를 삭제하고 이를 가리키는 모든 인덱스 참조를 정리한다.
 * 같은 질문 해시를 가진 다른 엔트리가 남아 있으면 해시 인덱스는 그중 최신 엔트리로 옮긴다.
 */
export function removeEntry(
  doc: IndexDocument,
  sessionId: string,
  seq: number,
  now: string = new Date().toISOString(),
): QaEntry {
  const session = requireSession(doc, sessionId);
  const entry = requireEntry(doc, sessionId, seq);
  session.qa_sequence = session.qa_sequence.filter((qa) => qa.seq !== seq);
  session.last_updated = now;

  for (const [topic, refs] of Object.entries(doc.index.by_topic)) {
    const kept = refs.filter((r) => !sameRef(r, sessionId, seq));
    if (kept.length === 0) delete doc.index.by_topic[topic];
    else doc.index.by_topic[topic] = kept;
  }

  doc.index.by_recency = doc.index.by_recency.filter((r) => !sameRef(r, sessionId, seq));

  const hashRef = doc.index.by_semantic_hash[entry.q_hash];
  if (hashRef && sameRef(hashRef, sessionId, seq)) {
    const replacement = latestWithHash(doc, entry.q_hash);
    if (replacement) doc.index.by_semantic_hash[entry.q_hash] = replacement;
    else delete doc.index.by_semantic_hash[entry.q_hash];
  }

  doc.metadata.total_qa_pairs = Math.max(0, doc.metadata.total_qa_pairs - 1);
  if (entry.a) doc.metadata.stored_answers = Math.max(0, doc.metadata.stored_answers - 1);
  else doc.metadata.empty_answers_count = Math.max(0, doc.metadata.empty_answers_count - 1);
  doc.metadata.last_updated = now;

  return entry;
}

function latestWithHash(doc: IndexDocument, hash: string): EntryRef | null {
  let best: { ref: EntryRef; time: number } | null = null;
  for (const session of doc.sessions) {
    for (const qa of session.qa_sequence) {
      if (qa.q_hash !== hash) continue;
      const time = Date.parse(qa.timestamp);
      if (!best || time >= best.time) {
        best = { ref: { session: session.session_id, seq: qa.seq }, time };
      }
    }
  }
  return best?.ref ?? null;
}

export interface DanglingRef {
  index: 'by_topic' | 'by_recency' | 'by_semantic_hash';
  key: string;
  ref: EntryRef;
}

/** 실제 엔트리로 해석되지 않는 인덱스 참조 목록 */
export function findDanglingRefs(doc: IndexDocument): DanglingRef[] {
  const dangling: DanglingRef[] = [];
  const check = (index: DanglingRef['index'], key: string, ref: EntryRef) => {
    if (!resolveRef(doc, ref)) {
      dangling.push({ index, key, ref: { session: ref.session, seq: ref.seq } });
    }
  };

  for (const [topic, refs] of Object.entries(doc.index.by_topic)) {
    for (const ref of refs) check('by_topic', topic, ref);
  }
  doc.index.by_recency.forEach((ref, i) => check('by_recency', String(i), ref));
  for (const [hash, ref] of Object.entries(doc.index.by_semantic_hash)) {
    check('by_semantic_hash', hash, ref);
  }
  return dangling;
}
