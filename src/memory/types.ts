// === 인덱스 문서 (qa-index.json) ===
// 필드명은 디스크 포맷 그대로 (snake_case)

export interface QaEntry {
  /** 세션 내 순번 (1부터, 단조 증가) */
  seq: number;
  /** ISO-8601 UTC */
  timestamp: string;
  user: string;
  q: string;
  q_tokens: string[];
  /** 질문 텍스트의 MD5 hex */
  q_hash: string;
  a: string | null;
  /** 0~1 */
  a_significance: number;
  a_tokens: number;
  topic_tags: string[];
}

export interface Session {
  session_id: string;
  created_at: string;
  last_updated: string;
  qa_sequence: QaEntry[];
}

export interface EntryRef {
  session: string;
  seq: number;
}

export interface RecencyRef extends EntryRef {
  timestamp: string;
}

export interface IndexMetadata {
  version: number;
  created_at: string;
  last_updated: string;
  total_qa_pairs: number;
  stored_answers: number;
  empty_answers_count: number;
  /** 저장할 때마다 1 증가 (낙관적 동시성 체크) */
  revision: number;
}

export interface SecondaryIndex {
  by_topic: Record<string, EntryRef[]>;
  /** 최신순 */
  by_recency: RecencyRef[];
  by_semantic_hash: Record<string, EntryRef>;
}

export interface IndexDocument {
  metadata: IndexMetadata;
  sessions: Session[];
  index: SecondaryIndex;
}

export interface NewEntryInput {
  user?: string;
  q: string;
  a?: string | null;
  topicTags?: string[];
  /** 지정 시 자동 점수 대신 사용 (0~1로 클램프) */
  significance?: number;
}

// === 키워드 ===

export interface KeywordSets {
  technical: string[];
  importance: string[];
  actionable: string[];
}
