// === 추출 스냅샷 ({label}-qa.json) ===

export interface QuestionRecord {
  session: string;
  seq: number;
  timestamp: string;
  user: string;
  q: string;
  q_tokens: string[];
  topics: string[];
}

export interface AnswerRecord {
  session: string;
  seq: number;
  timestamp: string;
  user: string;
  /** 질문 미리보기 (최대 80자) */
  q: string;
  a: string;
  significance: number;
  a_tokens: number;
}

export interface Snapshot {
  count: number;
  questions: QuestionRecord[];
  answers: AnswerRecord[];
  summary: string;
  cutoff_time: string;
  hours: number;
  session_id: string | null;
}

export interface SnapshotFiles {
  metadataFile: string;
  questionsDir: string;
  answersDir: string;
  questions: string[];
  answers: string[];
}

// === 분석 (analysis.json) ===

export interface HighlightedAnswer {
  seq: number;
  q_preview: string;
  significance: number;
  tokens: number;
}

export interface LowAnswer {
  seq: number;
  q_preview: string;
  significance: number;
}

export interface Analysis {
  period: string;
  analyzed_at: string;
  total_questions: number;
  total_answers: number;
  topics: Record<string, number>;
  high_significance_answers: HighlightedAnswer[];
  low_significance_answers: LowAnswer[];
  /** 답변이 없는 질문의 seq (오름차순) */
  missing_answers: number[];
  patterns: string[];
}

export interface SnapshotContents {
  metadata: Snapshot;
  /** 파일명 → 내용 */
  questions: Record<string, string>;
  answers: Record<string, string>;
}

export type SnapshotRead = { ok: true; data: SnapshotContents } | { ok: false; error: string };

export type AnalysisResult = { ok: true; analysis: Analysis } | { ok: false; error: string };

// === 트리거/스케줄 ===

export interface CronConfig {
  version: number;
  name: string;
  description: string;
  schedule: {
    kind: 'cron';
    expr: string;
    tz: string;
  };
  config: {
    index_file: string;
    output_dir: string;
    hours: number;
    session_id: string | null;
    timeout_ms: number;
  };
  enabled: boolean;
  created: string;
}

export interface TriggerReport {
  timestamp: string;
  status: 'completed' | 'empty' | 'analysis_failed';
  extraction_dir: string;
  message: string;
  report?: string;
}
