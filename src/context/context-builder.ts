import fs from 'fs';
import path from 'path';

import { ANSWER_PREVIEW_LENGTH, RECENT_WINDOW } from '../config.js';
import { logger } from '../logger.js';
import { ANALYSIS_FILE, loadAnalysis } from '../extraction/analyze.js';
import type { Analysis } from '../extraction/types.js';
import { recent } from '../memory/query.js';
import type { IndexDocument } from '../memory/types.js';

const SECTION_SEPARATOR = '\n---\n';
const ELLIPSIS = '...';

export function truncateAnswer(answer: string, maxLength: number): string {
  if (answer.length <= maxLength) return answer;
  return answer.slice(0, maxLength) + ELLIPSIS;
}

/**
 * 세션의 최근 QA를 마크다운 블록으로. 엔트리가 없으면 빈 문자열.
 */
export function formatRecentSection(
  doc: IndexDocument,
  sessionId: string,
  window: number = RECENT_WINDOW,
  previewLength: number = ANSWER_PREVIEW_LENGTH,
): string {
  const entries = recent(doc, sessionId, window);
  if (entries.length === 0) return '';

  const lines = ['## Recent Conversation Context', ''];
  for (const qa of entries) {
    lines.push(`**[${qa.seq}]** ${qa.q}`);
    if (qa.a) {
      lines.push(`> ${truncateAnswer(qa.a, previewLength)}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatAnalysisSection(analysis: Analysis): string {
  const lines = [
    '## Conversation Analysis (from last extraction)',
    '',
    `Period: ${analysis.period}`,
    `- Questions: ${analysis.total_questions}`,
    `- Answers: ${analysis.total_answers}`,
  ];

  const topics = Object.entries(analysis.topics).sort((x, y) => y[1] - x[1]);
  if (topics.length > 0) {
    lines.push('', 'Main Topics:');
    for (const [topic, count] of topics.slice(0, 3)) {
      lines.push(`- ${topic}: ${count}x`);
    }
  }

  if (analysis.high_significance_answers.length > 0) {
    lines.push('', 'Key Answers:');
    for (const ans of analysis.high_significance_answers.slice(0, 2)) {
      lines.push(`- [${ans.seq}] ${ans.q_preview.slice(0, 60)}... (sig: ${ans.significance.toFixed(2)})`);
    }
  }

  if (analysis.patterns.length > 0) {
    lines.push('', 'Patterns:');
    for (const pattern of analysis.patterns) {
      lines.push(`- ${pattern}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/** extractionsDir 아래 가장 최근(디렉토리명 기준) analysis.json 경로 */
export function findLatestAnalysis(extractionsDir: string): string | null {
  if (!fs.existsSync(extractionsDir)) return null;
  const candidates = fs
    .readdirSync(extractionsDir, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => path.join(extractionsDir, d.name, ANALYSIS_FILE))
    .filter((f) => fs.existsSync(f))
    .sort()
    .reverse();
  return candidates[0] ?? null;
}

/** 손상된 분석 파일은 경고만 남기고 건너뛴다 */
export function readAnalysisFile(filePath: string): Analysis | null {
  if (!fs.existsSync(filePath)) return null;
  const parsed = loadAnalysis(filePath);
  if (!parsed.ok) {
    logger.warn({ filePath, issues: parsed.issues }, '분석 파일 손상, 건너뜀');
    return null;
  }
  return parsed.value;
}

export interface BuildContextOptions {
  document: IndexDocument | null;
  sessionId: string;
  analysis?: Analysis | null;
  window?: number;
  previewLength?: number;
  now?: Date;
}

/**
 * 최근 대화 + 마지막 분석을 시스템 프롬프트용 블록으로 묶는다.
 * 둘 다 없으면 빈 문자열.
 */
export function buildContext(opts: BuildContextOptions): string {
  const sections: string[] = [];

  if (opts.document) {
    const recentSection = formatRecentSection(opts.document, opts.sessionId, opts.window, opts.previewLength);
    if (recentSection) sections.push(recentSection);
  }

  if (opts.analysis) {
    sections.push(formatAnalysisSection(opts.analysis));
  }

  if (sections.length === 0) return '';

  const timestamp = (opts.now ?? new Date()).toISOString();
  const block = [
    '',
    '# Conversation Memory Context',
    `*Last updated: ${timestamp}*`,
    '',
    sections.join(SECTION_SEPARATOR),
    '',
    '---',
    'Use this context to understand the conversation history and patterns.',
  ].join('\n');
  return block.trim();
}

/**
 * 프롬프트의 첫 빈 줄(첫 줄 제외) 다음에 컨텍스트를 삽입한다.
 * 빈 줄이 없으면 맨 앞에. 컨텍스트가 비어 있으면 원본 그대로.
 */
export function injectIntoPrompt(context: string, prompt: string): string {
  if (!context) return prompt;

  const lines = prompt.split('\n');
  let insertPos = 0;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === '') {
      insertPos = i + 1;
      break;
    }
  }

  return `${lines.slice(0, insertPos).join('\n')}\n\n${context}\n\n${lines.slice(insertPos).join('\n')}`;
}
