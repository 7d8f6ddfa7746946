import type { DanglingRef } from '../memory/document.js';
import type { MemoryStats, RelevantPair, ResolvedRef, TopicLookup } from '../memory/query.js';
import type { QaEntry, Session } from '../memory/types.js';
import type { Snapshot, SnapshotFiles } from '../extraction/types.js';

// CLI 출력 포매터. 모두 순수 함수 (stdout 쓰기는 index.ts)

const RECENT_ANSWER_LIMIT = 300;

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatRelevant(results: RelevantPair[]): string {
  const lines = [`Found ${results.length} relevant pairs:`, ''];
  results.forEach((pair, i) => {
    lines.push(`${i + 1}. [${pair.session}#${pair.seq}] ${pair.q.slice(0, 80)} (score: ${pair.score})`);
    if (pair.a) {
      lines.push(`   Significance: ${pair.significance.toFixed(2)}`);
    }
    lines.push('');
  });
  return lines.join('\n').trimEnd();
}

export function formatRecent(entries: QaEntry[], includeAnswers = true): string {
  const lines = ['=== Recent Context ===', ''];
  for (const qa of entries) {
    lines.push(`[${qa.seq}] Q: ${qa.q}`);
    if (includeAnswers && qa.a) {
      const answer = qa.a.length > RECENT_ANSWER_LIMIT ? `${qa.a.slice(0, RECENT_ANSWER_LIMIT)}...[truncated]` : qa.a;
      lines.push(`    A: ${answer}`);
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

function formatResolved(resolved: ResolvedRef): string[] {
  const { ref, entry } = resolved;
  if (!entry) return [`[${ref.session}#${ref.seq}] not found`];
  const lines = [`[${ref.session}#${entry.seq}] Q: ${entry.q.slice(0, 80)}`];
  if (entry.a) {
    lines.push(`    Significance: ${entry.a_significance.toFixed(2)}`);
  }
  return lines;
}

export function formatTopic(lookup: TopicLookup): string {
  if (!lookup.found) return `Topic '${lookup.topic}' not found`;
  const lines = [`Topic: ${lookup.topic}`, `References: ${lookup.refs.length}`, ''];
  for (const resolved of lookup.refs) {
    lines.push(...formatResolved(resolved), '');
  }
  return lines.join('\n').trimEnd();
}

export function formatRecency(refs: ResolvedRef[]): string {
  if (refs.length === 0) return 'No entries';
  return refs.flatMap(formatResolved).join('\n');
}

export function formatHashLookup(hash: string, resolved: ResolvedRef | null): string {
  if (!resolved) return `Hash not found: ${hash}`;
  const { ref, entry } = resolved;
  if (!entry) return `[${ref.session}#${ref.seq}] not found`;
  return [
    `Q: ${entry.q}`,
    `A: ${entry.a ?? '(none)'}`,
    `Significance: ${entry.a_significance.toFixed(2)}`,
    `Tokens: ${entry.a_tokens}`,
  ].join('\n');
}

export function formatSession(session: Session): string {
  const lines = [`Session: ${session.session_id} (${session.qa_sequence.length} entries)`, ''];
  for (const qa of session.qa_sequence) {
    lines.push(`[${qa.seq}] [${qa.timestamp}] Q: ${qa.q.slice(0, 80)}`);
    if (qa.a) {
      lines.push(`    A (tokens: ${qa.a_tokens}, sig: ${qa.a_significance.toFixed(2)}): ${preview(qa.a, 200)}`);
    }
  }
  return lines.join('\n');
}

export function formatStats(stats: MemoryStats): string {
  return [
    'Memory Statistics',
    `   Total Q-A pairs: ${stats.totalPairs}`,
    `   Stored answers: ${stats.storedAnswers}`,
    `   Empty answers: ${stats.emptyAnswers}`,
    `   Average significance: ${stats.averageSignificance.toFixed(2)}`,
    `   Sessions: ${stats.sessions}`,
    `   Topics: ${stats.topics}`,
    `   Last updated: ${stats.lastUpdated}`,
  ].join('\n');
}

export function formatDangling(dangling: DanglingRef[]): string {
  if (dangling.length === 0) return 'All index references resolve';
  return [
    `${dangling.length} dangling reference(s):`,
    ...dangling.map((d) => `   ${d.index}[${d.key}] -> ${d.ref.session}#${d.ref.seq}`),
  ].join('\n');
}

export function formatExtraction(snapshot: Snapshot, files: SnapshotFiles): string {
  return [
    'Conversation Extraction Summary',
    '================================',
    `Time window: ${snapshot.cutoff_time} to now`,
    `Questions found: ${files.questions.length}`,
    `Answers found: ${files.answers.length}`,
    '',
    'Files saved:',
    `   Metadata: ${files.metadataFile}`,
    `   Questions: ${files.questionsDir}`,
    `   Answers: ${files.answersDir}`,
  ].join('\n');
}
