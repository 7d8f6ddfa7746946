#!/usr/bin/env node
// qa-memory CLI - 메인 디스패처
import fs from 'fs';
import path from 'path';
import * as p from '@clack/prompts';

import {
  ANSWER_PREVIEW_LENGTH,
  CRON_CONFIG_FILE,
  EXTRACTION_HOURS,
  EXTRACTIONS_DIR,
  RECENT_WINDOW,
} from '../config.js';
import { findLatestAnalysis, buildContext, injectIntoPrompt, readAnalysisFile } from '../context/context-builder.js';
import { MemoryError, NotFoundError, errorMessage, isMemoryError } from '../errors.js';
import { runAnalysis } from '../extraction/analyze.js';
import { extractSince } from '../extraction/extract.js';
import { loadCronConfig, startExtractionLoop } from '../extraction/schedule.js';
import { persistSnapshot } from '../extraction/snapshot.js';
import { triggerExtraction } from '../extraction/trigger.js';
import { logger } from '../logger.js';
import { findDanglingRefs, findSession } from '../memory/document.js';
import { IndexStore } from '../memory/index-store.js';
import { byHash, byRecency, byTopic, collectStats, findRelevant, listTopics, recent } from '../memory/query.js';
import { parseCliArgs, type CliOptions } from './args.js';
import {
  formatDangling,
  formatExtraction,
  formatHashLookup,
  formatRecency,
  formatRecent,
  formatRelevant,
  formatSession,
  formatStats,
  formatTopic,
} from './format.js';
import { runSetupWizard } from './setup.js';

const HELP = `qa-memory - QA-indexed memory management

Commands:
  init                                   Create an empty index file
  create-session <session_id>            Register a session
  log --session S --q TEXT [--a TEXT] [--user U] [--topics a,b] [--significance N]
  query <text> [--session S] [--limit N] [--min-sig N]
  recent --session S [--window N]        Last N Q-A pairs of a session
  recent-all [n]                         Last N Q-A pairs across sessions
  topic <topic>                          Q-A pairs for a topic
  list-topics                            All indexed topics
  hash <hash>                            Look up a question by its hash
  set-significance <session> <seq> <N>   Override answer significance (0-1)
  remove <session> <seq>                 Delete an entry and its index references
  dump-session <session_id>              All Q-A pairs of a session
  stats                                  Memory statistics
  validate                               Check index references
  extract --output-dir DIR [--hours N] [--session S]
  analyze <extraction_dir>
  context --session S [--extraction-dir DIR] [--qa-window N] [--output FILE] [--inject FILE]
  trigger [--config FILE]                Run one extraction + analysis
  setup [--config FILE]                  Interactive schedule setup
  schedule [--config FILE]               Run the extraction scheduler

Global options:
  --index FILE                           Index file (default: $INDEX_FILE or memory/qa-index.json)
`;

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new MemoryError(`${name} is required`, 'USAGE');
  return value;
}

function numberArg(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (Number.isNaN(n)) throw new MemoryError(`${name} must be a number: ${value}`, 'USAGE');
  return n;
}

function intArg(value: string | undefined, name: string, fallback: number): number {
  return Math.trunc(numberArg(value, name, fallback));
}

/** --topics a,b --topics c 모두 허용 */
function parseTopics(raw: string[] | undefined): string[] | undefined {
  if (!raw) return undefined;
  return raw.flatMap((t) => t.split(',')).map((t) => t.trim()).filter(Boolean);
}

function run(command: string | undefined, args: string[], opts: CliOptions): void {
  const store = new IndexStore(opts.index ? path.resolve(opts.index) : undefined);

  switch (command) {
    case 'init': {
      if (store.init()) p.log.success(`Index created at ${store.filePath}`);
      else p.log.info(`Index already exists at ${store.filePath}`);
      return;
    }

    case 'create-session': {
      const sessionId = requireArg(args[0] ?? opts.session, 'session_id');
      store.createSession(sessionId);
      p.log.success(`Session ${sessionId} created`);
      return;
    }

    case 'log': {
      const sessionId = requireArg(opts.session, '--session');
      const significance = opts.significance === undefined ? undefined : numberArg(opts.significance, '--significance', 0);
      const entry = store.append(sessionId, {
        user: opts.user,
        q: requireArg(opts.q, '--q'),
        a: opts.a,
        topicTags: parseTopics(opts.topics),
        significance,
      });
      p.log.success(`Added Q-A pair #${entry.seq} to ${sessionId}`);
      print(
        `Significance: ${entry.a_significance.toFixed(2)} | Topics: ${entry.topic_tags.length > 0 ? entry.topic_tags.join(', ') : 'none'}`,
      );
      return;
    }

    case 'query': {
      const results = findRelevant(store.load(), requireArg(args.join(' '), 'query'), {
        sessionId: opts.session,
        limit: intArg(opts.limit, '--limit', 5),
        minSignificance: numberArg(opts['min-sig'], '--min-sig', 0),
      });
      print(formatRelevant(results));
      return;
    }

    case 'recent': {
      const sessionId = requireArg(opts.session, '--session');
      print(formatRecent(recent(store.load(), sessionId, intArg(opts.window, '--window', RECENT_WINDOW))));
      return;
    }

    case 'recent-all': {
      print(formatRecency(byRecency(store.load(), intArg(args[0], 'n', 5))));
      return;
    }

    case 'topic': {
      const lookup = byTopic(store.load(), requireArg(args[0], 'topic'));
      print(formatTopic(lookup));
      if (!lookup.found) process.exitCode = 1;
      return;
    }

    case 'list-topics': {
      print(listTopics(store.load()).join('\n'));
      return;
    }

    case 'hash': {
      const hash = requireArg(args[0], 'hash');
      const resolved = byHash(store.load(), hash);
      print(formatHashLookup(hash, resolved));
      if (!resolved?.entry) process.exitCode = 1;
      return;
    }

    case 'set-significance': {
      const sessionId = requireArg(args[0], 'session');
      const seq = intArg(requireArg(args[1], 'seq'), 'seq', 0);
      const value = numberArg(requireArg(args[2], 'value'), 'value', 0);
      const entry = store.setSignificance(sessionId, seq, value);
      p.log.success(`Updated ${sessionId}#${seq} with significance ${entry.a_significance.toFixed(2)}`);
      return;
    }

    case 'remove': {
      const sessionId = requireArg(args[0], 'session');
      const seq = intArg(requireArg(args[1], 'seq'), 'seq', 0);
      store.removeEntry(sessionId, seq);
      p.log.success(`Removed ${sessionId}#${seq}`);
      return;
    }

    case 'dump-session': {
      const sessionId = requireArg(args[0] ?? opts.session, 'session_id');
      const session = findSession(store.load(), sessionId);
      if (!session) throw new NotFoundError(`Session not found: ${sessionId}`, { sessionId });
      print(formatSession(session));
      return;
    }

    case 'stats': {
      print(formatStats(collectStats(store.load())));
      return;
    }

    case 'validate': {
      const dangling = findDanglingRefs(store.load());
      print(formatDangling(dangling));
      if (dangling.length > 0) process.exitCode = 1;
      return;
    }

    case 'extract': {
      const outputDir = path.resolve(requireArg(opts['output-dir'], '--output-dir'));
      const hours = numberArg(opts.hours, '--hours', EXTRACTION_HOURS);
      const snapshot = extractSince(store.load(), { hours, sessionId: opts.session });
      if (snapshot.count === 0) {
        print(`No conversations found in past ${hours} hour(s)`);
        return;
      }
      print(formatExtraction(snapshot, persistSnapshot(outputDir, snapshot)));
      return;
    }

    case 'analyze': {
      const extractionDir = path.resolve(requireArg(args[0] ?? opts['extraction-dir'], 'extraction_dir'));
      const { result, report, analysisFile } = runAnalysis(extractionDir);
      print(report);
      if (analysisFile) p.log.info(`Analysis saved to ${analysisFile}`);
      if (!result.ok) process.exitCode = 1;
      return;
    }

    case 'context': {
      const sessionId = requireArg(opts.session, '--session');
      const extractionDir = opts['extraction-dir'] ?? EXTRACTIONS_DIR;
      const analysisFile = findLatestAnalysis(extractionDir);
      const context = buildContext({
        document: store.load(),
        sessionId,
        analysis: analysisFile ? readAnalysisFile(analysisFile) : null,
        window: intArg(opts['qa-window'], '--qa-window', RECENT_WINDOW),
        previewLength: intArg(opts['preview-length'], '--preview-length', ANSWER_PREVIEW_LENGTH),
      });
      if (!context) return;

      const output = opts.inject ? injectIntoPrompt(context, fs.readFileSync(opts.inject, 'utf-8')) : context;
      print(output);
      if (opts.output) {
        fs.mkdirSync(path.dirname(opts.output), { recursive: true });
        fs.writeFileSync(opts.output, output, 'utf-8');
        p.log.info(`Context saved to ${opts.output}`);
      }
      return;
    }

    case 'trigger': {
      const report = triggerExtraction(loadCronConfig(opts.config ?? CRON_CONFIG_FILE));
      if (report.report) print(report.report);
      print(JSON.stringify({ ...report, report: undefined }, null, 2));
      if (report.status === 'analysis_failed') process.exitCode = 1;
      return;
    }

    case 'schedule': {
      const config = loadCronConfig(opts.config ?? CRON_CONFIG_FILE);
      const loop = startExtractionLoop({ config, run: (c) => triggerExtraction(c) });
      const shutdown = (signal: string) => {
        logger.info({ signal }, '종료 신호 수신');
        loop.stop();
        process.exit(0);
      };
      process.on('SIGTERM', () => shutdown('SIGTERM'));
      process.on('SIGINT', () => shutdown('SIGINT'));
      return;
    }

    case 'help':
    case undefined: {
      print(HELP);
      return;
    }

    default:
      throw new MemoryError(`Unknown command: ${command}\n\n${HELP}`, 'USAGE');
  }
}

async function main(): Promise<void> {
  const { values: opts, positionals } = parseCliArgs(process.argv.slice(2));
  const [command, ...args] = positionals;
  if (opts.help) {
    print(HELP);
    return;
  }

  if (command === 'setup') {
    await runSetupWizard(opts.config ?? CRON_CONFIG_FILE);
    return;
  }

  run(command, args, opts);
}

main().catch((err: unknown) => {
  if (isMemoryError(err)) {
    logger.debug({ code: err.code, context: err.context }, '명령 실패');
    p.log.error(err.message);
  } else {
    logger.error({ err: errorMessage(err) }, '예상치 못한 오류');
  }
  process.exitCode = 1;
});
