import path from 'path';
import { fileURLToPath } from 'url';

// === 경로 ===
const PROJECT_ROOT = process.cwd();
// src/ 와 dist/ 모두 패키지 루트에서 한 단계 아래
const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const MEMORY_DIR = path.resolve(PROJECT_ROOT, process.env.MEMORY_DIR || 'memory');
export const INDEX_FILE = process.env.INDEX_FILE
  ? path.resolve(PROJECT_ROOT, process.env.INDEX_FILE)
  : path.join(MEMORY_DIR, 'qa-index.json');
export const EXTRACTIONS_DIR = path.join(MEMORY_DIR, 'extractions');
export const CRON_CONFIG_FILE = path.join(MEMORY_DIR, 'cron-config.json');

// 키워드 목록은 코드 수정 없이 교체 가능 (현지화/튜닝)
export const KEYWORDS_FILE = process.env.KEYWORDS_FILE
  ? path.resolve(PROJECT_ROOT, process.env.KEYWORDS_FILE)
  : path.join(PACKAGE_ROOT, 'config', 'keywords.json');

// === 추출 ===
export const EXTRACTION_TIMEOUT = parseInt(process.env.EXTRACTION_TIMEOUT || '60000', 10);
export const EXTRACTION_HOURS = Math.max(1, parseInt(process.env.EXTRACTION_HOURS || '1', 10) || 1);
export const EXTRACTION_CRON = process.env.EXTRACTION_CRON || '0 * * * *';

// === 컨텍스트 ===
export const RECENT_WINDOW = parseInt(process.env.RECENT_WINDOW || '5', 10);
export const ANSWER_PREVIEW_LENGTH = parseInt(process.env.ANSWER_PREVIEW_LENGTH || '200', 10);

// === 폴링/타이밍 ===
export const SCHEDULER_POLL_INTERVAL = 60000;

// === 로깅 ===
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// === 타임존 ===
export const TIMEZONE = process.env.TZ || 'UTC';
