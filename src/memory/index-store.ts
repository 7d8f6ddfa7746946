import fs from 'fs';
import path from 'path';

import { INDEX_FILE } from '../config.js';
import { ConflictError, IOFailureError, MalformedError, NotFoundError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import {
  appendEntry,
  createEmptyDocument,
  createSession,
  nextSequence,
  removeEntry,
  setSignificance,
} from './document.js';
import { parseIndexDocument } from './schema.js';
import type { IndexDocument, NewEntryInput, QaEntry, Session } from './types.js';

/**
 * qa-index.json 저장소.
 * 모든 변경은 load → 수정 → save 한 사이클. 잠금은 없고,
 * save 시 revision이 로드 시점과 다르면 ConflictError로 갱신 유실을 알린다.
 */
export class IndexStore {
  readonly filePath: string;

  constructor(filePath: string = INDEX_FILE) {
    this.filePath = filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** 인덱스 파일이 없으면 빈 문서를 만든다. 이미 있으면 false */
  init(): boolean {
    if (this.exists()) return false;
    const doc = createEmptyDocument();
    this.write(doc);
    logger.info({ filePath: this.filePath }, '인덱스 파일 생성');
    return true;
  }

  load(): IndexDocument {
    if (!this.exists()) {
      throw new NotFoundError(`Index file not found at ${this.filePath}`, { filePath: this.filePath });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new MalformedError(`Invalid JSON in ${this.filePath}: ${errorMessage(err)}`, { filePath: this.filePath });
    }

    const parsed = parseIndexDocument(raw);
    if (!parsed.ok) {
      throw new MalformedError(`Invalid index document in ${this.filePath}`, {
        filePath: this.filePath,
        issues: parsed.issues,
      });
    }
    return parsed.value;
  }

  /**
   * 문서를 저장한다. 디스크의 revision이 문서의 revision과 다르면 거부.
   */
  save(doc: IndexDocument): void {
    if (this.exists()) {
      const onDisk = this.readRevision();
      if (onDisk !== doc.metadata.revision) {
        throw new ConflictError(this.filePath, doc.metadata.revision, onDisk);
      }
    }
    doc.metadata.revision += 1;
    this.write(doc);
  }

  private readRevision(): number {
    // 손상된 파일 위에 덮어쓰는 것은 허용 (revision 0 취급)
    try {
      const parsed = parseIndexDocument(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      return parsed.ok ? parsed.value.metadata.revision : 0;
    } catch (err) {
      logger.warn({ filePath: this.filePath, err: errorMessage(err) }, '기존 인덱스 revision 확인 실패');
      return 0;
    }
  }

  private write(doc: IndexDocument): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(doc, null, 2), 'utf-8');
    } catch (err) {
      throw new IOFailureError(
        `Could not write to ${this.filePath}`,
        err instanceof Error ? err : undefined,
        { filePath: this.filePath },
      );
    }
  }

  /** load → fn → save. fn이 던지면 저장하지 않는다 */
  update<T>(fn: (doc: IndexDocument) => T): T {
    const doc = this.load();
    const result = fn(doc);
    this.save(doc);
    return result;
  }

  // === 연산 ===

  nextSequence(sessionId: string): number {
    if (!this.exists()) return 1;
    return nextSequence(this.load(), sessionId);
  }

  createSession(sessionId: string): Session {
    const session = this.update((doc) => createSession(doc, sessionId));
    logger.info({ sessionId }, '세션 생성');
    return session;
  }

  append(sessionId: string, input: NewEntryInput): QaEntry {
    const entry = this.update((doc) => appendEntry(doc, sessionId, input));
    logger.debug({ sessionId, seq: entry.seq, significance: entry.a_significance }, 'QA 엔트리 추가');
    return entry;
  }

  setSignificance(sessionId: string, seq: number, value: number): QaEntry {
    const entry = this.update((doc) => setSignificance(doc, sessionId, seq, value));
    logger.info({ sessionId, seq, significance: entry.a_significance }, '중요도 수정');
    return entry;
  }

  removeEntry(sessionId: string, seq: number): QaEntry {
    const entry = this.update((doc) => removeEntry(doc, sessionId, seq));
    logger.info({ sessionId, seq }, 'QA 엔트리 삭제');
    return entry;
  }
}
