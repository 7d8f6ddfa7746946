import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';

vi.mock('../logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { IndexStore } = await import('./index-store.js');
const { ConflictError, IOFailureError, MalformedError, NotFoundError, SessionNotFoundError } = await import('../errors.js');

let tmpDir: string;
let indexFile: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qa-memory-store-'));
  indexFile = path.join(tmpDir, 'qa-index.json');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('load', () => {
  it('파일이 없으면 NotFoundError', () => {
    expect(() => new IndexStore(indexFile).load()).toThrow(NotFoundError);
  });

  it('JSON이 깨졌으면 MalformedError', () => {
    fs.writeFileSync(indexFile, '{ not json');
    expect(() => new IndexStore(indexFile).load()).toThrow(MalformedError);
  });

  it('스키마가 맞지 않으면 MalformedError', () => {
    fs.writeFileSync(indexFile, JSON.stringify({ metadata: {}, sessions: 'nope', index: {} }));
    expect(() => new IndexStore(indexFile).load()).toThrow(MalformedError);
  });

  it('revision이 없는 이전 문서도 읽는다', () => {
    fs.writeFileSync(
      indexFile,
      JSON.stringify({
        metadata: { total_qa_pairs: 0, stored_answers: 0, last_updated: '2026-01-01T00:00:00Z' },
        sessions: [],
        index: { by_topic: {}, by_recency: [], by_semantic_hash: {} },
      }),
    );
    const doc = new IndexStore(indexFile).load();
    expect(doc.metadata.revision).toBe(0);
    expect(doc.metadata.empty_answers_count).toBe(0);
  });
});

describe('init', () => {
  it('빈 인덱스를 만들고, 이미 있으면 건드리지 않는다', () => {
    const store = new IndexStore(indexFile);
    expect(store.init()).toBe(true);
    expect(store.load().sessions).toEqual([]);
    expect(store.init()).toBe(false);
  });

  it('쓰기 실패는 IOFailureError', () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const store = new IndexStore(path.join(blocker, 'qa-index.json'));
    expect(() => store.init()).toThrow(IOFailureError);
  });
});

describe('append', () => {
  it('추가한 엔트리를 다시 로드하면 필드가 모두 같다', () => {
    const store = new IndexStore(indexFile);
    store.init();
    store.createSession('s1');

    const entry = store.append('s1', {
      user: 'alice',
      q: '如何 configure the database?',
      a: 'Follow these steps carefully.',
      topicTags: ['db'],
    });

    const reloaded = new IndexStore(indexFile).load();
    expect(reloaded.sessions[0].qa_sequence[0]).toEqual(entry);
    expect(entry.seq).toBe(1);
  });

  it('세션 없이 추가하면 SessionNotFoundError, 파일은 그대로', () => {
    const store = new IndexStore(indexFile);
    store.init();
    const before = fs.readFileSync(indexFile, 'utf-8');

    expect(() => store.append('missing', { q: 'hello' })).toThrow(SessionNotFoundError);
    expect(fs.readFileSync(indexFile, 'utf-8')).toBe(before);
  });

  it('저장할 때마다 revision이 증가한다', () => {
    const store = new IndexStore(indexFile);
    store.init();
    store.createSession('s1');
    store.append('s1', { q: 'one' });
    expect(store.load().metadata.revision).toBe(2);
  });

  it('nextSequence는 저장된 문서를 기준으로 한다', () => {
    const store = new IndexStore(indexFile);
    expect(store.nextSequence('s1')).toBe(1);
    store.init();
    store.createSession('s1');
    store.append('s1', { q: 'one' });
    store.append('s1', { q: 'two' });
    expect(store.nextSequence('s1')).toBe(3);
    expect(store.nextSequence('other')).toBe(1);
  });
});

describe('Object.prototype 이름의 토픽', () => {
  it('constructor 토픽이 저장 후 다시 로드해도 유지된다', () => {
    const store = new IndexStore(indexFile);
    store.init();
    store.createSession('s1');
    store.append('s1', { q: 'who builds objects', topicTags: ['constructor'] });

    const doc = store.load();
    expect(Object.entries(doc.index.by_topic)).toEqual([['constructor', [{ session: 's1', seq: 1 }]]]);
  });
});

describe('save', () => {
  it('로드 이후 다른 쓰기가 있었으면 ConflictError', () => {
    const store = new IndexStore(indexFile);
    store.init();
    store.createSession('s1');

    const stale = store.load();
    store.append('s1', { q: 'written by someone else' });

    expect(() => store.save(stale)).toThrow(ConflictError);
    expect(store.load().sessions[0].qa_sequence).toHaveLength(1);
  });
});

describe('setSignificance / removeEntry', () => {
  it('변경 사항을 저장한다', () => {
    const store = new IndexStore(indexFile);
    store.init();
    store.createSession('s1');
    store.append('s1', { q: 'one', a: 'answer' });
    store.append('s1', { q: 'two', a: 'answer' });

    store.setSignificance('s1', 1, 0.77);
    store.removeEntry('s1', 2);

    const doc = store.load();
    expect(doc.sessions[0].qa_sequence).toHaveLength(1);
    expect(doc.sessions[0].qa_sequence[0].a_significance).toBe(0.77);
    expect(doc.metadata.total_qa_pairs).toBe(1);
  });
});
