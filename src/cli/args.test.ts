import { describe, it, expect } from 'vitest';
import { MemoryError } from '../errors.js';
import { parseCliArgs } from './args.js';

describe('parseCliArgs', () => {
  it('명령, 위치 인자, 옵션을 나눈다', () => {
    const { values, positionals } = parseCliArgs([
      'query',
      'db',
      'setup',
      '--session',
      's1',
      '--topics',
      'a,b',
      '--topics',
      'c',
    ]);
    expect(positionals).toEqual(['query', 'db', 'setup']);
    expect(values.session).toBe('s1');
    expect(values.topics).toEqual(['a,b', 'c']);
  });

  it('알 수 없는 플래그는 USAGE 에러', () => {
    try {
      parseCliArgs(['stats', '--bogus']);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MemoryError);
      if (err instanceof MemoryError) expect(err.code).toBe('USAGE');
    }
  });

  it('값이 필요한 옵션에 값이 없으면 USAGE 에러', () => {
    expect(() => parseCliArgs(['recent', '--session'])).toThrow(MemoryError);
  });
});
