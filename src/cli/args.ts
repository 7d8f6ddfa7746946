import { parseArgs } from 'util';

import { MemoryError, errorMessage } from '../errors.js';

const OPTIONS = {
  index: { type: 'string' },
  session: { type: 'string' },
  user: { type: 'string' },
  q: { type: 'string' },
  a: { type: 'string' },
  topics: { type: 'string', multiple: true },
  significance: { type: 'string' },
  limit: { type: 'string' },
  'min-sig': { type: 'string' },
  window: { type: 'string' },
  hours: { type: 'string' },
  'output-dir': { type: 'string' },
  'extraction-dir': { type: 'string' },
  'qa-window': { type: 'string' },
  'preview-length': { type: 'string' },
  output: { type: 'string' },
  inject: { type: 'string' },
  config: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
}

export type CliArgs = ReturnType<typeof parse>;
export type CliOptions = CliArgs['values'];

/** 알 수 없는 플래그나 값 누락은 USAGE 에러로 바꾼다 */
export function parseCliArgs(argv: string[]): CliArgs {
  try {
    return parse(argv);
  } catch (err) {
    throw new MemoryError(errorMessage(err), 'USAGE', { argv });
  }
}
