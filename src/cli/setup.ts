// 추출 스케줄 설정 마법사
import * as p from '@clack/prompts';

import { CRON_CONFIG_FILE, EXTRACTION_CRON, EXTRACTIONS_DIR, INDEX_FILE, TIMEZONE } from '../config.js';
import { computeNextRun, createCronConfig, isValidCronExpression, saveCronConfig } from '../extraction/schedule.js';
import type { CronConfig } from '../extraction/types.js';

function exitIfCancelled<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel('설정이 취소되었습니다.');
    process.exit(0);
  }
  return value;
}

export async function runSetupWizard(configFile: string = CRON_CONFIG_FILE): Promise<CronConfig> {
  p.intro('qa-memory 추출 스케줄 설정');

  const sessionId = exitIfCancelled(
    await p.text({
      message: '추출할 세션 ID (비우면 전체 세션)',
      defaultValue: '',
      placeholder: 'discord-general-20260130',
    }),
  );

  const expr = exitIfCancelled(
    await p.text({
      message: 'cron 표현식',
      defaultValue: EXTRACTION_CRON,
      placeholder: EXTRACTION_CRON,
      validate: (value) => (value && !isValidCronExpression(value) ? '잘못된 cron 표현식입니다' : undefined),
    }),
  );

  const hours = exitIfCancelled(
    await p.select({
      message: '추출 범위 (최근 N시간)',
      options: [
        { value: 1, label: '1시간' },
        { value: 6, label: '6시간' },
        { value: 24, label: '24시간' },
      ],
    }),
  );

  const tz = exitIfCancelled(
    await p.text({
      message: '타임존',
      defaultValue: TIMEZONE,
      placeholder: TIMEZONE,
    }),
  );

  const config = createCronConfig({
    expr: expr || EXTRACTION_CRON,
    tz: tz || TIMEZONE,
    hours,
    sessionId: sessionId || null,
    indexFile: INDEX_FILE,
    outputDir: EXTRACTIONS_DIR,
  });

  p.note(
    [
      `스케줄: ${config.schedule.expr} (${config.schedule.tz})`,
      `인덱스: ${config.config.index_file}`,
      `출력: ${config.config.output_dir}`,
      `세션: ${config.config.session_id ?? '전체'}`,
      `다음 실행: ${computeNextRun(config) ?? '-'}`,
    ].join('\n'),
    '설정 요약',
  );

  const confirmed = exitIfCancelled(await p.confirm({ message: `${configFile}에 저장할까요?` }));
  if (!confirmed) {
    p.cancel('저장하지 않았습니다.');
    process.exit(0);
  }

  saveCronConfig(config, configFile);
  p.outro('설정 완료! `qa-memory schedule`로 스케줄러를 실행하세요.');
  return config;
}
