import pino from 'pino';
import { LOG_LEVEL } from './config.js';

// stdout은 명령 출력(컨텍스트 블록 등) 전용, 로그는 stderr
export const logger = pino({
  level: LOG_LEVEL,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
      ignore: 'pid,hostname',
      destination: 2,
    },
  },
});
