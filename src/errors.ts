/**
 * 메모리 시스템 에러 기본 클래스.
 * `code`로 분류하고, CLI는 이를 보고 종료 코드를 결정한다.
 */
export class MemoryError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'MemoryError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** 인덱스 파일, 세션, 토픽, 추출 디렉토리 등이 없음 */
export class NotFoundError extends MemoryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

export class SessionNotFoundError extends NotFoundError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class SessionExistsError extends MemoryError {
  constructor(sessionId: string) {
    super(`Session already exists: ${sessionId}`, 'SESSION_EXISTS', { sessionId });
    this.name = 'SessionExistsError';
  }
}

/** JSON 파싱 실패 또는 스키마 불일치 */
export class MalformedError extends MemoryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MALFORMED', context);
    this.name = 'MalformedError';
  }
}

/** 쓰기 실패. 메모리상의 문서는 유실될 수 있다 */
export class IOFailureError extends MemoryError {
  readonly originalError?: Error;

  constructor(message: string, originalError?: Error, context?: Record<string, unknown>) {
    super(message, 'IO_FAILURE', { ...context, originalMessage: originalError?.message });
    this.name = 'IOFailureError';
    this.originalError = originalError;
  }
}

/** 로드 이후 다른 쓰기가 먼저 저장됨 (revision 불일치) */
export class ConflictError extends MemoryError {
  constructor(filePath: string, expected: number, actual: number) {
    super(
      `Index changed on disk since it was loaded: expected revision ${expected}, found ${actual}`,
      'CONFLICT',
      { filePath, expected, actual },
    );
    this.name = 'ConflictError';
  }
}

export class TimeoutError extends MemoryError {
  constructor(command: string, timeoutMs: number) {
    super(`Process timed out after ${timeoutMs}ms: ${command}`, 'TIMEOUT', { command, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class ProcessFailedError extends MemoryError {
  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`Process exited with code ${exitCode}: ${command}`, 'PROCESS_FAILED', { command, exitCode, stderr });
    this.name = 'ProcessFailedError';
  }
}

export function isMemoryError(err: unknown): err is MemoryError {
  return err instanceof MemoryError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
