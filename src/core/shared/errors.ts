/**
 * 매니페스트 생성기 에러 타입
 *
 * 전송 실패, 리다이렉트, 파일 미선언 등 예상 가능한 상황은 에러가 아닌
 * 결과 값으로 표현하고, 여기에는 호출자에게 전달되어야 하는 에러만 둔다.
 */

export type GeneratorErrorCode =
  | 'MALFORMED_COORDINATE'
  | 'DIGEST_UNAVAILABLE'
  | 'GRAPH_FILE'
  | 'CONFIG'
  | 'WORKER_TASK_FAILURE';

export class GeneratorError extends Error {
  constructor(
    message: string,
    public readonly code: GeneratorErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GeneratorError';
  }
}

/** group:name:version 형식으로 분리할 수 없는 식별자 */
export class MalformedCoordinateError extends GeneratorError {
  constructor(public readonly id: string) {
    super(`잘못된 의존성 식별자: '${id}' (group:name:version 형식 필요)`, 'MALFORMED_COORDINATE');
    this.name = 'MalformedCoordinateError';
  }
}

/** 실행 환경에 SHA-512 구현이 없음 */
export class DigestAlgorithmUnavailableError extends GeneratorError {
  constructor(public readonly algorithm: string) {
    super(`해시 알고리즘을 사용할 수 없습니다: ${algorithm}`, 'DIGEST_UNAVAILABLE');
    this.name = 'DigestAlgorithmUnavailableError';
  }
}

/** 의존성 그래프 파일을 읽거나 검증할 수 없음 */
export class GraphFileError extends GeneratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GRAPH_FILE', options);
    this.name = 'GraphFileError';
  }
}

/** 설정값 누락 또는 타입 오류 */
export class ConfigError extends GeneratorError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** 작업 단위(의존성 하나) 처리 중 발생한 예외 */
export class WorkerTaskFailureError extends GeneratorError {
  constructor(public readonly dependencyId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`의존성 처리 실패: ${dependencyId} (${reason})`, 'WORKER_TASK_FAILURE', { cause });
    this.name = 'WorkerTaskFailureError';
  }
}
