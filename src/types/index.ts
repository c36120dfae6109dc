import type { Readable } from 'stream';

// ============================================
// 매니페스트 관련 타입
// ============================================

/** 매니페스트 항목 (내부 표현) */
export interface ManifestEntry {
  /** 원격 다운로드 URL */
  url: string;
  /** SHA-512 (hex) */
  digest: string;
  /** 로컬 배치 디렉토리 (다운로드 루트 포함) */
  destDir: string;
  /** 로컬 파일명 */
  destFilename: string;
}

/** 출력 파일의 항목 형식 */
export interface SourceEntry {
  type: 'file';
  url: string;
  sha512: string;
  dest: string;
  'dest-filename': string;
}

// ============================================
// 빌드 도구(외부 그래프 제공자) 관련 타입
// ============================================

/** 빌드 도구가 해결한 의존성 */
export interface ResolvedDependency {
  /** group:name:version[:snapshotDetail] 또는 "project :sub" */
  id: string;
  /** 해결된 variant 이름 (예: runtimeElements) */
  variant: string;
}

/** 빌드 도구가 로컬 캐시에 이미 내려받은 아티팩트 */
export interface LocalArtifact {
  /** 모듈 버전 식별자 (group:name:version) */
  moduleId: string;
  /** 로컬 캐시의 실제 파일명 */
  fileName: string;
  /** 파일 내용을 읽는 스트림 */
  open(): Readable;
}

/** 의존성 그룹 (Gradle configuration) */
export interface DependencyConfiguration {
  name: string;
  canBeResolved: boolean;
  /** 직접 + 전이 의존성 전체 */
  dependencies: ResolvedDependency[];
  artifacts: LocalArtifact[];
}

// ============================================
// 실행 결과 타입
// ============================================

/** 잘못된 식별자로 건너뛴 의존성 */
export interface MalformedDependency {
  configuration: string;
  id: string;
  reason: string;
}

/** 의존성 순회 결과 */
export interface WalkReport {
  /** 처리한 고유 의존성 수 */
  dependencies: number;
  /** 어느 저장소에서도 찾지 못한 의존성 */
  unresolved: string[];
  malformed: MalformedDependency[];
  /** 매니페스트 항목 수 */
  entries: number;
}
