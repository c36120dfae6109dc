/**
 * Maven 좌표 모델
 *
 * 빌드 도구가 넘겨주는 `group:name:version[:snapshotDetail]` 식별자를 파싱하고
 * 저장소 경로와 파일명을 계산한다.
 */

import { MalformedCoordinateError } from './errors';

/** 스냅샷 버전 표식 */
export const SNAPSHOT_MARKER = 'SNAPSHOT';

/** 플러그인 포털 마커 아티팩트 관련 상수 */
export const PLUGIN_GROUP_PREFIX = 'gradle.plugin.';
export const PLUGIN_MARKER_SUFFIX = '.gradle.plugin';

/**
 * 스냅샷 상세값으로 치환하는 바이너리 확장자
 * (pom, module 같은 기술 문서는 항상 -SNAPSHOT 이름을 그대로 사용)
 */
const BINARY_EXTENSIONS: ReadonlySet<string> = new Set(['jar', 'aar', 'war', 'ear']);

export class Coordinate {
  private constructor(
    readonly group: string,
    readonly name: string,
    readonly version: string,
    /** 타임스탬프 빌드 식별자 (yyyymmdd.hhmmss-n), 스냅샷이 아니면 빈 문자열 */
    readonly snapshotDetail: string = ''
  ) {}

  /**
   * 콜론으로 구분된 식별자 파싱
   */
  static parse(id: string): Coordinate {
    const parts = id.split(':');
    if (parts.length < 3) {
      throw new MalformedCoordinateError(id);
    }

    const [group, name, version, snapshotDetail = ''] = parts;
    if (!group || !name || !version) {
      throw new MalformedCoordinateError(id);
    }

    return new Coordinate(group, name, version, snapshotDetail);
  }

  static of(group: string, name: string, version: string, snapshotDetail = ''): Coordinate {
    return Coordinate.parse(`${group}:${name}:${version}${snapshotDetail ? `:${snapshotDetail}` : ''}`);
  }

  get isSnapshot(): boolean {
    return this.version.endsWith(`-${SNAPSHOT_MARKER}`);
  }

  /**
   * 저장소 내 디렉토리 경로
   * 예: com/example/lib/1.0
   */
  path(): string {
    return `${this.group.replace(/\./g, '/')}/${this.name}/${this.version}`;
  }

  /**
   * 파일명 생성 (name-version.ext)
   * 스냅샷 바이너리는 name-1.0-20240101.120000-1.jar 형식
   */
  filename(ext: string): string {
    if (BINARY_EXTENSIONS.has(ext) && this.snapshotDetail) {
      return `${this.name}-${this.version.replace(SNAPSHOT_MARKER, this.snapshotDetail)}.${ext}`;
    }
    return `${this.name}-${this.version}.${ext}`;
  }

  /**
   * 플러그인 포털의 마커 아티팩트 좌표
   * gradle.plugin.* 그룹이 아니면 undefined
   */
  pluginMarker(): Coordinate | undefined {
    if (!this.group.startsWith(PLUGIN_GROUP_PREFIX)) return undefined;

    const pluginId = this.group.substring(PLUGIN_GROUP_PREFIX.length);
    if (!pluginId) return undefined;

    return new Coordinate(pluginId, pluginId + PLUGIN_MARKER_SUFFIX, this.version, this.snapshotDetail);
  }

  toString(): string {
    return `${this.group}:${this.name}:${this.version}`;
  }
}
