/**
 * 의존성 그래프 제공자
 *
 * 빌드 도구가 해결한 의존성 그래프와 선언된 저장소 목록을 제공한다.
 * 기본 구현은 빌드 도구가 내보낸 JSON 파일을 읽는다.
 *
 * 그래프 파일 형식:
 * {
 *   "repositories": ["https://repo.maven.apache.org/maven2/"],
 *   "pluginRepositories": [],
 *   "buildscriptConfigurations": [ ... ],
 *   "configurations": [
 *     {
 *       "name": "runtimeClasspath",
 *       "canBeResolved": true,
 *       "dependencies": [{ "id": "com.example:lib:1.0", "variant": "runtimeElements" }],
 *       "artifacts": [{ "id": "com.example:lib:1.0", "file": "cache/lib-1.0.jar" }]
 *     }
 *   ]
 * }
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { DependencyConfiguration, LocalArtifact, ResolvedDependency } from '../../types';
import logger from '../../utils/logger';
import { DIGEST_CHUNK_SIZE } from '../shared/digest';
import { GraphFileError } from '../shared/errors';

export interface DependencyGraphProvider {
  /** 프로젝트에 선언된 원격 저장소 */
  getRepositories(): string[];
  /** pluginManagement에 선언된 저장소 (플러그인 포털 제외) */
  getPluginRepositories(): string[];
  /** 빌드 스크립트(플러그인) 클래스패스 configuration */
  getBuildscriptConfigurations(): DependencyConfiguration[];
  /** 프로젝트 configuration */
  getConfigurations(): DependencyConfiguration[];
}

/** configuration 포함/제외 필터 */
export interface ConfigurationFilter {
  include?: readonly string[];
  exclude?: readonly string[];
}

/**
 * configuration 필터링
 * include가 없으면 전체 포함, exclude가 include보다 우선
 */
export function filterConfigurations(
  configurations: DependencyConfiguration[],
  filter: ConfigurationFilter = {}
): DependencyConfiguration[] {
  const include = filter.include && filter.include.length > 0 ? new Set(filter.include) : undefined;
  const exclude = new Set(filter.exclude ?? []);

  return configurations.filter(
    (configuration) => (!include || include.has(configuration.name)) && !exclude.has(configuration.name)
  );
}

/**
 * 로컬 파일 기반 아티팩트
 */
export function fileArtifact(moduleId: string, filePath: string): LocalArtifact {
  return {
    moduleId,
    fileName: path.basename(filePath),
    open: () => fs.createReadStream(filePath, { highWaterMark: DIGEST_CHUNK_SIZE }),
  };
}

// ============================================
// 그래프 파일 검증
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringArray(value: unknown, field: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new GraphFileError(`'${field}'는 문자열 배열이어야 합니다`);
  }
  return value;
}

function readString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new GraphFileError(`'${field}'는 문자열이어야 합니다`);
  }
  return value;
}

function readDependencies(value: unknown, field: string): ResolvedDependency[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new GraphFileError(`'${field}'는 배열이어야 합니다`);
  }

  return value.map((item, index) => {
    if (!isRecord(item)) {
      throw new GraphFileError(`'${field}[${index}]'는 객체여야 합니다`);
    }
    return {
      id: readString(item.id, `${field}[${index}].id`),
      variant: item.variant === undefined ? '' : readString(item.variant, `${field}[${index}].variant`),
    };
  });
}

function readArtifacts(value: unknown, field: string, baseDir: string): LocalArtifact[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new GraphFileError(`'${field}'는 배열이어야 합니다`);
  }

  return value.map((item, index) => {
    if (!isRecord(item)) {
      throw new GraphFileError(`'${field}[${index}]'는 객체여야 합니다`);
    }
    const id = readString(item.id, `${field}[${index}].id`);
    const file = readString(item.file, `${field}[${index}].file`);
    return fileArtifact(id, path.resolve(baseDir, file));
  });
}

function readConfigurations(value: unknown, field: string, baseDir: string): DependencyConfiguration[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new GraphFileError(`'${field}'는 배열이어야 합니다`);
  }

  return value.map((item, index) => {
    const prefix = `${field}[${index}]`;
    if (!isRecord(item)) {
      throw new GraphFileError(`'${prefix}'는 객체여야 합니다`);
    }
    if (item.canBeResolved !== undefined && typeof item.canBeResolved !== 'boolean') {
      throw new GraphFileError(`'${prefix}.canBeResolved'는 boolean이어야 합니다`);
    }
    return {
      name: readString(item.name, `${prefix}.name`),
      canBeResolved: item.canBeResolved ?? true,
      dependencies: readDependencies(item.dependencies, `${prefix}.dependencies`),
      artifacts: readArtifacts(item.artifacts, `${prefix}.artifacts`, baseDir),
    };
  });
}

/**
 * 빌드 도구가 내보낸 JSON 그래프 파일 기반 제공자
 */
export class JsonGraphProvider implements DependencyGraphProvider {
  private constructor(
    private readonly repositories: string[],
    private readonly pluginRepositories: string[],
    private readonly buildscriptConfigurations: DependencyConfiguration[],
    private readonly configurations: DependencyConfiguration[]
  ) {}

  /**
   * 파싱된 JSON 값에서 생성
   * @param baseDir 상대 아티팩트 경로의 기준 디렉토리
   */
  static fromJson(document: unknown, baseDir: string = process.cwd()): JsonGraphProvider {
    if (!isRecord(document)) {
      throw new GraphFileError('그래프 파일의 최상위 값은 객체여야 합니다');
    }

    return new JsonGraphProvider(
      readStringArray(document.repositories, 'repositories'),
      readStringArray(document.pluginRepositories, 'pluginRepositories'),
      readConfigurations(document.buildscriptConfigurations, 'buildscriptConfigurations', baseDir),
      readConfigurations(document.configurations, 'configurations', baseDir)
    );
  }

  /**
   * 그래프 파일 읽기
   */
  static async fromFile(filePath: string): Promise<JsonGraphProvider> {
    const resolved = path.resolve(filePath);

    let document: unknown;
    try {
      document = await fs.readJson(resolved);
    } catch (error) {
      throw new GraphFileError(`그래프 파일을 읽을 수 없습니다: ${resolved}`, { cause: error });
    }

    const provider = JsonGraphProvider.fromJson(document, path.dirname(resolved));
    logger.info('의존성 그래프 로드 완료', {
      file: resolved,
      repositories: provider.repositories.length,
      configurations: provider.configurations.length,
      buildscriptConfigurations: provider.buildscriptConfigurations.length,
    });
    return provider;
  }

  getRepositories(): string[] {
    return [...this.repositories];
  }

  getPluginRepositories(): string[] {
    return [...this.pluginRepositories];
  }

  getBuildscriptConfigurations(): DependencyConfiguration[] {
    return [...this.buildscriptConfigurations];
  }

  getConfigurations(): DependencyConfiguration[] {
    return [...this.configurations];
  }
}
