/**
 * Dependency Walker
 *
 * 빌드 스크립트(플러그인) 의존성과 프로젝트 의존성을 순서대로 순회하며
 * 의존성마다 하나의 작업 단위를 p-limit 풀에 제출하고 모두 끝날 때까지 기다린다.
 */

import pLimit from 'p-limit';
import {
  DependencyConfiguration,
  LocalArtifact,
  MalformedDependency,
  WalkReport,
} from '../types';
import logger from '../utils/logger';
import { DependencyGraphProvider, ConfigurationFilter, filterConfigurations } from './graph/graphProvider';
import { ArtifactResolver } from './resolver/artifactResolver';
import { Coordinate } from './shared/coordinate';
import { MalformedCoordinateError, WorkerTaskFailureError } from './shared/errors';
import { RepositoryList, buildRepositoryList, mergeRepositoryLists } from './shared/repositories';

/** 기본 동시 작업 수 (I/O 위주 작업이므로 크게 잡음) */
export const DEFAULT_CONCURRENCY = 128;

/** 로컬 프로젝트 의존성 식별자 접두사 */
const PROJECT_DEPENDENCY_PREFIX = 'project ';

export interface DependencyWalkerOptions extends ConfigurationFilter {
  /** 동시 작업 수 */
  concurrency?: number;
}

/** 작업 단위 (의존성 하나) */
interface WorkUnit {
  id: string;
  variant: string;
  configuration: string;
  repositories: RepositoryList;
  artifacts: readonly LocalArtifact[];
}

export class DependencyWalker {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly options: DependencyWalkerOptions;

  constructor(
    private readonly resolver: ArtifactResolver,
    options: DependencyWalkerOptions = {}
  ) {
    this.options = { concurrency: DEFAULT_CONCURRENCY, ...options };
    this.limit = pLimit(Math.max(1, this.options.concurrency ?? DEFAULT_CONCURRENCY));
  }

  /**
   * 전체 의존성 순회 (진입점)
   */
  async walk(provider: DependencyGraphProvider): Promise<WalkReport> {
    // 실행 단위로 관리되는 중복 방지 집합
    const seen = new Set<string>();
    const report: WalkReport = { dependencies: 0, unresolved: [], malformed: [], entries: 0 };
    const filter: ConfigurationFilter = { include: this.options.include, exclude: this.options.exclude };

    const pluginRepositories = buildRepositoryList(provider.getPluginRepositories(), {
      includePluginPortal: true,
    });
    const projectRepositories = mergeRepositoryLists(
      buildRepositoryList(provider.getRepositories()),
      pluginRepositories
    );

    logger.info('의존성 순회 시작', {
      pluginRepositories: pluginRepositories.length,
      projectRepositories: projectRepositories.length,
      concurrency: this.options.concurrency,
    });

    // (a) 빌드 스크립트 클래스패스
    await this.runPass(
      filterConfigurations(provider.getBuildscriptConfigurations(), filter),
      pluginRepositories,
      seen,
      report
    );

    // (b) 프로젝트 configuration (의존성이 플러그인일 수 있으므로 플러그인 저장소 포함)
    await this.runPass(
      filterConfigurations(provider.getConfigurations(), filter),
      projectRepositories,
      seen,
      report
    );

    // 완료 순서와 무관하게 같은 보고서가 되도록 정렬
    report.unresolved.sort();
    report.malformed.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    report.entries = this.resolver.getStats().entries;
    logger.info('의존성 순회 완료', {
      dependencies: report.dependencies,
      unresolved: report.unresolved.length,
      malformed: report.malformed.length,
      entries: report.entries,
    });

    return report;
  }

  /**
   * configuration 목록의 의존성을 작업 단위로 만들어 실행
   */
  private async runPass(
    configurations: DependencyConfiguration[],
    repositories: RepositoryList,
    seen: Set<string>,
    report: WalkReport
  ): Promise<void> {
    const units: WorkUnit[] = [];

    for (const configuration of configurations) {
      if (!configuration.canBeResolved) continue;

      for (const dependency of configuration.dependencies) {
        // 같은 의존성은 한 번만 처리 (먼저 나온 configuration 기준)
        if (seen.has(dependency.id)) continue;
        seen.add(dependency.id);

        // 로컬 Gradle 프로젝트 의존성은 건너뜀
        if (dependency.id.startsWith(PROJECT_DEPENDENCY_PREFIX)) continue;

        units.push({
          id: dependency.id,
          variant: dependency.variant,
          configuration: configuration.name,
          repositories,
          artifacts: configuration.artifacts,
        });
      }
    }

    if (units.length === 0) return;

    const results = await Promise.allSettled(units.map((unit) => this.limit(() => this.runUnit(unit, report))));

    // 모든 작업이 끝난 뒤 첫 번째 실패를 전파
    const failedIndex = results.findIndex((result) => result.status === 'rejected');
    if (failedIndex >= 0) {
      const failed = results[failedIndex];
      const cause = failed.status === 'rejected' ? failed.reason : undefined;
      const failures = results.filter((result) => result.status === 'rejected').length;
      logger.error('의존성 처리 실패', { id: units[failedIndex].id, failures });
      throw new WorkerTaskFailureError(units[failedIndex].id, cause);
    }
  }

  private async runUnit(unit: WorkUnit, report: WalkReport): Promise<void> {
    let coordinate: Coordinate;
    try {
      coordinate = Coordinate.parse(unit.id);
    } catch (error) {
      if (error instanceof MalformedCoordinateError) {
        const malformed: MalformedDependency = {
          configuration: unit.configuration,
          id: unit.id,
          reason: error.message,
        };
        report.malformed.push(malformed);
        logger.error('잘못된 의존성 식별자, 건너뜀', { ...malformed });
        return;
      }
      throw error;
    }

    report.dependencies++;
    const resolution = await this.resolver.resolveDependency(
      coordinate,
      unit.variant,
      unit.repositories,
      unit.artifacts
    );
    if (!resolution.repository) {
      report.unresolved.push(unit.id);
      logger.warn('의존성을 찾을 수 없음', { id: unit.id, configuration: unit.configuration });
    }
  }
}
