/**
 * Artifact Resolver
 *
 * 의존성 하나에 대해 저장소를 선언 순서대로 시도하며 .module / .pom / 바이너리
 * 위치를 찾아 매니페스트에 등록한다. .module 또는 .pom이 발견된 첫 저장소에서
 * 멈춘다 (나머지 저장소는 시도하지 않음).
 */

import * as path from 'path';
import { LocalArtifact, ManifestEntry } from '../../types';
import logger from '../../utils/logger';
import { Coordinate, SNAPSHOT_MARKER } from '../shared/coordinate';
import { ContentFetcher } from '../shared/content-fetcher';
import { DigestEngine } from '../shared/digest';
import { ManifestStore, normalizeDownloadDirectory } from '../shared/manifest-store';
import { ModuleParseResult, parseModuleMetadata } from '../shared/module-metadata';
import { DescriptionResolver, PomHandler } from '../shared/pom-handler';
import { PLUGIN_PORTAL_URL, RepositoryList } from '../shared/repositories';

export interface ArtifactResolverOptions {
  /** 매니페스트 dest 필드의 접두 디렉토리 (기본값: offline-repository/) */
  downloadDirectory?: string;
  fetcher?: ContentFetcher;
  digestEngine?: DigestEngine;
}

/** 캐시 기반 해결 옵션 */
export interface CachedResolveOptions {
  /** .module에 선언된 이름과 로컬 파일명을 대조할지 여부 */
  checkName: boolean;
  /** .module에 선언된 파일 이름 (url과 다를 수 있음) */
  altName?: string;
}

/** 의존성 하나의 해결 결과 */
export interface DependencyResolution {
  coordinate: Coordinate;
  /** .module 또는 .pom을 찾은 저장소 (없으면 undefined) */
  repository?: string;
}

/** 원격 파일의 URL과 로컬 배치 위치 */
interface RemoteTarget {
  url: string;
  dir: string;
  filename: string;
}

const ABSOLUTE_URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export class ArtifactResolver implements DescriptionResolver {
  readonly downloadDirectory: string;
  private readonly manifest: ManifestStore;
  private readonly fetcher: ContentFetcher;
  private readonly digestEngine: DigestEngine;
  private readonly pomHandler: PomHandler;

  constructor(options: ArtifactResolverOptions = {}) {
    this.downloadDirectory = normalizeDownloadDirectory(options.downloadDirectory);
    this.manifest = new ManifestStore(this.downloadDirectory);
    this.fetcher = options.fetcher ?? new ContentFetcher();
    this.digestEngine = options.digestEngine ?? new DigestEngine();
    this.pomHandler = new PomHandler(this);
  }

  /**
   * 의존성 해결 (진입점)
   * @param coordinate 의존성 좌표
   * @param variant 빌드 도구가 해결한 variant 이름
   * @param repositories 시도할 저장소 (선언 순서)
   * @param localArtifacts 빌드 도구가 이미 내려받은 아티팩트
   */
  async resolveDependency(
    coordinate: Coordinate,
    variant: string,
    repositories: RepositoryList,
    localArtifacts: readonly LocalArtifact[]
  ): Promise<DependencyResolution> {
    const artifacts = localArtifacts.filter((artifact) => artifact.moduleId === coordinate.toString());

    for (const repository of repositories) {
      const found = await this.resolveAt(coordinate, variant, repository, artifacts);
      if (found) {
        logger.debug('의존성 해결 완료', { coordinate: coordinate.toString(), repository });
        return { coordinate, repository };
      }
    }

    logger.debug('어느 저장소에서도 의존성을 찾지 못함', { coordinate: coordinate.toString() });
    return { coordinate };
  }

  /**
   * 저장소 하나에서 해결 시도
   * @returns .module 또는 .pom을 찾았으면 true
   */
  private async resolveAt(
    coordinate: Coordinate,
    variant: string,
    repository: string,
    artifacts: readonly LocalArtifact[]
  ): Promise<boolean> {
    const [moduleFound, pomFound] = await Promise.all([
      this.resolveModule(coordinate, variant, repository, artifacts),
      this.resolvePom(coordinate, repository),
    ]);

    // 플러그인 포털의 플러그인은 마커 아티팩트 POM도 필요
    if (repository === PLUGIN_PORTAL_URL) {
      const marker = coordinate.pluginMarker();
      if (marker) {
        await this.resolveRemote(marker, repository, marker.filename('pom'));
      }
    }

    return moduleFound || pomFound;
  }

  /**
   * .module 문서를 따라 바이너리 등록
   * @returns 사용할 수 있는 .module 문서를 찾았으면 true
   */
  private async resolveModule(
    coordinate: Coordinate,
    variant: string,
    repository: string,
    artifacts: readonly LocalArtifact[]
  ): Promise<boolean> {
    const defaultBinary = coordinate.filename('jar');
    const module = await this.resolveRemote(coordinate, repository, coordinate.filename('module'));

    if (!module) {
      await this.resolveCached(coordinate, repository, artifacts, defaultBinary, { checkName: false });
      return false;
    }

    let result: ModuleParseResult = parseModuleMetadata(module, variant);

    if (result.kind === 'redirect') {
      logger.debug('모듈 메타데이터 리다이렉트', { coordinate: coordinate.toString(), url: result.url });
      const redirected = await this.resolveRemote(coordinate, repository, result.url);
      if (!redirected) {
        return false;
      }

      result = parseModuleMetadata(redirected, variant);
      if (result.kind === 'redirect') {
        logger.warn('모듈 메타데이터가 다시 리다이렉트됨, 따라가지 않음', {
          coordinate: coordinate.toString(),
          url: result.url,
        });
        return true;
      }
    }

    if (result.kind === 'files') {
      for (const file of result.files) {
        await this.resolveCached(coordinate, repository, artifacts, file.url, {
          checkName: true,
          altName: file.name,
        });
      }
    } else {
      // variant에 선언된 파일이 없으면 기본 바이너리 파일명으로 시도
      await this.resolveCached(coordinate, repository, artifacts, defaultBinary, { checkName: false });
    }

    return true;
  }

  /**
   * .pom 등록 및 parent/BOM 체인 등록
   */
  private async resolvePom(coordinate: Coordinate, repository: string): Promise<boolean> {
    const pom = await this.resolveDescription(coordinate, repository);
    if (!pom) return false;

    await this.pomHandler.addAncestors(pom, repository);
    return true;
  }

  /**
   * 좌표의 POM을 내려받아 등록 (PomHandler에서도 사용)
   */
  resolveDescription(coordinate: Coordinate, repository: string): Promise<Buffer | undefined> {
    return this.resolveRemote(coordinate, repository, coordinate.filename('pom'));
  }

  /**
   * 원격 파일을 내려받아 다이제스트를 계산하고 매니페스트에 등록
   * @param filename 좌표 디렉토리 기준 파일명 (상대 경로 또는 절대 URL 가능)
   * @returns 파일 내용, 없으면 undefined
   */
  async resolveRemote(coordinate: Coordinate, repository: string, filename: string): Promise<Buffer | undefined> {
    const target = locateRemote(coordinate, repository, filename);
    const contents = await this.fetcher.fetch(target.url);
    if (!contents) return undefined;

    const digest = await this.digestEngine.digestBytes(contents);
    this.generateEntry(target.url, digest, target.dir, target.filename);

    // 스냅샷은 -SNAPSHOT 이름으로도 등록 (빌드 도구가 두 이름 모두 찾을 수 있음)
    if (coordinate.isSnapshot) {
      const ext = path.posix.extname(target.filename).slice(1);
      if (ext) {
        const alias = `${coordinate.name}-${coordinate.version}.${ext}`;
        if (alias !== target.filename) {
          this.generateEntry(target.url, digest, target.dir, alias);
        }
      }
    }

    return contents;
  }

  /**
   * 캐시 기반 해결
   *
   * 빌드 도구가 이미 내려받은 파일에 대해 원격 URL이 유효한지만 확인하고,
   * 다이제스트는 로컬 파일 내용으로 계산한다.
   * @param filename 요청한 원격 파일명
   */
  async resolveCached(
    coordinate: Coordinate,
    repository: string,
    artifacts: readonly LocalArtifact[],
    filename: string,
    options: CachedResolveOptions
  ): Promise<void> {
    const dir = coordinate.path();

    for (const artifact of artifacts) {
      if (artifact.moduleId !== coordinate.toString()) continue;

      // .module에 선언된 파일과 대조
      if (options.checkName && artifact.fileName !== filename && artifact.fileName !== options.altName) {
        continue;
      }

      const destFilename = options.checkName ? filename : artifact.fileName;

      // 이미 등록된 파일은 건너뜀
      if (this.manifest.has(dir, destFilename)) continue;

      const url = await this.findCachedUrl(coordinate, repository, artifact.fileName, filename);
      if (!url) continue;

      const digest = await this.digestEngine.digestStream(() => artifact.open());
      this.generateEntry(url, digest, dir, destFilename);
    }
  }

  /**
   * 로컬 파일명 → 요청 파일명 → 스냅샷 상세값 치환 순서로 URL 확인
   */
  private async findCachedUrl(
    coordinate: Coordinate,
    repository: string,
    localName: string,
    requestedName: string
  ): Promise<string | undefined> {
    const base = `${repository}${coordinate.path()}/`;
    const candidates = [localName, requestedName];
    if (requestedName.includes(SNAPSHOT_MARKER) && coordinate.snapshotDetail) {
      candidates.push(requestedName.replace(SNAPSHOT_MARKER, coordinate.snapshotDetail));
    }

    for (const candidate of new Set(candidates)) {
      const url = base + candidate;
      if (await this.fetcher.probe(url)) {
        return url;
      }
    }
    return undefined;
  }

  /**
   * 매니페스트 항목 추가 (같은 dir/filename이면 URL이 작은 항목이 남음)
   */
  generateEntry(url: string, digest: string, dir: string, filename: string): ManifestEntry {
    return this.manifest.upsert(url, digest, dir, filename);
  }

  /**
   * 정렬된 매니페스트 JSON
   */
  serialize(): string {
    return this.manifest.serialize();
  }

  getStats(): { entries: number } & ReturnType<ContentFetcher['getStats']> {
    return { entries: this.manifest.size, ...this.fetcher.getStats() };
  }
}

/**
 * 원격 파일 위치 계산
 *
 * 상대 경로가 포함된 파일명(available-at 리다이렉트)은 URL과 배치 디렉토리 모두
 * 해당 경로로 옮기고, 절대 URL은 그대로 사용한다.
 */
export function locateRemote(coordinate: Coordinate, repository: string, filename: string): RemoteTarget {
  const dir = coordinate.path();

  if (ABSOLUTE_URL_PATTERN.test(filename)) {
    let name = filename;
    try {
      name = path.posix.basename(new URL(filename).pathname);
    } catch {
      logger.debug('URL 파싱 실패, 파일명을 그대로 사용', { url: filename });
    }
    return { url: filename, dir, filename: name };
  }

  if (!filename.includes('/')) {
    return { url: `${repository}${dir}/${filename}`, dir, filename };
  }

  // `../` 구간은 정규화하여 dest가 리다이렉트 대상 모듈의 디렉토리가 되게 한다
  const relative = path.posix.normalize(`${dir}/${filename}`);
  return {
    url: `${repository}${relative}`,
    dir: path.posix.dirname(relative),
    filename: path.posix.basename(relative),
  };
}
