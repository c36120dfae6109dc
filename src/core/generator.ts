/**
 * 매니페스트 생성 (진입점)
 *
 * 설정으로 리졸버와 워커를 구성하고 의존성 그래프를 순회한 뒤,
 * 정렬된 매니페스트를 출력 파일에 원자적으로 기록한다.
 * 순회가 실패하면 출력 파일은 만들지 않는다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { WalkReport } from '../types';
import logger from '../utils/logger';
import { GeneratorConfig } from './config';
import { DependencyWalker } from './dependencyWalker';
import { DependencyGraphProvider } from './graph/graphProvider';
import { ArtifactResolver } from './resolver/artifactResolver';
import { ContentFetcher } from './shared/content-fetcher';
import { DigestEngine } from './shared/digest';

export interface GenerateOptions {
  /** 테스트 등에서 주입하는 fetcher (기본값: 설정의 타임아웃을 쓰는 새 인스턴스) */
  fetcher?: ContentFetcher;
  digestEngine?: DigestEngine;
}

export interface GenerateResult {
  outputFile: string;
  report: WalkReport;
}

export async function generateSources(
  config: GeneratorConfig,
  provider: DependencyGraphProvider,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const startTime = Date.now();
  const outputFile = path.resolve(config.outputFile);

  const resolver = new ArtifactResolver({
    downloadDirectory: config.downloadDirectory,
    fetcher: options.fetcher ?? new ContentFetcher({ timeout: config.requestTimeout }),
    digestEngine: options.digestEngine ?? new DigestEngine(),
  });
  const walker = new DependencyWalker(resolver, {
    concurrency: config.concurrency,
    include: config.includeConfigurations,
    exclude: config.excludeConfigurations,
  });

  const report = await walker.walk(provider);
  await writeAtomically(outputFile, resolver.serialize());

  logger.info('매니페스트 생성 완료', {
    outputFile,
    duration: Date.now() - startTime,
    ...resolver.getStats(),
  });

  return { outputFile, report };
}

/**
 * 같은 디렉토리의 임시 파일에 쓴 뒤 이름 변경
 */
export async function writeAtomically(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);

  const tempFile = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tempFile, contents, 'utf-8');
    await fs.move(tempFile, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempFile);
    throw error;
  }
}
