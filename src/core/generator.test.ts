/**
 * generator.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager } from './config';
import { generateSources, writeAtomically } from './generator';
import { DependencyGraphProvider } from './graph/graphProvider';
import { ContentFetcher } from './shared/content-fetcher';
import { WorkerTaskFailureError } from './shared/errors';

const testDir = path.join(os.tmpdir(), 'offline-sources-test-generator');
const REPO = 'https://repo.example.test/m2/';
const POM = '<project><groupId>com.example</groupId><artifactId>lib</artifactId><version>1.0</version></project>';

function createFetcher(files: Record<string, string>): ContentFetcher {
  const client = {
    head: vi.fn(async (url: string) => {
      if (files[url] === undefined) throw new Error('Request failed with status code 404');
      return { status: 200 };
    }),
    get: vi.fn(async (url: string) => {
      const body = files[url];
      if (body === undefined) throw new Error('Request failed with status code 404');
      return { status: 200, data: Buffer.from(body) };
    }),
  };
  return new ContentFetcher({ client: client as never });
}

function createProvider(ids: string[], open?: () => never): DependencyGraphProvider {
  return {
    getRepositories: () => [REPO],
    getPluginRepositories: () => [],
    getBuildscriptConfigurations: () => [],
    getConfigurations: () => [
      {
        name: 'runtimeClasspath',
        canBeResolved: true,
        dependencies: ids.map((id) => ({ id, variant: '' })),
        artifacts: open ? [{ moduleId: 'com.example:lib:1.0', fileName: 'lib-1.0.jar', open }] : [],
      },
    ],
  };
}

describe('generateSources', () => {
  const outputFile = path.join(testDir, 'out', 'sources.json');
  const config = new ConfigManager().resolveConfig({ outputFile, concurrency: 4 });

  beforeEach(async () => {
    await fs.remove(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  it('정렬된 매니페스트를 출력 파일에 기록해야 함', async () => {
    const fetcher = createFetcher({ [`${REPO}com/example/lib/1.0/lib-1.0.pom`]: POM });

    const result = await generateSources(config, createProvider(['com.example:lib:1.0', 'bad']), { fetcher });

    expect(result.outputFile).toBe(outputFile);
    expect(result.report.entries).toBe(1);
    expect(result.report.malformed.map((item) => item.id)).toEqual(['bad']);
    expect(JSON.parse(await fs.readFile(outputFile, 'utf-8'))).toEqual([
      {
        type: 'file',
        url: `${REPO}com/example/lib/1.0/lib-1.0.pom`,
        sha512: crypto.createHash('sha512').update(POM).digest('hex'),
        dest: 'offline-repository/com/example/lib/1.0',
        'dest-filename': 'lib-1.0.pom',
      },
    ]);
  });

  it('의존성이 없으면 빈 배열을 기록해야 함', async () => {
    await generateSources(config, createProvider([]), { fetcher: createFetcher({}) });

    expect(await fs.readFile(outputFile, 'utf-8')).toBe('[\n]\n');
  });

  it('순회가 실패하면 출력 파일을 만들지 않아야 함', async () => {
    const fetcher = createFetcher({
      [`${REPO}com/example/lib/1.0/lib-1.0.pom`]: POM,
      [`${REPO}com/example/lib/1.0/lib-1.0.jar`]: 'jar',
    });
    const open = (): never => {
      throw new Error('disk failure');
    };

    await expect(
      generateSources(config, createProvider(['com.example:lib:1.0'], open), { fetcher })
    ).rejects.toBeInstanceOf(WorkerTaskFailureError);
    expect(await fs.pathExists(outputFile)).toBe(false);
  });
});

describe('writeAtomically', () => {
  beforeEach(async () => {
    await fs.remove(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  it('기존 파일을 덮어쓰고 임시 파일을 남기지 않아야 함', async () => {
    const target = path.join(testDir, 'sources.json');
    await fs.outputFile(target, 'old');

    await writeAtomically(target, 'new');

    expect(await fs.readFile(target, 'utf-8')).toBe('new');
    expect(await fs.readdir(testDir)).toEqual(['sources.json']);
  });
});
