import { describe, it, expect } from 'vitest';
import { toConfigOverrides } from './generate';

describe('generate 명령어', () => {
  it('CLI 옵션을 설정 키로 변환해야 함', () => {
    expect(
      toConfigOverrides({
        graph: 'graph.json',
        output: 'sources.json',
        downloadDirectory: 'deps',
        include: ['runtimeClasspath'],
        concurrency: 16,
        timeout: 1000,
        logDir: 'logs',
        verbose: true,
      })
    ).toEqual({
      outputFile: 'sources.json',
      downloadDirectory: 'deps',
      includeConfigurations: ['runtimeClasspath'],
      excludeConfigurations: undefined,
      concurrency: 16,
      requestTimeout: 1000,
      logsDir: 'logs',
      logLevel: 'debug',
    });
  });

  it('--verbose가 없으면 로그 레벨을 지정하지 않아야 함', () => {
    expect(toConfigOverrides({ graph: 'graph.json' }).logLevel).toBeUndefined();
  });
});
