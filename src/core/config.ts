import * as fs from 'fs-extra';
import * as path from 'path';
import type { LogLevel } from '../utils/logger';
import { DEFAULT_CONCURRENCY } from './dependencyWalker';
import { DEFAULT_REQUEST_TIMEOUT } from './shared/content-fetcher';
import { ConfigError } from './shared/errors';
import { DEFAULT_DOWNLOAD_DIRECTORY, normalizeDownloadDirectory } from './shared/manifest-store';

// 설정 인터페이스 정의
export interface GeneratorConfig {
  // 출력 설정
  outputFile: string;
  downloadDirectory: string;

  // configuration 필터
  includeConfigurations?: string[];
  excludeConfigurations?: string[];

  // 네트워크/동시성 설정
  concurrency: number;
  requestTimeout: number;

  // 로그 설정
  logsDir?: string;
  logLevel: LogLevel;
}

/** 설정 파일 또는 CLI에서 들어오는 부분 설정 */
export type ConfigOverrides = Partial<GeneratorConfig>;

// 기본 설정값 (outputFile은 기본값 없음)
const DEFAULT_CONFIG: Omit<GeneratorConfig, 'outputFile'> = {
  downloadDirectory: DEFAULT_DOWNLOAD_DIRECTORY,
  concurrency: DEFAULT_CONCURRENCY,
  requestTimeout: DEFAULT_REQUEST_TIMEOUT,
  logLevel: 'warn',
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`설정 '${key}'는 문자열이어야 합니다`);
  }
  return value;
}

function optionalStringArray(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`설정 '${key}'는 문자열 배열이어야 합니다`);
  }
  return value;
}

function optionalPositiveInteger(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`설정 '${key}'는 1 이상의 정수여야 합니다`);
  }
  return value;
}

/**
 * 파싱된 JSON 값을 부분 설정으로 검증
 * 알 수 없는 키는 무시하고, 알려진 키의 타입이 다르면 ConfigError
 */
export function parseConfigObject(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError('설정 파일의 최상위 값은 객체여야 합니다');
  }

  const logLevel = raw.logLevel;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`설정 'logLevel'은 ${LOG_LEVELS.join(', ')} 중 하나여야 합니다`);
  }

  const overrides: ConfigOverrides = {
    outputFile: optionalString(raw, 'outputFile'),
    downloadDirectory: optionalString(raw, 'downloadDirectory'),
    includeConfigurations: optionalStringArray(raw, 'includeConfigurations'),
    excludeConfigurations: optionalStringArray(raw, 'excludeConfigurations'),
    concurrency: optionalPositiveInteger(raw, 'concurrency'),
    requestTimeout: optionalPositiveInteger(raw, 'requestTimeout'),
    logsDir: optionalString(raw, 'logsDir'),
    logLevel,
  };
  return stripUndefined(overrides);
}

/**
 * undefined 값을 가진 키 제거 (병합 시 기본값을 덮어쓰지 않도록)
 */
function stripUndefined(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (overrides.outputFile !== undefined) result.outputFile = overrides.outputFile;
  if (overrides.downloadDirectory !== undefined) result.downloadDirectory = overrides.downloadDirectory;
  if (overrides.includeConfigurations !== undefined) result.includeConfigurations = overrides.includeConfigurations;
  if (overrides.excludeConfigurations !== undefined) result.excludeConfigurations = overrides.excludeConfigurations;
  if (overrides.concurrency !== undefined) result.concurrency = overrides.concurrency;
  if (overrides.requestTimeout !== undefined) result.requestTimeout = overrides.requestTimeout;
  if (overrides.logsDir !== undefined) result.logsDir = overrides.logsDir;
  if (overrides.logLevel !== undefined) result.logLevel = overrides.logLevel;
  return result;
}

export class ConfigManager {
  /**
   * 설정 파일을 읽습니다.
   */
  async readConfigFile(configPath: string): Promise<ConfigOverrides> {
    const resolved = path.resolve(configPath);

    if (!(await fs.pathExists(resolved))) {
      throw new ConfigError(`설정 파일이 없습니다: ${resolved}`);
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(resolved);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`설정 파일을 읽을 수 없습니다: ${resolved} (${reason})`);
    }

    return parseConfigObject(raw);
  }

  /**
   * 기본값 → 설정 파일 → CLI 옵션 순서로 병합한 최종 설정
   */
  async loadConfig(configPath?: string, overrides: ConfigOverrides = {}): Promise<GeneratorConfig> {
    const fromFile = configPath ? await this.readConfigFile(configPath) : {};
    return this.resolveConfig(fromFile, overrides);
  }

  /**
   * 부분 설정들을 병합하고 필수값을 검증합니다.
   */
  resolveConfig(...layers: ConfigOverrides[]): GeneratorConfig {
    const merged = layers.reduce<ConfigOverrides>(
      (acc, layer) => ({ ...acc, ...stripUndefined(layer) }),
      { ...DEFAULT_CONFIG }
    );

    if (!merged.outputFile) {
      throw new ConfigError('출력 파일(outputFile)이 지정되지 않았습니다');
    }

    return {
      outputFile: merged.outputFile,
      downloadDirectory: normalizeDownloadDirectory(merged.downloadDirectory),
      includeConfigurations: merged.includeConfigurations,
      excludeConfigurations: merged.excludeConfigurations,
      concurrency: merged.concurrency ?? DEFAULT_CONFIG.concurrency,
      requestTimeout: merged.requestTimeout ?? DEFAULT_CONFIG.requestTimeout,
      logsDir: merged.logsDir,
      logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
    };
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
