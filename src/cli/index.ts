#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';

// 버전 정보
const VERSION = '1.0.0';

/**
 * 1 이상의 정수 옵션 파서
 */
function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('1 이상의 정수가 필요합니다');
  }
  return parsed;
}

/**
 * 쉼표로 구분된 목록 파서
 */
function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// 메인 프로그램
const program = new Command();

program
  .name('offline-sources')
  .description(chalk.cyan('오프라인 빌드를 위한 의존성 소스 매니페스트 생성기'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// generate 명령어 (기본 명령어)
program
  .command('generate', { isDefault: true })
  .description('의존성 그래프에서 소스 매니페스트 생성')
  .requiredOption('-g, --graph <file>', '빌드 도구가 내보낸 의존성 그래프 JSON')
  .option('-o, --output <file>', '출력 매니페스트 파일')
  .option('-d, --download-directory <dir>', '매니페스트 dest 접두 디렉토리 (기본값: offline-repository)')
  .option('--include <names>', '포함할 configuration (쉼표 구분)', parseList)
  .option('--exclude <names>', '제외할 configuration (쉼표 구분)', parseList)
  .option('-c, --config <file>', '설정 파일 (JSON)')
  .option('--concurrency <num>', '동시 작업 수 (기본값: 128)', parsePositiveInteger)
  .option('--timeout <ms>', '요청 타임아웃 (기본값: 30000)', parsePositiveInteger)
  .option('--log-dir <dir>', '로그 파일 디렉토리')
  .option('--verbose', '디버그 로그 출력')
  .action(async (options) => {
    const { generateCommand } = await import('./commands/generate');
    await generateCommand(options);
  });

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 파싱 및 실행
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
