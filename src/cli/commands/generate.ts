import chalk from 'chalk';
import { getConfigManager, ConfigOverrides } from '../../core/config';
import { generateSources } from '../../core/generator';
import { JsonGraphProvider } from '../../core/graph/graphProvider';
import logger from '../../utils/logger';

// generate 옵션
export interface GenerateCommandOptions {
  graph: string;
  output?: string;
  downloadDirectory?: string;
  include?: string[];
  exclude?: string[];
  config?: string;
  concurrency?: number;
  timeout?: number;
  logDir?: string;
  verbose?: boolean;
}

/**
 * CLI 옵션을 설정 덮어쓰기 값으로 변환
 */
export function toConfigOverrides(options: GenerateCommandOptions): ConfigOverrides {
  return {
    outputFile: options.output,
    downloadDirectory: options.downloadDirectory,
    includeConfigurations: options.include,
    excludeConfigurations: options.exclude,
    concurrency: options.concurrency,
    requestTimeout: options.timeout,
    logsDir: options.logDir,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

/**
 * generate 명령어 핸들러
 */
export async function generateCommand(options: GenerateCommandOptions): Promise<void> {
  try {
    const config = await getConfigManager().loadConfig(options.config, toConfigOverrides(options));
    await logger.initialize({ logsDir: config.logsDir, level: config.logLevel });

    console.log(chalk.cyan('의존성 그래프 읽는 중...'));
    const provider = await JsonGraphProvider.fromFile(options.graph);

    console.log(chalk.cyan(`동시 작업 수: ${config.concurrency}개`));
    const { outputFile, report } = await generateSources(config, provider);

    console.log(chalk.green(`✓ 매니페스트 생성 완료: ${outputFile}`));
    console.log(chalk.gray(`  의존성: ${report.dependencies}개`));
    console.log(chalk.gray(`  항목: ${report.entries}개`));

    if (report.unresolved.length > 0) {
      console.log(chalk.yellow(`\n⚠ 어느 저장소에서도 찾지 못한 의존성 (${report.unresolved.length}개):`));
      for (const id of report.unresolved) {
        console.log(chalk.yellow(`  - ${id}`));
      }
    }

    if (report.malformed.length > 0) {
      console.log(chalk.red(`\n잘못된 의존성 식별자 (${report.malformed.length}개):`));
      for (const item of report.malformed) {
        console.log(chalk.red(`  - [${item.configuration}] ${item.id}`));
      }
    }
  } catch (error) {
    console.log(chalk.red('✗ 매니페스트 생성 실패'));
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof Error) {
      logger.logError(error, '매니페스트 생성 실패');
    }
    process.exit(1);
  }
}
