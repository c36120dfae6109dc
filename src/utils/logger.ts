import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs-extra';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

/** 로거 초기화 옵션 */
export interface LoggerOptions {
  /** 로그 파일 디렉토리 (없으면 콘솔만 사용) */
  logsDir?: string;
  /** 콘솔 로그 레벨 */
  level?: LogLevel;
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용). CLI 출력과 섞이지 않도록 stderr로 보냄
    this.logger = winston.createLogger({
      level: 'warn',
      format: logFormat,
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn', 'info', 'debug'],
        }),
      ],
    });
  }

  /**
   * 로거를 초기화합니다. 로그 디렉토리가 지정되면 파일 로테이션을 추가합니다.
   */
  async initialize(options: LoggerOptions = {}): Promise<void> {
    if (this.initialized) return;

    const level = options.level ?? 'warn';
    const transports: winston.transport[] = [
      new winston.transports.Console({
        level,
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ];

    if (options.logsDir) {
      await fs.ensureDir(options.logsDir);

      // 파일 로테이션 트랜스포트 설정
      transports.push(
        new DailyRotateFile({
          dirname: options.logsDir,
          filename: 'generator-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          level: 'debug',
          format: logFormat,
        })
      );

      // 에러 전용 파일 트랜스포트
      transports.push(
        new DailyRotateFile({
          dirname: options.logsDir,
          filename: 'error-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    // 로거 재설정
    this.logger = winston.createLogger({
      level: options.logsDir ? 'debug' : level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir: options.logsDir, level });
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
