/**
 * 원격 파일 존재 확인(HEAD) 및 다운로드(GET)
 *
 * 한 번의 실행 동안 URL 당 최대 한 번만 요청하며, 동시에 같은 URL을 요청하면
 * 진행 중인 요청을 공유한다. 실패는 재시도하지 않고 "이 위치에 없음"으로 취급한다.
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';

/** 기본 요청 타임아웃 (30초) */
export const DEFAULT_REQUEST_TIMEOUT = 30000;

const USER_AGENT = 'offline-sources-generator/1.0';

export interface ContentFetcherOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  /** 테스트 등에서 주입하는 HTTP 클라이언트 */
  client?: AxiosInstance;
}

export interface ContentFetcherStats {
  /** 실제 HEAD 요청 수 */
  probeRequests: number;
  /** 실제 GET 요청 수 */
  fetchRequests: number;
  /** 캐시(진행 중 요청 포함)로 처리된 조회 수 */
  cacheHits: number;
}

export class ContentFetcher {
  private readonly client: AxiosInstance;

  /** URL → 유효 여부 */
  private readonly probeCache: Map<string, Promise<boolean>> = new Map();

  /** URL → 다운로드한 내용 (없으면 undefined) */
  private readonly contentCache: Map<string, Promise<Buffer | undefined>> = new Map();

  private stats: ContentFetcherStats = { probeRequests: 0, fetchRequests: 0, cacheHits: 0 };

  constructor(options: ContentFetcherOptions = {}) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeout ?? DEFAULT_REQUEST_TIMEOUT,
        maxRedirects: 10,
        headers: {
          'User-Agent': USER_AGENT,
        },
      });
  }

  /**
   * URL이 유효한지 확인 (2xx 응답)
   */
  probe(url: string): Promise<boolean> {
    const cached = this.probeCache.get(url);
    if (cached) {
      this.stats.cacheHits++;
      return cached;
    }

    const request = this.headRequest(url);
    this.probeCache.set(url, request);
    return request;
  }

  /**
   * 파일 내용 다운로드. 실패하면 undefined
   */
  fetch(url: string): Promise<Buffer | undefined> {
    const cached = this.contentCache.get(url);
    if (cached) {
      this.stats.cacheHits++;
      return cached;
    }

    const request = this.getRequest(url);
    this.contentCache.set(url, request);
    return request;
  }

  getStats(): ContentFetcherStats {
    return { ...this.stats };
  }

  private async headRequest(url: string): Promise<boolean> {
    if (!isHttpUrl(url)) {
      logger.debug('잘못된 URL, 존재 확인 생략', { url });
      return false;
    }

    this.stats.probeRequests++;
    try {
      const response = await this.client.head(url);
      return isSuccess(response.status);
    } catch (error) {
      logger.debug('HEAD 요청 실패', { url, error: describeError(error) });
      return false;
    }
  }

  private async getRequest(url: string): Promise<Buffer | undefined> {
    if (!isHttpUrl(url)) {
      logger.debug('잘못된 URL, 다운로드 생략', { url });
      return undefined;
    }

    this.stats.fetchRequests++;
    try {
      const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      if (!isSuccess(response.status)) {
        return undefined;
      }
      return Buffer.from(response.data);
    } catch (error) {
      logger.debug('GET 요청 실패', { url, error: describeError(error) });
      return undefined;
    }
  }
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : (error.code ?? error.message);
  }
  return error instanceof Error ? error.message : String(error);
}
