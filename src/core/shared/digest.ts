/**
 * SHA-512 다이제스트 계산
 *
 * 네트워크 동시성(높음)과 해시 계산 동시성(CPU 코어 수)을 분리하기 위해
 * p-limit 퍼밋을 얻은 뒤에만 해시를 계산한다.
 */

import * as crypto from 'crypto';
import * as os from 'os';
import pLimit from 'p-limit';
import { Readable } from 'stream';
import { DigestAlgorithmUnavailableError } from './errors';

export const DIGEST_ALGORITHM = 'sha512';

/** 로컬 파일을 읽을 때 사용하는 청크 크기 (64KiB) */
export const DIGEST_CHUNK_SIZE = 64 * 1024;

export interface DigestEngineOptions {
  /** 동시에 계산할 수 있는 해시 수 (기본값: 사용 가능한 CPU 수) */
  permits?: number;
}

export class DigestEngine {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(options: DigestEngineOptions = {}) {
    if (!crypto.getHashes().includes(DIGEST_ALGORITHM)) {
      throw new DigestAlgorithmUnavailableError(DIGEST_ALGORITHM);
    }
    this.limit = pLimit(Math.max(1, options.permits ?? os.availableParallelism()));
  }

  /**
   * 메모리에 있는 바이트의 다이제스트
   */
  digestBytes(contents: Buffer): Promise<string> {
    return this.limit(async () => crypto.createHash(DIGEST_ALGORITHM).update(contents).digest('hex'));
  }

  /**
   * 스트림을 청크 단위로 읽어 다이제스트 계산
   *
   * 스트림은 퍼밋을 얻은 뒤에 연다. 대기 중에 열린 스트림의 오류는
   * 받을 리스너가 없다.
   */
  digestStream(open: () => Readable): Promise<string> {
    return this.limit(async () => {
      const hash = crypto.createHash(DIGEST_ALGORITHM);
      for await (const chunk of open()) {
        hash.update(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      }
      return hash.digest('hex');
    });
  }

  /** 대기 중인 계산 수 */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
