/**
 * 중복 없는 매니페스트 저장소
 *
 * 항목은 `디렉토리/파일명` 키로 저장된다. 같은 키를 서로 다른 URL이 차지하면
 * URL이 작은 쪽(UTF-16 코드 단위 비교)을 남겨 응답 도착 순서와 무관하게 한다.
 * 직렬화 시 키 오름차순으로 정렬하여 완료 순서와 무관하게 같은 출력을 만든다.
 */

import { ManifestEntry, SourceEntry } from '../../types';

/** 기본 다운로드 디렉토리 */
export const DEFAULT_DOWNLOAD_DIRECTORY = 'offline-repository';

/**
 * 다운로드 디렉토리 정규화 (끝에 / 추가)
 */
export function normalizeDownloadDirectory(dir: string | undefined): string {
  const value = dir ?? DEFAULT_DOWNLOAD_DIRECTORY;
  return value.endsWith('/') ? value : `${value}/`;
}

export class ManifestStore {
  private readonly entries: Map<string, ManifestEntry> = new Map();

  constructor(private readonly downloadDirectory: string = normalizeDownloadDirectory(undefined)) {}

  static key(dir: string, filename: string): string {
    return `${dir}/${filename}`;
  }

  /**
   * 항목 추가 또는 교체
   * @param dir 다운로드 루트 기준 상대 디렉토리
   * @returns 저장소에 남은 항목
   */
  upsert(url: string, digest: string, dir: string, filename: string): ManifestEntry {
    const key = ManifestStore.key(dir, filename);
    const existing = this.entries.get(key);
    if (existing && existing.url <= url) {
      return existing;
    }

    const entry: ManifestEntry = Object.freeze({
      url,
      digest,
      destDir: this.downloadDirectory + dir,
      destFilename: filename,
    });
    this.entries.set(key, entry);
    return entry;
  }

  has(dir: string, filename: string): boolean {
    return this.entries.has(ManifestStore.key(dir, filename));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * 키 오름차순으로 정렬된 항목
   */
  sorted(): ManifestEntry[] {
    return [...this.entries.keys()]
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .flatMap((key) => {
        const entry = this.entries.get(key);
        return entry ? [entry] : [];
      });
  }

  toSourceEntries(): SourceEntry[] {
    return this.sorted().map((entry) => ({
      type: 'file',
      url: entry.url,
      sha512: entry.digest,
      dest: entry.destDir,
      'dest-filename': entry.destFilename,
    }));
  }

  /**
   * JSON 배열로 직렬화 (2칸 들여쓰기, 끝에 개행)
   */
  serialize(): string {
    const entries = this.toSourceEntries();
    if (entries.length === 0) {
      return '[\n]\n';
    }
    return `${JSON.stringify(entries, null, 2)}\n`;
  }
}
