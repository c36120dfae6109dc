/**
 * 원격 저장소 목록
 */

/** Gradle 플러그인 포털 (플러그인 저장소 목록에 항상 포함) */
export const PLUGIN_PORTAL_URL = 'https://plugins.gradle.org/m2/';

export type RepositoryList = readonly string[];

/**
 * 로컬(file:) 저장소 여부 - 원격 다운로드 대상이 될 수 없음
 */
export function isLocalRepository(url: string): boolean {
  return url.toLowerCase().startsWith('file:');
}

/**
 * 저장소 URL 정규화 (끝에 / 추가)
 */
export function normalizeRepositoryUrl(url: string): string {
  const trimmed = url.trim();
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

/**
 * 선언 순서를 유지하며 중복과 로컬 저장소를 제거한 목록 생성
 */
export function buildRepositoryList(
  urls: Iterable<string>,
  options: { includePluginPortal?: boolean } = {}
): RepositoryList {
  const result: string[] = [];
  const seen = new Set<string>();

  const add = (url: string) => {
    const normalized = normalizeRepositoryUrl(url);
    if (!url.trim() || isLocalRepository(normalized) || seen.has(normalized)) return;
    seen.add(normalized);
    result.push(normalized);
  };

  for (const url of urls) {
    add(url);
  }
  if (options.includePluginPortal) {
    add(PLUGIN_PORTAL_URL);
  }

  return Object.freeze(result);
}

/**
 * 두 목록을 순서대로 합침 (앞 목록 우선)
 */
export function mergeRepositoryLists(...lists: RepositoryList[]): RepositoryList {
  return buildRepositoryList(lists.flat());
}
