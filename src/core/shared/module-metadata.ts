/**
 * Gradle 모듈 메타데이터(.module) 파서
 *
 * 요청한 variant에 해당하는 파일 목록을 찾거나, `available-at`으로
 * 다른 모듈 문서를 가리키는 경우 리다이렉트를 알려준다.
 * 문서에 선언된 sha512 값은 신뢰할 수 없으므로 사용하지 않는다.
 */

import logger from '../../utils/logger';

/** 모듈 문서에 선언된 파일 */
export interface ModuleFile {
  name: string;
  url: string;
}

/** 모듈 문서의 variant (파싱 후 정규화된 형태) */
export interface ModuleVariant {
  name: string;
  category?: string;
  availableAtUrl?: string;
  files: ModuleFile[];
}

export type ModuleParseResult =
  | { kind: 'files'; files: ModuleFile[] }
  | { kind: 'redirect'; url: string }
  | { kind: 'no-files' };

const LIBRARY_CATEGORY = 'library';
const CATEGORY_ATTRIBUTE = 'org.gradle.category';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isLibraryVariant(variant: ModuleVariant): boolean {
  return variant.category === undefined || variant.category === LIBRARY_CATEGORY;
}

/**
 * 모듈 문서에서 variant 목록 추출
 * JSON이 아니거나 variants 배열이 없으면 undefined
 */
export function readVariants(contents: Buffer | string): ModuleVariant[] | undefined {
  let document: unknown;
  try {
    document = JSON.parse(contents.toString());
  } catch (error) {
    logger.debug('모듈 메타데이터 JSON 파싱 실패', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }

  if (!isRecord(document) || !Array.isArray(document.variants)) {
    return undefined;
  }

  const variants: ModuleVariant[] = [];
  for (const raw of document.variants) {
    if (!isRecord(raw)) continue;

    const attributes: Record<string, unknown> = isRecord(raw.attributes) ? raw.attributes : {};
    const availableAt: Record<string, unknown> = isRecord(raw['available-at']) ? raw['available-at'] : {};
    const files: ModuleFile[] = [];

    if (Array.isArray(raw.files)) {
      for (const file of raw.files) {
        if (!isRecord(file)) continue;
        const name = optionalString(file.name);
        const url = optionalString(file.url);
        if (name !== undefined && url !== undefined) {
          files.push({ name, url });
        }
      }
    }

    variants.push({
      name: optionalString(raw.name) ?? '',
      category: optionalString(attributes[CATEGORY_ATTRIBUTE]),
      availableAtUrl: optionalString(availableAt.url),
      files,
    });
  }

  return variants;
}

/**
 * 모듈 문서를 해석하여 다운로드할 파일 목록 반환
 * @param contents .module 파일 내용
 * @param variant 빌드 도구가 해결한 variant 이름 (예: runtimeElements)
 */
export function parseModuleMetadata(contents: Buffer | string, variant: string): ModuleParseResult {
  const variants = readVariants(contents);
  if (!variants) {
    return { kind: 'no-files' };
  }

  const redirect = variants.find(
    (v) => v.name === variant && isLibraryVariant(v) && v.availableAtUrl !== undefined
  );
  if (redirect?.availableAtUrl !== undefined) {
    return { kind: 'redirect', url: redirect.availableAtUrl };
  }

  // library variant 파일을 (name, url) 기준으로 중복 제거
  const seen = new Set<string>();
  const files: ModuleFile[] = [];
  for (const v of variants) {
    if (!isLibraryVariant(v)) continue;
    for (const file of v.files) {
      const key = JSON.stringify([file.name, file.url]);
      if (seen.has(key)) continue;
      seen.add(key);
      files.push(file);
    }
  }

  return files.length > 0 ? { kind: 'files', files } : { kind: 'no-files' };
}
