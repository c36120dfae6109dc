import { describe, it, expect } from 'vitest';
import { ManifestStore, normalizeDownloadDirectory } from './manifest-store';

const DIGEST_A = 'a'.repeat(128);
const DIGEST_B = 'b'.repeat(128);

describe('ManifestStore', () => {
  it('다운로드 디렉토리 끝에 /를 붙여야 함', () => {
    expect(normalizeDownloadDirectory(undefined)).toBe('offline-repository/');
    expect(normalizeDownloadDirectory('deps')).toBe('deps/');
    expect(normalizeDownloadDirectory('deps/')).toBe('deps/');
  });

  it('비어 있으면 빈 배열 형식으로 직렬화해야 함', () => {
    expect(new ManifestStore().serialize()).toBe('[\n]\n');
  });

  it('같은 위치는 추가 순서와 무관하게 URL이 작은 항목을 남겨야 함', () => {
    const urlA = 'https://a.example.test/com/example/lib/1.0/lib-1.0.jar';
    const urlB = 'https://b.example.test/com/example/lib/1.0/lib-1.0.jar';
    const expected = [
      {
        url: urlA,
        digest: DIGEST_A,
        destDir: 'offline-repository/com/example/lib/1.0',
        destFilename: 'lib-1.0.jar',
      },
    ];

    const forward = new ManifestStore('offline-repository/');
    forward.upsert(urlA, DIGEST_A, 'com/example/lib/1.0', 'lib-1.0.jar');
    const kept = forward.upsert(urlB, DIGEST_B, 'com/example/lib/1.0', 'lib-1.0.jar');

    const reverse = new ManifestStore('offline-repository/');
    reverse.upsert(urlB, DIGEST_B, 'com/example/lib/1.0', 'lib-1.0.jar');
    reverse.upsert(urlA, DIGEST_A, 'com/example/lib/1.0', 'lib-1.0.jar');

    expect(kept.url).toBe(urlA);
    expect(forward.size).toBe(1);
    expect(forward.has('com/example/lib/1.0', 'lib-1.0.jar')).toBe(true);
    expect(forward.sorted()).toEqual(expected);
    expect(reverse.sorted()).toEqual(expected);
    expect(reverse.serialize()).toBe(forward.serialize());
  });

  it('키 오름차순으로 정렬해야 함', () => {
    const store = new ManifestStore('repo/');
    store.upsert('https://r.example.test/z', DIGEST_A, 'org/z/1.0', 'z-1.0.pom');
    store.upsert('https://r.example.test/a-pom', DIGEST_A, 'com/a/1.0', 'a-1.0.pom');
    store.upsert('https://r.example.test/a-jar', DIGEST_B, 'com/a/1.0', 'a-1.0.jar');

    expect(store.sorted().map((entry) => `${entry.destDir}/${entry.destFilename}`)).toEqual([
      'repo/com/a/1.0/a-1.0.jar',
      'repo/com/a/1.0/a-1.0.pom',
      'repo/org/z/1.0/z-1.0.pom',
    ]);
  });

  it('출력 형식으로 직렬화해야 함', () => {
    const store = new ManifestStore('offline-repository/');
    store.upsert('https://r.example.test/com/example/lib/1.0/lib-1.0.pom', DIGEST_A, 'com/example/lib/1.0', 'lib-1.0.pom');

    const expected =
      '[\n' +
      '  {\n' +
      '    "type": "file",\n' +
      '    "url": "https://r.example.test/com/example/lib/1.0/lib-1.0.pom",\n' +
      `    "sha512": "${DIGEST_A}",\n` +
      '    "dest": "offline-repository/com/example/lib/1.0",\n' +
      '    "dest-filename": "lib-1.0.pom"\n' +
      '  }\n' +
      ']\n';
    expect(store.serialize()).toBe(expected);
  });
});
