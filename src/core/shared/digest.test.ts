import { describe, it, expect, vi } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Readable } from 'stream';
import { DigestEngine } from './digest';

function expectedSha512(contents: Buffer): string {
  return crypto.createHash('sha512').update(contents).digest('hex');
}

describe('DigestEngine', () => {
  it('바이트의 SHA-512를 소문자 hex 128자로 반환해야 함', async () => {
    const engine = new DigestEngine();
    const contents = Buffer.from('hello manifest\n');

    const digest = await engine.digestBytes(contents);

    expect(digest).toBe(expectedSha512(contents));
    expect(digest).toMatch(/^[0-9a-f]{128}$/);
  });

  it('빈 입력의 다이제스트를 계산해야 함', async () => {
    const engine = new DigestEngine();

    expect(await engine.digestBytes(Buffer.alloc(0))).toBe(
      'cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce' +
        '47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e'
    );
  });

  it('스트림 다이제스트는 같은 내용의 바이트 다이제스트와 같아야 함', async () => {
    const engine = new DigestEngine();
    const chunks = [Buffer.alloc(70 * 1024, 1), Buffer.alloc(10, 2), Buffer.from('tail')];
    const whole = Buffer.concat(chunks);

    const fromStream = await engine.digestStream(() => Readable.from(chunks));

    expect(fromStream).toBe(await engine.digestBytes(whole));
  });

  it('퍼밋 수를 넘는 계산은 대기해야 함', async () => {
    const engine = new DigestEngine({ permits: 1 });
    const results = Promise.all([
      engine.digestBytes(Buffer.from('a')),
      engine.digestBytes(Buffer.from('b')),
      engine.digestBytes(Buffer.from('c')),
    ]);

    expect(engine.pendingCount).toBeGreaterThan(0);
    expect(await results).toEqual([
      expectedSha512(Buffer.from('a')),
      expectedSha512(Buffer.from('b')),
      expectedSha512(Buffer.from('c')),
    ]);
  });

  it('대기 중에 없는 파일을 요청하면 퍼밋을 얻은 뒤 거부되어야 함', async () => {
    const engine = new DigestEngine({ permits: 1 });
    const slow = new PassThrough();
    const missingFile = path.join(os.tmpdir(), `offline-sources-missing-${Date.now()}.jar`);
    const open = vi.fn(() => fs.createReadStream(missingFile));

    const first = engine.digestStream(() => slow);
    const second = engine.digestStream(open);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(open).not.toHaveBeenCalled();
    slow.end(Buffer.from('slow'));

    expect(await first).toBe(expectedSha512(Buffer.from('slow')));
    await expect(second).rejects.toMatchObject({ code: 'ENOENT' });
    expect(open).toHaveBeenCalledTimes(1);
  });

  it('스트림을 여는 중 발생한 예외는 거부로 전달해야 함', async () => {
    const engine = new DigestEngine({ permits: 1 });

    await expect(
      engine.digestStream(() => {
        throw new Error('open failed');
      })
    ).rejects.toThrow('open failed');
  });
});
