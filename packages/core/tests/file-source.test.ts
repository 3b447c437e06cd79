import { describe, it, expect } from 'vitest';
import { RemoteFileSource } from '../src/update/file-source.js';
import { UpdateError, UpdateErrorCode } from '../src/utils/errors.js';
import { fakeHttp } from './helpers.js';

const RAW = 'https://raw.example.test/acme/speech/main/';

describe('RemoteFileSource', () => {
  it('reads and trims the published version', async () => {
    const requests: string[] = [];
    const source = new RemoteFileSource({ http: fakeHttp(() => ' 2.1.0\n', requests) });

    expect(await source.fetchVersion(RAW)).toBe('2.1.0');
    expect(requests).toEqual(['https://raw.example.test/acme/speech/main/VERSION']);
  });

  it('returns null for an empty or unreachable version', async () => {
    const empty = new RemoteFileSource({ http: fakeHttp(() => '   ') });
    const offline = new RemoteFileSource({
      http: fakeHttp(() => {
        throw new Error('getaddrinfo ENOTFOUND');
      }),
    });

    expect(await empty.fetchVersion(RAW)).toBeNull();
    expect(await offline.fetchVersion(RAW)).toBeNull();
    expect(await offline.fetchVersion('')).toBeNull();
  });

  it('downloads a file, encoding each path segment', async () => {
    const requests: string[] = [];
    const source = new RemoteFileSource({ http: fakeHttp(() => Buffer.from('print("hi")'), requests) });

    const content = await source.download(RAW, 'src/templates/main interface.html');

    expect(content.toString('utf-8')).toBe('print("hi")');
    expect(requests).toEqual(['https://raw.example.test/acme/speech/main/src/templates/main%20interface.html']);
  });

  it('names the file in download failures', async () => {
    const source = new RemoteFileSource({
      http: fakeHttp(() => {
        throw new Error('socket hang up');
      }),
    });

    const attempt = source.download(RAW, 'requirements.txt');

    await expect(attempt).rejects.toBeInstanceOf(UpdateError);
    await expect(attempt).rejects.toMatchObject({
      code: UpdateErrorCode.APPLY_FAILURE,
      message: 'Failed to download requirements.txt: socket hang up',
    });
  });

  it('refuses to download without a raw URL', async () => {
    const source = new RemoteFileSource({ http: fakeHttp(() => Buffer.alloc(0)) });

    await expect(source.download('', 'requirements.txt')).rejects.toMatchObject({
      code: UpdateErrorCode.CONFIG_INCONSISTENCY,
    });
  });
});
