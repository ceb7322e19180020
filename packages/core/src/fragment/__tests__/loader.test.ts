import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { FragmentLoadError, FragmentParseError } from '../../errors.js';
import { loadFragment } from '../loader.js';

describe('loadFragment', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), 'fragmentlog-loader-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('内容の前後の空白を除去して読み込む', async () => {
    const file = path.join(testDir, '1.feature');
    await fs.writeFile(file, '\n  Added the `build` command.\n\n');

    const fragment = await loadFragment(file);

    expect(fragment).toEqual({
      identifier: { id: { kind: 'integer', value: 1 }, typeName: 'feature' },
      content: 'Added the `build` command.',
    });
  });

  it('文字列IDのフラグメントを読み込む', async () => {
    const file = path.join(testDir, '~misc.internal.md');
    await fs.writeFile(file, 'Reworked internals.\n');

    const fragment = await loadFragment(file);

    expect(fragment.identifier).toEqual({
      id: { kind: 'string', value: 'misc' },
      typeName: 'internal',
    });
    expect(fragment.content).toBe('Reworked internals.');
  });

  it('不正な名前はparseエラー', async () => {
    const file = path.join(testDir, 'README.md');
    await fs.writeFile(file, '# readme\n');

    const error = await loadFragment(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FragmentLoadError);
    expect(error).toHaveProperty('reason', 'parse');
    expect(error).toHaveProperty('path', file);
    expect(error).toHaveProperty('cause', expect.any(FragmentParseError));
  });

  it('存在しないファイルはreadエラー', async () => {
    const file = path.join(testDir, '2.fix');

    const error = await loadFragment(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FragmentLoadError);
    expect(error).toHaveProperty('reason', 'read');
  });

  it('UTF-8でない内容はreadエラー', async () => {
    const file = path.join(testDir, '5.fix');
    await fs.writeFile(file, Buffer.from([0x66, 0xff, 0xfe, 0x6f]));

    const error = await loadFragment(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FragmentLoadError);
    expect(error).toHaveProperty('reason', 'read');
    expect(error).toHaveProperty('cause', expect.any(TypeError));
  });

  it('ディレクトリはreadエラー', async () => {
    const dir = path.join(testDir, '3.fix');
    await fs.mkdir(dir);

    await expect(loadFragment(dir)).rejects.toHaveProperty('reason', 'read');
  });

  it('置換文字を含む名前はinvalid-name', async () => {
    await expect(loadFragment(path.join(testDir, '\uFFFD.fix'))).rejects.toHaveProperty(
      'reason',
      'invalid-name'
    );
  });

  it('エラーメッセージにパスを含む', async () => {
    const file = path.join(testDir, '4.fix');

    await expect(loadFragment(file)).rejects.toThrow(`failed to load \`${file}\``);
  });
});
