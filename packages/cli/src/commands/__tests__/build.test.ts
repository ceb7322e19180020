/**
 * build コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { DateError } from '@fragmentlog/core';
import { CONFIG_ENV, type VersionControl } from '@fragmentlog/types';
import { buildChangelog } from '../build.js';
import { initConfig } from '../init.js';

const ENTRY =
  '## [1.2.3](https://example.com/demo/tree/v1.2.3) (2024-05-06)\n\n' +
  '### Fixes\n\n' +
  '- Fixed. ([#1](https://example.com/demo/pull/1))';

interface FakeVersionControl extends VersionControl {
  add: Mock<VersionControl['add']>;
  remove: Mock<VersionControl['remove']>;
}

function fakeVersionControl(): FakeVersionControl {
  return {
    add: vi.fn<VersionControl['add']>().mockResolvedValue(undefined),
    remove: vi.fn<VersionControl['remove']>().mockResolvedValue(undefined),
  };
}

describe('build', () => {
  let testDir: string;
  let output: string;
  let savedEnv: string | undefined;

  beforeEach(async () => {
    savedEnv = process.env[CONFIG_ENV];
    delete process.env[CONFIG_ENV];

    testDir = await fs.mkdtemp(path.join(tmpdir(), 'fragmentlog-build-test-'));
    output = path.join(testDir, 'CHANGELOG.md');

    await fs.writeFile(
      path.join(testDir, 'package.json'),
      JSON.stringify({ name: 'demo', version: '1.2.3', repository: 'https://example.com/demo' })
    );
    await initConfig({ cwd: testDir });
    await fs.writeFile(path.join(testDir, 'changes', '1.fix'), 'Fixed.\n');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });

    if (savedEnv === undefined) {
      delete process.env[CONFIG_ENV];
    } else {
      process.env[CONFIG_ENV] = savedEnv;
    }
  });

  it('プレビューはエントリを返し、ファイルを変更しない', async () => {
    const result = await buildChangelog({ cwd: testDir, date: '2024-05-06', preview: true });

    expect(result).toEqual({ kind: 'preview', entry: ENTRY });
    expect(await fs.readFile(output, 'utf-8')).toBe(
      '# Changelog\n\n<!-- fragmentlog: start -->\n'
    );
  });

  it('チェンジログに書き込む', async () => {
    const versionControl = fakeVersionControl();

    const result = await buildChangelog(
      { cwd: testDir, date: '2024-05-06' },
      { versionControl }
    );

    expect(result).toEqual({ kind: 'write', output, staged: [], removed: [] });
    expect(await fs.readFile(output, 'utf-8')).toBe(
      `# Changelog\n\n<!-- fragmentlog: start -->\n\n${ENTRY}\n`
    );
    expect(versionControl.add).not.toHaveBeenCalled();
    expect(versionControl.remove).not.toHaveBeenCalled();
  });

  it('--stageと--removeでバージョン管理を更新する', async () => {
    const versionControl = fakeVersionControl();
    const fragment = path.join(testDir, 'changes', '1.fix');

    const result = await buildChangelog(
      { cwd: testDir, date: '2024-05-06', stage: true, remove: true },
      { versionControl }
    );

    expect(result).toEqual({ kind: 'write', output, staged: [output], removed: [fragment] });
    expect(versionControl.add).toHaveBeenCalledWith([output]);
    expect(versionControl.remove).toHaveBeenCalledWith([fragment]);
  });

  it('設定ファイルを明示できる', async () => {
    await fs.rename(path.join(testDir, 'fragmentlog.toml'), path.join(testDir, 'release.toml'));

    const result = await buildChangelog({
      cwd: testDir,
      config: 'release.toml',
      date: '2024-05-06',
      preview: true,
    });

    expect(result).toEqual({ kind: 'preview', entry: ENTRY });
  });

  it('不正な日付は設定を読む前にDateError', async () => {
    const empty = path.join(testDir, 'changes');

    await expect(buildChangelog({ cwd: empty, config: 'missing.toml', date: '2024-13-01' }))
      .rejects.toBeInstanceOf(DateError);
  });

  it('書き込みに失敗した場合はバージョン管理を更新しない', async () => {
    const versionControl = fakeVersionControl();
    await fs.rm(output);

    await expect(
      buildChangelog({ cwd: testDir, date: '2024-05-06', stage: true }, { versionControl })
    ).rejects.toThrow(`failed to read \`${output}\``);
    expect(versionControl.add).not.toHaveBeenCalled();
  });
});
