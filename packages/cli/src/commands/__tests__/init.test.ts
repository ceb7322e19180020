/**
 * init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader } from '@fragmentlog/types';
import { createContext, initConfig, normalizeRepositoryUrl } from '../init.js';

describe('init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), 'fragmentlog-init-test-'));
    configPath = path.join(testDir, 'fragmentlog.toml');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('package.jsonのコンテキストで設定ファイルを生成できる', async () => {
    await fs.writeFile(
      path.join(testDir, 'package.json'),
      JSON.stringify({
        name: 'demo',
        version: '1.2.3',
        repository: { type: 'git', url: 'git+https://example.com/demo.git' },
      })
    );

    const result = await initConfig({ cwd: testDir });

    expect(result.configPath).toBe(configPath);
    expect(result.context).toEqual({
      name: 'demo',
      version: '1.2.3',
      url: 'https://example.com/demo',
    });

    // 生成された設定ファイルをそのまま読み込める
    const workspace = await ConfigLoader.load(configPath);
    expect(workspace.context).toEqual(result.context);
    expect(workspace.config).toEqual({
      ...ConfigLoader.getDefaultConfig(),
      paths: {
        directory: path.join(testDir, 'changes'),
        output: path.join(testDir, 'CHANGELOG.md'),
      },
    });
  });

  it('package.jsonがない場合はディレクトリ名を使う', async () => {
    const result = await initConfig({ cwd: testDir });

    expect(result.context).toEqual({
      name: path.basename(testDir),
      version: '0.1.0',
      url: '',
    });
  });

  it('フラグメントディレクトリとチェンジログを作成する', async () => {
    const result = await initConfig({ cwd: testDir });

    expect(result.created).toEqual([
      configPath,
      path.join(testDir, 'changes'),
      path.join(testDir, 'CHANGELOG.md'),
    ]);
    expect((await fs.stat(path.join(testDir, 'changes'))).isDirectory()).toBe(true);
    expect(await fs.readFile(path.join(testDir, 'CHANGELOG.md'), 'utf-8')).toBe(
      '# Changelog\n\n<!-- fragmentlog: start -->\n'
    );
  });

  it('既存のチェンジログは変更しない', async () => {
    await fs.writeFile(path.join(testDir, 'CHANGELOG.md'), '# History\n');

    const result = await initConfig({ cwd: testDir });

    expect(result.created).toEqual([configPath, path.join(testDir, 'changes')]);
    expect(await fs.readFile(path.join(testDir, 'CHANGELOG.md'), 'utf-8')).toBe('# History\n');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow(
      'Configuration file already exists'
    );
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await fs.writeFile(configPath, 'broken = [\n');

    const result = await initConfig({ cwd: testDir, force: true });

    expect(result.created[0]).toBe(configPath);
    await expect(ConfigLoader.load(configPath)).resolves.toHaveProperty('context');
  });
});

describe('createContext', () => {
  it('repositoryが文字列の場合', () => {
    expect(
      createContext({ name: 'demo', repository: 'https://example.com/demo.git' }, '/work/demo')
    ).toEqual({ name: 'demo', version: '0.1.0', url: 'https://example.com/demo' });
  });

  it('repositoryがない場合はhomepageを使う', () => {
    expect(createContext({ homepage: 'https://example.com' }, '/work/demo')).toEqual({
      name: 'demo',
      version: '0.1.0',
      url: 'https://example.com',
    });
  });
});

describe('normalizeRepositoryUrl', () => {
  it('git+ 接頭辞と .git 接尾辞を除く', () => {
    expect(normalizeRepositoryUrl('git+https://example.com/demo.git')).toBe(
      'https://example.com/demo'
    );
  });
});
