/**
 * create コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { CreateError } from '@fragmentlog/core';
import { CONFIG_ENV, type Editor, type VersionControl } from '@fragmentlog/types';
import { createFragmentFile } from '../create.js';
import { initConfig } from '../init.js';

describe('create', () => {
  let testDir: string;
  let savedEnv: string | undefined;

  const dependencies = () => {
    const editor: Editor = { edit: vi.fn<Editor['edit']>().mockResolvedValue(undefined) };
    const versionControl: VersionControl = {
      add: vi.fn<VersionControl['add']>().mockResolvedValue(undefined),
      remove: vi.fn<VersionControl['remove']>().mockResolvedValue(undefined),
    };
    return { editor, versionControl };
  };

  beforeEach(async () => {
    savedEnv = process.env[CONFIG_ENV];
    delete process.env[CONFIG_ENV];

    testDir = await fs.mkdtemp(path.join(tmpdir(), 'fragmentlog-create-test-'));
    await initConfig({ cwd: testDir });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });

    if (savedEnv === undefined) {
      delete process.env[CONFIG_ENV];
    } else {
      process.env[CONFIG_ENV] = savedEnv;
    }
  });

  it('フラグメントディレクトリに作成する', async () => {
    const deps = dependencies();

    const file = await createFragmentFile('7.fix', { cwd: testDir, content: 'Fixed.' }, deps);

    expect(file).toBe(path.join(testDir, 'changes', '7.fix'));
    expect(await fs.readFile(file, 'utf-8')).toBe('Fixed.\n');
    expect(deps.editor.edit).not.toHaveBeenCalled();
    expect(deps.versionControl.add).not.toHaveBeenCalled();
  });

  it('サブディレクトリからも設定ファイルを見つける', async () => {
    const file = await createFragmentFile(
      '~docs.change',
      { cwd: path.join(testDir, 'changes') },
      dependencies()
    );

    expect(file).toBe(path.join(testDir, 'changes', '~docs.change'));
  });

  it('--editでエディタを開き、--addでgit addする', async () => {
    const deps = dependencies();

    const file = await createFragmentFile(
      '8.feature',
      { cwd: testDir, edit: true, add: true },
      deps
    );

    expect(deps.editor.edit).toHaveBeenCalledWith(file);
    expect(deps.versionControl.add).toHaveBeenCalledWith([file]);
  });

  it('不正な名前はCreateError', async () => {
    const deps = dependencies();

    await expect(
      createFragmentFile('notes', { cwd: testDir, add: true }, deps)
    ).rejects.toBeInstanceOf(CreateError);
    expect(deps.versionControl.add).not.toHaveBeenCalled();
  });
});
