/**
 * create コマンド実装
 */

import { createFragment } from '@fragmentlog/core';
import { ConfigLoader, type Editor, type VersionControl } from '@fragmentlog/types';
import { SystemEditor } from '../utils/editor.js';
import { GitVersionControl } from '../utils/git.js';
import { exitWithError } from '../utils/output.js';
import { runCommand } from '../utils/process.js';

export interface CreateCommandOptions {
  /** フラグメントの内容 */
  content?: string;
  /** 作成後にエディタで開く */
  edit?: boolean;
  /** 作成後にgit addする */
  add?: boolean;
  /** 設定ファイルのパス */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export interface CreateDependencies {
  editor?: Editor;
  versionControl?: VersionControl;
}

/**
 * フラグメントディレクトリにフラグメントを作成し、パスを返す
 */
export async function createFragmentFile(
  name: string,
  options: CreateCommandOptions,
  dependencies: CreateDependencies = {}
): Promise<string> {
  const { workspace, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });

  const path = await createFragment({
    directory: workspace.config.paths.directory,
    name,
    content: options.content,
    editor: options.edit ? (dependencies.editor ?? new SystemEditor()) : undefined,
  });

  if (options.add) {
    const versionControl =
      dependencies.versionControl ?? new GitVersionControl(runCommand, projectRoot);
    await versionControl.add([path]);
  }

  return path;
}

/**
 * create コマンドを実行
 */
export async function executeCreate(name: string, options: CreateCommandOptions): Promise<void> {
  try {
    const path = await createFragmentFile(name, options);
    console.log(`✅ Fragment created: ${path}`);
  } catch (error) {
    exitWithError(error);
  }
}
