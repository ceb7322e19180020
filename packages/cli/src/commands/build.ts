/**
 * build / preview コマンド実装
 */

import {
  ChangelogBuilder,
  parseDate,
  today,
} from '@fragmentlog/core';
import { ConfigLoader, type VersionControl } from '@fragmentlog/types';
import { GitVersionControl } from '../utils/git.js';
import { exitWithError } from '../utils/output.js';
import { runCommand } from '../utils/process.js';

export interface BuildCommandOptions {
  /** エントリの日付（YYYY-MM-DD、デフォルト: 今日） */
  date?: string;
  /** 書き込まずに出力する */
  preview?: boolean;
  /** 書き込み後にチェンジログをgit addする */
  stage?: boolean;
  /** 書き込み後にフラグメントをgit rmする */
  remove?: boolean;
  /** 設定ファイルのパス */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export interface BuildDependencies {
  /** デフォルト: プロジェクトルートで動くgit */
  versionControl?: VersionControl;
}

export type BuildResult =
  | { kind: 'preview'; entry: string }
  | { kind: 'write'; output: string; staged: string[]; removed: string[] };

/**
 * チェンジログを組み立てる
 * @throws DateError, ConfigError, RendererInitError, WriteError, CollectError, CommandError
 */
export async function buildChangelog(
  options: BuildCommandOptions,
  dependencies: BuildDependencies = {}
): Promise<BuildResult> {
  // 日付はビルダーより先に検証する
  const date = options.date !== undefined ? parseDate(options.date) : today();

  const { workspace, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });

  const builder = ChangelogBuilder.fromWorkspace(workspace, date);

  if (options.preview) {
    return { kind: 'preview', entry: await builder.preview() };
  }

  await builder.write();

  const versionControl =
    dependencies.versionControl ?? new GitVersionControl(runCommand, projectRoot);
  const output = builder.config.paths.output;
  const staged: string[] = [];
  const removed: string[] = [];

  if (options.stage) {
    await versionControl.add([output]);
    staged.push(output);
  }

  if (options.remove) {
    const paths = await builder.collectPaths();
    await versionControl.remove(paths);
    removed.push(...paths);
  }

  return { kind: 'write', output, staged, removed };
}

/**
 * build コマンドを実行
 */
export async function executeBuild(options: BuildCommandOptions): Promise<void> {
  try {
    const result = await buildChangelog(options);

    if (result.kind === 'preview') {
      console.log(result.entry);
      return;
    }

    console.log(`✅ Changelog updated: ${result.output}`);
    if (result.staged.length > 0) {
      console.log(`📌 Staged: ${result.staged.join(', ')}`);
    }
    if (result.removed.length > 0) {
      console.log(`🗑️  Removed ${result.removed.length} fragment(s)`);
    }
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * preview コマンドを実行
 */
export async function executePreview(
  options: Omit<BuildCommandOptions, 'preview' | 'stage' | 'remove'>
): Promise<void> {
  await executeBuild({ ...options, preview: true });
}
