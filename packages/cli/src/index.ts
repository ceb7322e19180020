#!/usr/bin/env node
/**
 * fragmentlog CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { CONFIG_ENV } from '@fragmentlog/types';
import { executeBuild, executePreview, type BuildCommandOptions } from './commands/build.js';
import { executeCreate, type CreateCommandOptions } from './commands/create.js';
import { executeInit, type InitOptions } from './commands/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('fragmentlog')
  .description('フラグメントからチェンジログを組み立てる')
  .version(packageJson.version)
  .option('-D, --directory <dir>', '実行前に移動するディレクトリ')
  .addOption(new Option('-C, --config <path>', '設定ファイルのパス').env(CONFIG_ENV))
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ directory?: string; config?: string }>();
    if (opts.directory) {
      process.chdir(opts.directory);
    }
    globalConfigPath = opts.config;
  });

// build コマンド
program
  .command('build')
  .alias('b')
  .description('フラグメントからエントリを組み立ててチェンジログに書き込む')
  .option('-d, --date <date>', 'エントリの日付（YYYY-MM-DD、デフォルト: 今日）')
  .option('-p, --preview', '書き込まずに出力')
  .option('-s, --stage', '書き込み後にチェンジログをgit addする')
  .option('-r, --remove', '書き込み後にフラグメントをgit rmする')
  .action(async (options: BuildCommandOptions) => {
    await executeBuild({ ...options, config: globalConfigPath });
  });

// preview コマンド
program
  .command('preview')
  .alias('p')
  .description('エントリを組み立てて出力（書き込まない）')
  .option('-d, --date <date>', 'エントリの日付（YYYY-MM-DD、デフォルト: 今日）')
  .action(async (options: { date?: string }) => {
    await executePreview({ ...options, config: globalConfigPath });
  });

// create コマンド
program
  .command('create')
  .alias('c')
  .description('フラグメントを作成')
  .argument('<name>', 'フラグメント名（{id}.{type}）')
  .option('-c, --content <content>', 'フラグメントの内容')
  .option('-e, --edit', '作成後にエディタで開く')
  .option('-a, --add', '作成後にgit addする')
  .action(async (name: string, options: CreateCommandOptions) => {
    await executeCreate(name, { ...options, config: globalConfigPath });
  });

// init コマンド
program
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: InitOptions) => {
    await executeInit(options);
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
