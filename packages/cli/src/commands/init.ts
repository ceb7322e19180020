/**
 * init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as TOML from '@iarna/toml';
import { z } from 'zod';
import { ConfigLoader, type Context } from '@fragmentlog/types';
import { exitWithError } from '../utils/output.js';

export const CONFIG_FILE_NAME = 'fragmentlog.toml';

const DEFAULT_VERSION = '0.1.0';

export interface InitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export interface InitResult {
  configPath: string;
  context: Context;
  /** 新たに作成したファイル・ディレクトリ */
  created: string[];
}

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  homepage: z.string().optional(),
  repository: z.union([z.string(), z.object({ url: z.string() })]).optional(),
});

type PackageJson = z.infer<typeof packageJsonSchema>;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * package.jsonを読み込む（ない、または形が違う場合は空）
 */
async function readPackageJson(cwd: string): Promise<PackageJson> {
  let content: string;
  try {
    content = await fs.readFile(path.join(cwd, 'package.json'), 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }

  const result = packageJsonSchema.safeParse(JSON.parse(content));
  return result.success ? result.data : {};
}

/**
 * `git+https://example.com/repo.git` → `https://example.com/repo`
 */
export function normalizeRepositoryUrl(url: string): string {
  return url.replace(/^git\+/, '').replace(/\.git$/, '');
}

/**
 * package.jsonからコンテキストを作る
 */
export function createContext(packageJson: PackageJson, cwd: string): Context {
  const repository =
    typeof packageJson.repository === 'string'
      ? packageJson.repository
      : packageJson.repository?.url;

  return {
    name: packageJson.name ?? path.basename(cwd),
    version: packageJson.version ?? DEFAULT_VERSION,
    url: repository !== undefined ? normalizeRepositoryUrl(repository) : (packageJson.homepage ?? ''),
  };
}

/**
 * 設定ファイルの内容を生成
 */
export function createConfigContent(context: Context): string {
  const config = ConfigLoader.getDefaultConfig();

  const document: TOML.JsonMap = {
    start: config.start,
    wrap: config.wrap,
    order: config.order,
    context: { ...context },
    paths: { ...config.paths },
    levels: { ...config.levels },
    indents: { ...config.indents },
    formats: { ...config.formats },
    types: { ...config.types },
  };

  return TOML.stringify(document);
}

/**
 * 設定ファイル・フラグメントディレクトリ・チェンジログを用意する
 */
export async function initConfig(options: InitOptions = {}): Promise<InitResult> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAME);

  // 既存ファイルチェック
  if (!options.force && (await exists(configPath))) {
    throw new Error(
      `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
    );
  }

  const context = createContext(await readPackageJson(cwd), cwd);
  await fs.writeFile(configPath, createConfigContent(context), 'utf-8');

  const created = [configPath];
  const { paths, start } = ConfigLoader.getDefaultConfig();

  const directory = path.join(cwd, paths.directory);
  if (!(await exists(directory))) {
    await fs.mkdir(directory, { recursive: true });
    created.push(directory);
  }

  // 書き込み時はチェンジログが存在している必要がある
  const output = path.join(cwd, paths.output);
  if (!(await exists(output))) {
    await fs.writeFile(output, `# Changelog\n\n${start}\n`, 'utf-8');
    created.push(output);
  }

  return { configPath, context, created };
}

/**
 * init コマンドを実行
 */
export async function executeInit(options: InitOptions): Promise<void> {
  console.log('Initializing fragmentlog configuration...\n');

  try {
    const result = await initConfig(options);

    console.log('✅ Configuration file created successfully!\n');
    for (const file of result.created) {
      console.log(`📄 ${file}`);
    }
    console.log(`🚀 Project: ${result.context.name} ${result.context.version}\n`);
    console.log('Next steps:');
    console.log(`  1. Review and customize ${CONFIG_FILE_NAME}`);
    console.log('  2. Add a fragment: fragmentlog create 1.feature -c "..."');
    console.log('  3. Build the changelog: fragmentlog build\n');
  } catch (error) {
    exitWithError(error);
  }
}
