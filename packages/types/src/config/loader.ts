import { readFile, access, realpath } from 'fs/promises';
import * as path from 'path';
import * as TOML from '@iarna/toml';
import { z } from 'zod';
import type { ChangelogConfig, Workspace } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateWorkspace, type ConfigOptions, type WorkspaceOptions } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

export interface ResolvedConfig {
  workspace: Workspace;
  configPath: string;
  projectRoot: string;
}

/**
 * 設定ファイルの読み込み・探索に失敗した
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** 環境変数名 */
export const CONFIG_ENV = 'FRAGMENTLOG_CONFIG';

/** package.json内の設定キー */
export const PACKAGE_JSON_KEY = 'fragmentlog';

const packageJsonSchema = z.object({ [PACKAGE_JSON_KEY]: z.unknown() });

/**
 * 設定ファイル名の候補
 * 優先順位: fragmentlog.toml > .fragmentlog.toml > package.json
 */
const CONFIG_FILE_NAMES = ['fragmentlog.toml', '.fragmentlog.toml', 'package.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   *
   * `paths` は設定ファイルのディレクトリを基準に絶対パスへ解決する
   */
  static async load(configPath: string): Promise<Workspace> {
    const absolutePath = path.resolve(configPath);

    let content: string;
    try {
      content = await readFile(absolutePath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`failed to read \`${absolutePath}\``, absolutePath, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = this.parse(absolutePath, content);
    } catch (error) {
      throw new ConfigError(`failed to parse \`${absolutePath}\``, absolutePath, { cause: error });
    }

    let options: WorkspaceOptions;
    try {
      options = validateWorkspace(parsed);
    } catch (error) {
      throw new ConfigError(`invalid configuration in \`${absolutePath}\``, absolutePath, {
        cause: error,
      });
    }

    const { context, ...rest } = options;
    const config = this.mergeWithDefaults(rest);
    const root = path.dirname(absolutePath);

    return {
      context,
      config: {
        ...config,
        paths: {
          directory: path.resolve(root, config.paths.directory),
          output: path.resolve(root, config.paths.output),
        },
      },
    };
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd() } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath) {
      throw new ConfigError(
        `Configuration file not found in \`${cwd}\`. Please create a configuration file.\n` +
          'Run: fragmentlog init',
        cwd
      );
    }

    // 2. プロジェクトルートは設定ファイルの親ディレクトリ
    const projectRoot = await this.normalizeProjectRoot(path.dirname(configPath));

    // 3. 読み込み
    const workspace = await this.load(configPath);

    return { workspace, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): ChangelogConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定とデフォルト値をマージ
   * `types` はデフォルトの対応表を上書きせず拡張する
   */
  static mergeWithDefaults(options: ConfigOptions): ChangelogConfig {
    return {
      paths: {
        directory: options.paths?.directory ?? DEFAULT_CONFIG.paths.directory,
        output: options.paths?.output ?? DEFAULT_CONFIG.paths.output,
      },
      start: options.start ?? DEFAULT_CONFIG.start,
      levels: {
        entry: options.levels?.entry ?? DEFAULT_CONFIG.levels.entry,
        section: options.levels?.section ?? DEFAULT_CONFIG.levels.section,
      },
      indents: {
        heading: options.indents?.heading ?? DEFAULT_CONFIG.indents.heading,
        bullet: options.indents?.bullet ?? DEFAULT_CONFIG.indents.bullet,
      },
      formats: {
        title: options.formats?.title ?? DEFAULT_CONFIG.formats.title,
        fragment: options.formats?.fragment ?? DEFAULT_CONFIG.formats.fragment,
      },
      wrap: options.wrap ?? DEFAULT_CONFIG.wrap,
      order: [...(options.order ?? DEFAULT_CONFIG.order)],
      types: { ...DEFAULT_CONFIG.types, ...options.types },
    };
  }

  /**
   * ファイル形式に応じてパース
   */
  private static parse(configPath: string, content: string): unknown {
    if (path.basename(configPath) === 'package.json') {
      return packageJsonSchema.parse(JSON.parse(content))[PACKAGE_JSON_KEY];
    }

    if (configPath.endsWith('.json')) {
      return JSON.parse(content);
    }

    return TOML.parse(content);
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        if (await this.isConfigFile(configPath)) {
          return configPath;
        }
      }

      // 親を遡らない場合はここで終了
      if (!traverseUp) {
        return null;
      }

      // ルートディレクトリに到達したら終了
      if (currentDir === root) {
        return null;
      }

      // 親ディレクトリへ
      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 候補ファイルが設定として使えるか
   * package.jsonは設定キーを持つ場合のみ
   */
  private static async isConfigFile(configPath: string): Promise<boolean> {
    try {
      await access(configPath);
    } catch {
      return false;
    }

    if (path.basename(configPath) !== 'package.json') {
      return true;
    }

    try {
      const packageJson = packageJsonSchema.parse(
        JSON.parse(await readFile(configPath, 'utf-8'))
      );
      return packageJson[PACKAGE_JSON_KEY] !== undefined;
    } catch {
      // 壊れたpackage.jsonは設定ファイルとみなさない
      return false;
    }
  }

  /**
   * 設定ファイルパスを解決
   * @param explicitPath 明示的に指定されたパス
   * @param cwd カレントワーキングディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    // 1. 明示的に指定されている
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    // 2. 環境変数
    const envPath = process.env[CONFIG_ENV];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    // 3. 自動探索
    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }
}
