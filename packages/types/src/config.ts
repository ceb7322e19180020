/**
 * 設定の型定義
 */

export interface Context {
  /** プロジェクト名 */
  name: string;
  /** バージョン */
  version: string;
  /** プロジェクトのURL */
  url: string;
}

export interface PathsConfig {
  /** フラグメントを置くディレクトリ */
  directory: string;
  /** エントリを書き込むチェンジログファイル */
  output: string;
}

export interface LevelsConfig {
  /** エントリ見出しのレベル */
  entry: number;
  /** セクション見出しのレベル */
  section: number;
}

export interface IndentsConfig {
  /** 見出しに使う文字 */
  heading: string;
  /** 箇条書きに使う文字 */
  bullet: string;
}

export interface FormatsConfig {
  /** タイトルのテンプレート */
  title: string;
  /** フラグメントのテンプレート */
  fragment: string;
}

export interface ChangelogConfig {
  paths: PathsConfig;
  /** エントリの挿入位置を示すマーカー */
  start: string;
  levels: LevelsConfig;
  indents: IndentsConfig;
  formats: FormatsConfig;
  /** 折り返し幅 */
  wrap: number;
  /** 出力するセクションの種類と順序 */
  order: string[];
  /** 種類 → セクションタイトル */
  types: Record<string, string>;
}

/**
 * 設定ファイル1つ分の内容
 */
export interface Workspace {
  context: Context;
  config: ChangelogConfig;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: Readonly<ChangelogConfig> = Object.freeze({
  paths: {
    directory: 'changes',
    output: 'CHANGELOG.md',
  },
  start: '<!-- fragmentlog: start -->',
  levels: {
    entry: 2,
    section: 3,
  },
  indents: {
    heading: '#',
    bullet: '-',
  },
  formats: {
    title: '[{{version}}]({{url}}/tree/v{{version}}) ({{date}})',
    fragment: '{{content}} ([#{{id}}]({{url}}/pull/{{id}}))',
  },
  wrap: 100,
  order: ['security', 'feature', 'change', 'fix', 'deprecation', 'removal', 'internal'],
  types: {
    security: 'Security',
    feature: 'Features',
    change: 'Changes',
    fix: 'Fixes',
    deprecation: 'Deprecations',
    removal: 'Removals',
    internal: 'Internal',
  },
});
