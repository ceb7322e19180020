/**
 * フラグメントからチェンジログのエントリを組み立てる
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { ChangelogConfig, Context, Fragment, Sections, Workspace } from '@fragmentlog/types';
import { BuildError, WriteError, type BuildPhase } from '../errors.js';
import { collectPaths, collectSections } from './collector.js';
import { TemplateRenderer } from './renderer.js';
import type { TemplateEngine } from './template-engine.js';
import { spliceEntry } from './splicer.js';
import { heading, wrapText } from './wrapper.js';

const DOUBLE_NEW_LINE = '\n\n';

/** セクションが1つもない場合の本文 */
export const NO_SIGNIFICANT_CHANGES = 'No significant changes.';

export interface ChangelogBuilderOptions {
  context: Context;
  config: ChangelogConfig;
  /** エントリの日付 */
  date: Date;
  /** テンプレートエンジン（デフォルト: Handlebars） */
  engine?: TemplateEngine;
}

/**
 * チェンジログビルダー
 *
 * 呼び出しごとに走査・描画・組み立てをやり直し、状態は持たない
 */
export class ChangelogBuilder {
  readonly context: Context;
  readonly config: ChangelogConfig;
  readonly date: Date;
  private readonly renderer: TemplateRenderer;

  /**
   * @throws RendererInitError テンプレートが不正
   */
  constructor(options: ChangelogBuilderOptions) {
    this.context = options.context;
    this.config = options.config;
    this.date = options.date;
    this.renderer = TemplateRenderer.create(
      options.context,
      options.config.formats,
      options.date,
      options.engine
    );
  }

  static fromWorkspace(workspace: Workspace, date: Date): ChangelogBuilder {
    return new ChangelogBuilder({ ...workspace, date });
  }

  /**
   * エントリを組み立ててチェンジログに書き込む
   *
   * ファイル全体をメモリ上で組み立ててから一度だけ上書きする。
   * 出力ファイルは既に存在している必要がある
   */
  async write(): Promise<void> {
    const path = this.config.paths.output;

    let contents: string;
    try {
      contents = await readFile(path, 'utf-8');
    } catch (error) {
      throw new WriteError(path, 'read', { cause: error });
    }

    let entry: string;
    try {
      entry = await this.build();
    } catch (error) {
      throw new WriteError(path, 'build', { cause: error });
    }

    const updated = spliceEntry(contents, this.config.start, entry);

    try {
      await writeFile(path, updated, 'utf-8');
    } catch (error) {
      throw new WriteError(path, 'write', { cause: error });
    }
  }

  /**
   * エントリを組み立てて返す（ファイルには書き込まない）
   */
  async preview(): Promise<string> {
    return await this.build();
  }

  /**
   * エントリを組み立てる
   * @throws BuildError タイトル・フラグメントの描画、またはフラグメントの走査に失敗
   */
  async build(): Promise<string> {
    const title = this.attempt('title', () => this.buildTitle());

    let sections: Sections;
    try {
      sections = await this.collect();
    } catch (error) {
      throw new BuildError('collect', { cause: error });
    }

    const built = this.attempt('fragment', () => this.buildSections(sections));

    return title + DOUBLE_NEW_LINE + (built === '' ? NO_SIGNIFICANT_CHANGES : built);
  }

  /**
   * エントリの見出し（`## ` + タイトル）
   */
  buildTitle(): string {
    return this.entryHeading() + this.renderer.renderTitle();
  }

  /**
   * セクションの見出し（`### ` + 表示名）
   */
  buildSectionTitle(title: string): string {
    return this.sectionHeading() + title;
  }

  /**
   * フラグメントを描画して折り返す
   */
  buildFragment(fragment: Fragment): string {
    return this.wrap(this.renderer.renderFragment(fragment));
  }

  buildFragments(fragments: Fragment[]): string {
    return fragments.map((fragment) => this.buildFragment(fragment)).join(DOUBLE_NEW_LINE);
  }

  buildSection(title: string, fragments: Fragment[]): string {
    return this.buildSectionTitle(title) + DOUBLE_NEW_LINE + this.buildFragments(fragments);
  }

  /**
   * `order` の順にセクションを組み立てる
   * 表示名が設定されていない種類と、フラグメントのない種類は出力しない
   */
  buildSections(sections: Sections): string {
    const built: string[] = [];

    for (const typeName of this.config.order) {
      const title = Object.hasOwn(this.config.types, typeName)
        ? this.config.types[typeName]
        : undefined;
      const fragments = sections.get(typeName);

      if (title === undefined || !fragments || fragments.length === 0) {
        continue;
      }

      built.push(this.buildSection(title, fragments));
    }

    return built.join(DOUBLE_NEW_LINE);
  }

  wrap(text: string): string {
    return wrapText(text, this.config.wrap, this.config.indents.bullet);
  }

  /**
   * フラグメントを種類ごとに集める
   */
  async collect(): Promise<Sections> {
    return await collectSections(this.config.paths.directory);
  }

  /**
   * フラグメントファイルのパス一覧（バージョン管理からの削除用）
   */
  async collectPaths(): Promise<string[]> {
    return await collectPaths(this.config.paths.directory);
  }

  entryHeading(): string {
    return heading(this.config.indents.heading, this.config.levels.entry);
  }

  sectionHeading(): string {
    return heading(this.config.indents.heading, this.config.levels.section);
  }

  private attempt(phase: BuildPhase, build: () => string): string {
    try {
      return build();
    } catch (error) {
      throw new BuildError(phase, { cause: error });
    }
  }
}
