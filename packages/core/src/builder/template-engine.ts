/**
 * テンプレートエンジンの抽象化とHandlebars実装
 */

import Handlebars from 'handlebars';

export interface TemplateEngine {
  /**
   * テンプレートを名前付きで登録する
   * @throws 構文エラー
   */
  compile(name: string, source: string): void;

  /**
   * 登録済みテンプレートを描画する
   * @throws 未定義フィールドの参照など
   */
  render(name: string, data: object): string;
}

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

/**
 * Handlebarsによる実装
 *
 * - strictモード: 未定義フィールドの参照は描画時エラー
 * - エスケープなし: 出力はMarkdown/プレーンテキスト
 */
export class HandlebarsTemplateEngine implements TemplateEngine {
  private readonly handlebars = Handlebars.create();
  private readonly templates = new Map<string, CompiledTemplate>();

  compile(name: string, source: string): void {
    // compileは遅延評価のため、構文はここでparseして検証する
    const program = this.handlebars.parse(source);

    this.templates.set(
      name,
      this.handlebars.compile(program, { strict: true, noEscape: true })
    );
  }

  render(name: string, data: object): string {
    const template = this.templates.get(name);

    if (!template) {
      throw new Error(`template \`${name}\` is not registered`);
    }

    return template(data);
  }
}
