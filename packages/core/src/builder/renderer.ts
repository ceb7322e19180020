import type { Context, FormatsConfig, Fragment } from '@fragmentlog/types';
import { RenderError, RendererInitError, type TemplateName } from '../errors.js';
import { formatDate } from '../date.js';
import { HandlebarsTemplateEngine, type TemplateEngine } from './template-engine.js';

export const TITLE: TemplateName = 'title';
export const FRAGMENT: TemplateName = 'fragment';

/**
 * タイトルとフラグメントの描画
 *
 * テンプレートは生成時にコンパイルするため、書式の誤りはファイル走査より前に検出される
 */
export class TemplateRenderer {
  private constructor(
    private readonly engine: TemplateEngine,
    private readonly context: Context,
    private readonly date: Date
  ) {}

  /**
   * @throws RendererInitError いずれかのテンプレートが不正
   */
  static create(
    context: Context,
    formats: FormatsConfig,
    date: Date,
    engine: TemplateEngine = new HandlebarsTemplateEngine()
  ): TemplateRenderer {
    for (const [name, source] of [
      [TITLE, formats.title],
      [FRAGMENT, formats.fragment],
    ] as const) {
      try {
        engine.compile(name, source);
      } catch (error) {
        throw new RendererInitError(name, { cause: error });
      }
    }

    return new TemplateRenderer(engine, context, date);
  }

  /**
   * タイトルを描画
   * コンテキストの各フィールドと `date`（YYYY-MM-DD）を参照できる
   */
  renderTitle(): string {
    const data = {
      ...this.context,
      date: formatDate(this.date),
    };

    return this.render(TITLE, data);
  }

  /**
   * フラグメントを描画
   * コンテキストの各フィールドと `id`, `type_name`（別名 `type`）, `content` を参照できる。
   * 文字列IDのフラグメントはテンプレートを通さず内容をそのまま返す
   */
  renderFragment(fragment: Fragment): string {
    const { id, typeName } = fragment.identifier;

    if (id.kind === 'string') {
      return fragment.content;
    }

    const data = {
      ...this.context,
      id: id.value,
      type_name: typeName,
      type: typeName,
      content: fragment.content,
    };

    return this.render(FRAGMENT, data);
  }

  private render(name: TemplateName, data: object): string {
    try {
      return this.engine.render(name, data);
    } catch (error) {
      throw new RenderError(name, { cause: error });
    }
  }
}
