/**
 * fragmentlogのエラー定義
 *
 * 下位のエラーは `cause` に保持し、CLIが原因を順にたどって表示する
 */

export class FragmentlogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FragmentlogError';
  }
}

export type FragmentParseErrorReason = 'unexpected-end' | 'invalid-id';

/**
 * フラグメント名の解析エラー
 */
export class FragmentParseError extends FragmentlogError {
  constructor(
    public readonly fragmentName: string,
    public readonly reason: FragmentParseErrorReason
  ) {
    super(
      reason === 'unexpected-end'
        ? `failed to parse \`${fragmentName}\`: expected \`{id}.{type}\``
        : `failed to parse \`${fragmentName}\`: invalid ID (IDs are unsigned integers or \`~\`-prefixed strings)`
    );
    this.name = 'FragmentParseError';
  }
}

export type FragmentLoadErrorReason = 'invalid-name' | 'parse' | 'read';

/**
 * フラグメントファイルの読み込みエラー
 */
export class FragmentLoadError extends FragmentlogError {
  constructor(
    public readonly path: string,
    public readonly reason: FragmentLoadErrorReason,
    options?: ErrorOptions
  ) {
    super(`failed to load \`${path}\``, options);
    this.name = 'FragmentLoadError';
  }
}

/**
 * フラグメントディレクトリの読み込みエラー
 */
export class CollectError extends FragmentlogError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`failed to collect from \`${path}\``, options);
    this.name = 'CollectError';
  }
}

export type TemplateName = 'title' | 'fragment';

/**
 * テンプレートのコンパイルエラー
 */
export class RendererInitError extends FragmentlogError {
  constructor(
    public readonly template: TemplateName,
    options?: ErrorOptions
  ) {
    super(`failed to compile the \`${template}\` format`, options);
    this.name = 'RendererInitError';
  }
}

/**
 * テンプレートの描画エラー
 */
export class RenderError extends FragmentlogError {
  constructor(
    public readonly template: TemplateName,
    options?: ErrorOptions
  ) {
    super(`failed to render the \`${template}\` format`, options);
    this.name = 'RenderError';
  }
}

export type BuildPhase = 'title' | 'fragment' | 'collect';

/**
 * エントリの組み立てエラー
 */
export class BuildError extends FragmentlogError {
  constructor(
    public readonly phase: BuildPhase,
    options?: ErrorOptions
  ) {
    super(`failed to build the ${phase === 'collect' ? 'fragment sections' : phase}`, options);
    this.name = 'BuildError';
  }
}

export type WriteErrorReason = 'read' | 'build' | 'write';

/**
 * チェンジログへの書き込みエラー
 */
export class WriteError extends FragmentlogError {
  constructor(
    public readonly path: string,
    public readonly reason: WriteErrorReason,
    options?: ErrorOptions
  ) {
    super(
      reason === 'build'
        ? `failed to build the entry for \`${path}\``
        : `failed to ${reason} \`${path}\``,
      options
    );
    this.name = 'WriteError';
  }
}

export type CreateErrorReason = 'parse' | 'open' | 'write' | 'edit';

/**
 * フラグメント作成エラー
 */
export class CreateError extends FragmentlogError {
  constructor(
    public readonly path: string,
    public readonly reason: CreateErrorReason,
    options?: ErrorOptions
  ) {
    super(`failed to create fragment \`${path}\``, options);
    this.name = 'CreateError';
  }
}

/**
 * 日付の解析エラー
 */
export class DateError extends FragmentlogError {
  constructor(public readonly value: string) {
    super(`failed to parse \`${value}\`: dates must be in \`YYYY-MM-DD\` format`);
    this.name = 'DateError';
  }
}
