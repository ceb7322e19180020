/**
 * フラグメントの型定義
 */

/**
 * フラグメントID
 *
 * ファイル名が `~` で始まる場合は文字列ID、それ以外は符号なし整数ID
 */
export type FragmentId =
  | { kind: 'integer'; value: number }
  | { kind: 'string'; value: string };

export interface FragmentIdentifier {
  /** フラグメントID */
  id: FragmentId;
  /** フラグメントの種類（`fix`, `feature` など） */
  typeName: string;
}

export interface Fragment {
  /** ファイル名から解析した識別子 */
  identifier: FragmentIdentifier;
  /** 前後の空白を除去したファイル内容 */
  content: string;
}

/**
 * 種類ごとにまとめたフラグメント
 * 各リストは識別子順にソート済み
 */
export type Sections = Map<string, Fragment[]>;
