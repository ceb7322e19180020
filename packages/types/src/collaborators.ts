/**
 * ビルダーの外側で動く協調コンポーネントのインターフェイス
 */

/**
 * バージョン管理
 */
export interface VersionControl {
  /**
   * ファイルをステージする
   */
  add(paths: string[]): Promise<void>;

  /**
   * ファイルを強制的に削除する
   */
  remove(paths: string[]): Promise<void>;
}

/**
 * エディタ
 */
export interface Editor {
  /**
   * ファイルを開き、エディタが終了するまで待つ
   */
  edit(path: string): Promise<void>;
}
