/**
 * フラグメントファイルの作成
 */

import { open, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type { Editor } from '@fragmentlog/types';
import { CreateError } from './errors.js';
import { validateName } from './fragment/identifier.js';

/** 内容が指定されない場合に書き込む文言 */
export const PLACEHOLDER = 'Add the fragment content here.';

export interface CreateFragmentOptions {
  /** フラグメントディレクトリ */
  directory: string;
  /** ファイル名（`{id}.{type}[...]`） */
  name: string;
  /** 内容（デフォルト: プレースホルダ） */
  content?: string;
  /** 指定された場合、書き込み後にエディタで開く */
  editor?: Editor;
}

/**
 * フラグメントを作成し、そのパスを返す
 *
 * 名前はファイルを作る前に検証する。既存のファイルは上書きしない
 */
export async function createFragment(options: CreateFragmentOptions): Promise<string> {
  const path = join(options.directory, options.name);

  try {
    validateName(options.name);
  } catch (error) {
    throw new CreateError(path, 'parse', { cause: error });
  }

  let handle: FileHandle;
  try {
    handle = await open(path, 'wx');
  } catch (error) {
    throw new CreateError(path, 'open', { cause: error });
  }

  try {
    await handle.writeFile(`${options.content ?? PLACEHOLDER}\n`, 'utf-8');
  } catch (error) {
    throw new CreateError(path, 'write', { cause: error });
  } finally {
    await handle.close();
  }

  if (options.editor) {
    try {
      await options.editor.edit(path);
    } catch (error) {
      throw new CreateError(path, 'edit', { cause: error });
    }
  }

  return path;
}
