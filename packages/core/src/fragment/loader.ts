import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Fragment, FragmentIdentifier } from '@fragmentlog/types';
import { FragmentLoadError } from '../errors.js';
import { parseIdentifier } from './identifier.js';

/** UTF-8として解釈できなかったバイト列の置換文字 */
const REPLACEMENT_CHARACTER = '\uFFFD';

/** 不正なUTF-8は置換せずにエラーにする */
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * フラグメントファイルを読み込む
 *
 * ファイル名から識別子を解析し、内容は前後の空白を除去して保持する。
 * 内容がUTF-8でない場合はreadエラー
 */
export async function loadFragment(path: string): Promise<Fragment> {
  const name = basename(path);

  if (name === '' || name.includes(REPLACEMENT_CHARACTER)) {
    throw new FragmentLoadError(path, 'invalid-name');
  }

  let identifier: FragmentIdentifier;
  try {
    identifier = parseIdentifier(name);
  } catch (error) {
    throw new FragmentLoadError(path, 'parse', { cause: error });
  }

  let content: string;
  try {
    content = decoder.decode(await readFile(path));
  } catch (error) {
    throw new FragmentLoadError(path, 'read', { cause: error });
  }

  return { identifier, content: content.trim() };
}
