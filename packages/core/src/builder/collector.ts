/**
 * フラグメントディレクトリの走査
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Fragment, Sections } from '@fragmentlog/types';
import { CollectError } from '../errors.js';
import { compareFragments, isValidName } from '../fragment/identifier.js';
import { loadFragment } from '../fragment/loader.js';

/**
 * ディレクトリ直下のエントリ名を取得
 */
async function listEntries(directory: string): Promise<string[]> {
  try {
    const names = await readdir(directory);
    return names.sort();
  } catch (error) {
    throw new CollectError(directory, { cause: error });
  }
}

/**
 * フラグメントを読み込み、種類ごとのセクションにまとめる
 *
 * 読み込めないエントリ（不正な名前、読み込み失敗、ディレクトリなど）は無視する。
 * ディレクトリ自体が読めない場合のみエラー
 */
export async function collectSections(directory: string): Promise<Sections> {
  const sections: Sections = new Map();

  for (const name of await listEntries(directory)) {
    let fragment: Fragment;
    try {
      fragment = await loadFragment(join(directory, name));
    } catch {
      // 読み込めないエントリはフラグメントではないものとして扱う
      continue;
    }

    const typeName = fragment.identifier.typeName;
    const section = sections.get(typeName);

    if (section) {
      section.push(fragment);
    } else {
      sections.set(typeName, [fragment]);
    }
  }

  for (const section of sections.values()) {
    section.sort(compareFragments);
  }

  return sections;
}

/**
 * フラグメントとして有効な名前を持つエントリのパスを取得
 *
 * 判定は読み込み時と同じ名前検証を使う
 */
export async function collectPaths(directory: string): Promise<string[]> {
  const names = await listEntries(directory);

  return names.filter((name) => isValidName(name)).map((name) => join(directory, name));
}
