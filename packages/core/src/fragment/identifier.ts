/**
 * フラグメント名（`{id}.{type}[...]`）の解析
 */

import type { Fragment, FragmentId, FragmentIdentifier } from '@fragmentlog/types';
import { FragmentParseError } from '../errors.js';

/** 文字列IDを示す接頭辞 */
export const STRING_ID_PREFIX = '~';

const DOT = '.';
const MAX_INTEGER_ID = 0xffffffff;

/**
 * フラグメント名を解析する
 *
 * 先頭2つのセグメントだけを使い、3つ目以降（拡張子など）は無視する
 */
export function parseIdentifier(name: string): FragmentIdentifier {
  const [idSegment, typeName] = name.split(DOT);

  if (idSegment === undefined || typeName === undefined || typeName === '') {
    throw new FragmentParseError(name, 'unexpected-end');
  }

  return { id: parseId(idSegment, name), typeName };
}

/**
 * フラグメント名として有効か検証する
 * @throws FragmentParseError
 */
export function validateName(name: string): void {
  parseIdentifier(name);
}

/**
 * フラグメント名として有効か
 */
export function isValidName(name: string): boolean {
  try {
    validateName(name);
    return true;
  } catch (error) {
    if (error instanceof FragmentParseError) {
      return false;
    }
    throw error;
  }
}

function parseId(segment: string, name: string): FragmentId {
  if (segment.startsWith(STRING_ID_PREFIX)) {
    return { kind: 'string', value: segment.slice(STRING_ID_PREFIX.length) };
  }

  if (!/^[0-9]+$/.test(segment)) {
    throw new FragmentParseError(name, 'invalid-id');
  }

  const value = Number(segment);

  if (value > MAX_INTEGER_ID) {
    throw new FragmentParseError(name, 'invalid-id');
  }

  return { kind: 'integer', value };
}

function compareStrings(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * IDの全順序
 * 整数IDを数値順に並べ、その後に文字列IDをコード単位順に並べる
 */
export function compareIds(left: FragmentId, right: FragmentId): number {
  if (left.kind === 'integer' && right.kind === 'integer') {
    return left.value - right.value;
  }

  if (left.kind === 'string' && right.kind === 'string') {
    return compareStrings(left.value, right.value);
  }

  return left.kind === 'integer' ? -1 : 1;
}

/**
 * セクション内の並び順
 * IDが同じ場合（`1.fix` と `1.fix.md` など）は種類、内容の順に比較する
 */
export function compareFragments(left: Fragment, right: Fragment): number {
  return (
    compareIds(left.identifier.id, right.identifier.id) ||
    compareStrings(left.identifier.typeName, right.identifier.typeName) ||
    compareStrings(left.content, right.content)
  );
}
