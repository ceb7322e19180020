/**
 * 既存のチェンジログへエントリを差し込む
 */

const NEW_LINE = '\n';
const DOUBLE_NEW_LINE = '\n\n';

/**
 * 新しいチェンジログ全体を組み立てる
 *
 * - マーカーがある場合: 最初のマーカーの直後に空行を挟んでエントリを置く
 * - ない場合: ファイルの先頭にエントリを置く
 *
 * 後続の内容は先頭の空白を除去し、空でなければ空行を挟んで続ける
 */
export function spliceEntry(contents: string, start: string, entry: string): string {
  const index = contents.indexOf(start);

  let result: string;
  let rest: string;

  if (index === -1) {
    result = entry + NEW_LINE;
    rest = contents;
  } else {
    const end = index + start.length;
    result = contents.slice(0, end) + DOUBLE_NEW_LINE + entry + NEW_LINE;
    rest = contents.slice(end);
  }

  const trimmed = rest.trimStart();

  if (trimmed !== '') {
    result += NEW_LINE + trimmed;
  }

  return result;
}
