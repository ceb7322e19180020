/**
 * 箇条書きの折り返し
 */

const SPACE = ' ';
const NEW_LINE = '\n';

/**
 * 見出しの接頭辞（`## ` など）
 */
export function heading(character: string, level: number): string {
  return character.repeat(level) + SPACE;
}

/**
 * 字下げ（`- ` など）
 */
export function indent(character: string): string {
  return character + SPACE;
}

function width(text: string): number {
  return [...text].length;
}

interface Word {
  text: string;
  /** 単語に続く空白（行内ではそのまま残す） */
  gap: string;
}

/**
 * ASCIIスペースで単語に分ける
 * 行頭の空白は内容が空の単語になる
 */
function splitWords(line: string): Word[] {
  const words: Word[] = [];

  for (const [, text = '', gap = ''] of line.matchAll(/([^ ]*)( *)/g)) {
    if (text !== '' || gap !== '') {
      words.push({ text, gap });
    }
  }

  return words;
}

function trimEnd(line: string): string {
  return line.replace(/ +$/, '');
}

/**
 * テキストを指定幅で折り返す
 *
 * 最初の出力行（空行でも）は `{bullet} `、以降の行は空白2つで字下げする。
 * 単語はASCIIスペースで区切り、幅を超えても分割しない。
 * 行内の単語間の空白は保持し、折り返し位置と行末の空白は除く。
 * 改行は強制改行として扱い、各行を個別に折り返す
 */
export function wrapText(text: string, lineWidth: number, bullet: string): string {
  const initialIndent = indent(bullet);
  const subsequentIndent = indent(SPACE);

  const lines: string[] = [];

  for (const rawLine of text.split(NEW_LINE)) {
    let line = lines.length === 0 ? initialIndent : subsequentIndent;
    let current = width(line);
    let gap = '';
    let hasWord = false;

    for (const word of splitWords(rawLine)) {
      if (hasWord && current + width(gap) + width(word.text) > lineWidth) {
        lines.push(trimEnd(line));
        line = subsequentIndent + word.text;
        current = width(line);
      } else {
        line += gap + word.text;
        current += width(gap) + width(word.text);
      }

      gap = word.gap;
      hasWord = true;
    }

    lines.push(trimEnd(line));
  }

  return lines.join(NEW_LINE);
}
