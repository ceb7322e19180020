/**
 * 出力フォーマットユーティリティ
 */

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * エラーとその原因（`cause`）を順にたどって整形
 *
 * 例:
 * ```
 * エラー: failed to build the entry for `CHANGELOG.md`
 *   原因: failed to build the fragment
 *   原因: failed to render the `fragment` format
 * ```
 */
export function formatError(error: unknown): string {
  const lines = [`エラー: ${describe(error)}`];

  const seen = new Set<unknown>([error]);
  let current: unknown = error instanceof Error ? error.cause : undefined;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    for (const line of describe(current).split('\n')) {
      lines.push(`  原因: ${line}`);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return lines.join('\n');
}

/**
 * エラーを表示して終了コード1で終了
 */
export function exitWithError(error: unknown): never {
  console.error(formatError(error));
  process.exit(1);
}
