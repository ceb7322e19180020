/**
 * 既定のエディタでファイルを開く
 */

import type { Editor } from '@fragmentlog/types';
import { runCommand, type CommandRunner } from './process.js';

/**
 * エディタコマンドを決定
 * 優先順位: $VISUAL > $EDITOR > vi（Windowsではnotepad）
 */
export function resolveEditorCommand(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string[] {
  const configured = env.VISUAL || env.EDITOR;

  if (configured && configured.trim() !== '') {
    // `code --wait` のように引数付きで指定される場合がある
    return configured.trim().split(/\s+/);
  }

  return [platform === 'win32' ? 'notepad' : 'vi'];
}

export class SystemEditor implements Editor {
  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async edit(path: string): Promise<void> {
    const [command, ...args] = resolveEditorCommand(this.env);

    if (command === undefined) {
      throw new Error('no editor configured');
    }

    await this.runner(command, [...args, path]);
  }
}
