/**
 * 外部コマンド実行ユーティリティ
 */

import { spawn } from 'child_process';

export interface RunCommandOptions {
  /** 作業ディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 標準入出力を親プロセスに引き継ぐか（デフォルト: true） */
  inherit?: boolean;
}

/**
 * 外部コマンドの起動失敗、または0以外の終了コード
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CommandError';
  }
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<void>;

/**
 * コマンドを実行し、終了を待つ
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: options.inherit === false ? 'ignore' : 'inherit',
    });

    child.on('error', (error) => {
      reject(new CommandError(`failed to run \`${command}\``, command, null, { cause: error }));
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(
          new CommandError(`\`${command}\` exited with code ${code ?? 'null'}`, command, code)
        );
      }
    });
  });
};
