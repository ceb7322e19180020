/**
 * gitによるバージョン管理
 */

import type { VersionControl } from '@fragmentlog/types';
import { runCommand, type CommandRunner } from './process.js';

export const GIT = 'git';

export class GitVersionControl implements VersionControl {
  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly cwd?: string
  ) {}

  /**
   * `git add <paths...>`
   */
  async add(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.runner(GIT, ['add', ...paths], { cwd: this.cwd });
  }

  /**
   * `git rm -f -q <paths...>`
   */
  async remove(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.runner(GIT, ['rm', '-f', '-q', ...paths], { cwd: this.cwd });
  }
}
