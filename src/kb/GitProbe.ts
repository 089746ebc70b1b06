/**
 * GitProbe backed by simple-git.
 */

import simpleGit from 'simple-git';
import type { GitProbe } from './types.js';

export class SimpleGitProbe implements GitProbe {
  async repositoryRoot(directory: string): Promise<string | null> {
    const git = simpleGit({ baseDir: directory });
    if (!(await git.checkIsRepo())) {
      return null;
    }
    return (await git.revparse(['--show-toplevel'])).trim();
  }
}
