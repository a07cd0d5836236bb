import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { createLogger } from '../utils/logger.js';

const log = createLogger('git:local');

function getGit(path: string): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir: path,
    binary: 'git',
    maxConcurrentProcesses: 2,
  };
  return simpleGit(options);
}

export interface LocalHead {
  branch: string;
  sha: string;
  subject: string;
}

/**
 * Branch, commit and subject line of HEAD
 */
export async function readLocalHead(path: string): Promise<LocalHead> {
  const git = getGit(path);
  const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
  const sha = (await git.revparse(['HEAD'])).trim();
  const subject = (await git.raw(['log', '-1', '--format=%s'])).trim();
  return { branch, sha, subject };
}

/**
 * Check if there are uncommitted changes
 */
export async function hasUncommittedChanges(path: string): Promise<boolean> {
  const git = getGit(path);
  const porcelain = await git.raw(['status', '--porcelain']);
  return porcelain.trim().length > 0;
}

/**
 * Push a branch to a remote. Errors propagate with git's own message.
 */
export async function pushBranch(path: string, remote: string, branch: string): Promise<void> {
  const git = getGit(path);
  log.debug({ path, remote, branch }, 'Pushing branch');
  await git.push(remote, branch);
  log.info({ remote, branch }, 'Pushed to remote');
}
