/**
 * GitCommitter: commits the project working tree with `git add -A` and
 * `git commit`, skipping the commit when nothing changed.
 */

import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { spawnGit } from './git-utils.js'
import type { CommitResult, WorkspaceCommitter } from './workspace-committer.js'

const logger = createLogger('git')

export interface GitCommitterOptions {
  /** "Name <email>" passed to `git commit --author` */
  author?: string
}

export class GitCommitter implements WorkspaceCommitter {
  private readonly _repoRoot: string
  private readonly _author: string | undefined

  constructor(repoRoot: string, options: GitCommitterOptions = {}) {
    this._repoRoot = repoRoot
    this._author = options.author
  }

  get repoRoot(): string {
    return this._repoRoot
  }

  async commit(message: string): Promise<CommitResult> {
    const cwd = this._repoRoot
    const status = await spawnGit(['status', '--porcelain'], { cwd })
    if (status.code !== 0) {
      throw new GitError(`git status failed: ${status.stderr}`, { cwd })
    }
    if (status.stdout === '') {
      logger.debug({ cwd }, 'No workspace changes to commit')
      return { committed: false }
    }

    const add = await spawnGit(['add', '-A'], { cwd })
    if (add.code !== 0) {
      throw new GitError(`git add failed: ${add.stderr}`, { cwd })
    }

    const args = ['commit', '-m', message]
    if (this._author !== undefined) args.push('--author', this._author)
    const commit = await spawnGit(args, { cwd })
    if (commit.code !== 0) {
      throw new GitError(`git commit failed: ${commit.stderr}`, { cwd })
    }

    const head = await spawnGit(['rev-parse', 'HEAD'], { cwd })
    if (head.code !== 0) {
      throw new GitError(`git rev-parse HEAD failed: ${head.stderr}`, { cwd })
    }
    const ref = head.stdout
    logger.info({ ref, message }, 'Committed workspace changes')
    return { committed: true, ref }
  }
}

export function createGitCommitter(repoRoot: string, options: GitCommitterOptions = {}): WorkspaceCommitter {
  return new GitCommitter(repoRoot, options)
}
