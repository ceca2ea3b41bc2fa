/**
 * WorkspaceCommitter: the single mutation performed on the shared
 * workspace after a phase (or a batch of parallel phases) completes.
 */

export interface CommitResult {
  committed: boolean
  /** Commit id when something was committed */
  ref?: string
}

export interface WorkspaceCommitter {
  /**
   * Record all pending workspace changes under `message`.
   * Resolves with `committed: false` when there was nothing to record.
   */
  commit(message: string): Promise<CommitResult>
}

/** Used when workspace commits are disabled */
export class NoopCommitter implements WorkspaceCommitter {
  commit(_message: string): Promise<CommitResult> {
    return Promise.resolve({ committed: false })
  }
}
