export { GitCommitter, createGitCommitter } from './git-committer.js'
export type { GitCommitterOptions } from './git-committer.js'
export { NoopCommitter } from './workspace-committer.js'
export type { CommitResult, WorkspaceCommitter } from './workspace-committer.js'
export { spawnGit } from './git-utils.js'
export type { GitSpawnResult, SpawnOptions } from './git-utils.js'
