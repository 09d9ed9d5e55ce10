/**
 * git module: barrel export.
 */

export type { BranchWorkflowManager, BranchHandle, BranchState, MergeReason } from './branch-workflow-manager.js'
export {
  BranchWorkflowManagerImpl,
  createBranchWorkflowManager,
  squashCommitMessage,
} from './branch-workflow-manager-impl.js'
export type { BranchWorkflowManagerOptions } from './branch-workflow-manager-impl.js'
export { branchNameFor, slugify, DEFAULT_BRANCH_NAMING } from './branch-naming.js'
export type { BranchNamingOptions } from './branch-naming.js'
export { spawnGit, verifyGitVersion, getCurrentBranch } from './git-utils.js'
export type { GitSpawnResult, SpawnOptions } from './git-utils.js'
