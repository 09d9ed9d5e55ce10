/**
 * task-store module: barrel export.
 */

export type { TaskStore } from './task-store.js'
export {
  JsonlTaskStore,
  createTaskStore,
  parseTaskLines,
  parseArchiveLines,
  checkHierarchy,
  withStatus,
} from './task-store-impl.js'
export type { JsonlTaskStoreOptions } from './task-store-impl.js'
export { TaskTree } from './task-tree.js'
export { TaskRecordSchema, ArchivedTaskSchema, TaskStatusSchema } from './schemas.js'
export type { Task, ArchivedTask } from './schemas.js'
export {
  parseTaskId,
  isValidTaskId,
  depthOf,
  parentIdOf,
  childIndexOf,
  compareTaskIds,
  nextChildId,
  nextRootId,
} from './task-id.js'
