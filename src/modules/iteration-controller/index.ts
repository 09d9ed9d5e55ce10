/**
 * iteration-controller module: barrel export.
 */

export type { IterationController, IterationOutcome, StopCheck } from './iteration-controller.js'
export {
  IterationControllerImpl,
  createIterationController,
  SPLIT_MERGE_TITLE,
  SPLIT_WITHOUT_CHILDREN_REASON,
} from './iteration-controller-impl.js'
export type { IterationControllerDeps, IterationControllerOptions } from './iteration-controller-impl.js'
