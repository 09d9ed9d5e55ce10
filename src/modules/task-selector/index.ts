export { isWorkable, nextWorkable, selectNext } from './task-selector.js'
export type { Selection } from './task-selector.js'
