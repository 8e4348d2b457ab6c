export { resolvePaths } from './paths.js'
export { STOP_FILE_NAME, requestStop, clearStop, isStopRequested } from './stop-file.js'
export { withScheduler } from './store.js'
export type { Paths, ProjectOptions } from './types.js'
