export { checkVersion, assertVersion } from './concurrency/version-guard.js'
export { executeDedupPlan } from './dedup/dedup-executor.js'
export {
  findDuplicateGroups,
  summarizeGroup,
} from './dedup/duplicate-detector.js'
export { planDedup } from './dedup/removal-planner.js'
export {
  DEFAULT_EXECUTOR_OPTIONS,
  type ExecutorOptions,
  RateLimitedExecutor,
} from './executor/rate-limited-executor.js'
export { fetchAll } from './fetching/collection-fetcher.js'
export { type RunOptions, runDeduplication } from './orchestration/dedup-run.js'
export { runSort, type SortRunOptions } from './orchestration/sort-run.js'
export { executeSortMoves } from './sort/sort-executor.js'
export { planSort } from './sort/sort-planner.js'
export type { ExecutionDeps, RemoteDeps } from './types.js'
