export { createExecutor, Executor } from "./executor";
export type {
  ExecutionHooks,
  ExecutorCacheStats,
  ExecutorOptions,
  HookContext,
  QueryHookContext,
} from "./types";
