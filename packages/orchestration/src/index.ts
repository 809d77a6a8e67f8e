/**
 * @sift/orchestration: multi-hop plans.
 *
 * DependencyPlan validates and orders hops; HopExecutor runs them
 * sequentially, wiring dependency outputs and shared state.
 */

export {
  defineOperation,
  dependencyOutputs,
  type OperationDefinition,
  sharedState,
} from "./define-operation.js";
export { HopExecutor, type HopExecutorOptions } from "./executor.js";
export { DependencyPlan } from "./plan.js";
export type {
  Capability,
  Hop,
  HopArguments,
  HopInit,
  HopOperation,
  HopParams,
  HopResult,
  HopResultMetadata,
  OperationRegistry,
  OrchestrationResult,
  SharedState,
  TraceRecord,
} from "./types.js";
