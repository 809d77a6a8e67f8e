import { isRecord } from "@sift/core";
import type { Capability, HopArguments, HopOperation, SharedState } from "./types.js";

export interface OperationDefinition {
  readonly needs?: readonly Capability[];
  run(args: HopArguments): Promise<unknown> | unknown;
}

/**
 * Declare an operation for the executor registry. Synchronous `run`
 * functions are lifted to promises.
 */
export function defineOperation(definition: OperationDefinition): HopOperation {
  const run = definition.run.bind(definition);
  return Object.freeze({
    needs: Object.freeze([...(definition.needs ?? [])]),
    run: async (args: HopArguments) => run(args),
  });
}

/**
 * Read the injected dependency outputs, or an empty mapping when the
 * operation did not ask for them.
 */
export function dependencyOutputs(args: HopArguments): Readonly<Record<string, unknown>> {
  const value = args.dependencies;
  return isRecord(value) ? value : {};
}

/**
 * Read the injected shared state.
 * @throws TypeError when the operation did not declare the "state" capability
 */
export function sharedState(args: HopArguments): SharedState {
  const value = args.state;
  if (!isRecord(value)) {
    throw new TypeError('Operation did not receive shared state; declare needs: ["state"]');
  }
  return value;
}
