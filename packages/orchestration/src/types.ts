// ---------------------------------------------------------------------------
// Plan types
// ---------------------------------------------------------------------------

/** Statically declared arguments of a hop */
export type HopParams = Readonly<Record<string, unknown>>;

/** One named step of a plan. Frozen once the plan is built. */
export interface Hop {
  readonly name: string;
  /** Registry key of the operation to run */
  readonly tool: string;
  readonly params: HopParams;
  readonly dependsOn: readonly string[];
}

/** Input accepted when declaring a hop; `params` and `dependsOn` default to empty. */
export interface HopInit {
  readonly name: string;
  readonly tool: string;
  readonly params?: HopParams;
  readonly dependsOn?: readonly string[];
}

// ---------------------------------------------------------------------------
// Execution types
// ---------------------------------------------------------------------------

/** Mutable bag shared by reference across every hop of one execution */
export type SharedState = Record<string, unknown>;

/** Values the executor can inject, keyed by argument name */
export type Capability = "context" | "dependencies" | "state";

/**
 * Arguments handed to an operation: declared hop params merged over the
 * injected `context`, `dependencies` and `state` the operation asked for.
 */
export type HopArguments = Readonly<Record<string, unknown>>;

/**
 * A registered operation. `needs` declares which values the executor
 * injects; anything not listed is never passed.
 */
export interface HopOperation {
  readonly needs: readonly Capability[];
  run(args: HopArguments): Promise<unknown>;
}

export type OperationRegistry = Readonly<Record<string, HopOperation>>;

export interface HopResultMetadata {
  readonly dependencies: readonly string[];
  readonly tool: string;
}

export interface HopResult {
  /** The frozen plan hop that produced this result */
  readonly hop: Hop;
  readonly output: unknown;
  readonly metadata: HopResultMetadata;
}

export interface TraceRecord {
  readonly hop: string;
  readonly tool: string;
  readonly dependsOn: readonly string[];
}

export interface OrchestrationResult {
  /** Results keyed by hop name, inserted in execution order */
  readonly results: Readonly<Record<string, HopResult>>;
  readonly trace: readonly TraceRecord[];
}
