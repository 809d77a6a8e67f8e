/**
 * HopExecutor: runs a plan's hops one at a time in dependency order.
 *
 * Each operation receives its declared hop params merged over the values it
 * asked for via `needs`. Failures propagate unchanged and abort the run.
 */

import { performance } from "node:perf_hooks";
import { createLogger, type Logger } from "@sift/core";
import { UnknownToolError } from "@sift/errors";
import { recordHopDuration, withSpan } from "@sift/telemetry";
import type { DependencyPlan } from "./plan.js";
import type {
  Capability,
  Hop,
  HopArguments,
  HopOperation,
  HopResult,
  OperationRegistry,
  OrchestrationResult,
  SharedState,
  TraceRecord,
} from "./types.js";

export interface HopExecutorOptions {
  readonly logger?: Logger;
}

export class HopExecutor<C = unknown> {
  private readonly registry: OperationRegistry;
  private readonly logger: Logger;

  constructor(registry: OperationRegistry, options: HopExecutorOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? createLogger("orchestration");
  }

  /** Registered tool names */
  get tools(): readonly string[] {
    return Object.keys(this.registry);
  }

  async execute(
    plan: DependencyPlan,
    context: C,
    sharedState: SharedState = {},
  ): Promise<OrchestrationResult> {
    const results = new Map<string, HopResult>();
    const trace: TraceRecord[] = [];

    for (const hop of plan.orderedHops) {
      const operation = this.resolve(hop);

      // fromEntries defines own keys, so names like "__proto__" survive
      const dependencies: Record<string, unknown> = Object.fromEntries(
        hop.dependsOn.map((dep) => [dep, results.get(dep)?.output]),
      );

      const args = buildArguments(operation.needs, hop, {
        context,
        dependencies,
        state: sharedState,
      });

      this.logger.debug(
        `running hop "${hop.name}" (tool=${hop.tool}, dependsOn=[${hop.dependsOn.join(", ")}])`,
      );
      const output = await this.runTimed(hop, operation, args);

      results.set(hop.name, {
        hop,
        output,
        metadata: { dependencies: hop.dependsOn, tool: hop.tool },
      });
      trace.push({ hop: hop.name, tool: hop.tool, dependsOn: hop.dependsOn });
    }

    return { results: Object.fromEntries(results), trace };
  }

  private resolve(hop: Hop): HopOperation {
    const operation = Object.hasOwn(this.registry, hop.tool) ? this.registry[hop.tool] : undefined;
    if (operation === undefined) {
      throw new UnknownToolError(hop.tool, hop.name);
    }
    return operation;
  }

  private async runTimed(hop: Hop, operation: HopOperation, args: HopArguments): Promise<unknown> {
    const started = performance.now();
    let ok = false;
    try {
      const output = await withSpan(
        `sift.hop.${hop.name}`,
        { "hop.tool": hop.tool, "hop.depends_on": hop.dependsOn.join(",") },
        () => operation.run(args),
      );
      ok = true;
      return output;
    } finally {
      recordHopDuration(hop.tool, performance.now() - started, ok);
    }
  }
}

/**
 * Merge injected values under the hop's declared params. An explicit
 * param with the same name always wins.
 */
function buildArguments(
  needs: readonly Capability[],
  hop: Hop,
  injectable: Readonly<Record<Capability, unknown>>,
): HopArguments {
  const args: Record<string, unknown> = {};
  for (const capability of needs) {
    args[capability] = injectable[capability];
  }
  return { ...args, ...hop.params };
}
