/**
 * DependencyPlan: validated, topologically ordered set of hops.
 */

import { PlanCycleError, PlanValidationError } from "@sift/errors";
import type { Hop, HopInit, HopParams } from "./types.js";

function freezeHop(init: HopInit): Hop {
  return Object.freeze({
    name: init.name,
    tool: init.tool,
    params: Object.freeze({ ...(init.params ?? {}) }),
    dependsOn: Object.freeze([...(init.dependsOn ?? [])]),
  });
}

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Repeated passes in declaration order. Each pass schedules every hop
 * whose dependencies are already scheduled, including hops scheduled
 * earlier in the same pass. A pass that schedules nothing means a cycle.
 */
function resolveOrder(hops: readonly Hop[]): Hop[] {
  const scheduled = new Set<string>();
  const order: Hop[] = [];

  while (order.length < hops.length) {
    let progressed = false;
    for (const hop of hops) {
      if (scheduled.has(hop.name)) continue;
      if (hop.dependsOn.every((dep) => scheduled.has(dep))) {
        order.push(hop);
        scheduled.add(hop.name);
        progressed = true;
      }
    }
    if (!progressed) {
      throw new PlanCycleError(hops.filter((hop) => !scheduled.has(hop.name)).map((hop) => hop.name));
    }
  }

  return order;
}

export class DependencyPlan {
  /** Hops in declaration order */
  readonly hops: readonly Hop[];
  /** Hops in execution order */
  readonly orderedHops: readonly Hop[];
  private readonly byName: ReadonlyMap<string, Hop>;

  /**
   * @throws PlanValidationError for an empty plan, duplicate names or unknown dependencies
   * @throws PlanCycleError when the dependencies admit no order
   */
  constructor(hops: readonly HopInit[]) {
    if (hops.length === 0) {
      throw new PlanValidationError("PLAN_EMPTY", "A plan requires at least one hop");
    }

    const frozen = hops.map(freezeHop);
    const duplicates = findDuplicates(frozen.map((hop) => hop.name));
    if (duplicates.length > 0) {
      throw new PlanValidationError(
        "PLAN_DUPLICATE_HOP",
        `Duplicate hop names: ${duplicates.join(", ")}`,
        duplicates,
      );
    }

    const byName = new Map(frozen.map((hop) => [hop.name, hop] as const));
    for (const hop of frozen) {
      const unknown = hop.dependsOn.filter((dep) => !byName.has(dep));
      if (unknown.length > 0) {
        throw new PlanValidationError(
          "PLAN_UNKNOWN_DEPENDENCY",
          `Hop "${hop.name}" depends on unknown hops: ${unknown.join(", ")}`,
          unknown,
        );
      }
    }

    this.hops = Object.freeze(frozen);
    this.byName = byName;
    this.orderedHops = Object.freeze(resolveOrder(frozen));
  }

  get size(): number {
    return this.hops.length;
  }

  get(name: string): Hop | undefined {
    return this.byName.get(name);
  }

  /**
   * Build a new plan with the params of the named hops replaced.
   * Hops not mentioned keep their params; the original plan is untouched.
   */
  withParams(overrides: Readonly<Record<string, HopParams>>): DependencyPlan {
    return new DependencyPlan(
      this.hops.map((hop) => {
        const params = Object.hasOwn(overrides, hop.name) ? overrides[hop.name] : undefined;
        return params === undefined ? hop : { ...hop, params };
      }),
    );
  }
}
