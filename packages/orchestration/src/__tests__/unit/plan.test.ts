import { PlanCycleError, PlanValidationError } from "@sift/errors";
import { describe, expect, it } from "vitest";
import { DependencyPlan } from "../../plan.js";
import type { HopInit } from "../../types.js";

function names(plan: DependencyPlan): string[] {
  return plan.orderedHops.map((hop) => hop.name);
}

describe("DependencyPlan", () => {
  describe("ordering", () => {
    it("should order a linear chain", () => {
      const plan = new DependencyPlan([
        { name: "A", tool: "t" },
        { name: "B", tool: "t", dependsOn: ["A"] },
        { name: "C", tool: "t", dependsOn: ["B"] },
      ]);
      expect(names(plan)).toEqual(["A", "B", "C"]);
    });

    it("should order a chain declared out of order", () => {
      const plan = new DependencyPlan([
        { name: "C", tool: "t", dependsOn: ["B"] },
        { name: "A", tool: "t" },
        { name: "B", tool: "t", dependsOn: ["A"] },
      ]);
      expect(names(plan)).toEqual(["A", "B", "C"]);
    });

    it("should keep declaration order among independent hops", () => {
      const plan = new DependencyPlan([
        { name: "Y", tool: "t" },
        { name: "X", tool: "t" },
      ]);
      expect(names(plan)).toEqual(["Y", "X"]);
    });

    it("should schedule a diamond pass by pass", () => {
      const plan = new DependencyPlan([
        { name: "D", tool: "t", dependsOn: ["B", "C"] },
        { name: "B", tool: "t", dependsOn: ["A"] },
        { name: "C", tool: "t", dependsOn: ["A"] },
        { name: "A", tool: "t" },
      ]);
      expect(names(plan)).toEqual(["A", "B", "C", "D"]);
    });

    it("should keep declared order available separately", () => {
      const plan = new DependencyPlan([
        { name: "B", tool: "t", dependsOn: ["A"] },
        { name: "A", tool: "t" },
      ]);
      expect(plan.hops.map((hop) => hop.name)).toEqual(["B", "A"]);
      expect(plan.size).toBe(2);
    });
  });

  describe("validation", () => {
    it("should reject an empty plan", () => {
      try {
        new DependencyPlan([]);
        expect.unreachable("should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(PlanValidationError);
        if (error instanceof PlanValidationError) {
          expect(error.code).toBe("PLAN_EMPTY");
        }
      }
    });

    it("should reject duplicate hop names", () => {
      try {
        new DependencyPlan([
          { name: "A", tool: "t" },
          { name: "A", tool: "u" },
        ]);
        expect.unreachable("should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(PlanValidationError);
        if (error instanceof PlanValidationError) {
          expect(error.code).toBe("PLAN_DUPLICATE_HOP");
          expect(error.hopNames).toEqual(["A"]);
          expect(error.message).toBe("Duplicate hop names: A");
        }
      }
    });

    it("should reject unknown dependencies", () => {
      try {
        new DependencyPlan([{ name: "A", tool: "t", dependsOn: ["Z"] }]);
        expect.unreachable("should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(PlanValidationError);
        if (error instanceof PlanValidationError) {
          expect(error.code).toBe("PLAN_UNKNOWN_DEPENDENCY");
          expect(error.hopNames).toEqual(["Z"]);
          expect(error.message).toBe('Hop "A" depends on unknown hops: Z');
        }
      }
    });

    it("should detect a cycle and name the unresolved hops", () => {
      const hops: HopInit[] = [
        { name: "A", tool: "t", dependsOn: ["B"] },
        { name: "B", tool: "t", dependsOn: ["A"] },
        { name: "C", tool: "t" },
      ];
      expect(() => new DependencyPlan(hops)).toThrow(PlanCycleError);
      expect(() => new DependencyPlan(hops)).toThrow("Cycle detected in hop dependencies: [A, B]");
    });

    it("should treat a self-dependency as a cycle", () => {
      try {
        new DependencyPlan([{ name: "A", tool: "t", dependsOn: ["A"] }]);
        expect.unreachable("should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(PlanCycleError);
        if (error instanceof PlanCycleError) {
          expect(error.unresolved).toEqual(["A"]);
          expect(error.code).toBe("PLAN_CYCLE_DETECTED");
        }
      }
    });
  });

  describe("immutability", () => {
    it("should freeze hops, params and dependency lists", () => {
      const plan = new DependencyPlan([{ name: "A", tool: "t", params: { n: 1 } }]);
      const hop = plan.orderedHops[0];

      expect(Object.isFrozen(hop)).toBe(true);
      expect(Object.isFrozen(hop?.params)).toBe(true);
      expect(Object.isFrozen(hop?.dependsOn)).toBe(true);
      expect(Object.isFrozen(plan.orderedHops)).toBe(true);
    });

    it("should not follow later mutation of the declared input", () => {
      const params = { n: 1 };
      const deps = ["A"];
      const plan = new DependencyPlan([
        { name: "A", tool: "t" },
        { name: "B", tool: "t", params, dependsOn: deps },
      ]);
      params.n = 2;
      deps.push("C");

      expect(plan.get("B")?.params).toEqual({ n: 1 });
      expect(plan.get("B")?.dependsOn).toEqual(["A"]);
    });

    it("should default params and dependsOn to empty", () => {
      const plan = new DependencyPlan([{ name: "A", tool: "t" }]);
      expect(plan.get("A")).toEqual({ name: "A", tool: "t", params: {}, dependsOn: [] });
      expect(plan.get("missing")).toBeUndefined();
    });
  });

  describe("withParams", () => {
    it("should replace params of the named hops only", () => {
      const plan = new DependencyPlan([
        { name: "A", tool: "t", params: { q: "old" } },
        { name: "B", tool: "t", params: { keep: true }, dependsOn: ["A"] },
      ]);

      const next = plan.withParams({ A: { q: "new" } });

      expect(next.get("A")?.params).toEqual({ q: "new" });
      expect(next.get("B")?.params).toEqual({ keep: true });
      expect(plan.get("A")?.params).toEqual({ q: "old" });
      expect(next.orderedHops.map((hop) => hop.name)).toEqual(["A", "B"]);
    });
  });
});
