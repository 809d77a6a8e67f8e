import { describe, expect, it, vi } from "vitest";
import type { SiftMiddleware, ToolRequest } from "../../index.js";
import { composeToolHandlers } from "../../index.js";

function claiming(name: string, toolName: string, calls: string[]): SiftMiddleware {
  return {
    name,
    async wrapToolCall(req, next) {
      calls.push(name);
      if (req.toolName !== toolName) {
        return next(req);
      }
      return { output: `${name} handled ${req.toolName}` };
    },
  };
}

describe("composeToolHandlers", () => {
  it("should route to the first middleware that claims the tool", async () => {
    const calls: string[] = [];
    const terminal = vi.fn();
    const handler = composeToolHandlers(
      [claiming("outer", "a", calls), claiming("inner", "b", calls)],
      terminal,
    );

    const response = await handler({ toolName: "b", input: {} });

    expect(response.output).toBe("inner handled b");
    expect(calls).toEqual(["outer", "inner"]);
    expect(terminal).not.toHaveBeenCalled();
  });

  it("should fall through to the terminal handler", async () => {
    const terminal = vi.fn().mockResolvedValue({ output: "terminal" });
    const handler = composeToolHandlers([claiming("only", "a", [])], terminal);
    const req: ToolRequest = { toolName: "other", input: null };

    const response = await handler(req);

    expect(terminal).toHaveBeenCalledWith(req);
    expect(response.output).toBe("terminal");
  });
});
