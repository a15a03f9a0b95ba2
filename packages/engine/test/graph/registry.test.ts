import { describe, expect, it } from "vitest";
import { createNodeRegistry } from "../../src/graph/registry.js";
import { ConstantNode } from "../../src/nodes/index.js";
import { CalcGraphErrorCode, DuplicateNameError, InvalidArgumentError, UnknownNodeError } from "../../src/shared/errors.js";

describe("NodeRegistry", () => {
  it("registers and looks up nodes by name", () => {
    const registry = createNodeRegistry();
    const node = new ConstantNode("a", 1);
    registry.register(node);

    expect(registry.lookup("a")).toBe(node);
    expect(registry.has("a")).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.names()).toEqual(["a"]);
  });

  it("enforces one definition per name", () => {
    const registry = createNodeRegistry();
    const first = new ConstantNode("a", 1);
    registry.register(first);

    expect(() => registry.register(new ConstantNode("a", 2))).toThrow(DuplicateNameError);
    expect(() => registry.register(new ConstantNode("a", 2))).toThrow('A node named "a" is already registered');
    expect(registry.lookup("a")).toBe(first);
  });

  it("throws UnknownNodeError for missing names", () => {
    const registry = createNodeRegistry();
    try {
      registry.lookup("missing");
      expect.unreachable("lookup should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownNodeError);
      if (error instanceof UnknownNodeError) {
        expect(error.nodeName).toBe("missing");
        expect(error.code).toBe(CalcGraphErrorCode.UNKNOWN_NODE);
        expect(error.name).toBe("UnknownNodeError");
        expect(error.message).toBe('No node named "missing" is registered');
      }
    }
  });

  it("rejects empty names", () => {
    const registry = createNodeRegistry();
    expect(() => registry.register(new ConstantNode("", 1))).toThrow(InvalidArgumentError);
    expect(registry.size).toBe(0);
  });
});
