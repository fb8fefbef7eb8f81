import { describe, it, expect } from "vitest";
import {
  BUILTIN_GENERICS,
  BUILTIN_TYPES,
  RESERVED_TYPE_NAMES,
  builtinDefinitions,
  builtinParameters,
  getBuiltinsByCategory,
  isBuiltinType,
} from "../../src/registry/builtins-registry.js";
import { parameterListToString } from "../../src/checker/types.js";
import { DefinitionTable } from "../../src/checker/definitions.js";

describe("builtins registry", () => {
  it("contains the concrete types", () => {
    expect(BUILTIN_TYPES.map((t) => t.name)).toEqual([
      "int", "float", "complex", "str", "bytes", "bool", "None", "object",
    ]);
    expect(isBuiltinType("str")).toBe(true);
    expect(isBuiltinType("List")).toBe(false);
  });

  it("has unique generic names that are not reserved", () => {
    const names = BUILTIN_GENERICS.map((g) => g.name);
    expect(new Set(names).size).toBe(names.length);
    for (const name of names) expect(RESERVED_TYPE_NAMES.has(name)).toBe(false);
  });

  it("groups generics by category", () => {
    expect(getBuiltinsByCategory("mapping").map((g) => g.name)).toEqual(["Dict", "Mapping"]);
    expect(getBuiltinsByCategory("union").map((g) => g.name)).toEqual(["Union"]);
  });

  it("builds parameter lists scoped to each built-in", () => {
    const dict = BUILTIN_GENERICS.find((g) => g.name === "Dict");
    const union = BUILTIN_GENERICS.find((g) => g.name === "Union");
    if (!dict || !union) return expect.fail("missing built-in");

    expect(parameterListToString(builtinParameters(dict))).toBe("[K, V]");
    expect(parameterListToString(builtinParameters(union))).toBe("[*Ts]");
    const [k] = builtinParameters(dict);
    expect(k.kind === "Fixed" && k.variable.scope).toBe("<builtin>:Dict");
  });

  it("defines every built-in generic without errors", () => {
    const table = new DefinitionTable();
    for (const def of builtinDefinitions()) expect(table.define(def)).toEqual([]);
    expect(table.accepts("List", 1)).toBe(true);
    expect(table.accepts("Dict", 1)).toBe(false);
    expect(table.accepts("Union", 0)).toBe(true);
  });
});
