import { describe, it, expect } from "vitest";
import {
  type GenericDefinition,
  DefinitionTable, acceptsArity, fixedArity, concrete, describeBindError, fixed, formatSubstitution,
  named, tupleExpand, tupleVariable, typeVariable, varRef,
} from "../../src/engine.js";
import { argumentKey } from "../../src/checker/definitions.js";

const Rows = typeVariable("Rows");
const Cols = typeVariable("Cols");
const T = typeVariable("T");
const Shape = tupleVariable("Shape");
const Ts = tupleVariable("Ts");
const int = named("int");
const str = named("str");
const bool = named("bool");

function arrayTable() {
  const table = new DefinitionTable();
  const general: GenericDefinition = { name: "Array", kind: "type", parameters: [tupleExpand(Shape)] };
  const matrix: GenericDefinition = { name: "Array", kind: "type", parameters: [fixed(Rows), fixed(Cols)] };
  expect(table.define(general)).toEqual([]);
  expect(table.define(matrix)).toEqual([]);
  return { table, general, matrix };
}

describe("fixedArity", () => {
  it("counts positional slots of a fixed list", () => {
    expect(fixedArity([fixed(T), concrete(int), concrete(str, "restKeyword", "kw")])).toBe(2);
    expect(fixedArity([fixed(T), tupleExpand(Ts)])).toBeUndefined();
  });

  it("accepts any count above the fixed slots of a variadic list", () => {
    const list = [fixed(T), tupleExpand(Ts)];
    expect(acceptsArity(list, 0)).toBe(false);
    expect(acceptsArity(list, 1)).toBe(true);
    expect(acceptsArity(list, 5)).toBe(true);
    expect(acceptsArity([fixed(T)], 2)).toBe(false);
  });
});

describe("DefinitionTable", () => {
  it("selects a specialization by argument count", () => {
    const { table, matrix } = arrayTable();
    const call = table.bindCall("Array", [int, str]);
    expect(call.definition).toBe(matrix);
    expect(call.result.ok && formatSubstitution(call.result.substitution)).toBe("{Rows: int, Cols: str}");
  });

  it("falls back to the general definition", () => {
    const { table, general } = arrayTable();
    const call = table.bindCall("Array", [int, str, bool]);
    expect(call.definition).toBe(general);
    expect(call.result.ok && formatSubstitution(call.result.substitution)).toBe("{Shape: [int, str, bool]}");
    expect(table.bindCall("Array", []).definition).toBe(general);
  });

  it("lists the general definition first", () => {
    const { table, general, matrix } = arrayTable();
    expect(table.lookup("Array")).toEqual([general, matrix]);
    expect(table.accepts("Array", 7)).toBe(true);
    expect(table.lookup("Missing")).toEqual([]);
  });

  it("rejects a second general definition", () => {
    const { table } = arrayTable();
    const errors = table.define({ name: "Array", kind: "type", parameters: [fixed(T), tupleExpand(Ts)] });
    expect(errors).toEqual([{ kind: "ConflictingDefinition", name: "Array", arity: "variadic" }]);
  });

  it("rejects a second specialization of the same arity", () => {
    const { table } = arrayTable();
    const errors = table.define({ name: "Array", kind: "type", parameters: [fixed(T), concrete(int)] });
    expect(errors).toEqual([{ kind: "ConflictingDefinition", name: "Array", arity: 2 }]);
  });

  it("reports counts no specialization takes", () => {
    const table = new DefinitionTable();
    table.define({ name: "Vec", kind: "type", parameters: [fixed(T)] });
    table.define({ name: "Vec", kind: "type", parameters: [fixed(Rows), fixed(Cols)] });
    const call = table.bindCall("Vec", [int, str, bool]);
    expect(call.definition).toBeUndefined();
    expect(call.result).toEqual({
      ok: false,
      error: { kind: "NoMatchingSpecialization", name: "Vec", arities: [1, 2], received: 3 },
    });
    if (!call.result.ok) {
      expect(describeBindError(call.result.error)).toBe("No definition of 'Vec' takes 3 arguments (accepted: 1, 2)");
    }
  });

  it("binds a lone specialization to report its arity error", () => {
    const table = new DefinitionTable();
    table.define({ name: "Box", kind: "type", parameters: [fixed(T)] });
    const call = table.bindCall("Box", [int, str]);
    expect(call.result).toEqual({ ok: false, error: { kind: "ArityTooMany", maximum: 1, received: 2 } });
  });

  it("fails calls against a name whose only definition is invalid", () => {
    const table = new DefinitionTable();
    const errors = table.define({ name: "Bad", kind: "function", parameters: [tupleExpand(Ts), tupleExpand(Shape)] });
    expect(errors.map((e) => e.kind)).toEqual(["MultipleExpansion"]);
    expect(table.has("Bad")).toBe(true);
    expect(table.lookup("Bad")).toEqual([]);

    const call = table.bindCall("Bad", [int]);
    expect(call.result.ok).toBe(false);
    if (!call.result.ok) expect(call.result.error.kind).toBe("InvalidDefinition");
  });

  it("memoizes bindings per definition and arguments", () => {
    const { table } = arrayTable();
    const first = table.bindCall("Array", [int, str, bool]);
    const second = table.bindCall("Array", [int, str, bool]);
    expect(second.result).toBe(first.result);
    expect(table.memoSize).toBe(1);

    table.bindCall("Array", [int, str]);
    expect(table.memoSize).toBe(2);
  });

  it("keys placeholders by scope as well as name", () => {
    const a = named("List", varRef(typeVariable("T", "A@1:1")));
    const b = named("List", varRef(typeVariable("T", "B@1:1")));
    expect(argumentKey(a)).not.toBe(argumentKey(b));
  });
});
