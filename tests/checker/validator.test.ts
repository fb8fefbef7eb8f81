import { describe, it, expect } from "vitest";
import {
  concrete, fixed, named, spread, tupleExpand, tupleUnexpanded, tupleVariable, typeVariable,
  describeDefinitionError,
} from "../../src/engine.js";
import { validate, validateDefinition } from "../../src/checker/validator.js";

const T = typeVariable("T");
const Ts = tupleVariable("Ts");
const Us = tupleVariable("Us");
const Vs = tupleVariable("Vs");

describe("validate", () => {
  it("accepts a list with one variable-length slot", () => {
    expect(validate([fixed(T), tupleExpand(Ts), tupleUnexpanded(Us)])).toEqual({ ok: true });
  });

  it("accepts an empty list", () => {
    expect(validate([])).toEqual({ ok: true });
  });

  it("rejects two spread tuple variables", () => {
    const result = validate([tupleExpand(Ts), tupleExpand(Us)]);
    expect(result).toEqual({
      ok: false,
      errors: [{ kind: "MultipleExpansion", position: 1, firstPosition: 0 }],
    });
    if (!result.ok) {
      expect(describeDefinitionError(result.errors[0])).toBe(
        "Parameter 2 is a second variable-length parameter (the first is parameter 1)",
      );
    }
  });

  it("counts a homogeneous rest as variable-length", () => {
    const result = validate([tupleExpand(Ts), concrete(named("int"), "restPositional", "args")]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errors.map((e) => e.kind)).toEqual(["MultipleExpansion"]);
  });

  it("does not count rest-keyword parameters", () => {
    const list = [tupleExpand(Ts, "restPositional", "args"), concrete(named("str"), "restKeyword", "kwargs")];
    expect(validate(list)).toEqual({ ok: true });
  });

  it("rejects an unexpanded tuple variable on *args", () => {
    const result = validate([tupleUnexpanded(Ts, "restPositional", "args")]);
    expect(result).toEqual({
      ok: false,
      errors: [{ kind: "InvalidVarargBinding", position: 0, variable: Ts }],
    });
    if (!result.ok) {
      expect(describeDefinitionError(result.errors[0])).toBe(
        "Tuple variable 'Ts' must be spread ('*Ts') when used as the type of a rest-positional parameter",
      );
    }
  });

  it("rejects a tuple variable on **kwargs", () => {
    expect(validate([tupleExpand(Ts, "restKeyword", "kwargs")])).toEqual({
      ok: false,
      errors: [{ kind: "InvalidKwargBinding", position: 0, variable: Ts }],
    });
    expect(validate([tupleUnexpanded(Ts, "restKeyword", "kwargs")]).ok).toBe(false);
  });

  it("reports every error in declaration order", () => {
    const result = validate([tupleExpand(Ts), tupleExpand(Us), tupleUnexpanded(Vs, "restPositional", "args")]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors.map((e) => e.kind)).toEqual([
        "MultipleExpansion", "MultipleExpansion", "InvalidVarargBinding",
      ]);
      expect(result.errors.map((e) => ("position" in e ? e.position : -1))).toEqual([1, 2, 2]);
    }
  });

  it("rejects two spreads inside one concrete parameter type", () => {
    const result = validate([fixed(T), concrete(named("Array", spread(Ts), spread(Us)))]);
    expect(result).toEqual({
      ok: false,
      errors: [{
        kind: "MultipleExpansion",
        position: 1,
        firstPosition: 1,
        within: { type: "Array[*Ts, *Us]", argument: 1, firstArgument: 0 },
      }],
    });
    if (!result.ok) {
      expect(describeDefinitionError(result.errors[0])).toBe(
        "More than one spread in the argument list of 'Array[*Ts, *Us]' (arguments 1 and 2)",
      );
    }
  });
});

describe("validateDefinition", () => {
  it("caches the result per list", () => {
    const list = [tupleExpand(Ts), tupleExpand(Us)];
    const first = validateDefinition(list);
    expect(validateDefinition(list)).toBe(first);
    expect(validateDefinition([tupleExpand(Ts), tupleExpand(Us)])).not.toBe(first);
  });
});
