import { describe, it, expect } from "vitest";
import {
  type Argument, EMPTY_SUBSTITUTION,
  bind, concrete, expand, fixed, formatSubstitution, lookupList, lookupType, mapOf, named,
  namedConstructor, spread, tuple, tupleExpand, tupleUnexpanded, tupleVariable, typeList,
  typeVariable, typeArgToString, typeToString, varRef, describeBindError, splitRun,
} from "../../src/engine.js";

const T = typeVariable("T");
const T1 = typeVariable("T1");
const T2 = typeVariable("T2");
const Ts = tupleVariable("Ts");
const Us = tupleVariable("Us");
const Shape = tupleVariable("Shape");

const int = named("int");
const str = named("str");
const bool = named("bool");
const float = named("float");

describe("bind", () => {
  it("binds fixed slots before a spread tuple variable", () => {
    const result = bind([fixed(T1), fixed(T2), tupleExpand(Ts)], [int, str, bool, float]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(formatSubstitution(result.substitution)).toBe("{T1: int, T2: str, Ts: [bool, float]}");
    }
  });

  it("binds an empty run", () => {
    const result = bind([tupleExpand(Ts)], []);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(lookupList(result.substitution, Ts)).toEqual([]);
      expect(formatSubstitution(result.substitution)).toBe("{Ts: []}");
    }
  });

  it("reports too few arguments for the fixed slots", () => {
    const result = bind([fixed(T1), fixed(T2), tupleExpand(Ts)], [int]);
    expect(result).toEqual({ ok: false, error: { kind: "ArityTooFew", minimum: 2, received: 1 } });
    if (!result.ok) expect(describeBindError(result.error)).toBe("Expected at least 2 arguments, got 1");
  });

  it("reports too many arguments for a fixed list", () => {
    const result = bind([fixed(T)], [int, str]);
    expect(result).toEqual({ ok: false, error: { kind: "ArityTooMany", maximum: 1, received: 2 } });
  });

  it("takes suffix slots from the back", () => {
    const result = bind([fixed(T1), tupleExpand(Ts), fixed(T2)], [int, str, bool, float]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(lookupType(result.substitution, T1)).toEqual(int);
      expect(lookupList(result.substitution, Ts)?.map(typeToString)).toEqual(["str", "bool"]);
      expect(lookupType(result.substitution, T2)).toEqual(float);
    }
  });

  it("expands the binding back to the middle of the arguments", () => {
    const args = [int, str, bool, float, named("bytes")];
    for (let prefix = 0; prefix <= 2; prefix++) {
      for (let suffix = 0; suffix <= 2; suffix++) {
        const list = [
          ...Array.from({ length: prefix }, (_, i) => fixed(typeVariable(`P${i}`))),
          tupleExpand(Ts),
          ...Array.from({ length: suffix }, (_, i) => fixed(typeVariable(`S${i}`))),
        ];
        const result = bind(list, args);
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(expand(Ts, result.substitution)).toEqual(args.slice(prefix, args.length - suffix));
        }
      }
    }
  });

  it("binds several unexpanded tuple variables from explicit lists", () => {
    const result = bind([tupleUnexpanded(Ts), tupleUnexpanded(Us)], [typeList(int, str), typeList()]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(formatSubstitution(result.substitution)).toBe("{Ts: [int, str], Us: []}");
  });

  it("requires an explicit list for an unexpanded tuple variable", () => {
    const result = bind([tupleUnexpanded(Ts)], [int]);
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "StructuralMismatch") {
      expect(result.error.position).toBe(0);
      expect(result.error.reason).toBe("'Ts' takes an explicit type list such as '(int, str)'");
    } else {
      expect.fail("expected a structural mismatch");
    }
  });

  it("reports a suffix mismatch at its argument position", () => {
    const result = bind([fixed(T1), tupleExpand(Ts), concrete(int)], [int, str, bool]);
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "StructuralMismatch") {
      expect(result.error.position).toBe(2);
      expect(result.error.reason).toBe("expected 'int'");
    } else {
      expect.fail("expected a structural mismatch");
    }
  });

  it("rejects a type list in a fixed slot", () => {
    const result = bind([fixed(T)], [typeList(int)]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(describeBindError(result.error)).toBe(
        "Argument 1 '(int,)' does not match parameter 'T': 'T' binds a single type, not a type list",
      );
    }
  });

  it("requires repeated placeholders to agree", () => {
    const result = bind([fixed(T), fixed(T)], [int, str]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(describeBindError(result.error)).toBe(
        "Argument 2 'str' does not match parameter 'T': 'T' is already bound to 'int'",
      );
    }
    expect(bind([fixed(T), fixed(T)], [int, int]).ok).toBe(true);
  });

  it("rejects a type list inside a spread run", () => {
    const result = bind([tupleExpand(Ts)], [int, typeList(str)]);
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "StructuralMismatch") {
      expect(result.error.position).toBe(1);
      expect(result.error.reason).toBe("an explicit type list cannot be part of a spread run");
    } else {
      expect.fail("expected a structural mismatch");
    }
  });

  it("matches every extra argument against a homogeneous rest", () => {
    const list = [fixed(T), concrete(int, "restPositional", "xs")];
    expect(bind(list, [str, int, int]).ok).toBe(true);
    expect(bind(list, [str]).ok).toBe(true);

    const result = bind(list, [str, int, bool]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(describeBindError(result.error)).toBe(
        "Argument 3 'bool' does not match parameter '*xs: int': expected 'int'",
      );
    }
  });

  it("ignores rest-keyword parameters", () => {
    const result = bind(
      [tupleExpand(Ts, "restPositional", "args"), concrete(str, "restKeyword", "kwargs")],
      [int],
    );
    expect(result.ok).toBe(true);
    if (result.ok) expect(formatSubstitution(result.substitution)).toBe("{Ts: [int]}");
  });

  it("leaves the argument list untouched", () => {
    const args: Argument[] = [int, str];
    bind([tupleExpand(Ts)], args);
    expect(args).toEqual([int, str]);
  });
});

describe("structural matching", () => {
  it("binds a tuple variable through a spread in a concrete type", () => {
    const result = bind([concrete(named("Array", spread(Shape)))], [named("Array", int, str)]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(formatSubstitution(result.substitution)).toBe("{Shape: [int, str]}");
  });

  it("splits a nested argument list around its spread", () => {
    const pattern = named("Array", varRef(T), spread(Shape), varRef(T2));
    const result = bind([concrete(pattern)], [named("Array", int, str, bool, float)]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(formatSubstitution(result.substitution)).toBe("{T: int, T2: float, Shape: [str, bool]}");
    }
  });

  it("inverts a Map to recover the tuple variable", () => {
    const list = namedConstructor("List");
    const pattern = tuple(spread(mapOf(list, Ts)));
    const result = bind([concrete(pattern)], [tuple(named("List", int), named("List", str))]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(formatSubstitution(result.substitution)).toBe("{Ts: [int, str]}");

    expect(bind([concrete(pattern)], [tuple(named("List", int), named("Set", str))]).ok).toBe(false);
  });

  it("rejects a different constructor", () => {
    const result = bind([concrete(named("Array", spread(Shape)))], [named("Matrix", int)]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(describeBindError(result.error)).toBe(
        "Argument 1 'Matrix[int]' does not match parameter 'Array[*Shape]': expected 'Array[*Shape]'",
      );
    }
  });
});

describe("splitRun", () => {
  it("splits into prefix, middle and suffix", () => {
    expect(splitRun([1, 2, 3, 4], 1, 2)).toEqual({ prefix: [1], middle: [2], suffix: [3, 4] });
    expect(splitRun([1, 2], 1, 1)).toEqual({ prefix: [1], middle: [], suffix: [2] });
  });

  it("is undefined when the fixed parts do not fit", () => {
    expect(splitRun([1], 1, 1)).toBeUndefined();
  });
});

describe("expand", () => {
  it("keeps an unbound tuple variable as a spread", () => {
    expect(expand(Ts, EMPTY_SUBSTITUTION).map(typeArgToString)).toEqual(["*Ts"]);
  });
});
