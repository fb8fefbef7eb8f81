import { describe, it, expect } from "vitest";
import {
  type TypeConstructor, type TypeTerm,
  SubstitutionBuilder, TUPLE_CONSTRUCTOR,
  mapOf, mapType, named, namedConstructor, resolveTypeList, tupleVariable, typeToString,
} from "../../src/engine.js";

const Ts = tupleVariable("Ts");
const int = named("int");
const str = named("str");

function bound(types: TypeTerm[]) {
  const builder = new SubstitutionBuilder();
  builder.bindList(Ts, types);
  return builder.build();
}

describe("mapType", () => {
  it("applies the constructor to each element", () => {
    const result = mapType(namedConstructor("List"), Ts, bound([int, str]));
    expect(result.ok && result.types.map(typeToString)).toEqual(["List[int]", "List[str]"]);
  });

  it("preserves length for every constructor", () => {
    const constructors: TypeConstructor[] = [namedConstructor("List"), namedConstructor("Optional"), TUPLE_CONSTRUCTOR];
    const elements = [int, str, named("bool"), named("float")];
    for (const constructor of constructors) {
      for (let n = 0; n <= elements.length; n++) {
        const source = elements.slice(0, n);
        const fromVariable = mapType(constructor, Ts, bound(source));
        const fromList = mapType(constructor, source);
        expect(fromVariable.ok && fromVariable.types.length).toBe(n);
        expect(fromList.ok && fromList.types.length).toBe(n);
      }
    }
  });

  it("keeps arity when maps are nested", () => {
    const subst = bound([int, str]);
    const inner = mapType(TUPLE_CONSTRUCTOR, Ts, subst);
    expect(inner.ok && inner.types.map(typeToString)).toEqual(["Tuple[int]", "Tuple[str]"]);
    if (!inner.ok) return;

    const outer = mapType(TUPLE_CONSTRUCTOR, inner.types);
    expect(outer.ok && outer.types.map(typeToString)).toEqual(["Tuple[Tuple[int]]", "Tuple[Tuple[str]]"]);
  });

  it("takes an inner result as its source", () => {
    const outer = mapType(TUPLE_CONSTRUCTOR, mapType(TUPLE_CONSTRUCTOR, Ts, bound([int, str])));
    expect(outer.ok && outer.types.map(typeToString)).toEqual(["Tuple[Tuple[int]]", "Tuple[Tuple[str]]"]);
  });

  it("passes an inner failure through", () => {
    const outer = mapType(namedConstructor("List"), mapType(TUPLE_CONSTRUCTOR, Ts));
    expect(outer.ok).toBe(false);
    if (!outer.ok) expect(outer.error.kind).toBe("UnsupportedNesting");
  });

  it("evaluates a nested Map term innermost first", () => {
    const term = mapOf(TUPLE_CONSTRUCTOR, mapOf(TUPLE_CONSTRUCTOR, Ts));
    const result = resolveTypeList(term, bound([int, str]));
    expect(result.ok && result.value.map(typeToString)).toEqual(["Tuple[Tuple[int]]", "Tuple[Tuple[str]]"]);
  });

  it("fails on an unbound tuple variable", () => {
    const result = mapType(namedConstructor("List"), Ts);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("UnsupportedNesting");
  });
});
