import {
  type TypeConstructor, type TypeTerm, type TypeTupleVariable,
  tupleVarRef,
} from "./types.js";
import { type Substitution, EMPTY_SUBSTITUTION, lookupList } from "./substitution.js";
import type { ResolveError } from "./errors.js";

export type MapResult =
  | { ok: true; types: readonly TypeTerm[] }
  | { ok: false; error: ResolveError };

/** Element i of the result is `constructor(elements[i])`; the length never changes. */
export function mapElements(constructor: TypeConstructor, elements: readonly TypeTerm[]): readonly TypeTerm[] {
  return elements.map(e => constructor.apply(e));
}

/**
 * Apply `constructor` to every element of a variadic binding, or of a literal
 * ordered list. The result is itself an ordered list and can be mapped again:
 * `mapType(TUPLE_CONSTRUCTOR, mapType(TUPLE_CONSTRUCTOR, ts, subst))`. A failed
 * inner result is passed through unchanged.
 */
export function mapType(
  constructor: TypeConstructor,
  source: TypeTupleVariable | readonly TypeTerm[] | MapResult,
  subst: Substitution = EMPTY_SUBSTITUTION,
): MapResult {
  if (isList(source)) return { ok: true, types: mapElements(constructor, source) };
  if (isMapResult(source)) return source.ok ? { ok: true, types: mapElements(constructor, source.types) } : source;

  const bound = lookupList(subst, source);
  if (bound === undefined) {
    return {
      ok: false,
      error: {
        kind: "UnsupportedNesting",
        source: tupleVarRef(source),
        reason: `tuple variable '${source.name}' is not bound`,
      },
    };
  }
  return { ok: true, types: mapElements(constructor, bound) };
}

function isList(source: TypeTupleVariable | readonly TypeTerm[] | MapResult): source is readonly TypeTerm[] {
  return Array.isArray(source);
}

function isMapResult(source: TypeTupleVariable | MapResult): source is MapResult {
  return "ok" in source;
}
