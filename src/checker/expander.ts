import {
  type TypeArg, type TypeTerm, type TypeTupleVariable,
  spread, tuple,
} from "./types.js";
import { type Substitution, lookupList, lookupType } from "./substitution.js";
import type { ResolveError } from "./errors.js";
import { mapElements } from "./map.js";

export type ResolveResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ResolveError };

function ok<T>(value: T): ResolveResult<T> {
  return { ok: true, value };
}

function fail<T>(error: ResolveError): ResolveResult<T> {
  return { ok: false, error };
}

/**
 * The ordered list bound to `ref`. An unbound variable expands to itself
 * (`*ref`), so splicing under a partial substitution leaves it in place.
 */
export function expand(ref: TypeTupleVariable, subst: Substitution): readonly TypeArg[] {
  return lookupList(subst, ref) ?? [spread(ref)];
}

/** Substitute every placeholder in `t`, splicing spreads and evaluating Maps. */
export function resolve(t: TypeTerm, subst: Substitution): ResolveResult<TypeTerm> {
  switch (t.kind) {
    case "Error":
      return ok(t);

    case "Var":
      return ok(lookupType(subst, t.variable) ?? t);

    case "TupleVar": {
      // Unspread, a type list behaves like the tuple of its types.
      const bound = lookupList(subst, t.variable);
      return ok(bound ? tuple(...bound) : t);
    }

    case "Named": {
      const args = spliceArguments(t.args, subst);
      if (!args.ok) return args;
      return ok({ kind: "Named", name: t.name, args: args.value });
    }

    case "Tuple": {
      const elements = spliceArguments(t.elements, subst);
      if (!elements.ok) return elements;
      return ok({ kind: "Tuple", elements: elements.value });
    }

    case "Map": {
      const types = resolveTypeList(t, subst);
      if (!types.ok) return types;
      return ok(tuple(...types.value));
    }
  }
}

/** Resolve each argument and splice each spread operand in place, keeping order. */
export function spliceArguments(args: readonly TypeArg[], subst: Substitution): ResolveResult<TypeArg[]> {
  const out: TypeArg[] = [];
  for (const arg of args) {
    if (arg.kind === "Spread") {
      const spliced = resolveSpread(arg.operand, subst);
      if (!spliced.ok) return spliced;
      out.push(...spliced.value);
    } else {
      const resolved = resolve(arg, subst);
      if (!resolved.ok) return resolved;
      out.push(resolved.value);
    }
  }
  return ok(out);
}

function resolveSpread(operand: TypeTerm, subst: Substitution): ResolveResult<readonly TypeArg[]> {
  switch (operand.kind) {
    case "TupleVar":
      return ok(expand(operand.variable, subst));

    case "Tuple":
      return spliceArguments(operand.elements, subst);

    case "Map":
      return resolveTypeList(operand, subst);

    case "Var": {
      const bound = lookupType(subst, operand.variable);
      if (bound === undefined) return ok([spread(operand)]);
      if (bound.kind === "Tuple") return ok(bound.elements);
      return fail({ kind: "InvalidSpread", operand: bound });
    }

    case "Error":
      return ok([operand]);

    case "Named":
      return fail({ kind: "InvalidSpread", operand });
  }
}

/**
 * Evaluate a type-list operand (tuple variable, literal tuple or Map) to a
 * fully resolved ordered list. Nested Maps are evaluated innermost first.
 */
export function resolveTypeList(source: TypeTerm, subst: Substitution): ResolveResult<readonly TypeTerm[]> {
  switch (source.kind) {
    case "TupleVar": {
      const bound = lookupList(subst, source.variable);
      if (bound === undefined) {
        return fail({ kind: "UnsupportedNesting", source, reason: `tuple variable '${source.variable.name}' is not bound` });
      }
      return ok(bound);
    }

    case "Tuple": {
      const spliced = spliceArguments(source.elements, subst);
      if (!spliced.ok) return spliced;
      const types: TypeTerm[] = [];
      for (const arg of spliced.value) {
        if (arg.kind === "Spread") {
          return fail({ kind: "UnsupportedNesting", source, reason: "it contains an unresolved spread" });
        }
        types.push(arg);
      }
      return ok(types);
    }

    case "Map": {
      const inner = resolveTypeList(source.source, subst);
      if (!inner.ok) return inner;
      return ok(mapElements(source.constructor, inner.value));
    }

    case "Var": {
      const bound = lookupType(subst, source.variable);
      if (bound === undefined) {
        return fail({ kind: "UnsupportedNesting", source, reason: `type variable '${source.variable.name}' is not bound` });
      }
      return bound.kind === "Tuple" ? resolveTypeList(bound, subst) : fail({ kind: "InvalidSpread", operand: bound });
    }

    case "Error":
      return ok([source]);

    case "Named":
      return fail({ kind: "InvalidSpread", operand: source });
  }
}
