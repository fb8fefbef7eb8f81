import {
  type Argument, type MapType, type ParameterList, type ParameterSpec,
  type TypeArg, type TypeTerm,
  isSpread, isTypeList, typeArgsEqual, typeList, typeListToString, typeToString,
} from "./types.js";
import { type Substitution, SubstitutionBuilder } from "./substitution.js";
import type { BindError } from "./errors.js";
import { isVariableLength } from "./validator.js";

export type BindResult =
  | { ok: true; substitution: Substitution }
  | { ok: false; error: BindError };

export interface Split<T> {
  prefix: readonly T[];
  middle: readonly T[];
  suffix: readonly T[];
}

/**
 * Split `items` into a fixed prefix, a variable-length middle and a fixed
 * suffix. Undefined when there are too few items to fill both fixed parts.
 */
export function splitRun<T>(items: readonly T[], prefixLength: number, suffixLength: number): Split<T> | undefined {
  if (items.length < prefixLength + suffixLength) return undefined;
  return {
    prefix: items.slice(0, prefixLength),
    middle: items.slice(prefixLength, items.length - suffixLength),
    suffix: items.slice(items.length - suffixLength),
  };
}

/**
 * Bind a validated parameter list against supplied arguments. Slots before the
 * variable-length slot take arguments from the front, slots after it from the
 * back, and the variable-length slot takes whatever remains.
 */
export function bind(list: ParameterList, args: readonly Argument[]): BindResult {
  const positional = list.filter(p => p.role !== "restKeyword");
  const builder = new SubstitutionBuilder();
  const variadicIndex = positional.findIndex(isVariableLength);

  if (variadicIndex === -1) {
    if (args.length < positional.length) {
      return fail({ kind: "ArityTooFew", minimum: positional.length, received: args.length });
    }
    if (args.length > positional.length) {
      return fail({ kind: "ArityTooMany", maximum: positional.length, received: args.length });
    }
    for (let i = 0; i < positional.length; i++) {
      const err = bindSlot(positional[i], args[i], i, builder);
      if (err) return fail(err);
    }
    return { ok: true, substitution: builder.build() };
  }

  const prefix = positional.slice(0, variadicIndex);
  const suffix = positional.slice(variadicIndex + 1);
  const split = splitRun(args, prefix.length, suffix.length);
  if (!split) {
    return fail({ kind: "ArityTooFew", minimum: prefix.length + suffix.length, received: args.length });
  }

  for (let i = 0; i < prefix.length; i++) {
    const err = bindSlot(prefix[i], split.prefix[i], i, builder);
    if (err) return fail(err);
  }

  const restErr = bindRest(positional[variadicIndex], split.middle, prefix.length, builder);
  if (restErr) return fail(restErr);

  const suffixStart = args.length - suffix.length;
  for (let j = 0; j < suffix.length; j++) {
    const err = bindSlot(suffix[j], split.suffix[j], suffixStart + j, builder);
    if (err) return fail(err);
  }

  return { ok: true, substitution: builder.build() };
}

function fail(error: BindError): BindResult {
  return { ok: false, error };
}

function bindSlot(
  spec: ParameterSpec,
  arg: Argument,
  position: number,
  builder: SubstitutionBuilder,
): BindError | undefined {
  const mismatch = (reason: string): BindError => ({
    kind: "StructuralMismatch", position, expected: spec, received: arg, reason,
  });

  switch (spec.kind) {
    case "Fixed": {
      if (isTypeList(arg)) return mismatch(`'${spec.variable.name}' binds a single type, not a type list`);
      const previous = builder.boundType(spec.variable);
      if (!builder.bindType(spec.variable, arg)) {
        return mismatch(`'${spec.variable.name}' is already bound to '${previous ? typeToString(previous) : "?"}'`);
      }
      return undefined;
    }

    case "Concrete": {
      if (isTypeList(arg)) return mismatch("expected a single type, not a type list");
      if (!unify(spec.type, arg, builder)) return mismatch(`expected '${typeToString(spec.type)}'`);
      return undefined;
    }

    case "TupleUnexpanded": {
      if (!isTypeList(arg)) {
        return mismatch(`'${spec.variable.name}' takes an explicit type list such as '(int, str)'`);
      }
      const previous = builder.boundList(spec.variable);
      if (!builder.bindList(spec.variable, arg.elements)) {
        return mismatch(`'${spec.variable.name}' is already bound to '${previous ? typeListToString(previous) : "?"}'`);
      }
      return undefined;
    }

    case "TupleExpand":
      return mismatch(`'*${spec.variable.name}' cannot bind a single position`);
  }
}

function bindRest(
  spec: ParameterSpec,
  run: readonly Argument[],
  offset: number,
  builder: SubstitutionBuilder,
): BindError | undefined {
  if (spec.kind !== "TupleExpand") {
    // Homogeneous rest: every extra argument matches the same slot.
    for (let i = 0; i < run.length; i++) {
      const err = bindSlot(spec, run[i], offset + i, builder);
      if (err) return err;
    }
    return undefined;
  }

  const types: TypeTerm[] = [];
  for (let i = 0; i < run.length; i++) {
    const arg = run[i];
    if (isTypeList(arg)) {
      return {
        kind: "StructuralMismatch", position: offset + i, expected: spec, received: arg,
        reason: "an explicit type list cannot be part of a spread run",
      };
    }
    types.push(arg);
  }

  const previous = builder.boundList(spec.variable);
  if (!builder.bindList(spec.variable, types)) {
    return {
      kind: "StructuralMismatch", position: offset, expected: spec, received: typeList(...types),
      reason: `'${spec.variable.name}' is already bound to '${previous ? typeListToString(previous) : "?"}'`,
    };
  }
  return undefined;
}

// ============================================================
// Structural unification
// ============================================================

/**
 * Match a parameter type that may contain placeholders against a supplied
 * type, binding the placeholders it contains.
 */
export function unify(pattern: TypeTerm, actual: TypeTerm, builder: SubstitutionBuilder): boolean {
  if (pattern.kind === "Error" || actual.kind === "Error") return true;

  switch (pattern.kind) {
    case "Var":
      return builder.bindType(pattern.variable, actual);

    case "Named":
      return actual.kind === "Named" && actual.name === pattern.name && unifyArgs(pattern.args, actual.args, builder);

    case "Tuple":
      return actual.kind === "Tuple" && unifyArgs(pattern.elements, actual.elements, builder);

    case "TupleVar":
    case "Map": {
      if (actual.kind !== "Tuple") return false;
      const elements = concreteElements(actual.elements);
      return elements !== undefined && unifyList(pattern, elements, builder);
    }
  }
}

function unifyArgs(patternArgs: readonly TypeArg[], actualArgs: readonly TypeArg[], builder: SubstitutionBuilder): boolean {
  const actual = concreteElements(actualArgs);
  // An actual list that still carries spreads only matches an identical pattern.
  if (!actual) return typeArgsEqual(patternArgs, actualArgs);

  const spreadIndex = patternArgs.findIndex(isSpread);
  if (spreadIndex === -1) {
    if (patternArgs.length !== actual.length) return false;
    return unifyPairs(patternArgs, actual, builder);
  }

  const spreadArg = patternArgs[spreadIndex];
  const prefix = patternArgs.slice(0, spreadIndex);
  const suffix = patternArgs.slice(spreadIndex + 1);
  if (spreadArg.kind !== "Spread" || suffix.some(isSpread)) return false;

  const split = splitRun(actual, prefix.length, suffix.length);
  if (!split) return false;

  return unifyPairs(prefix, split.prefix, builder)
    && unifyList(spreadArg.operand, split.middle, builder)
    && unifyPairs(suffix, split.suffix, builder);
}

function unifyPairs(patterns: readonly TypeArg[], actual: readonly TypeTerm[], builder: SubstitutionBuilder): boolean {
  for (let i = 0; i < patterns.length; i++) {
    const p = patterns[i];
    if (p.kind === "Spread" || !unify(p, actual[i], builder)) return false;
  }
  return true;
}

/** Match a type-list pattern (tuple variable, literal tuple or Map) against concrete types. */
function unifyList(pattern: TypeTerm, types: readonly TypeTerm[], builder: SubstitutionBuilder): boolean {
  switch (pattern.kind) {
    case "TupleVar":
      return builder.bindList(pattern.variable, types);
    case "Tuple":
      return unifyArgs(pattern.elements, types, builder);
    case "Map":
      return unifyMapped(pattern, types, builder);
    default:
      return false;
  }
}

function unifyMapped(pattern: MapType, types: readonly TypeTerm[], builder: SubstitutionBuilder): boolean {
  const sources: TypeTerm[] = [];
  for (const t of types) {
    const source = pattern.constructor.unapply?.(t);
    if (source === undefined) return false;
    sources.push(source);
  }
  return unifyList(pattern.source, sources, builder);
}

function concreteElements(args: readonly TypeArg[]): TypeTerm[] | undefined {
  const out: TypeTerm[] = [];
  for (const arg of args) {
    if (arg.kind === "Spread") return undefined;
    out.push(arg);
  }
  return out;
}
