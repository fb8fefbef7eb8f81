import type { ParameterList, ParameterSpec, TypeArg, TypeTerm } from "./types.js";
import { typeToString } from "./types.js";
import type { DefinitionError } from "./errors.js";

export type ValidationResult =
  | { ok: true }
  | { ok: false; errors: DefinitionError[] };

const VALID: ValidationResult = Object.freeze({ ok: true });

/** A slot that absorbs a variable number of positional arguments. */
export function isVariableLength(p: ParameterSpec): boolean {
  if (p.role === "restKeyword") return false;
  return p.kind === "TupleExpand" || p.role === "restPositional";
}

/**
 * Definition-time checks on a parameter list. Every violation is reported, in
 * declaration order.
 */
export function validate(list: ParameterList): ValidationResult {
  const errors: DefinitionError[] = [];
  let firstVariable = -1;

  list.forEach((p, position) => {
    if (isVariableLength(p)) {
      if (firstVariable === -1) {
        firstVariable = position;
      } else {
        errors.push({ kind: "MultipleExpansion", position, firstPosition: firstVariable });
      }
    }

    if (p.role === "restPositional" && p.kind === "TupleUnexpanded") {
      errors.push({ kind: "InvalidVarargBinding", position, variable: p.variable });
    }

    if (p.role === "restKeyword" && (p.kind === "TupleExpand" || p.kind === "TupleUnexpanded")) {
      errors.push({ kind: "InvalidKwargBinding", position, variable: p.variable });
    }

    if (p.kind === "Concrete") {
      checkNestedSpreads(p.type, position, errors);
    }
  });

  return errors.length === 0 ? VALID : { ok: false, errors };
}

// Each argument list inside a concrete parameter type holds at most one spread.
function checkNestedSpreads(t: TypeTerm, parameter: number, errors: DefinitionError[]): void {
  switch (t.kind) {
    case "Named":
      checkArgs(t.args, t, parameter, errors);
      break;
    case "Tuple":
      checkArgs(t.elements, t, parameter, errors);
      break;
    case "Map":
      checkNestedSpreads(t.source, parameter, errors);
      break;
    default:
      break;
  }
}

function checkArgs(args: readonly TypeArg[], owner: TypeTerm, parameter: number, errors: DefinitionError[]): void {
  let first = -1;
  args.forEach((arg, argument) => {
    if (arg.kind === "Spread") {
      if (first === -1) {
        first = argument;
      } else {
        errors.push({
          kind: "MultipleExpansion",
          position: parameter,
          firstPosition: parameter,
          within: { type: typeToString(owner), argument, firstArgument: first },
        });
      }
      checkNestedSpreads(arg.operand, parameter, errors);
    } else {
      checkNestedSpreads(arg, parameter, errors);
    }
  });
}

const cache = new WeakMap<ParameterList, ValidationResult>();

/**
 * Cached validation. A ParameterList is read-only after definition, so the
 * result is stored against the list's identity.
 */
export function validateDefinition(list: ParameterList): ValidationResult {
  const cached = cache.get(list);
  if (cached) return cached;
  const result = validate(list);
  cache.set(list, result);
  return result;
}
