import type { Argument, ParameterList, TypeTerm } from "./checker/types.js";
import type { Substitution } from "./checker/substitution.js";
import { type ValidationResult, validateDefinition as validateCached } from "./checker/validator.js";
import { type BindResult, bind } from "./checker/binder.js";
import { type ResolveResult, resolve as resolveType } from "./checker/expander.js";

/**
 * Definition-time check, run once per generic definition. Results are cached
 * against the list's identity.
 */
export function validateDefinition(list: ParameterList): ValidationResult {
  return validateCached(list);
}

/**
 * Bind one call or parameterized use. An invalid definition is terminal: the
 * call fails with its definition errors and binding is never attempted.
 */
export function bindCall(list: ParameterList, args: readonly Argument[]): BindResult {
  const validation = validateCached(list);
  if (!validation.ok) {
    return { ok: false, error: { kind: "InvalidDefinition", errors: validation.errors } };
  }
  return bind(list, args);
}

/** Substitute every placeholder in `type`, splicing spreads and evaluating Maps. */
export function resolve(type: TypeTerm, subst: Substitution): ResolveResult<TypeTerm> {
  return resolveType(type, subst);
}

export * from "./checker/types.js";
export {
  type Substitution, type TypeBinding, type ListBinding,
  EMPTY_SUBSTITUTION, SubstitutionBuilder,
  lookupType, lookupList, formatSubstitution, substitutionToRecord,
} from "./checker/substitution.js";
export {
  type DefinitionError, type BindError, type ResolveError, type EngineErrorKind,
  describeDefinitionError, describeBindError, describeResolveError,
} from "./checker/errors.js";
export { type ValidationResult, validate } from "./checker/validator.js";
export { type BindResult, bind, splitRun } from "./checker/binder.js";
export { type ResolveResult, expand, spliceArguments, resolveTypeList } from "./checker/expander.js";
export { type MapResult, mapType, mapElements } from "./checker/map.js";
export {
  type GenericDefinition, type CallBinding,
  DefinitionTable, acceptsArity, fixedArity,
} from "./checker/definitions.js";
export { checkSource, checkFile, type CheckOptions, type CheckResult } from "./compiler.js";
