import {
  type Argument, type ParameterSpec, type TypeTerm, type TypeTupleVariable,
  argumentToString, parameterToString, typeToString,
} from "./types.js";

// ============================================================
// Definition-time
// ============================================================

export type DefinitionError =
  | {
      kind: "MultipleExpansion";
      /** Index of the offending parameter in its list. */
      position: number;
      firstPosition: number;
      /** Set when the spreads sit in the argument list of a concrete parameter type. */
      within?: { type: string; argument: number; firstArgument: number };
    }
  | { kind: "InvalidVarargBinding"; position: number; variable: TypeTupleVariable }
  | { kind: "InvalidKwargBinding"; position: number; variable: TypeTupleVariable }
  | { kind: "ConflictingDefinition"; name: string; arity: number | "variadic" };

// ============================================================
// Call-time
// ============================================================

export type BindError =
  | { kind: "ArityTooFew"; minimum: number; received: number }
  | { kind: "ArityTooMany"; maximum: number; received: number }
  | {
      kind: "StructuralMismatch";
      /** 0-based argument position. */
      position: number;
      expected: ParameterSpec;
      received: Argument;
      reason: string;
    }
  | { kind: "NoMatchingSpecialization"; name: string; arities: number[]; received: number }
  | { kind: "InvalidDefinition"; errors: DefinitionError[] };

export type ResolveError =
  | { kind: "UnsupportedNesting"; source: TypeTerm; reason: string }
  | { kind: "InvalidSpread"; operand: TypeTerm };

export type EngineErrorKind = DefinitionError["kind"] | BindError["kind"] | ResolveError["kind"];

// ============================================================
// Messages
// ============================================================

export function describeDefinitionError(e: DefinitionError): string {
  switch (e.kind) {
    case "MultipleExpansion":
      return e.within !== undefined
        ? `More than one spread in the argument list of '${e.within.type}' (arguments ${e.within.firstArgument + 1} and ${e.within.argument + 1})`
        : `Parameter ${e.position + 1} is a second variable-length parameter (the first is parameter ${e.firstPosition + 1})`;
    case "InvalidVarargBinding":
      return `Tuple variable '${e.variable.name}' must be spread ('*${e.variable.name}') when used as the type of a rest-positional parameter`;
    case "InvalidKwargBinding":
      return `Tuple variable '${e.variable.name}' cannot be the type of a rest-keyword parameter`;
    case "ConflictingDefinition":
      return e.arity === "variadic"
        ? `'${e.name}' already has a variadic definition`
        : `'${e.name}' already has a definition taking ${e.arity} argument${e.arity === 1 ? "" : "s"}`;
  }
}

export function describeBindError(e: BindError): string {
  switch (e.kind) {
    case "ArityTooFew":
      return `Expected at least ${e.minimum} argument${e.minimum === 1 ? "" : "s"}, got ${e.received}`;
    case "ArityTooMany":
      return `Expected at most ${e.maximum} argument${e.maximum === 1 ? "" : "s"}, got ${e.received}`;
    case "StructuralMismatch":
      return `Argument ${e.position + 1} '${argumentToString(e.received)}' does not match parameter '${parameterToString(e.expected)}': ${e.reason}`;
    case "NoMatchingSpecialization":
      return `No definition of '${e.name}' takes ${e.received} argument${e.received === 1 ? "" : "s"} (accepted: ${e.arities.join(", ")})`;
    case "InvalidDefinition":
      return `Definition is invalid: ${e.errors.map(describeDefinitionError).join("; ")}`;
  }
}

export function describeResolveError(e: ResolveError): string {
  switch (e.kind) {
    case "UnsupportedNesting":
      return `Cannot evaluate '${typeToString(e.source)}': ${e.reason}`;
    case "InvalidSpread":
      return `'${typeToString(e.operand)}' is not a type list and cannot be spread`;
  }
}
