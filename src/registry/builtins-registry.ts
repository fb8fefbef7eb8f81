// =============================================================================
// Built-in registry
// =============================================================================
//
// Every concrete type and generic constructor the checker knows without a
// declaration. The checker registers the generics in its definition table and
// `tvc introspect` prints this file's contents.
//
// To add a built-in generic, add an entry to BUILTIN_GENERICS. Parameter
// notation: "T" is a type variable, "*Ts" a spread tuple variable.

import {
  type ParameterList,
  fixed, tupleExpand, tupleVariable, typeVariable,
} from "../checker/types.js";
import type { GenericDefinition } from "../checker/definitions.js";

// -----------------------------------------------------------------------------
// Interfaces
// -----------------------------------------------------------------------------

export interface BuiltinType {
  name: string;
  doc: string;
}

export interface BuiltinGeneric {
  name: string;
  params: string[];
  doc: string;
  /** "container", "mapping", "wrapper" or "union" */
  category: string;
}

export const BUILTIN_SCOPE = "<builtin>";

/** Names with built-in meaning that cannot be declared. */
export const RESERVED_TYPE_NAMES: ReadonlySet<string> = new Set(["Tuple", "Map", "Expand"]);

// -----------------------------------------------------------------------------
// Concrete types
// -----------------------------------------------------------------------------

export const BUILTIN_TYPES: BuiltinType[] = [
  { name: "int", doc: "Arbitrary-precision integer." },
  { name: "float", doc: "Double-precision floating point number." },
  { name: "complex", doc: "Complex number." },
  { name: "str", doc: "Text string." },
  { name: "bytes", doc: "Immutable byte sequence." },
  { name: "bool", doc: "True or False." },
  { name: "None", doc: "The unit type." },
  { name: "object", doc: "Top of the nominal hierarchy." },
];

// -----------------------------------------------------------------------------
// Generic constructors
// -----------------------------------------------------------------------------

export const BUILTIN_GENERICS: BuiltinGeneric[] = [
  { name: "List", params: ["T"], doc: "Mutable sequence of T.", category: "container" },
  { name: "Set", params: ["T"], doc: "Mutable set of T.", category: "container" },
  { name: "FrozenSet", params: ["T"], doc: "Immutable set of T.", category: "container" },
  { name: "Sequence", params: ["T"], doc: "Read-only sequence of T.", category: "container" },
  { name: "Iterable", params: ["T"], doc: "Anything that yields T.", category: "container" },
  { name: "Iterator", params: ["T"], doc: "Stateful producer of T.", category: "container" },
  { name: "Dict", params: ["K", "V"], doc: "Mutable mapping from K to V.", category: "mapping" },
  { name: "Mapping", params: ["K", "V"], doc: "Read-only mapping from K to V.", category: "mapping" },
  { name: "Optional", params: ["T"], doc: "T or None.", category: "wrapper" },
  { name: "Type", params: ["T"], doc: "The class object of T.", category: "wrapper" },
  { name: "Awaitable", params: ["T"], doc: "Something that can be awaited to produce T.", category: "wrapper" },
  { name: "Union", params: ["*Ts"], doc: "Any one of Ts. Takes any number of members.", category: "union" },
];

// -----------------------------------------------------------------------------
// Query helpers
// -----------------------------------------------------------------------------

export function isBuiltinType(name: string): boolean {
  return BUILTIN_TYPES.some((t) => t.name === name);
}

export function getBuiltinsByCategory(category: string): BuiltinGeneric[] {
  return BUILTIN_GENERICS.filter((g) => g.category === category);
}

/** Parameter list of a built-in, with placeholders scoped to the built-in. */
export function builtinParameters(generic: BuiltinGeneric): ParameterList {
  const scope = `${BUILTIN_SCOPE}:${generic.name}`;
  return generic.params.map((p) =>
    p.startsWith("*")
      ? tupleExpand(tupleVariable(p.slice(1), scope))
      : fixed(typeVariable(p, scope)),
  );
}

export function builtinDefinitions(): GenericDefinition[] {
  return BUILTIN_GENERICS.map((g): GenericDefinition => ({
    name: g.name,
    kind: "type",
    parameters: builtinParameters(g),
  }));
}
