// ============================================================
// Placeholders
// ============================================================

export interface TypeVariable {
  readonly kind: "TypeVariable";
  readonly name: string;
  /** Declaration site. Two placeholders are the same only if name and scope match. */
  readonly scope: string;
}

export interface TypeTupleVariable {
  readonly kind: "TypeTupleVariable";
  readonly name: string;
  readonly scope: string;
}

export type Placeholder = TypeVariable | TypeTupleVariable;

// ============================================================
// Types
// ============================================================

export type TypeTerm =
  | { readonly kind: "Named"; readonly name: string; readonly args: readonly TypeArg[] }
  | { readonly kind: "Tuple"; readonly elements: readonly TypeArg[] }
  | { readonly kind: "Var"; readonly variable: TypeVariable }
  | { readonly kind: "TupleVar"; readonly variable: TypeTupleVariable }
  | { readonly kind: "Map"; readonly constructor: TypeConstructor; readonly source: TypeTerm }
  | { readonly kind: "Error" };

export interface SpreadArg {
  readonly kind: "Spread";
  readonly operand: TypeTerm;
}

/** An entry of a type argument list: a type, or a spread spliced in place. */
export type TypeArg = TypeTerm | SpreadArg;

export type NamedType = Extract<TypeTerm, { kind: "Named" }>;
export type TupleType = Extract<TypeTerm, { kind: "Tuple" }>;
export type MapType = Extract<TypeTerm, { kind: "Map" }>;

export interface TypeConstructor {
  readonly name: string;
  apply(element: TypeTerm): TypeTerm;
  /** Inverse of `apply`, when the constructor is injective. Used when matching a Map pattern. */
  unapply?(type: TypeTerm): TypeTerm | undefined;
}

/** Explicit parenthesized list of types, e.g. `(int, str)`, supplied as one argument. */
export interface TypeListArg {
  readonly kind: "TypeList";
  readonly elements: readonly TypeTerm[];
}

export type Argument = TypeTerm | TypeListArg;

// ============================================================
// Parameters
// ============================================================

export type ParameterRole = "positional" | "restPositional" | "restKeyword";

interface ParameterBase {
  readonly role: ParameterRole;
  /** Source-level parameter name, for diagnostics only. */
  readonly name?: string;
}

export type ParameterSpec =
  | (ParameterBase & { readonly kind: "Fixed"; readonly variable: TypeVariable })
  | (ParameterBase & { readonly kind: "Concrete"; readonly type: TypeTerm })
  | (ParameterBase & { readonly kind: "TupleExpand"; readonly variable: TypeTupleVariable })
  | (ParameterBase & { readonly kind: "TupleUnexpanded"; readonly variable: TypeTupleVariable });

export type ParameterList = readonly ParameterSpec[];

// ============================================================
// Constructors
// ============================================================

export const GLOBAL_SCOPE = "<global>";
export const ERROR_TYPE: TypeTerm = { kind: "Error" };

export function typeVariable(name: string, scope: string = GLOBAL_SCOPE): TypeVariable {
  return Object.freeze({ kind: "TypeVariable", name, scope });
}

export function tupleVariable(name: string, scope: string = GLOBAL_SCOPE): TypeTupleVariable {
  return Object.freeze({ kind: "TypeTupleVariable", name, scope });
}

export function named(name: string, ...args: TypeArg[]): TypeTerm {
  return { kind: "Named", name, args };
}

export function tuple(...elements: TypeArg[]): TypeTerm {
  return { kind: "Tuple", elements };
}

export function varRef(variable: TypeVariable): TypeTerm {
  return { kind: "Var", variable };
}

export function tupleVarRef(variable: TypeTupleVariable): TypeTerm {
  return { kind: "TupleVar", variable };
}

export function spread(operand: TypeTerm | TypeTupleVariable): SpreadArg {
  return {
    kind: "Spread",
    operand: operand.kind === "TypeTupleVariable" ? tupleVarRef(operand) : operand,
  };
}

export function mapOf(constructor: TypeConstructor, source: TypeTerm | TypeTupleVariable): TypeTerm {
  return {
    kind: "Map",
    constructor,
    source: source.kind === "TypeTupleVariable" ? tupleVarRef(source) : source,
  };
}

export function typeList(...elements: TypeTerm[]): TypeListArg {
  return { kind: "TypeList", elements };
}

export function fixed(variable: TypeVariable, role: ParameterRole = "positional", name?: string): ParameterSpec {
  return { kind: "Fixed", variable, role, name };
}

export function concrete(type: TypeTerm, role: ParameterRole = "positional", name?: string): ParameterSpec {
  return { kind: "Concrete", type, role, name };
}

export function tupleExpand(variable: TypeTupleVariable, role: ParameterRole = "positional", name?: string): ParameterSpec {
  return { kind: "TupleExpand", variable, role, name };
}

export function tupleUnexpanded(variable: TypeTupleVariable, role: ParameterRole = "positional", name?: string): ParameterSpec {
  return { kind: "TupleUnexpanded", variable, role, name };
}

/** `C[t]` for a one-argument container such as List. */
export function namedConstructor(name: string): TypeConstructor {
  return {
    name,
    apply: (element) => named(name, element),
    unapply: (type) => {
      if (type.kind !== "Named" || type.name !== name || type.args.length !== 1) return undefined;
      const [arg] = type.args;
      return arg.kind === "Spread" ? undefined : arg;
    },
  };
}

export const TUPLE_CONSTRUCTOR: TypeConstructor = {
  name: "Tuple",
  apply: (element) => tuple(element),
  unapply: (type) => {
    if (type.kind !== "Tuple" || type.elements.length !== 1) return undefined;
    const [element] = type.elements;
    return element.kind === "Spread" ? undefined : element;
  },
};

// ============================================================
// Identity & equality
// ============================================================

export function placeholderKey(p: Placeholder): string {
  const prefix = p.kind === "TypeVariable" ? "T" : "Ts";
  return `${prefix}:${p.scope}:${p.name}`;
}

export function placeholdersEqual(a: Placeholder, b: Placeholder): boolean {
  return a.kind === b.kind && a.name === b.name && a.scope === b.scope;
}

export function isTypeList(arg: Argument): arg is TypeListArg {
  return arg.kind === "TypeList";
}

export function isSpread(arg: TypeArg): arg is SpreadArg {
  return arg.kind === "Spread";
}

export function typesEqual(a: TypeTerm, b: TypeTerm): boolean {
  if (a.kind === "Error" || b.kind === "Error") return true; // error propagation

  switch (a.kind) {
    case "Named":
      return b.kind === "Named" && a.name === b.name && typeArgsEqual(a.args, b.args);
    case "Tuple":
      return b.kind === "Tuple" && typeArgsEqual(a.elements, b.elements);
    case "Var":
      return b.kind === "Var" && placeholdersEqual(a.variable, b.variable);
    case "TupleVar":
      return b.kind === "TupleVar" && placeholdersEqual(a.variable, b.variable);
    case "Map":
      return b.kind === "Map" && a.constructor.name === b.constructor.name && typesEqual(a.source, b.source);
  }
}

export function typeArgsEqual(a: readonly TypeArg[], b: readonly TypeArg[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x.kind === "Spread" || y.kind === "Spread") {
      if (x.kind !== "Spread" || y.kind !== "Spread") return false;
      if (!typesEqual(x.operand, y.operand)) return false;
    } else if (!typesEqual(x, y)) {
      return false;
    }
  }
  return true;
}

export function typeListsEqual(a: readonly TypeTerm[], b: readonly TypeTerm[]): boolean {
  return a.length === b.length && a.every((t, i) => typesEqual(t, b[i]));
}

export function argumentsEqual(a: Argument, b: Argument): boolean {
  if (a.kind === "TypeList" || b.kind === "TypeList") {
    return a.kind === "TypeList" && b.kind === "TypeList" && typeListsEqual(a.elements, b.elements);
  }
  return typesEqual(a, b);
}

// ============================================================
// Printing
// ============================================================

export function typeToString(t: TypeTerm): string {
  switch (t.kind) {
    case "Named":
      return t.args.length === 0 ? t.name : `${t.name}[${t.args.map(typeArgToString).join(", ")}]`;
    case "Tuple":
      return t.elements.length === 0 ? "Tuple[()]" : `Tuple[${t.elements.map(typeArgToString).join(", ")}]`;
    case "Var": return t.variable.name;
    case "TupleVar": return t.variable.name;
    case "Map": return `Map[${t.constructor.name}, ${typeToString(t.source)}]`;
    case "Error": return "<error>";
  }
}

export function typeArgToString(arg: TypeArg): string {
  return arg.kind === "Spread" ? `*${typeToString(arg.operand)}` : typeToString(arg);
}

export function typeListToString(elements: readonly TypeTerm[]): string {
  if (elements.length === 1) return `(${typeToString(elements[0])},)`;
  return `(${elements.map(typeToString).join(", ")})`;
}

export function argumentToString(arg: Argument): string {
  return arg.kind === "TypeList" ? typeListToString(arg.elements) : typeToString(arg);
}

function annotationToString(p: ParameterSpec): string {
  switch (p.kind) {
    case "Fixed": return p.variable.name;
    case "Concrete": return typeToString(p.type);
    case "TupleExpand": return `*${p.variable.name}`;
    case "TupleUnexpanded": return p.variable.name;
  }
}

export function parameterToString(p: ParameterSpec): string {
  const annotation = annotationToString(p);
  const marker = p.role === "restPositional" ? "*" : p.role === "restKeyword" ? "**" : "";
  return p.name !== undefined ? `${marker}${p.name}: ${annotation}` : `${marker}${annotation}`;
}

export function parameterListToString(list: ParameterList): string {
  return `[${list.map(parameterToString).join(", ")}]`;
}

// ============================================================
// Traversal
// ============================================================

/** Collect every placeholder referenced by a type, in first-occurrence order. */
export function collectPlaceholders(t: TypeTerm, out: Placeholder[] = []): Placeholder[] {
  const add = (p: Placeholder) => {
    if (!out.some(q => placeholdersEqual(p, q))) out.push(p);
  };
  const visitArgs = (args: readonly TypeArg[]) => {
    for (const arg of args) collectPlaceholders(arg.kind === "Spread" ? arg.operand : arg, out);
  };

  switch (t.kind) {
    case "Var": add(t.variable); break;
    case "TupleVar": add(t.variable); break;
    case "Named": visitArgs(t.args); break;
    case "Tuple": visitArgs(t.elements); break;
    case "Map": collectPlaceholders(t.source, out); break;
    case "Error": break;
  }
  return out;
}

/** Placeholders a parameter can bind. */
export function parameterPlaceholders(p: ParameterSpec): Placeholder[] {
  switch (p.kind) {
    case "Fixed":
    case "TupleExpand":
    case "TupleUnexpanded":
      return [p.variable];
    case "Concrete":
      return collectPlaceholders(p.type);
  }
}
