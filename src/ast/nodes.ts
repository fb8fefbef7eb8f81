import type { Span } from "../errors/diagnostic.js";
import type { TypeTerm } from "../checker/types.js";

// ============================================================
// Base
// ============================================================

interface BaseNode {
  span: Span;
  /** Resolved type, set by the checker on `check` targets. */
  resolvedType?: TypeTerm;
}

// ============================================================
// Module
// ============================================================

export interface ModuleDecl extends BaseNode {
  kind: "ModuleDecl";
  name: string;
  declarations: Declaration[];
}

// ============================================================
// Declarations
// ============================================================

export type Declaration = PlaceholderDecl | TypeDecl | FunctionDecl | CheckDecl;

/** `typevar T, U` or `tuplevar Ts`. */
export interface PlaceholderDecl extends BaseNode {
  kind: "PlaceholderDecl";
  variadic: boolean;
  names: PlaceholderName[];
}

export interface PlaceholderName extends BaseNode {
  kind: "PlaceholderName";
  name: string;
}

/** `type Name`, `type Name[params]` or `type Name[params] = body`. */
export interface TypeDecl extends BaseNode {
  kind: "TypeDecl";
  name: string;
  /** Null for a non-generic declaration. */
  params: TypeArgNode[] | null;
  body?: TypeNode;
}

export interface FunctionDecl extends BaseNode {
  kind: "FunctionDecl";
  name: string;
  params: Parameter[];
  returnType?: TypeNode;
}

export type RestKind = "none" | "positional" | "keyword";

export interface Parameter extends BaseNode {
  kind: "Parameter";
  name: string;
  rest: RestKind;
  typeAnnotation: TypeArgNode;
}

/** `check target` or `check target == expected`. */
export interface CheckDecl extends BaseNode {
  kind: "CheckDecl";
  target: CheckTarget;
  expected?: TypeNode;
}

export type CheckTarget = CallNode | TypeNode;

export interface CallNode extends BaseNode {
  kind: "Call";
  callee: string;
  args: TypeArgNode[];
}

// ============================================================
// Type References
// ============================================================

export type TypeNode = TypeRefNode | GroupNode;

export interface TypeRefNode extends BaseNode {
  kind: "TypeRef";
  name: string;
  /** Null when written without brackets; `Name[]` gives an empty list. */
  typeArgs: TypeArgNode[] | null;
}

/** Parenthesized type list: `()`, `(int,)`, `(int, str)`. */
export interface GroupNode extends BaseNode {
  kind: "Group";
  elements: TypeNode[];
}

export interface SpreadNode extends BaseNode {
  kind: "Spread";
  operand: TypeNode;
}

export type TypeArgNode = TypeNode | SpreadNode;
