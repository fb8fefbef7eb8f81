import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { error, warning } from "../errors/diagnostic.js";
import type {
  ModuleDecl, TypeDecl, FunctionDecl, CheckDecl, PlaceholderDecl, CallNode,
  TypeNode, TypeArgNode, TypeRefNode, RestKind,
} from "../ast/nodes.js";
import {
  type Argument, type ParameterList, type ParameterRole, type ParameterSpec,
  type NamedType, type Placeholder, type TypeArg, type TypeConstructor, type TypeTerm,
  ERROR_TYPE, TUPLE_CONSTRUCTOR,
  argumentToString, collectPlaceholders, concrete, fixed, named, namedConstructor,
  parameterListToString, parameterPlaceholders, parameterToString, placeholdersEqual,
  spread, tuple, tupleExpand, tupleUnexpanded, tupleVarRef, tupleVariable,
  typeList, typeToString, typeVariable, typesEqual, varRef,
} from "./types.js";
import { type Substitution, EMPTY_SUBSTITUTION, SubstitutionBuilder } from "./substitution.js";
import {
  type BindError, type DefinitionError, type ResolveError,
  describeBindError, describeDefinitionError, describeResolveError,
} from "./errors.js";
import { resolve, resolveTypeList } from "./expander.js";
import { type GenericDefinition, DefinitionTable } from "./definitions.js";
import { splitRun, unify } from "./binder.js";
import {
  RESERVED_TYPE_NAMES, builtinDefinitions, isBuiltinType,
} from "../registry/builtins-registry.js";

export interface InstantiationReport {
  kind: "call" | "type";
  /** The instantiation as written, after spreads are spliced: `to_tuple(int, str)`. */
  target: string;
  /** Signature of the definition that was selected, if any. */
  definition?: string;
  substitution: Substitution;
  result: TypeTerm;
  span: Span;
}

const NONE_TYPE = named("None");

export class Checker {
  private types = new DefinitionTable();
  private functions = new DefinitionTable();
  private placeholders = new Map<string, Placeholder>();
  // Declared non-generic names (`type Batch`).
  private concreteNames = new Set<string>();
  // Aliases whose body reaches their own name; never expanded.
  private recursiveAliases = new Set<string>();
  // Map constructors whose arity is checked once all definitions are known.
  private pendingConstructors: { name: string; span: Span }[] = [];
  private diagnostics: Diagnostic[] = [];
  private reports: InstantiationReport[] = [];
  private moduleName = "<module>";
  private builtinsRegistered = false;

  check(module: ModuleDecl): Diagnostic[] {
    this.diagnostics = [];
    this.reports = [];
    this.moduleName = module.name;

    if (!this.builtinsRegistered) {
      for (const def of builtinDefinitions()) this.types.define(def);
      this.builtinsRegistered = true;
    }

    // First pass: placeholders, so definitions can use them in any order
    for (const decl of module.declarations) {
      if (decl.kind === "PlaceholderDecl") this.registerPlaceholders(decl);
    }

    // Second pass: non-generic type names
    for (const decl of module.declarations) {
      if (decl.kind === "TypeDecl" && decl.params === null && !decl.body) {
        this.registerConcreteName(decl);
      }
    }

    // Third pass: generic types, then functions, whose parameter types may use any alias
    const defined: { definition: GenericDefinition; resultNode?: TypeNode; paramSpans: Span[] }[] = [];
    const aliases: { definition: GenericDefinition; span: Span }[] = [];
    for (const decl of module.declarations) {
      if (decl.kind === "TypeDecl" && (decl.params !== null || decl.body)) {
        const definition = this.defineType(decl);
        if (definition) {
          defined.push({ definition, resultNode: decl.body, paramSpans: (decl.params ?? []).map(p => p.span) });
          if (definition.result) aliases.push({ definition, span: decl.span });
        }
      }
    }
    this.findRecursiveAliases(aliases);
    for (const decl of module.declarations) {
      if (decl.kind === "FunctionDecl") {
        const definition = this.defineFunction(decl);
        if (definition) {
          defined.push({ definition, resultNode: decl.returnType, paramSpans: decl.params.map(p => p.span) });
        }
      }
    }

    // Every definition is registered now, so nested uses of generics can be bound
    this.flushConstructorChecks();
    for (const { definition, resultNode, paramSpans } of defined) {
      definition.parameters.forEach((p, i) => {
        if (p.kind === "Concrete") this.checkWellFormed(p.type, paramSpans[i] ?? definition.span);
      });
      if (definition.result && resultNode) this.checkWellFormed(definition.result, resultNode.span);
    }

    // Fourth pass: instantiations
    for (const decl of module.declarations) {
      if (decl.kind === "CheckDecl") this.checkInstantiation(decl);
    }
    this.flushConstructorChecks();

    return this.diagnostics;
  }

  getReports(): InstantiationReport[] {
    return this.reports;
  }

  // ============================================================
  // Declarations
  // ============================================================

  private registerPlaceholders(decl: PlaceholderDecl): void {
    for (const { name, span } of decl.names) {
      if (this.placeholders.has(name) || RESERVED_TYPE_NAMES.has(name) || isBuiltinType(name)) {
        this.diagnostics.push(error("DuplicateDeclaration", `'${name}' is already declared`, span));
        continue;
      }
      const scope = `${this.moduleName}@${span.start.line}:${span.start.column}`;
      this.placeholders.set(name, decl.variadic ? tupleVariable(name, scope) : typeVariable(name, scope));
    }
  }

  private registerConcreteName(decl: TypeDecl): void {
    if (!this.checkDeclarableName(decl.name, decl.span)) return;
    if (this.concreteNames.has(decl.name)) {
      this.diagnostics.push(error("DuplicateDeclaration", `Type '${decl.name}' is already declared`, decl.span));
      return;
    }
    this.concreteNames.add(decl.name);
  }

  private checkDeclarableName(name: string, span: Span): boolean {
    if (RESERVED_TYPE_NAMES.has(name)) {
      this.diagnostics.push(error("DuplicateDeclaration", `'${name}' is a built-in operator and cannot be declared`, span));
      return false;
    }
    if (isBuiltinType(name) || (this.types.has(name) && this.isBuiltinGeneric(name))) {
      this.diagnostics.push(error("DuplicateDeclaration", `'${name}' is a built-in type`, span));
      return false;
    }
    if (this.placeholders.has(name)) {
      this.diagnostics.push(error("DuplicateDeclaration", `'${name}' is already declared as a placeholder`, span));
      return false;
    }
    return true;
  }

  private isBuiltinGeneric(name: string): boolean {
    return this.types.lookup(name).some(d => d.span === undefined);
  }

  private defineType(decl: TypeDecl): GenericDefinition | undefined {
    if (!this.checkDeclarableName(decl.name, decl.span)) return undefined;
    if (this.concreteNames.has(decl.name)) {
      this.diagnostics.push(error("DuplicateDeclaration", `Type '${decl.name}' is already declared as non-generic`, decl.span));
      return undefined;
    }

    const parameters = (decl.params ?? []).map(p => this.lowerParameter(p, "none"));
    const result = decl.body ? this.lowerType(decl.body) : undefined;
    const definition: GenericDefinition = { name: decl.name, kind: "type", parameters, result, span: decl.span };

    const spans = (decl.params ?? []).map(p => p.span);
    this.reportDefinitionErrors(this.types.define(definition), decl.span, spans);
    if (result && decl.body) this.warnUnboundResult(parameters, result, decl.body.span);
    return definition;
  }

  private defineFunction(decl: FunctionDecl): GenericDefinition | undefined {
    if (this.placeholders.has(decl.name)) {
      this.diagnostics.push(error("DuplicateDeclaration", `'${decl.name}' is already declared as a placeholder`, decl.span));
      return undefined;
    }

    const parameters = decl.params
      .map(p => this.lowerParameter(p.typeAnnotation, p.rest, p.name))
      .map(p => (p.kind === "Concrete" ? { ...p, type: this.expandPattern(p.type) } : p));
    const result = decl.returnType ? this.lowerType(decl.returnType) : NONE_TYPE;
    const definition: GenericDefinition = { name: decl.name, kind: "function", parameters, result, span: decl.span };

    this.reportDefinitionErrors(this.functions.define(definition), decl.span, decl.params.map(p => p.span));
    if (decl.returnType) this.warnUnboundResult(parameters, result, decl.returnType.span);
    return definition;
  }

  private reportDefinitionErrors(errors: DefinitionError[], declSpan: Span, paramSpans: Span[]): void {
    for (const e of errors) {
      const span = e.kind === "ConflictingDefinition" ? declSpan : paramSpans[e.position] ?? declSpan;
      this.diagnostics.push(error(e.kind, describeDefinitionError(e), span, definitionHelp(e)));
    }
  }

  /** Report every alias whose expansion reaches its own name, directly or through other aliases. */
  private findRecursiveAliases(aliases: { definition: GenericDefinition; span: Span }[]): void {
    const edges = new Map<string, Set<string>>();
    for (const { definition } of aliases) {
      const targets = edges.get(definition.name) ?? new Set<string>();
      if (definition.result) referencedNames(definition.result, targets);
      edges.set(definition.name, targets);
    }

    const reaches = (from: string, target: string, seen: Set<string>): boolean => {
      for (const next of edges.get(from) ?? []) {
        if (next === target) return true;
        if (seen.has(next)) continue;
        seen.add(next);
        if (reaches(next, target, seen)) return true;
      }
      return false;
    };

    for (const { definition, span } of aliases) {
      if (this.recursiveAliases.has(definition.name) || !reaches(definition.name, definition.name, new Set())) continue;
      this.recursiveAliases.add(definition.name);
      this.diagnostics.push(error(
        "RecursiveAlias",
        `Type alias '${definition.name}' expands to itself`,
        span,
        `Declare '${definition.name}' without a body to make it a nominal type`,
      ));
    }
  }

  private warnUnboundResult(parameters: ParameterList, result: TypeTerm, span: Span): void {
    const bound: Placeholder[] = parameters.flatMap(parameterPlaceholders);
    for (const p of collectPlaceholders(result)) {
      if (!bound.some(b => placeholdersEqual(b, p))) {
        this.diagnostics.push(warning(
          "UnboundResultPlaceholder",
          `'${p.name}' appears in the result but no parameter binds it`,
          span,
        ));
      }
    }
  }

  // ============================================================
  // Lowering
  // ============================================================

  private lowerParameter(node: TypeArgNode, rest: RestKind, name?: string): ParameterSpec {
    const role: ParameterRole =
      rest === "positional" ? "restPositional" : rest === "keyword" ? "restKeyword" : "positional";

    const spreadOperand = this.spreadOperandOf(node);
    if (spreadOperand) {
      const p = spreadOperand.kind === "TypeRef" && spreadOperand.typeArgs === null
        ? this.placeholders.get(spreadOperand.name)
        : undefined;
      if (p?.kind === "TypeTupleVariable") return tupleExpand(p, role, name);
      this.diagnostics.push(error(
        "InvalidSpread",
        "Only a tuple variable can be spread in a parameter list",
        node.span,
        "Declare it with 'tuplevar' and write '*Ts'",
      ));
      return concrete(ERROR_TYPE, role, name);
    }

    if (node.kind === "TypeRef" && node.typeArgs === null) {
      const p = this.placeholders.get(node.name);
      if (p?.kind === "TypeVariable") return fixed(p, role, name);
      if (p?.kind === "TypeTupleVariable") return tupleUnexpanded(p, role, name);
    }

    if (node.kind === "Spread") return concrete(ERROR_TYPE, role, name); // unreachable: handled above
    return concrete(this.lowerType(node), role, name);
  }

  /** `*X` and `Expand[X]` both spread X. */
  private spreadOperandOf(node: TypeArgNode): TypeNode | undefined {
    if (node.kind === "Spread") return node.operand;
    if (node.kind === "TypeRef" && node.name === "Expand") {
      const args = node.typeArgs ?? [];
      const [operand] = args;
      if (args.length !== 1 || operand.kind === "Spread") {
        this.diagnostics.push(error("InvalidSpread", "Expand takes exactly one type list", node.span));
        return undefined;
      }
      return operand;
    }
    return undefined;
  }

  private lowerTypeArgs(nodes: TypeArgNode[]): TypeArg[] {
    return nodes.map(n => this.lowerTypeArg(n));
  }

  private lowerTypeArg(node: TypeArgNode): TypeArg {
    const operand = this.spreadOperandOf(node);
    if (operand) return spread(this.lowerSpreadOperand(operand));
    if (node.kind === "Spread") return ERROR_TYPE;
    if (node.kind === "TypeRef" && node.name === "Expand") return ERROR_TYPE; // reported by spreadOperandOf
    return this.lowerType(node);
  }

  private lowerSpreadOperand(node: TypeNode): TypeTerm {
    const t = this.lowerType(node);
    switch (t.kind) {
      case "TupleVar":
      case "Tuple":
      case "Map":
      case "Error":
        return t;
      case "Var":
        this.diagnostics.push(error(
          "InvalidSpread",
          `'${t.variable.name}' is a type variable; only tuple variables can be spread`,
          node.span,
          `Declare it with 'tuplevar ${t.variable.name}'`,
        ));
        return ERROR_TYPE;
      case "Named":
        this.diagnostics.push(error("InvalidSpread", `'${typeToString(t)}' is not a type list and cannot be spread`, node.span));
        return ERROR_TYPE;
    }
  }

  private lowerType(node: TypeNode): TypeTerm {
    if (node.kind === "Group") {
      this.diagnostics.push(error(
        "UnexpectedTypeList",
        "A parenthesized type list is only allowed as an argument of a check",
        node.span,
        "Use Tuple[...] for a tuple type",
      ));
      return ERROR_TYPE;
    }

    switch (node.name) {
      case "Map": return this.lowerMap(node);
      case "Tuple": return this.lowerTuple(node);
      case "Expand":
        this.diagnostics.push(error("InvalidSpread", "Expand[...] is only allowed inside a type argument list", node.span));
        return ERROR_TYPE;
    }

    const p = this.placeholders.get(node.name);
    if (p) {
      if (node.typeArgs !== null) {
        this.diagnostics.push(error("NotGeneric", `Placeholder '${node.name}' does not take type arguments`, node.span));
        return ERROR_TYPE;
      }
      return p.kind === "TypeVariable" ? varRef(p) : tupleVarRef(p);
    }

    if (node.typeArgs !== null && (isBuiltinType(node.name) || this.concreteNames.has(node.name))) {
      this.diagnostics.push(error("NotGeneric", `Type '${node.name}' is not generic`, node.span));
      return ERROR_TYPE;
    }

    return named(node.name, ...this.lowerTypeArgs(node.typeArgs ?? []));
  }

  private lowerTuple(node: TypeRefNode): TypeTerm {
    if (node.typeArgs === null) {
      this.diagnostics.push(error("NotGeneric", "Tuple needs its element types", node.span, "Write Tuple[()] for the empty tuple"));
      return ERROR_TYPE;
    }
    const [only] = node.typeArgs;
    if (node.typeArgs.length === 1 && only.kind === "Group" && only.elements.length === 0) {
      return tuple();
    }
    return tuple(...this.lowerTypeArgs(node.typeArgs));
  }

  private lowerMap(node: TypeRefNode): TypeTerm {
    const args = node.typeArgs ?? [];
    const [ctorNode, sourceNode] = args;
    if (args.length !== 2 || ctorNode.kind !== "TypeRef" || ctorNode.typeArgs !== null || sourceNode.kind === "Spread") {
      this.diagnostics.push(error(
        "InvalidMap",
        "Map takes a constructor name and a type list",
        node.span,
        "Write Map[List, Ts]",
      ));
      return ERROR_TYPE;
    }

    const ctorName = ctorNode.name;
    if (this.placeholders.has(ctorName)) {
      this.diagnostics.push(error("InvalidMap", `Placeholder '${ctorName}' cannot be used as a Map constructor`, ctorNode.span));
      return ERROR_TYPE;
    }
    if (isBuiltinType(ctorName) || this.concreteNames.has(ctorName)) {
      this.diagnostics.push(error("MapConstructorArity", `'${ctorName}' is not generic and cannot be mapped`, ctorNode.span));
      return ERROR_TYPE;
    }
    this.pendingConstructors.push({ name: ctorName, span: ctorNode.span });

    const source = this.lowerType(sourceNode);
    if (source.kind !== "TupleVar" && source.kind !== "Tuple" && source.kind !== "Map" && source.kind !== "Error") {
      this.diagnostics.push(error(
        "InvalidMap",
        `Map source '${typeToString(source)}' must be a tuple variable, Tuple[...] or Map[...]`,
        sourceNode.span,
      ));
      return ERROR_TYPE;
    }

    const constructor = ctorName === "Tuple" ? TUPLE_CONSTRUCTOR : namedConstructor(ctorName);
    return { kind: "Map", constructor, source };
  }

  private flushConstructorChecks(): void {
    for (const { name, span } of this.pendingConstructors) {
      if (this.types.has(name) && !this.types.accepts(name, 1)) {
        this.diagnostics.push(error(
          "MapConstructorArity",
          `Map constructor '${name}' must accept exactly one type argument`,
          span,
        ));
      }
    }
    this.pendingConstructors = [];
  }

  // ============================================================
  // Well-formedness
  // ============================================================

  /** Bind every use of a known generic inside `t`, reporting arity and structure errors. */
  private checkWellFormed(t: TypeTerm, span: Span | undefined): void {
    if (!span) return;
    this.normalize(t, span, false);
  }

  /**
   * Walk a type, binding every use of a known generic. With `expandAliases`, a
   * use of a generic alias is replaced by its resolved body.
   */
  private normalize(t: TypeTerm, span: Span, expandAliases: boolean): TypeTerm {
    const normalizeArgs = (args: readonly TypeArg[]): TypeArg[] =>
      args.map(a => a.kind === "Spread"
        ? spread(this.normalize(a.operand, span, expandAliases))
        : this.normalize(a, span, expandAliases));

    switch (t.kind) {
      case "Named": {
        const args = normalizeArgs(t.args);
        const self = named(t.name, ...args);
        if (!this.types.has(t.name)) return self;

        const concreteArgs: TypeTerm[] = [];
        for (const a of args) {
          if (a.kind === "Spread") return self; // length unknown until the spread is bound
          concreteArgs.push(a);
        }

        // Inside a definition the arguments still hold placeholders, so only the count is checked.
        if (!expandAliases && this.types.accepts(t.name, concreteArgs.length)) return self;

        const definition = this.types.select(t.name, concreteArgs.length);
        const call = this.types.bindCall(t.name, definition ? argumentsFor(definition.parameters, concreteArgs) : concreteArgs);
        if (!call.result.ok) {
          this.reportBindError(call.result.error, span, [], `In '${typeToString(self)}': `);
          return self;
        }
        if (!expandAliases || !call.definition?.result || this.recursiveAliases.has(t.name)) return self;

        const body = resolve(call.definition.result, call.result.substitution);
        if (!body.ok) {
          this.reportResolveError(body.error, span);
          return self;
        }
        return this.normalize(body.value, span, expandAliases);
      }
      case "Tuple":
        return tuple(...normalizeArgs(t.elements));
      default:
        return t;
    }
  }

  /**
   * Expand alias uses inside a parameter type, the way call-site arguments are
   * expanded before binding. A use that does not bind yet (a spread, or a bare
   * tuple variable in a type list slot) keeps the alias name.
   */
  private expandPattern(t: TypeTerm): TypeTerm {
    const expandArgs = (args: readonly TypeArg[]): TypeArg[] =>
      args.map(a => (a.kind === "Spread" ? spread(this.expandPattern(a.operand)) : this.expandPattern(a)));

    switch (t.kind) {
      case "Named": {
        const self: NamedType = { kind: "Named", name: t.name, args: expandArgs(t.args) };
        const body = this.expandAlias(self);
        return body ? this.expandPattern(body) : self;
      }
      case "Tuple":
        return tuple(...expandArgs(t.elements));
      case "Map":
        return { kind: "Map", constructor: this.patternConstructor(t.constructor), source: this.expandPattern(t.source) };
      default:
        return t;
    }
  }

  /** Body of an alias use with its parameters substituted; undefined if `t` is not one or does not bind. */
  private expandAlias(t: NamedType): TypeTerm | undefined {
    if (this.recursiveAliases.has(t.name)) return undefined;
    const args: TypeTerm[] = [];
    for (const a of t.args) {
      if (a.kind === "Spread") return undefined;
      args.push(a);
    }
    const definition = this.types.select(t.name, args.length);
    if (!definition?.result) return undefined;

    const call = this.types.bindCall(t.name, argumentsFor(definition.parameters, args));
    if (!call.result.ok || !call.definition?.result) return undefined;
    const body = resolve(call.definition.result, call.result.substitution);
    return body.ok ? body.value : undefined;
  }

  /**
   * A Map constructor naming a one-parameter alias applies the alias and
   * matches against its expanded body.
   */
  private patternConstructor(constructor: TypeConstructor): TypeConstructor {
    if (this.recursiveAliases.has(constructor.name)) return constructor;
    const definition = this.types.select(constructor.name, 1);
    if (!definition?.result || definition.parameters.length !== 1) return constructor;
    const [parameter] = definition.parameters;
    if (parameter.kind !== "Fixed") return constructor;

    const body = this.expandPattern(definition.result);
    const variable = parameter.variable;
    return {
      name: constructor.name,
      apply: (element) => this.expandPattern(named(constructor.name, element)),
      unapply: (type) => {
        const builder = new SubstitutionBuilder();
        return unify(body, type, builder) ? builder.boundType(variable) : undefined;
      },
    };
  }

  // ============================================================
  // Instantiations
  // ============================================================

  private checkInstantiation(decl: CheckDecl): void {
    this.flushConstructorChecks();
    const target = decl.target;

    let report: InstantiationReport | undefined;
    if (target.kind === "Call") {
      report = this.checkCall(target);
    } else if (target.kind === "TypeRef" && target.typeArgs !== null && this.types.has(target.name)) {
      report = this.checkTypeApplication(target);
    } else {
      report = this.checkPlainType(target);
    }
    if (!report) return;

    target.resolvedType = report.result;
    this.reports.push(report);

    if (decl.expected) {
      const expected = this.lowerType(decl.expected);
      const resolved = resolve(expected, EMPTY_SUBSTITUTION);
      if (!resolved.ok) {
        this.reportResolveError(resolved.error, decl.expected.span);
        return;
      }
      const normalized = this.normalize(resolved.value, decl.expected.span, true);
      if (!typesEqual(report.result, normalized)) {
        this.diagnostics.push(error(
          "AssertionFailed",
          `Expected '${typeToString(normalized)}', got '${typeToString(report.result)}'`,
          decl.span,
        ));
      }
    }
  }

  private checkCall(node: CallNode): InstantiationReport | undefined {
    if (!this.functions.has(node.callee)) {
      this.diagnostics.push(error("UnknownGeneric", `Unknown function '${node.callee}'`, node.span));
      return undefined;
    }

    const lowered = this.lowerArguments(node.args);
    if (!lowered) return undefined;

    const call = this.functions.bindCall(node.callee, lowered.args);
    if (!call.result.ok) {
      this.reportBindError(call.result.error, node.span, lowered.spans);
      return undefined;
    }

    const definition = call.definition;
    const substitution = call.result.substitution;
    const returnType = definition?.result ?? NONE_TYPE;
    const resolved = resolve(returnType, substitution);
    if (!resolved.ok) {
      this.reportResolveError(resolved.error, node.span);
      return undefined;
    }

    return {
      kind: "call",
      target: `${node.callee}(${lowered.args.map(argumentToString).join(", ")})`,
      definition: definition ? signature(definition) : undefined,
      substitution,
      result: this.normalize(resolved.value, node.span, true),
      span: node.span,
    };
  }

  private checkTypeApplication(node: TypeRefNode): InstantiationReport | undefined {
    const lowered = this.lowerArguments(node.typeArgs ?? []);
    if (!lowered) return undefined;

    const call = this.types.bindCall(node.name, lowered.args);
    if (!call.result.ok) {
      this.reportBindError(call.result.error, node.span, lowered.spans);
      return undefined;
    }

    const definition = call.definition;
    const substitution = call.result.substitution;
    const target = `${node.name}[${lowered.args.map(argumentToString).join(", ")}]`;

    let result: TypeTerm;
    if (definition?.result) {
      const resolved = resolve(definition.result, substitution);
      if (!resolved.ok) {
        this.reportResolveError(resolved.error, node.span);
        return undefined;
      }
      result = this.normalize(resolved.value, node.span, true);
    } else {
      // Explicit type lists show as the tuples they denote.
      const args = lowered.args.map(a => (a.kind === "TypeList" ? tuple(...a.elements) : a));
      result = named(node.name, ...args.map(a => this.normalize(a, node.span, true)));
    }

    return {
      kind: "type",
      target,
      definition: definition ? signature(definition) : undefined,
      substitution,
      result,
      span: node.span,
    };
  }

  private checkPlainType(node: TypeNode): InstantiationReport | undefined {
    const before = this.diagnostics.length;
    const lowered = this.lowerType(node);
    if (this.diagnostics.length > before) return undefined;

    const resolved = resolve(lowered, EMPTY_SUBSTITUTION);
    if (!resolved.ok) {
      this.reportResolveError(resolved.error, node.span);
      return undefined;
    }
    return {
      kind: "type",
      target: typeToString(lowered),
      substitution: EMPTY_SUBSTITUTION,
      result: this.normalize(resolved.value, node.span, true),
      span: node.span,
    };
  }

  /**
   * Lower call-site arguments. Groups become explicit type lists; spreads of
   * concrete tuples are spliced in place, so a spread argument may expand to
   * several positions that all share its span.
   */
  private lowerArguments(nodes: TypeArgNode[]): { args: Argument[]; spans: Span[] } | undefined {
    const before = this.diagnostics.length;
    const args: Argument[] = [];
    const spans: Span[] = [];

    for (const node of nodes) {
      if (node.kind === "Group") {
        const elements: TypeTerm[] = [];
        for (const element of node.elements) {
          const resolved = this.lowerClosedType(element);
          if (resolved) elements.push(resolved);
        }
        args.push(typeList(...elements));
        spans.push(node.span);
        continue;
      }

      const operand = this.spreadOperandOf(node);
      if (operand) {
        const list = resolveTypeList(this.lowerSpreadOperand(operand), EMPTY_SUBSTITUTION);
        if (!list.ok) {
          this.reportResolveError(list.error, node.span);
          continue;
        }
        for (const t of list.value) {
          args.push(t);
          spans.push(node.span);
        }
        continue;
      }

      if (node.kind === "Spread") continue;
      const resolved = this.lowerClosedType(node);
      if (resolved) {
        args.push(resolved);
        spans.push(node.span);
      }
    }

    return this.diagnostics.length > before ? undefined : { args, spans };
  }

  /** Lower and resolve a type written at a call site, where no placeholder is bound. */
  private lowerClosedType(node: TypeNode): TypeTerm | undefined {
    const resolved = resolve(this.lowerType(node), EMPTY_SUBSTITUTION);
    if (!resolved.ok) {
      this.reportResolveError(resolved.error, node.span);
      return undefined;
    }
    return this.normalize(resolved.value, node.span, true);
  }

  // ============================================================
  // Reporting
  // ============================================================

  private reportBindError(e: BindError, span: Span, argSpans: Span[], prefix = ""): void {
    const at = e.kind === "StructuralMismatch" ? argSpans[e.position] ?? span : span;
    this.diagnostics.push(error(e.kind, prefix + describeBindError(e), at, bindHelp(e)));
  }

  private reportResolveError(e: ResolveError, span: Span): void {
    this.diagnostics.push(error(e.kind, describeResolveError(e), span));
  }
}

// ============================================================
// Helpers
// ============================================================

function signature(definition: GenericDefinition): string {
  const params = definition.parameters.map(parameterToString).join(", ");
  if (definition.kind === "function") {
    return `${definition.name}(${params}) -> ${typeToString(definition.result ?? NONE_TYPE)}`;
  }
  const head = `${definition.name}${parameterListToString(definition.parameters)}`;
  return definition.result ? `${head} = ${typeToString(definition.result)}` : head;
}

/**
 * Arguments for a nested use of a generic. Inside a type, an explicit type list
 * is only visible as the tuple it denotes, so tuples in unexpanded tuple slots
 * are turned back into type lists.
 */
function argumentsFor(parameters: ParameterList, args: readonly TypeTerm[]): Argument[] {
  const positional = parameters.filter(p => p.role !== "restKeyword");
  const variadic = positional.findIndex(p => p.kind === "TupleExpand" || p.role === "restPositional");
  const prefix = variadic === -1 ? positional : positional.slice(0, variadic);
  const suffix = variadic === -1 ? [] : positional.slice(variadic + 1);
  const split = splitRun(args, prefix.length, suffix.length);
  if (!split) return [...args];

  const convert = (p: ParameterSpec | undefined, a: TypeTerm): Argument =>
    p?.kind === "TupleUnexpanded" && a.kind === "Tuple" && a.elements.every(e => e.kind !== "Spread")
      ? typeList(...a.elements.flatMap(e => (e.kind === "Spread" ? [] : [e])))
      : a;

  return [
    ...split.prefix.map((a, i) => convert(prefix[i], a)),
    ...split.middle,
    ...split.suffix.map((a, j) => convert(suffix[j], a)),
  ];
}

/** Every type and Map constructor name `t` mentions. */
function referencedNames(t: TypeTerm, out: Set<string>): void {
  const visitArgs = (args: readonly TypeArg[]) => {
    for (const a of args) referencedNames(a.kind === "Spread" ? a.operand : a, out);
  };
  switch (t.kind) {
    case "Named":
      out.add(t.name);
      visitArgs(t.args);
      break;
    case "Tuple":
      visitArgs(t.elements);
      break;
    case "Map":
      out.add(t.constructor.name);
      referencedNames(t.source, out);
      break;
    default:
      break;
  }
}

function definitionHelp(e: DefinitionError): string | undefined {
  switch (e.kind) {
    case "MultipleExpansion":
      return "Only one variable-length slot is allowed; pass further type lists as unexpanded tuple parameters, e.g. Pair[Ts, Us]";
    case "InvalidVarargBinding":
      return `Write '*args: *${e.variable.name}'`;
    case "InvalidKwargBinding":
      return "Keyword arguments cannot capture a type list";
    case "ConflictingDefinition":
      return "Each name takes one variadic definition and one fixed-arity definition per argument count";
  }
}

function bindHelp(e: BindError): string | undefined {
  if (e.kind === "StructuralMismatch" && e.expected.kind === "TupleUnexpanded") {
    return "Pass the type list in parentheses: (int, str), (int,) or ()";
  }
  return undefined;
}
