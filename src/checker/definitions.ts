import type { Span } from "../errors/diagnostic.js";
import {
  type Argument, type ParameterList, type TypeArg, type TypeTerm,
} from "./types.js";
import type { BindError, DefinitionError } from "./errors.js";
import { type ValidationResult, isVariableLength, validateDefinition } from "./validator.js";
import { type BindResult, bind } from "./binder.js";

export interface GenericDefinition {
  name: string;
  kind: "type" | "function";
  parameters: ParameterList;
  /** Alias body of a type, or return type of a function. */
  result?: TypeTerm;
  span?: Span;
}

interface DefinitionEntry {
  general?: GenericDefinition;
  specializations: Map<number, GenericDefinition>;
  /** Definitions that failed validation; never bound. */
  invalid: GenericDefinition[];
}

export interface CallBinding {
  definition?: GenericDefinition;
  result: BindResult;
}

/** Number of positional arguments a list takes, or undefined when it has a variable-length slot. */
export function fixedArity(list: ParameterList): number | undefined {
  const positional = list.filter(p => p.role !== "restKeyword");
  return positional.some(isVariableLength) ? undefined : positional.length;
}

export function acceptsArity(list: ParameterList, n: number): boolean {
  const positional = list.filter(p => p.role !== "restKeyword");
  const variable = positional.some(isVariableLength);
  const fixedSlots = positional.length - (variable ? 1 : 0);
  return variable ? n >= fixedSlots : n === fixedSlots;
}

/**
 * Write-once table of generic definitions. Each name has at most one general
 * (variadic) definition and at most one fixed-arity specialization per arity.
 */
export class DefinitionTable {
  private entries = new Map<string, DefinitionEntry>();
  private ids = new WeakMap<GenericDefinition, number>();
  private nextId = 0;
  private memo = new Map<string, BindResult>();

  define(definition: GenericDefinition): DefinitionError[] {
    const entry = this.entryFor(definition.name);
    const validation: ValidationResult = validateDefinition(definition.parameters);
    this.ids.set(definition, this.nextId++);

    if (!validation.ok) {
      entry.invalid.push(definition);
      return validation.errors;
    }

    const arity = fixedArity(definition.parameters);
    if (arity === undefined) {
      if (entry.general) return [{ kind: "ConflictingDefinition", name: definition.name, arity: "variadic" }];
      entry.general = definition;
    } else {
      if (entry.specializations.has(arity)) {
        return [{ kind: "ConflictingDefinition", name: definition.name, arity }];
      }
      entry.specializations.set(arity, definition);
    }
    return [];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Every valid definition of `name`, general first, then specializations by arity. */
  lookup(name: string): GenericDefinition[] {
    const entry = this.entries.get(name);
    if (!entry) return [];
    const specs = [...entry.specializations.entries()].sort(([a], [b]) => a - b).map(([, d]) => d);
    return entry.general ? [entry.general, ...specs] : specs;
  }

  /** The definition a call with `arity` arguments binds against. */
  select(name: string, arity: number): GenericDefinition | undefined {
    const entry = this.entries.get(name);
    if (!entry) return undefined;
    const specialization = entry.specializations.get(arity);
    if (specialization) return specialization;
    if (entry.general) return entry.general;
    if (entry.specializations.size === 1) return [...entry.specializations.values()][0];
    return undefined;
  }

  /** Whether some definition of `name` can take `n` positional arguments. */
  accepts(name: string, n: number): boolean {
    return this.lookup(name).some(d => acceptsArity(d.parameters, n));
  }

  /**
   * Bind a call to `name`, selecting a specialization by argument count. Results
   * are memoized per definition and argument list; the first stored result wins.
   */
  bindCall(name: string, args: readonly Argument[]): CallBinding {
    const entry = this.entries.get(name);
    const definition = this.select(name, args.length);

    if (!definition) {
      if (entry && entry.invalid.length > 0 && entry.specializations.size === 0 && !entry.general) {
        const errors = entry.invalid.flatMap(d => {
          const v = validateDefinition(d.parameters);
          return v.ok ? [] : v.errors;
        });
        return { result: { ok: false, error: { kind: "InvalidDefinition", errors } } };
      }
      const arities = entry ? [...entry.specializations.keys()].sort((a, b) => a - b) : [];
      const error: BindError = { kind: "NoMatchingSpecialization", name, arities, received: args.length };
      return { result: { ok: false, error } };
    }

    const key = `${this.ids.get(definition) ?? -1}|${args.map(argumentKey).join(",")}`;
    const cached = this.memo.get(key);
    if (cached) return { definition, result: cached };

    const result = bind(definition.parameters, args);
    this.memo.set(key, result);
    return { definition, result };
  }

  get memoSize(): number {
    return this.memo.size;
  }

  private entryFor(name: string): DefinitionEntry {
    let entry = this.entries.get(name);
    if (!entry) {
      entry = { specializations: new Map(), invalid: [] };
      this.entries.set(name, entry);
    }
    return entry;
  }
}

// ============================================================
// Canonical keys
// ============================================================

// Unlike typeToString, keys carry placeholder scopes so that two placeholders
// with the same name never share a memo entry.
export function typeKey(t: TypeTerm): string {
  switch (t.kind) {
    case "Named": return `${t.name}[${t.args.map(typeArgKey).join(",")}]`;
    case "Tuple": return `(${t.elements.map(typeArgKey).join(",")})`;
    case "Var": return `$${t.variable.scope}:${t.variable.name}`;
    case "TupleVar": return `$$${t.variable.scope}:${t.variable.name}`;
    case "Map": return `map<${t.constructor.name}>(${typeKey(t.source)})`;
    case "Error": return "!";
  }
}

function typeArgKey(arg: TypeArg): string {
  return arg.kind === "Spread" ? `*${typeKey(arg.operand)}` : typeKey(arg);
}

export function argumentKey(arg: Argument): string {
  return arg.kind === "TypeList" ? `{${arg.elements.map(typeKey).join(",")}}` : typeKey(arg);
}
