import {
  type TypeTerm, type TypeVariable, type TypeTupleVariable,
  placeholderKey, typesEqual, typeListsEqual, typeToString,
} from "./types.js";

export interface TypeBinding {
  readonly variable: TypeVariable;
  readonly type: TypeTerm;
}

export interface ListBinding {
  readonly variable: TypeTupleVariable;
  readonly types: readonly TypeTerm[];
}

/**
 * The result of one successful binding. Immutable: a new binding attempt always
 * produces a new Substitution.
 */
export interface Substitution {
  readonly types: ReadonlyMap<string, TypeBinding>;
  readonly lists: ReadonlyMap<string, ListBinding>;
}

export const EMPTY_SUBSTITUTION: Substitution = Object.freeze({
  types: new Map<string, TypeBinding>(),
  lists: new Map<string, ListBinding>(),
});

export function lookupType(subst: Substitution, variable: TypeVariable): TypeTerm | undefined {
  return subst.types.get(placeholderKey(variable))?.type;
}

export function lookupList(subst: Substitution, variable: TypeTupleVariable): readonly TypeTerm[] | undefined {
  return subst.lists.get(placeholderKey(variable))?.types;
}

/**
 * Collects bindings during a single `bind` call. A placeholder bound twice must
 * receive equal values; `bindType` and `bindList` return false otherwise.
 */
export class SubstitutionBuilder {
  private types = new Map<string, TypeBinding>();
  private lists = new Map<string, ListBinding>();

  bindType(variable: TypeVariable, type: TypeTerm): boolean {
    const key = placeholderKey(variable);
    const existing = this.types.get(key);
    if (existing) return typesEqual(existing.type, type);
    this.types.set(key, Object.freeze({ variable, type }));
    return true;
  }

  bindList(variable: TypeTupleVariable, types: readonly TypeTerm[]): boolean {
    const key = placeholderKey(variable);
    const existing = this.lists.get(key);
    if (existing) return typeListsEqual(existing.types, types);
    this.lists.set(key, Object.freeze({ variable, types: Object.freeze([...types]) }));
    return true;
  }

  boundType(variable: TypeVariable): TypeTerm | undefined {
    return this.types.get(placeholderKey(variable))?.type;
  }

  boundList(variable: TypeTupleVariable): readonly TypeTerm[] | undefined {
    return this.lists.get(placeholderKey(variable))?.types;
  }

  build(): Substitution {
    return Object.freeze({
      types: new Map(this.types),
      lists: new Map(this.lists),
    });
  }
}

/** `{T1: int, Ts: [bool, float]}`: type bindings first, then list bindings, each in binding order. */
export function formatSubstitution(subst: Substitution): string {
  const parts: string[] = [];
  for (const { variable, type } of subst.types.values()) {
    parts.push(`${variable.name}: ${typeToString(type)}`);
  }
  for (const { variable, types } of subst.lists.values()) {
    parts.push(`${variable.name}: [${types.map(typeToString).join(", ")}]`);
  }
  return `{${parts.join(", ")}}`;
}

/** Plain-object view keyed by placeholder name, for JSON output. */
export function substitutionToRecord(subst: Substitution): Record<string, string | string[]> {
  const record: Record<string, string | string[]> = {};
  for (const { variable, type } of subst.types.values()) {
    record[variable.name] = typeToString(type);
  }
  for (const { variable, types } of subst.lists.values()) {
    record[variable.name] = types.map(typeToString);
  }
  return record;
}
