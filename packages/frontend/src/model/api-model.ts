/**
 * API Model - insertion-ordered collection of API entries keyed by
 * qualified name
 */

import type { ApiEntry, ApiKind } from "./api.js";
import type { QualifiedName } from "./namespace.js";

export class ApiModel implements Iterable<ApiEntry> {
  private readonly entries = new Map<string, ApiEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(name: QualifiedName): boolean {
    return this.entries.has(name.key);
  }

  get(name: QualifiedName): ApiEntry | undefined {
    return this.entries.get(name.key);
  }

  /**
   * Add an entry under a fresh name. Returns false, leaving the model
   * unchanged, if the name is already taken.
   */
  add(entry: ApiEntry): boolean {
    const key = entry.name.name.key;
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, entry);
    return true;
  }

  /**
   * Add or overwrite. An overwritten entry keeps its original position.
   */
  upsert(entry: ApiEntry): void {
    this.entries.set(entry.name.name.key, entry);
  }

  /**
   * Replace the entry of the same name where it stands, or append if there
   * is none. Returns the entry that was replaced.
   */
  replace(entry: ApiEntry): ApiEntry | undefined {
    const key = entry.name.name.key;
    const previous = this.entries.get(key);
    this.entries.set(key, entry);
    return previous;
  }

  entriesOfKind<K extends ApiKind>(
    kind: K
  ): readonly Extract<ApiEntry, { readonly kind: K }>[] {
    const matches: Extract<ApiEntry, { readonly kind: K }>[] = [];
    for (const entry of this.entries.values()) {
      if (isKind(entry, kind)) {
        matches.push(entry);
      }
    }
    return matches;
  }

  /**
   * Native spellings of every entry, in model order.
   */
  cppNames(): ReadonlySet<string> {
    return new Set(
      [...this.entries.values()].map((entry) => entry.name.toCppName())
    );
  }

  toArray(): readonly ApiEntry[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<ApiEntry> {
    return this.entries.values();
  }
}

const isKind = <K extends ApiKind>(
  entry: ApiEntry,
  kind: K
): entry is Extract<ApiEntry, { readonly kind: K }> => entry.kind === kind;
