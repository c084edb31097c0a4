/**
 * Namespace paths and qualified names.
 *
 * A namespace is the ordered list of native scopes an entity was declared in.
 * A qualified name adds the final identifier; its `::`-joined native spelling
 * is the key used throughout the API model.
 */

export const NATIVE_SEPARATOR = "::";

export class Namespace {
  private static readonly rootNamespace = new Namespace([]);

  private constructor(readonly segments: readonly string[]) {}

  static root(): Namespace {
    return Namespace.rootNamespace;
  }

  static of(segments: readonly string[]): Namespace {
    return segments.length === 0 ? Namespace.root() : new Namespace([...segments]);
  }

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  /**
   * Enter a nested scope. The receiver is left untouched.
   */
  push(segment: string): Namespace {
    return new Namespace([...this.segments, segment]);
  }

  equals(other: Namespace): boolean {
    return (
      this.segments.length === other.segments.length &&
      this.segments.every((segment, i) => segment === other.segments[i])
    );
  }

  toString(): string {
    return this.segments.join(NATIVE_SEPARATOR);
  }
}

export class QualifiedName {
  constructor(
    readonly namespace: Namespace,
    readonly ident: string
  ) {}

  static inRoot(ident: string): QualifiedName {
    return new QualifiedName(Namespace.root(), ident);
  }

  /**
   * Parse a native spelling such as `a::b::Widget`.
   */
  static fromCppName(cppName: string): QualifiedName {
    const segments = cppName.split(NATIVE_SEPARATOR);
    const ident = segments.pop() ?? "";
    return new QualifiedName(Namespace.of(segments), ident);
  }

  /**
   * Build a name from path segments, the last of which is the identifier.
   */
  static fromSegments(segments: readonly string[]): QualifiedName {
    const namespaceSegments = segments.slice(0, -1);
    const ident = segments[segments.length - 1] ?? "";
    return new QualifiedName(Namespace.of(namespaceSegments), ident);
  }

  get key(): string {
    return this.toCppName();
  }

  toCppName(): string {
    return this.namespace.isEmpty
      ? this.ident
      : `${this.namespace.toString()}${NATIVE_SEPARATOR}${this.ident}`;
  }

  equals(other: QualifiedName): boolean {
    return this.ident === other.ident && this.namespace.equals(other.namespace);
  }

  toString(): string {
    return this.toCppName();
  }
}
