/**
 * API model entries
 *
 * One closed union member per kind of entity the interop layer exposes.
 */

import type {
  ConstItem,
  DeclParam,
  DeclType,
  EnumItem,
  StructItem,
  TypeAliasItem,
} from "../declarations/types.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { NATIVE_SEPARATOR, Namespace, QualifiedName } from "./namespace.js";

/**
 * A qualified name plus the original native spelling, when the upstream
 * parser had to rename the entity (nested types come through as
 * `Outer_Inner` with the original name `Outer::Inner`).
 */
export class ApiName {
  constructor(
    readonly name: QualifiedName,
    readonly cppName?: string
  ) {}

  static of(namespace: Namespace, ident: string, cppName?: string): ApiName {
    return new ApiName(new QualifiedName(namespace, ident), cppName);
  }

  static inRoot(ident: string): ApiName {
    return new ApiName(QualifiedName.inRoot(ident));
  }

  get namespace(): Namespace {
    return this.name.namespace;
  }

  get ident(): string {
    return this.name.ident;
  }

  /**
   * Native spelling, preferring the original name.
   */
  toCppName(): string {
    if (this.cppName === undefined) {
      return this.name.toCppName();
    }
    return this.namespace.isEmpty
      ? this.cppName
      : `${this.namespace.toString()}${NATIVE_SEPARATOR}${this.cppName}`;
  }

  /**
   * True for a type declared inside another type.
   */
  isNested(): boolean {
    return this.cppName?.includes(NATIVE_SEPARATOR) ?? false;
  }
}

export type TypedefKind = "type" | "use";

export type FunctionReceiver = "none" | "static" | "instance";

export type FunctionSignature = {
  readonly params: readonly DeclParam[];
  readonly returnType?: DeclType;
};

export type ManagedFunctionSignature = {
  /** The TypeScript signature text as written in the configuration */
  readonly text: string;
  readonly params: readonly {
    readonly ident: string;
    readonly type: string;
  }[];
  readonly returnType?: string;
};

export type StructApi = {
  readonly kind: "struct";
  readonly name: ApiName;
  readonly declaration: StructItem;
  readonly hasRvalueReferenceFields: boolean;
};

export type EnumApi = {
  readonly kind: "enum";
  readonly name: ApiName;
  readonly declaration: EnumItem;
};

export type ForwardDeclarationApi = {
  readonly kind: "forwardDeclaration";
  readonly name: ApiName;
  /** Reported once something tries to use the type */
  readonly error?: Diagnostic;
};

export type TypedefApi = {
  readonly kind: "typedef";
  readonly name: ApiName;
  readonly aliasKind: TypedefKind;
  readonly target: DeclType;
  readonly declaration?: TypeAliasItem;
  readonly originalName?: QualifiedName;
};

export type ConstApi = {
  readonly kind: "const";
  readonly name: ApiName;
  readonly declaration: ConstItem;
};

export type ManagedTypeApi = {
  readonly kind: "managedType";
  readonly name: ApiName;
  readonly path: string;
};

export type ConcreteTypeApi = {
  readonly kind: "concreteType";
  readonly name: ApiName;
  readonly cppDefinition: string;
  /** Filled in by a later stage */
  readonly managedDefinition?: string;
};

export type NativeTypeOverrideApi = {
  readonly kind: "nativeTypeOverride";
  readonly name: ApiName;
  readonly managedPath: string;
  readonly opaque: boolean;
  readonly pod: boolean;
};

export type SubclassApi = {
  readonly kind: "subclass";
  readonly name: ApiName;
  readonly superclass: QualifiedName;
};

export type NativeFunctionApi = {
  readonly kind: "function";
  readonly source: "native";
  readonly name: ApiName;
  readonly signature: FunctionSignature;
  readonly selfType?: QualifiedName;
  readonly receiver: FunctionReceiver;
  readonly deps: readonly QualifiedName[];
};

export type ManagedFunctionApi = {
  readonly kind: "function";
  readonly source: "managed";
  readonly name: ApiName;
  readonly signature: ManagedFunctionSignature;
  readonly receiver: "none";
  readonly deps: readonly QualifiedName[];
};

export type FunctionApi = NativeFunctionApi | ManagedFunctionApi;

export type StringConstructorApi = {
  readonly kind: "stringConstructor";
  readonly name: ApiName;
};

export type IgnoredItemApi = {
  readonly kind: "ignoredItem";
  readonly name: ApiName;
  readonly error: Diagnostic;
};

export type ApiEntry =
  | StructApi
  | EnumApi
  | ForwardDeclarationApi
  | TypedefApi
  | ConstApi
  | ManagedTypeApi
  | ConcreteTypeApi
  | NativeTypeOverrideApi
  | SubclassApi
  | FunctionApi
  | StringConstructorApi
  | IgnoredItemApi;

export type ApiKind = ApiEntry["kind"];
