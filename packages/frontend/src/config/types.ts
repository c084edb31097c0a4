/**
 * Configuration types (bridgewright.json)
 */

export type SubclassConfig = {
  readonly superclass: string;
  readonly subclass: string;
};

export type ManagedFunctionConfig = {
  /** A TypeScript function signature, e.g. `function onEvent(e: Event): void` */
  readonly signature: string;
};

export type ConcreteConfig = {
  /** Native template instantiation, e.g. `std::vector<int>` */
  readonly definition: string;
  /** Name of the managed-side type standing for it */
  readonly name: string;
};

export type ExternNativeTypeConfig = {
  /** Native spelling of the type being overridden, e.g. `b::Widget` */
  readonly definition: string;
  /** Managed-side path of the type that replaces it */
  readonly managedPath: string;
  readonly opaque?: boolean;
};

/**
 * Configuration file as written by the user.
 */
export type BridgewrightConfigFile = {
  readonly $schema?: string;
  readonly generate?: readonly string[];
  readonly generatePod?: readonly string[];
  readonly block?: readonly string[];
  readonly excludeUtilities?: boolean;
  readonly subclasses?: readonly SubclassConfig[];
  readonly managedFunctions?: readonly ManagedFunctionConfig[];
  /** File holding the managed-side declarations, relative to the config */
  readonly managedSource?: string;
  readonly managedTypes?: readonly string[];
  readonly concretes?: readonly ConcreteConfig[];
  readonly externNativeTypes?: readonly ExternNativeTypeConfig[];
};

/**
 * Configuration with every default applied.
 */
export type BindingsConfig = {
  readonly generate: readonly string[];
  readonly generatePod: readonly string[];
  readonly block: readonly string[];
  readonly excludeUtilities: boolean;
  readonly subclasses: readonly SubclassConfig[];
  readonly managedFunctions: readonly ManagedFunctionConfig[];
  readonly managedSource?: string;
  readonly managedTypes: readonly string[];
  readonly concretes: readonly ConcreteConfig[];
  readonly externNativeTypes: readonly ExternNativeTypeConfig[];
};
