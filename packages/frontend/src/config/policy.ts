/**
 * Policy - read-only questions the classifier asks of the configuration
 */

import type {
  BindingsConfig,
  ConcreteConfig,
  ExternNativeTypeConfig,
  ManagedFunctionConfig,
  SubclassConfig,
} from "./types.js";

export type Policy = {
  /** Native spelling is on the block list */
  readonly isOnBlocklist: (cppName: string) => boolean;
  /** Identifier is the final segment of a configured managed type */
  readonly isManagedType: (ident: string) => boolean;
  readonly excludeUtilities: boolean;
  readonly podRequests: ReadonlySet<string>;
  /** Directives in configuration order, generate before generatePod */
  readonly mustGenerate: readonly string[];
  readonly subclasses: readonly SubclassConfig[];
  readonly managedFunctions: readonly ManagedFunctionConfig[];
  readonly managedTypes: readonly string[];
  readonly concretes: readonly ConcreteConfig[];
  readonly externNativeTypes: readonly ExternNativeTypeConfig[];
};

/**
 * Final segment of a dotted managed path (`events.Event` -> `Event`).
 */
export const managedPathFinalIdent = (managedPath: string): string => {
  const lastDot = managedPath.lastIndexOf(".");
  return lastDot >= 0 ? managedPath.slice(lastDot + 1) : managedPath;
};

export const createPolicy = (config: BindingsConfig): Policy => {
  const blocklist = new Set(config.block);
  const podRequests = new Set(config.generatePod);
  const mustGenerate = [...new Set([...config.generate, ...config.generatePod])];
  const managedTypeIdents = new Set(
    config.managedTypes.map(managedPathFinalIdent)
  );

  return {
    isOnBlocklist: (cppName) => blocklist.has(cppName),
    isManagedType: (ident) => managedTypeIdents.has(ident),
    excludeUtilities: config.excludeUtilities,
    podRequests,
    mustGenerate,
    subclasses: config.subclasses,
    managedFunctions: config.managedFunctions,
    managedTypes: config.managedTypes,
    concretes: config.concretes,
    externNativeTypes: config.externNativeTypes,
  };
};
