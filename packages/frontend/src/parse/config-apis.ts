/**
 * Entries that come from the configuration rather than from the headers
 */

import { managedPathFinalIdent, type Policy } from "../config/policy.js";
import { ApiName, type ApiEntry } from "../model/api.js";
import type { ApiModel } from "../model/api-model.js";
import { QualifiedName } from "../model/namespace.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { duplicateApiError } from "./convert-errors.js";
import {
  analyzeManagedFunction,
  type ManagedSource,
} from "./managed-fun-deps.js";

const addUnique = (
  model: ApiModel,
  entry: ApiEntry
): Result<void, Diagnostic> => {
  if (model.add(entry)) {
    return { ok: true, value: undefined };
  }
  const existing = model.get(entry.name.name);
  return {
    ok: false,
    error: duplicateApiError(entry.name.name, existing?.kind ?? entry.kind),
  };
};

/**
 * Add subclasses, managed functions, managed types and concrete template
 * instantiations, in that order. Fails on the first entry that cannot be
 * added.
 */
export const addApisFromConfig = (
  model: ApiModel,
  policy: Policy,
  managedSource?: ManagedSource
): Result<void, Diagnostic> => {
  const entries: (() => Result<ApiEntry, Diagnostic>)[] = [
    ...policy.subclasses.map(
      (sc) => (): Result<ApiEntry, Diagnostic> => ({
        ok: true,
        value: {
          kind: "subclass",
          name: ApiName.inRoot(sc.subclass),
          superclass: QualifiedName.fromCppName(sc.superclass),
        },
      })
    ),
    ...policy.managedFunctions.map(
      (fun) => (): Result<ApiEntry, Diagnostic> => {
        const analysis = analyzeManagedFunction(fun.signature, managedSource);
        if (!analysis.ok) {
          return analysis;
        }
        return {
          ok: true,
          value: {
            kind: "function",
            source: "managed",
            name: ApiName.inRoot(analysis.value.ident),
            signature: analysis.value.signature,
            receiver: "none",
            deps: analysis.value.deps,
          },
        };
      }
    ),
    ...[...new Set(policy.managedTypes)].map(
      (path) => (): Result<ApiEntry, Diagnostic> => ({
        ok: true,
        value: {
          kind: "managedType",
          name: ApiName.inRoot(managedPathFinalIdent(path)),
          path,
        },
      })
    ),
    ...policy.concretes.map(
      (concrete) => (): Result<ApiEntry, Diagnostic> => ({
        ok: true,
        value: {
          kind: "concreteType",
          name: ApiName.inRoot(concrete.name),
          cppDefinition: concrete.definition,
        },
      })
    ),
  ];

  for (const build of entries) {
    const entry = build();
    if (!entry.ok) {
      return entry;
    }
    const added = addUnique(model, entry.value);
    if (!added.ok) {
      return added;
    }
  }

  return { ok: true, value: undefined };
};
