/**
 * Passes that run once the whole declaration tree has been walked
 */

import type { Policy } from "../config/policy.js";
import { ApiName } from "../model/api.js";
import type { ApiModel } from "../model/api-model.js";
import { QualifiedName } from "../model/namespace.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { didNotGenerateAnythingError } from "./convert-errors.js";

/**
 * Swap in every configured native-type override. Whatever the walk made of
 * the same name (typically a struct or a forward declaration) is replaced
 * where it stands; an override for a name the headers never declared is
 * appended. Returns the names that displaced an existing entry.
 */
export const replaceExternNativeTypes = (
  model: ApiModel,
  policy: Policy
): readonly QualifiedName[] => {
  const displaced: QualifiedName[] = [];

  for (const externType of policy.externNativeTypes) {
    const name = QualifiedName.fromCppName(externType.definition);
    const previous = model.replace({
      kind: "nativeTypeOverride",
      name: new ApiName(name),
      managedPath: externType.managedPath,
      opaque: externType.opaque ?? false,
      pod: policy.podRequests.has(name.toCppName()),
    });
    if (previous) {
      displaced.push(name);
    }
  }

  return displaced;
};

/**
 * Every generate directive must have produced an entry of that native name.
 * Reports the first that did not.
 */
export const confirmAllGenerateDirectivesObeyed = (
  model: ApiModel,
  policy: Policy
): Result<void, Diagnostic> => {
  const cppNames = model.cppNames();
  const missing = policy.mustGenerate.find(
    (directive) => !cppNames.has(directive)
  );
  return missing === undefined
    ? { ok: true, value: undefined }
    : { ok: false, error: didNotGenerateAnythingError(missing) };
};
