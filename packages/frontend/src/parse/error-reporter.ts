/**
 * Error reporter - decides what a failed declaration leaves behind
 *
 * A failure that names its declaration becomes an `ignoredItem` entry, so
 * later stages can explain why the entity is missing when something refers
 * to it. A failure with nothing to name is logged and dropped.
 */

import { ApiName } from "../model/api.js";
import type { ApiModel } from "../model/api-model.js";
import { formatDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";

export const pushIgnoredItem = (model: ApiModel, diagnostic: Diagnostic): void => {
  const item = diagnostic.item;
  if (!item) {
    console.warn(`Ignored item: ${formatDiagnostic(diagnostic)}`);
    return;
  }

  const added = model.add({
    kind: "ignoredItem",
    name: ApiName.of(item.namespace, item.ident),
    error: diagnostic,
  });
  if (!added) {
    console.warn(
      `Ignored item shadowed by an existing entry: ${formatDiagnostic(diagnostic)}`
    );
  }
};

/**
 * Run one declaration's classification, routing any failure to `ignored`.
 */
export const reportAnyError = <T>(
  ignored: ApiModel,
  classify: () => Result<T, Diagnostic>
): T | undefined => {
  const result = classify();
  if (result.ok) {
    return result.value;
  }
  pushIgnoredItem(ignored, result.error);
  return undefined;
};
