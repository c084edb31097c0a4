/**
 * Classification pass - declaration tree + configuration -> API model
 */

import type { BindingsConfig } from "../config/types.js";
import { createPolicy } from "../config/policy.js";
import {
  emptyParseCallbacks,
  type DeclarationTree,
} from "../declarations/types.js";
import { ApiModel } from "../model/api-model.js";
import { Namespace } from "../model/namespace.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { addApisFromConfig } from "./config-apis.js";
import type { ManagedSource } from "./managed-fun-deps.js";
import {
  confirmAllGenerateDirectivesObeyed,
  replaceExternNativeTypes,
} from "./substitution.js";
import { generateUtilities } from "./utilities.js";
import { findItemsInRoot, parseModItems, type WalkContext } from "./walker.js";

export type ParseOptions = {
  /** The managed source the configured function signatures come from */
  readonly managedSource?: ManagedSource;
  readonly verbose?: boolean;
};

/**
 * Build the API model.
 *
 * Entries appear in this order: utilities, configuration-derived entries,
 * then everything found in the declaration tree, scope by scope. Native-type
 * overrides are applied last, after which every generate directive is
 * checked. Failures of individual declarations do not fail the pass.
 */
export const parseBindings = (
  tree: DeclarationTree | undefined,
  config: BindingsConfig,
  options: ParseOptions = {}
): Result<ApiModel, Diagnostic> => {
  const policy = createPolicy(config);
  const model = new ApiModel();
  const verbose = options.verbose ?? false;
  const items = tree ? findItemsInRoot(tree.items) : undefined;

  if (!policy.excludeUtilities) {
    generateUtilities(model);
  }

  const fromConfig = addApisFromConfig(model, policy, options.managedSource);
  if (!fromConfig.ok) {
    return fromConfig;
  }

  const ctx: WalkContext = {
    model,
    policy,
    callbacks: tree?.callbacks ?? emptyParseCallbacks(),
    verbose,
  };
  parseModItems(ctx, items, Namespace.root());

  const displaced = replaceExternNativeTypes(model, policy);
  if (verbose) {
    for (const name of displaced) {
      console.log(`Native type override replaces '${name.toCppName()}'`);
    }
  }

  const confirmed = confirmAllGenerateDirectivesObeyed(model, policy);
  if (!confirmed.ok) {
    return confirmed;
  }

  return { ok: true, value: model };
};
