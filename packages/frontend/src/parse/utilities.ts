/**
 * Utility entries every set of bindings gets unless the configuration opts out
 */

import { ApiName } from "../model/api.js";
import type { ApiModel } from "../model/api-model.js";

export const MAKE_STRING = "make_string";

export const generateUtilities = (model: ApiModel): void => {
  model.add({ kind: "stringConstructor", name: ApiName.inRoot(MAKE_STRING) });
};
