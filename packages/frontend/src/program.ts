/**
 * File-based entry point: load the declaration tree, the configuration and
 * the managed source, then run the classification pass.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { findConfig, loadConfig, resolveConfig } from "./config/loader.js";
import type { BindingsConfig } from "./config/types.js";
import { loadDeclarationTree } from "./declarations/loader.js";
import type { ApiModel } from "./model/api-model.js";
import type { ManagedSource } from "./parse/managed-fun-deps.js";
import { parseBindings } from "./parse/parse-bindings.js";
import type { Diagnostic } from "./types/diagnostic.js";
import { mapError, type Result } from "./types/result.js";

export type ProgramOptions = {
  /** Explicit config path; otherwise searched for from the tree's directory */
  readonly configPath?: string;
  readonly verbose?: boolean;
};

const loadManagedSource = (
  config: BindingsConfig,
  configDir: string
): Result<ManagedSource | undefined, Diagnostic[]> => {
  if (config.managedSource === undefined) {
    return { ok: true, value: undefined };
  }

  const fileName = path.resolve(configDir, config.managedSource);
  try {
    return {
      ok: true,
      value: { fileName, text: fs.readFileSync(fileName, "utf-8") },
    };
  } catch (err) {
    return {
      ok: false,
      error: [
        {
          code: "BRW9002",
          severity: "error",
          message: `Failed to read managed source ${fileName}: ${err instanceof Error ? err.message : String(err)}`,
        },
      ],
    };
  }
};

export const parseBindingsFromFiles = (
  treePath: string,
  options: ProgramOptions = {}
): Result<ApiModel, Diagnostic[]> => {
  const tree = loadDeclarationTree(treePath);
  if (!tree.ok) {
    return tree;
  }

  const configPath =
    options.configPath ?? findConfig(path.dirname(path.resolve(treePath)));
  if (options.verbose) {
    console.log(`Config: ${configPath ?? "(none, using defaults)"}`);
  }

  let config: BindingsConfig = resolveConfig({});
  let configDir = path.dirname(path.resolve(treePath));
  if (configPath !== null) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      return loaded;
    }
    config = loaded.value;
    configDir = path.dirname(path.resolve(configPath));
  }

  const managedSource = loadManagedSource(config, configDir);
  if (!managedSource.ok) {
    return managedSource;
  }

  const model = parseBindings(tree.value, config, {
    managedSource: managedSource.value,
    verbose: options.verbose,
  });
  return mapError(model, (diagnostic) => [diagnostic]);
};
