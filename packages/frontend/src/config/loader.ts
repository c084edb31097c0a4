/**
 * Configuration loading and validation
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import type {
  BindingsConfig,
  BridgewrightConfigFile,
  ConcreteConfig,
  ExternNativeTypeConfig,
  ManagedFunctionConfig,
  SubclassConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "bridgewright.json";

const configError = (code: DiagnosticCode, message: string): Diagnostic => ({
  code,
  message,
  severity: "error",
  location: undefined,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Load and validate a bridgewright.json file.
 */
export const loadConfig = (
  configPath: string
): Result<BindingsConfig, Diagnostic[]> => {
  if (!fs.existsSync(configPath)) {
    return {
      ok: false,
      error: [configError("BRW9001", `Config file not found: ${configPath}`)],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        configError(
          "BRW9002",
          `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        configError(
          "BRW9003",
          `Invalid JSON in ${path.basename(configPath)}: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  const validation = validateConfigFile(parsed, path.basename(configPath));
  if (!validation.ok) {
    return validation;
  }

  return { ok: true, value: resolveConfig(validation.value) };
};

/**
 * Find bridgewright.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Apply defaults to a validated config file.
 */
export const resolveConfig = (
  file: BridgewrightConfigFile
): BindingsConfig => ({
  generate: file.generate ?? [],
  generatePod: file.generatePod ?? [],
  block: file.block ?? [],
  excludeUtilities: file.excludeUtilities ?? false,
  subclasses: file.subclasses ?? [],
  managedFunctions: file.managedFunctions ?? [],
  managedSource: file.managedSource,
  managedTypes: file.managedTypes ?? [],
  concretes: file.concretes ?? [],
  externNativeTypes: file.externNativeTypes ?? [],
});

type EntryReader<T> = (
  entry: Record<string, unknown>,
  context: string
) => T | Diagnostic;

/**
 * Validate an optional list field. Reports BRW9005 when the field is not an
 * array and BRW9006 for each bad entry.
 */
const readList = <T>(
  obj: Record<string, unknown>,
  field: string,
  fileName: string,
  readEntry: (value: unknown, context: string) => T | Diagnostic,
  diagnostics: Diagnostic[]
): readonly T[] | undefined => {
  const value = obj[field];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    diagnostics.push(
      configError("BRW9005", `'${field}' must be an array in ${fileName}`)
    );
    return undefined;
  }

  const entries: T[] = [];
  value.forEach((item: unknown, index) => {
    const result = readEntry(item, `${field}[${index}] in ${fileName}`);
    if (isDiagnostic(result)) {
      diagnostics.push(result);
    } else {
      entries.push(result);
    }
  });
  return entries;
};

const isDiagnostic = (value: unknown): value is Diagnostic =>
  isRecord(value) &&
  typeof value.code === "string" &&
  typeof value.severity === "string" &&
  typeof value.message === "string";

const readString = (value: unknown, context: string): string | Diagnostic =>
  typeof value === "string" && value.length > 0
    ? value
    : configError("BRW9006", `Invalid ${context}: must be a non-empty string`);

const objectEntry =
  <T>(reader: EntryReader<T>) =>
  (value: unknown, context: string): T | Diagnostic =>
    isRecord(value)
      ? reader(value, context)
      : configError("BRW9006", `Invalid ${context}: must be an object`);

const requireStrings = (
  entry: Record<string, unknown>,
  fields: readonly string[],
  context: string
): Diagnostic | undefined => {
  const missing = fields.find(
    (field) => typeof entry[field] !== "string" || entry[field] === ""
  );
  return missing === undefined
    ? undefined
    : configError(
        "BRW9006",
        `Invalid ${context}: missing or invalid '${missing}'`
      );
};

const readSubclass = objectEntry<SubclassConfig>((entry, context) => {
  const { superclass, subclass } = entry;
  if (typeof superclass !== "string" || typeof subclass !== "string") {
    return (
      requireStrings(entry, ["superclass", "subclass"], context) ??
      configError("BRW9006", `Invalid ${context}`)
    );
  }
  return { superclass, subclass };
});

const readManagedFunction = objectEntry<ManagedFunctionConfig>(
  (entry, context) => {
    const { signature } = entry;
    if (typeof signature !== "string" || signature === "") {
      return configError(
        "BRW9006",
        `Invalid ${context}: missing or invalid 'signature'`
      );
    }
    return { signature };
  }
);

const readConcrete = objectEntry<ConcreteConfig>((entry, context) => {
  const { definition, name } = entry;
  if (typeof definition !== "string" || typeof name !== "string") {
    return (
      requireStrings(entry, ["definition", "name"], context) ??
      configError("BRW9006", `Invalid ${context}`)
    );
  }
  return { definition, name };
});

const readExternNativeType = objectEntry<ExternNativeTypeConfig>(
  (entry, context) => {
    const { definition, managedPath, opaque } = entry;
    if (typeof definition !== "string" || typeof managedPath !== "string") {
      return (
        requireStrings(entry, ["definition", "managedPath"], context) ??
        configError("BRW9006", `Invalid ${context}`)
      );
    }
    if (opaque !== undefined && typeof opaque !== "boolean") {
      return configError(
        "BRW9006",
        `Invalid ${context}: 'opaque' must be a boolean`
      );
    }
    return opaque === undefined
      ? { definition, managedPath }
      : { definition, managedPath, opaque };
  }
);

/**
 * Validate that parsed JSON matches the config file schema.
 */
export const validateConfigFile = (
  data: unknown,
  fileName: string
): Result<BridgewrightConfigFile, Diagnostic[]> => {
  if (!isRecord(data)) {
    return {
      ok: false,
      error: [
        configError(
          "BRW9004",
          `${fileName} must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];

  const excludeUtilities = data.excludeUtilities;
  if (excludeUtilities !== undefined && typeof excludeUtilities !== "boolean") {
    diagnostics.push(
      configError(
        "BRW9005",
        `'excludeUtilities' must be a boolean in ${fileName}`
      )
    );
  }

  const managedSource = data.managedSource;
  if (managedSource !== undefined && typeof managedSource !== "string") {
    diagnostics.push(
      configError("BRW9005", `'managedSource' must be a string in ${fileName}`)
    );
  }

  const file: BridgewrightConfigFile = {
    generate: readList(data, "generate", fileName, readString, diagnostics),
    generatePod: readList(
      data,
      "generatePod",
      fileName,
      readString,
      diagnostics
    ),
    block: readList(data, "block", fileName, readString, diagnostics),
    excludeUtilities:
      typeof excludeUtilities === "boolean" ? excludeUtilities : undefined,
    subclasses: readList(
      data,
      "subclasses",
      fileName,
      readSubclass,
      diagnostics
    ),
    managedFunctions: readList(
      data,
      "managedFunctions",
      fileName,
      readManagedFunction,
      diagnostics
    ),
    managedSource:
      typeof managedSource === "string" ? managedSource : undefined,
    managedTypes: readList(
      data,
      "managedTypes",
      fileName,
      readString,
      diagnostics
    ),
    concretes: readList(
      data,
      "concretes",
      fileName,
      readConcrete,
      diagnostics
    ),
    externNativeTypes: readList(
      data,
      "externNativeTypes",
      fileName,
      readExternNativeType,
      diagnostics
    ),
  };

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: file };
};
