/**
 * Declaration tree loader - reads and validates the JSON document the header
 * parser writes.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { collectResults, type Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { emptyParseCallbacks } from "./types.js";
import type {
  DeclField,
  DeclParam,
  DeclType,
  DeclVariant,
  DeclarationTree,
  ForeignItem,
  ImplMethod,
  Item,
  ParseCallbacks,
  UseTree,
} from "./types.js";

type Read<T> = Result<T, Diagnostic>;

const treeError = (code: DiagnosticCode, message: string): Diagnostic => ({
  code,
  message,
  severity: "error",
  location: undefined,
});

const malformed = <T>(where: string, message: string): Read<T> => ({
  ok: false,
  error: treeError("BRW9105", `Invalid ${where}: ${message}`),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (
  obj: Record<string, unknown>,
  key: string,
  where: string
): Read<string> => {
  const value = obj[key];
  return typeof value === "string"
    ? { ok: true, value }
    : malformed(where, `missing or invalid '${key}'`);
};

const readOptionalString = (
  obj: Record<string, unknown>,
  key: string,
  where: string
): Read<string | undefined> => {
  const value = obj[key];
  return value === undefined || typeof value === "string"
    ? { ok: true, value }
    : malformed(where, `'${key}' must be a string`);
};

const readBoolean = (
  obj: Record<string, unknown>,
  key: string,
  where: string,
  fallback: boolean
): Read<boolean> => {
  const value = obj[key];
  if (value === undefined) return { ok: true, value: fallback };
  return typeof value === "boolean"
    ? { ok: true, value }
    : malformed(where, `'${key}' must be a boolean`);
};

const readArray = <T>(
  value: unknown,
  where: string,
  readEntry: (entry: unknown, where: string) => Read<T>
): Read<readonly T[]> => {
  if (!Array.isArray(value)) {
    return malformed(where, "must be an array");
  }
  return collectResults(
    value.map((entry: unknown, index) => readEntry(entry, `${where}[${index}]`))
  );
};

const readStrings = (value: unknown, where: string): Read<readonly string[]> =>
  readArray<string>(value, where, (entry, entryWhere) =>
    typeof entry === "string"
      ? { ok: true, value: entry }
      : malformed(entryWhere, "must be a string")
  );

const readObject = <T>(
  value: unknown,
  where: string,
  read: (obj: Record<string, unknown>) => Read<T>
): Read<T> => (isRecord(value) ? read(value) : malformed(where, "must be an object"));

export const readDeclType = (value: unknown, where: string): Read<DeclType> =>
  readObject(value, where, (obj): Read<DeclType> => {
    switch (obj.kind) {
      case "path": {
        const segments = readStrings(obj.segments, `${where}.segments`);
        if (!segments.ok) return segments;
        if (segments.value.length === 0) {
          return malformed(where, "'segments' must not be empty");
        }
        if (obj.args === undefined) {
          return { ok: true, value: { kind: "path", segments: segments.value } };
        }
        const args = readArray(obj.args, `${where}.args`, readDeclType);
        if (!args.ok) return args;
        return {
          ok: true,
          value: { kind: "path", segments: segments.value, args: args.value },
        };
      }
      case "pointer":
      case "reference": {
        const mutable = readBoolean(obj, "mutable", where, false);
        if (!mutable.ok) return mutable;
        const elem = readDeclType(obj.elem, `${where}.elem`);
        if (!elem.ok) return elem;
        return {
          ok: true,
          value: {
            kind: obj.kind === "pointer" ? "pointer" : "reference",
            mutable: mutable.value,
            elem: elem.value,
          },
        };
      }
      case "array": {
        const elem = readDeclType(obj.elem, `${where}.elem`);
        if (!elem.ok) return elem;
        const length = obj.length;
        if (typeof length !== "number" || !Number.isInteger(length) || length < 0) {
          return malformed(where, "'length' must be a non-negative integer");
        }
        return { ok: true, value: { kind: "array", elem: elem.value, length } };
      }
      case "fn": {
        const params = readArray(obj.params, `${where}.params`, readDeclType);
        if (!params.ok) return params;
        if (obj.returnType === undefined) {
          return { ok: true, value: { kind: "fn", params: params.value } };
        }
        const returnType = readDeclType(obj.returnType, `${where}.returnType`);
        if (!returnType.ok) return returnType;
        return {
          ok: true,
          value: { kind: "fn", params: params.value, returnType: returnType.value },
        };
      }
      case "tuple": {
        const elems = readArray(obj.elems, `${where}.elems`, readDeclType);
        if (!elems.ok) return elems;
        return { ok: true, value: { kind: "tuple", elems: elems.value } };
      }
      case "never":
        return { ok: true, value: { kind: "never" } };
      default:
        return malformed(where, `unknown type kind '${String(obj.kind)}'`);
    }
  });

const readField = (value: unknown, where: string): Read<DeclField> =>
  readObject(value, where, (obj): Read<DeclField> => {
    const ident = readOptionalString(obj, "ident", where);
    if (!ident.ok) return ident;
    const ty = readDeclType(obj.ty, `${where}.ty`);
    if (!ty.ok) return ty;
    return {
      ok: true,
      value: ident.value === undefined ? { ty: ty.value } : { ident: ident.value, ty: ty.value },
    };
  });

const readVariant = (value: unknown, where: string): Read<DeclVariant> =>
  readObject(value, where, (obj): Read<DeclVariant> => {
    const ident = readString(obj, "ident", where);
    if (!ident.ok) return ident;
    const variantValue = readOptionalString(obj, "value", where);
    if (!variantValue.ok) return variantValue;
    return {
      ok: true,
      value:
        variantValue.value === undefined
          ? { ident: ident.value }
          : { ident: ident.value, value: variantValue.value },
    };
  });

const readParam = (value: unknown, where: string): Read<DeclParam> =>
  readObject(value, where, (obj): Read<DeclParam> => {
    const ident = readString(obj, "ident", where);
    if (!ident.ok) return ident;
    const ty = readDeclType(obj.ty, `${where}.ty`);
    if (!ty.ok) return ty;
    return { ok: true, value: { ident: ident.value, ty: ty.value } };
  });

const readForeignItem = (value: unknown, where: string): Read<ForeignItem> =>
  readObject(value, where, (obj): Read<ForeignItem> => {
    const ident = readString(obj, "ident", where);
    if (!ident.ok) return ident;

    if (obj.kind === "static") {
      const ty = readDeclType(obj.ty, `${where}.ty`);
      if (!ty.ok) return ty;
      return { ok: true, value: { kind: "static", ident: ident.value, ty: ty.value } };
    }
    if (obj.kind !== "fn") {
      return malformed(where, `unknown foreign item kind '${String(obj.kind)}'`);
    }

    const params = readArray(obj.params, `${where}.params`, readParam);
    if (!params.ok) return params;
    const variadic = readBoolean(obj, "variadic", where, false);
    if (!variadic.ok) return variadic;
    let returnType: DeclType | undefined;
    if (obj.returnType !== undefined) {
      const read = readDeclType(obj.returnType, `${where}.returnType`);
      if (!read.ok) return read;
      returnType = read.value;
    }

    return {
      ok: true,
      value: {
        kind: "fn",
        ident: ident.value,
        params: params.value,
        returnType,
        variadic: variadic.value,
      },
    };
  });

const readImplMethod = (value: unknown, where: string): Read<ImplMethod> =>
  readObject(value, where, (obj): Read<ImplMethod> => {
    const ident = readString(obj, "ident", where);
    if (!ident.ok) return ident;
    const calls = readOptionalString(obj, "calls", where);
    if (!calls.ok) return calls;
    return {
      ok: true,
      value:
        calls.value === undefined
          ? { ident: ident.value }
          : { ident: ident.value, calls: calls.value },
    };
  });

export const readUseTree = (value: unknown, where: string): Read<UseTree> =>
  readObject(value, where, (obj): Read<UseTree> => {
    switch (obj.kind) {
      case "path": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const tree = readUseTree(obj.tree, `${where}.tree`);
        if (!tree.ok) return tree;
        return { ok: true, value: { kind: "path", ident: ident.value, tree: tree.value } };
      }
      case "name": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        return { ok: true, value: { kind: "name", ident: ident.value } };
      }
      case "rename": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const rename = readString(obj, "rename", where);
        if (!rename.ok) return rename;
        return {
          ok: true,
          value: { kind: "rename", ident: ident.value, rename: rename.value },
        };
      }
      case "glob":
        return { ok: true, value: { kind: "glob" } };
      case "group": {
        const items = readArray(obj.items, `${where}.items`, readUseTree);
        if (!items.ok) return items;
        return { ok: true, value: { kind: "group", items: items.value } };
      }
      default:
        return malformed(where, `unknown use tree kind '${String(obj.kind)}'`);
    }
  });

export const readItem = (value: unknown, where: string): Read<Item> =>
  readObject(value, where, (obj): Read<Item> => {
    switch (obj.kind) {
      case "mod": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        if (obj.content === undefined) {
          return { ok: true, value: { kind: "mod", ident: ident.value } };
        }
        const content = readArray(obj.content, `${where}.content`, readItem);
        if (!content.ok) return content;
        return {
          ok: true,
          value: { kind: "mod", ident: ident.value, content: content.value },
        };
      }
      case "struct": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const fields = readArray(obj.fields ?? [], `${where}.fields`, readField);
        if (!fields.ok) return fields;
        return {
          ok: true,
          value: { kind: "struct", ident: ident.value, fields: fields.value },
        };
      }
      case "enum": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const variants = readArray(obj.variants ?? [], `${where}.variants`, readVariant);
        if (!variants.ok) return variants;
        return {
          ok: true,
          value: { kind: "enum", ident: ident.value, variants: variants.value },
        };
      }
      case "impl": {
        const selfTy = readDeclType(obj.selfTy, `${where}.selfTy`);
        if (!selfTy.ok) return selfTy;
        const items = readArray(obj.items ?? [], `${where}.items`, readImplMethod);
        if (!items.ok) return items;
        return {
          ok: true,
          value: { kind: "impl", selfTy: selfTy.value, items: items.value },
        };
      }
      case "foreignMod": {
        const items = readArray(obj.items ?? [], `${where}.items`, readForeignItem);
        if (!items.ok) return items;
        return { ok: true, value: { kind: "foreignMod", items: items.value } };
      }
      case "use": {
        const tree = readUseTree(obj.tree, `${where}.tree`);
        if (!tree.ok) return tree;
        return { ok: true, value: { kind: "use", tree: tree.value } };
      }
      case "const": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const ty = readDeclType(obj.ty, `${where}.ty`);
        if (!ty.ok) return ty;
        const constValue = readString(obj, "value", where);
        if (!constValue.ok) return constValue;
        return {
          ok: true,
          value: {
            kind: "const",
            ident: ident.value,
            ty: ty.value,
            value: constValue.value,
          },
        };
      }
      case "type": {
        const ident = readString(obj, "ident", where);
        if (!ident.ok) return ident;
        const ty = readDeclType(obj.ty, `${where}.ty`);
        if (!ty.ok) return ty;
        return { ok: true, value: { kind: "type", ident: ident.value, ty: ty.value } };
      }
      case "other": {
        const description = readString(obj, "description", where);
        if (!description.ok) return description;
        return { ok: true, value: { kind: "other", description: description.value } };
      }
      default: {
        // Kinds with no classification rule (traits, macros) are kept so the
        // walker can drop them one at a time.
        if (typeof obj.kind !== "string" || obj.kind === "") {
          return malformed(where, "missing or invalid 'kind'");
        }
        const description =
          typeof obj.ident === "string" ? `${obj.kind} ${obj.ident}` : obj.kind;
        return { ok: true, value: { kind: "other", description } };
      }
    }
  });

const readCallbacks = (
  value: unknown,
  fileName: string
): Read<ParseCallbacks> => {
  const callbacksError = (message: string): Read<ParseCallbacks> => ({
    ok: false,
    error: treeError("BRW9106", `Invalid 'callbacks' in ${fileName}: ${message}`),
  });

  if (value === undefined) {
    return { ok: true, value: emptyParseCallbacks() };
  }
  if (!isRecord(value)) {
    return callbacksError("must be an object");
  }

  const originalNames = new Map<string, string>();
  const names = value.originalNames ?? {};
  if (!isRecord(names)) {
    return callbacksError("'originalNames' must be an object");
  }
  for (const [key, original] of Object.entries(names)) {
    if (typeof original !== "string") {
      return callbacksError(`original name of '${key}' must be a string`);
    }
    originalNames.set(key, original);
  }

  const discarded = readStrings(
    value.discardedTemplateParams ?? [],
    "discardedTemplateParams"
  );
  if (!discarded.ok) {
    return callbacksError("'discardedTemplateParams' must be an array of strings");
  }

  return {
    ok: true,
    value: { originalNames, discardedTemplateParams: new Set(discarded.value) },
  };
};

/**
 * Validate parsed JSON as a declaration tree. Every malformed top-level item
 * is reported.
 */
export const validateDeclarationTree = (
  data: unknown,
  fileName: string
): Result<DeclarationTree, Diagnostic[]> => {
  if (!isRecord(data) || !Array.isArray(data.items)) {
    return {
      ok: false,
      error: [
        treeError(
          "BRW9104",
          `${fileName} must be an object with an 'items' array`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const items: Item[] = [];
  data.items.forEach((entry: unknown, index) => {
    const item = readItem(entry, `items[${index}] in ${fileName}`);
    if (item.ok) {
      items.push(item.value);
    } else {
      diagnostics.push(item.error);
    }
  });

  const callbacks = readCallbacks(data.callbacks, fileName);
  if (!callbacks.ok) {
    diagnostics.push(callbacks.error);
  }

  if (diagnostics.length > 0 || !callbacks.ok) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: { items, callbacks: callbacks.value } };
};

/**
 * Load and validate a declaration tree file.
 */
export const loadDeclarationTree = (
  filePath: string
): Result<DeclarationTree, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [treeError("BRW9101", `Declaration tree file not found: ${filePath}`)],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        treeError(
          "BRW9102",
          `Failed to read declaration tree file: ${err instanceof Error ? err.message : String(err)}`
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
        treeError(
          "BRW9103",
          `Invalid JSON in ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  return validateDeclarationTree(parsed, path.basename(filePath));
};
