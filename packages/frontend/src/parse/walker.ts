/**
 * Declaration tree walker
 *
 * Classifies every item the header parser produced into API model entries,
 * one scope at a time, threading the namespace path through the recursion.
 */

import type { Policy } from "../config/policy.js";
import {
  finalPathSegment,
  hasField,
  typeIsReference,
} from "../declarations/type-helpers.js";
import type {
  ConstItem,
  EnumItem,
  Item,
  ParseCallbacks,
  StructItem,
  TypeAliasItem,
  UseItem,
} from "../declarations/types.js";
import { ApiModel } from "../model/api-model.js";
import { ApiName, type ApiEntry } from "../model/api.js";
import { validateIdentOkForBindings } from "../model/identifiers.js";
import { isKnownSubstituteType, isKnownType } from "../model/known-types.js";
import { Namespace, QualifiedName } from "../model/namespace.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import {
  discardedTemplateParamError,
  duplicateApiError,
  forwardDeclaredNestedTypeError,
  infinitelyRecursiveTypedefError,
  invalidIdentError,
  unexpectedItemError,
} from "./convert-errors.js";
import { pushIgnoredItem, reportAnyError } from "./error-reporter.js";
import { ForeignModCollector } from "./foreign-mod.js";

/** The header parser wraps everything in a scope of this name */
export const ROOT_MOD = "root";

// Synthetic structs holding a class's vtable pointer.
const VTABLE_SUFFIX = "__bindgen_vtable";

// A struct whose body was never seen gets a single field of this name.
const FORWARD_DECLARATION_FIELD = "_unused";

// A templated struct whose body was never seen gets this field instead.
const ZERO_LENGTH_FIELD = "_address";

// Alias the header parser introduces for char16_t; the bridge maps it itself.
const CHAR16_ALIAS = "bindgen_cchar16_t";

export type WalkContext = {
  readonly model: ApiModel;
  readonly policy: Policy;
  readonly callbacks: ParseCallbacks;
  readonly verbose: boolean;
};

const ok: Result<void, Diagnostic> = { ok: true, value: undefined };

/**
 * Items inside the root scope wrapper, or undefined if there is none.
 */
export const findItemsInRoot = (
  items: readonly Item[]
): readonly Item[] | undefined => {
  for (const item of items) {
    if (item.kind === "mod" && item.ident === ROOT_MOD && item.content) {
      return item.content;
    }
  }
  return undefined;
};

const apiName = (
  namespace: Namespace,
  ident: string,
  callbacks: ParseCallbacks
): ApiName => {
  const name = new QualifiedName(namespace, ident);
  return new ApiName(name, callbacks.originalNames.get(name.key));
};

/**
 * Like apiName, but for entities whose identifier is exposed as is.
 */
export const apiNameQualified = (
  namespace: Namespace,
  ident: string,
  callbacks: ParseCallbacks
): Result<ApiName, Diagnostic> => {
  const valid = validateIdentOkForBindings(ident);
  if (!valid.ok) {
    return { ok: false, error: invalidIdentError(namespace, valid.error) };
  }
  return { ok: true, value: apiName(namespace, ident, callbacks) };
};

const addEntry = (
  ctx: WalkContext,
  entry: ApiEntry
): Result<void, Diagnostic> => {
  if (ctx.model.add(entry)) {
    return ok;
  }
  const existing = ctx.model.get(entry.name.name);
  return {
    ok: false,
    error: duplicateApiError(entry.name.name, existing?.kind ?? entry.kind),
  };
};

/**
 * Classify one scope's items, then its nested scopes' items as they are
 * reached, then the functions the scope declared.
 */
export const parseModItems = (
  ctx: WalkContext,
  items: readonly Item[] | undefined,
  namespace: Namespace
): void => {
  const collector = new ForeignModCollector(namespace, ctx.callbacks);
  const ignored = new ApiModel();
  const sizeBefore = ctx.model.size;

  for (const item of items ?? []) {
    reportAnyError(ignored, () => parseItem(ctx, item, collector, namespace));
  }

  for (const entry of ignored.entriesOfKind("ignoredItem")) {
    pushIgnoredItem(ctx.model, entry.error);
  }
  collector.finished(ctx.model);

  if (ctx.verbose) {
    console.log(
      `Scope '${namespace.isEmpty ? ROOT_MOD : namespace.toString()}': ${ctx.model.size - sizeBefore} entries, including nested scopes`
    );
  }
};

const parseItem = (
  ctx: WalkContext,
  item: Item,
  collector: ForeignModCollector,
  namespace: Namespace
): Result<void, Diagnostic> => {
  switch (item.kind) {
    case "foreignMod":
      collector.convertForeignModItems(item.items);
      return ok;
    case "struct":
      return parseStruct(ctx, item, namespace);
    case "enum":
      return parseEnum(ctx, item, namespace);
    case "impl":
      // Methods are taken from the extern blocks; impl blocks only say
      // which of those functions are methods.
      collector.convertImplItems(item);
      return ok;
    case "mod":
      if (item.content) {
        parseModItems(ctx, item.content, namespace.push(item.ident));
      }
      return ok;
    case "use":
      return parseUse(ctx, item, namespace);
    case "const":
      return parseConst(ctx, item, namespace);
    case "type":
      return parseTypeAlias(ctx, item, namespace);
    case "other":
      return { ok: false, error: unexpectedItemError(item.description) };
    default: {
      const exhaustive: never = item;
      return exhaustive;
    }
  }
};

const checkForFatalAttrs = (
  ctx: WalkContext,
  name: ApiName
): Diagnostic | undefined =>
  ctx.callbacks.discardedTemplateParams.has(name.name.key)
    ? discardedTemplateParamError(name.namespace, name.ident)
    : undefined;

const parseStruct = (
  ctx: WalkContext,
  item: StructItem,
  namespace: Namespace
): Result<void, Diagnostic> => {
  if (item.ident.endsWith(VTABLE_SUFFIX)) {
    return ok;
  }

  const named = apiNameQualified(namespace, item.ident, ctx.callbacks);
  if (!named.ok) {
    return named;
  }
  const name = named.value;

  // A root-level stand-in for a type the bridge supplies.
  if (isKnownSubstituteType(name.name)) {
    return ok;
  }

  if (
    (namespace.isEmpty && ctx.policy.isManagedType(item.ident)) ||
    isKnownType(name.name)
  ) {
    return ok;
  }

  let error = checkForFatalAttrs(ctx, name);
  let api: ApiEntry;
  if (
    hasField(item.fields, FORWARD_DECLARATION_FIELD) ||
    (hasField(item.fields, ZERO_LENGTH_FIELD) && error !== undefined)
  ) {
    // Templated forward declarations come through with the zero-length
    // field rather than the unused one; they are only recognizable as such
    // when the parser also discarded a template parameter.
    if (error === undefined && name.isNested()) {
      error = forwardDeclaredNestedTypeError(namespace, item.ident);
    }
    api = { kind: "forwardDeclaration", name, error };
  } else {
    api = {
      kind: "struct",
      name,
      declaration: item,
      hasRvalueReferenceFields: item.fields.some((field) =>
        typeIsReference(field.ty, true)
      ),
    };
  }

  if (ctx.policy.isOnBlocklist(api.name.toCppName())) {
    return ok;
  }
  return addEntry(ctx, api);
};

const parseEnum = (
  ctx: WalkContext,
  item: EnumItem,
  namespace: Namespace
): Result<void, Diagnostic> => {
  const named = apiNameQualified(namespace, item.ident, ctx.callbacks);
  if (!named.ok) {
    return named;
  }
  if (ctx.policy.isOnBlocklist(named.value.toCppName())) {
    return ok;
  }
  return addEntry(ctx, { kind: "enum", name: named.value, declaration: item });
};

/**
 * `use self::super::a::Foo as Bar;` is how the parser spells a typedef whose
 * target lives in another scope.
 */
const parseUse = (
  ctx: WalkContext,
  item: UseItem,
  namespace: Namespace
): Result<void, Diagnostic> => {
  const segments: string[] = [];
  let tree = item.tree;

  while (tree.kind === "path") {
    segments.push(tree.ident);
    tree = tree.tree;
  }

  // `use ...::root;` is regenerated downstream; other shapes carry nothing.
  if (tree.kind !== "rename" || tree.rename === CHAR16_ALIAS) {
    return ok;
  }

  const relative =
    segments[0] === "self" && segments[1] === "super"
      ? segments.slice(2)
      : segments;
  const targetSegments = [...relative, tree.ident];
  const newName = new QualifiedName(namespace, tree.rename);
  const oldName = QualifiedName.fromSegments(
    targetSegments[0] === ROOT_MOD ? targetSegments.slice(1) : targetSegments
  );

  if (newName.equals(oldName)) {
    return { ok: false, error: infinitelyRecursiveTypedefError(newName) };
  }

  return addEntry(ctx, {
    kind: "typedef",
    name: apiName(namespace, tree.rename, ctx.callbacks),
    aliasKind: "use",
    target: { kind: "path", segments: targetSegments },
    originalName: oldName,
  });
};

const parseConst = (
  ctx: WalkContext,
  item: ConstItem,
  namespace: Namespace
): Result<void, Diagnostic> => {
  // Constants of anonymous nested enums are typed by the enum, which is
  // never exposed; such constants are dropped.
  const typeName = finalPathSegment(item.ty);
  if (typeName !== undefined && !validateIdentOkForBindings(typeName).ok) {
    return ok;
  }
  return addEntry(ctx, {
    kind: "const",
    name: apiName(namespace, item.ident, ctx.callbacks),
    declaration: item,
  });
};

const parseTypeAlias = (
  ctx: WalkContext,
  item: TypeAliasItem,
  namespace: Namespace
): Result<void, Diagnostic> => {
  const name = apiName(namespace, item.ident, ctx.callbacks);
  const existing = ctx.model.get(name.name);
  if (existing && existing.kind !== "typedef") {
    return {
      ok: false,
      error: duplicateApiError(name.name, existing.kind),
    };
  }
  // The parser sometimes emits the same typedef twice; keep the last.
  ctx.model.upsert({
    kind: "typedef",
    name,
    aliasKind: "type",
    target: item.ty,
    declaration: item,
  });
  return ok;
};
