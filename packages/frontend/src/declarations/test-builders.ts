/**
 * Builders for declaration trees in tests.
 */

import type {
  ConstItem,
  DeclField,
  DeclParam,
  DeclType,
  EnumItem,
  ForeignFn,
  ForeignModItem,
  ImplItem,
  Item,
  ModItem,
  StructItem,
  TypeAliasItem,
  UseItem,
} from "./types.js";
import { RVALUE_REFERENCE_MARKER } from "./type-helpers.js";

export const pathType = (...segments: string[]): DeclType => ({
  kind: "path",
  segments,
});

export const pointerTo = (elem: DeclType, mutable = false): DeclType => ({
  kind: "pointer",
  mutable,
  elem,
});

export const rvalueRef = (elem: DeclType): DeclType =>
  pointerTo({ kind: "path", segments: [RVALUE_REFERENCE_MARKER], args: [elem] });

export const field = (ident: string, ty: DeclType = pathType("i32")): DeclField => ({
  ident,
  ty,
});

export const struct = (ident: string, ...fields: DeclField[]): StructItem => ({
  kind: "struct",
  ident,
  fields: fields.length > 0 ? fields : [field("value")],
});

export const forwardDecl = (ident: string): StructItem => ({
  kind: "struct",
  ident,
  fields: [field("_unused", { kind: "array", elem: pathType("u8"), length: 0 })],
});

export const enumItem = (ident: string, ...variants: string[]): EnumItem => ({
  kind: "enum",
  ident,
  variants: variants.map((variant) => ({ ident: variant })),
});

export const mod = (ident: string, ...content: Item[]): ModItem => ({
  kind: "mod",
  ident,
  content,
});

export const root = (...content: Item[]): readonly Item[] => [mod("root", ...content)];

export const constItem = (ident: string, ty: DeclType, value = "0"): ConstItem => ({
  kind: "const",
  ident,
  ty,
  value,
});

export const typeAlias = (ident: string, ty: DeclType): TypeAliasItem => ({
  kind: "type",
  ident,
  ty,
});

/**
 * `use self::super::<path...>::<target> as <alias>;`
 */
export const useAlias = (
  path: readonly string[],
  target: string,
  alias: string
): UseItem => ({
  kind: "use",
  tree: path.reduceRight<UseItem["tree"]>(
    (tree, ident) => ({ kind: "path", ident, tree }),
    { kind: "rename", ident: target, rename: alias }
  ),
});

export const param = (ident: string, ty: DeclType): DeclParam => ({ ident, ty });

export const fn = (
  ident: string,
  params: readonly DeclParam[] = [],
  returnType?: DeclType
): ForeignFn => ({ kind: "fn", ident, params, returnType });

export const externBlock = (...items: ForeignFn[]): ForeignModItem => ({
  kind: "foreignMod",
  items,
});

export const implBlock = (
  selfIdent: string,
  ...methods: { ident: string; calls?: string }[]
): ImplItem => ({
  kind: "impl",
  selfTy: pathType(selfIdent),
  items: methods,
});
