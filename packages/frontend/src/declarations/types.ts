/**
 * Declaration tree types.
 *
 * The upstream header parser renders native headers as nested items. Scopes
 * become `mod` items, and everything the interop layer needs to know about a
 * C++ entity is encoded in the shape of the item it produces.
 */

export type DeclType =
  | DeclPathType
  | DeclPointerType
  | DeclReferenceType
  | DeclArrayType
  | DeclFnType
  | DeclTupleType
  | DeclNeverType;

export type DeclPathType = {
  readonly kind: "path";
  readonly segments: readonly string[];
  readonly args?: readonly DeclType[];
};

export type DeclPointerType = {
  readonly kind: "pointer";
  readonly mutable: boolean;
  readonly elem: DeclType;
};

export type DeclReferenceType = {
  readonly kind: "reference";
  readonly mutable: boolean;
  readonly elem: DeclType;
};

export type DeclArrayType = {
  readonly kind: "array";
  readonly elem: DeclType;
  readonly length: number;
};

export type DeclFnType = {
  readonly kind: "fn";
  readonly params: readonly DeclType[];
  readonly returnType?: DeclType;
};

export type DeclTupleType = {
  readonly kind: "tuple";
  readonly elems: readonly DeclType[];
};

export type DeclNeverType = {
  readonly kind: "never";
};

export type DeclField = {
  /** Absent for tuple-struct fields */
  readonly ident?: string;
  readonly ty: DeclType;
};

export type DeclVariant = {
  readonly ident: string;
  readonly value?: string;
};

export type DeclParam = {
  readonly ident: string;
  readonly ty: DeclType;
};

export type ForeignFn = {
  readonly kind: "fn";
  readonly ident: string;
  readonly params: readonly DeclParam[];
  readonly returnType?: DeclType;
  readonly variadic?: boolean;
};

export type ForeignStatic = {
  readonly kind: "static";
  readonly ident: string;
  readonly ty: DeclType;
};

export type ForeignItem = ForeignFn | ForeignStatic;

export type ImplMethod = {
  readonly ident: string;
  /** The extern function the method body forwards to, when there is one */
  readonly calls?: string;
};

export type UseTree =
  | { readonly kind: "path"; readonly ident: string; readonly tree: UseTree }
  | { readonly kind: "name"; readonly ident: string }
  | { readonly kind: "rename"; readonly ident: string; readonly rename: string }
  | { readonly kind: "glob" }
  | { readonly kind: "group"; readonly items: readonly UseTree[] };

export type ModItem = {
  readonly kind: "mod";
  readonly ident: string;
  /** Absent for out-of-line scopes, which carry nothing to classify */
  readonly content?: readonly Item[];
};

export type StructItem = {
  readonly kind: "struct";
  readonly ident: string;
  readonly fields: readonly DeclField[];
};

export type EnumItem = {
  readonly kind: "enum";
  readonly ident: string;
  readonly variants: readonly DeclVariant[];
};

export type ImplItem = {
  readonly kind: "impl";
  readonly selfTy: DeclType;
  readonly items: readonly ImplMethod[];
};

export type ForeignModItem = {
  readonly kind: "foreignMod";
  readonly items: readonly ForeignItem[];
};

export type UseItem = {
  readonly kind: "use";
  readonly tree: UseTree;
};

export type ConstItem = {
  readonly kind: "const";
  readonly ident: string;
  readonly ty: DeclType;
  readonly value: string;
};

export type TypeAliasItem = {
  readonly kind: "type";
  readonly ident: string;
  readonly ty: DeclType;
};

/**
 * Anything the upstream parser emitted that has no classification rule
 * (macros, statics outside extern blocks, traits).
 */
export type OtherItem = {
  readonly kind: "other";
  readonly description: string;
};

export type Item =
  | ModItem
  | StructItem
  | EnumItem
  | ImplItem
  | ForeignModItem
  | UseItem
  | ConstItem
  | TypeAliasItem
  | OtherItem;

/**
 * Facts the upstream parser reported about the headers that are not
 * visible in the item tree itself. Keys are native spellings.
 */
export type ParseCallbacks = {
  readonly originalNames: ReadonlyMap<string, string>;
  readonly discardedTemplateParams: ReadonlySet<string>;
};

export type DeclarationTree = {
  readonly items: readonly Item[];
  readonly callbacks: ParseCallbacks;
};

export const emptyParseCallbacks = (): ParseCallbacks => ({
  originalNames: new Map(),
  discardedTemplateParams: new Set(),
});
