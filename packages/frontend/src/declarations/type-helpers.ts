/**
 * Queries over declaration types.
 */

import { QualifiedName } from "../model/namespace.js";
import type { DeclField, DeclType } from "./types.js";

/**
 * The upstream parser cannot express C++ references in its output, so it
 * renders `T&` and `T&&` as a pointer to one of these marker paths wrapping T.
 */
export const REFERENCE_MARKER = "__bindgen_marker_Reference";
export const RVALUE_REFERENCE_MARKER = "__bindgen_marker_RValueReference";

// Leading path segments that only say where the upstream module tree starts.
// A path that opens with one of them names a declaration from the headers.
const RELATIVE_PATH_SEGMENTS: ReadonlySet<string> = new Set([
  "root",
  "self",
  "super",
  "crate",
]);

const PRIMITIVE_TYPES: ReadonlySet<string> = new Set([
  "bool",
  "char",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "isize",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "usize",
  "f32",
  "f64",
]);

// Platform type modules, e.g. `std::os::raw::c_int`.
const PLATFORM_ROOTS: ReadonlySet<string> = new Set(["std", "core", "libc"]);

const markerFor = (searchForRvalue: boolean): string =>
  searchForRvalue ? RVALUE_REFERENCE_MARKER : REFERENCE_MARKER;

/**
 * True if the type is a pointer to the reference marker; with
 * `searchForRvalue`, only rvalue references (`T&&`) match.
 */
export const typeIsReference = (
  ty: DeclType,
  searchForRvalue: boolean
): boolean =>
  ty.kind === "pointer" &&
  ty.elem.kind === "path" &&
  ty.elem.segments[0] === markerFor(searchForRvalue);

export const hasField = (
  fields: readonly DeclField[],
  ident: string
): boolean => fields.some((field) => field.ident === ident);

/**
 * Last segment of a path type, or undefined for any other shape.
 */
export const finalPathSegment = (ty: DeclType): string | undefined =>
  ty.kind === "path" ? ty.segments[ty.segments.length - 1] : undefined;

const stripRelativePrefix = (segments: readonly string[]): readonly string[] => {
  let start = 0;
  while (
    start < segments.length - 1 &&
    RELATIVE_PATH_SEGMENTS.has(segments[start] ?? "")
  ) {
    start++;
  }
  return segments.slice(start);
};

/**
 * Primitive and platform types are told apart from header declarations by
 * the unstripped path: only paths outside the header module tree qualify.
 */
const isPlatformPath = (segments: readonly string[]): boolean => {
  const first = segments[0];
  if (first === undefined) return true;
  if (RELATIVE_PATH_SEGMENTS.has(first)) return false;
  if (segments.length === 1) return PRIMITIVE_TYPES.has(first);
  return PLATFORM_ROOTS.has(first);
};

/**
 * Every user-visible named type a declaration type mentions, in order of
 * first appearance. Pointers, references, arrays and markers are looked
 * through; primitive and platform types are left out.
 */
export const collectTypeDependencies = (
  types: readonly DeclType[]
): readonly QualifiedName[] => {
  const seen = new Map<string, QualifiedName>();

  const visit = (ty: DeclType): void => {
    switch (ty.kind) {
      case "path": {
        const marker = ty.segments[0];
        if (marker === REFERENCE_MARKER || marker === RVALUE_REFERENCE_MARKER) {
          ty.args?.forEach(visit);
          return;
        }
        if (!isPlatformPath(ty.segments)) {
          const name = QualifiedName.fromSegments(
            stripRelativePrefix(ty.segments)
          );
          if (!seen.has(name.key)) {
            seen.set(name.key, name);
          }
        }
        ty.args?.forEach(visit);
        return;
      }
      case "pointer":
      case "reference":
      case "array":
        visit(ty.elem);
        return;
      case "fn":
        ty.params.forEach(visit);
        if (ty.returnType) visit(ty.returnType);
        return;
      case "tuple":
        ty.elems.forEach(visit);
        return;
      case "never":
        return;
    }
  };

  types.forEach(visit);
  return [...seen.values()];
};
