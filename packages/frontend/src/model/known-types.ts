/**
 * Native types the bridge already knows how to carry.
 *
 * Declarations of these types in the headers are never classified: the
 * bridge runtime supplies its own mapping. The upstream parser may also
 * emit a root-level stand-in for some of them (`string` for `std::string`),
 * which is skipped the same way.
 */

import { QualifiedName } from "./namespace.js";

const KNOWN_TYPES: readonly string[] = [
  "std::string",
  "std::string_view",
  "std::unique_ptr",
  "std::shared_ptr",
  "std::weak_ptr",
  "std::vector",
  "bridge::String",
  "bridge::Str",
  "bridge::Buffer",
];

const knownCppNames: ReadonlySet<string> = new Set(KNOWN_TYPES);

const finalIdents: ReadonlySet<string> = new Set(
  KNOWN_TYPES.map((cppName) => QualifiedName.fromCppName(cppName).ident)
);

export const isKnownType = (name: QualifiedName): boolean =>
  knownCppNames.has(name.toCppName());

/**
 * True for a root-level type standing in for a known type.
 */
export const isKnownSubstituteType = (name: QualifiedName): boolean =>
  name.namespace.isEmpty && finalIdents.has(name.ident);
