/**
 * Identifier rules for names exposed across the bridge.
 *
 * A name must be usable verbatim in the generated TypeScript surface and in
 * the generated C++ glue, so it has to satisfy both languages.
 */

import * as ts from "typescript";
import type { Result } from "../types/result.js";

export type InvalidIdentReason =
  | "notAnIdentifier"
  | "reservedWord"
  | "doubleUnderscore"
  | "anonymousEnum";

export type InvalidIdent = {
  readonly ident: string;
  readonly reason: InvalidIdentReason;
};

/** Prefix the upstream parser gives the types of anonymous enums */
export const ANONYMOUS_ENUM_PREFIX = "_bindgen_ty_";

const isReservedWord = (ident: string): boolean => {
  const token = ts.stringToToken(ident);
  return (
    token !== undefined &&
    token >= ts.SyntaxKind.FirstReservedWord &&
    token <= ts.SyntaxKind.LastReservedWord
  );
};

export const validateIdentOkForBindings = (
  ident: string
): Result<void, InvalidIdent> => {
  if (!ts.isIdentifierText(ident, ts.ScriptTarget.ES2022)) {
    return { ok: false, error: { ident, reason: "notAnIdentifier" } };
  }
  if (isReservedWord(ident)) {
    return { ok: false, error: { ident, reason: "reservedWord" } };
  }
  // Reserved for the implementation in C++
  if (ident.includes("__")) {
    return { ok: false, error: { ident, reason: "doubleUnderscore" } };
  }
  if (ident.startsWith(ANONYMOUS_ENUM_PREFIX)) {
    return { ok: false, error: { ident, reason: "anonymousEnum" } };
  }
  return { ok: true, value: undefined };
};

export const describeInvalidIdent = (invalid: InvalidIdent): string => {
  switch (invalid.reason) {
    case "notAnIdentifier":
      return `'${invalid.ident}' is not a valid identifier`;
    case "reservedWord":
      return `'${invalid.ident}' is a reserved word`;
    case "doubleUnderscore":
      return `'${invalid.ident}' contains '__', which C++ reserves for the implementation`;
    case "anonymousEnum":
      return `'${invalid.ident}' names an anonymous enum`;
  }
};
