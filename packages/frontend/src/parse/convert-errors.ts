/**
 * Diagnostics raised while classifying declarations
 */

import type { ApiKind } from "../model/api.js";
import { describeInvalidIdent, type InvalidIdent } from "../model/identifiers.js";
import type { Namespace, QualifiedName } from "../model/namespace.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";

const itemError = (
  code: Diagnostic["code"],
  message: string,
  namespace: Namespace,
  ident: string,
  hint?: string
): Diagnostic => ({
  ...createDiagnostic(code, "error", message, undefined, hint),
  item: { namespace, ident },
});

export const invalidIdentError = (
  namespace: Namespace,
  invalid: InvalidIdent
): Diagnostic =>
  itemError(
    "BRW1001",
    `Cannot expose ${describeInvalidIdent(invalid)}`,
    namespace,
    invalid.ident
  );

export const forwardDeclaredNestedTypeError = (
  namespace: Namespace,
  ident: string
): Diagnostic =>
  itemError(
    "BRW1002",
    "Forward declarations of nested types cannot be exposed",
    namespace,
    ident,
    "Include the header that defines the nested type"
  );

export const discardedTemplateParamError = (
  namespace: Namespace,
  ident: string
): Diagnostic =>
  itemError(
    "BRW1003",
    `Type '${ident}' has a template parameter the header parser discarded`,
    namespace,
    ident
  );

export const infinitelyRecursiveTypedefError = (
  name: QualifiedName
): Diagnostic =>
  itemError(
    "BRW1004",
    `Infinitely recursive typedef: '${name.toCppName()}' aliases itself`,
    name.namespace,
    name.ident
  );

/**
 * Raised without item context: the item has no identifier to report it
 * under.
 */
export const unexpectedItemError = (description: string): Diagnostic =>
  createDiagnostic(
    "BRW1005",
    "error",
    `Unexpected item in scope: ${description}`
  );

export const duplicateApiError = (
  name: QualifiedName,
  existing: ApiKind
): Diagnostic =>
  itemError(
    "BRW1006",
    `'${name.toCppName()}' is already defined (as ${existing})`,
    name.namespace,
    name.ident
  );

export const variadicFunctionError = (
  namespace: Namespace,
  ident: string
): Diagnostic =>
  itemError(
    "BRW1007",
    `Function '${ident}' is variadic; variadic functions cannot be called across the bridge`,
    namespace,
    ident
  );

export const didNotGenerateAnythingError = (directive: string): Diagnostic =>
  createDiagnostic(
    "BRW2001",
    "error",
    `Generate directive '${directive}' did not generate anything`,
    undefined,
    "Check the spelling and namespace, and that the block list does not exclude it"
  );
