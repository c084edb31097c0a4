/**
 * Diagnostic types for the bridgewright front end
 */

import type { Namespace } from "../model/namespace.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "BRW1001" // Identifier not legal in the generated bindings
  | "BRW1002" // Forward-declared nested type
  | "BRW1003" // Type discards a template parameter
  | "BRW1004" // Infinitely recursive typedef
  | "BRW1005" // Unexpected item in scope
  | "BRW1006" // Duplicate API name
  | "BRW1007" // Variadic function
  | "BRW2001" // Generate directive did not generate anything
  // Managed function signature errors (BRW3001-BRW3003)
  | "BRW3001" // Signature is not a single function declaration
  | "BRW3002" // Namespaced type used in a managed signature
  | "BRW3003" // Managed function declares a `this` parameter
  // Configuration loading errors (BRW9001-BRW9006)
  | "BRW9001" // Config file not found
  | "BRW9002" // Failed to read config file
  | "BRW9003" // Invalid JSON in config file
  | "BRW9004" // Config file must be an object
  | "BRW9005" // Invalid field type
  | "BRW9006" // Invalid list entry
  // Declaration tree loading errors (BRW9101-BRW9106)
  | "BRW9101" // Declaration tree file not found
  | "BRW9102" // Failed to read declaration tree file
  | "BRW9103" // Invalid JSON in declaration tree file
  | "BRW9104" // Declaration tree must be an object with an 'items' array
  | "BRW9105" // Malformed item
  | "BRW9106"; // Malformed callbacks section

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

/**
 * The declaration a diagnostic was raised for: the scope it lives in and
 * its identifier.
 */
export type ItemContext = {
  readonly namespace: Namespace;
  readonly ident: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly item?: ItemContext;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const formatItemContext = (item: ItemContext): string =>
  item.namespace.isEmpty
    ? item.ident
    : `${item.namespace.toString()}::${item.ident}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  } else if (diagnostic.item) {
    parts.push(`${formatItemContext(diagnostic.item)}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
