/**
 * Managed function signatures
 *
 * Functions implemented on the managed side and exported to C++ are declared
 * in the configuration as TypeScript signatures. They are parsed here with
 * the TypeScript compiler to learn which types each one depends on.
 */

import * as ts from "typescript";
import type { ManagedFunctionSignature } from "../model/api.js";
import { QualifiedName } from "../model/namespace.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";

export type ManagedFunctionAnalysis = {
  readonly ident: string;
  readonly signature: ManagedFunctionSignature;
  readonly deps: readonly QualifiedName[];
};

/**
 * Where the signature text was written, so errors can point into it.
 */
export type ManagedSource = {
  readonly fileName: string;
  readonly text: string;
};

// Generic containers the bridge maps structurally; only their arguments
// are dependencies.
const GLOBAL_CONTAINERS: ReadonlySet<string> = new Set([
  "Array",
  "ReadonlyArray",
  "Promise",
]);

/**
 * Maps positions in the parsed signature back to the managed source file.
 */
const createLocator = (
  signatureText: string,
  source: ManagedSource | undefined
): ((node: ts.Node, signatureFile: ts.SourceFile) => SourceLocation | undefined) => {
  const offset = source ? source.text.indexOf(signatureText) : -1;
  if (!source || offset < 0) {
    return () => undefined;
  }

  let sourceFile: ts.SourceFile | undefined;
  return (node, signatureFile) => {
    sourceFile ??= ts.createSourceFile(
      source.fileName,
      source.text,
      ts.ScriptTarget.ES2022,
      false,
      ts.ScriptKind.TS
    );
    const start = node.getStart(signatureFile);
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(
      offset + start
    );
    return {
      file: source.fileName,
      line: line + 1,
      column: character + 1,
      length: node.getEnd() - start,
    };
  };
};

const signatureError = (
  code: Diagnostic["code"],
  message: string,
  location: SourceLocation | undefined
): Diagnostic => ({
  code,
  severity: "error",
  message,
  location,
});

const syntaxErrors = (signatureText: string): readonly string[] => {
  const output = ts.transpileModule(signatureText, {
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022 },
  });
  return (output.diagnostics ?? []).map((d) =>
    ts.flattenDiagnosticMessageText(d.messageText, "\n")
  );
};

/**
 * Parse one managed function signature and collect the named types it
 * mentions, in order of first appearance.
 */
export const analyzeManagedFunction = (
  signatureText: string,
  source?: ManagedSource
): Result<ManagedFunctionAnalysis, Diagnostic> => {
  const signatureFile = ts.createSourceFile(
    "managed-signature.ts",
    signatureText,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const locate = createLocator(signatureText, source);
  const locateNode = (node: ts.Node): SourceLocation | undefined =>
    locate(node, signatureFile);

  const [syntaxError] = syntaxErrors(signatureText);
  const statement = signatureFile.statements[0];
  if (
    syntaxError !== undefined ||
    signatureFile.statements.length !== 1 ||
    statement === undefined ||
    !ts.isFunctionDeclaration(statement) ||
    statement.name === undefined
  ) {
    return {
      ok: false,
      error: signatureError(
        "BRW3001",
        `Managed function signature must be a single named function declaration: '${signatureText}'${syntaxError ? ` (${syntaxError})` : ""}`,
        statement ? locateNode(statement) : undefined
      ),
    };
  }

  const deps = new Map<string, QualifiedName>();
  let failure: Diagnostic | undefined;

  const visitType = (node: ts.TypeNode): void => {
    if (failure) return;

    if (ts.isTypeReferenceNode(node)) {
      if (ts.isQualifiedName(node.typeName)) {
        failure = signatureError(
          "BRW3002",
          `Type '${node.typeName.getText(signatureFile)}' is namespaced; managed types must be referenced by their bare name`,
          locateNode(node.typeName)
        );
        return;
      }
      const name = node.typeName.text;
      if (!GLOBAL_CONTAINERS.has(name) && !deps.has(name)) {
        deps.set(name, QualifiedName.inRoot(name));
      }
      node.typeArguments?.forEach(visitType);
      return;
    }

    if (ts.isArrayTypeNode(node)) {
      visitType(node.elementType);
    } else if (ts.isUnionTypeNode(node) || ts.isIntersectionTypeNode(node)) {
      node.types.forEach(visitType);
    } else if (ts.isParenthesizedTypeNode(node) || ts.isTypeOperatorNode(node)) {
      visitType(node.type);
    } else if (ts.isTupleTypeNode(node)) {
      node.elements.forEach((element) =>
        visitType(ts.isNamedTupleMember(element) ? element.type : element)
      );
    } else if (ts.isFunctionTypeNode(node)) {
      node.parameters.forEach((param) => {
        if (param.type) visitType(param.type);
      });
      visitType(node.type);
    }
  };

  const params: { readonly ident: string; readonly type: string }[] = [];
  for (const param of statement.parameters) {
    if (ts.isIdentifier(param.name) && param.name.text === "this") {
      return {
        ok: false,
        error: signatureError(
          "BRW3003",
          `Managed function '${statement.name.text}' declares a 'this' parameter; managed functions are exported as free functions`,
          locateNode(param)
        ),
      };
    }
    if (!ts.isIdentifier(param.name) || param.type === undefined) {
      return {
        ok: false,
        error: signatureError(
          "BRW3001",
          `Parameter '${param.name.getText(signatureFile)}' of '${statement.name.text}' needs a plain name and a type annotation`,
          locateNode(param)
        ),
      };
    }
    visitType(param.type);
    params.push({ ident: param.name.text, type: param.type.getText(signatureFile) });
  }

  if (statement.type) {
    visitType(statement.type);
  }

  if (failure) {
    return { ok: false, error: failure };
  }

  return {
    ok: true,
    value: {
      ident: statement.name.text,
      signature: {
        text: signatureText,
        params,
        returnType: statement.type?.getText(signatureFile),
      },
      deps: [...deps.values()],
    },
  };
};
