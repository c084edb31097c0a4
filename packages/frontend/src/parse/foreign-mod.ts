/**
 * Foreign-function collector for one scope.
 *
 * The upstream parser lists every callable native function in extern blocks,
 * methods included, flattened to free functions that take the object as an
 * explicit first parameter. It also emits impl blocks whose methods forward
 * to those functions. The impl blocks are only consulted to learn which
 * extern functions are really methods, and of which type.
 */

import type { ApiModel } from "../model/api-model.js";
import { ApiName, type FunctionReceiver } from "../model/api.js";
import { QualifiedName, type Namespace } from "../model/namespace.js";
import { collectTypeDependencies, finalPathSegment } from "../declarations/type-helpers.js";
import type {
  DeclType,
  ForeignFn,
  ForeignItem,
  ImplItem,
  ParseCallbacks,
} from "../declarations/types.js";
import { duplicateApiError, variadicFunctionError } from "./convert-errors.js";
import { pushIgnoredItem } from "./error-reporter.js";

const RECEIVER_PARAM = "this";

export class ForeignModCollector {
  private readonly functions: ForeignFn[] = [];

  // Extern function name -> ident of the type whose method it implements
  private readonly methodReceivers = new Map<string, string>();

  constructor(
    private readonly namespace: Namespace,
    private readonly callbacks: ParseCallbacks
  ) {}

  convertForeignModItems(items: readonly ForeignItem[]): void {
    for (const item of items) {
      // Extern statics are not exposed.
      if (item.kind === "fn") {
        this.functions.push(item);
      }
    }
  }

  convertImplItems(block: ImplItem): void {
    const selfIdent = finalPathSegment(block.selfTy);
    if (selfIdent === undefined) {
      return;
    }
    for (const method of block.items) {
      this.methodReceivers.set(method.calls ?? method.ident, selfIdent);
    }
  }

  /**
   * Append a Function entry for everything collected, in declaration order.
   */
  finished(model: ApiModel): void {
    for (const fn of this.functions) {
      if (fn.variadic) {
        pushIgnoredItem(model, variadicFunctionError(this.namespace, fn.ident));
        continue;
      }

      const qualified = new QualifiedName(this.namespace, fn.ident);
      const selfIdent = this.methodReceivers.get(fn.ident);
      const signatureTypes: DeclType[] = fn.params.map((param) => param.ty);
      if (fn.returnType) {
        signatureTypes.push(fn.returnType);
      }

      const added = model.add({
        kind: "function",
        source: "native",
        name: new ApiName(qualified, this.callbacks.originalNames.get(qualified.key)),
        signature: { params: fn.params, returnType: fn.returnType },
        selfType:
          selfIdent === undefined
            ? undefined
            : new QualifiedName(this.namespace, selfIdent),
        receiver: receiverFor(fn, selfIdent),
        deps: collectTypeDependencies(signatureTypes),
      });

      if (!added) {
        const existing = model.get(qualified);
        pushIgnoredItem(
          model,
          duplicateApiError(qualified, existing?.kind ?? "function")
        );
      }
    }
  }
}

const receiverFor = (
  fn: ForeignFn,
  selfIdent: string | undefined
): FunctionReceiver => {
  if (selfIdent === undefined) {
    return "none";
  }
  return fn.params[0]?.ident === RECEIVER_PARAM ? "instance" : "static";
};
