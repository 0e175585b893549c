/**
 * Call-site construction for registered intrinsics.
 *
 * The registry never looks at arguments. Arity is checked here, against the
 * `num_inputs` attribute: a fixed-arity mismatch is an error, and a variadic
 * call carrying fewer arguments than the op's documented signature is
 * reported as a warning.
 */

import { warnCall } from "./debug";
import { CallArityError } from "./errors";
import { type Call, type CallArg, type DType, toExpr } from "./expr";
import {
  CALL_SIGNATURE,
  formatSignature,
  NUM_INPUTS,
  PRINTER_NAME,
  requiredParamCount,
  VARIADIC,
} from "./op-attrs";
import { getOpRegistry, type Op, type OpRegistry } from "./op-registry";

export type CallDiagnostic = {
  severity: "error" | "warning";
  op: string;
  message: string;
};

export type CallIntrinsicOptions = {
  registry?: OpRegistry;
  /** Receives warnings raised while building the call. */
  diagnostics?: CallDiagnostic[];
};

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export function checkCallArity(
  op: Op,
  argCount: number,
  registry: OpRegistry = getOpRegistry(),
): CallDiagnostic | null {
  const arity = registry.getAttr(op, NUM_INPUTS);
  if (arity === undefined) {
    return null;
  }
  const label = registry.getAttr(op, PRINTER_NAME) ?? op.name;

  if (arity !== VARIADIC) {
    if (argCount === arity) return null;
    return {
      severity: "error",
      op: op.name,
      message: `${label} expects ${plural(arity, "argument")}, got ${argCount}`,
    };
  }

  const signature = registry.getAttr(op, CALL_SIGNATURE);
  if (!signature) return null;
  const required = requiredParamCount(signature);
  if (argCount >= required) return null;
  return {
    severity: "warning",
    op: op.name,
    message: `${label} expects at least ${plural(required, "argument")} (${formatSignature(signature)}), got ${argCount}`,
  };
}

/**
 * Build a call to `op`. Throws {@link CallArityError} when a fixed-arity op
 * gets the wrong number of arguments.
 */
export function callIntrinsic(
  dtype: DType,
  op: Op,
  args: readonly CallArg[],
  options: CallIntrinsicOptions = {},
): Call {
  const registry = options.registry ?? getOpRegistry();
  const diagnostic = checkCallArity(op, args.length, registry);
  if (diagnostic?.severity === "error") {
    throw new CallArityError(diagnostic.message);
  }
  if (diagnostic) {
    options.diagnostics?.push(diagnostic);
    warnCall(diagnostic.message);
  }
  const call: Call = {
    kind: "call",
    op,
    args: Object.freeze(args.map(toExpr)),
    dtype,
  };
  return Object.freeze(call);
}
