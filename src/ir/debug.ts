/**
 * Op registry tracing.
 *
 * Activated by setting TILEMESH_TRACE_OPS=1. Arity warnings from call
 * construction are always reported.
 */

const TRACE_OPS =
  typeof process !== "undefined" && process.env?.TILEMESH_TRACE_OPS === "1";

export function traceOp(message: string): void {
  if (TRACE_OPS) console.log(`[op-registry] ${message}`);
}

export function warnCall(message: string): void {
  console.warn(`[call] ${message}`);
}
