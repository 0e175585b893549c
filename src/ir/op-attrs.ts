/**
 * Attribute kinds that can be bound to a registered op.
 *
 * Each kind carries a type guard, so values read back from the registry are
 * narrowed to the kind's type, and an equality used to tell an identical
 * re-registration from a conflicting one. Structured values are copied and
 * frozen before they are bound.
 */

// ============================================================================
// Attribute kinds
// ============================================================================

export interface AttrKey<T> {
  readonly name: string;
  is(value: unknown): value is T;
  equals(a: T, b: T): boolean;
  format(value: T): string;
  /** Immutable copy of `value`, stored in place of the caller's object. */
  snapshot(value: T): T;
}

export function defineAttr<T>(
  name: string,
  is: (value: unknown) => value is T,
  options: {
    equals?: (a: T, b: T) => boolean;
    format?: (value: T) => string;
    snapshot?: (value: T) => T;
  } = {},
): AttrKey<T> {
  const equals = options.equals ?? ((a: T, b: T) => Object.is(a, b));
  const format = options.format ?? ((value: T) => JSON.stringify(value));
  const snapshot = options.snapshot ?? ((value: T) => value);
  return Object.freeze({
    name,
    is,
    equals,
    format,
    snapshot,
  });
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

// ============================================================================
// Effect classification
// ============================================================================

/**
 * How freely the optimizer may treat a call, from least to most constrained
 * (`controlJump` aside).
 */
export const CALL_EFFECT_KINDS = [
  "exprAnnotation",
  "pure",
  "readState",
  "updateState",
  "opaque",
  "specialCallArg",
  "embedded",
  "controlJump",
] as const;

export type CallEffectKind = (typeof CALL_EFFECT_KINDS)[number];

export function isCallEffectKind(value: unknown): value is CallEffectKind {
  return CALL_EFFECT_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Arity
// ============================================================================

/** Any number of arguments, including none. */
export const VARIADIC = "variadic";

export type Arity = number | typeof VARIADIC;

export function isArity(value: unknown): value is Arity {
  return (
    value === VARIADIC ||
    (typeof value === "number" && Number.isInteger(value) && value >= 0)
  );
}

export function formatArity(arity: Arity): string {
  return arity === VARIADIC ? "variadic" : String(arity);
}

// ============================================================================
// Documented call signature
// ============================================================================

export type CallParam = {
  readonly name: string;
  /** May be left out of a call. */
  readonly optional?: boolean;
  /** Takes every remaining argument; at least one unless `optional`. */
  readonly rest?: boolean;
};

function isCallParam(value: unknown): value is CallParam {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    (!("optional" in value) || typeof value.optional === "boolean") &&
    (!("rest" in value) || typeof value.rest === "boolean")
  );
}

function isCallSignature(value: unknown): value is readonly CallParam[] {
  return Array.isArray(value) && value.every(isCallParam);
}

function signaturesEqual(
  a: readonly CallParam[],
  b: readonly CallParam[],
): boolean {
  if (a.length !== b.length) return false;
  return a.every(
    (param, i) =>
      param.name === b[i].name &&
      (param.optional ?? false) === (b[i].optional ?? false) &&
      (param.rest ?? false) === (b[i].rest ?? false),
  );
}

export function freezeSignature(
  params: readonly CallParam[],
): readonly CallParam[] {
  return Object.freeze(params.map((param) => Object.freeze({ ...param })));
}

export function formatSignature(params: readonly CallParam[]): string {
  return params
    .map((param) => {
      if (param.rest) return `${param.name}...`;
      return param.optional ? `${param.name}?` : param.name;
    })
    .join(", ");
}

/** Number of arguments a call must carry to cover every non-optional param. */
export function requiredParamCount(params: readonly CallParam[]): number {
  return params.filter((param) => !param.optional).length;
}

// ============================================================================
// Well-known attribute keys
// ============================================================================

/** Name used when rendering the op back to source form. */
export const PRINTER_NAME = defineAttr("TScriptPrinterName", isString);

export const CALL_EFFECT_KIND = defineAttr(
  "TCallEffectKind",
  isCallEffectKind,
);

export const NUM_INPUTS = defineAttr("num_inputs", isArity, {
  format: formatArity,
});

export const CALL_SIGNATURE = defineAttr("TCallSignature", isCallSignature, {
  equals: signaturesEqual,
  format: (params) => `(${formatSignature(params)})`,
  snapshot: freezeSignature,
});

export const DESCRIPTION = defineAttr("description", isString);
