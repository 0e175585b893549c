/**
 * Communication Intrinsics
 *
 * Inter-core communication primitives for multi-core targets. They are
 * symbolic: lowering turns each call into the target's communication code.
 * Every one of them is opaque to the optimizer (it may read or write memory,
 * talk to other cores or block), so calls are never reordered against other
 * opaque calls, eliminated or duplicated, and their arguments are evaluated
 * in order.
 *
 * Ops are registered as `tl.<name>` the first time any accessor runs against a
 * registry.
 */

import { UnknownOpError } from "./errors";
import {
  type Arity,
  CALL_EFFECT_KIND,
  CALL_SIGNATURE,
  type CallEffectKind,
  type CallParam,
  freezeSignature,
  PRINTER_NAME,
  VARIADIC,
} from "./op-attrs";
import { getOpRegistry, type Op, type OpRegistry } from "./op-registry";

// ============================================================================
// Catalog
// ============================================================================

export type CommIntrinsicName =
  | "comm_put"
  | "comm_broadcast"
  | "comm_allgather"
  | "comm_reduce"
  | "comm_barrier"
  | "comm_fence"
  | "CoreId"
  | "comm_current_core";

export interface CommIntrinsicDef {
  readonly name: CommIntrinsicName;
  readonly numInputs: Arity;
  readonly effect: CallEffectKind;
  /** Documented call-site arguments, in order. */
  readonly signature: readonly CallParam[];
  readonly description: string;
}

export const COMM_OP_PREFIX = "tl.";

const COMM_INTRINSIC_DEFS: readonly CommIntrinsicDef[] = [
  {
    // comm_put(src_buffer, dst_buffer, dst_core, size)
    name: "comm_put",
    numInputs: VARIADIC,
    effect: "opaque",
    signature: [
      { name: "src_buffer" },
      { name: "dst_buffer" },
      { name: "dst_core" },
      { name: "size" },
    ],
    description: "Copy a buffer region from the current core into a buffer on another core.",
  },
  {
    // comm_broadcast(buffer, src_core, group...)
    name: "comm_broadcast",
    numInputs: VARIADIC,
    effect: "opaque",
    signature: [{ name: "buffer" }, { name: "src_core" }, { name: "group", rest: true }],
    description: "Replicate a buffer from one core to every core in a group.",
  },
  {
    // comm_allgather(send_buffer, recv_buffer, group...)
    name: "comm_allgather",
    numInputs: VARIADIC,
    effect: "opaque",
    signature: [{ name: "send_buffer" }, { name: "recv_buffer" }, { name: "group", rest: true }],
    description: "Every core in a group contributes its buffer; all of them receive the concatenation.",
  },
  {
    // comm_reduce(reduce_type, send_buffer, recv_buffer, [axis], group...)
    name: "comm_reduce",
    numInputs: VARIADIC,
    effect: "opaque",
    signature: [
      { name: "reduce_type" },
      { name: "send_buffer" },
      { name: "recv_buffer" },
      { name: "axis", optional: true },
      { name: "group", rest: true },
    ],
    description: "Combine per-core values across a group with an associative operator.",
  },
  {
    // comm_barrier(group...)
    name: "comm_barrier",
    numInputs: VARIADIC,
    effect: "opaque",
    signature: [{ name: "group", rest: true }],
    description: "Block until every core in the group reaches the barrier.",
  },
  {
    name: "comm_fence",
    numInputs: 0,
    effect: "opaque",
    signature: [],
    description: "Order pending communication against later memory accesses without synchronizing cores.",
  },
  {
    // CoreId(core_index)
    name: "CoreId",
    numInputs: 1,
    effect: "opaque",
    signature: [{ name: "core_index" }],
    description: "Map a linear core index to a core identity.",
  },
  {
    name: "comm_current_core",
    numInputs: 0,
    effect: "opaque",
    signature: [],
    description: "Identity of the core executing the instruction.",
  },
];

/** Catalog entries are frozen, signatures included. */
export const COMM_INTRINSICS: readonly CommIntrinsicDef[] = Object.freeze(
  COMM_INTRINSIC_DEFS.map((def) =>
    Object.freeze({ ...def, signature: freezeSignature(def.signature) }),
  ),
);

export function commOpName(name: CommIntrinsicName): string {
  return `${COMM_OP_PREFIX}${name}`;
}

/**
 * Register every catalog entry with `registry`. Safe to repeat; throws
 * ConflictingOpRegistrationError if one of the names already carries a
 * different definition.
 */
export function registerCommIntrinsics(
  registry: OpRegistry,
): ReadonlyMap<CommIntrinsicName, Op> {
  const ops = new Map<CommIntrinsicName, Op>();
  for (const def of COMM_INTRINSICS) {
    const registration = registry
      .register(commOpName(def.name))
      .setAttr(PRINTER_NAME, def.name)
      .setNumInputs(def.numInputs)
      .setAttr(CALL_EFFECT_KIND, def.effect)
      .setAttr(CALL_SIGNATURE, def.signature)
      .describe(def.description);
    ops.set(def.name, registration.op);
  }
  return ops;
}

// ============================================================================
// Accessors
// ============================================================================

const registeredOps = new WeakMap<OpRegistry, ReadonlyMap<CommIntrinsicName, Op>>();

export function getCommIntrinsic(
  name: CommIntrinsicName,
  registry: OpRegistry = getOpRegistry(),
): Op {
  let ops = registeredOps.get(registry);
  if (!ops) {
    ops = registerCommIntrinsics(registry);
    registeredOps.set(registry, ops);
  }
  const op = ops.get(name);
  if (!op) {
    throw new UnknownOpError(`unknown communication intrinsic: ${name}`);
  }
  return op;
}

export function commPutOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_put", registry);
}

export function commBroadcastOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_broadcast", registry);
}

export function commAllgatherOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_allgather", registry);
}

export function commReduceOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_reduce", registry);
}

export function commBarrierOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_barrier", registry);
}

export function commFenceOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_fence", registry);
}

export function coreIdOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("CoreId", registry);
}

export function commCurrentCoreOp(registry?: OpRegistry): Op {
  return getCommIntrinsic("comm_current_core", registry);
}
