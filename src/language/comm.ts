/**
 * Communication helpers for kernel authors.
 *
 * Each helper resolves core coordinates against the target mesh, turns
 * buffers into regions and emits the matching `tl.comm_*` intrinsic. Omitted
 * optional arguments stay out of the call: a call without a group uses the
 * runtime's default participant set, and `put` without a size copies the
 * whole region.
 */

import { callIntrinsic } from "../ir/call";
import {
  commAllgatherOp,
  commBarrierOp,
  commBroadcastOp,
  commCurrentCoreOp,
  commFenceOp,
  commPutOp,
  commReduceOp,
  coreIdOp,
} from "../ir/comm";
import {
  type Buffer,
  type BufferRegion,
  type Call,
  type CallArg,
  toBufferRegion,
} from "../ir/expr";
import { CoreOutOfRangeError } from "./errors";
import { type CoreCoord, getTargetMesh, type MeshShape } from "./mesh";

/** A linear core id or a `[row, col]` coordinate. */
export type CoreRef = number | CoreCoord;

export type BufferLike = Buffer | BufferRegion;

export type AllReduceOptions = {
  group?: Iterable<CoreRef>;
  axis?: number;
};

/**
 * Linear id of `core` on `mesh` (row-major).
 */
export function linearCoreId(core: CoreRef, mesh: MeshShape): number {
  const meshLabel = `${mesh.x}x${mesh.y}`;
  if (typeof core === "number") {
    if (!Number.isInteger(core) || core < 0 || core >= mesh.x * mesh.y) {
      throw new CoreOutOfRangeError(`core id ${core} out of bounds for mesh ${meshLabel}`);
    }
    return core;
  }
  const [row, col] = core;
  if (!Number.isInteger(row) || row < 0 || row >= mesh.x) {
    throw new CoreOutOfRangeError(`row ${row} out of bounds for mesh ${meshLabel}`);
  }
  if (!Number.isInteger(col) || col < 0 || col >= mesh.y) {
    throw new CoreOutOfRangeError(`col ${col} out of bounds for mesh ${meshLabel}`);
  }
  return row * mesh.y + col;
}

export function coreId(core: CoreRef): Call {
  return callIntrinsic("handle", coreIdOp(), [linearCoreId(core, getTargetMesh())]);
}

function groupArgs(group: Iterable<CoreRef> | undefined): Call[] {
  return group === undefined ? [] : Array.from(group, (core) => coreId(core));
}

/**
 * Copy `src` into `dst` on `dstCore`, limited to `size` elements when given.
 */
export function put(
  src: BufferLike,
  dst: BufferLike,
  dstCore: CoreRef,
  size?: number,
): Call {
  const args: CallArg[] = [toBufferRegion(src), toBufferRegion(dst), coreId(dstCore)];
  if (size !== undefined) {
    args.push(size);
  }
  return callIntrinsic("handle", commPutOp(), args);
}

export function broadcast(
  buffer: BufferLike,
  srcCore: CoreRef,
  group?: Iterable<CoreRef>,
): Call {
  const srcCoreId = coreId(srcCore);
  return callIntrinsic("handle", commBroadcastOp(), [
    toBufferRegion(buffer),
    srcCoreId,
    ...groupArgs(group),
  ]);
}

export function allGather(
  sendBuffer: BufferLike,
  recvBuffer: BufferLike,
  group?: Iterable<CoreRef>,
): Call {
  return callIntrinsic("handle", commAllgatherOp(), [
    toBufferRegion(sendBuffer),
    toBufferRegion(recvBuffer),
    ...groupArgs(group),
  ]);
}

/**
 * Reduce `src` across the group with `op` (e.g. "sum", "max") into `dst`.
 * `axis`, when given, precedes the group members.
 */
export function allReduce(
  op: string,
  src: BufferLike,
  dst: BufferLike,
  options: AllReduceOptions = {},
): Call {
  if (op.length === 0) {
    throw new Error("allReduce requires a reduce operator");
  }
  const args: CallArg[] = [op, toBufferRegion(src), toBufferRegion(dst)];
  if (options.axis !== undefined) {
    args.push(options.axis);
  }
  args.push(...groupArgs(options.group));
  return callIntrinsic("handle", commReduceOp(), args);
}

export function barrier(group?: Iterable<CoreRef>): Call {
  return callIntrinsic("handle", commBarrierOp(), groupArgs(group));
}

export function fence(): Call {
  return callIntrinsic("handle", commFenceOp(), []);
}

export function currentCore(): Call {
  return callIntrinsic("handle", commCurrentCoreOp(), []);
}
