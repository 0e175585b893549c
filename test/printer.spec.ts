import { describe, expect, it } from "vitest";

import {
  OpRegistry,
  bufferRegion,
  callIntrinsic,
  commPutOp,
  coreIdOp,
  declBuffer,
  formatExpr,
  intImm,
  stringImm,
} from "../src";

describe("formatExpr", () => {
  it("renders immediates and regions", () => {
    const registry = new OpRegistry();
    expect(formatExpr(intImm(7), registry)).toBe("7");
    expect(formatExpr(stringImm("max"), registry)).toBe('"max"');
    const region = bufferRegion(declBuffer("A", [4, 8]), [
      { min: 1, extent: 2 },
      { min: 0, extent: 8 },
    ]);
    expect(formatExpr(region, registry)).toBe("A[1:3, 0:8]");
  });

  it("renders intrinsic calls by printer name", () => {
    const registry = new OpRegistry();
    const a = bufferRegion(declBuffer("A", [16]));
    const b = bufferRegion(declBuffer("B", [16]));
    const core = callIntrinsic("handle", coreIdOp(registry), [3], { registry });
    const put = callIntrinsic("handle", commPutOp(registry), [a, b, core, 16], { registry });

    expect(formatExpr(put, registry)).toBe("T.comm_put(A[0:16], B[0:16], T.CoreId(3), 16)");
  });

  it("falls back to call_intrin for ops without a printer name", () => {
    const registry = new OpRegistry();
    const op = registry.registerOrGet("tl.raw");
    const call = callIntrinsic("int32", op, [1, "x"], { registry });
    expect(formatExpr(call, registry)).toBe('T.call_intrin("int32", "tl.raw", 1, "x")');
  });
});
