import type { Op } from "./op-registry";

export type DType =
  | "handle"
  | "bool"
  | "int8"
  | "int32"
  | "uint8"
  | "float16"
  | "bfloat16"
  | "float32";

export type Buffer = {
  name: string;
  shape: number[];
  dtype: DType;
};

export type Range = {
  min: number;
  extent: number;
};

export type IntImm = {
  kind: "int";
  value: number;
  dtype: "int32";
};

export type StringImm = {
  kind: "string";
  value: string;
};

export type BufferRegion = {
  kind: "buffer_region";
  buffer: Buffer;
  region: Range[];
};

export type Call = {
  readonly kind: "call";
  readonly op: Op;
  readonly args: readonly Expr[];
  readonly dtype: DType;
};

export type Expr = IntImm | StringImm | BufferRegion | Call;

/** Call arguments as written by frontends; numbers and strings become immediates. */
export type CallArg = Expr | number | string;

export function declBuffer(
  name: string,
  shape: number[],
  dtype: DType = "float32",
): Buffer {
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new Error(`buffer ${name}: invalid dimension ${dim} in [${shape}]`);
    }
  }
  return { name, shape: shape.slice(), dtype };
}

export function intImm(value: number): IntImm {
  if (!Number.isInteger(value)) {
    throw new Error(`integer immediate expected, got ${value}`);
  }
  return { kind: "int", value, dtype: "int32" };
}

export function stringImm(value: string): StringImm {
  return { kind: "string", value };
}

/**
 * Region of `buffer`; the whole buffer when `region` is omitted.
 */
export function bufferRegion(buffer: Buffer, region?: Range[]): BufferRegion {
  const ranges = region ?? buffer.shape.map((extent) => ({ min: 0, extent }));
  if (ranges.length !== buffer.shape.length) {
    throw new Error(
      `buffer ${buffer.name}: region rank ${ranges.length} does not match buffer rank ${buffer.shape.length}`,
    );
  }
  ranges.forEach((range, i) => {
    if (range.min < 0 || range.extent < 0 || range.min + range.extent > buffer.shape[i]) {
      throw new Error(
        `buffer ${buffer.name}: range ${range.min}:${range.min + range.extent} out of bounds for dim ${i} (size ${buffer.shape[i]})`,
      );
    }
  });
  return {
    kind: "buffer_region",
    buffer,
    region: ranges.map((range) => ({ ...range })),
  };
}

export function toBufferRegion(target: Buffer | BufferRegion): BufferRegion {
  return "kind" in target ? target : bufferRegion(target);
}

/** Number of elements covered by a region. */
export function regionSize(region: BufferRegion): number {
  return region.region.reduce((acc, range) => acc * range.extent, 1);
}

export function toExpr(arg: CallArg): Expr {
  if (typeof arg === "number") return intImm(arg);
  if (typeof arg === "string") return stringImm(arg);
  return arg;
}

export function isCall(expr: Expr): expr is Call {
  return expr.kind === "call";
}
